import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import { env } from "../../config/env.js";
import { sha256 } from "../../shared/hash.js";
import { errorCodes, RulesetError } from "../reconciliation/errors.js";
import type {
  BusinessRules,
  RulesetKind,
  RulesetMeta,
  RulesetMetaEntry,
  RulesetVersions,
  StateCodeTable
} from "./types.js";

// the package's own rulesets/ sits three levels above this module in src/ and dist/
export const RULESET_ROOT = env.RULESET_DIR
  ? path.resolve(env.RULESET_DIR)
  : fileURLToPath(new URL("../../../rulesets", import.meta.url));

const metaSchema = z.object({
  active: z.object({
    stateCodes: z.string().min(1),
    businessRules: z.string().min(1)
  }),
  versions: z.array(
    z.object({
      id: z.string().min(1),
      kind: z.enum(["state-codes", "business-rules"]),
      path: z.string().min(1),
      effectiveFrom: z.string(),
      status: z.enum(["validated", "stale", "draft"]),
      approvedBy: z.string(),
      approvedAt: z.string()
    })
  )
});

const stateCodeFileSchema = z.object({
  id: z.string().min(1),
  kind: z.literal("state-codes"),
  effectiveFrom: z.string(),
  checksum: z.string(),
  codes: z.record(z.string().regex(/^[A-Z]{2}$/))
});

const businessRulesFileSchema = z.object({
  id: z.string().min(1),
  kind: z.literal("business-rules"),
  effectiveFrom: z.string(),
  checksum: z.string(),
  excludedChangeTypes: z.array(z.string().min(1)),
  minAbsoluteRateChange: z.string().regex(/^\d+(\.\d+)?$/)
});

const rawObjectSchema = z.record(z.unknown());

function readJsonFile(absolutePath: string, rulesetId: string): Record<string, unknown> {
  let contents: string;
  try {
    contents = readFileSync(absolutePath, "utf8");
  } catch (error) {
    throw new RulesetError(
      errorCodes.RULESET_NOT_FOUND,
      `Ruleset file ${absolutePath} could not be read: ${error instanceof Error ? error.message : String(error)}`,
      rulesetId
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (error) {
    throw new RulesetError(
      errorCodes.RULESET_INVALID,
      `Ruleset file ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      rulesetId
    );
  }

  const parsed = rawObjectSchema.safeParse(json);
  if (!parsed.success) {
    throw new RulesetError(errorCodes.RULESET_INVALID, `Ruleset file ${absolutePath} is not a JSON object.`, rulesetId);
  }

  return parsed.data;
}

export function computeRulesetChecksum(payload: Record<string, unknown>): string {
  return sha256(JSON.stringify(payload));
}

function verifyRulesetChecksum(raw: Record<string, unknown>, rulesetId: string): void {
  const { checksum, ...payload } = raw;
  if (checksum !== computeRulesetChecksum(payload)) {
    throw new RulesetError(errorCodes.RULESET_CHECKSUM_INVALID, `Ruleset checksum mismatch for ${rulesetId}`, rulesetId);
  }
}

function parseRuleset<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  raw: Record<string, unknown>,
  rulesetId: string
): z.infer<TSchema> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RulesetError(
      errorCodes.RULESET_INVALID,
      `Ruleset ${rulesetId} is invalid: ${parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join("; ")}`,
      rulesetId
    );
  }

  return parsed.data;
}

export function loadRulesetMeta(root = RULESET_ROOT): RulesetMeta {
  return parseRuleset(metaSchema, readJsonFile(path.resolve(root, "meta.json"), "meta"), "meta");
}

function resolveEntry(meta: RulesetMeta, version: string, kind: RulesetKind): RulesetMetaEntry {
  const entry = meta.versions.find((item) => item.id === version && item.kind === kind);

  if (!entry) {
    throw new RulesetError(errorCodes.RULESET_NOT_FOUND, `${kind} ruleset ${version} not found`, version);
  }

  return entry;
}

function loadEntry(root: string, version: string, kind: RulesetKind): Record<string, unknown> {
  const entry = resolveEntry(loadRulesetMeta(root), version, kind);
  const raw = readJsonFile(path.resolve(root, entry.path), version);
  verifyRulesetChecksum(raw, version);
  return raw;
}

export function loadStateCodeTable(version: string, root = RULESET_ROOT): StateCodeTable {
  const file = parseRuleset(stateCodeFileSchema, loadEntry(root, version, "state-codes"), version);
  const codes = new Map(Object.entries(file.codes).map(([name, code]) => [name.trim().toUpperCase(), code]));

  return Object.freeze({
    id: file.id,
    effectiveFrom: file.effectiveFrom,
    codes,
    postalCodes: new Set(codes.values())
  });
}

export function loadBusinessRules(version: string, root = RULESET_ROOT): BusinessRules {
  const file = parseRuleset(businessRulesFileSchema, loadEntry(root, version, "business-rules"), version);

  return Object.freeze({
    id: file.id,
    effectiveFrom: file.effectiveFrom,
    excludedChangeTypes: Object.freeze([...file.excludedChangeTypes]),
    minAbsoluteRateChange: file.minAbsoluteRateChange
  });
}

/**
 * Picks the ruleset ids a run uses: explicit versions first, then the
 * `DEFAULT_*` env overrides, then the ids `meta.json` marks active.
 */
export function resolveActiveVersions(
  versions: Partial<RulesetVersions> = {},
  root = RULESET_ROOT
): RulesetVersions {
  const meta = loadRulesetMeta(root);

  return {
    stateCodes: versions.stateCodes ?? env.DEFAULT_STATE_TABLE ?? meta.active.stateCodes,
    businessRules: versions.businessRules ?? env.DEFAULT_BUSINESS_RULES ?? meta.active.businessRules
  };
}

export function loadActiveRulesets(
  versions: Partial<RulesetVersions> = {},
  root = RULESET_ROOT
): { stateCodes: StateCodeTable; businessRules: BusinessRules } {
  const active = resolveActiveVersions(versions, root);

  return {
    stateCodes: loadStateCodeTable(active.stateCodes, root),
    businessRules: loadBusinessRules(active.businessRules, root)
  };
}
