import { DuplicateKeyError } from "./errors.js";
import type { JurisdictionKey, Platform, Presence, ReconciledRecord, SourceRecord } from "./types.js";

export interface PlatformReconciliation {
  records: ReconciledRecord[];
  // later occurrences of a key within one platform; the first one is kept
  duplicates: DuplicateKeyError[];
}

export function derivePresence(taxCodeApex: string | null, taxCodeCommand: string | null): Presence | null {
  if (taxCodeApex !== null && taxCodeCommand !== null) {
    return "BOTH";
  }

  if (taxCodeApex !== null) {
    return "APEX_ONLY";
  }

  return taxCodeCommand !== null ? "COMMAND_ONLY" : null;
}

function indexByKey(
  platform: Platform,
  records: readonly SourceRecord[],
  duplicates: DuplicateKeyError[]
): Map<JurisdictionKey, SourceRecord> {
  const index = new Map<JurisdictionKey, SourceRecord>();

  for (const record of records) {
    const existing = index.get(record.key);
    if (existing) {
      duplicates.push(
        new DuplicateKeyError(
          platform,
          record.key,
          { city: existing.city, state: existing.state, taxCode: existing.taxCode, origin: existing.origin },
          { city: record.city, state: record.state, taxCode: record.taxCode, origin: record.origin }
        )
      );
      continue;
    }

    index.set(record.key, record);
  }

  return index;
}

function compareKeys(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
}

/**
 * Full outer join of the two platforms on the jurisdiction key.
 *
 * Output is sorted by key so repeated runs over the same input produce the
 * same report.
 */
export function reconcile(apex: readonly SourceRecord[], command: readonly SourceRecord[]): PlatformReconciliation {
  const duplicates: DuplicateKeyError[] = [];
  const apexIndex = indexByKey("APEX", apex, duplicates);
  const commandIndex = indexByKey("COMMAND", command, duplicates);

  const keys = [...new Set([...apexIndex.keys(), ...commandIndex.keys()])].sort(compareKeys);
  const records: ReconciledRecord[] = [];

  for (const key of keys) {
    const apexRecord = apexIndex.get(key);
    const commandRecord = commandIndex.get(key);
    const taxCodeApex = apexRecord?.taxCode ?? null;
    const taxCodeCommand = commandRecord?.taxCode ?? null;
    const presence = derivePresence(taxCodeApex, taxCodeCommand);
    const base = apexRecord ?? commandRecord;

    if (!presence || !base) {
      continue;
    }

    records.push({
      key,
      city: base.city,
      state: base.state,
      taxCodeApex,
      taxCodeCommand,
      totalRateApex: apexRecord?.totalRate ?? null,
      totalRateCommand: commandRecord?.totalRate ?? null,
      presence
    });
  }

  return { records, duplicates };
}
