import { describe, expect, it } from "vitest";

import { MissingInputError } from "../src/domain/reconciliation/errors.js";
import { reconcileJurisdictions } from "../src/domain/reconciliation/pipeline.js";
import { captureError, edit, rules, source } from "./helpers.js";

describe("reconciliation pipeline", () => {
  it("reports a jurisdiction missing from COMMAND as an add", () => {
    const result = reconcileJurisdictions(
      {
        apex: [source("Addison", "TX", "A-ADD", "8.25")],
        command: [],
        edits: [edit("Addison", "TX", "8.25", "8.50")]
      },
      rules
    );

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0]).toMatchObject({
      key: "ADDISON_TX",
      presence: "APEX_ONLY",
      updatePlatform: "ADD_TO_COMMAND",
      actionRequired: "Add to COMMAND"
    });
    expect(result.rows[0]?.rateChange.toFixed()).toBe("0.25");
    expect(result.summary).toMatchObject({
      totalApex: 1,
      totalCommand: 0,
      totalEdits: 1,
      afterOuterJoin: 1,
      afterInnerJoin: 1,
      afterFilter: 1,
      dropped: { total: 0 }
    });
    expect(result.diagnostics).toEqual([
      {
        code: "EMPTY_INPUT",
        severity: "warning",
        source: "COMMAND",
        message: "COMMAND supplied no records; every matched jurisdiction will be reported as missing there.",
        dropped: false
      }
    ]);
    expect(result.rulesets).toEqual({ stateCodes: "TEST-STATES", businessRules: "TEST-RULES" });
  });

  describe("with both platforms populated", () => {
    const result = reconcileJurisdictions(
      {
        apex: [source("Austin", "TX", "A-AUS"), source("Dallas", "TX", "A-DAL"), source("Houston", "TX", "A-HOU")],
        command: [
          source("Austin", "TX", "C-AUS"),
          source("Dallas", "TX", "C-DAL"),
          source("Houston", "TX", "C-HOU"),
          source("Plano", "TX", "C-PLA")
        ],
        edits: [
          edit("Austin", "TX", "8.0", "8.0"),
          edit("Dallas", "TX", "8.25", "0", { changeType: "Expired" }),
          edit("Houston", "TX", "8.0", "7.75"),
          edit("Plano", "TX", "8.25", "8.5"),
          edit("Lubbock", "TX", "8", "8.25")
        ]
      },
      rules
    );

    it("drops unchanged rates", () => {
      expect(result.rows.some((row) => row.key === "AUSTIN_TX")).toBe(false);
    });

    it("drops excluded change types", () => {
      expect(result.rows.some((row) => row.key === "DALLAS_TX")).toBe(false);
    });

    it("classifies a rate decrease on both platforms", () => {
      const houston = result.rows.find((row) => row.key === "HOUSTON_TX");

      expect(houston).toMatchObject({ updatePlatform: "BOTH", actionRequired: "Rate decrease" });
      expect(houston?.rateChange.toFixed()).toBe("-0.25");
    });

    it("never reports keys missing from both platforms", () => {
      expect(result.rows.map((row) => [row.key, row.actionRequired])).toEqual([
        ["HOUSTON_TX", "Rate decrease"],
        ["PLANO_TX", "Add to APEX"]
      ]);
    });

    it("records the size of every stage", () => {
      expect(result.summary).toMatchObject({
        totalApex: 3,
        totalCommand: 4,
        totalEdits: 5,
        afterOuterJoin: 4,
        afterInnerJoin: 4,
        afterFilter: 2,
        byPlatform: { ADD_TO_APEX: 1, ADD_TO_COMMAND: 0, BOTH: 1 },
        byState: { TX: 2 }
      });
      expect(result.diagnostics).toEqual([]);
    });
  });

  it("turns invalid records and duplicates into diagnostics", () => {
    const result = reconcileJurisdictions(
      {
        apex: [
          source("Addison", "TX", "A-1", null, 2),
          source("Addison", "TX", "A-2", null, 5),
          source("Nowhere", "ZZ", "A-3", null, 8),
          { ...source("Austin", "TX", "A-4", null, 11), key: "AUSTIN_TEXAS" }
        ],
        command: [source("Addison", "TX", "C-1")],
        edits: [
          edit("Addison", "TX", "8.25", "8.50", { effectiveDate: "2026-01-01", row: 2 }),
          edit("Addison", "TX", "8.50", "8.75", { effectiveDate: "2026-07-01", row: 3 })
        ],
        diagnostics: [
          { code: "MALFORMED_RATE", severity: "warning", source: "EDITS", message: "edits row 9: bad rate", dropped: true }
        ]
      },
      rules
    );

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0]?.taxCodeApex).toBe("A-1");
    expect(result.rows[0]?.newRate.toFixed()).toBe("8.75");
    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.source, diagnostic.origin?.row])).toEqual([
      ["MALFORMED_RATE", "EDITS", undefined],
      ["UNKNOWN_STATE", "APEX", 8],
      ["INVALID_KEY_INPUT", "APEX", 11],
      ["DUPLICATE_KEY", "APEX", 5],
      ["DUPLICATE_EDIT", "EDITS", 2]
    ]);
    expect(result.diagnostics[4]).toMatchObject({ severity: "info", dropped: true, key: "ADDISON_TX" });
    expect(result.summary.dropped).toEqual({
      total: 5,
      byCode: { MALFORMED_RATE: 1, UNKNOWN_STATE: 1, INVALID_KEY_INPUT: 1, DUPLICATE_KEY: 1, DUPLICATE_EDIT: 1 }
    });
  });

  it("drops an edit whose effective date is not zero-padded before picking the latest", () => {
    const result = reconcileJurisdictions(
      {
        apex: [source("Addison", "TX", "A-ADD")],
        command: [source("Addison", "TX", "C-ADD")],
        edits: [
          edit("Addison", "TX", "8", "9", { effectiveDate: "2026-10-01", row: 2 }),
          edit("Addison", "TX", "8", "7", { effectiveDate: "2026-4-1", row: 3 })
        ]
      },
      rules
    );

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0]?.newRate.toFixed()).toBe("9");
    expect(result.rows[0]?.effectiveDate).toBe("2026-10-01");
    expect(result.diagnostics).toEqual([
      {
        code: "MALFORMED_DATE",
        severity: "warning",
        source: "EDITS",
        message: 'Effective date "2026-4-1" is not a YYYY-MM-DD calendar date.',
        dropped: true,
        key: "ADDISON_TX",
        origin: { source: "edits", row: 3 },
        evidence: { raw: "2026-4-1", origin: { source: "edits", row: 3 } }
      }
    ]);
  });

  it("fails when there are no edits", () => {
    const error = captureError(() =>
      reconcileJurisdictions({ apex: [source("Addison", "TX", "A-1")], command: [], edits: [] }, rules)
    );

    expect(error).toBeInstanceOf(MissingInputError);
    expect(error).toMatchObject({
      code: "MISSING_INPUT",
      message: "Input EDITS is unavailable: no rate edits were supplied, nothing can be reconciled."
    });
  });

  it("fails when both platforms are empty", () => {
    const error = captureError(() =>
      reconcileJurisdictions({ apex: [], command: [], edits: [edit("Addison", "TX", "8", "9")] }, rules)
    );

    expect(error).toMatchObject({ code: "MISSING_INPUT", message: "Input APEX/COMMAND is unavailable: both platform collections are empty." });
  });
});
