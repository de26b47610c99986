import { describe, expect, it } from "vitest";

import { derivePresence, reconcile } from "../src/domain/reconciliation/platform-reconciler.js";
import { source } from "./helpers.js";

describe("platform reconciler", () => {
  it("keeps every key from either platform exactly once", () => {
    const { records, duplicates } = reconcile(
      [source("Addison", "TX", "A-ADD", "0.0825"), source("Austin", "TX", "A-AUS")],
      [source("Austin", "TX", "C-AUS"), source("Dallas", "TX", "C-DAL")]
    );

    expect(duplicates).toEqual([]);
    expect(records.map((record) => [record.key, record.presence, record.taxCodeApex, record.taxCodeCommand])).toEqual([
      ["ADDISON_TX", "APEX_ONLY", "A-ADD", null],
      ["AUSTIN_TX", "BOTH", "A-AUS", "C-AUS"],
      ["DALLAS_TX", "COMMAND_ONLY", null, "C-DAL"]
    ]);
    expect(records[0]?.totalRateApex?.toFixed()).toBe("0.0825");
    expect(records[0]?.totalRateCommand).toBeNull();
  });

  it("keeps the first record when a platform repeats a key", () => {
    const { records, duplicates } = reconcile(
      [source("Addison", "TX", "A-1", null, 2), source("addison ", "TX", "A-9", null, 7)],
      []
    );

    expect(records).toHaveLength(1);
    expect(records[0]?.taxCodeApex).toBe("A-1");
    expect(duplicates).toHaveLength(1);
    expect(duplicates[0]?.platform).toBe("APEX");
    expect(duplicates[0]?.key).toBe("ADDISON_TX");
    expect(duplicates[0]?.kept.taxCode).toBe("A-1");
    expect(duplicates[0]?.dropped).toMatchObject({ taxCode: "A-9", origin: { source: "test", row: 7 } });
    expect(duplicates[0]?.message).toBe(
      'APEX has two records for ADDISON_TX: "ADDISON, TX" (A-1) and "ADDISON , TX" (A-9); the first one is kept.'
    );
  });

  it("orders keys by code unit", () => {
    const { records } = reconcile(
      [source("Elgin", "TX", "A-ELG"), source("El Paso", "TX", "A-ELP")],
      [source("Abilene", "TX", "C-ABI")]
    );

    expect(records.map((record) => record.key)).toEqual(["ABILENE_TX", "EL PASO_TX", "ELGIN_TX"]);
  });

  it("derives presence from the tax codes", () => {
    expect(derivePresence("A", "C")).toBe("BOTH");
    expect(derivePresence("A", null)).toBe("APEX_ONLY");
    expect(derivePresence(null, "C")).toBe("COMMAND_ONLY");
    expect(derivePresence(null, null)).toBeNull();
  });
});
