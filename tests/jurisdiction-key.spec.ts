import { describe, expect, it } from "vitest";

import { normalizeKey, parseCityState, renormalizeKey, splitKey } from "../src/domain/jurisdiction/key.js";
import { resolveStateCode } from "../src/domain/jurisdiction/state-codes.js";
import { InvalidKeyInputError, UnknownStateError } from "../src/domain/reconciliation/errors.js";
import { captureError, stateCodes } from "./helpers.js";

describe("jurisdiction keys", () => {
  it("trims and uppercases city and state", () => {
    expect(normalizeKey("  addison ", "tx")).toBe("ADDISON_TX");
  });

  it("collapses runs of whitespace inside the city", () => {
    expect(normalizeKey("san \t  antonio", " TX ")).toBe("SAN ANTONIO_TX");
  });

  it("is idempotent", () => {
    const key = normalizeKey("  fort   worth", "tx");
    expect(renormalizeKey(key)).toBe(key);
    expect(renormalizeKey(renormalizeKey(key))).toBe("FORT WORTH_TX");
  });

  it("rejects empty city or state", () => {
    expect(captureError(() => normalizeKey("   ", "TX"))).toBeInstanceOf(InvalidKeyInputError);
    expect(captureError(() => normalizeKey("Austin", ""))).toBeInstanceOf(InvalidKeyInputError);
  });

  it("splits on the last separator", () => {
    expect(splitKey("WINSTON_SALEM_NC")).toEqual({ city: "WINSTON_SALEM", state: "NC" });
    expect(splitKey("NOSEPARATOR")).toBeNull();
    expect(splitKey("_TX")).toBeNull();
    expect(splitKey("AUSTIN_")).toBeNull();
  });

  it("parses platform locations written as CITY, ST", () => {
    expect(parseCityState("Addison, tx")).toEqual({ city: "ADDISON", state: "TX" });
    expect(parseCityState("Fort   Worth,TX")).toEqual({ city: "FORT WORTH", state: "TX" });
    expect(parseCityState("Addison TX")).toBeNull();
    expect(parseCityState("Addison, Texas")).toBeNull();
    expect(parseCityState("")).toBeNull();
    expect(parseCityState(null)).toBeNull();
  });
});

describe("state code resolution", () => {
  it("maps full state names case-insensitively", () => {
    expect(resolveStateCode("texas", stateCodes)).toBe("TX");
    expect(resolveStateCode(" New   York ", stateCodes)).toBe("NY");
  });

  it("accepts values that are already postal codes", () => {
    expect(resolveStateCode("az", stateCodes)).toBe("AZ");
  });

  it("throws for names outside the table", () => {
    const error = captureError(() => resolveStateCode("Atlantis", stateCodes));
    expect(error).toBeInstanceOf(UnknownStateError);
    expect(error).toMatchObject({
      code: "UNKNOWN_STATE",
      message: 'State "Atlantis" is not in state code table TEST-STATES.'
    });
  });
});
