import { describe, expect, it } from "vitest";

import { classify } from "../src/domain/reconciliation/action-classifier.js";
import { candidate } from "./helpers.js";

describe("action classifier", () => {
  it("reports a jurisdiction missing from COMMAND as an add, whatever the rate did", () => {
    expect(classify(candidate("APEX_ONLY", "-0.0025"))).toMatchObject({
      updatePlatform: "ADD_TO_COMMAND",
      actionRequired: "Add to COMMAND"
    });
  });

  it("reports a jurisdiction missing from APEX as an add", () => {
    expect(classify(candidate("COMMAND_ONLY", "0.0025"))).toMatchObject({
      updatePlatform: "ADD_TO_APEX",
      actionRequired: "Add to APEX"
    });
  });

  it("uses the rate direction when both platforms have the jurisdiction", () => {
    expect(classify(candidate("BOTH", "0.0025")).actionRequired).toBe("Rate increase");
    expect(classify(candidate("BOTH", "-0.0025")).actionRequired).toBe("Rate decrease");
    expect(classify(candidate("BOTH", "0"))).toMatchObject({ updatePlatform: "BOTH", actionRequired: "No change" });
  });

  it("carries the candidate fields through", () => {
    const record = classify(candidate("BOTH", "0.01"));

    expect(record.key).toBe("ADDISON_TX");
    expect(record.newRate.toFixed()).toBe("0.09");
    expect(record.effectiveDate).toBe("2026-04-01");
  });
});
