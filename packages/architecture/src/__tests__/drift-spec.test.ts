import { describe, it, expect } from "vitest";
import { DEFAULT_DRIFT_SPEC, specFromRaw } from "../drift-spec.js";
import { SpecParseError } from "../errors.js";
import { parseSpecBlock } from "../spec-block.js";

describe("specFromRaw", () => {
  it("fills every default from an empty block", () => {
    expect(specFromRaw({})).toEqual({
      schema: 1,
      minSignalCount: 2,
      followupPrefixes: ["drift-", "speedrift-pit-"],
      requireRecoveryPlan: true,
      ignoreSignalPrefixes: ["Therapydrift:"],
      cooldownSeconds: 1800,
      maxAutoActionsPerHour: 2,
      minNewSignals: 1,
      circuitBreakerAfter: 6,
    });
    expect(specFromRaw({})).toEqual(DEFAULT_DRIFT_SPEC);
  });

  it("reads a parsed block", () => {
    const spec = specFromRaw(
      parseSpecBlock(
        [
          "schema = 1",
          "min_signal_count = 4",
          'followup_prefixes = ["pit-"]',
          "require_recovery_plan = false",
          "cooldown_seconds = 60",
          "max_auto_actions_per_hour = 1",
          "min_new_signals = 2",
          "circuit_breaker_after = 3",
          'owner = "ops"',
        ].join("\n"),
      ),
    );
    expect(spec).toMatchObject({
      minSignalCount: 4,
      followupPrefixes: ["pit-"],
      requireRecoveryPlan: false,
      cooldownSeconds: 60,
      maxAutoActionsPerHour: 1,
      minNewSignals: 2,
      circuitBreakerAfter: 3,
    });
  });

  it("clamps out-of-range numbers", () => {
    const spec = specFromRaw({
      min_signal_count: 0,
      circuit_breaker_after: -2,
      cooldown_seconds: -10,
      max_auto_actions_per_hour: -1,
      min_new_signals: -5,
    });
    expect(spec.minSignalCount).toBe(1);
    expect(spec.circuitBreakerAfter).toBe(1);
    expect(spec.cooldownSeconds).toBe(0);
    expect(spec.maxAutoActionsPerHour).toBe(0);
    expect(spec.minNewSignals).toBe(0);
  });

  it("accepts numeric strings and truncates floats", () => {
    const spec = specFromRaw({ min_signal_count: "3", cooldown_seconds: 90.9 });
    expect(spec.minSignalCount).toBe(3);
    expect(spec.cooldownSeconds).toBe(90);
  });

  it("falls back to default prefixes for empty lists", () => {
    const spec = specFromRaw({ followup_prefixes: [], ignore_signal_prefixes: [] });
    expect(spec.followupPrefixes).toEqual(["drift-", "speedrift-pit-"]);
    expect(spec.ignoreSignalPrefixes).toEqual(["Therapydrift:"]);
  });

  it("rejects values of the wrong type", () => {
    expect(() => specFromRaw({ require_recovery_plan: "yes" })).toThrow(SpecParseError);
    expect(() => specFromRaw({ cooldown_seconds: "soon" })).toThrow(SpecParseError);
    expect(() => specFromRaw({ followup_prefixes: "drift-" })).toThrow(SpecParseError);
  });

  it("names the offending key", () => {
    expect(() => specFromRaw({ require_recovery_plan: 1 })).toThrow(/^require_recovery_plan: /);
  });
});
