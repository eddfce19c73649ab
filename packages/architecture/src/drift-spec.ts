/**
 * drift-spec.ts - Defaults, validation and clamping for the therapydrift spec
 *
 * Raw values come from the task's spec block. Absent keys take defaults;
 * out-of-range numbers are clamped (negative durations and budgets to 0,
 * thresholds below 1 to 1). A value of the wrong type is a SpecParseError.
 */

import { z } from "zod";
import type { TherapyDriftSpec } from "./domain.js";
import { SpecParseError } from "./errors.js";

export const DEFAULT_FOLLOWUP_PREFIXES = ["drift-", "speedrift-pit-"] as const;
export const DEFAULT_IGNORE_SIGNAL_PREFIXES = ["Therapydrift:"] as const;

export const DEFAULT_DRIFT_SPEC: TherapyDriftSpec = {
  schema: 1,
  minSignalCount: 2,
  followupPrefixes: [...DEFAULT_FOLLOWUP_PREFIXES],
  requireRecoveryPlan: true,
  ignoreSignalPrefixes: [...DEFAULT_IGNORE_SIGNAL_PREFIXES],
  cooldownSeconds: 1800,
  maxAutoActionsPerHour: 2,
  minNewSignals: 1,
  circuitBreakerAfter: 6,
};

// Integers may be written as "3" by hand-edited blocks; floats truncate.
const integer = z
  .union([z.number(), z.string().trim().regex(/^[+-]?\d+(\.\d+)?$/, "expected an integer")])
  .transform((value) => Math.trunc(Number(value)))
  .pipe(z.number().int().finite());

function atLeast(min: number) {
  return (value: number) => (value < min ? min : value);
}

function prefixList(fallback: readonly string[]) {
  return z
    .array(z.union([z.string(), z.number(), z.boolean()]).transform(String))
    .optional()
    .transform((items) => (items && items.length > 0 ? items : [...fallback]));
}

export const rawDriftSpecSchema = z
  .object({
    schema: integer.default(DEFAULT_DRIFT_SPEC.schema),
    min_signal_count: integer.default(DEFAULT_DRIFT_SPEC.minSignalCount).transform(atLeast(1)),
    followup_prefixes: prefixList(DEFAULT_FOLLOWUP_PREFIXES),
    require_recovery_plan: z.boolean().default(DEFAULT_DRIFT_SPEC.requireRecoveryPlan),
    ignore_signal_prefixes: prefixList(DEFAULT_IGNORE_SIGNAL_PREFIXES),
    cooldown_seconds: integer.default(DEFAULT_DRIFT_SPEC.cooldownSeconds).transform(atLeast(0)),
    max_auto_actions_per_hour: integer
      .default(DEFAULT_DRIFT_SPEC.maxAutoActionsPerHour)
      .transform(atLeast(0)),
    min_new_signals: integer.default(DEFAULT_DRIFT_SPEC.minNewSignals).transform(atLeast(0)),
    circuit_breaker_after: integer
      .default(DEFAULT_DRIFT_SPEC.circuitBreakerAfter)
      .transform(atLeast(1)),
  })
  .passthrough();

export type RawDriftSpec = z.input<typeof rawDriftSpecSchema>;

/**
 * Build a spec from a raw key/value mapping (the parsed block).
 * Unknown keys are ignored so newer blocks still load.
 */
export function specFromRaw(raw: unknown): TherapyDriftSpec {
  const result = rawDriftSpecSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new SpecParseError(`${where}${issue?.message ?? "invalid therapydrift spec"}`);
  }

  const data = result.data;
  return {
    schema: data.schema,
    minSignalCount: data.min_signal_count,
    followupPrefixes: data.followup_prefixes,
    requireRecoveryPlan: data.require_recovery_plan,
    ignoreSignalPrefixes: data.ignore_signal_prefixes,
    cooldownSeconds: data.cooldown_seconds,
    maxAutoActionsPerHour: data.max_auto_actions_per_hour,
    minNewSignals: data.min_new_signals,
    circuitBreakerAfter: data.circuit_breaker_after,
  };
}
