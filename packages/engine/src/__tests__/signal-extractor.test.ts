/**
 * signal-extractor.test.ts - Drift signal counting and new-since-last-check
 */

import { describe, it, expect } from "vitest";
import { extractDriftSignals, isDriftSignal } from "../signal-extractor.js";
import { signal } from "./helpers.js";

const IGNORE = ["Therapydrift:"];

describe("isDriftSignal", () => {
  it("recognizes every drift category prefix", () => {
    for (const prefix of ["Coredrift:", "Speedrift:", "Specdrift:", "Datadrift:", "Depsdrift:", "Uxdrift:", "Therapydrift:"]) {
      expect(isDriftSignal(`${prefix} yellow`)).toBe(true);
    }
  });

  it("is case-sensitive and anchored at the start", () => {
    expect(isDriftSignal("speedrift: yellow")).toBe(false);
    expect(isDriftSignal("note: Speedrift: yellow")).toBe(false);
    expect(isDriftSignal("Started work")).toBe(false);
  });
});

describe("extractDriftSignals", () => {
  it("returns zero counts for a log without signals", () => {
    const result = extractDriftSignals([signal("Started work", "2026-03-01T10:00:00Z")], IGNORE);
    expect(result).toEqual({
      signals: [],
      newSignalCount: 0,
      ignoredSelfSignals: 0,
      latestSignalTs: null,
    });
  });

  it("counts ignored self signals separately", () => {
    const result = extractDriftSignals(
      [
        signal("Therapydrift: yellow (repeated_drift_signals)", "2026-03-01T10:00:00Z"),
        signal("Speedrift: yellow (scope)", "2026-03-01T10:05:00Z"),
      ],
      IGNORE,
    );
    expect(result.ignoredSelfSignals).toBe(1);
    expect(result.signals).toEqual([
      { message: "Speedrift: yellow (scope)", timestamp: "2026-03-01T10:05:00.000Z" },
    ]);
  });

  it("treats every signal as new when there is no previous timestamp", () => {
    const result = extractDriftSignals(
      [
        signal("Coredrift: red", "2026-03-01T09:00:00Z"),
        signal("Specdrift: yellow"),
      ],
      IGNORE,
    );
    expect(result.newSignalCount).toBe(2);
  });

  it("treats every signal as new when the previous timestamp is unparseable", () => {
    const result = extractDriftSignals(
      [signal("Coredrift: red", "2026-03-01T09:00:00Z"), signal("Specdrift: yellow", "garbage")],
      IGNORE,
      "not-a-date",
    );
    expect(result.newSignalCount).toBe(2);
  });

  it("counts only signals strictly after the previous latest timestamp", () => {
    const result = extractDriftSignals(
      [
        signal("Coredrift: red", "2026-03-01T09:00:00Z"),
        signal("Speedrift: yellow", "2026-03-01T10:00:00Z"),
        signal("Uxdrift: yellow", "2026-03-01T11:00:00Z"),
        signal("Datadrift: yellow"),
      ],
      IGNORE,
      "2026-03-01T10:00:00Z",
    );
    expect(result.signals).toHaveLength(4);
    expect(result.newSignalCount).toBe(1);
  });

  it("reports the greatest timestamp regardless of log order", () => {
    const result = extractDriftSignals(
      [
        signal("Coredrift: red", "2026-03-01T11:00:00+01:00"),
        signal("Speedrift: yellow", "2026-03-01T10:30:00Z"),
        signal("Depsdrift: yellow", "2026-03-01T08:00:00Z"),
      ],
      IGNORE,
    );
    expect(result.latestSignalTs).toBe("2026-03-01T10:30:00.000Z");
  });

  it("never counts a signal with an impossible date as new or latest", () => {
    const result = extractDriftSignals(
      [signal("Coredrift: red", "2026-02-30T10:00:00Z"), signal("Speedrift: yellow", "2026-02-27T10:00:00Z")],
      IGNORE,
      "2026-02-28T00:00:00Z",
    );
    expect(result.signals).toEqual([
      { message: "Coredrift: red", timestamp: null },
      { message: "Speedrift: yellow", timestamp: "2026-02-27T10:00:00.000Z" },
    ]);
    expect(result.newSignalCount).toBe(0);
    expect(result.latestSignalTs).toBe("2026-02-27T10:00:00.000Z");
  });

  it("honors custom ignore prefixes", () => {
    const result = extractDriftSignals(
      [signal("Uxdrift: contrast", "2026-03-01T09:00:00Z"), signal("Therapydrift: OK (no findings)")],
      ["Uxdrift:"],
    );
    expect(result.ignoredSelfSignals).toBe(1);
    expect(result.signals.map((s) => s.message)).toEqual(["Therapydrift: OK (no findings)"]);
  });
});
