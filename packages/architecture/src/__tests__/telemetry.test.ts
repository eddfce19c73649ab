import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { coerceTelemetryEvent, emitTelemetry, JsonlTelemetrySink, telemetryPath } from "../telemetry.js";

describe("telemetry", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "therapydrift-telemetry-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function readEvents(stateDir: string) {
    return readFileSync(telemetryPath(stateDir), "utf-8")
      .trim()
      .split("\n")
      .map((line) => coerceTelemetryEvent(JSON.parse(line)));
  }

  it("appends one JSON line per event", () => {
    const stateDir = join(dir, ".therapydrift");
    emitTelemetry(
      stateDir,
      { type: "spec_invalid", taskId: "feature", data: { error: "line 1: missing value" } },
      new Date("2026-03-01T12:00:00.000Z"),
    );
    new JsonlTelemetrySink(stateDir).emit({
      type: "followup_created",
      taskId: "feature",
      data: { followupId: "drift-therapy-feature", created: true },
    });

    const events = readEvents(stateDir);
    expect(events).toHaveLength(2);
    expect(events[0]).toEqual({
      type: "spec_invalid",
      taskId: "feature",
      data: { error: "line 1: missing value" },
      timestamp: "2026-03-01T12:00:00.000Z",
    });
    expect(events[1]?.type).toBe("followup_created");
  });

  it("never throws when the state directory cannot be created", () => {
    emitTelemetry(dir, { type: "spec_invalid", taskId: "a", data: { error: "x" } });
    expect(() =>
      emitTelemetry(join(telemetryPath(dir), "nested"), { type: "spec_invalid", taskId: "a", data: { error: "x" } }),
    ).not.toThrow();
  });

  it("rejects records that are not telemetry events", () => {
    expect(coerceTelemetryEvent({ type: "unknown", taskId: "a", timestamp: "t", data: {} })).toBeNull();
    expect(coerceTelemetryEvent("nope")).toBeNull();
  });
});
