import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { main, parseCliArgs } from "../cli.js";

describe("parseCliArgs", () => {
  it("parses a check with global options before the command", () => {
    expect(parseCliArgs(["--dir", "proj", "--json", "wg", "check", "--task", "feature", "--write-log"])).toEqual({
      ok: true,
      command: {
        kind: "check",
        dir: "proj",
        json: true,
        taskId: "feature",
        writeLog: true,
        createFollowups: false,
      },
    });
  });

  it("parses a state query", () => {
    expect(parseCliArgs(["wg", "state", "--task", "feature"])).toEqual({
      ok: true,
      command: { kind: "state", dir: undefined, json: false, taskId: "feature" },
    });
  });

  it("rejects a missing task, an unknown command and unknown options", () => {
    expect(parseCliArgs(["wg", "check"])).toEqual({ ok: false, error: "--task is required" });
    expect(parseCliArgs(["wg", "fix", "--task", "x"])).toEqual({ ok: false, error: "unknown wg command: fix" });
    expect(parseCliArgs(["check", "--task", "x"])).toEqual({
      ok: false,
      error: "expected command: wg check | wg state",
    });
    expect(parseCliArgs(["wg", "check", "--task", "x", "--force"])).toEqual({
      ok: false,
      error: "unknown option: --force",
    });
  });
});

describe("main", () => {
  let root: string;
  let out: string[];

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "therapydrift-cli-"));
    mkdirSync(join(root, ".workgraph"));
    const task = {
      kind: "task",
      id: "feature",
      title: "Ship onboarding",
      status: "in-progress",
      description: "Build it.\n\n```therapydrift\nschema = 1\n```\n",
      log: [
        { timestamp: "2026-03-01T09:00:00Z", message: "Speedrift: yellow" },
        { timestamp: "2026-03-01T10:00:00Z", message: "Coredrift: red" },
      ],
    };
    writeFileSync(join(root, ".workgraph", "graph.jsonl"), `${JSON.stringify(task)}\n`);
    out = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      out.push(String(line));
    });
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it("prints the findings and exits 3", async () => {
    const code = await main(["--dir", root, "wg", "check", "--task", "feature"]);

    expect(code).toBe(3);
    expect(out.slice(0, 5)).toEqual([
      "feature: Ship onboarding",
      "score: yellow",
      "findings:",
      "- [warn] repeated_drift_signals: Task has repeated drift signals (2 >= 2)",
      "- [warn] missing_recovery_plan: No therapy recovery task exists for this drifting task",
    ]);
    expect(out[out.length - 1]).toBe("auto-action: allowed (allowed)");
  });

  it("persists state that wg state reads back as JSON", async () => {
    await main(["--dir", root, "wg", "check", "--task", "feature", "--create-followups"]);
    out = [];
    const code = await main(["--dir", root, "--json", "wg", "state", "--task", "feature"]);

    expect(code).toBe(0);
    const printed: unknown = JSON.parse(out.join("\n"));
    expect(printed).toMatchObject({
      taskId: "feature",
      state: { autoActionTotal: 1, driftSignalCount: 2, latestSignalTs: "2026-03-01T10:00:00.000Z" },
    });

    const graph = readFileSync(join(root, ".workgraph", "graph.jsonl"), "utf-8").trim().split("\n");
    expect(graph).toHaveLength(2);
    expect(JSON.parse(graph[1])).toMatchObject({ kind: "task", id: "drift-therapy-feature", status: "open" });
  });

  it("exits 2 on usage errors and 1 for an unknown task", async () => {
    expect(await main(["wg", "check"])).toBe(2);
    expect(await main(["--dir", root, "wg", "check", "--task", "nope"])).toBe(1);
  });
});
