/**
 * spec-block.test.ts - Fence extraction and the TOML subset parser
 */

import { describe, it, expect } from "vitest";
import { SpecParseError } from "../errors.js";
import { extractSpecBlock, formatSpecFence, parseSpecBlock } from "../spec-block.js";

describe("extractSpecBlock", () => {
  it("returns the trimmed body of the first therapydrift fence", () => {
    const description = [
      "Intro",
      "```toml",
      "ignored = true",
      "```",
      "```therapydrift",
      "",
      "schema = 1",
      "",
      "```",
      "```therapydrift",
      "schema = 2",
      "```",
    ].join("\n");
    expect(extractSpecBlock(description)).toBe("schema = 1");
  });

  it("returns null without a fence", () => {
    expect(extractSpecBlock("no block here")).toBeNull();
    expect(extractSpecBlock(undefined)).toBeNull();
  });

  it("round-trips through formatSpecFence", () => {
    expect(extractSpecBlock(`x\n${formatSpecFence("schema = 1")}\n`)).toBe("schema = 1");
  });
});

describe("parseSpecBlock", () => {
  it("reads scalars, arrays and comments", () => {
    const text = [
      "# therapy settings",
      "schema = 1",
      "min_signal_count = 3 # inline",
      "require_recovery_plan = false",
      'followup_prefixes = ["drift-", \'pit-#1\']',
      "ignore_signal_prefixes = [",
      '  "Therapydrift:",',
      '  "Uxdrift:", # trailing comma next',
      "]",
      "cooldown_seconds = 1_800",
      "ratio = 0.5",
    ].join("\n");

    expect(parseSpecBlock(text)).toEqual({
      schema: 1,
      min_signal_count: 3,
      require_recovery_plan: false,
      followup_prefixes: ["drift-", "pit-#1"],
      ignore_signal_prefixes: ["Therapydrift:", "Uxdrift:"],
      cooldown_seconds: 1800,
      ratio: 0.5,
    });
  });

  it("decodes escapes in basic strings only", () => {
    expect(parseSpecBlock('a = "x\\ty\\"z"\nb = \'c:\\\\path\'')).toEqual({ a: 'x\ty"z', b: "c:\\\\path" });
  });

  it("nests [table] sections", () => {
    expect(parseSpecBlock("schema = 1\n[limits]\nhourly = 2\n[limits.extra]\nx = true")).toEqual({
      schema: 1,
      limits: { hourly: 2, extra: { x: true } },
    });
  });

  it("reports the offending line", () => {
    const cases: [string, string][] = [
      ["schema = 1\njust words", 'line 2: expected "key = value", got "just words"'],
      ["a = 1\na = 2", 'line 2: duplicate key "a"'],
      ['a = "open', "line 1: unterminated string"],
      ["a = [1 2]", "line 1: expected , or ] in array"],
      ["a = 1 2", 'line 1: unexpected trailing content "2"'],
      ["a =", "line 1: missing value"],
      ["a = 1__0", 'line 1: invalid number "1__0"'],
      ["a = 1\n[a]", 'line 2: "a" is not a table'],
    ];
    for (const [text, message] of cases) {
      let caught: unknown;
      try {
        parseSpecBlock(text);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(SpecParseError);
      expect(caught).toHaveProperty("message", message);
    }
  });
});
