/**
 * spec-block.ts - Locate and parse the ```therapydrift block in a task description
 *
 * The block is a small TOML document. Only the subset the drift spec needs is
 * supported: `key = value` pairs, `[table]` headers, comments, basic and
 * literal strings, integers, floats, booleans, and (multi-line) arrays.
 * Anything else is a SpecParseError carrying the offending line.
 */

import { SpecParseError } from "./errors.js";

export const SPEC_FENCE_INFO = "therapydrift";

const FENCE_RE = /```therapydrift[^\S\n]*\n([\s\S]*?)\n```/;

export type TomlValue = string | number | boolean | TomlValue[] | TomlTable;
export interface TomlTable {
  [key: string]: TomlValue;
}

/** Body of the first therapydrift fence (trimmed), or null when there is none. */
export function extractSpecBlock(description: string | null | undefined): string | null {
  const match = (description ?? "").match(FENCE_RE);
  if (!match) return null;
  return match[1].trim();
}

/** Re-wrap a block body in its fence, for embedding into follow-up tasks. */
export function formatSpecFence(body: string): string {
  return `\`\`\`${SPEC_FENCE_INFO}\n${body}\n\`\`\``;
}

// ─── Line handling ───────────────────────────────────────────────────────────

function stripComment(line: string): string {
  let quote: '"' | "'" | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (quote === '"' && ch === "\\") {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "#") return line.slice(0, i);
  }
  return line;
}

function bracketDepth(text: string): number {
  let depth = 0;
  let quote: '"' | "'" | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (quote === '"' && ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "[") depth++;
    else if (ch === "]") depth--;
  }
  return depth;
}

// ─── Value reader ────────────────────────────────────────────────────────────

const NUMBER_RE = /^[+-]?(?:\d[\d_]*)(?:\.\d[\d_]*)?(?:[eE][+-]?\d+)?/;

class ValueReader {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly line: number,
  ) {}

  readDocumentValue(): TomlValue {
    const value = this.readValue();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      throw this.error(`unexpected trailing content "${this.text.slice(this.pos)}"`);
    }
    return value;
  }

  private error(message: string): SpecParseError {
    return new SpecParseError(message, this.line);
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
  }

  private readValue(): TomlValue {
    this.skipWhitespace();
    const ch = this.text[this.pos];
    if (ch === undefined) throw this.error("missing value");
    if (ch === '"') return this.readBasicString();
    if (ch === "'") return this.readLiteralString();
    if (ch === "[") return this.readArray();
    if (this.text.startsWith("true", this.pos)) {
      this.pos += 4;
      return true;
    }
    if (this.text.startsWith("false", this.pos)) {
      this.pos += 5;
      return false;
    }
    return this.readNumber();
  }

  private readBasicString(): string {
    this.pos++;
    let out = "";
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos++];
      if (ch === '"') return out;
      if (ch === "\n") break;
      if (ch !== "\\") {
        out += ch;
        continue;
      }
      const esc = this.text[this.pos++];
      switch (esc) {
        case "n":
          out += "\n";
          break;
        case "t":
          out += "\t";
          break;
        case "r":
          out += "\r";
          break;
        case '"':
          out += '"';
          break;
        case "\\":
          out += "\\";
          break;
        default:
          throw this.error(`unsupported escape "\\${esc ?? ""}"`);
      }
    }
    throw this.error("unterminated string");
  }

  private readLiteralString(): string {
    const end = this.text.indexOf("'", this.pos + 1);
    if (end === -1 || this.text.slice(this.pos + 1, end).includes("\n")) {
      throw this.error("unterminated string");
    }
    const value = this.text.slice(this.pos + 1, end);
    this.pos = end + 1;
    return value;
  }

  private readArray(): TomlValue[] {
    this.pos++;
    const items: TomlValue[] = [];
    for (;;) {
      this.skipWhitespace();
      if (this.text[this.pos] === "]") {
        this.pos++;
        return items;
      }
      items.push(this.readValue());
      this.skipWhitespace();
      const sep = this.text[this.pos];
      if (sep === ",") {
        this.pos++;
      } else if (sep === "]") {
        this.pos++;
        return items;
      } else {
        throw this.error("expected , or ] in array");
      }
    }
  }

  private readNumber(): number {
    const match = this.text.slice(this.pos).match(NUMBER_RE);
    if (!match) throw this.error(`invalid value "${this.text.slice(this.pos)}"`);
    const token = match[0];
    if (/__|_$|^[+-]?_/.test(token)) throw this.error(`invalid number "${token}"`);
    this.pos += token.length;
    return Number(token.replace(/_/g, ""));
  }
}

// ─── Document parser ─────────────────────────────────────────────────────────

const KEY_RE = /^([A-Za-z0-9_-]+)\s*=\s*(.*)$/;
const TABLE_RE = /^\[\s*([A-Za-z0-9_-]+(?:\s*\.\s*[A-Za-z0-9_-]+)*)\s*\]$/;

function tableAt(root: TomlTable, path: string[], line: number): TomlTable {
  let current = root;
  for (const segment of path) {
    const existing = current[segment];
    if (existing === undefined) {
      const next: TomlTable = {};
      current[segment] = next;
      current = next;
    } else if (typeof existing === "object" && !Array.isArray(existing)) {
      current = existing;
    } else {
      throw new SpecParseError(`"${segment}" is not a table`, line);
    }
  }
  return current;
}

/**
 * Parse a therapydrift block body into a plain table.
 * Throws SpecParseError on the first line that is not valid.
 */
export function parseSpecBlock(text: string): TomlTable {
  const root: TomlTable = {};
  let current = root;
  const lines = text.split("\n");

  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const line = stripComment(lines[index].replace(/\r$/, "")).trim();
    if (!line) continue;

    const table = line.match(TABLE_RE);
    if (table) {
      const path = table[1].split(".").map((part) => part.trim());
      current = tableAt(root, path, lineNumber);
      continue;
    }

    const pair = line.match(KEY_RE);
    if (!pair) {
      throw new SpecParseError(`expected "key = value", got "${line}"`, lineNumber);
    }

    const key = pair[1];
    let valueText = pair[2];
    while (bracketDepth(valueText) > 0 && index + 1 < lines.length) {
      index++;
      valueText += `\n${stripComment(lines[index].replace(/\r$/, ""))}`;
    }

    if (Object.prototype.hasOwnProperty.call(current, key)) {
      throw new SpecParseError(`duplicate key "${key}"`, lineNumber);
    }
    current[key] = new ValueReader(valueText, lineNumber).readDocumentValue();
  }

  return root;
}
