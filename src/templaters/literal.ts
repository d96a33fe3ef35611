import { TemplaterError } from "../lib/errors.js";
import { tryCatch, unwrapOr } from "../lib/result.js";

import type { Result } from "../lib/result.js";

/**
 * Values a configuration literal can describe
 */
export type LiteralValue =
  | string
  | number
  | boolean
  | null
  | LiteralValue[]
  | { [key: string]: LiteralValue };

const DECIMAL_INT = /^(?:0(?:_?0)*|[1-9](?:_?\d)*)$/;
const HEX_INT = /^0[xX](?:_?[0-9a-fA-F])+$/;
const OCT_INT = /^0[oO](?:_?[0-7])+$/;
const BIN_INT = /^0[bB](?:_?[01])+$/;
const FLOAT =
  /^(?:(?:\d(?:_?\d)*)?\.\d(?:_?\d)*|\d(?:_?\d)*\.?)(?:[eE][+-]?\d(?:_?\d)*)?$/;

const KEYWORDS: Record<string, LiteralValue> = {
  True: true,
  true: true,
  False: false,
  false: false,
  None: null,
};

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  "'": "'",
  '"': '"',
  "\n": "",
};

/**
 * Recursive-descent parser for a single literal; it only ever builds values
 */
class LiteralParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): LiteralValue {
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      this.fail(`unexpected '${this.text.charAt(this.pos)}'`);
    }
    return value;
  }

  private parseValue(): LiteralValue {
    this.skipWhitespace();
    const ch = this.text.charAt(this.pos);

    if (ch === "[") {
      this.pos++;
      return this.parseSequence("]");
    }
    if (ch === "(") {
      return this.parseParenthesized();
    }
    if (ch === "{") {
      return this.parseMapping();
    }
    if (ch === "'" || ch === '"') {
      return this.parseString(ch);
    }
    if (ch === "-" || ch === "+") {
      this.pos++;
      this.skipWhitespace();
      const operand = this.parseNumber();
      return ch === "-" ? -operand : operand;
    }
    if (/[0-9.]/.test(ch)) {
      return this.parseNumber();
    }
    if (/[A-Za-z_]/.test(ch)) {
      const word = this.readWhile(/[A-Za-z0-9_]/);
      if (Object.prototype.hasOwnProperty.call(KEYWORDS, word)) {
        return KEYWORDS[word] ?? null;
      }
      return this.fail(`name '${word}' is not a literal`);
    }
    return this.fail(ch === "" ? "unexpected end of input" : `unexpected '${ch}'`);
  }

  private parseSequence(close: "]" | ")"): LiteralValue[] {
    const items: LiteralValue[] = [];
    for (;;) {
      this.skipWhitespace();
      if (this.text.charAt(this.pos) === close) {
        this.pos++;
        return items;
      }
      items.push(this.parseValue());
      this.skipWhitespace();
      const next = this.text.charAt(this.pos);
      if (next === ",") {
        this.pos++;
      } else if (next !== close) {
        this.fail(`expected ',' or '${close}'`);
      }
    }
  }

  private parseParenthesized(): LiteralValue {
    this.pos++;
    this.skipWhitespace();
    if (this.text.charAt(this.pos) === ")") {
      this.pos++;
      return [];
    }
    const first = this.parseValue();
    this.skipWhitespace();
    if (this.text.charAt(this.pos) === ")") {
      this.pos++;
      return first;
    }
    this.expect(",");
    return [first, ...this.parseSequence(")")];
  }

  private parseMapping(): LiteralValue {
    this.pos++;
    const mapping: { [key: string]: LiteralValue } = {};
    for (;;) {
      this.skipWhitespace();
      if (this.text.charAt(this.pos) === "}") {
        this.pos++;
        return mapping;
      }
      const key = this.parseValue();
      if (typeof key === "object" && key !== null) {
        this.fail("mapping keys must be scalar literals");
      }
      this.skipWhitespace();
      this.expect(":");
      const value = this.parseValue();
      Object.defineProperty(mapping, String(key), {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
      this.skipWhitespace();
      const next = this.text.charAt(this.pos);
      if (next === ",") {
        this.pos++;
      } else if (next !== "}") {
        this.fail("expected ',' or '}'");
      }
    }
  }

  private parseString(quote: string): string {
    this.pos++;
    let out = "";
    while (this.pos < this.text.length) {
      const ch = this.text.charAt(this.pos);
      if (ch === quote) {
        this.pos++;
        return out;
      }
      if (ch === "\n") {
        break;
      }
      if (ch === "\\") {
        out += this.parseEscape();
        continue;
      }
      out += ch;
      this.pos++;
    }
    return this.fail("unterminated string");
  }

  private parseEscape(): string {
    const code = this.text.charAt(this.pos + 1);
    const simple = ESCAPES[code];
    if (simple !== undefined) {
      this.pos += 2;
      return simple;
    }
    const width = code === "x" ? 2 : code === "u" ? 4 : 0;
    const digits = this.text.slice(this.pos + 2, this.pos + 2 + width);
    if (width > 0 && new RegExp(`^[0-9a-fA-F]{${width}}$`).test(digits)) {
      this.pos += 2 + width;
      return String.fromCharCode(parseInt(digits, 16));
    }
    // Unknown escapes keep their backslash
    this.pos++;
    return "\\";
  }

  private parseNumber(): number {
    const start = this.pos;
    while (this.pos < this.text.length) {
      const ch = this.text.charAt(this.pos);
      const prev = this.text.charAt(this.pos - 1);
      const exponentSign = (ch === "+" || ch === "-") && /[eE]/.test(prev) && !/^0[xX]/.test(this.text.slice(start));
      if (!/[0-9A-Za-z_.]/.test(ch) && !exponentSign) {
        break;
      }
      this.pos++;
    }
    const token = this.text.slice(start, this.pos);
    const digits = token.replace(/_/g, "");

    if (HEX_INT.test(token) || OCT_INT.test(token) || BIN_INT.test(token)) {
      return this.safeInteger(Number(digits.toLowerCase()), token);
    }
    if (DECIMAL_INT.test(token)) {
      return this.safeInteger(Number(digits), token);
    }
    if (FLOAT.test(token) && /[.eE]/.test(token)) {
      return Number(digits);
    }
    return this.fail(`invalid number '${token}'`);
  }

  private safeInteger(value: number, token: string): number {
    if (!Number.isSafeInteger(value)) {
      this.fail(`integer '${token}' cannot be represented exactly`);
    }
    return value;
  }

  private expect(ch: string): void {
    if (this.text.charAt(this.pos) !== ch) {
      this.fail(`expected '${ch}'`);
    }
    this.pos++;
  }

  private readWhile(pattern: RegExp): string {
    const start = this.pos;
    while (this.pos < this.text.length && pattern.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  private skipWhitespace(): void {
    this.readWhile(/\s/);
  }

  private fail(reason: string): never {
    throw new TemplaterError(`Not a literal (${reason} at position ${this.pos})`, {
      text: this.text,
    });
  }
}

/**
 * Parse text as a single literal value without evaluating anything
 *
 * @example
 * ```typescript
 * parseLiteral("[1, 2]"); // { success: true, data: [1, 2] }
 * parseLiteral("select"); // { success: false, error: TemplaterError }
 * ```
 */
export function parseLiteral(text: string): Result<LiteralValue, Error> {
  return tryCatch(() => new LiteralParser(text).parse());
}

/**
 * Convert configuration text to a richer type when it reads as a literal,
 * otherwise keep the text
 */
export function inferType(text: string): LiteralValue {
  return unwrapOr(parseLiteral(text), text);
}
