import { TemplateSyntaxError } from "../lib/errors.js";

export type TokenType =
  | "data"
  | "variable_begin"
  | "variable_end"
  | "block_begin"
  | "block_end"
  | "name"
  | "string"
  | "integer"
  | "float"
  | "operator"
  | "eof";

export interface Token {
  type: TokenType;
  value: string;
  lineno: number;
}

export interface LexerOptions {
  /** Keep a single trailing newline at the end of the source */
  keepTrailingNewline: boolean;
}

const OPERATORS = [
  "//", "**", "==", "!=", "<=", ">=",
  "+", "-", "*", "/", "%", "~", "<", ">", "=",
  "(", ")", "[", "]", "{", "}", ",", ".", ":", "|",
];

const NAME = /[A-Za-z_][A-Za-z0-9_]*/y;
const NUMBER = /\d(?:_?\d)*(?:\.\d(?:_?\d)*)?(?:[eE][+-]?\d(?:_?\d)*)?/y;
const TAG_START = /\{([{%#])(-?)/g;
const RAW_OPEN = /\s*raw\s*(-?)%\}/y;
const RAW_CLOSE = /\{%(-?)\s*endraw\s*(-?)%\}/g;

const STRING_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

function countLines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === "\n") count++;
  }
  return count;
}

/**
 * Splits template source into tokens.
 *
 * Text outside tags becomes `data`; `{{ }}` and `{% %}` contents become
 * expression tokens framed by begin/end tokens; comments produce nothing.
 * A `-` inside a delimiter strips whitespace on that side.
 */
export class Lexer {
  private pos = 0;
  private lineno = 1;
  private stripNext = false;
  private readonly tokens: Token[] = [];
  private readonly source: string;

  constructor(source: string, options: LexerOptions) {
    this.source = !options.keepTrailingNewline && source.endsWith("\n")
      ? source.slice(0, source.endsWith("\r\n") ? -2 : -1)
      : source;
  }

  tokenize(): Token[] {
    while (this.pos < this.source.length) {
      TAG_START.lastIndex = this.pos;
      const match = TAG_START.exec(this.source);
      if (!match) {
        this.pushData(this.source.slice(this.pos), false);
        this.pos = this.source.length;
        break;
      }

      this.pushData(this.source.slice(this.pos, match.index), match[2] === "-");
      this.pos = match.index + match[0].length;

      if (match[1] === "#") {
        this.skipComment();
      } else if (match[1] === "%" && this.tryRawBlock()) {
        continue;
      } else {
        this.lexTag(match[1] === "{" ? "variable" : "block");
      }
    }

    this.tokens.push({ type: "eof", value: "", lineno: this.lineno });
    return this.tokens;
  }

  private pushData(text: string, stripEnd: boolean): void {
    const lineno = this.lineno;
    this.lineno += countLines(text);

    let value = text.replace(/\r\n?/g, "\n");
    if (this.stripNext) {
      value = value.replace(/^\s+/, "");
    }
    this.stripNext = false;
    if (stripEnd) {
      value = value.replace(/\s+$/, "");
    }
    if (value.length > 0) {
      this.tokens.push({ type: "data", value, lineno });
    }
  }

  private skipComment(): void {
    const end = this.source.indexOf("#}", this.pos);
    if (end === -1) {
      throw new TemplateSyntaxError("Missing end of comment tag", this.lineno);
    }
    this.lineno += countLines(this.source.slice(this.pos, end));
    this.stripNext = this.source.charAt(end - 1) === "-";
    this.pos = end + 2;
  }

  private tryRawBlock(): boolean {
    RAW_OPEN.lastIndex = this.pos;
    const open = RAW_OPEN.exec(this.source);
    if (!open) {
      return false;
    }
    const startLine = this.lineno;
    this.lineno += countLines(open[0]);
    this.stripNext = open[1] === "-";

    RAW_CLOSE.lastIndex = this.pos + open[0].length;
    const close = RAW_CLOSE.exec(this.source);
    if (!close) {
      throw new TemplateSyntaxError("Missing end of raw directive", startLine);
    }

    this.pushData(this.source.slice(this.pos + open[0].length, close.index), close[1] === "-");
    this.lineno += countLines(close[0]);
    this.stripNext = close[2] === "-";
    this.pos = close.index + close[0].length;
    return true;
  }

  private lexTag(kind: "variable" | "block"): void {
    const close = kind === "variable" ? "}}" : "%}";
    const openLine = this.lineno;
    this.tokens.push(
      kind === "variable"
        ? { type: "variable_begin", value: "{{", lineno: openLine }
        : { type: "block_begin", value: "{%", lineno: openLine }
    );

    const brackets: string[] = [];
    for (;;) {
      this.skipWhitespace();
      if (this.pos >= this.source.length) {
        throw new TemplateSyntaxError(`Unexpected end of template; missing '${close}'`, openLine);
      }

      if (brackets.length === 0) {
        if (this.source.startsWith(`-${close}`, this.pos)) {
          this.endTag(kind, close, 3, true);
          return;
        }
        if (this.source.startsWith(close, this.pos)) {
          this.endTag(kind, close, 2, false);
          return;
        }
      }

      const ch = this.source.charAt(this.pos);
      if (ch === "'" || ch === '"') {
        this.lexString(ch);
        continue;
      }
      if (/\d/.test(ch)) {
        this.lexPattern(NUMBER, (text) => (/[.eE]/.test(text) ? "float" : "integer"));
        continue;
      }
      if (/[A-Za-z_]/.test(ch)) {
        this.lexPattern(NAME, () => "name");
        continue;
      }

      const operator = OPERATORS.find((op) => this.source.startsWith(op, this.pos));
      if (operator === undefined) {
        throw new TemplateSyntaxError(`Unexpected char '${ch}'`, this.lineno);
      }
      this.trackBracket(brackets, operator);
      this.tokens.push({ type: "operator", value: operator, lineno: this.lineno });
      this.pos += operator.length;
    }
  }

  private endTag(kind: "variable" | "block", close: string, width: number, strip: boolean): void {
    this.tokens.push({
      type: kind === "variable" ? "variable_end" : "block_end",
      value: close,
      lineno: this.lineno,
    });
    this.pos += width;
    this.stripNext = strip;
  }

  private trackBracket(brackets: string[], operator: string): void {
    const pairs: Record<string, string> = { ")": "(", "]": "[", "}": "{" };
    if (operator === "(" || operator === "[" || operator === "{") {
      brackets.push(operator);
      return;
    }
    const opening = pairs[operator];
    if (opening === undefined) {
      return;
    }
    if (brackets.pop() !== opening) {
      throw new TemplateSyntaxError(`Unexpected '${operator}'`, this.lineno);
    }
  }

  private lexString(quote: string): void {
    const lineno = this.lineno;
    let value = "";
    let i = this.pos + 1;
    while (i < this.source.length) {
      const ch = this.source.charAt(i);
      if (ch === quote) {
        this.tokens.push({ type: "string", value, lineno });
        this.lineno += countLines(this.source.slice(this.pos, i));
        this.pos = i + 1;
        return;
      }
      if (ch === "\\" && i + 1 < this.source.length) {
        const next = this.source.charAt(i + 1);
        value += STRING_ESCAPES[next] ?? `\\${next}`;
        i += 2;
        continue;
      }
      value += ch;
      i++;
    }
    throw new TemplateSyntaxError("Unexpected end of string", lineno);
  }

  private lexPattern(pattern: RegExp, typeOf: (text: string) => TokenType): void {
    pattern.lastIndex = this.pos;
    const match = pattern.exec(this.source);
    const text = match ? match[0] : this.source.charAt(this.pos);
    this.tokens.push({ type: typeOf(text), value: text, lineno: this.lineno });
    this.pos += text.length;
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source.charAt(this.pos))) {
      if (this.source.charAt(this.pos) === "\n") this.lineno++;
      this.pos++;
    }
  }
}

/**
 * Tokenize template source
 */
export function tokenize(source: string, options: LexerOptions): Token[] {
  return new Lexer(source, options).tokenize();
}
