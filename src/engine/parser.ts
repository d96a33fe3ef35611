import { TemplateSyntaxError } from "../lib/errors.js";

import type { Token, TokenType } from "./lexer.js";
import type {
  AssignTarget,
  BinaryOp,
  CompareOp,
  DictEntry,
  Expr,
  IfBranch,
  Keyword,
  MacroNode,
  NameExpr,
  Slice,
  Stmt,
  TemplateRoot,
} from "./nodes.js";

export interface ParserOptions {
  /** Statement extensions, e.g. `do` */
  extensions: ReadonlySet<string>;
  /** Filter names known to the environment */
  filters: ReadonlySet<string>;
  /** Test names known to the environment */
  tests: ReadonlySet<string>;
}

const COMPARE_OPERATORS: readonly string[] = ["==", "!=", "<", ">", "<=", ">="];
const MULTIPLICATIVE: readonly string[] = ["*", "/", "//", "%"];

function isCompareOp(value: string): value is Exclude<CompareOp, "in" | "not in"> {
  return COMPARE_OPERATORS.includes(value);
}

function isMultiplicativeOp(value: string): value is Extract<BinaryOp, "*" | "/" | "//" | "%"> {
  return MULTIPLICATIVE.includes(value);
}

/** Words that end a bare test argument rather than start one */
const TEST_ARG_STOPWORDS = new Set(["else", "or", "and", "not", "if", "in", "is"]);

function describeToken(token: Token): string {
  return token.type === "eof" ? "end of template" : `'${token.value}'`;
}

/**
 * Recursive-descent parser producing a {@link TemplateRoot}
 */
export class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly options: ParserOptions
  ) {}

  parse(): TemplateRoot {
    const body = this.subparse(null);
    return { type: "template", body, lineno: 1 };
  }

  // -------------------------------------------------------------------------
  // Token stream
  // -------------------------------------------------------------------------

  private get current(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1] ?? { type: "eof", value: "", lineno: 1 };
  }

  private look(): Token {
    return this.tokens[this.index + 1] ?? this.current;
  }

  private next(): Token {
    const token = this.current;
    if (token.type !== "eof") {
      this.index++;
    }
    return token;
  }

  private test(type: TokenType, value?: string): boolean {
    const token = this.current;
    return token.type === type && (value === undefined || token.value === value);
  }

  private skipIf(type: TokenType, value?: string): boolean {
    if (this.test(type, value)) {
      this.next();
      return true;
    }
    return false;
  }

  private expect(type: TokenType, value?: string): Token {
    if (!this.test(type, value)) {
      const wanted = value !== undefined ? `'${value}'` : type.replace("_", " ");
      this.fail(`expected ${wanted}, got ${describeToken(this.current)}`);
    }
    return this.next();
  }

  private fail(message: string, lineno = this.current.lineno): never {
    throw new TemplateSyntaxError(message, lineno);
  }

  // -------------------------------------------------------------------------
  // Statements
  // -------------------------------------------------------------------------

  private subparse(endTokens: readonly string[] | null): Stmt[] {
    const body: Stmt[] = [];
    for (;;) {
      const token = this.current;
      if (token.type === "eof") {
        return body;
      }
      if (token.type === "data") {
        this.next();
        body.push({ type: "text", value: token.value, lineno: token.lineno });
      } else if (token.type === "variable_begin") {
        this.next();
        const expr = this.parseTuple();
        this.expect("variable_end");
        body.push({ type: "output", expr, lineno: token.lineno });
      } else if (token.type === "block_begin") {
        this.next();
        if (endTokens && this.current.type === "name" && endTokens.includes(this.current.value)) {
          return body;
        }
        body.push(this.parseStatement());
        this.expect("block_end");
      } else {
        this.fail(`unexpected ${describeToken(token)}`);
      }
    }
  }

  private parseStatements(endTokens: readonly string[], dropNeedle = false): Stmt[] {
    this.expect("block_end");
    const body = this.subparse(endTokens);
    if (this.current.type === "eof") {
      this.fail(
        `Unexpected end of template; expected one of ${endTokens.map((t) => `'${t}'`).join(", ")}`
      );
    }
    if (dropNeedle) {
      this.next();
    }
    return body;
  }

  private parseStatement(): Stmt {
    const token = this.current;
    if (token.type !== "name") {
      this.fail("tag name expected");
    }
    switch (token.value) {
      case "if":
        return this.parseIf();
      case "for":
        return this.parseFor();
      case "set":
        return this.parseSet();
      case "macro":
        return this.parseMacro();
      case "do":
        if (this.options.extensions.has("do")) {
          return this.parseDo();
        }
        break;
    }
    return this.fail(`Encountered unknown tag '${token.value}'`);
  }

  private parseIf(): Stmt {
    const lineno = this.next().lineno;
    const branches: IfBranch[] = [];
    let otherwise: Stmt[] = [];
    for (;;) {
      const test = this.parseTuple(false);
      const body = this.parseStatements(["elif", "else", "endif"]);
      branches.push({ test, body });
      const token = this.next();
      if (token.value === "elif") {
        continue;
      }
      if (token.value === "else") {
        otherwise = this.parseStatements(["endif"], true);
      }
      break;
    }
    return { type: "if", branches, otherwise, lineno };
  }

  private parseFor(): Stmt {
    const lineno = this.next().lineno;
    const target = this.parseAssignTarget(["in"]);
    this.expect("name", "in");
    const iter = this.parseTuple(false, ["if"]);
    const filter = this.skipIf("name", "if") ? this.parseExpression() : null;
    const body = this.parseStatements(["endfor", "else"]);
    const otherwise = this.next().value === "else" ? this.parseStatements(["endfor"], true) : [];
    return { type: "for", target, iter, filter, body, otherwise, lineno };
  }

  private parseSet(): Stmt {
    const lineno = this.next().lineno;
    const target = this.parseAssignTarget([]);
    if (this.skipIf("operator", "=")) {
      return { type: "set", target, value: this.parseTuple(), lineno };
    }
    const body = this.parseStatements(["endset"], true);
    return { type: "set-block", target, body, lineno };
  }

  private parseMacro(): MacroNode {
    const lineno = this.next().lineno;
    const nameToken = this.expect("name");
    const params: NameExpr[] = [];
    const defaults: Expr[] = [];

    this.expect("operator", "(");
    while (!this.test("operator", ")")) {
      if (params.length > 0) {
        this.expect("operator", ",");
      }
      const param = this.expect("name");
      params.push({ type: "name", name: param.value, ctx: "param", lineno: param.lineno });
      if (this.skipIf("operator", "=")) {
        defaults.push(this.parseExpression());
      } else if (defaults.length > 0) {
        this.fail("non-default argument follows default argument");
      }
    }
    this.expect("operator", ")");

    const body = this.parseStatements(["endmacro"], true);
    return { type: "macro", name: nameToken.value, params, defaults, body, lineno };
  }

  private parseDo(): Stmt {
    const lineno = this.next().lineno;
    return { type: "do", expr: this.parseTuple(), lineno };
  }

  private parseAssignTarget(extraEndWords: readonly string[]): AssignTarget {
    const target = this.parseTuple(true, extraEndWords, false, true);
    return this.toStoreTarget(target);
  }

  private toStoreTarget(expr: Expr): AssignTarget {
    if (expr.type === "name") {
      return { ...expr, ctx: "store" };
    }
    if (expr.type === "tuple") {
      return {
        ...expr,
        items: expr.items.map((item) => {
          if (item.type !== "name") {
            return this.fail(`can't assign to '${item.type}'`, item.lineno);
          }
          return { ...item, ctx: "store" as const };
        }),
      };
    }
    return this.fail(`can't assign to '${expr.type}'`, expr.lineno);
  }

  // -------------------------------------------------------------------------
  // Expressions
  // -------------------------------------------------------------------------

  private parseTuple(
    withCondexpr = true,
    extraEndWords: readonly string[] = [],
    explicitParentheses = false,
    simplified = false
  ): Expr {
    const lineno = this.current.lineno;
    const items: Expr[] = [];
    let isTuple = false;

    for (;;) {
      if (items.length > 0) {
        this.expect("operator", ",");
      }
      if (this.isTupleEnd(extraEndWords)) {
        break;
      }
      items.push(simplified ? this.parsePrimary() : this.parseExpression(withCondexpr));
      if (this.test("operator", ",")) {
        isTuple = true;
      } else {
        break;
      }
    }

    if (!isTuple) {
      const [only] = items;
      if (only !== undefined) {
        return only;
      }
      if (!explicitParentheses) {
        this.fail(`Expected an expression, got ${describeToken(this.current)}`);
      }
    }
    return { type: "tuple", items, lineno };
  }

  private isTupleEnd(extraEndWords: readonly string[]): boolean {
    const token = this.current;
    if (token.type === "variable_end" || token.type === "block_end" || token.type === "eof") {
      return true;
    }
    if (token.type === "operator" && token.value === ")") {
      return true;
    }
    return token.type === "name" && extraEndWords.includes(token.value);
  }

  private parseExpression(withCondexpr = true): Expr {
    return withCondexpr ? this.parseCondexpr() : this.parseOr();
  }

  private parseCondexpr(): Expr {
    const lineno = this.current.lineno;
    let expr = this.parseOr();
    while (this.skipIf("name", "if")) {
      const test = this.parseOr();
      const otherwise = this.skipIf("name", "else") ? this.parseCondexpr() : null;
      expr = { type: "cond", then: expr, test, otherwise, lineno };
    }
    return expr;
  }

  private parseOr(): Expr {
    const lineno = this.current.lineno;
    let left = this.parseAnd();
    while (this.skipIf("name", "or")) {
      left = { type: "logical", op: "or", left, right: this.parseAnd(), lineno };
    }
    return left;
  }

  private parseAnd(): Expr {
    const lineno = this.current.lineno;
    let left = this.parseNot();
    while (this.skipIf("name", "and")) {
      left = { type: "logical", op: "and", left, right: this.parseNot(), lineno };
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.test("name", "not")) {
      const lineno = this.next().lineno;
      return { type: "unary", op: "not", operand: this.parseNot(), lineno };
    }
    return this.parseCompare();
  }

  private parseCompare(): Expr {
    const lineno = this.current.lineno;
    const first = this.parseMath1();
    const rest: { op: CompareOp; operand: Expr }[] = [];

    for (;;) {
      const token = this.current;
      const op = token.value;
      if (token.type === "operator" && isCompareOp(op)) {
        this.next();
        rest.push({ op, operand: this.parseMath1() });
      } else if (this.skipIf("name", "in")) {
        rest.push({ op: "in", operand: this.parseMath1() });
      } else if (this.test("name", "not") && this.look().type === "name" && this.look().value === "in") {
        this.next();
        this.next();
        rest.push({ op: "not in", operand: this.parseMath1() });
      } else {
        break;
      }
    }

    return rest.length === 0 ? first : { type: "compare", first, rest, lineno };
  }

  private parseMath1(): Expr {
    const lineno = this.current.lineno;
    let left = this.parseConcat();
    while (this.test("operator", "+") || this.test("operator", "-")) {
      const op = this.next().value === "+" ? "+" : "-";
      left = { type: "binary", op, left, right: this.parseConcat(), lineno };
    }
    return left;
  }

  private parseConcat(): Expr {
    const lineno = this.current.lineno;
    let left = this.parseMath2();
    while (this.skipIf("operator", "~")) {
      left = { type: "binary", op: "~", left, right: this.parseMath2(), lineno };
    }
    return left;
  }

  private parseMath2(): Expr {
    const lineno = this.current.lineno;
    let left = this.parsePow();
    for (;;) {
      const op = this.current.value;
      if (this.current.type !== "operator" || !isMultiplicativeOp(op)) {
        return left;
      }
      this.next();
      left = { type: "binary", op, left, right: this.parsePow(), lineno };
    }
  }

  private parsePow(): Expr {
    const lineno = this.current.lineno;
    let left = this.parseUnary();
    while (this.skipIf("operator", "**")) {
      left = { type: "binary", op: "**", left, right: this.parseUnary(), lineno };
    }
    return left;
  }

  private parseUnary(withFilter = true): Expr {
    const token = this.current;
    let node: Expr;
    if (token.type === "operator" && (token.value === "-" || token.value === "+")) {
      const op = token.value === "-" ? "-" : "+";
      this.next();
      node = { type: "unary", op, operand: this.parseUnary(false), lineno: token.lineno };
    } else {
      node = this.parsePrimary();
    }
    node = this.parsePostfix(node);
    return withFilter ? this.parseFilterExpr(node) : node;
  }

  private parsePrimary(): Expr {
    const token = this.current;
    const lineno = token.lineno;

    switch (token.type) {
      case "name":
        this.next();
        if (token.value === "true" || token.value === "True") {
          return { type: "const", value: true, lineno };
        }
        if (token.value === "false" || token.value === "False") {
          return { type: "const", value: false, lineno };
        }
        if (token.value === "none" || token.value === "None") {
          return { type: "const", value: null, lineno };
        }
        return { type: "name", name: token.value, ctx: "load", lineno };
      case "string": {
        let value = this.next().value;
        while (this.current.type === "string") {
          value += this.next().value;
        }
        return { type: "const", value, lineno };
      }
      case "integer":
      case "float":
        this.next();
        return { type: "const", value: Number(token.value.replace(/_/g, "")), lineno };
      case "operator":
        if (token.value === "(") {
          this.next();
          const expr = this.parseTuple(true, [], true);
          this.expect("operator", ")");
          return expr;
        }
        if (token.value === "[") {
          return this.parseList();
        }
        if (token.value === "{") {
          return this.parseDict();
        }
        break;
    }
    return this.fail(`unexpected ${describeToken(token)}`);
  }

  private parseList(): Expr {
    const lineno = this.expect("operator", "[").lineno;
    const items: Expr[] = [];
    while (!this.test("operator", "]")) {
      if (items.length > 0) {
        this.expect("operator", ",");
      }
      if (this.test("operator", "]")) {
        break;
      }
      items.push(this.parseExpression());
    }
    this.expect("operator", "]");
    return { type: "list", items, lineno };
  }

  private parseDict(): Expr {
    const lineno = this.expect("operator", "{").lineno;
    const entries: DictEntry[] = [];
    while (!this.test("operator", "}")) {
      if (entries.length > 0) {
        this.expect("operator", ",");
      }
      if (this.test("operator", "}")) {
        break;
      }
      const key = this.parseExpression();
      this.expect("operator", ":");
      entries.push({ key, value: this.parseExpression() });
    }
    this.expect("operator", "}");
    return { type: "dict", entries, lineno };
  }

  private parsePostfix(node: Expr): Expr {
    let result = node;
    for (;;) {
      if (this.test("operator", ".") || this.test("operator", "[")) {
        result = this.parseSubscript(result);
      } else if (this.test("operator", "(")) {
        result = this.parseCall(result);
      } else {
        return result;
      }
    }
  }

  private parseFilterExpr(node: Expr): Expr {
    let result = node;
    for (;;) {
      if (this.test("operator", "|")) {
        result = this.parseFilter(result);
      } else if (this.test("name", "is")) {
        result = this.parseTest(result);
      } else if (this.test("operator", "(")) {
        result = this.parseCall(result);
      } else {
        return result;
      }
    }
  }

  private parseSubscript(node: Expr): Expr {
    const token = this.next();
    if (token.value === ".") {
      const attr = this.next();
      if (attr.type === "name") {
        return { type: "getattr", target: node, attr: attr.value, lineno: token.lineno };
      }
      if (attr.type === "integer") {
        const key = { type: "const" as const, value: Number(attr.value), lineno: attr.lineno };
        return { type: "getitem", target: node, key, lineno: token.lineno };
      }
      return this.fail("expected name or number", attr.lineno);
    }
    const key = this.parseSubscriptKey();
    this.expect("operator", "]");
    return { type: "getitem", target: node, key, lineno: token.lineno };
  }

  private parseSubscriptKey(): Expr | Slice {
    let start: Expr | null = null;
    if (!this.test("operator", ":")) {
      start = this.parseExpression();
      if (!this.test("operator", ":")) {
        return start;
      }
    }
    this.next();
    const stop = this.parseSliceBound();
    let step: Expr | null = null;
    if (this.test("operator", ":")) {
      this.next();
      step = this.parseSliceBound();
    }
    return { type: "slice", start, stop, step };
  }

  private parseSliceBound(): Expr | null {
    return this.test("operator", "]") || this.test("operator", ":") ? null : this.parseExpression();
  }

  private parseCallArgs(): { args: Expr[]; kwargs: Keyword[] } {
    const args: Expr[] = [];
    const kwargs: Keyword[] = [];
    this.expect("operator", "(");
    while (!this.test("operator", ")")) {
      if (args.length > 0 || kwargs.length > 0) {
        this.expect("operator", ",");
        if (this.test("operator", ")")) {
          break;
        }
      }
      if (this.current.type === "name" && this.look().type === "operator" && this.look().value === "=") {
        const name = this.next().value;
        this.next();
        kwargs.push({ name, value: this.parseExpression() });
      } else {
        if (kwargs.length > 0) {
          this.fail("positional argument follows keyword argument");
        }
        args.push(this.parseExpression());
      }
    }
    this.expect("operator", ")");
    return { args, kwargs };
  }

  private parseCall(node: Expr): Expr {
    const lineno = this.current.lineno;
    const { args, kwargs } = this.parseCallArgs();
    return { type: "call", callee: node, args, kwargs, lineno };
  }

  private parseFilter(node: Expr): Expr {
    const lineno = this.expect("operator", "|").lineno;
    const name = this.expect("name").value;
    if (!this.options.filters.has(name)) {
      this.fail(`No filter named '${name}'`, lineno);
    }
    const { args, kwargs } = this.test("operator", "(") ? this.parseCallArgs() : { args: [], kwargs: [] };
    return { type: "filter", target: node, name, args, kwargs, lineno };
  }

  private parseTest(node: Expr): Expr {
    const lineno = this.expect("name", "is").lineno;
    const negated = this.skipIf("name", "not");
    const name = this.expect("name").value;
    if (!this.options.tests.has(name)) {
      this.fail(`No test named '${name}'`, lineno);
    }

    let args: Expr[] = [];
    let kwargs: Keyword[] = [];
    const token = this.current;
    if (this.test("operator", "(")) {
      ({ args, kwargs } = this.parseCallArgs());
    } else if (
      token.type === "string" ||
      token.type === "integer" ||
      token.type === "float" ||
      (token.type === "name" && !TEST_ARG_STOPWORDS.has(token.value))
    ) {
      args = [this.parsePostfix(this.parsePrimary())];
    }
    return { type: "test", target: node, name, args, kwargs, negated, lineno };
  }
}

/**
 * Parse a token list into a syntax tree
 */
export function parseTokens(tokens: Token[], options: ParserOptions): TemplateRoot {
  return new Parser(tokens, options).parse();
}
