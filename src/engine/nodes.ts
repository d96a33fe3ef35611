/**
 * Syntax tree of the template engine.
 *
 * Every node records the 1-based source line it starts on.
 */

interface NodeBase {
  lineno: number;
}

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export type NameContext = "load" | "store" | "param";

export interface NameExpr extends NodeBase {
  type: "name";
  name: string;
  ctx: NameContext;
}

export interface ConstExpr extends NodeBase {
  type: "const";
  value: string | number | boolean | null;
}

export interface ListExpr extends NodeBase {
  type: "list";
  items: Expr[];
}

export interface TupleExpr extends NodeBase {
  type: "tuple";
  items: Expr[];
}

export interface DictEntry {
  key: Expr;
  value: Expr;
}

export interface DictExpr extends NodeBase {
  type: "dict";
  entries: DictEntry[];
}

export interface GetattrExpr extends NodeBase {
  type: "getattr";
  target: Expr;
  attr: string;
}

/** `[start:stop:step]`, any part may be omitted */
export interface Slice {
  type: "slice";
  start: Expr | null;
  stop: Expr | null;
  step: Expr | null;
}

export interface GetitemExpr extends NodeBase {
  type: "getitem";
  target: Expr;
  key: Expr | Slice;
}

export interface Keyword {
  name: string;
  value: Expr;
}

export interface CallExpr extends NodeBase {
  type: "call";
  callee: Expr;
  args: Expr[];
  kwargs: Keyword[];
}

export interface FilterExpr extends NodeBase {
  type: "filter";
  target: Expr;
  name: string;
  args: Expr[];
  kwargs: Keyword[];
}

export interface TestExpr extends NodeBase {
  type: "test";
  target: Expr;
  name: string;
  args: Expr[];
  kwargs: Keyword[];
  negated: boolean;
}

export type UnaryOp = "not" | "-" | "+";

export interface UnaryExpr extends NodeBase {
  type: "unary";
  op: UnaryOp;
  operand: Expr;
}

export type BinaryOp = "+" | "-" | "*" | "/" | "//" | "%" | "**" | "~";

export interface BinaryExpr extends NodeBase {
  type: "binary";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export interface LogicalExpr extends NodeBase {
  type: "logical";
  op: "and" | "or";
  left: Expr;
  right: Expr;
}

export type CompareOp = "==" | "!=" | "<" | ">" | "<=" | ">=" | "in" | "not in";

export interface CompareOperand {
  op: CompareOp;
  operand: Expr;
}

export interface CompareExpr extends NodeBase {
  type: "compare";
  first: Expr;
  rest: CompareOperand[];
}

/** `then if test else otherwise` */
export interface CondExpr extends NodeBase {
  type: "cond";
  then: Expr;
  test: Expr;
  otherwise: Expr | null;
}

export type Expr =
  | NameExpr
  | ConstExpr
  | ListExpr
  | TupleExpr
  | DictExpr
  | GetattrExpr
  | GetitemExpr
  | CallExpr
  | FilterExpr
  | TestExpr
  | UnaryExpr
  | BinaryExpr
  | LogicalExpr
  | CompareExpr
  | CondExpr;

/** Left-hand side of `set` and `for` */
export type AssignTarget = NameExpr | TupleExpr;

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export interface TextNode extends NodeBase {
  type: "text";
  value: string;
}

export interface OutputNode extends NodeBase {
  type: "output";
  expr: Expr;
}

export interface IfBranch {
  test: Expr;
  body: Stmt[];
}

export interface IfNode extends NodeBase {
  type: "if";
  branches: IfBranch[];
  otherwise: Stmt[];
}

export interface ForNode extends NodeBase {
  type: "for";
  target: AssignTarget;
  iter: Expr;
  filter: Expr | null;
  body: Stmt[];
  otherwise: Stmt[];
}

export interface SetNode extends NodeBase {
  type: "set";
  target: AssignTarget;
  value: Expr;
}

export interface SetBlockNode extends NodeBase {
  type: "set-block";
  target: AssignTarget;
  body: Stmt[];
}

export interface MacroNode extends NodeBase {
  type: "macro";
  name: string;
  params: NameExpr[];
  /** Defaults for the trailing parameters */
  defaults: Expr[];
  body: Stmt[];
}

export interface DoNode extends NodeBase {
  type: "do";
  expr: Expr;
}

export type Stmt = TextNode | OutputNode | IfNode | ForNode | SetNode | SetBlockNode | MacroNode | DoNode;

export interface TemplateRoot extends NodeBase {
  type: "template";
  body: Stmt[];
}

export type Node = Expr | Stmt | TemplateRoot;

/**
 * Direct children of a node, in source order
 */
export function childNodes(node: Node): Node[] {
  switch (node.type) {
    case "name":
    case "const":
    case "text":
      return [];
    case "list":
    case "tuple":
      return [...node.items];
    case "dict":
      return node.entries.flatMap((entry) => [entry.key, entry.value]);
    case "getattr":
      return [node.target];
    case "getitem":
      if (node.key.type === "slice") {
        const parts = [node.key.start, node.key.stop, node.key.step];
        return [node.target, ...parts.filter((part): part is Expr => part !== null)];
      }
      return [node.target, node.key];
    case "call":
      return [node.callee, ...node.args, ...node.kwargs.map((kw) => kw.value)];
    case "filter":
    case "test":
      return [node.target, ...node.args, ...node.kwargs.map((kw) => kw.value)];
    case "unary":
      return [node.operand];
    case "binary":
    case "logical":
      return [node.left, node.right];
    case "compare":
      return [node.first, ...node.rest.map((operand) => operand.operand)];
    case "cond":
      return node.otherwise ? [node.then, node.test, node.otherwise] : [node.then, node.test];
    case "output":
    case "do":
      return [node.expr];
    case "if":
      return [...node.branches.flatMap((branch) => [branch.test, ...branch.body]), ...node.otherwise];
    case "for":
      return [
        node.target,
        node.iter,
        ...(node.filter ? [node.filter] : []),
        ...node.body,
        ...node.otherwise,
      ];
    case "set":
      return [node.target, node.value];
    case "set-block":
      return [node.target, ...node.body];
    case "macro":
      return [...node.params, ...node.defaults, ...node.body];
    case "template":
      return [...node.body];
  }
}
