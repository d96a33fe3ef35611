import { childNodes } from "./nodes.js";

import type { AssignTarget, Expr, NameExpr, Node, Stmt, TemplateRoot } from "./nodes.js";

/**
 * Names declared locally while walking a template
 */
class DeclarationScope {
  private readonly names = new Set<string>();

  constructor(private readonly parent: DeclarationScope | null = null) {}

  declare(name: string): void {
    this.names.add(name);
  }

  declareTarget(target: AssignTarget): void {
    if (target.type === "name") {
      this.declare(target.name);
    } else {
      for (const item of target.items) {
        if (item.type === "name") this.declare(item.name);
      }
    }
  }

  has(name: string): boolean {
    return this.names.has(name) || (this.parent?.has(name) ?? false);
  }

  child(): DeclarationScope {
    return new DeclarationScope(this);
  }
}

/**
 * Collects names read before anything in the template declares them
 */
class UndeclaredCollector {
  readonly undeclared = new Set<string>();

  visitBody(body: readonly Stmt[], scope: DeclarationScope): void {
    for (const node of body) {
      this.visitStatement(node, scope);
    }
  }

  private visitStatement(node: Stmt, scope: DeclarationScope): void {
    switch (node.type) {
      case "text":
        return;
      case "output":
      case "do":
        this.visitExpr(node.expr, scope);
        return;
      case "if":
        for (const branch of node.branches) {
          this.visitExpr(branch.test, scope);
          this.visitBody(branch.body, scope);
        }
        this.visitBody(node.otherwise, scope);
        return;
      case "for": {
        this.visitExpr(node.iter, scope);
        const loopScope = scope.child();
        loopScope.declareTarget(node.target);
        if (node.filter) {
          this.visitExpr(node.filter, loopScope);
        }
        loopScope.declare("loop");
        this.visitBody(node.body, loopScope);
        this.visitBody(node.otherwise, scope.child());
        return;
      }
      case "set":
        this.visitExpr(node.value, scope);
        scope.declareTarget(node.target);
        return;
      case "set-block":
        this.visitBody(node.body, scope.child());
        scope.declareTarget(node.target);
        return;
      case "macro": {
        scope.declare(node.name);
        const macroScope = scope.child();
        node.params.forEach((param, index) => {
          const fallback = node.defaults[index - (node.params.length - node.defaults.length)];
          if (fallback) {
            this.visitExpr(fallback, macroScope);
          }
          macroScope.declare(param.name);
        });
        macroScope.declare("varargs");
        macroScope.declare("kwargs");
        this.visitBody(node.body, macroScope);
        return;
      }
    }
  }

  private visitExpr(expr: Expr, scope: DeclarationScope): void {
    if (expr.type === "name") {
      if (expr.ctx === "load" && !scope.has(expr.name)) {
        this.undeclared.add(expr.name);
      }
      return;
    }
    for (const child of childNodes(expr)) {
      if (isExpr(child)) {
        this.visitExpr(child, scope);
      }
    }
  }
}

const EXPRESSION_TYPES = new Set<string>([
  "name", "const", "list", "tuple", "dict", "getattr", "getitem", "call",
  "filter", "test", "unary", "binary", "logical", "compare", "cond",
]);

function isExpr(node: Node): node is Expr {
  return EXPRESSION_TYPES.has(node.type);
}

/**
 * Find the variables a template reads without declaring them, i.e. the names it
 * expects from its context or globals.
 *
 * Declarations count from the point they appear: `{{ x }}{% set x = 1 %}` reads
 * an undeclared `x`.
 */
export function findUndeclaredVariables(root: TemplateRoot): Set<string> {
  const collector = new UndeclaredCollector();
  collector.visitBody(root.body, new DeclarationScope());
  return collector.undeclared;
}

/**
 * Every read of one of `names` anywhere in the tree, in document order
 */
export function findNameReferences(root: TemplateRoot, names: ReadonlySet<string>): NameExpr[] {
  const matches: NameExpr[] = [];
  const stack: Node[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) {
      break;
    }
    if (node.type === "name" && node.ctx === "load" && names.has(node.name)) {
      matches.push(node);
    }
    const children = childNodes(node);
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) {
        stack.push(child);
      }
    }
  }

  return matches;
}
