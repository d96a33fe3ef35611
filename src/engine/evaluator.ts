import { TemplateRuntimeError } from "../lib/errors.js";

import {
  Macro,
  NativeFunction,
  SafeString,
  Undefined,
  binaryOp,
  compareOp,
  createMapping,
  getAttribute,
  getItem,
  getSlice,
  isTruthy,
  stringify,
  toIterable,
  typeName,
  unaryOp,
} from "./runtime.js";

import type { FilterHandler, TestHandler } from "./filters.js";
import type { CallArguments, Scope } from "./runtime.js";
import type { AssignTarget, Expr, ForNode, Keyword, MacroNode, Stmt } from "./nodes.js";

/**
 * Settings an evaluation runs under
 */
export interface EvaluationOptions {
  autoescape: boolean;
  filters: ReadonlyMap<string, FilterHandler>;
  tests: ReadonlyMap<string, TestHandler>;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&#34;",
  "'": "&#39;",
};

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Walks a syntax tree, producing output text
 */
export class Evaluator {
  constructor(private readonly options: EvaluationOptions) {}

  render(body: readonly Stmt[], scope: Scope): string {
    let out = "";
    for (const node of body) {
      out += this.execute(node, scope);
    }
    return out;
  }

  private execute(node: Stmt, scope: Scope): string {
    switch (node.type) {
      case "text":
        return node.value;
      case "output":
        return this.output(this.evaluate(node.expr, scope));
      case "if": {
        for (const branch of node.branches) {
          if (isTruthy(this.evaluate(branch.test, scope))) {
            return this.render(branch.body, scope);
          }
        }
        return this.render(node.otherwise, scope);
      }
      case "for":
        return this.executeFor(node, scope);
      case "set":
        this.assign(node.target, this.evaluate(node.value, scope), scope);
        return "";
      case "set-block": {
        const text = this.render(node.body, scope.child());
        this.assign(node.target, this.options.autoescape ? new SafeString(text) : text, scope);
        return "";
      }
      case "macro":
        scope.set(node.name, this.defineMacro(node, scope));
        return "";
      case "do":
        this.evaluate(node.expr, scope);
        return "";
    }
  }

  private output(value: unknown): string {
    if (this.options.autoescape && !(value instanceof SafeString)) {
      return escapeHtml(stringify(value));
    }
    return stringify(value);
  }

  private executeFor(node: ForNode, scope: Scope): string {
    const items = toIterable(this.evaluate(node.iter, scope)).filter((item) => {
      if (!node.filter) {
        return true;
      }
      const filterScope = scope.child();
      this.assign(node.target, item, filterScope);
      return isTruthy(this.evaluate(node.filter, filterScope));
    });

    if (items.length === 0) {
      return this.render(node.otherwise, scope.child());
    }

    let out = "";
    items.forEach((item, index) => {
      const loopScope = scope.child();
      loopScope.set("loop", this.loopContext(items, index));
      this.assign(node.target, item, loopScope);
      out += this.render(node.body, loopScope);
    });
    return out;
  }

  private loopContext(items: readonly unknown[], index: number): Record<string, unknown> {
    const size = items.length;
    return createMapping([
      ["index", index + 1],
      ["index0", index],
      ["revindex", size - index],
      ["revindex0", size - index - 1],
      ["first", index === 0],
      ["last", index === size - 1],
      ["length", size],
      ["previtem", index > 0 ? items[index - 1] : new Undefined("there is no previous item")],
      ["nextitem", index < size - 1 ? items[index + 1] : new Undefined("there is no next item")],
      ["cycle", new NativeFunction("cycle", ({ args }) => {
        if (args.length === 0) {
          throw new TemplateRuntimeError("no items for cycling given");
        }
        return args[index % args.length];
      })],
    ]);
  }

  private assign(target: AssignTarget, value: unknown, scope: Scope): void {
    if (target.type === "name") {
      scope.set(target.name, value);
      return;
    }
    const values = toIterable(value);
    if (values.length !== target.items.length) {
      const problem = values.length > target.items.length ? "too many" : "not enough";
      throw new TemplateRuntimeError(
        `${problem} values to unpack (expected ${target.items.length}, got ${values.length})`
      );
    }
    target.items.forEach((item, index) => {
      if (item.type === "name") {
        scope.set(item.name, values[index]);
      }
    });
  }

  private defineMacro(node: MacroNode, closure: Scope): Macro {
    const params = node.params.map((param) => param.name);
    const firstDefault = params.length - node.defaults.length;

    return new Macro(node.name, params, ({ args, kwargs }) => {
      const scope = closure.child();
      const extraKwargs = new Map(kwargs);

      params.forEach((param, index) => {
        if (index < args.length) {
          if (extraKwargs.has(param)) {
            throw new TemplateRuntimeError(`macro '${node.name}' got multiple values for argument '${param}'`);
          }
          scope.set(param, args[index]);
        } else if (extraKwargs.has(param)) {
          scope.set(param, extraKwargs.get(param));
          extraKwargs.delete(param);
        } else {
          const fallback = node.defaults[index - firstDefault];
          scope.set(
            param,
            fallback ? this.evaluate(fallback, scope) : new Undefined(`parameter '${param}' was not provided`)
          );
        }
      });
      scope.set("varargs", args.slice(params.length));
      scope.set("kwargs", createMapping(extraKwargs));

      const text = this.render(node.body, scope);
      return this.options.autoescape ? new SafeString(text) : text;
    });
  }

  // -------------------------------------------------------------------------
  // Expressions
  // -------------------------------------------------------------------------

  evaluate(expr: Expr, scope: Scope): unknown {
    switch (expr.type) {
      case "name":
        return scope.resolve(expr.name);
      case "const":
        return expr.value;
      case "list":
      case "tuple":
        return expr.items.map((item) => this.evaluate(item, scope));
      case "dict":
        return createMapping(
          expr.entries.map(({ key, value }): [string, unknown] => [
            stringify(this.evaluate(key, scope)),
            this.evaluate(value, scope),
          ])
        );
      case "getattr":
        return getAttribute(this.evaluate(expr.target, scope), expr.attr);
      case "getitem": {
        const target = this.evaluate(expr.target, scope);
        if (expr.key.type === "slice") {
          const { start, stop, step } = expr.key;
          return getSlice(
            target,
            start ? this.evaluate(start, scope) : null,
            stop ? this.evaluate(stop, scope) : null,
            step ? this.evaluate(step, scope) : null
          );
        }
        return getItem(target, this.evaluate(expr.key, scope));
      }
      case "call":
        return this.call(this.evaluate(expr.callee, scope), this.arguments(expr.args, expr.kwargs, scope));
      case "filter": {
        const filter = this.options.filters.get(expr.name);
        if (!filter) {
          throw new TemplateRuntimeError(`No filter named '${expr.name}'`);
        }
        return filter(this.evaluate(expr.target, scope), this.arguments(expr.args, expr.kwargs, scope));
      }
      case "test": {
        const test = this.options.tests.get(expr.name);
        if (!test) {
          throw new TemplateRuntimeError(`No test named '${expr.name}'`);
        }
        const result = test(this.evaluate(expr.target, scope), this.arguments(expr.args, expr.kwargs, scope));
        return expr.negated ? !result : result;
      }
      case "unary": {
        const operand = this.evaluate(expr.operand, scope);
        return expr.op === "not" ? !isTruthy(operand) : unaryOp(expr.op, operand);
      }
      case "binary":
        return binaryOp(expr.op, this.evaluate(expr.left, scope), this.evaluate(expr.right, scope));
      case "logical": {
        const left = this.evaluate(expr.left, scope);
        if (expr.op === "and") {
          return isTruthy(left) ? this.evaluate(expr.right, scope) : left;
        }
        return isTruthy(left) ? left : this.evaluate(expr.right, scope);
      }
      case "compare": {
        let left = this.evaluate(expr.first, scope);
        for (const { op, operand } of expr.rest) {
          const right = this.evaluate(operand, scope);
          if (!compareOp(op, left, right)) {
            return false;
          }
          left = right;
        }
        return true;
      }
      case "cond":
        if (isTruthy(this.evaluate(expr.test, scope))) {
          return this.evaluate(expr.then, scope);
        }
        return expr.otherwise
          ? this.evaluate(expr.otherwise, scope)
          : new Undefined("the inline if-expression evaluated to false and no else section was defined");
    }
  }

  private arguments(args: readonly Expr[], kwargs: readonly Keyword[], scope: Scope): CallArguments {
    return {
      args: args.map((arg) => this.evaluate(arg, scope)),
      kwargs: new Map(kwargs.map((kw): [string, unknown] => [kw.name, this.evaluate(kw.value, scope)])),
    };
  }

  private call(callee: unknown, call: CallArguments): unknown {
    if (callee instanceof Macro || callee instanceof NativeFunction) {
      return callee.call(call);
    }
    if (callee instanceof Undefined) {
      return callee.fail();
    }
    throw new TemplateRuntimeError(`'${typeName(callee)}' object is not callable`);
  }
}
