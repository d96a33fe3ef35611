/**
 * Runtime values and helpers shared by the evaluator, filters and tests.
 *
 * Templates only reach own data properties of mappings, array items and a fixed
 * table of safe methods; nothing else of the host is visible.
 */

import { SecurityError, TemplateRuntimeError, UndefinedError } from "../lib/errors.js";

/**
 * Mapping value as created by templates and config literals
 */
export type Mapping = Record<string, unknown>;

/**
 * Positional and keyword arguments of a call
 */
export interface CallArguments {
  args: unknown[];
  kwargs: Map<string, unknown>;
}

/**
 * A value that could not be resolved. Renders as empty text, but calling it or
 * reading its attributes raises.
 */
export class Undefined {
  constructor(readonly hint: string) {}

  fail(): never {
    throw new UndefinedError(this.hint);
  }
}

/**
 * Text that must not be escaped again when autoescaping is on
 */
export class SafeString {
  constructor(readonly value: string) {}

  toString(): string {
    return this.value;
  }
}

/**
 * A host function exposed to templates on purpose
 */
export class NativeFunction {
  constructor(
    readonly name: string,
    private readonly fn: (call: CallArguments) => unknown
  ) {}

  call(call: CallArguments): unknown {
    return this.fn(call);
  }
}

/**
 * A macro defined with `{% macro %}`
 */
export class Macro {
  constructor(
    readonly name: string,
    readonly params: readonly string[],
    private readonly invoke: (call: CallArguments) => string | SafeString
  ) {}

  call(call: CallArguments): string | SafeString {
    return this.invoke(call);
  }
}

/**
 * Chained variable scope; lookups walk outwards to the root
 */
export class Scope {
  private readonly vars: Map<string, unknown>;

  constructor(
    private readonly parent: Scope | null = null,
    vars?: Map<string, unknown>
  ) {
    this.vars = vars ?? new Map();
  }

  child(): Scope {
    return new Scope(this);
  }

  resolve(name: string): unknown {
    if (this.vars.has(name)) {
      return this.vars.get(name);
    }
    return this.parent ? this.parent.resolve(name) : new Undefined(`'${name}' is undefined`);
  }

  set(name: string, value: unknown): void {
    this.vars.set(name, value);
  }

  /** Variables defined directly in this scope */
  own(): Map<string, unknown> {
    return new Map(this.vars);
  }
}

// ---------------------------------------------------------------------------
// Type inspection
// ---------------------------------------------------------------------------

export function isUndefined(value: unknown): value is Undefined {
  return value instanceof Undefined;
}

/**
 * Plain mappings: object literals and null-prototype objects
 */
export function isMapping(value: unknown): value is Mapping {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isCallable(value: unknown): value is Macro | NativeFunction {
  return value instanceof Macro || value instanceof NativeFunction;
}

/**
 * Type name used in error messages (`str`, `int`, `list`, `dict`, ...)
 */
export function typeName(value: unknown): string {
  if (value instanceof Undefined) return "Undefined";
  if (value === null) return "NoneType";
  if (typeof value === "string" || value instanceof SafeString) return "str";
  if (typeof value === "number") return Number.isInteger(value) ? "int" : "float";
  if (typeof value === "boolean") return "bool";
  if (Array.isArray(value)) return "list";
  if (value instanceof Map || isMapping(value)) return "dict";
  if (value instanceof Macro) return "Macro";
  if (value instanceof NativeFunction) return "builtin_function_or_method";
  return "object";
}

/**
 * Build a mapping without touching `Object.prototype`
 */
export function createMapping(entries: Iterable<[string, unknown]>): Mapping {
  const mapping: Mapping = {};
  for (const [key, value] of entries) {
    Object.defineProperty(mapping, key, { value, enumerable: true, writable: true, configurable: true });
  }
  return mapping;
}

/**
 * Key/value pairs of a mapping-like value, or null when it isn't one
 */
export function mappingEntries(value: unknown): [string, unknown][] | null {
  if (value instanceof Map) {
    return [...value.entries()].map(([key, item]): [string, unknown] => [String(key), item]);
  }
  if (isMapping(value)) {
    return Object.keys(value).map((key): [string, unknown] => [key, value[key]]);
  }
  return null;
}

function ownValue(value: Mapping | Map<unknown, unknown>, key: string): { found: boolean; value: unknown } {
  if (value instanceof Map) {
    return value.has(key) ? { found: true, value: value.get(key) } : { found: false, value: undefined };
  }
  const descriptor = Object.getOwnPropertyDescriptor(value, key);
  // Accessors are never run from templates
  if (!descriptor || descriptor.get !== undefined || descriptor.set !== undefined) {
    return { found: false, value: undefined };
  }
  return { found: true, value: descriptor.value };
}

// ---------------------------------------------------------------------------
// Truthiness, equality, conversion
// ---------------------------------------------------------------------------

export function isTruthy(value: unknown): boolean {
  if (value instanceof Undefined || value === null || value === undefined) return false;
  if (value instanceof SafeString) return value.value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Map) return value.size > 0;
  if (isMapping(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

export function looseEquals(left: unknown, right: unknown): boolean {
  const a = left instanceof SafeString ? left.value : left;
  const b = right instanceof SafeString ? right.value : right;
  if (a instanceof Undefined || b instanceof Undefined) {
    return a instanceof Undefined && b instanceof Undefined;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => looseEquals(item, b[index]));
  }
  const aEntries = mappingEntries(a);
  const bEntries = mappingEntries(b);
  if (aEntries && bEntries) {
    if (aEntries.length !== bEntries.length) return false;
    const lookup = new Map(bEntries);
    return aEntries.every(([key, item]) => lookup.has(key) && looseEquals(item, lookup.get(key)));
  }
  return a === b;
}

function reprString(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

/**
 * Quoted representation, used for values nested in lists and mappings
 */
export function repr(value: unknown): string {
  if (typeof value === "string") return reprString(value);
  if (value instanceof SafeString) return reprString(value.value);
  return stringify(value);
}

/**
 * Text of a value as it appears in rendered output
 */
export function stringify(value: unknown): string {
  if (value === null || value === undefined || value instanceof Undefined) return "";
  if (typeof value === "string") return value;
  if (value instanceof SafeString) return value.value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return `[${value.map(repr).join(", ")}]`;
  const entries = mappingEntries(value);
  if (entries) {
    return `{${entries.map(([key, item]) => `${reprString(key)}: ${repr(item)}`).join(", ")}}`;
  }
  if (value instanceof Macro) return `<Macro '${value.name}'>`;
  if (value instanceof NativeFunction) return `<built-in function ${value.name}>`;
  return `<${typeName(value)}>`;
}

/**
 * Items visited by a for loop; mappings yield their keys
 */
export function toIterable(value: unknown): unknown[] {
  if (value instanceof Undefined) return [];
  if (Array.isArray(value)) return value;
  if (typeof value === "string") return [...value];
  if (value instanceof SafeString) return [...value.value];
  const entries = mappingEntries(value);
  if (entries) return entries.map(([key]) => key);
  throw new TemplateRuntimeError(`'${typeName(value)}' object is not iterable`);
}

// ---------------------------------------------------------------------------
// Attribute and item access
// ---------------------------------------------------------------------------

function method(name: string, fn: (call: CallArguments) => unknown): NativeFunction {
  return new NativeFunction(name, fn);
}

function stringArg(call: CallArguments, index: number, fallback?: string): string {
  const value = call.args[index];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value === "string") return value;
  if (value instanceof SafeString) return value.value;
  throw new TemplateRuntimeError(`expected a string argument, got '${typeName(value)}'`);
}

function stringMethod(text: string, name: string): NativeFunction | null {
  switch (name) {
    case "upper":
      return method(name, () => text.toUpperCase());
    case "lower":
      return method(name, () => text.toLowerCase());
    case "strip":
      return method(name, () => text.trim());
    case "lstrip":
      return method(name, () => text.trimStart());
    case "rstrip":
      return method(name, () => text.trimEnd());
    case "startswith":
      return method(name, (call) => text.startsWith(stringArg(call, 0)));
    case "endswith":
      return method(name, (call) => text.endsWith(stringArg(call, 0)));
    case "replace":
      return method(name, (call) => text.split(stringArg(call, 0)).join(stringArg(call, 1)));
    case "split":
      return method(name, (call) => {
        const separator = call.args[0];
        if (separator === undefined || separator === null) {
          return text.trim().split(/\s+/).filter((part) => part.length > 0);
        }
        return text.split(stringArg(call, 0));
      });
    case "join":
      return method(name, (call) => toIterable(call.args[0]).map(stringify).join(text));
    default:
      return null;
  }
}

function listMethod(list: unknown[], name: string): NativeFunction | null {
  switch (name) {
    case "append":
      return method(name, (call) => {
        list.push(call.args[0]);
        return null;
      });
    case "extend":
      return method(name, (call) => {
        list.push(...toIterable(call.args[0]));
        return null;
      });
    case "pop":
      return method(name, (call) => {
        if (list.length === 0) {
          throw new TemplateRuntimeError("pop from empty list");
        }
        const index = call.args[0];
        if (typeof index === "number") {
          return list.splice(index < 0 ? list.length + index : index, 1)[0];
        }
        return list.pop();
      });
    case "index":
      return method(name, (call) => {
        const position = list.findIndex((item) => looseEquals(item, call.args[0]));
        if (position === -1) {
          throw new TemplateRuntimeError(`${repr(call.args[0])} is not in list`);
        }
        return position;
      });
    case "count":
      return method(name, (call) => list.filter((item) => looseEquals(item, call.args[0])).length);
    default:
      return null;
  }
}

function mappingMethod(value: Mapping | Map<unknown, unknown>, name: string): NativeFunction | null {
  const entries = (): [string, unknown][] => mappingEntries(value) ?? [];
  switch (name) {
    case "items":
      return method(name, () => entries().map(([key, item]) => [key, item]));
    case "keys":
      return method(name, () => entries().map(([key]) => key));
    case "values":
      return method(name, () => entries().map(([, item]) => item));
    case "get":
      return method(name, (call) => {
        const found = ownValue(value, String(call.args[0]));
        return found.found ? found.value : call.args[1] ?? null;
      });
    case "update":
      return method(name, (call) => {
        const updates = [...(mappingEntries(call.args[0]) ?? []), ...call.kwargs.entries()];
        for (const [key, item] of updates) {
          if (value instanceof Map) {
            value.set(key, item);
          } else {
            Object.defineProperty(value, key, { value: item, enumerable: true, writable: true, configurable: true });
          }
        }
        return null;
      });
    default:
      return null;
  }
}

/**
 * `value.name`: safe methods first, then own data properties
 */
export function getAttribute(value: unknown, name: string): unknown {
  if (value instanceof Undefined) {
    return value.fail();
  }
  if (name.startsWith("_")) {
    throw new SecurityError(`access to attribute '${name}' of '${typeName(value)}' object is unsafe`);
  }

  const text = typeof value === "string" ? value : value instanceof SafeString ? value.value : null;
  if (text !== null) {
    return stringMethod(text, name) ?? new Undefined(`'str' object has no attribute '${name}'`);
  }
  if (Array.isArray(value)) {
    return listMethod(value, name) ?? new Undefined(`'list' object has no attribute '${name}'`);
  }
  if (value instanceof Map || isMapping(value)) {
    const bound = mappingMethod(value, name);
    if (bound) {
      return bound;
    }
    const found = ownValue(value, name);
    return found.found ? found.value : new Undefined(`'dict' object has no attribute '${name}'`);
  }
  return new Undefined(`'${typeName(value)}' object has no attribute '${name}'`);
}

/**
 * `value[key]`: items first, falling back to attributes for string keys
 */
export function getItem(value: unknown, key: unknown): unknown {
  if (value instanceof Undefined) {
    return value.fail();
  }

  if (typeof key === "number" && Number.isInteger(key)) {
    const sequence = Array.isArray(value)
      ? value
      : typeof value === "string"
        ? [...value]
        : null;
    if (sequence) {
      const index = key < 0 ? sequence.length + key : key;
      return index >= 0 && index < sequence.length
        ? sequence[index]
        : new Undefined(`${typeName(value)} index ${key} out of range`);
    }
  }

  if (value instanceof Map || isMapping(value)) {
    const itemKey = typeof key === "string" ? key : stringify(key);
    if (itemKey.startsWith("_")) {
      throw new SecurityError(`access to key '${itemKey}' of '${typeName(value)}' object is unsafe`);
    }
    const found = ownValue(value, itemKey);
    if (found.found) {
      return found.value;
    }
  }

  if (typeof key === "string") {
    return getAttribute(value, key);
  }
  return new Undefined(`'${typeName(value)}' object has no element ${repr(key)}`);
}

function sliceIndex(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  throw new TemplateRuntimeError(`slice indices must be integers or none, not '${typeName(value)}'`);
}

/**
 * `value[start:stop:step]` over a list or string; omitted bounds are `null`
 */
export function getSlice(value: unknown, start: unknown, stop: unknown, step: unknown): unknown {
  if (value instanceof Undefined) {
    return value.fail();
  }
  const sequence = Array.isArray(value) ? value : typeof value === "string" ? [...value] : null;
  if (!sequence) {
    throw new TemplateRuntimeError(`'${typeName(value)}' object is not sliceable`);
  }

  const stride = sliceIndex(step) ?? 1;
  if (stride === 0) {
    throw new TemplateRuntimeError("slice step cannot be zero");
  }
  const length = sequence.length;
  const bound = (index: number | null, fallback: number): number => {
    if (index === null) {
      return fallback;
    }
    const absolute = index < 0 ? index + length : index;
    return stride > 0
      ? Math.min(Math.max(absolute, 0), length)
      : Math.min(Math.max(absolute, -1), length - 1);
  };
  const from = bound(sliceIndex(start), stride > 0 ? 0 : length - 1);
  const to = bound(sliceIndex(stop), stride > 0 ? length : -1);

  const items: unknown[] = [];
  for (let i = from; stride > 0 ? i < to : i > to; i += stride) {
    items.push(sequence[i]);
  }
  return typeof value === "string" ? items.join("") : items;
}

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

const FORMAT_SPEC = /%(?:\(([^)]*)\))?([-0]?)(\d*)(?:\.(\d+))?(.?)/;

function formatNumber(value: unknown, conversion: string, precision: number | undefined): string {
  const number = plain(value);
  if (typeof number !== "number" && typeof number !== "boolean") {
    throw new TemplateRuntimeError(`%${conversion} format: a real number is required, not '${typeName(number)}'`);
  }
  const numeric = Number(number);
  return conversion === "f" ? numeric.toFixed(precision ?? 6) : String(Math.trunc(numeric));
}

function pad(text: string, flag: string, width: number): string {
  if (text.length >= width) {
    return text;
  }
  if (flag === "-") {
    return text.padEnd(width);
  }
  if (flag === "0" && /^-?\d/.test(text)) {
    return text.startsWith("-") ? `-${text.slice(1).padStart(width - 1, "0")}` : text.padStart(width, "0");
  }
  return text.padStart(width);
}

/**
 * `format % values`: `%s`, `%r`, `%d`, `%i`, `%f` and `%%`, with `%(key)s` looking
 * up a mapping. Width, `-`/`0` flags and precision are honoured.
 */
export function percentFormat(format: string, values: unknown): string {
  const mapping = values instanceof Map || isMapping(values) ? values : null;
  const args = Array.isArray(values) ? values : [values];
  const pattern = new RegExp(FORMAT_SPEC.source, "g");
  let output = "";
  let last = 0;
  let used = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(format)) !== null) {
    output += format.slice(last, match.index);
    last = match.index + match[0].length;
    const [, key, flag = "", width = "", precision, conversion = ""] = match;
    if (conversion === "%") {
      output += "%";
      continue;
    }
    if (conversion === "") {
      throw new TemplateRuntimeError("incomplete format");
    }
    if (!"sridf".includes(conversion)) {
      throw new TemplateRuntimeError(`unsupported format character '${conversion}' at index ${match.index}`);
    }

    let value: unknown;
    if (key !== undefined) {
      if (!mapping) {
        throw new TemplateRuntimeError("format requires a mapping");
      }
      const found = ownValue(mapping, key);
      if (!found.found) {
        throw new TemplateRuntimeError(`format key '${key}' is not defined`);
      }
      value = found.value;
    } else {
      if (used >= args.length) {
        throw new TemplateRuntimeError("not enough arguments for format string");
      }
      value = args[used++];
    }

    let text: string;
    if (conversion === "s" || conversion === "r") {
      text = conversion === "s" ? stringify(value) : repr(value);
      if (precision !== undefined) {
        text = text.slice(0, Number(precision));
      }
    } else {
      text = formatNumber(value, conversion, precision === undefined ? undefined : Number(precision));
    }
    output += pad(text, flag, width === "" ? 0 : Number(width));
  }

  if (!mapping && used < args.length) {
    throw new TemplateRuntimeError("not all arguments converted during string formatting");
  }
  return output + format.slice(last);
}

function unsupported(op: string, left: unknown, right: unknown): never {
  throw new TemplateRuntimeError(
    `unsupported operand type(s) for ${op}: '${typeName(left)}' and '${typeName(right)}'`
  );
}

function plain(value: unknown): unknown {
  if (value instanceof Undefined) {
    return value.fail();
  }
  return value instanceof SafeString ? value.value : value;
}

function repeat<T>(items: T[], times: number): T[] {
  const result: T[] = [];
  for (let i = 0; i < times; i++) {
    result.push(...items);
  }
  return result;
}

export function binaryOp(op: string, leftValue: unknown, rightValue: unknown): unknown {
  if (op === "~") {
    return stringify(leftValue) + stringify(rightValue);
  }
  const left = plain(leftValue);
  if (op === "%" && typeof left === "string") {
    return percentFormat(left, rightValue);
  }
  const right = plain(rightValue);

  if (typeof left === "number" && typeof right === "number") {
    switch (op) {
      case "+":
        return left + right;
      case "-":
        return left - right;
      case "*":
        return left * right;
      case "**":
        return left ** right;
      case "/":
      case "//":
      case "%":
        if (right === 0) {
          throw new TemplateRuntimeError("division by zero");
        }
        if (op === "/") return left / right;
        if (op === "//") return Math.floor(left / right);
        return ((left % right) + right) % right;
    }
  }

  if (op === "+" && typeof left === "string" && typeof right === "string") {
    return left + right;
  }
  if (op === "+" && Array.isArray(left) && Array.isArray(right)) {
    return [...left, ...right];
  }
  if (op === "*") {
    const [sequence, times] = typeof right === "number" ? [left, right] : [right, left];
    if (typeof times === "number" && Number.isInteger(times)) {
      if (typeof sequence === "string") return sequence.repeat(Math.max(times, 0));
      if (Array.isArray(sequence)) return repeat(sequence, times);
    }
  }
  return unsupported(op, left, right);
}

export function unaryOp(op: "-" | "+", operandValue: unknown): number {
  const operand = plain(operandValue);
  if (typeof operand !== "number") {
    throw new TemplateRuntimeError(`bad operand type for unary ${op}: '${typeName(operand)}'`);
  }
  return op === "-" ? -operand : operand;
}

export function contains(container: unknown, needle: unknown): boolean {
  if (container instanceof Undefined) {
    return false;
  }
  const value = plain(container);
  if (typeof value === "string") {
    const item = plain(needle);
    if (typeof item !== "string") {
      throw new TemplateRuntimeError(`'in <string>' requires string as left operand, not ${typeName(item)}`);
    }
    return value.includes(item);
  }
  if (Array.isArray(value)) {
    return value.some((item) => looseEquals(item, needle));
  }
  const entries = mappingEntries(value);
  if (entries) {
    const key = typeof needle === "string" ? needle : stringify(needle);
    return entries.some(([entryKey]) => entryKey === key);
  }
  throw new TemplateRuntimeError(`argument of type '${typeName(value)}' is not iterable`);
}

export function compareOp(op: string, leftValue: unknown, rightValue: unknown): boolean {
  switch (op) {
    case "==":
      return looseEquals(leftValue, rightValue);
    case "!=":
      return !looseEquals(leftValue, rightValue);
    case "in":
      return contains(rightValue, leftValue);
    case "not in":
      return !contains(rightValue, leftValue);
  }

  const left = plain(leftValue);
  const right = plain(rightValue);
  if (typeof left === "number" && typeof right === "number") {
    return ordered(op, left - right);
  }
  if (typeof left === "string" && typeof right === "string") {
    return ordered(op, left < right ? -1 : left > right ? 1 : 0);
  }
  throw new TemplateRuntimeError(
    `'${op}' not supported between instances of '${typeName(left)}' and '${typeName(right)}'`
  );
}

/**
 * Apply an ordering operator to the sign of a comparison
 */
function ordered(op: string, difference: number): boolean {
  switch (op) {
    case "<":
      return difference < 0;
    case ">":
      return difference > 0;
    case "<=":
      return difference <= 0;
    default:
      return difference >= 0;
  }
}
