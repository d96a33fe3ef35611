import { TemplateRuntimeError } from "../lib/errors.js";

import {
  SafeString,
  Undefined,
  isCallable,
  isMapping,
  isTruthy,
  isUndefined,
  looseEquals,
  mappingEntries,
  stringify,
  toIterable,
  typeName,
} from "./runtime.js";

import type { CallArguments } from "./runtime.js";

/**
 * Transforms a value: `{{ value | name(args) }}`
 */
export type FilterHandler = (value: unknown, call: CallArguments) => unknown;

/**
 * Checks a value: `{% if value is name(args) %}`
 */
export type TestHandler = (value: unknown, call: CallArguments) => boolean;

/**
 * Positional argument at `index`, or the keyword `name`
 */
function argument(call: CallArguments, index: number, name: string): unknown {
  return index < call.args.length ? call.args[index] : call.kwargs.get(name);
}

function numberArgument(call: CallArguments, index: number, name: string, fallback: number): number {
  const value = argument(call, index, name);
  if (value === undefined) return fallback;
  if (typeof value !== "number") {
    throw new TemplateRuntimeError(`argument '${name}' must be a number, got '${typeName(value)}'`);
  }
  return value;
}

function length(value: unknown): number {
  if (isUndefined(value)) return 0;
  if (typeof value === "string") return value.length;
  if (value instanceof SafeString) return value.value.length;
  if (Array.isArray(value)) return value.length;
  const entries = mappingEntries(value);
  if (entries) return entries.length;
  throw new TemplateRuntimeError(`object of type '${typeName(value)}' has no len()`);
}

function toNumber(value: unknown, integer: boolean): number | null {
  if (typeof value === "number") {
    return integer ? Math.trunc(value) : value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  const text = stringify(value).trim().replace(/_/g, "");
  if (text.length === 0) return null;
  const parsed = Number(text);
  if (Number.isNaN(parsed)) return null;
  return integer ? Math.trunc(parsed) : parsed;
}

function sortKey(value: unknown, caseSensitive: boolean): string | number {
  if (typeof value === "number") return value;
  const text = stringify(value);
  return caseSensitive ? text : text.toLowerCase();
}

function compareKeys(left: string | number, right: string | number): number {
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

function titleCase(text: string): string {
  return text.replace(/[A-Za-z0-9]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function roundNumber(value: number, precision: number, method: string): number {
  const factor = 10 ** precision;
  switch (method) {
    case "common":
      return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
    case "ceil":
      return Math.ceil(value * factor) / factor;
    case "floor":
      return Math.floor(value * factor) / factor;
    default:
      throw new TemplateRuntimeError("method must be common, ceil or floor");
  }
}

const defaultFilter: FilterHandler = (value, call) => {
  const fallback = argument(call, 0, "default_value") ?? "";
  const useBoolean = isTruthy(argument(call, 1, "boolean"));
  if (isUndefined(value) || (useBoolean && !isTruthy(value))) {
    return fallback;
  }
  return value;
};

/**
 * Filters every environment starts with
 */
export const BUILTIN_FILTERS: ReadonlyMap<string, FilterHandler> = new Map<string, FilterHandler>([
  ["upper", (value) => stringify(value).toUpperCase()],
  ["lower", (value) => stringify(value).toLowerCase()],
  ["trim", (value) => stringify(value).trim()],
  ["title", (value) => titleCase(stringify(value))],
  ["capitalize", (value) => {
    const text = stringify(value);
    return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
  }],
  ["default", defaultFilter],
  ["d", defaultFilter],
  ["join", (value, call) => {
    const separator = argument(call, 0, "d");
    return toIterable(value)
      .map(stringify)
      .join(separator === undefined ? "" : stringify(separator));
  }],
  ["length", (value) => length(value)],
  ["count", (value) => length(value)],
  ["replace", (value, call) => {
    const text = stringify(value);
    const search = stringify(argument(call, 0, "old"));
    const replacement = stringify(argument(call, 1, "new"));
    const limit = argument(call, 2, "count");
    if (search.length === 0) {
      return text;
    }
    const parts = text.split(search);
    if (typeof limit !== "number" || limit < 0 || limit >= parts.length - 1) {
      return parts.join(replacement);
    }
    return parts.slice(0, limit + 1).join(replacement) + search + parts.slice(limit + 1).join(search);
  }],
  ["first", (value) => {
    const items = toIterable(value);
    return items.length > 0 ? items[0] : new Undefined("No first item, sequence was empty.");
  }],
  ["last", (value) => {
    const items = toIterable(value);
    return items.length > 0 ? items[items.length - 1] : new Undefined("No last item, sequence was empty.");
  }],
  ["int", (value, call) => toNumber(value, true) ?? numberArgument(call, 0, "default", 0)],
  ["float", (value, call) => toNumber(value, false) ?? numberArgument(call, 0, "default", 0)],
  ["string", (value) => stringify(value)],
  ["list", (value) => [...toIterable(value)]],
  ["sort", (value, call) => {
    const reverse = isTruthy(argument(call, 0, "reverse"));
    const caseSensitive = isTruthy(argument(call, 1, "case_sensitive"));
    const sorted = [...toIterable(value)].sort((a, b) =>
      compareKeys(sortKey(a, caseSensitive), sortKey(b, caseSensitive))
    );
    return reverse ? sorted.reverse() : sorted;
  }],
  ["unique", (value) => {
    const result: unknown[] = [];
    for (const item of toIterable(value)) {
      if (!result.some((seen) => looseEquals(seen, item))) {
        result.push(item);
      }
    }
    return result;
  }],
  ["reverse", (value) => {
    if (typeof value === "string") {
      return [...value].reverse().join("");
    }
    return [...toIterable(value)].reverse();
  }],
  ["round", (value, call) => {
    const number = toNumber(value, false) ?? 0;
    const method = argument(call, 1, "method");
    return roundNumber(number, numberArgument(call, 0, "precision", 0), method === undefined ? "common" : stringify(method));
  }],
  ["abs", (value) => {
    if (typeof value !== "number") {
      throw new TemplateRuntimeError(`bad operand type for abs(): '${typeName(value)}'`);
    }
    return Math.abs(value);
  }],
  ["safe", (value) => new SafeString(stringify(value))],
]);

/**
 * Tests every environment starts with
 */
export const BUILTIN_TESTS: ReadonlyMap<string, TestHandler> = new Map<string, TestHandler>([
  ["defined", (value) => !isUndefined(value)],
  ["undefined", (value) => isUndefined(value)],
  ["none", (value) => value === null],
  ["number", (value) => typeof value === "number"],
  ["string", (value) => typeof value === "string" || value instanceof SafeString],
  ["mapping", (value) => value instanceof Map || isMapping(value)],
  ["sequence", (value) =>
    typeof value === "string" || value instanceof SafeString || Array.isArray(value) || mappingEntries(value) !== null],
  ["iterable", (value) =>
    typeof value === "string" || value instanceof SafeString || Array.isArray(value) || mappingEntries(value) !== null],
  ["even", (value) => typeof value === "number" && value % 2 === 0],
  ["odd", (value) => typeof value === "number" && Math.abs(value % 2) === 1],
  ["divisibleby", (value, call) => {
    const divisor = numberArgument(call, 0, "num", 1);
    if (divisor === 0) {
      throw new TemplateRuntimeError("division by zero");
    }
    return typeof value === "number" && value % divisor === 0;
  }],
  ["callable", (value) => isCallable(value)],
]);
