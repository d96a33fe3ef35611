import type { PositionMarker } from "./position.js";

/**
 * Kinds of templating diagnostics
 */
export type ViolationCode = "undefined-variable" | "fatal";

/**
 * A templating-level diagnostic
 */
export interface TemplaterViolation {
  readonly code: ViolationCode;
  readonly message: string;
  readonly position: PositionMarker | null;
}

/**
 * Recoverable finding: a variable the template reads but nothing defines
 */
export function undefinedVariableViolation(name: string, position: PositionMarker): TemplaterViolation {
  return Object.freeze({
    code: "undefined-variable",
    message: `Undefined template variable: '${name}'`,
    position,
  });
}

/**
 * Document-level failure; the templater produced no output
 */
export function fatalViolation(message: string): TemplaterViolation {
  return Object.freeze({ code: "fatal", message, position: null });
}

/**
 * Whether any violation in the list stopped the document from rendering
 */
export function hasFatalViolation(violations: readonly TemplaterViolation[]): boolean {
  return violations.some((violation) => violation.code === "fatal");
}
