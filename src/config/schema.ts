import { z } from "zod";

/**
 * Kind tag under which all templater configuration lives
 */
export const TEMPLATER_SECTION = "templater";

/**
 * Sub-sections a templater variant reads
 */
export const TemplaterSectionSchema = z.enum(["context", "macros"]);

/**
 * Root of a configuration document
 */
export const ConfigRootSchema = z.record(z.string(), z.unknown());

/**
 * Variables supplied to templates; text values go through type inference
 */
export const ContextSectionSchema = z.record(z.string(), z.unknown());

/**
 * Macro definitions, each a template string in the engine's own syntax
 */
export const MacroSectionSchema = z.record(
  z.string(),
  z.string({ invalid_type_error: "Macro definitions must be template strings" })
);

export type TemplaterSection = z.infer<typeof TemplaterSectionSchema>;
export type ContextSection = z.infer<typeof ContextSectionSchema>;
export type MacroSection = z.infer<typeof MacroSectionSchema>;
