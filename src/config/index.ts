/**
 * Configuration consumed by templaters
 *
 * Values live under `templater.<variant>.context` and `templater.<variant>.macros`.
 */

export {
  TemplaterConfig,
  isMapping,
  readTemplaterSection,
  templaterSectionPath,
  type ConfigSource,
} from "./config.js";

export {
  TEMPLATER_SECTION,
  TemplaterSectionSchema,
  ConfigRootSchema,
  ContextSectionSchema,
  MacroSectionSchema,
  type TemplaterSection,
  type ContextSection,
  type MacroSection,
} from "./schema.js";
