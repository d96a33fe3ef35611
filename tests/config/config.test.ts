import { describe, it, expect } from "vitest";

import {
  TemplaterConfig,
  readTemplaterSection,
  templaterSectionPath,
} from "@/config/config.js";
import { ContextSectionSchema, MacroSectionSchema } from "@/config/schema.js";
import { ConfigError } from "@/lib/errors.js";

describe("TemplaterConfig", () => {
  describe("getSection", () => {
    const config = new TemplaterConfig({
      templater: {
        jinja: { context: { schema_name: "analytics", limit: "10" } },
      },
    });

    it("walks a key path", () => {
      expect(config.getSection(["templater", "jinja", "context"])).toEqual({
        schema_name: "analytics",
        limit: "10",
      });
    });

    it("returns undefined for a missing step", () => {
      expect(config.getSection(["templater", "placeholder", "context"])).toBeUndefined();
      expect(config.getSection(["templater", "jinja", "context", "schema_name", "deeper"])).toBeUndefined();
    });

    it("ignores inherited properties", () => {
      expect(config.getSection(["templater", "toString"])).toBeUndefined();
    });
  });

  describe("fromYaml", () => {
    it("parses a YAML document", () => {
      const config = TemplaterConfig.fromYaml(
        ["templater:", "  placeholder:", "    context:", "      city_id: '42'"].join("\n")
      );
      expect(config.getSection(["templater", "placeholder", "context"])).toEqual({ city_id: "42" });
    });

    it("treats an empty document as empty config", () => {
      const config = TemplaterConfig.fromYaml("");
      expect(config.getSection(["templater"])).toBeUndefined();
    });

    it("rejects a non-mapping root", () => {
      expect(() => TemplaterConfig.fromYaml("- a\n- b\n")).toThrow("Configuration root must be a mapping");
    });

    it("wraps YAML syntax errors", () => {
      expect(() => TemplaterConfig.fromYaml("templater: [unclosed")).toThrow(ConfigError);
      expect(() => TemplaterConfig.fromYaml("templater: [unclosed")).toThrow(/^Invalid YAML configuration: /);
    });
  });
});

describe("templaterSectionPath", () => {
  it("builds the section path for a variant", () => {
    expect(templaterSectionPath("jinja", "macros")).toEqual(["templater", "jinja", "macros"]);
  });
});

describe("readTemplaterSection", () => {
  it("reads an absent section as empty", () => {
    expect(readTemplaterSection(undefined, "jinja", "context", ContextSectionSchema)).toEqual({});
    expect(readTemplaterSection(new TemplaterConfig(), "jinja", "macros", MacroSectionSchema)).toEqual({});
  });

  it("returns validated macro definitions", () => {
    const config = new TemplaterConfig({
      templater: { jinja: { macros: { helpers: "{% macro one() %}1{% endmacro %}" } } },
    });
    expect(readTemplaterSection(config, "jinja", "macros", MacroSectionSchema)).toEqual({
      helpers: "{% macro one() %}1{% endmacro %}",
    });
  });

  it("rejects macro definitions that are not text", () => {
    const config = new TemplaterConfig({ templater: { jinja: { macros: { helpers: 5 } } } });
    expect(() => readTemplaterSection(config, "jinja", "macros", MacroSectionSchema)).toThrow(
      "Invalid configuration section 'templater.jinja.macros': helpers: Macro definitions must be template strings"
    );
  });

  it("rejects a section that is not a mapping", () => {
    const config = new TemplaterConfig({ templater: { jinja: { context: ["a", "b"] } } });
    expect(() => readTemplaterSection(config, "jinja", "context", ContextSectionSchema)).toThrow(ConfigError);
  });
});
