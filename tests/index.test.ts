import { describe, it, expect } from "vitest";

import {
  JinjaTemplater,
  PlaceholderTemplater,
  RawTemplater,
  TemplaterConfig,
  hasFatalViolation,
  selectTemplater,
} from "@/index.js";

describe("public API", () => {
  it("selects each built-in variant by name", () => {
    expect(selectTemplater("raw")).toBeInstanceOf(RawTemplater);
    expect(selectTemplater("placeholder")).toBeInstanceOf(PlaceholderTemplater);
    expect(selectTemplater()).toBeInstanceOf(JinjaTemplater);
  });

  it("templates a document configured from YAML", () => {
    const config = TemplaterConfig.fromYaml(
      [
        "templater:",
        "  jinja:",
        "    context:",
        "      schema_name: analytics",
        "      days: '7'",
        "    macros:",
        "      dates: \"{% macro since(n) %}current_date - {{ n }}{% endmacro %}\"",
      ].join("\n")
    );

    const result = selectTemplater("jinja").process(
      "select * from {{ schema_name }}.events where day > {{ since(days) }}\n",
      "events.sql",
      config
    );

    expect(result.output).toBe("select * from analytics.events where day > current_date - 7\n");
    expect(hasFatalViolation(result.violations)).toBe(false);
  });
});
