import * as fc from "fast-check";
import { describe, it, expect } from "vitest";

import { TemplaterConfig } from "@/config/config.js";
import { JinjaTemplater } from "@/templaters/jinja.js";
import { RawTemplater } from "@/templaters/raw.js";

describe("RawTemplater", () => {
  const templater = new RawTemplater();

  it("passes engine syntax through unrendered", () => {
    expect(templater.process("select {{ col }} from {% if x %}t{% endif %}")).toEqual({
      output: "select {{ col }} from {% if x %}t{% endif %}",
      violations: [],
    });
  });

  it("ignores configuration", () => {
    const config = new TemplaterConfig({ templater: { raw: { context: { col: "id" } } } });
    expect(templater.process("{{ col }}", "model.sql", config).output).toBe("{{ col }}");
  });

  it("returns every input unchanged", () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        expect(templater.process(text)).toEqual({ output: text, violations: [] });
      })
    );
  });

  it("compares variants by class", () => {
    expect(templater.equalVariant(new RawTemplater())).toBe(true);
    expect(templater.equalVariant(new JinjaTemplater())).toBe(false);
  });
});
