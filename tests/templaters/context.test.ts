import { describe, it, expect } from "vitest";

import { TemplaterConfig } from "@/config/config.js";
import { ConfigError } from "@/lib/errors.js";
import { ContextBuilder, DEFAULT_CONTEXT } from "@/templaters/context.js";

describe("ContextBuilder", () => {
  it("starts from the defaults", () => {
    const context = new ContextBuilder("jinja").build();
    expect([...context]).toEqual([["test_value", "__test__"]]);
    expect(DEFAULT_CONTEXT).toEqual({ test_value: "__test__" });
  });

  it("infers types of configured text values", () => {
    const config = new TemplaterConfig({
      templater: {
        jinja: { context: { limit: "10", columns: "['a', 'b']", schema_name: "analytics", enabled: true } },
      },
    });

    const context = new ContextBuilder("jinja").build("model.sql", config);

    expect(context.get("limit")).toBe(10);
    expect(context.get("columns")).toEqual(["a", "b"]);
    expect(context.get("schema_name")).toBe("analytics");
    expect(context.get("enabled")).toBe(true);
  });

  it("reads only its own variant's section", () => {
    const config = new TemplaterConfig({
      templater: { placeholder: { context: { table: "users" } } },
    });
    expect(new ContextBuilder("jinja").build(undefined, config).has("table")).toBe(false);
    expect(new ContextBuilder("placeholder").build(undefined, config).get("table")).toBe("users");
  });

  it("applies layers in priority order", () => {
    const config = new TemplaterConfig({
      templater: { jinja: { context: { test_value: "from-config", limit: "5" } } },
    });
    const builder = new ContextBuilder("jinja", { limit: "7" });

    const context = builder.build(undefined, config);

    expect(context.get("test_value")).toBe("from-config");
    // overrides are never inferred
    expect(context.get("limit")).toBe("7");
  });

  it("does not share overrides with the caller's object", () => {
    const overrides: Record<string, unknown> = { a: 1 };
    const builder = new ContextBuilder("jinja", overrides);
    overrides["a"] = 2;
    expect(builder.build().get("a")).toBe(1);
  });

  it("raises ConfigError for a malformed section", () => {
    const config = new TemplaterConfig({ templater: { jinja: { context: "not-a-mapping" } } });
    expect(() => new ContextBuilder("jinja").build(undefined, config)).toThrow(ConfigError);
  });
});
