import { describe, it, expect } from "vitest";

import { findNameReferences, findUndeclaredVariables } from "@/engine/analysis.js";
import { Environment } from "@/engine/environment.js";

describe("findUndeclaredVariables", () => {
  const env = new Environment({ extensions: ["do"] });

  function undeclared(source: string): string[] {
    return [...findUndeclaredVariables(env.parse(source))].sort();
  }

  it("ignores names declared by set and for", () => {
    const source = "{{ a }}{% set b = 1 %}{{ b }}{% for x in items %}{{ x }}{{ loop.index }}{% endfor %}";
    expect(undeclared(source)).toEqual(["a", "items"]);
  });

  it("counts reads before a later declaration", () => {
    expect(undeclared("{{ b }}{% set b = 1 %}")).toEqual(["b"]);
  });

  it("scopes loop targets to the loop body", () => {
    expect(undeclared("{% for x in xs %}{% endfor %}{{ x }}")).toEqual(["x", "xs"]);
  });

  it("treats macro parameters as declared inside the macro", () => {
    expect(undeclared("{% macro m(p, q=r) %}{{ p }}{{ q }}{{ s }}{{ varargs }}{% endmacro %}{{ m(1) }}")).toEqual([
      "r",
      "s",
    ]);
  });

  it("looks inside filters, tests, calls and subscripts", () => {
    expect(undeclared("{{ f(a, k=b) | join(c) }}{% if d is divisibleby e %}{{ g[h].i }}{% endif %}")).toEqual([
      "a",
      "b",
      "c",
      "d",
      "e",
      "f",
      "g",
      "h",
    ]);
  });
});

describe("findNameReferences", () => {
  const env = new Environment();

  it("returns every load of the requested names in document order", () => {
    const root = env.parse("{{ a }}\n{% if a %}{{ b }}{{ a.x }}{% endif %}\n{{ c ~ a }}");
    const references = findNameReferences(root, new Set(["a", "c"]));
    expect(references.map((ref) => [ref.name, ref.lineno])).toEqual([
      ["a", 1],
      ["a", 2],
      ["a", 2],
      ["c", 3],
      ["a", 3],
    ]);
  });

  it("skips stores and parameters", () => {
    const root = env.parse("{% set a = 1 %}{% macro m(a) %}{% endmacro %}{% for a in [] %}{% endfor %}");
    expect(findNameReferences(root, new Set(["a"]))).toEqual([]);
  });

  it("handles deeply nested templates", () => {
    const depth = 500;
    const source = "{% if x %}".repeat(depth) + "{{ y }}" + "{% endif %}".repeat(depth);
    const references = findNameReferences(env.parse(source), new Set(["y"]));
    expect(references).toHaveLength(1);
  });
});
