import { describe, it, expect } from "vitest";

import { Environment, MAX_RANGE } from "@/engine/environment.js";
import { Macro } from "@/engine/runtime.js";
import { SecurityError, TemplateRuntimeError, UndefinedError } from "@/lib/errors.js";

describe("Environment", () => {
  const env = new Environment({ extensions: ["do"] });

  function render(source: string, context: Record<string, unknown> = {}): string {
    return env.fromString(source).render(context);
  }

  describe("expressions", () => {
    it("renders variables and literals", () => {
      expect(render("select {{ col }} from {{ 'users' }}", { col: "id" })).toBe("select id from users");
    });

    it("renders undefined names as empty text", () => {
      expect(render("[{{ missing }}]")).toBe("[]");
    });

    it("does arithmetic and concatenation", () => {
      expect(render("{{ 7 // 2 }} {{ 7 % 3 }} {{ 2 ** 3 }} {{ 1 ~ 'x' }} {{ -4 + 1 }}")).toBe("3 1 8 1x -3");
    });

    it("renders booleans, lists and mappings", () => {
      expect(render("{{ 1 < 2 < 3 }} {{ [1, 'a'] }} {{ {'k': 2} }}")).toBe("true [1, 'a'] {'k': 2}");
    });

    it("evaluates membership and logic", () => {
      expect(render("{{ 'a' in ['a'] }} {{ 2 not in [1] }} {{ 0 or 'x' }} {{ 1 and 0 }}")).toBe("true true x 0");
    });

    it("evaluates conditional expressions", () => {
      expect(render("{{ 'y' if flag else 'n' }}", { flag: false })).toBe("n");
      expect(render("[{{ 'y' if flag }}]", { flag: false })).toBe("[]");
    });

    it("reads attributes and items", () => {
      const context = { row: { id: 7, tags: ["a", "b"] } };
      expect(render("{{ row.id }} {{ row['tags'][1] }} {{ row.tags.0 }}", context)).toBe("7 b a");
      expect(render("{{ {'a': 1}['a'] }}")).toBe("1");
    });

    it("calls safe string methods", () => {
      expect(render("{{ 'Hello'.upper() }} {{ ' x '.strip() }} {{ 'a,b'.split(',') }}")).toBe("HELLO x ['a', 'b']");
    });

    it("applies filters", () => {
      expect(render("{{ 'a,b' | replace(',', ' ') | title }}")).toBe("A B");
      expect(render("{{ missing | default('x') }}")).toBe("x");
      expect(render("{{ [3, 1, 2] | sort | join(',') }}")).toBe("1,2,3");
      expect(render("{{ items | length }}", { items: [1, 2] })).toBe("2");
      expect(render("{{ '42' | int + 1 }}")).toBe("43");
      expect(render("{{ [1, 1, 2] | unique | list }}")).toBe("[1, 2]");
      expect(render("{{ 2.567 | round(2) }}")).toBe("2.57");
    });

    it("slices strings and lists", () => {
      const context = { s: "abcdef", items: [1, 2, 3, 4] };
      expect(render("{{ s[0:2] }} {{ s[-2:] }} {{ s[::-1] }} {{ s[:3] }}", context)).toBe("ab ef fedcba abc");
      expect(render("{{ items[1:3] }} {{ items[::2] }} {{ items[5:] }}", context)).toBe("[2, 3] [1, 3] []");
    });

    it("formats strings with the percent operator", () => {
      expect(render("{{ '%s-%s' % ('a', 1) }}")).toBe("a-1");
      expect(render("{{ 'id = %d' % n }}", { n: 7.9 })).toBe("id = 7");
      expect(render("{{ '%(t)s.%(c)s' % {'t': 'users', 'c': 'id'} }}")).toBe("users.id");
      expect(render("{{ '%05.1f|%-4s|%r|%%' % (3.14159, 'ab', 'x') }}")).toBe("003.1|ab  |'x'|%");
    });

    it("applies tests", () => {
      expect(render("{{ x is defined }} {{ y is defined }} {{ 4 is even }} {{ 9 is divisibleby(3) }}", { x: 1 })).toBe(
        "true false true true"
      );
    });
  });

  describe("statements", () => {
    it("picks the matching if branch", () => {
      const source = "{% if n > 1 %}big{% elif n == 1 %}one{% else %}none{% endif %}";
      expect(render(source, { n: 5 })).toBe("big");
      expect(render(source, { n: 1 })).toBe("one");
      expect(render(source, { n: 0 })).toBe("none");
    });

    it("loops with the loop object", () => {
      const source = "{% for c in cols %}{{ c }}{% if not loop.last %}, {% endif %}{% endfor %}";
      expect(render(source, { cols: ["a", "b", "c"] })).toBe("a, b, c");
      expect(render("{% for x in 'ab' %}{{ loop.index }}{{ x }}{% endfor %}")).toBe("1a2b");
      expect(render("{% for x in [1, 2, 3] %}{{ loop.cycle('o', 'e') }}{% endfor %}")).toBe("oeo");
    });

    it("filters loop items and falls back to else", () => {
      expect(render("{% for n in range(6) if n is even %}{{ n }}{% endfor %}")).toBe("024");
      expect(render("{% for x in [] %}x{% else %}empty{% endfor %}")).toBe("empty");
    });

    it("iterates mapping keys and unpacks items", () => {
      const context = { cols: { id: "int", name: "text" } };
      expect(render("{% for k in cols %}{{ k }};{% endfor %}", context)).toBe("id;name;");
      expect(render("{% for k, v in cols.items() %}{{ k }} {{ v }};{% endfor %}", context)).toBe("id int;name text;");
    });

    it("keeps loop variables inside the loop", () => {
      expect(render("{% for x in [1] %}{% set y = x %}{% endfor %}[{{ x }}{{ y }}]")).toBe("[]");
    });

    it("assigns with set", () => {
      expect(render("{% set a, b = 1, 2 %}{{ a + b }}")).toBe("3");
      expect(render("{% set greeting %}hi {{ who }}{% endset %}{{ greeting | upper }}", { who: "bo" })).toBe(
        "HI BO"
      );
    });

    it("calls macros with defaults, keywords and varargs", () => {
      const macro =
        "{% macro col(name, alias=none) %}{{ name }}{% if alias %} as {{ alias }}{% endif %}{% endmacro %}";
      expect(render(`${macro}{{ col('id') }}, {{ col('nm', alias='name') }}`)).toBe("id, nm as name");
      expect(render("{% macro j() %}{{ varargs | join('-') }}{% endmacro %}{{ j(1, 2, 3) }}")).toBe("1-2-3");
    });

    it("runs do statements for their side effects", () => {
      expect(render("{% set xs = [] %}{% do xs.append(1) %}{% do xs.extend([2]) %}{{ xs }}")).toBe("[1, 2]");
    });

    it("keeps raw blocks and drops comments", () => {
      expect(render("{% raw %}{{ x }}{% endraw %}{# gone #}!")).toBe("{{ x }}!");
    });
  });

  describe("errors", () => {
    it("raises on calling an undefined name", () => {
      expect(() => render("{{ missing() }}")).toThrow(UndefinedError);
      expect(() => render("{{ missing() }}")).toThrow("'missing' is undefined");
    });

    it("raises on attribute access of an undefined name", () => {
      expect(() => render("{{ missing.attr }}")).toThrow(UndefinedError);
    });

    it("refuses to call plain values", () => {
      expect(() => render("{{ name() }}", { name: "x" })).toThrow("'str' object is not callable");
    });

    it("reports arithmetic on mismatched types", () => {
      expect(() => render("{{ 1 + 'a' }}")).toThrow("unsupported operand type(s) for +: 'int' and 'str'");
      expect(() => render("{{ 1 // 0 }}")).toThrow(TemplateRuntimeError);
    });

    it("rejects bad slices and format arguments", () => {
      expect(() => render("{{ s[::0] }}", { s: "ab" })).toThrow("slice step cannot be zero");
      expect(() => render("{{ s['a':] }}", { s: "ab" })).toThrow("slice indices must be integers or none, not 'str'");
      expect(() => render("{{ '%s %s' % 'a' }}")).toThrow("not enough arguments for format string");
      expect(() => render("{{ '%s' % ('a', 'b') }}")).toThrow("not all arguments converted during string formatting");
      expect(() => render("{{ '%d' % 'a' }}")).toThrow("%d format: a real number is required, not 'str'");
    });

    it("raises on divisibility by zero", () => {
      expect(() => render("{{ 4 is divisibleby 0 }}")).toThrow("division by zero");
    });

    it("reports bad unpacking", () => {
      expect(() => render("{% set a, b = [1] %}")).toThrow("not enough values to unpack (expected 2, got 1)");
    });
  });

  describe("sandbox", () => {
    it("blocks underscore attributes", () => {
      expect(() => render("{{ ''.__class__ }}")).toThrow(SecurityError);
      expect(() => render("{{ ''.__class__ }}")).toThrow("access to attribute '__class__' of 'str' object is unsafe");
    });

    it("does not expose inherited properties", () => {
      expect(render("[{{ cfg.constructor }}]", { cfg: {} })).toBe("[]");
      expect(() => render("{{ cfg.constructor() }}", { cfg: {} })).toThrow(UndefinedError);
    });

    it("never runs property getters", () => {
      const cfg = Object.defineProperty({}, "secret", { get: () => "leaked", enumerable: true });
      expect(render("[{{ cfg.secret }}]", { cfg })).toBe("[]");
    });

    it("caps range sizes", () => {
      expect(() => render(`{{ range(${MAX_RANGE + 1}) | length }}`)).toThrow(SecurityError);
      expect(render("{{ range(2, 8, 3) | join(',') }}")).toBe("2,5");
    });
  });

  describe("options", () => {
    it("drops a single trailing newline by default", () => {
      expect(new Environment().fromString("a\n").render()).toBe("a");
      expect(new Environment({ keepTrailingNewline: true }).fromString("a\n").render()).toBe("a\n");
    });

    it("escapes output when autoescape is on", () => {
      const escaping = new Environment({ autoescape: true });
      expect(escaping.fromString("{{ v }}{{ v | safe }}").render({ v: "<b>" })).toBe("&lt;b&gt;<b>");
    });

    it("accepts a Map as context", () => {
      expect(env.fromString("{{ a }}").render(new Map([["a", 1]]))).toBe("1");
    });

    it("makes globals visible to every template", () => {
      const local = new Environment();
      local.globals.set("schema", "analytics");
      expect(local.fromString("{{ schema }}.t").render()).toBe("analytics.t");
    });
  });

  describe("exports", () => {
    it("returns top-level names after running the template", () => {
      const template = env.fromString("{% set x = 1 %}{% macro m() %}m{% endmacro %}");
      const exported = template.exports();
      expect([...exported.keys()]).toEqual(["x", "m"]);
      expect(exported.get("x")).toBe(1);
      expect(exported.get("m")).toBeInstanceOf(Macro);
      expect([...template.macros().keys()]).toEqual(["m"]);
    });
  });
});
