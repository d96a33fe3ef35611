import * as fc from "fast-check";
import { describe, it, expect } from "vitest";

import { inferType, parseLiteral } from "@/templaters/literal.js";
import { TemplaterError } from "@/lib/errors.js";

describe("parseLiteral", () => {
  it.each([
    ["42", 42],
    ["-7", -7],
    ["+3", 3],
    ["1_000", 1000],
    ["0x1f", 31],
    ["0o17", 15],
    ["0b101", 5],
    ["3.5", 3.5],
    [".5", 0.5],
    ["1e3", 1000],
    ["2.5e-1", 0.25],
  ])("parses the number %s", (text, expected) => {
    expect(parseLiteral(text)).toEqual({ success: true, data: expected });
  });

  it.each([
    ["True", true],
    ["true", true],
    ["False", false],
    ["false", false],
    ["None", null],
  ])("parses the keyword %s", (text, expected) => {
    expect(parseLiteral(text)).toEqual({ success: true, data: expected });
  });

  it("parses quoted strings with escapes", () => {
    expect(parseLiteral("'it\\'s'")).toEqual({ success: true, data: "it's" });
    expect(parseLiteral('"a\\tb"')).toEqual({ success: true, data: "a\tb" });
    expect(parseLiteral("'\\x41\\u0042'")).toEqual({ success: true, data: "AB" });
    expect(parseLiteral("'C:\\data'")).toEqual({ success: true, data: "C:\\data" });
  });

  it("parses lists, tuples and mappings", () => {
    expect(parseLiteral("[1, 'two', [3]]")).toEqual({ success: true, data: [1, "two", [3]] });
    expect(parseLiteral("(1, 2)")).toEqual({ success: true, data: [1, 2] });
    expect(parseLiteral("(1,)")).toEqual({ success: true, data: [1] });
    expect(parseLiteral("(5)")).toEqual({ success: true, data: 5 });
    expect(parseLiteral("{'a': 1, 2: [True]}")).toEqual({ success: true, data: { a: 1, "2": [true] } });
  });

  it("allows surrounding whitespace", () => {
    expect(parseLiteral("  [1 ,2 ]  ")).toEqual({ success: true, data: [1, 2] });
  });

  it.each(["select", "01", "1 + 1", "[1, 2", "'open", "{[1]: 2}", "__import__('os')", "", "12abc"])(
    "rejects %j",
    (text) => {
      const result = parseLiteral(text);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(TemplaterError);
      }
    }
  );

  it("rejects integers that lose precision", () => {
    expect(parseLiteral("12345678901234567890").success).toBe(false);
  });
});

describe("inferType", () => {
  it("returns parsed values", () => {
    expect(inferType("10")).toBe(10);
    expect(inferType("[1, 2]")).toEqual([1, 2]);
  });

  it("keeps text that is not a literal", () => {
    expect(inferType("analytics")).toBe("analytics");
    expect(inferType("null")).toBe("null");
    expect(inferType("12345678901234567890")).toBe("12345678901234567890");
    expect(inferType("os.system('x')")).toBe("os.system('x')");
  });

  it("round-trips safe integers", () => {
    fc.assert(
      fc.property(fc.integer({ min: -1_000_000_000, max: 1_000_000_000 }), (n) => {
        expect(inferType(String(n))).toBe(n);
      })
    );
  });

  it("never throws", () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        expect(() => inferType(text)).not.toThrow();
      })
    );
  });

  it("keeps bare lowercase words that are not keywords", () => {
    const word = fc
      .stringOf(fc.constantFrom(..."abcdefghijklmnopqrstuvwxyz".split("")), { minLength: 1, maxLength: 12 })
      .filter((text) => !["true", "false"].includes(text));
    fc.assert(
      fc.property(word, (text) => {
        expect(inferType(text)).toBe(text);
      })
    );
  });
});
