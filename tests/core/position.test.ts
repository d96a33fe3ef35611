import { describe, it, expect } from "vitest";

import { createPositionMarker, locateIdentifier } from "@/core/position.js";
import { fatalViolation, hasFatalViolation, undefinedVariableViolation } from "@/core/violation.js";

describe("locateIdentifier", () => {
  it("uses the first occurrence on the line", () => {
    const position = locateIdentifier("select {{ foo }}", 1, "foo");
    expect(position).toEqual({ segmentOwner: null, line: 1, column: 11, absoluteOffset: 11 });
  });

  it("adds the lengths of preceding lines and their newlines", () => {
    const source = "select 1\nfrom t\nwhere {{ col }} = 1";
    const position = locateIdentifier(source, 3, "col");
    // "select 1\n" is 9 characters, "from t\n" is 7
    expect(position.column).toBe(10);
    expect(position.absoluteOffset).toBe(9 + 7 + 10);
  });

  it("matches inside an earlier token on the same line", () => {
    const position = locateIdentifier("select id_list, {{ id }}", 1, "id");
    expect(position.column).toBe(8);
  });

  it("falls back to column 1 when the identifier is absent", () => {
    const position = locateIdentifier("a\nb", 2, "zzz");
    expect(position.column).toBe(1);
    expect(position.absoluteOffset).toBe(3);
  });

  it("returns frozen markers", () => {
    expect(Object.isFrozen(createPositionMarker(1, 1, 1))).toBe(true);
  });
});

describe("violations", () => {
  it("formats undefined variable messages", () => {
    const violation = undefinedVariableViolation("foo", createPositionMarker(1, 11, 11));
    expect(violation.code).toBe("undefined-variable");
    expect(violation.message).toBe("Undefined template variable: 'foo'");
    expect(violation.position?.column).toBe(11);
  });

  it("creates fatal violations without a position", () => {
    const violation = fatalViolation("Failure in parsing template: boom");
    expect(violation).toEqual({ code: "fatal", message: "Failure in parsing template: boom", position: null });
    expect(hasFatalViolation([violation])).toBe(true);
    expect(hasFatalViolation([])).toBe(false);
  });
});
