import { describe, it, expect } from "vitest";
import {
  WeaveError,
  ConfigError,
  TemplaterError,
  TemplateSyntaxError,
  TemplateRuntimeError,
  UndefinedError,
  SecurityError,
  describeError,
} from "../../src/lib/errors.js";

describe("Error Classes", () => {
  describe("WeaveError", () => {
    it("should create a basic error", () => {
      const error = new WeaveError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("WeaveError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(WeaveError);
    });

    it("should have proper stack trace", () => {
      const error = new WeaveError("Test message", "TEST_CODE");
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain("Test message");
    });

    it("should serialize to JSON", () => {
      const error = new WeaveError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "WeaveError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ConfigError", () => {
    it("should create a config error", () => {
      const error = new ConfigError("Unknown templater", { requested: "mako" });
      expect(error.name).toBe("ConfigError");
      expect(error.code).toBe("CONFIG_ERROR");
      expect(error.context).toEqual({ requested: "mako" });
      expect(error).toBeInstanceOf(WeaveError);
    });
  });

  describe("TemplaterError", () => {
    it("should create a templater error", () => {
      const error = new TemplaterError("missing variable");
      expect(error.name).toBe("TemplaterError");
      expect(error.code).toBe("TEMPLATER_ERROR");
      expect(error).toBeInstanceOf(WeaveError);
    });
  });

  describe("TemplateSyntaxError", () => {
    it("should append the line number to the message", () => {
      const error = new TemplateSyntaxError("unexpected end of template", 3);
      expect(error.message).toBe("unexpected end of template (line 3)");
      expect(error.lineno).toBe(3);
      expect(error.code).toBe("TEMPLATE_SYNTAX_ERROR");
      expect(error.context).toEqual({ lineno: 3 });
    });
  });

  describe("runtime errors", () => {
    it("should share the runtime error base", () => {
      const undefinedError = new UndefinedError("'x' is undefined");
      const securityError = new SecurityError("access denied");

      expect(undefinedError).toBeInstanceOf(TemplateRuntimeError);
      expect(undefinedError.code).toBe("UNDEFINED_ERROR");
      expect(undefinedError.name).toBe("UndefinedError");
      expect(securityError).toBeInstanceOf(TemplateRuntimeError);
      expect(securityError.code).toBe("SECURITY_ERROR");
      expect(new TemplateRuntimeError("boom").code).toBe("TEMPLATE_RUNTIME_ERROR");
    });
  });

  describe("describeError", () => {
    it("should use the message of errors", () => {
      expect(describeError(new Error("broken"))).toBe("broken");
    });

    it("should stringify other values", () => {
      expect(describeError("plain")).toBe("plain");
      expect(describeError(42)).toBe("42");
    });
  });
});
