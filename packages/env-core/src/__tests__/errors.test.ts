import { describe, it, expect } from "vitest";
import {
  ENV_ERROR_CODES,
  EXIT_CODES,
  EnvError,
  NotSetError,
  ParseError,
  isEnvError,
  mapEnvErrorToExitCode,
  serializeEnvError,
} from "../errors";

describe("Env errors", () => {
  describe("ENV_ERROR_CODES", () => {
    it("should contain expected error codes", () => {
      expect(ENV_ERROR_CODES.E_ENV_MISSING_VAR).toBe("E_ENV_MISSING_VAR");
      expect(ENV_ERROR_CODES.E_ENV_PARSE).toBe("E_ENV_PARSE");
    });
  });

  describe("mapEnvErrorToExitCode", () => {
    it("should map env errors to CONFIG exit code", () => {
      expect(mapEnvErrorToExitCode(ENV_ERROR_CODES.E_ENV_MISSING_VAR)).toBe(78);
      expect(mapEnvErrorToExitCode(ENV_ERROR_CODES.E_ENV_PARSE)).toBe(EXIT_CODES.CONFIG);
    });

    it("should map unknown codes to GENERIC exit code", () => {
      expect(mapEnvErrorToExitCode("UNKNOWN_ERROR")).toBe(EXIT_CODES.GENERIC);
    });
  });

  describe("NotSetError", () => {
    it("should carry the key and missing-var code", () => {
      const error = new NotSetError("USERNAME");

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(EnvError);
      expect(error.name).toBe("NotSetError");
      expect(error.code).toBe(ENV_ERROR_CODES.E_ENV_MISSING_VAR);
      expect(error.key).toBe("USERNAME");
      expect(error.message).toBe("Environment variable `USERNAME` is not set");
      expect(error.details).toBeUndefined();
    });

    it("should preserve stack trace", () => {
      const error = new NotSetError("USERNAME");

      expect(error.stack).toBeDefined();
      expect(error.stack).toContain("NotSetError");
    });
  });

  describe("ParseError", () => {
    it("should carry key, value and target type", () => {
      const error = new ParseError("PORT", "abc", "int");

      expect(error).toBeInstanceOf(EnvError);
      expect(error.name).toBe("ParseError");
      expect(error.code).toBe(ENV_ERROR_CODES.E_ENV_PARSE);
      expect(error.value).toBe("abc");
      expect(error.message).toBe("Failed to parse environment variable `PORT`: abc");
      expect(error.details).toEqual({ key: "PORT", value: "abc", type: "int" });
    });
  });

  describe("isEnvError", () => {
    it("should return true for EnvError instances", () => {
      expect(isEnvError(new NotSetError("A"))).toBe(true);
      expect(isEnvError(new ParseError("A", "x", "int"))).toBe(true);
    });

    it("should return true for objects with valid error codes", () => {
      expect(isEnvError({ code: ENV_ERROR_CODES.E_ENV_PARSE, message: "bad" })).toBe(true);
    });

    it("should return false for objects with invalid error codes", () => {
      expect(isEnvError({ code: "E_IO_READ" })).toBe(false);
    });

    it("should return false for non-objects", () => {
      expect(isEnvError(null)).toBe(false);
      expect(isEnvError(undefined)).toBe(false);
      expect(isEnvError("E_ENV_PARSE")).toBe(false);
      expect(isEnvError(123)).toBe(false);
    });
  });

  describe("serializeEnvError", () => {
    it("should serialize NotSetError without stack", () => {
      expect(serializeEnvError(new NotSetError("HOST"))).toEqual({
        name: "NotSetError",
        message: "Environment variable `HOST` is not set",
        code: "E_ENV_MISSING_VAR",
        key: "HOST",
      });
    });

    it("should serialize ParseError with details", () => {
      expect(serializeEnvError(new ParseError("PORT", "x", "u16"))).toEqual({
        name: "ParseError",
        message: "Failed to parse environment variable `PORT`: x",
        code: "E_ENV_PARSE",
        key: "PORT",
        details: { key: "PORT", value: "x", type: "u16" },
      });
    });

    it("should include stack on request", () => {
      const serialized = serializeEnvError(new NotSetError("HOST"), { includeStack: true });

      expect(serialized.stack).toBeDefined();
    });

    it("should serialize regular Error", () => {
      expect(serializeEnvError(new Error("Regular error"))).toEqual({
        name: "Error",
        message: "Regular error",
      });
    });

    it("should handle non-Error values", () => {
      expect(serializeEnvError("string error")).toEqual({ name: "Error", message: "string error" });
      expect(serializeEnvError(null)).toEqual({ name: "Error", message: "null" });
      expect(serializeEnvError(undefined)).toEqual({ name: "Error", message: "undefined" });
    });
  });
});
