/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import {
  ModelAlreadyExistsError,
  ModelNotFoundError,
  StorageReadError,
  StorageWriteError,
} from "@modelstore/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map ModelNotFoundError to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new ModelNotFoundError("m1"))).toBe(2);
    });

    it("should map ModelAlreadyExistsError to exit code 3", () => {
      expect(mapSdkErrorToExitCode(new ModelAlreadyExistsError("m1"))).toBe(3);
    });

    it("should map storage failures to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new StorageWriteError("m1"))).toBe(1);
      expect(mapSdkErrorToExitCode(new StorageReadError("m1"))).toBe(1);
    });

    it("should use the exit code carried by CLI and commander errors", () => {
      expect(mapSdkErrorToExitCode(new CliError("x", { exitCode: 4 }))).toBe(4);
      expect(mapSdkErrorToExitCode(new CommanderError(5, "commander.error", "x"))).toBe(5);
    });

    it("should map unknown errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new Error("boom"))).toBe(1);
      expect(mapSdkErrorToExitCode("boom")).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format Error instances by message", () => {
      expect(formatCliError(new ModelNotFoundError("m1"))).toBe("Model config not found: [m1]");
    });

    it("should format non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
    });

    it("should truncate very long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include the cause in verbose mode", () => {
      const err = new StorageWriteError("m1", { cause: new Error("disk full") });
      const formatted = formatCliError(err, true);

      expect(formatted.split("\n").slice(0, 2)).toEqual([
        "Failed to write model config: [m1]",
        "  Cause: disk full",
      ]);
    });
  });
});
