import { describe, expect, it } from "vitest";
import {
  ExitCode,
  errorKindDistance,
  errorKindName,
  findExitCodeMapping,
  isExitCode,
  resolveExitCode,
} from "../exit-codes.js";
import { mapExitCode } from "../model.js";

class StorageError extends Error {}
class FileNotFoundError extends StorageError {}
class QuotaExceededError extends StorageError {}

function systemError(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: simulated`);
  error.code = code;
  return error;
}

describe("exit codes", () => {
  it("should expose the conventional codes", () => {
    expect(ExitCode.Success).toBe(0);
    expect(ExitCode.FileNotFound).toBe(3);
    expect(ExitCode.Cancelled).toBe(6);
    expect(ExitCode.Usage).toBe(64);
    expect(ExitCode.Config).toBe(78);
  });

  it("should recognise valid exit codes", () => {
    expect(isExitCode(0)).toBe(true);
    expect(isExitCode(255)).toBe(true);
    expect(isExitCode(256)).toBe(false);
    expect(isExitCode(-1)).toBe(false);
    expect(isExitCode(1.5)).toBe(false);
    expect(isExitCode("3")).toBe(false);
  });

  it("should name error kinds", () => {
    expect(errorKindName(FileNotFoundError)).toBe("FileNotFoundError");
    expect(errorKindName("ENOENT")).toBe("ENOENT");
  });
});

describe("errorKindDistance", () => {
  it("should count the prototype chain from the error's own class", () => {
    const error = new FileNotFoundError("gone");
    expect(errorKindDistance(error, FileNotFoundError)).toBe(1);
    expect(errorKindDistance(error, StorageError)).toBe(2);
    expect(errorKindDistance(error, Error)).toBe(3);
  });

  it("should match class names given as strings", () => {
    expect(errorKindDistance(new FileNotFoundError("gone"), "StorageError")).toBe(2);
  });

  it("should match system error codes before any class", () => {
    expect(errorKindDistance(systemError("ENOENT"), "ENOENT")).toBe(0);
  });

  it("should not match unrelated kinds or non-objects", () => {
    expect(errorKindDistance(new QuotaExceededError("full"), FileNotFoundError)).toBeUndefined();
    expect(errorKindDistance("boom", Error)).toBeUndefined();
    expect(errorKindDistance(undefined, "ENOENT")).toBeUndefined();
  });
});

describe("findExitCodeMapping", () => {
  it("should prefer the nearest ancestor over search order", () => {
    const action = [mapExitCode(Error, 1)];
    const command = [mapExitCode(FileNotFoundError, 3)];
    const mapping = findExitCodeMapping(new FileNotFoundError("gone"), [action, command]);
    expect(mapping?.exitCode).toBe(3);
  });

  it("should keep the innermost level on a tie", () => {
    const action = [mapExitCode(StorageError, 10)];
    const root = [mapExitCode(StorageError, 20)];
    expect(resolveExitCode(new QuotaExceededError("full"), [action, root])).toBe(10);
  });

  it("should map system error codes", () => {
    const levels = [[mapExitCode(Error, 1), mapExitCode("EACCES", ExitCode.PermissionDenied)]];
    expect(resolveExitCode(systemError("EACCES"), levels)).toBe(4);
  });

  it("should fall back when nothing matches", () => {
    expect(resolveExitCode(new Error("x"), [[mapExitCode(StorageError, 9)]])).toBe(ExitCode.Error);
    expect(resolveExitCode("text thrown", [], 70)).toBe(70);
  });
});
