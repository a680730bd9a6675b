/**
 * Exit Codes
 *
 * Conventional process exit codes and nearest-ancestor resolution of
 * error → exit code mappings.
 */

import type { ErrorKind, ExitCodeMapping } from "./types.js";

// ============================================================================
// Codes
// ============================================================================

/**
 * 0-8 are general purpose; 64-78 follow BSD sysexits.h.
 */
export const ExitCode = {
  Success: 0,
  Error: 1,
  InvalidArguments: 2,
  FileNotFound: 3,
  PermissionDenied: 4,
  NetworkError: 5,
  Cancelled: 6,
  ConfigurationError: 7,
  ResourceUnavailable: 8,

  Usage: 64,
  DataError: 65,
  NoInput: 66,
  NoUser: 67,
  NoHost: 68,
  Unavailable: 69,
  Software: 70,
  OsError: 71,
  OsFile: 72,
  CantCreate: 73,
  IoError: 74,
  TempFail: 75,
  Protocol: 76,
  NoPermission: 77,
  Config: 78,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function isExitCode(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255;
}

// ============================================================================
// Error Kind Matching
// ============================================================================

export function errorKindName(kind: ErrorKind): string {
  return typeof kind === "string" ? kind : kind.name;
}

function systemErrorCode(error: object): string | undefined {
  if (!("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * How far up the error's prototype chain `kind` sits: 1 for the error's own
 * class, 2 for its parent, and so on. A system error `code` match counts as
 * 0, closer than any class. Undefined when the kind does not match.
 */
export function errorKindDistance(error: unknown, kind: ErrorKind): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;

  if (typeof kind === "string" && systemErrorCode(error) === kind) {
    return 0;
  }

  let distance = 1;
  let proto: unknown = Object.getPrototypeOf(error);
  while (typeof proto === "object" && proto !== null) {
    if (typeof kind === "string") {
      const ctor: unknown = Reflect.get(proto, "constructor");
      if (typeof ctor === "function" && ctor.name === kind) return distance;
    } else if (proto === kind.prototype) {
      return distance;
    }
    proto = Object.getPrototypeOf(proto);
    distance++;
  }

  return undefined;
}

/**
 * Pick the mapping nearest to the error. `levels` is searched innermost
 * first (the action, then commands from the deepest to the root); among
 * mappings at the same distance the first one found wins.
 */
export function findExitCodeMapping(
  error: unknown,
  levels: readonly (readonly ExitCodeMapping[])[]
): ExitCodeMapping | undefined {
  let best: ExitCodeMapping | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const mappings of levels) {
    for (const mapping of mappings) {
      const distance = errorKindDistance(error, mapping.errorKind);
      if (distance !== undefined && distance < bestDistance) {
        best = mapping;
        bestDistance = distance;
      }
    }
  }

  return best;
}

export function resolveExitCode(
  error: unknown,
  levels: readonly (readonly ExitCodeMapping[])[],
  fallback: number = ExitCode.Error
): number {
  return findExitCodeMapping(error, levels)?.exitCode ?? fallback;
}
