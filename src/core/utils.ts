/**
 * Core Utilities for the Arbor Engine
 *
 * Error classes and small pure helpers shared across the engine.
 * Output formatting is handled by adapters, not here.
 */

import type { Diagnostic, UsageErrorKind } from "./types.js";

// ============================================================================
// Error Handling
// ============================================================================

export class ArborError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ArborError";
  }
}

/**
 * A resolution or binding failure. Carries the diagnostic that is reported
 * instead of being thrown out of `dispatch`.
 */
export class UsageError extends ArborError {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message, diagnostic.kind, {
      expected: diagnostic.expected,
      found: diagnostic.found,
      suggestions: diagnostic.suggestions,
    });
    this.name = "UsageError";
    this.diagnostic = diagnostic;
  }

  get kind(): UsageErrorKind {
    return this.diagnostic.kind;
  }
}

/**
 * Thrown when a command model breaks one of its structural rules.
 */
export class ModelError extends ArborError {
  readonly issues: string[];

  constructor(issues: string[]) {
    const summary =
      issues.length === 1
        ? `Invalid command model: ${issues[0]}`
        : `Invalid command model (${issues.length} problems): ${issues.join("; ")}`;
    super(summary, "INVALID_MODEL", { issues });
    this.name = "ModelError";
    this.issues = issues;
  }
}

/**
 * Thrown out of `dispatch` when an action, before-hook, after-hook or
 * error-hook fails and no error-hook claims the failure.
 */
export class ExecutionFailedError extends ArborError {
  readonly exitCode: number;

  constructor(message: string, cause: unknown, exitCode: number) {
    super(message, "EXECUTION_FAILED", { exitCode }, { cause });
    this.name = "ExecutionFailedError";
    this.exitCode = exitCode;
  }
}

export function usageError(
  kind: UsageErrorKind,
  message: string,
  extra: { expected?: string; found?: string; suggestions?: string[] } = {}
): UsageError {
  return new UsageError({
    kind,
    message,
    expected: extra.expected,
    found: extra.found,
    suggestions: extra.suggestions ?? [],
  });
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// ============================================================================
// Names & Tokens
// ============================================================================

export function normalizeName(name: string): string {
  return name.toLowerCase();
}

export function sameName(a: string, b: string): boolean {
  return normalizeName(a) === normalizeName(b);
}

/**
 * True when a token reads as an option (`--name`, `-x`) rather than a word.
 * Negative numbers are words.
 */
export function isOptionToken(token: string): boolean {
  if (!token.startsWith("-") || token.length < 2) return false;
  return !isNumericToken(token);
}

export function isNumericToken(token: string): boolean {
  return /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(token);
}

/**
 * Split a comma-separated value, trimming segments and dropping empty ones.
 */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

// ============================================================================
// Text Formatting
// ============================================================================

export function quoted(values: readonly string[]): string {
  return values.map((v) => `'${v}'`).join(", ");
}
