/**
 * Validator
 *
 * Applies declarative constraints to converted values. Rules run in
 * declaration order and the first failure wins. Collections are checked
 * element by element.
 */

import * as fs from "fs/promises";
import type { ValidationRule } from "./types.js";

export interface ValidationFailure {
  rule: ValidationRule;
  value: unknown;
  message: string;
}

// ============================================================================
// Rule Descriptions
// ============================================================================

export function describeRule(rule: ValidationRule): string {
  switch (rule.kind) {
    case "range":
      return `range [${rule.min}, ${rule.max}]`;
    case "pattern":
      return `pattern '${rule.pattern}'`;
    case "file-exists":
      return "existing file";
    case "directory-exists":
      return "existing directory";
  }
}

function display(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

// ============================================================================
// Rules
// ============================================================================

async function statKind(target: string): Promise<"file" | "directory" | "other" | undefined> {
  try {
    const stats = await fs.stat(target);
    if (stats.isFile()) return "file";
    if (stats.isDirectory()) return "directory";
    return "other";
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return undefined;
    }
    throw error;
  }
}

async function checkRule(
  rule: ValidationRule,
  value: unknown,
  label: string
): Promise<string | undefined> {
  switch (rule.kind) {
    case "range": {
      const numeric = typeof value === "bigint" ? Number(value) : value;
      if (typeof numeric !== "number" || numeric < rule.min || numeric > rule.max) {
        return `Value ${display(value)} for '${label}' is outside the allowed range [${rule.min}, ${rule.max}].`;
      }
      return undefined;
    }

    case "pattern": {
      const text = display(value);
      const regex = new RegExp(rule.pattern, rule.flags);
      if (!regex.test(text)) {
        return (
          rule.message ??
          `Value '${text}' for '${label}' does not match the required pattern '${rule.pattern}'.`
        );
      }
      return undefined;
    }

    case "file-exists": {
      const target = display(value);
      if ((await statKind(target)) !== "file") {
        return `File '${target}' specified for '${label}' does not exist.`;
      }
      return undefined;
    }

    case "directory-exists": {
      const target = display(value);
      if ((await statKind(target)) !== "directory") {
        return `Directory '${target}' specified for '${label}' does not exist.`;
      }
      return undefined;
    }
  }
}

/**
 * Check a converted value against `rules`. `label` names the parameter in
 * messages (`--port`, `<file>`).
 */
export async function validateValue(
  rules: readonly ValidationRule[],
  value: unknown,
  label: string
): Promise<ValidationFailure | undefined> {
  const items: readonly unknown[] = Array.isArray(value) ? value : [value];

  for (const rule of rules) {
    for (const item of items) {
      const message = await checkRule(rule, item, label);
      if (message !== undefined) {
        return { rule, value: item, message };
      }
    }
  }

  return undefined;
}
