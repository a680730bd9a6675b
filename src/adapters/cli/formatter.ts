/**
 * CLI Formatter for the Arbor Engine
 *
 * Formats diagnostics and help topics for terminal display.
 */

import chalk from "chalk";
import { parameterLabel } from "../../core/binder.js";
import { formatSuggestions } from "../../core/similarity.js";
import type {
  ActionNode,
  CommandNode,
  Diagnostic,
  DiagnosticReporter,
  HelpTopic,
  ParameterSpec,
  TypeDescriptor,
} from "../../core/types.js";

// ============================================================================
// Terminal Output Helpers
// ============================================================================

export const output = {
  header(text: string): string {
    return chalk.bold.cyan(text);
  },

  error(text: string): string {
    return chalk.red(`✗ ${text}`);
  },

  hint(text: string): string {
    return chalk.yellow(text);
  },

  dim(text: string): string {
    return chalk.dim(text);
  },

  /**
   * Lay out rows as aligned columns, two spaces apart.
   */
  columns(rows: string[][], indent = 2): string[] {
    const widths: number[] = [];
    for (const row of rows) {
      row.forEach((cell, i) => {
        widths[i] = Math.max(widths[i] ?? 0, cell.length);
      });
    }

    const prefix = " ".repeat(indent);
    return rows.map((row) =>
      (prefix + row.map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i]))).join("  ")).trimEnd()
    );
  },
};

// ============================================================================
// Diagnostics
// ============================================================================

const NAME_MATCHING = new Set<Diagnostic["kind"]>(["UnknownCommand", "UnknownAction", "UnknownOption"]);

export function formatDiagnostic(diagnostic: Diagnostic): string[] {
  const lines = [output.error(diagnostic.message)];

  if (NAME_MATCHING.has(diagnostic.kind)) {
    const hint = formatSuggestions(diagnostic.suggestions);
    if (hint) lines.push(output.hint(hint));
  } else if (diagnostic.kind === "NoActionSpecified" && diagnostic.suggestions.length > 0) {
    lines.push(output.dim(`Available: ${diagnostic.suggestions.join(", ")}`));
  }

  return lines;
}

// ============================================================================
// Help
// ============================================================================

function typeLabel(type: TypeDescriptor): string {
  switch (type.kind) {
    case "primitive":
    case "well-known":
      return type.name;
    case "enum":
      return Object.keys(type.members).join("|");
    case "custom":
      return type.converterId;
    case "collection":
      return `${typeLabel(type.element)}...`;
  }
}

function optionSignature(spec: ParameterSpec): string {
  const long = parameterLabel(spec);
  const isFlag = spec.type.kind === "primitive" && spec.type.name === "boolean";
  const value = isFlag ? "" : ` <${typeLabel(spec.type)}>`;
  const short = spec.shortName === undefined ? "    " : `-${spec.shortName}, `;
  return `${short}${long}${value}`;
}

function parameterNotes(spec: ParameterSpec): string {
  const notes: string[] = [];
  if (spec.required) notes.push("required");
  if (spec.envVar) notes.push(`env: ${spec.envVar}`);
  if (spec.defaultValue !== undefined && spec.defaultValue !== false && !spec.securePrompt) {
    notes.push(`default: ${String(spec.defaultValue)}`);
  }
  return notes.length > 0 ? output.dim(`[${notes.join(", ")}]`) : "";
}

function describeParameter(spec: ParameterSpec): string {
  return [spec.description ?? "", parameterNotes(spec)].filter((part) => part.length > 0).join(" ");
}

function argumentSignature(spec: ParameterSpec): string {
  const name = spec.type.kind === "collection" ? `${spec.name}...` : spec.name;
  return spec.required ? `<${name}>` : `[${name}]`;
}

function usageLine(path: readonly CommandNode[], action: ActionNode | undefined): string {
  const words = path.map((node) => node.name);
  if (!action) {
    const node = path[path.length - 1];
    if (node.children.length > 0) words.push("<command>");
    if (node.actions.length > 0) words.push("<action>");
    words.push("[options]");
    return words.join(" ");
  }

  if (!action.isPrimary) words.push(action.name);
  if (action.parameters.some((p) => p.kind === "option")) words.push("[options]");
  for (const spec of action.parameters) {
    if (spec.kind === "argument") words.push(argumentSignature(spec));
  }
  return words.join(" ");
}

function nameWithAliases(node: { name: string; aliases: readonly string[] }): string {
  return [node.name, ...node.aliases].join(", ");
}

function section(title: string, rows: string[][]): string[] {
  if (rows.length === 0) return [];
  return ["", output.header(`${title}:`), ...output.columns(rows)];
}

export function renderHelp(topic: HelpTopic): string[] {
  const node = topic.path[topic.path.length - 1];
  const action = topic.action;
  const lines = [`Usage: ${usageLine(topic.path, action)}`];

  const description = action?.description ?? node.description;
  if (description) lines.push("", description);

  if (!action || action.isPrimary) {
    lines.push(
      ...section(
        "Commands",
        node.children.filter((c) => !c.hidden).map((c) => [nameWithAliases(c), c.description ?? ""])
      ),
      ...section(
        "Actions",
        node.actions
          .filter((a) => !a.hidden)
          .map((a) => [nameWithAliases(a) + (a.isPrimary ? " (default)" : ""), a.description ?? ""])
      )
    );
  }

  if (action) {
    const args = action.parameters.filter((p) => p.kind === "argument");
    const options = action.parameters.filter((p) => p.kind === "option");
    lines.push(
      ...section(
        "Arguments",
        args.map((p) => [argumentSignature(p), describeParameter(p)])
      ),
      ...section(
        "Options",
        options.map((p) => [optionSignature(p), describeParameter(p)])
      )
    );
  }

  lines.push(
    ...section(
      "Global options",
      topic.globalOptions.map((p) => [optionSignature(p), describeParameter(p)])
    )
  );

  return lines;
}

// ============================================================================
// Reporter
// ============================================================================

/**
 * Diagnostics go to stderr; help and the version go to stdout.
 */
export function createConsoleReporter(): DiagnosticReporter {
  return {
    report(diagnostic) {
      for (const line of formatDiagnostic(diagnostic)) console.error(line);
    },
    help(topic) {
      for (const line of renderHelp(topic)) console.log(line);
    },
    version(version) {
      console.log(version);
    },
  };
}
