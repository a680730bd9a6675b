/**
 * Command Resolver
 *
 * Walks the command tree by name or alias to find the action an argument
 * vector targets. Pure over the tree and the tokens.
 */

import { findSimilar } from "./similarity.js";
import type { ActionNode, CommandNode } from "./types.js";
import { isOptionToken, sameName, usageError } from "./utils.js";

export const COMMAND_SUGGESTION_DISTANCE = 3;
export const ACTION_SUGGESTION_DISTANCE = 2;

export type ResolveOutcome =
  | {
      status: "resolved";
      path: CommandNode[];
      action: ActionNode;
      /** Tokens left for the binder */
      tokens: string[];
    }
  | {
      /** Nothing to run; show help for the node instead */
      status: "help";
      path: CommandNode[];
    };

// ============================================================================
// Matching
// ============================================================================

function matches(node: { name: string; aliases: readonly string[] }, token: string): boolean {
  return sameName(node.name, token) || node.aliases.some((alias) => sameName(alias, token));
}

export function findChild(node: CommandNode, token: string): CommandNode | undefined {
  return node.children.find((child) => matches(child, token));
}

export function findAction(node: CommandNode, token: string): ActionNode | undefined {
  return node.actions.find((act) => matches(act, token));
}

export function primaryAction(node: CommandNode): ActionNode | undefined {
  return node.actions.find((act) => act.isPrimary);
}

function visibleNames(nodes: readonly { name: string; aliases: readonly string[]; hidden: boolean }[]): string[] {
  return nodes.filter((n) => !n.hidden).flatMap((n) => [n.name, ...n.aliases]);
}

function hasPositionals(act: ActionNode): boolean {
  return act.parameters.some((p) => p.kind === "argument");
}

// ============================================================================
// Walking
// ============================================================================

/**
 * Consume leading tokens that name child commands. Returns the command
 * path (root first) and how many tokens it used.
 */
export function walkCommands(root: CommandNode, tokens: readonly string[]): { path: CommandNode[]; consumed: number } {
  const path = [root];
  let node = root;
  let consumed = 0;

  while (consumed < tokens.length && !isOptionToken(tokens[consumed])) {
    const child = findChild(node, tokens[consumed]);
    if (!child) break;
    path.push(child);
    node = child;
    consumed++;
  }

  return { path, consumed };
}

/**
 * Find the node and, where it can be told, the action a token list points
 * at. Never fails; used to pick the help topic.
 */
export function locate(root: CommandNode, tokens: readonly string[]): { path: CommandNode[]; action?: ActionNode } {
  const { path, consumed } = walkCommands(root, tokens);
  const node = path[path.length - 1];
  const next = tokens[consumed];

  if (next !== undefined && !isOptionToken(next)) {
    const act = findAction(node, next);
    if (act) return { path, action: act };
  }
  return { path, action: primaryAction(node) };
}

/**
 * Resolve the target action. Throws UsageError for UnknownCommand,
 * UnknownAction and NoActionSpecified.
 */
export function resolveCommand(root: CommandNode, tokens: readonly string[]): ResolveOutcome {
  const { path, consumed } = walkCommands(root, tokens);
  const node = path[path.length - 1];
  const next = tokens[consumed];
  const atRoot = node === root;

  if (next === undefined || isOptionToken(next)) {
    const primary = primaryAction(node);
    if (primary) {
      return { status: "resolved", path, action: primary, tokens: tokens.slice(consumed) };
    }
    if (atRoot && tokens.length === 0) {
      return { status: "help", path };
    }

    const available = [...visibleNames(node.actions), ...visibleNames(node.children)];
    const message = atRoot
      ? "No command specified."
      : `No action specified for '${path.slice(1).map((n) => n.name).join(" ")}'.`;
    throw usageError("NoActionSpecified", message, {
      expected: atRoot ? "a command" : "an action",
      suggestions: available,
    });
  }

  const act = findAction(node, next);
  if (act) {
    return { status: "resolved", path, action: act, tokens: tokens.slice(consumed + 1) };
  }

  const primary = primaryAction(node);
  if (primary && hasPositionals(primary)) {
    return { status: "resolved", path, action: primary, tokens: tokens.slice(consumed) };
  }

  const candidates = [...visibleNames(node.children), ...visibleNames(node.actions)];
  if (atRoot) {
    throw usageError("UnknownCommand", `Unknown command: ${next}`, {
      expected: "a command",
      found: next,
      suggestions: findSimilar(next, candidates, COMMAND_SUGGESTION_DISTANCE),
    });
  }

  throw usageError("UnknownAction", `Unknown action: ${next}`, {
    expected: "an action",
    found: next,
    suggestions: findSimilar(next, candidates, ACTION_SUGGESTION_DISTANCE),
  });
}
