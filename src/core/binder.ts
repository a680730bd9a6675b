/**
 * Argument Tokenizer & Binder
 *
 * Matches the tokens left after command resolution against an action's
 * parameters and binds a value to each one, taking it from the command
 * line, then the environment, then an interactive prompt, then the
 * declared default.
 */

import type { Logger } from "pino";
import { ConversionError, type TypeConverterRegistry } from "./conversion.js";
import { isBooleanType } from "./model.js";
import { findSimilar } from "./similarity.js";
import type { ParameterSpec, ParameterValues, ValueSource } from "./types.js";
import { isOptionToken, quoted, splitList, usageError } from "./utils.js";
import { describeRule, validateValue } from "./validation.js";

export const OPTION_SUGGESTION_DISTANCE = 2;

/** Marks the end of options; every later token is positional. */
export const END_OF_OPTIONS = "--";

/**
 * Asks the user for a value. `isInteractive` reports whether input is
 * attached to a terminal.
 */
export interface PromptProvider {
  isInteractive(): boolean;
  ask(message: string, options: { secure: boolean }): Promise<string>;
}

export type Environment = Readonly<Record<string, string | undefined>>;

export interface BinderOptions {
  converters: TypeConverterRegistry;
  env: Environment;
  prompt?: PromptProvider;
  logger?: Logger;
}

export interface BindingResult {
  values: ParameterValues;
  sources: Readonly<Record<string, ValueSource>>;
}

// ============================================================================
// Labels
// ============================================================================

/**
 * How a parameter is written on the command line: `--name` or `<name>`.
 */
export function parameterLabel(spec: ParameterSpec): string {
  return spec.kind === "option" ? `--${spec.name}` : `<${spec.name}>`;
}

function expectedForm(spec: ParameterSpec): string {
  if (spec.kind === "option") return `--${spec.name}`;
  return `<${spec.name}> at position ${(spec.position ?? 0) + 1}`;
}

// ============================================================================
// Tokenizer
// ============================================================================

export interface TokenizedArguments {
  /** Raw values per parameter name, in order of appearance */
  raw: Map<string, string[]>;
}

function isShortOptionToken(token: string): boolean {
  return token.length === 2 && token[0] === "-" && token[1] !== "-";
}

function optionForms(parameters: readonly ParameterSpec[]): string[] {
  return parameters
    .filter((p) => p.kind === "option")
    .flatMap((p) => (p.shortName === undefined ? [`--${p.name}`] : [`--${p.name}`, `-${p.shortName}`]));
}

/**
 * Split tokens into raw values per parameter. Throws UnknownOption,
 * UnexpectedArgument, or ConversionFailure for an option missing its value.
 */
export function tokenize(
  tokens: readonly string[],
  parameters: readonly ParameterSpec[],
  converters: TypeConverterRegistry
): TokenizedArguments {
  const raw = new Map<string, string[]>();
  const options = parameters.filter((p) => p.kind === "option");
  const positionals = parameters
    .filter((p) => p.kind === "argument")
    .sort((a, b) => (a.position ?? 0) - (b.position ?? 0));
  let nextPositional = 0;
  let optionsEnded = false;

  const record = (spec: ParameterSpec, value: string): void => {
    if (spec.type.kind === "collection") {
      const existing = raw.get(spec.name) ?? [];
      raw.set(spec.name, [...existing, ...splitList(value)]);
    } else {
      raw.set(spec.name, [value]);
    }
  };

  const unknownOption = (token: string) =>
    usageError("UnknownOption", `Unknown option: ${token}`, {
      expected: "an option",
      found: token,
      suggestions: findSimilar(token, optionForms(parameters), OPTION_SUGGESTION_DISTANCE),
    });

  // Returns the index of the next unread token.
  const takeOption = (spec: ParameterSpec, written: string, inline: string | undefined, index: number): number => {
    if (isBooleanType(spec.type)) {
      record(spec, inline ?? "true");
      return index + 1;
    }
    if (inline !== undefined) {
      record(spec, inline);
      return index + 1;
    }
    const value = tokens[index + 1];
    if (value === undefined) {
      throw usageError("ConversionFailure", `Option '${written}' requires a value.`, {
        expected: converters.describe(spec.type),
        found: "",
      });
    }
    record(spec, value);
    return index + 2;
  };

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];

    if (!optionsEnded && token === END_OF_OPTIONS) {
      optionsEnded = true;
      i++;
      continue;
    }

    if (!optionsEnded && token.startsWith("--") && token.length > 2) {
      const body = token.slice(2);
      const eq = body.indexOf("=");
      const name = eq === -1 ? body : body.slice(0, eq);
      const inline = eq === -1 ? undefined : body.slice(eq + 1);
      const spec = options.find((p) => p.name === name);
      if (!spec) throw unknownOption(`--${name}`);
      i = takeOption(spec, `--${name}`, inline, i);
      continue;
    }

    if (!optionsEnded && isShortOptionToken(token)) {
      const spec = options.find((p) => p.shortName === token[1]);
      if (spec) {
        i = takeOption(spec, token, undefined, i);
        continue;
      }
    }

    // Negative numbers fall through as positionals.
    if (!optionsEnded && isOptionToken(token)) throw unknownOption(token);

    const spec = positionals[nextPositional];
    if (!spec) {
      throw usageError("UnexpectedArgument", `Unexpected argument: ${token}`, {
        found: token,
        suggestions: [],
      });
    }
    record(spec, token);
    if (spec.type.kind !== "collection") nextPositional++;
    i++;
  }

  return { raw };
}

// ============================================================================
// Global Options
// ============================================================================

/**
 * Pull the tokens of global options out of an argument vector, wherever
 * they appear before an end-of-options marker.
 */
export function extractGlobalOptions(
  tokens: readonly string[],
  globals: readonly ParameterSpec[]
): { globalTokens: string[]; rest: string[] } {
  const globalTokens: string[] = [];
  const rest: string[] = [];
  if (globals.length === 0) return { globalTokens, rest: [...tokens] };

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    if (token === END_OF_OPTIONS) {
      rest.push(...tokens.slice(i));
      break;
    }

    let spec: ParameterSpec | undefined;
    let inline = false;
    if (token.startsWith("--")) {
      const eq = token.indexOf("=");
      const name = eq === -1 ? token.slice(2) : token.slice(2, eq);
      inline = eq !== -1;
      spec = globals.find((g) => g.name === name);
    } else if (isShortOptionToken(token)) {
      spec = globals.find((g) => g.shortName === token[1]);
    }

    if (!spec) {
      rest.push(token);
      i++;
      continue;
    }

    globalTokens.push(token);
    const value = tokens[i + 1];
    if (!inline && !isBooleanType(spec.type) && value !== undefined) {
      globalTokens.push(value);
      i += 2;
    } else {
      i++;
    }
  }

  return { globalTokens, rest };
}

// ============================================================================
// Binding
// ============================================================================

function convertFor(
  spec: ParameterSpec,
  raw: readonly string[],
  converters: TypeConverterRegistry
): unknown {
  try {
    return converters.convert(spec.type, raw);
  } catch (error) {
    if (!(error instanceof ConversionError)) throw error;
    const kind = spec.kind === "option" ? "option" : "argument";
    const detail = error.reason ? ` ${capitalize(error.reason)}.` : ` Expected ${error.expected}.`;
    throw usageError(
      "ConversionFailure",
      `Invalid value '${error.raw}' for ${kind} '${parameterLabel(spec)}'.${detail}`,
      { expected: error.expected, found: error.raw }
    );
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

async function promptFor(spec: ParameterSpec, prompt: PromptProvider | undefined): Promise<string | undefined> {
  if (spec.prompt === undefined || !prompt || !prompt.isInteractive()) return undefined;
  const answer = await prompt.ask(spec.prompt, { secure: spec.securePrompt });
  return answer === "" ? undefined : answer;
}

function isActive(value: unknown, source: ValueSource | undefined): boolean {
  return source !== undefined && source !== "default" && value !== undefined && value !== false;
}

function checkMutualExclusion(
  parameters: readonly ParameterSpec[],
  values: Record<string, unknown>,
  sources: Record<string, ValueSource>
): void {
  const groups = new Map<string, ParameterSpec[]>();
  for (const spec of parameters) {
    if (spec.mutuallyExclusiveSet === undefined) continue;
    if (!isActive(values[spec.name], sources[spec.name])) continue;
    const members = groups.get(spec.mutuallyExclusiveSet) ?? [];
    members.push(spec);
    groups.set(spec.mutuallyExclusiveSet, members);
  }

  for (const members of groups.values()) {
    if (members.length > 1) {
      const labels = members.map(parameterLabel);
      throw usageError(
        "MutualExclusionConflict",
        `Options ${quoted(labels)} are mutually exclusive and cannot be used together.`,
        { expected: "at most one of them", found: labels.join(" ") }
      );
    }
  }
}

/**
 * Bind `tokens` to `parameters`. Throws UsageError on the first problem.
 */
export async function bindParameters(
  tokens: readonly string[],
  parameters: readonly ParameterSpec[],
  options: BinderOptions
): Promise<BindingResult> {
  const { converters, env, prompt, logger } = options;
  const { raw } = tokenize(tokens, parameters, converters);
  const values: Record<string, unknown> = {};
  const sources: Record<string, ValueSource> = {};

  for (const spec of parameters) {
    let source: ValueSource | undefined;
    let rawValues: string[] | undefined = raw.get(spec.name);

    if (rawValues !== undefined) {
      source = "cli";
    } else {
      const fromEnv = spec.envVar === undefined ? undefined : env[spec.envVar];
      if (fromEnv !== undefined && fromEnv !== "") {
        source = "env";
        rawValues = converters.splitFor(spec.type, fromEnv);
      } else {
        const answer = await promptFor(spec, prompt);
        if (answer !== undefined) {
          source = "prompt";
          rawValues = converters.splitFor(spec.type, answer);
        }
      }
    }

    if (source !== undefined && rawValues !== undefined) {
      const value = convertFor(spec, rawValues, converters);
      const failure = await validateValue(spec.validations, value, parameterLabel(spec));
      if (failure) {
        throw usageError("ValidationFailure", failure.message, {
          expected: describeRule(failure.rule),
          found: String(failure.value),
        });
      }
      values[spec.name] = value;
      sources[spec.name] = source;
    } else if (spec.defaultValue !== undefined) {
      values[spec.name] = spec.defaultValue;
      sources[spec.name] = "default";
    } else if (spec.required) {
      const noun = spec.kind === "option" ? "option" : "argument";
      throw usageError(
        "MissingRequiredParameter",
        `Required ${noun} '${parameterLabel(spec)}' not provided.`,
        { expected: expectedForm(spec) }
      );
    } else if (spec.type.kind === "collection") {
      values[spec.name] = [];
    }

    logger?.debug(
      { parameter: spec.name, source: sources[spec.name] ?? "unset", secure: spec.securePrompt || undefined },
      "parameter bound"
    );
  }

  checkMutualExclusion(parameters, values, sources);

  return { values, sources };
}
