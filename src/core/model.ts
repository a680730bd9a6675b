/**
 * Command Model
 *
 * Builders for command trees and the structural checks a model has to pass
 * before the engine accepts it.
 *
 * Usage:
 * ```typescript
 * const model = defineModel({
 *   name: "myapp",
 *   commands: [
 *     command("git", {
 *       actions: [
 *         action("commit", {
 *           parameters: [
 *             option("message", { shortName: "m", required: true }),
 *             option("amend", { type: "boolean" }),
 *           ],
 *           handler: ({ parameters }) => console.log(parameters.message),
 *         }),
 *       ],
 *     }),
 *   ],
 * });
 * ```
 */

import type { TypeConverterRegistry } from "./conversion.js";
import { errorKindName } from "./exit-codes.js";
import { HandlerRegistry } from "./handlers.js";
import type {
  ActionHandler,
  ActionNode,
  AfterHook,
  BeforeHook,
  CollectionType,
  CommandNode,
  CustomType,
  EnumType,
  ErrorHook,
  ErrorKind,
  ExitCodeMapping,
  HookHandler,
  HookSpec,
  ParameterSpec,
  PrimitiveTypeName,
  ScalarType,
  TypeDescriptor,
  ValidationRule,
  WellKnownTypeName,
} from "./types.js";
import { ModelError, normalizeName } from "./utils.js";

export interface CommandModel {
  root: CommandNode;
  /** Options accepted anywhere on the command line, bound once per dispatch */
  globalOptions: readonly ParameterSpec[];
  handlers: HandlerRegistry;
}

/** Names the engine answers itself; global options may not take them. */
export const RESERVED_GLOBAL_NAMES = ["help", "version"] as const;
export const RESERVED_SHORT_NAMES = ["h"] as const;

/** Flag enums combine with 32-bit bitwise operators. */
const MAX_FLAG_VALUE = 0x7fffffff;

// ============================================================================
// Types
// ============================================================================

export type TypeInput = PrimitiveTypeName | WellKnownTypeName | TypeDescriptor;

const PRIMITIVE_NAMES: readonly string[] = ["string", "boolean", "integer", "number", "bigint", "char"];

function isPrimitiveName(name: string): name is PrimitiveTypeName {
  return PRIMITIVE_NAMES.includes(name);
}

function toScalar(input: PrimitiveTypeName | WellKnownTypeName | ScalarType): ScalarType {
  if (typeof input !== "string") return input;
  return isPrimitiveName(input) ? { kind: "primitive", name: input } : { kind: "well-known", name: input };
}

export function toTypeDescriptor(input: TypeInput): TypeDescriptor {
  if (typeof input !== "string") return input;
  return toScalar(input);
}

export function listOf(element: PrimitiveTypeName | WellKnownTypeName | ScalarType): CollectionType {
  return { kind: "collection", element: toScalar(element) };
}

/**
 * Build an enum type from a member map. Accepts a TypeScript numeric enum
 * object directly; its reverse (value → name) entries are skipped.
 */
export function enumOf(
  name: string,
  members: Readonly<Record<string, string | number>>,
  options: { flags?: boolean } = {}
): EnumType {
  const numeric: Record<string, number> = {};
  for (const [key, value] of Object.entries(members)) {
    if (typeof value === "number") numeric[key] = value;
  }
  return { kind: "enum", name, members: numeric, flags: options.flags ?? false };
}

export function customType(converterId: string): CustomType {
  return { kind: "custom", converterId };
}

export function isBooleanType(type: TypeDescriptor): boolean {
  return type.kind === "primitive" && type.name === "boolean";
}

// ============================================================================
// Validation Rules
// ============================================================================

export function range(min: number, max: number): ValidationRule {
  return { kind: "range", min, max };
}

export function pattern(regex: RegExp | string, message?: string): ValidationRule {
  if (typeof regex === "string") return { kind: "pattern", pattern: regex, message };
  return { kind: "pattern", pattern: regex.source, flags: regex.flags || undefined, message };
}

export function fileExists(): ValidationRule {
  return { kind: "file-exists" };
}

export function directoryExists(): ValidationRule {
  return { kind: "directory-exists" };
}

// ============================================================================
// Parameters
// ============================================================================

export interface ParameterOptions {
  type?: TypeInput;
  shortName?: string;
  description?: string;
  required?: boolean;
  default?: unknown;
  envVar?: string;
  prompt?: string;
  securePrompt?: boolean;
  /** Mutually exclusive set id */
  exclusive?: string;
  validate?: ValidationRule[];
}

function parameter(kind: ParameterSpec["kind"], name: string, opts: ParameterOptions): ParameterSpec {
  const type = toTypeDescriptor(opts.type ?? "string");
  let defaultValue = opts.default;
  if (defaultValue === undefined && kind === "option" && isBooleanType(type) && opts.required !== true) {
    defaultValue = false;
  }

  const requiredByDefault = kind === "argument" && defaultValue === undefined && type.kind !== "collection";

  return {
    kind,
    name,
    shortName: opts.shortName,
    description: opts.description,
    required: opts.required ?? requiredByDefault,
    defaultValue,
    envVar: opts.envVar,
    prompt: opts.prompt,
    securePrompt: opts.securePrompt ?? false,
    type,
    mutuallyExclusiveSet: opts.exclusive,
    validations: opts.validate ?? [],
  };
}

/** A named option: `--name value`, `-n value`, or a `--flag`. */
export function option(name: string, opts: ParameterOptions = {}): ParameterSpec {
  return parameter("option", name, opts);
}

/** A positional argument, placed by declaration order. */
export function argument(name: string, opts: ParameterOptions = {}): ParameterSpec {
  return parameter("argument", name, opts);
}

// ============================================================================
// Hooks & Exit Codes
// ============================================================================

export type HookDefinition =
  | { phase: "before"; handler: BeforeHook | string; order?: number }
  | { phase: "after"; handler: AfterHook | string; order?: number }
  | { phase: "error"; handler: ErrorHook | string; order?: number };

export function beforeHook(handler: BeforeHook | string, order = 0): HookDefinition {
  return { phase: "before", handler, order };
}

export function afterHook(handler: AfterHook | string, order = 0): HookDefinition {
  return { phase: "after", handler, order };
}

export function errorHook(handler: ErrorHook | string, order = 0): HookDefinition {
  return { phase: "error", handler, order };
}

export function mapExitCode(errorKind: ErrorKind, exitCode: number): ExitCodeMapping {
  return { errorKind, exitCode };
}

// ============================================================================
// Commands & Actions
// ============================================================================

export interface ActionDefinition {
  aliases?: string[];
  description?: string;
  hidden?: boolean;
  primary?: boolean;
  parameters?: ParameterSpec[];
  /** A function, or the id of a handler already in the registry */
  handler: ActionHandler | string;
  returnsExitCode?: boolean;
  hooks?: HookDefinition[];
  exitCodes?: ExitCodeMapping[];
}

export interface CommandDefinition {
  aliases?: string[];
  description?: string;
  hidden?: boolean;
  commands?: CommandDraft[];
  actions?: ActionDraft[];
  hooks?: HookDefinition[];
  exitCodes?: ExitCodeMapping[];
}

export interface ModelDefinition extends CommandDefinition {
  /** Program name, used as the root command's name */
  name: string;
  globalOptions?: ParameterSpec[];
}

export interface ActionDraft {
  name: string;
  definition: ActionDefinition;
}

export interface CommandDraft {
  name: string;
  definition: CommandDefinition;
}

export function action(name: string, definition: ActionDefinition): ActionDraft {
  return { name, definition };
}

export function command(name: string, definition: CommandDefinition = {}): CommandDraft {
  return { name, definition };
}

// ============================================================================
// Linking
// ============================================================================

class ModelLinker {
  constructor(private handlers: HandlerRegistry) {}

  command(name: string, definition: CommandDefinition): CommandNode {
    return {
      name,
      aliases: definition.aliases ?? [],
      description: definition.description,
      hidden: definition.hidden ?? false,
      children: (definition.commands ?? []).map((c) => this.command(c.name, c.definition)),
      actions: (definition.actions ?? []).map((a) => this.action(a)),
      hooks: (definition.hooks ?? []).map((h) => this.hook(h)),
      exitCodeMappings: definition.exitCodes ?? [],
    };
  }

  private action({ name, definition }: ActionDraft): ActionNode {
    let handlerId: string;
    if (typeof definition.handler === "string") {
      handlerId = definition.handler;
    } else {
      handlerId = this.handlers.nextId(`action-${name}`);
      this.handlers.registerAction(handlerId, definition.handler);
    }

    return {
      name,
      aliases: definition.aliases ?? [],
      description: definition.description,
      hidden: definition.hidden ?? false,
      isPrimary: definition.primary ?? false,
      handlerId,
      returnsExitCode: definition.returnsExitCode ?? false,
      parameters: assignPositions(definition.parameters ?? []),
      hooks: (definition.hooks ?? []).map((h) => this.hook(h)),
      exitCodeMappings: definition.exitCodes ?? [],
    };
  }

  private hook(definition: HookDefinition): HookSpec {
    const order = definition.order ?? 0;
    if (typeof definition.handler === "string") {
      return { phase: definition.phase, handlerId: definition.handler, order };
    }

    const handlerId = this.handlers.nextId(`hook-${definition.phase}`);
    this.handlers.registerHook(handlerId, inlineHook(definition));
    return { phase: definition.phase, handlerId, order };
  }
}

function inlineHook(definition: HookDefinition): HookHandler {
  switch (definition.phase) {
    case "before":
      return typeof definition.handler === "string" ? {} : { before: definition.handler };
    case "after":
      return typeof definition.handler === "string" ? {} : { after: definition.handler };
    case "error":
      return typeof definition.handler === "string" ? {} : { onError: definition.handler };
  }
}

function assignPositions(parameters: readonly ParameterSpec[]): ParameterSpec[] {
  let position = 0;
  return parameters.map((p) => (p.kind === "argument" ? { ...p, position: position++ } : p));
}

/**
 * Link a model definition into an immutable command model, registering
 * inline handlers with `handlers`. Throws ModelError when the result breaks
 * a structural rule.
 */
export function defineModel(
  definition: ModelDefinition,
  handlers: HandlerRegistry = new HandlerRegistry()
): CommandModel {
  const linker = new ModelLinker(handlers);
  const model: CommandModel = {
    root: linker.command(definition.name, definition),
    globalOptions: definition.globalOptions ?? [],
    handlers,
  };
  validateModel(model);
  return model;
}

// ============================================================================
// Structural Checks
// ============================================================================

/**
 * Collect every structural problem of a model and throw them together.
 * Custom converter ids are checked when `converters` is given.
 */
export function validateModel(model: CommandModel, converters?: TypeConverterRegistry): void {
  const issues: string[] = [];
  const commandAliases = new Map<string, string>();

  checkGlobals(model.globalOptions, issues, converters);

  const visit = (node: CommandNode, trail: string[]): void => {
    const where = trail.join(" ");
    const siblings = new Map<string, string>();

    const claim = (name: string, owner: string): void => {
      const key = normalizeName(name);
      const existing = siblings.get(key);
      if (existing !== undefined) {
        issues.push(`'${where}': name '${name}' of ${owner} clashes with ${existing}`);
      } else {
        siblings.set(key, owner);
      }
    };

    for (const child of node.children) {
      claim(child.name, `command '${child.name}'`);
      for (const alias of child.aliases) {
        claim(alias, `command '${child.name}'`);
        const key = normalizeName(alias);
        const previous = commandAliases.get(key);
        if (previous !== undefined) {
          issues.push(`alias '${alias}' is used by both '${previous}' and '${where} ${child.name}'`);
        } else {
          commandAliases.set(key, `${where} ${child.name}`);
        }
      }
    }

    for (const act of node.actions) {
      claim(act.name, `action '${act.name}'`);
      for (const alias of act.aliases) claim(alias, `action '${act.name}'`);
    }

    const primaries = node.actions.filter((a) => a.isPrimary);
    if (primaries.length > 1) {
      issues.push(`'${where}' has ${primaries.length} primary actions: ${primaries.map((a) => a.name).join(", ")}`);
    }

    checkHooks(model.handlers, node.hooks, where, issues);
    checkExitCodes(node.exitCodeMappings, where, issues);

    for (const act of node.actions) {
      checkAction(model, act, `${where} ${act.name}`, issues, converters);
    }
    for (const child of node.children) {
      visit(child, [...trail, child.name]);
    }
  };

  visit(model.root, [model.root.name]);

  if (issues.length > 0) {
    throw new ModelError(issues);
  }
}

function checkGlobals(
  globals: readonly ParameterSpec[],
  issues: string[],
  converters?: TypeConverterRegistry
): void {
  const reserved: readonly string[] = RESERVED_GLOBAL_NAMES;
  const reservedShort: readonly string[] = RESERVED_SHORT_NAMES;

  for (const p of globals) {
    if (p.kind !== "option") {
      issues.push(`global '${p.name}' must be an option`);
    }
    if (reserved.includes(normalizeName(p.name))) {
      issues.push(`global option '--${p.name}' is reserved`);
    }
    if (p.shortName !== undefined && reservedShort.includes(p.shortName)) {
      issues.push(`global option '-${p.shortName}' is reserved`);
    }
  }
  checkParameters(globals, [], "global options", issues, converters);
}

function checkAction(
  model: CommandModel,
  act: ActionNode,
  where: string,
  issues: string[],
  converters?: TypeConverterRegistry
): void {
  if (model.handlers.action(act.handlerId) === undefined) {
    issues.push(`'${where}': no action handler registered as '${act.handlerId}'`);
  }

  checkParameters(act.parameters, model.globalOptions, `'${where}'`, issues, converters);

  const args = act.parameters.filter((p) => p.kind === "argument");
  const collectionAt = args.findIndex((p) => p.type.kind === "collection");
  if (collectionAt !== -1 && collectionAt !== args.length - 1) {
    issues.push(`'${where}': collection argument '${args[collectionAt].name}' must be the last argument`);
  }

  checkHooks(model.handlers, act.hooks, where, issues);
  checkExitCodes(act.exitCodeMappings, where, issues);
}

function checkParameters(
  parameters: readonly ParameterSpec[],
  globals: readonly ParameterSpec[],
  where: string,
  issues: string[],
  converters?: TypeConverterRegistry
): void {
  const names = new Set(globals.map((g) => normalizeName(g.name)));
  const shortNames = new Set(globals.flatMap((g) => (g.shortName === undefined ? [] : [g.shortName])));

  for (const p of parameters) {
    const key = normalizeName(p.name);
    if (names.has(key)) {
      issues.push(`${where}: parameter '${p.name}' is declared more than once or shadows a global option`);
    }
    names.add(key);

    if (p.name.length === 0 || p.name.startsWith("-")) {
      issues.push(`${where}: '${p.name}' is not a valid parameter name`);
    }

    if (p.shortName !== undefined) {
      if ([...p.shortName].length !== 1 || p.shortName === "-") {
        issues.push(`${where}: short name '${p.shortName}' of '${p.name}' must be one character`);
      } else if (shortNames.has(p.shortName)) {
        issues.push(`${where}: short name '-${p.shortName}' is used more than once`);
      }
      shortNames.add(p.shortName);
      if (p.kind === "argument") {
        issues.push(`${where}: argument '${p.name}' cannot have a short name`);
      }
    }

    if (p.required && p.defaultValue !== undefined) {
      issues.push(`${where}: required parameter '${p.name}' cannot have a default value`);
    }
    if (p.required && p.kind === "option" && isBooleanType(p.type)) {
      issues.push(`${where}: boolean option '${p.name}' cannot be required`);
    }

    const element = p.type.kind === "collection" ? p.type.element : p.type;
    if (element.kind === "enum" && Object.keys(element.members).length === 0) {
      issues.push(`${where}: enum '${element.name}' of '${p.name}' has no members`);
    }
    if (element.kind === "enum" && element.flags) {
      for (const [member, value] of Object.entries(element.members)) {
        if (!Number.isInteger(value) || value < 0 || value > MAX_FLAG_VALUE) {
          issues.push(`${where}: flag '${member}' of enum '${element.name}' must be an integer from 0 to ${MAX_FLAG_VALUE}`);
        }
      }
    }
    if (element.kind === "custom" && converters && !converters.has(element.converterId)) {
      issues.push(`${where}: no converter registered as '${element.converterId}' for '${p.name}'`);
    }

    const numeric =
      (element.kind === "primitive" && ["integer", "number", "bigint"].includes(element.name)) ||
      (element.kind === "well-known" && element.name === "duration");
    for (const rule of p.validations) {
      if (rule.kind === "range" && !numeric) {
        issues.push(`${where}: range rule on '${p.name}' needs a numeric type`);
      }
      if (rule.kind === "range" && rule.min > rule.max) {
        issues.push(`${where}: range rule on '${p.name}' has min greater than max`);
      }
      if (rule.kind === "pattern" && !compiles(rule.pattern, rule.flags)) {
        issues.push(`${where}: pattern '${rule.pattern}' on '${p.name}' is not a valid regular expression`);
      }
    }
  }
}

function compiles(source: string, flags?: string): boolean {
  try {
    new RegExp(source, flags);
    return true;
  } catch {
    return false;
  }
}

function checkHooks(handlers: HandlerRegistry, hooks: readonly HookSpec[], where: string, issues: string[]): void {
  for (const hook of hooks) {
    if (handlers.hook(hook.handlerId) === undefined) {
      issues.push(`'${where}': no hook handler registered as '${hook.handlerId}'`);
    } else if (!handlers.hasHookPhase(hook.handlerId, hook.phase)) {
      issues.push(`'${where}': hook '${hook.handlerId}' does not handle the ${hook.phase} phase`);
    }
  }
}

function checkExitCodes(mappings: readonly ExitCodeMapping[], where: string, issues: string[]): void {
  const seen = new Set<ErrorKind>();
  for (const mapping of mappings) {
    if (seen.has(mapping.errorKind)) {
      issues.push(`'${where}': '${errorKindName(mapping.errorKind)}' is mapped more than once`);
    }
    seen.add(mapping.errorKind);
    if (!Number.isInteger(mapping.exitCode) || mapping.exitCode < 0 || mapping.exitCode > 255) {
      issues.push(`'${where}': exit code ${mapping.exitCode} is outside 0-255`);
    }
  }
}
