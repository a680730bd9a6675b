/**
 * Core Types for the Arbor Engine
 *
 * The command model (commands, actions, parameters, hooks), the handler
 * signatures the model refers to, and the results the engine hands back
 * to adapters.
 */

// ============================================================================
// Type Descriptors
// ============================================================================

export type PrimitiveTypeName = "string" | "boolean" | "integer" | "number" | "bigint" | "char";

export type WellKnownTypeName = "url" | "date" | "duration" | "uuid" | "file" | "directory" | "ip";

export interface PrimitiveType {
  kind: "primitive";
  name: PrimitiveTypeName;
}

/**
 * An enumeration with numeric member values. Flag enums accept
 * comma-separated member combinations.
 */
export interface EnumType {
  kind: "enum";
  name: string;
  members: Readonly<Record<string, number>>;
  flags: boolean;
}

export interface WellKnownType {
  kind: "well-known";
  name: WellKnownTypeName;
}

/** A type converted by a converter registered under `converterId`. */
export interface CustomType {
  kind: "custom";
  converterId: string;
}

export type ScalarType = PrimitiveType | EnumType | WellKnownType | CustomType;

export interface CollectionType {
  kind: "collection";
  element: ScalarType;
}

export type TypeDescriptor = ScalarType | CollectionType;

// ============================================================================
// Validation Rules
// ============================================================================

export type ValidationRule =
  | { kind: "range"; min: number; max: number }
  | { kind: "pattern"; pattern: string; flags?: string; message?: string }
  | { kind: "file-exists" }
  | { kind: "directory-exists" };

// ============================================================================
// Command Model
// ============================================================================

export type ParameterKind = "option" | "argument";

export interface ParameterSpec {
  kind: ParameterKind;
  name: string;
  /** Single character, used as `-c` */
  shortName?: string;
  /** Zero-based position among the action's arguments */
  position?: number;
  description?: string;
  required: boolean;
  defaultValue?: unknown;
  envVar?: string;
  prompt?: string;
  securePrompt: boolean;
  type: TypeDescriptor;
  mutuallyExclusiveSet?: string;
  validations: readonly ValidationRule[];
}

export type HookPhase = "before" | "after" | "error";

export interface HookSpec {
  phase: HookPhase;
  handlerId: string;
  /** Ascending; hooks with equal order keep declaration order */
  order: number;
}

/**
 * An error kind is either an Error subclass or a name. A name matches a
 * class name in the error's prototype chain or a system error `code`.
 */
export type ErrorKind = string | (abstract new (...args: never[]) => Error);

export interface ExitCodeMapping {
  errorKind: ErrorKind;
  exitCode: number;
}

export interface ActionNode {
  name: string;
  aliases: readonly string[];
  description?: string;
  hidden: boolean;
  isPrimary: boolean;
  handlerId: string;
  /** When set, an integer returned by the handler becomes the exit code */
  returnsExitCode: boolean;
  parameters: readonly ParameterSpec[];
  hooks: readonly HookSpec[];
  exitCodeMappings: readonly ExitCodeMapping[];
}

export interface CommandNode {
  name: string;
  aliases: readonly string[];
  description?: string;
  hidden: boolean;
  children: readonly CommandNode[];
  actions: readonly ActionNode[];
  hooks: readonly HookSpec[];
  exitCodeMappings: readonly ExitCodeMapping[];
}

/**
 * Parameter name → converted value.
 */
export type ParameterValues = Readonly<Record<string, unknown>>;

// ============================================================================
// Handlers
// ============================================================================

/**
 * State shared by every hook and the action of a single dispatch.
 */
export interface HookContext {
  readonly commandPath: readonly string[];
  readonly actionName: string;
  /** Tokens left for the action after the command path was consumed */
  readonly arguments: readonly string[];
  readonly parameters: ParameterValues;
  readonly globals: ParameterValues;
  /** Scratch space hooks use to pass data along */
  readonly data: Map<string, unknown>;
  readonly signal: AbortSignal;
  readonly isCancelled: boolean;
  readonly cancellationMessages: readonly string[];
}

export interface CancelOutcome {
  cancel: true;
  message: string;
}

export type ActionHandler = (context: HookContext) => unknown;

export type BeforeHook = (
  context: HookContext
) => CancelOutcome | void | Promise<CancelOutcome | void>;

export type AfterHook = (context: HookContext, result: unknown) => void | Promise<void>;

/** Returns true when the error has been handled. */
export type ErrorHook = (context: HookContext, error: unknown) => boolean | Promise<boolean>;

/**
 * A hook implementation. One handler may serve several phases.
 */
export interface HookHandler {
  before?: BeforeHook;
  after?: AfterHook;
  onError?: ErrorHook;
}

// ============================================================================
// Diagnostics
// ============================================================================

export type UsageErrorKind =
  | "UnknownCommand"
  | "UnknownAction"
  | "NoActionSpecified"
  | "UnknownOption"
  | "MissingRequiredParameter"
  | "ConversionFailure"
  | "ValidationFailure"
  | "MutualExclusionConflict"
  | "UnexpectedArgument";

export interface Diagnostic {
  kind: UsageErrorKind;
  message: string;
  /** What the engine was looking for, e.g. `--environment` or `integer` */
  expected?: string;
  /** The offending token or value */
  found?: string;
  /** Ranked "did you mean" candidates */
  suggestions: string[];
}

export interface HelpTopic {
  /** Command path from the root */
  path: readonly CommandNode[];
  action?: ActionNode;
  globalOptions: readonly ParameterSpec[];
}

/**
 * Receives what the engine wants the user to see.
 */
export interface DiagnosticReporter {
  report(diagnostic: Diagnostic): void;
  help(topic: HelpTopic): void;
  version(version: string): void;
}

// ============================================================================
// Dispatch Results
// ============================================================================

export type ValueSource = "cli" | "env" | "prompt" | "default";

export interface ResolvedInvocation {
  path: readonly CommandNode[];
  action: ActionNode;
  arguments: readonly string[];
  parameters: ParameterValues;
  globals: ParameterValues;
  sources: Readonly<Record<string, ValueSource>>;
}

export type DispatchStatus =
  | "success"
  | "usage_error"
  | "cancelled"
  | "handled_error"
  | "help"
  | "version";

export interface SuccessResult {
  status: "success";
  exitCode: number;
  value: unknown;
  invocation: ResolvedInvocation;
}

export interface UsageErrorResult {
  status: "usage_error";
  exitCode: number;
  diagnostic: Diagnostic;
}

export interface CancelledResult {
  status: "cancelled";
  exitCode: number;
  reason: string;
  invocation: ResolvedInvocation;
}

export interface HandledErrorResult {
  status: "handled_error";
  exitCode: number;
  error: unknown;
  invocation: ResolvedInvocation;
}

export interface HelpResult {
  status: "help";
  exitCode: number;
  topic: HelpTopic;
}

export interface VersionResult {
  status: "version";
  exitCode: number;
  version: string;
}

/**
 * The outcome of one dispatch - discriminated union by status
 */
export type DispatchResult =
  | SuccessResult
  | UsageErrorResult
  | CancelledResult
  | HandledErrorResult
  | HelpResult
  | VersionResult;

export interface DispatchOptions {
  signal?: AbortSignal;
}
