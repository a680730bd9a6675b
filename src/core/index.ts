/**
 * Arbor Core Engine
 *
 * Main export for the command parsing and dispatch engine.
 */

// Engine
export { ArborEngine, createEngine, type EngineOptions } from "./engine.js";

// Model
export {
  defineModel,
  validateModel,
  command,
  action,
  option,
  argument,
  listOf,
  enumOf,
  customType,
  range,
  pattern,
  fileExists,
  directoryExists,
  beforeHook,
  afterHook,
  errorHook,
  mapExitCode,
  type CommandModel,
  type ModelDefinition,
  type CommandDefinition,
  type ActionDefinition,
  type ParameterOptions,
  type HookDefinition,
  type TypeInput,
} from "./model.js";
export { HandlerRegistry } from "./handlers.js";

// Types
export type {
  ActionHandler,
  ActionNode,
  AfterHook,
  BeforeHook,
  CancelOutcome,
  CommandNode,
  Diagnostic,
  DiagnosticReporter,
  DispatchOptions,
  DispatchResult,
  DispatchStatus,
  ErrorHook,
  ErrorKind,
  ExitCodeMapping,
  HelpTopic,
  HookContext,
  HookHandler,
  HookPhase,
  HookSpec,
  ParameterSpec,
  ParameterValues,
  ResolvedInvocation,
  TypeDescriptor,
  UsageErrorKind,
  ValidationRule,
  ValueSource,
} from "./types.js";

// Components
export { cancel, HookOrchestrator, type ExecutionOutcome } from "./hooks.js";
export { bindParameters, extractGlobalOptions, tokenize, parameterLabel, type PromptProvider, type Environment } from "./binder.js";
export { resolveCommand, walkCommands, locate, type ResolveOutcome } from "./resolver.js";
export {
  TypeConverterRegistry,
  createConverterRegistry,
  ConversionError,
  parseDuration,
  formatDuration,
  type TypeConverter,
} from "./conversion.js";
export { validateValue, describeRule, type ValidationFailure } from "./validation.js";
export { findSimilar, findMostSimilar, editDistance, formatSuggestions } from "./similarity.js";
export { ExitCode, resolveExitCode, findExitCodeMapping, errorKindDistance } from "./exit-codes.js";
export { createLogger, type Logger, type LogLevel } from "./logger.js";

// Errors
export { ArborError, UsageError, ModelError, ExecutionFailedError } from "./utils.js";
