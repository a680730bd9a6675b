/**
 * Arbor Engine - Dispatch Coordinator
 *
 * Resolves an argument vector against a command model, binds parameters,
 * runs hooks and the action, and turns the outcome into an exit code.
 */

import type { Logger } from "pino";
import { createConsoleReporter } from "../adapters/cli/formatter.js";
import { bindParameters, extractGlobalOptions, END_OF_OPTIONS, type Environment, type PromptProvider } from "./binder.js";
import { TypeConverterRegistry } from "./conversion.js";
import { ExitCode } from "./exit-codes.js";
import { HookOrchestrator } from "./hooks.js";
import { createLogger } from "./logger.js";
import { validateModel, type CommandModel } from "./model.js";
import { locate, resolveCommand } from "./resolver.js";
import type {
  ActionNode,
  CommandNode,
  DiagnosticReporter,
  DispatchOptions,
  DispatchResult,
  HelpTopic,
  ResolvedInvocation,
} from "./types.js";
import { UsageError } from "./utils.js";

const HELP_TOKENS = ["--help", "-h"];
const VERSION_TOKEN = "--version";

/**
 * Options for creating an ArborEngine instance.
 */
export interface EngineOptions {
  /** Environment variables read for `envVar` parameters. Defaults to process.env */
  env?: Environment;

  /** Source of interactive answers. Without one, prompts are skipped */
  prompt?: PromptProvider;

  /** Where diagnostics, help and the version go. Defaults to stderr/stdout */
  reporter?: DiagnosticReporter;

  logger?: Logger;

  /** Registry holding custom converters the model refers to */
  converters?: TypeConverterRegistry;

  /** Exit code for resolution and binding failures (default 64) */
  usageExitCode?: number;

  /** Exit code when a before-hook or the signal cancels (default 6) */
  cancelledExitCode?: number;

  /** Answered to `--version` at the root */
  version?: string;
}

/**
 * Arbor Engine
 *
 * Usage:
 * ```typescript
 * const engine = createEngine(model, { version: "1.2.0" });
 *
 * // Exit code only
 * const code = await engine.dispatch(process.argv.slice(2));
 *
 * // Full outcome
 * const result = await engine.run(["deploy", "--region", "us-east"]);
 * if (result.status === "usage_error") console.error(result.diagnostic.message);
 * ```
 */
export class ArborEngine {
  readonly model: CommandModel;
  private env: Environment;
  private prompt?: PromptProvider;
  private reporter: DiagnosticReporter;
  private logger: Logger;
  private converters: TypeConverterRegistry;
  private orchestrator: HookOrchestrator;
  private usageExitCode: number;
  private cancelledExitCode: number;
  private version?: string;

  constructor(model: CommandModel, options: EngineOptions = {}) {
    this.converters = options.converters ?? new TypeConverterRegistry();
    validateModel(model, this.converters);

    this.model = model;
    this.env = options.env ?? process.env;
    this.prompt = options.prompt;
    this.reporter = options.reporter ?? createConsoleReporter();
    this.logger = options.logger ?? createLogger({ name: model.root.name });
    this.orchestrator = new HookOrchestrator(model.handlers, this.logger);
    this.usageExitCode = options.usageExitCode ?? ExitCode.Usage;
    this.cancelledExitCode = options.cancelledExitCode ?? ExitCode.Cancelled;
    this.version = options.version;
  }

  // ==========================================================================
  // Entry Points
  // ==========================================================================

  /**
   * Run `argv` and return the process exit code. Throws ExecutionFailedError
   * when the action fails and no error-hook handles it.
   */
  async dispatch(argv: readonly string[], options: DispatchOptions = {}): Promise<number> {
    const result = await this.run(argv, options);
    return result.exitCode;
  }

  /**
   * Run `argv` and return the structured outcome.
   */
  async run(argv: readonly string[], options: DispatchOptions = {}): Promise<DispatchResult> {
    const signal = options.signal ?? new AbortController().signal;
    this.logger.debug({ argv }, "dispatch");

    let invocation: ResolvedInvocation;
    try {
      const early = this.answerBuiltins(argv);
      if (early) return early;

      const resolved = await this.resolveInvocation(argv);
      if (!("action" in resolved)) {
        return this.help(resolved);
      }
      invocation = resolved;
    } catch (error) {
      if (error instanceof UsageError) {
        this.logger.debug({ kind: error.kind }, "usage error");
        this.reporter.report(error.diagnostic);
        return { status: "usage_error", exitCode: this.usageExitCode, diagnostic: error.diagnostic };
      }
      throw error;
    }

    const outcome = await this.orchestrator.execute(invocation, signal);
    this.logger.debug({ status: outcome.status }, "dispatch finished");

    switch (outcome.status) {
      case "completed":
        return { status: "success", exitCode: outcome.exitCode, value: outcome.value, invocation };
      case "cancelled":
        return { status: "cancelled", exitCode: this.cancelledExitCode, reason: outcome.reason, invocation };
      case "handled":
        return { status: "handled_error", exitCode: outcome.exitCode, error: outcome.error, invocation };
    }
  }

  /**
   * Resolve and bind without running hooks or the action. Throws
   * UsageError on failure.
   */
  async resolve(argv: readonly string[]): Promise<ResolvedInvocation> {
    const resolved = await this.resolveInvocation(argv);
    if (!("action" in resolved)) {
      const where = resolved.path.map((node) => node.name).join(" ");
      throw new UsageError({
        kind: "NoActionSpecified",
        message: `No action specified for '${where}'.`,
        expected: "a command",
        suggestions: [],
      });
    }
    return resolved;
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private async resolveInvocation(
    argv: readonly string[]
  ): Promise<ResolvedInvocation | { path: readonly CommandNode[] }> {
    const { globalTokens, rest } = extractGlobalOptions(argv, this.model.globalOptions);
    const outcome = resolveCommand(this.model.root, rest);
    if (outcome.status === "help") {
      return { path: outcome.path };
    }

    this.logger.debug(
      { path: outcome.path.map((node) => node.name), action: outcome.action.name },
      "command resolved"
    );

    const binderOptions = {
      converters: this.converters,
      env: this.env,
      prompt: this.prompt,
      logger: this.logger,
    };
    const globals = await bindParameters(globalTokens, this.model.globalOptions, binderOptions);
    const bound = await bindParameters(outcome.tokens, outcome.action.parameters, binderOptions);

    return {
      path: outcome.path,
      action: outcome.action,
      arguments: outcome.tokens,
      parameters: bound.values,
      globals: globals.values,
      sources: { ...globals.sources, ...bound.sources },
    };
  }

  /**
   * `--help` and `--version` are answered before anything is bound.
   */
  private answerBuiltins(argv: readonly string[]): DispatchResult | undefined {
    const end = argv.indexOf(END_OF_OPTIONS);
    const options = end === -1 ? argv : argv.slice(0, end);
    const { rest } = extractGlobalOptions(options, this.model.globalOptions);

    if (this.version !== undefined && rest.length === 1 && rest[0] === VERSION_TOKEN && !this.rootDeclares("version")) {
      this.reporter.version(this.version);
      return { status: "version", exitCode: ExitCode.Success, version: this.version };
    }

    if (!rest.some((token) => HELP_TOKENS.includes(token))) return undefined;

    const { path, action } = locate(this.model.root, rest);
    if (action && declaresHelp(action)) return undefined;
    return this.help({ path, action });
  }

  private help(located: { path: readonly CommandNode[]; action?: ActionNode }): DispatchResult {
    const topic: HelpTopic = {
      path: located.path,
      action: located.action,
      globalOptions: this.model.globalOptions,
    };
    this.reporter.help(topic);
    return { status: "help", exitCode: ExitCode.Success, topic };
  }

  private rootDeclares(name: string): boolean {
    const primary = this.model.root.actions.find((a) => a.isPrimary);
    return primary !== undefined && primary.parameters.some((p) => p.name === name);
  }
}

function declaresHelp(action: ActionNode): boolean {
  return action.parameters.some((p) => p.name === "help" || p.shortName === "h");
}

/**
 * Create a new engine for `model`.
 */
export function createEngine(model: CommandModel, options?: EngineOptions): ArborEngine {
  return new ArborEngine(model, options);
}
