/**
 * Hook Orchestrator
 *
 * Runs before-hooks, the action, then after-hooks or error-hooks, for one
 * resolved invocation.
 *
 *   idle → before → (cancelled | action) → (after | error) → done
 *
 * Command-level hooks run ahead of action-level hooks of the same phase,
 * ordered by `order`, ties in declaration order. Cancellation and "handled"
 * are return values, never exceptions.
 */

import type { Logger } from "pino";
import { ExitCode, findExitCodeMapping, isExitCode } from "./exit-codes.js";
import type { HandlerRegistry } from "./handlers.js";
import type {
  ActionNode,
  CancelOutcome,
  CommandNode,
  ExitCodeMapping,
  HookContext,
  HookHandler,
  HookPhase,
  ParameterValues,
  ResolvedInvocation,
} from "./types.js";
import { ArborError, ExecutionFailedError, errorMessage } from "./utils.js";

export type OrchestratorState = "idle" | "before" | "cancelled" | "action" | "after" | "error" | "done";

export type ExecutionOutcome =
  | { status: "completed"; value: unknown; exitCode: number }
  | { status: "cancelled"; reason: string }
  | { status: "handled"; error: unknown; exitCode: number };

/**
 * Returned by a before-hook to stop the action from running.
 */
export function cancel(message: string): CancelOutcome {
  return { cancel: true, message };
}

function isCancelOutcome(value: unknown): value is CancelOutcome {
  return typeof value === "object" && value !== null && "cancel" in value && value.cancel === true;
}

// ============================================================================
// Context
// ============================================================================

class InvocationContext implements HookContext {
  readonly data = new Map<string, unknown>();
  state: OrchestratorState = "idle";
  private messages: string[] = [];

  constructor(
    readonly commandPath: readonly string[],
    readonly actionName: string,
    readonly args: readonly string[],
    readonly parameters: ParameterValues,
    readonly globals: ParameterValues,
    readonly signal: AbortSignal
  ) {}

  get arguments(): readonly string[] {
    return this.args;
  }

  get isCancelled(): boolean {
    return this.messages.length > 0;
  }

  get cancellationMessages(): readonly string[] {
    return [...this.messages];
  }

  cancelWith(message: string): void {
    this.messages.push(message);
  }
}

// ============================================================================
// Hook Collection
// ============================================================================

interface ScheduledHook {
  handlerId: string;
  handler: HookHandler;
  order: number;
}

export class HookOrchestrator {
  constructor(
    private handlers: HandlerRegistry,
    private logger?: Logger
  ) {}

  /**
   * Hooks of one phase in run order: every command on the path (outermost
   * first), then the action. Each level is stable-sorted by `order` on its own.
   */
  schedule(path: readonly CommandNode[], action: ActionNode, phase: HookPhase): ScheduledHook[] {
    const scheduled = (specs: readonly { phase: HookPhase; handlerId: string; order: number }[]) =>
      specs
        .filter((spec) => spec.phase === phase)
        .flatMap((spec) => {
          const handler = this.handlers.hook(spec.handlerId);
          return handler ? [{ handlerId: spec.handlerId, handler, order: spec.order }] : [];
        })
        .sort((a, b) => a.order - b.order);

    return [...path.flatMap((node) => scheduled(node.hooks)), ...scheduled(action.hooks)];
  }

  /**
   * Run one invocation. Resolves with the outcome; rejects with
   * ExecutionFailedError when a failure is not handled.
   */
  async execute(invocation: ResolvedInvocation, signal: AbortSignal): Promise<ExecutionOutcome> {
    const { path, action } = invocation;
    const context = new InvocationContext(
      path.slice(1).map((node) => node.name),
      action.name,
      invocation.arguments,
      invocation.parameters,
      invocation.globals,
      signal
    );
    const mappingLevels: (readonly ExitCodeMapping[])[] = [
      action.exitCodeMappings,
      ...[...path].reverse().map((node) => node.exitCodeMappings),
    ];

    // Before-hooks ---------------------------------------------------------
    this.transition(context, "before");
    try {
      for (const hook of this.schedule(path, action, "before")) {
        const outcome = await hook.handler.before?.(context);
        if (isCancelOutcome(outcome)) {
          this.logger?.debug({ hook: hook.handlerId, message: outcome.message }, "before-hook cancelled");
          context.cancelWith(outcome.message);
        }
      }
    } catch (error) {
      return this.handleError(context, path, action, mappingLevels, error);
    }

    if (context.isCancelled) {
      this.transition(context, "cancelled");
      this.transition(context, "done");
      return { status: "cancelled", reason: context.cancellationMessages.join("; ") };
    }

    if (signal.aborted) {
      this.transition(context, "cancelled");
      this.transition(context, "done");
      return { status: "cancelled", reason: abortReason(signal) };
    }

    // Action ---------------------------------------------------------------
    this.transition(context, "action");
    const handler = this.handlers.action(action.handlerId);
    if (!handler) {
      throw new ArborError(`No action handler registered as '${action.handlerId}'`, "UNKNOWN_HANDLER", {
        handlerId: action.handlerId,
      });
    }

    let value: unknown;
    let exitCode: number;
    try {
      value = await handler(context);
      exitCode = actionExitCode(action, value);
    } catch (error) {
      return this.handleError(context, path, action, mappingLevels, error);
    }

    // After-hooks ----------------------------------------------------------
    this.transition(context, "after");
    for (const hook of this.schedule(path, action, "after")) {
      try {
        await hook.handler.after?.(context, value);
      } catch (error) {
        this.transition(context, "done");
        throw new ExecutionFailedError(
          `After-hook '${hook.handlerId}' failed: ${errorMessage(error)}`,
          error,
          findExitCodeMapping(error, mappingLevels)?.exitCode ?? ExitCode.Error
        );
      }
    }

    this.transition(context, "done");
    return { status: "completed", value, exitCode };
  }

  private async handleError(
    context: InvocationContext,
    path: readonly CommandNode[],
    action: ActionNode,
    mappingLevels: readonly (readonly ExitCodeMapping[])[],
    error: unknown
  ): Promise<ExecutionOutcome> {
    this.transition(context, "error");
    this.logger?.debug({ action: action.name, err: error }, "action failed");

    const mapped = findExitCodeMapping(error, mappingLevels);
    const exitCode = mapped?.exitCode ?? ExitCode.Error;

    let handled = false;
    for (const hook of this.schedule(path, action, "error")) {
      try {
        if (await hook.handler.onError?.(context, error)) handled = true;
      } catch (hookError) {
        this.transition(context, "done");
        throw new ExecutionFailedError(
          `Error-hook '${hook.handlerId}' failed: ${errorMessage(hookError)}`,
          hookError,
          exitCode
        );
      }
    }

    this.transition(context, "done");
    if (handled) {
      return { status: "handled", error, exitCode };
    }
    throw new ExecutionFailedError(`Action '${action.name}' failed: ${errorMessage(error)}`, error, exitCode);
  }

  private transition(context: InvocationContext, next: OrchestratorState): void {
    this.logger?.debug({ action: context.actionName, from: context.state, to: next }, "hook phase");
    context.state = next;
  }
}

/**
 * Exit code of a completed action: its returned integer when the action
 * declares one, otherwise 0.
 */
function actionExitCode(action: ActionNode, value: unknown): number {
  if (!action.returnsExitCode || value === undefined) return ExitCode.Success;
  if (isExitCode(value)) return value;
  throw new ArborError(
    `Action '${action.name}' returned ${String(value)}, which is not an exit code`,
    "INVALID_EXIT_CODE",
    { value }
  );
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  if (typeof reason === "string" && reason.length > 0) return reason;
  return "Operation was cancelled";
}
