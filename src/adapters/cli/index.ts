/**
 * CLI Adapter
 *
 * Runs an engine against the process's own arguments and turns the outcome
 * into `process.exitCode`.
 *
 * Usage:
 * ```typescript
 * const engine = createEngine(model, { prompt: createReadlinePrompt() });
 * await runCli(engine);
 * ```
 */

import type { ArborEngine } from "../../core/engine.js";
import { ExitCode } from "../../core/exit-codes.js";
import { ExecutionFailedError, errorMessage } from "../../core/utils.js";
import { output } from "./formatter.js";

export { createConsoleReporter, formatDiagnostic, renderHelp, output } from "./formatter.js";

export interface RunCliOptions {
  /** Abort the dispatch on SIGINT (default true) */
  handleInterrupt?: boolean;
}

/**
 * Dispatch `argv` and return the exit code, reporting failures that escape
 * the engine on stderr. Sets `process.exitCode`.
 */
export async function runCli(
  engine: ArborEngine,
  argv: readonly string[] = process.argv.slice(2),
  options: RunCliOptions = {}
): Promise<number> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort(new Error("Interrupted"));
  const handleInterrupt = options.handleInterrupt ?? true;
  if (handleInterrupt) process.once("SIGINT", onInterrupt);

  let exitCode: number;
  try {
    exitCode = await engine.dispatch(argv, { signal: controller.signal });
  } catch (error) {
    if (error instanceof ExecutionFailedError) {
      const cause: unknown = error.cause;
      console.error(output.error(errorMessage(cause ?? error)));
      exitCode = error.exitCode;
    } else {
      console.error(output.error(errorMessage(error)));
      exitCode = ExitCode.Software;
    }
  } finally {
    if (handleInterrupt) process.removeListener("SIGINT", onInterrupt);
  }

  process.exitCode = exitCode;
  return exitCode;
}
