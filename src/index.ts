/**
 * arbor-cli
 *
 * Declarative command trees: resolve, bind, validate and dispatch.
 */

export * from "./core/index.js";
export { runCli, createConsoleReporter, formatDiagnostic, renderHelp, type RunCliOptions } from "./adapters/cli/index.js";
export { ReadlinePrompt, createReadlinePrompt, type PromptOptions } from "./adapters/prompt/index.js";
export * from "./adapters/model/index.js";
