/**
 * Interactive prompts using Node.js readline.
 *
 * Supplies values for parameters that declare a prompt when the user left
 * them off the command line and the environment.
 */

import { createInterface } from "node:readline";
import { Writable } from "node:stream";
import type { PromptProvider } from "../../core/binder.js";

export interface PromptOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
  /** Overrides the TTY check on `input` */
  interactive?: boolean;
}

export class ReadlinePrompt implements PromptProvider {
  private input: NodeJS.ReadableStream & { isTTY?: boolean };
  private output: NodeJS.WritableStream;
  private interactive?: boolean;

  constructor(options: PromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stderr;
    this.interactive = options.interactive;
  }

  isInteractive(): boolean {
    return this.interactive ?? this.input.isTTY === true;
  }

  /**
   * Ask a question and return the trimmed answer. With `secure`, typed
   * characters are not echoed. Resolves "" when input ends first.
   */
  async ask(message: string, options: { secure: boolean } = { secure: false }): Promise<string> {
    const target = this.output;
    let muted = false;
    const sink = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) target.write(chunk);
        callback();
      },
    });

    const rl = createInterface({ input: this.input, output: sink });
    const promptText = `${message}: `;

    return new Promise((resolve) => {
      let answered = false;
      rl.once("close", () => {
        if (!answered) resolve("");
      });
      rl.question(promptText, (answer) => {
        answered = true;
        if (options.secure) target.write("\n");
        rl.close();
        resolve(answer.trim());
      });
      muted = options.secure;
    });
  }
}

export function createReadlinePrompt(options?: PromptOptions): ReadlinePrompt {
  return new ReadlinePrompt(options);
}
