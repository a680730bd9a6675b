/**
 * Handler Registry
 *
 * Actions and hooks in a command model refer to their implementations by
 * id. The registry maps those ids to functions.
 */

import type { ActionHandler, HookHandler, HookPhase } from "./types.js";
import { ArborError } from "./utils.js";

export class HandlerRegistry {
  private actions = new Map<string, ActionHandler>();
  private hooks = new Map<string, HookHandler>();
  private sequence = 0;

  registerAction(id: string, handler: ActionHandler): this {
    if (this.actions.has(id)) {
      throw new ArborError(`Action handler '${id}' is already registered`, "DUPLICATE_HANDLER", { id });
    }
    this.actions.set(id, handler);
    return this;
  }

  registerHook(id: string, handler: HookHandler): this {
    if (this.hooks.has(id)) {
      throw new ArborError(`Hook handler '${id}' is already registered`, "DUPLICATE_HANDLER", { id });
    }
    this.hooks.set(id, handler);
    return this;
  }

  action(id: string): ActionHandler | undefined {
    return this.actions.get(id);
  }

  hook(id: string): HookHandler | undefined {
    return this.hooks.get(id);
  }

  hasHookPhase(id: string, phase: HookPhase): boolean {
    const handler = this.hooks.get(id);
    if (!handler) return false;
    switch (phase) {
      case "before":
        return handler.before !== undefined;
      case "after":
        return handler.after !== undefined;
      case "error":
        return handler.onError !== undefined;
    }
  }

  /**
   * An id not yet used by any action or hook, for inline handlers.
   */
  nextId(prefix: string): string {
    let id: string;
    do {
      this.sequence++;
      id = `${prefix}-${this.sequence}`;
    } while (this.actions.has(id) || this.hooks.has(id));
    return id;
  }
}
