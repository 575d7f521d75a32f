/**
 * Opens managed contexts in order and guarantees they are closed in reverse
 * order, whether startup fails part-way or the process shuts down.
 */

import type { ManagedContext } from "../transport/types.js";
import { logError, logInfo, toLoggable } from "../utils/logger.js";

export class LifecycleError extends Error {
  constructor(readonly contextName: string, cause: unknown) {
    super(
      `Failed to start ${contextName}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "LifecycleError";
  }
}

export class LifecycleManager {
  private readonly opened: ManagedContext[] = [];

  get openContexts(): readonly string[] {
    return this.opened.map((context) => context.name);
  }

  /**
   * Open each context in turn. If one fails, every context opened before it
   * is closed before the failure is rethrown as a LifecycleError.
   */
  async openAll(contexts: readonly ManagedContext[]): Promise<void> {
    for (const context of contexts) {
      try {
        await context.open();
      } catch (error) {
        logError(`Could not open ${context.name}, unwinding`, toLoggable(error));
        await this.closeAll();
        throw new LifecycleError(context.name, error);
      }
      this.opened.push(context);
    }
  }

  /**
   * Close every opened context, most recent first. A failing close is logged
   * and does not stop the others. Safe to call more than once.
   */
  async closeAll(): Promise<void> {
    while (this.opened.length > 0) {
      const context = this.opened.pop();
      if (!context) break;
      try {
        await context.close();
        logInfo(`Closed ${context.name}`, { component: "Lifecycle" });
      } catch (error) {
        logError(`Error while closing ${context.name}`, toLoggable(error));
      }
    }
  }
}
