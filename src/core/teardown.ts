/**
 * Ordered best-effort cleanup.
 *
 * Actions run last-in first-out, each at most once. A failing action is
 * logged at debug level and the rest still run; nothing is thrown, so a
 * cleanup failure never replaces the error that triggered the teardown.
 */

import { createLogger, type Logger } from './logger.js';

export type TeardownAction = () => void | Promise<void>;

interface Entry {
  label: string;
  action: TeardownAction;
}

export class TeardownStack {
  private entries: Entry[] = [];
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('teardown');
  }

  /** Register an action to run on teardown. */
  push(label: string, action: TeardownAction): void {
    this.entries.push({ label, action });
  }

  get size(): number {
    return this.entries.length;
  }

  /** Forget every registered action; responsibility moved elsewhere. */
  release(): void {
    this.entries = [];
  }

  /** Run and drop all actions, newest first. */
  async run(): Promise<void> {
    const pending = this.entries.reverse();
    this.entries = [];
    for (const { label, action } of pending) {
      try {
        await action();
      } catch (err) {
        this.logger.debug('cleanup step failed', { step: label, error: err });
      }
    }
  }
}
