/**
 * Cancellation scopes that react both to a caller's AbortSignal and to a
 * process-wide shutdown request.
 */

import { ErrorCode } from '../types/errors.js';
import { ComposeError } from './compose-error.js';

// ---------------------------------------------------------------------------
// Shutdown triggers
// ---------------------------------------------------------------------------

/**
 * Subscribes a listener to shutdown requests and returns the unsubscribe
 * function. The listener receives the reason to abort with.
 */
export type ShutdownTrigger = (onShutdown: (reason: unknown) => void) => () => void;

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export function shutdownError(signal: string): ComposeError {
  return new ComposeError({ code: ErrorCode.SHUTDOWN, message: `received ${signal}` });
}

// One set of process handlers fans out to every subscriber.
const processSubscribers = new Set<(reason: unknown) => void>();
let detachProcessHandlers: (() => void) | undefined;

function attachProcessHandlers(): () => void {
  const handlers = SHUTDOWN_SIGNALS.map((sig) => {
    const handler = (): void => {
      const reason = shutdownError(sig);
      for (const subscriber of [...processSubscribers]) subscriber(reason);
    };
    process.on(sig, handler);
    return { sig, handler };
  });
  return () => {
    for (const { sig, handler } of handlers) {
      process.off(sig, handler);
    }
  };
}

/**
 * Shutdown on SIGINT or SIGTERM. While anything is subscribed, the process
 * does not exit on those signals by itself. All subscribers share a single
 * handler per signal.
 */
export const processSignalTrigger: ShutdownTrigger = (onShutdown) => {
  processSubscribers.add(onShutdown);
  if (detachProcessHandlers === undefined) {
    detachProcessHandlers = attachProcessHandlers();
  }
  return () => {
    processSubscribers.delete(onShutdown);
    if (processSubscribers.size === 0 && detachProcessHandlers) {
      detachProcessHandlers();
      detachProcessHandlers = undefined;
    }
  };
};

/** A trigger fired by hand, for hosts without OS signals and for tests. */
export interface ManualShutdown {
  trigger: ShutdownTrigger;
  fire(reason?: unknown): void;
  /** Number of live subscriptions. */
  readonly listeners: number;
}

export function manualShutdownTrigger(): ManualShutdown {
  const subscribers = new Set<(reason: unknown) => void>();
  return {
    trigger: (onShutdown) => {
      subscribers.add(onShutdown);
      return () => {
        subscribers.delete(onShutdown);
      };
    },
    fire: (reason = shutdownError('shutdown request')) => {
      for (const subscriber of [...subscribers]) subscriber(reason);
    },
    get listeners() {
      return subscribers.size;
    },
  };
}

/** A trigger that never fires. */
export const noShutdownTrigger: ShutdownTrigger = () => () => undefined;

// ---------------------------------------------------------------------------
// Derived scope
// ---------------------------------------------------------------------------

export interface DerivedScope {
  /** Aborted when the parent aborts or a shutdown is requested. */
  readonly signal: AbortSignal;
  /** Whether a shutdown request (not the parent) was observed. */
  readonly shutdownRequested: boolean;
  /** Detach from the parent and the trigger. Idempotent. */
  release(): void;
}

export function deriveScope(parent: AbortSignal, trigger: ShutdownTrigger): DerivedScope {
  const controller = new AbortController();
  let shutdownRequested = false;
  let released = false;

  const onParentAbort = (): void => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', onParentAbort, { once: true });
  }

  const unsubscribe = trigger((reason) => {
    shutdownRequested = true;
    controller.abort(reason);
  });

  return {
    signal: controller.signal,
    get shutdownRequested() {
      return shutdownRequested;
    },
    release: () => {
      if (released) return;
      released = true;
      parent.removeEventListener('abort', onParentAbort);
      unsubscribe();
    },
  };
}
