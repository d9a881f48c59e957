import { EventEmitter } from 'eventemitter3';
import type { Logger } from '../types.js';

/**
 * Where OS signals come from. `process` in production.
 */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface LifecycleOptions {
  /**
   * Cancelling the parent cancels this controller too
   */
  parent?: AbortSignal;

  /**
   * Default: ['SIGINT', 'SIGTERM']
   */
  signals?: NodeJS.Signals[];

  /**
   * Default: process
   */
  source?: SignalSource;

  logger?: Logger;
}

export interface LifecycleEvents {
  cancelled: (reason: string) => void;
}

/**
 * Abort reason for a cancelled invocation
 */
export class InvocationCancelledError extends Error {
  constructor(public reason: string) {
    super(`Invocation cancelled: ${reason}`);
    this.name = 'InvocationCancelledError';
  }
}

/**
 * LifecycleController - owns the root abort signal of one invocation
 *
 * The first interrupt or termination signal aborts the signal and the
 * controller stops listening, so a second signal gets the default behavior.
 * No other component listens to OS signals.
 *
 * @example
 * ```typescript
 * const lifecycle = new LifecycleController({ logger });
 * const signal = lifecycle.start();
 * try {
 *   await runner.build(signal);
 * } finally {
 *   lifecycle.dispose();
 * }
 * ```
 */
export class LifecycleController extends EventEmitter<LifecycleEvents> {
  private controller = new AbortController();
  private source: SignalSource;
  private signals: NodeJS.Signals[];
  private parent?: AbortSignal;
  private logger?: Logger;
  private listening = false;

  constructor(options: LifecycleOptions = {}) {
    super();
    this.source = options.source || process;
    this.signals = options.signals || ['SIGINT', 'SIGTERM'];
    this.parent = options.parent;
    this.logger = options.logger;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isListening(): boolean {
    return this.listening;
  }

  /**
   * Begin listening for signals and return the root abort signal
   */
  start(): AbortSignal {
    if (this.listening || this.signal.aborted) {
      return this.signal;
    }

    if (this.parent?.aborted) {
      this.cancel('parent cancelled');
      return this.signal;
    }

    this.listening = true;
    for (const name of this.signals) {
      this.source.once(name, this.handleSignal);
    }
    this.parent?.addEventListener('abort', this.handleParentAbort, { once: true });

    this.logger?.debug('Listening for signals', { signals: this.signals });
    return this.signal;
  }

  /**
   * Abort the root signal. Only the first call has any effect.
   */
  cancel(reason: string): void {
    if (this.signal.aborted) {
      return;
    }
    this.stopListening();
    this.controller.abort(new InvocationCancelledError(reason));
    this.emit('cancelled', reason);
  }

  /**
   * Stop listening without cancelling (the run finished on its own)
   */
  dispose(): void {
    this.stopListening();
  }

  private handleSignal = (signal: NodeJS.Signals) => {
    this.logger?.warn(`Received ${signal}, cancelling running steps`);
    this.cancel(`received ${signal}`);
  };

  private handleParentAbort = () => {
    this.cancel('parent cancelled');
  };

  private stopListening(): void {
    if (!this.listening) {
      return;
    }
    this.listening = false;
    for (const name of this.signals) {
      this.source.removeListener(name, this.handleSignal);
    }
    this.parent?.removeEventListener('abort', this.handleParentAbort);
  }
}
