/**
 * Termination signal forwarding for the local rack
 *
 * While the local rack runs in the foreground, SIGINT/SIGTERM must stop the
 * container instead of leaving it orphaned. The stop runs at most once no
 * matter how many signals arrive.
 */

import { logger } from '../api/logger.js';

export const TERMINATION_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * The subset of process used for signal subscription
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface SignalWatchOptions {
  /** Defaults to process */
  source?: SignalSource;
  signals?: NodeJS.Signals[];
  /** Called once, when the first signal arrives */
  onSignal?: (signal: NodeJS.Signals, name: string) => void;
  /** Called if the stop fails */
  onError?: (error: unknown, name: string) => void;
}

export interface SignalWatcher {
  /** Unsubscribe; safe to call more than once */
  dispose(): void;
  /** Whether a signal has been received */
  readonly triggered: boolean;
  /** Settles once the stop has finished (undefined until a signal arrives) */
  readonly stopping: Promise<void> | undefined;
}

/**
 * Subscribe to termination signals and stop `name` on the first one
 */
export function watchTerminationSignals(
  name: string,
  stop: () => Promise<void>,
  options: SignalWatchOptions = {}
): SignalWatcher {
  const source = options.source ?? process;
  const signals = options.signals ?? TERMINATION_SIGNALS;
  const onError =
    options.onError ??
    ((error: unknown) => {
      logger.error(`Failed to stop ${name}`, error instanceof Error ? error : new Error(String(error)));
    });

  let stopping: Promise<void> | undefined;
  let disposed = false;

  const listener = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    options.onSignal?.(signal, name);
    stopping = stop().catch((error: unknown) => onError(error, name));
  };

  for (const signal of signals) {
    source.on(signal, listener);
  }

  return {
    dispose(): void {
      if (disposed) return;
      disposed = true;
      for (const signal of signals) {
        source.off(signal, listener);
      }
    },
    get triggered(): boolean {
      return stopping !== undefined;
    },
    get stopping(): Promise<void> | undefined {
      return stopping;
    },
  };
}
