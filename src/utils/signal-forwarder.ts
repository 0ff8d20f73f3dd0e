/**
 * Signal Forwarder
 *
 * Turns SIGINT, SIGTERM and SIGHUP into an abort of the run's
 * AbortController. The process runner listens on the signal and tears down
 * the running pipeline; a second signal exits at once.
 */

export const INTERRUPT_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

export type InterruptSignal = (typeof INTERRUPT_SIGNALS)[number];

export interface ForwardSignalsOptions {
  /** Called on the second signal, after the abort had no chance to finish */
  onForcedExit?: (signal: InterruptSignal) => void;
}

function defaultForcedExit(): void {
  process.exit(130);
}

/**
 * Forward interrupt signals to `controller`.
 * Returns a cleanup function that removes the handlers.
 */
export function forwardSignals(
  controller: AbortController,
  options: ForwardSignalsOptions = {}
): () => void {
  const onForcedExit = options.onForcedExit ?? defaultForcedExit;

  const handlers = INTERRUPT_SIGNALS.map((signal) => {
    const handler = (): void => {
      if (controller.signal.aborted) {
        onForcedExit(signal);
        return;
      }
      controller.abort(signal);
    };
    process.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      process.removeListener(signal, handler);
    }
  };
}
