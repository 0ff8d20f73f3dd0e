import { INTERRUPT_SIGNALS, forwardSignals } from '../../../src/utils/signal-forwarder';

function listenerCounts(): number[] {
  return INTERRUPT_SIGNALS.map((signal) => process.listenerCount(signal));
}

describe('forwardSignals', () => {
  it('registers one listener per signal and removes them on cleanup', () => {
    const before = listenerCounts();

    const cleanup = forwardSignals(new AbortController());
    expect(listenerCounts()).toEqual(before.map((count) => count + 1));

    cleanup();
    expect(listenerCounts()).toEqual(before);
  });

  it('aborts on the first signal and forces an exit on the second', () => {
    const controller = new AbortController();
    const onForcedExit = jest.fn();
    const cleanup = forwardSignals(controller, { onForcedExit });

    try {
      const [handler] = process.listeners('SIGTERM').slice(-1);
      handler('SIGTERM');

      expect(controller.signal.aborted).toBe(true);
      expect(controller.signal.reason).toBe('SIGTERM');
      expect(onForcedExit).not.toHaveBeenCalled();

      const [interrupt] = process.listeners('SIGINT').slice(-1);
      interrupt('SIGINT');

      expect(onForcedExit).toHaveBeenCalledWith('SIGINT');
    } finally {
      cleanup();
    }
  });
});
