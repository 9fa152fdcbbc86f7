export type CancelSignal = 'SIGINT' | 'SIGTERM';

export interface InstalledCliCancellation {
  /** AbortSignal that flips when cancellation is requested. */
  signal: AbortSignal;
  /** Remove handlers and clear active signal. */
  dispose(): void;
}

let _activeCancelSignal: AbortSignal | null = null;

/**
 * Current active CLI cancellation signal (if any command installed one).
 * Used to abort interactive prompts.
 */
export function getActiveCancelSignal(): AbortSignal | null {
  return _activeCancelSignal;
}

/**
 * Turn SIGINT/SIGTERM into an abort of the active prompt. A second signal
 * exits straight away with the conventional code (130 / 143).
 */
export function installCliCancellation(opts: { onCancel?: (signal: CancelSignal) => void } = {}): InstalledCliCancellation {
  const controller = new AbortController();
  _activeCancelSignal = controller.signal;

  let count = 0;
  let disposed = false;

  const trigger = (signal: CancelSignal) => {
    if (disposed) return;
    count += 1;
    if (count === 1) {
      controller.abort(signal);
      opts.onCancel?.(signal);
      return;
    }
    process.exit(signal === 'SIGTERM' ? 143 : 130);
  };

  const onSigint = () => trigger('SIGINT');
  const onSigterm = () => trigger('SIGTERM');

  // `on`, not `once`: the second press force-quits.
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  const dispose = () => {
    if (disposed) return;
    disposed = true;
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    if (_activeCancelSignal === controller.signal) _activeCancelSignal = null;
  };

  return {
    get signal() {
      return controller.signal;
    },
    dispose,
  };
}
