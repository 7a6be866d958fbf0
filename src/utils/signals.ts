export interface StopSignalHandler {
  signal: AbortSignal;
  cleanup: () => void;
}

/** Turns the first SIGINT or SIGTERM into an abort; later signals get default handling. */
export function createStopSignalHandler(
  onSignal?: (signal: NodeJS.Signals) => void,
): StopSignalHandler {
  const controller = new AbortController();
  let cleaned = false;

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  };

  const handle = (signal: NodeJS.Signals): void => {
    try {
      onSignal?.(signal);
    } finally {
      if (!controller.signal.aborted) controller.abort(signal);
      cleanup();
    }
  };

  const onSigint = (): void => handle('SIGINT');
  const onSigterm = (): void => handle('SIGTERM');

  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);

  return { signal: controller.signal, cleanup };
}
