// src/runner/session/signals.ts
import { turnTrace } from '@/runner/util/trace';

/**
 * Abort `controller` on SIGINT. A second SIGINT while the first is still
 * being honored exits immediately with code 130.
 * Returns a detach function.
 */
export const attachSessionSignals = (
  controller: AbortController,
  proc: Pick<NodeJS.Process, 'on' | 'off' | 'exit'> = process,
): (() => void) => {
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      proc.exit(130);
      return;
    }
    turnTrace.session.stopping();
    controller.abort();
  };
  proc.on('SIGINT', onSigint);
  return () => {
    proc.off('SIGINT', onSigint);
  };
};
