import { createLogger } from '@/shared/logging/logger';
import type { Logger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';
import type { Runtime } from '@/runtime/bootstrap';

/** Upper bound for the whole stop sequence before the process exits anyway. */
const FORCE_EXIT_MS = 8000;

/**
 * Stops the runtime once on SIGINT/SIGTERM. Pending restorations are
 * cancelled, not fired.
 */
export function registerShutdownHandlers(runtime: Runtime, log: Logger = createLogger('Server')): void {
  let stopping = false;

  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    log.info('shutting down', { signal });
    const watchdog = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, FORCE_EXIT_MS);

    let exitCode = 0;
    try {
      await runtime.stop();
    } catch (error) {
      log.error('shutdown failed', { message: describeError(error) });
      exitCode = 1;
    } finally {
      clearTimeout(watchdog);
    }
    process.exit(exitCode);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    void stop(signal);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
