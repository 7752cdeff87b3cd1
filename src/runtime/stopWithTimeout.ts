import { createLogger } from '@/shared/logging/logger';
import type { Logger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

/**
 * Runs a service's stop function against a deadline. A stop that outlives the
 * deadline keeps running; its eventual failure is still logged.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: Logger = createLogger('Server'),
): Promise<StopResult> {
  const outcome: Promise<StopResult> = stopFn().then(
    (): StopResult => ({ kind: 'stopped' }),
    (error: unknown): StopResult => ({ kind: 'error', error }),
  );

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<StopResult>((resolve) => {
    timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });
  const result = await Promise.race([outcome, deadline]);
  clearTimeout(timer);

  switch (result.kind) {
    case 'stopped':
      log.info(`service ${name} stopped`);
      break;
    case 'error':
      log.error(`failed to stop ${name}`, { message: describeError(result.error) });
      break;
    case 'timeout':
      log.warn(`service ${name} stop timed out`, { timeoutMs });
      void outcome.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: describeError(late.error) });
        }
      });
      break;
  }
  return result;
}
