import type { Logger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

export type BestEffortOptions<T> = {
  fallback: T;
  /** Level used to report the swallowed failure; `ignore` stays silent. */
  onError?: 'ignore' | 'debug' | 'warn';
  label?: string;
  context?: Record<string, unknown>;
  log?: Logger;
};

function logBestEffortFailure(error: unknown, options: BestEffortOptions<unknown>): void {
  const level = options.onError ?? 'ignore';
  if (level === 'ignore' || !options.log) {
    return;
  }
  options.log[level](options.label ?? 'best-effort fallback used', {
    ...options.context,
    message: describeError(error),
  });
}

/**
 * Runs an optional operation; any rejection resolves to `fallback`.
 */
export async function bestEffort<T>(
  fn: () => Promise<T>,
  options: BestEffortOptions<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}

export function bestEffortSync<T>(fn: () => T, options: BestEffortOptions<T>): T {
  try {
    return fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}

export function safeJsonParse(
  raw: string,
  options: Omit<BestEffortOptions<unknown>, 'fallback'> = {},
): unknown {
  return bestEffortSync<unknown>(() => JSON.parse(raw), { ...options, fallback: undefined });
}

export async function safeReadText(
  response: { text: () => Promise<string> },
  fallback = '',
  options: Omit<BestEffortOptions<string>, 'fallback'> = {},
): Promise<string> {
  return bestEffort(() => response.text(), { ...options, fallback });
}
