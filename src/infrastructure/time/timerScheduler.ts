import type { ScheduledHandle, SchedulerPort } from '@/ports/SchedulerPort';
import { createLogger } from '@/shared/logging/logger';
import type { Logger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

/** setTimeout overflows above this and fires immediately. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Process-local timers. Handles are unref'd so a pending restoration never keeps
 * the process alive; `clear()` drops everything on shutdown.
 */
export class TimerScheduler implements SchedulerPort {
  private readonly timers = new Set<NodeJS.Timeout>();

  constructor(private readonly log: Logger = createLogger('Runtime', 'Scheduler')) {}

  public schedule(delayMs: number, task: () => Promise<void>): ScheduledHandle {
    const delay = Math.min(Math.max(0, delayMs), MAX_TIMER_DELAY_MS);
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      task().catch((error: unknown) => {
        this.log.warn('scheduled task failed', { message: describeError(error) });
      });
    }, delay);
    timer.unref();
    this.timers.add(timer);
    return {
      cancel: () => {
        clearTimeout(timer);
        this.timers.delete(timer);
      },
    };
  }

  public get pending(): number {
    return this.timers.size;
  }

  public clear(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
