import { randomUUID } from 'node:crypto';
import type { RestorationDraft, RestorationTask } from '@/domain/announcement/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { ScheduledHandle, SchedulerPort } from '@/ports/SchedulerPort';
import type { Logger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

export type RestorationExecutor = (task: RestorationTask) => Promise<void>;

type PendingEntry = {
  task: RestorationTask;
  handle: ScheduledHandle;
};

/**
 * Keeps restoration tasks alive past the request that created them. Each task
 * fires exactly once and drops out of the pending set when it does; nothing is
 * persisted, so a restart loses whatever was still pending.
 */
export class RestorationScheduler {
  private readonly pending = new Map<string, PendingEntry>();

  constructor(
    private readonly scheduler: SchedulerPort,
    private readonly clock: ClockPort,
    private readonly log: Logger,
  ) {}

  public schedule(draft: RestorationDraft, delayMs: number, execute: RestorationExecutor): RestorationTask {
    const delay = Math.max(0, Math.round(delayMs));
    const task: RestorationTask = { ...draft, id: randomUUID(), fireAt: this.clock.now() + delay };
    const handle = this.scheduler.schedule(delay, () => this.fire(task.id, execute));
    this.pending.set(task.id, { task, handle });
    this.log.debug('restoration scheduled', {
      kind: task.kind,
      deviceId: task.deviceId,
      requestId: task.requestId,
      delayMs: delay,
    });
    return task;
  }

  public list(): RestorationTask[] {
    return [...this.pending.values()].map((entry) => entry.task);
  }

  public get size(): number {
    return this.pending.size;
  }

  /** Drops every pending task without running it. */
  public cancelAll(): number {
    const count = this.pending.size;
    for (const entry of this.pending.values()) {
      entry.handle.cancel();
    }
    this.pending.clear();
    if (count) {
      this.log.info('pending restorations cancelled', { count });
    }
    return count;
  }

  private async fire(id: string, execute: RestorationExecutor): Promise<void> {
    const entry = this.pending.get(id);
    if (!entry) {
      return;
    }
    this.pending.delete(id);
    try {
      await execute(entry.task);
    } catch (error) {
      this.log.warn('restoration task failed', {
        kind: entry.task.kind,
        deviceId: entry.task.deviceId,
        message: describeError(error),
      });
    }
  }
}
