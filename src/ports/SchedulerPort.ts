export interface ScheduledHandle {
  cancel(): void;
}

/**
 * Runs a task once after a delay. Tasks are lost when the process exits.
 */
export interface SchedulerPort {
  schedule(delayMs: number, task: () => Promise<void>): ScheduledHandle;
}
