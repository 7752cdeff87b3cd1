import type { RestoreTimingConfig } from '@/domain/config/types';
import type { DurationEstimate } from '@/domain/announcement/types';

export type RestoreTiming = Pick<RestoreTimingConfig, 'marginMs' | 'floorMs' | 'fallbackMs' | 'stateRestoreLagMs'>;

/**
 * Delay before the volume knob goes back: measured duration plus margin, never
 * below the floor; the fixed fallback when nothing was measured.
 */
export function computeRestoreDelayMs(estimate: DurationEstimate, timing: RestoreTiming): number {
  const base = estimate.measured && estimate.seconds > 0
    ? Math.round(estimate.seconds * 1000) + timing.marginMs
    : timing.fallbackMs;
  return Math.max(base, timing.floorMs);
}

/**
 * The player needs strictly longer than the volume knob before it resumes.
 */
export function computeStateRestoreDelayMs(volumeDelayMs: number, timing: RestoreTiming): number {
  return volumeDelayMs + Math.max(timing.stateRestoreLagMs, 1);
}
