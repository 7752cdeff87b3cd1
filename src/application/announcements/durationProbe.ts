import type { AudioArtifact, DurationEstimate } from '@/domain/announcement/types';
import type { MediaProbePort } from '@/ports/MediaProbePort';
import type { Logger } from '@/shared/logging/logger';
import { bestEffort } from '@/shared/bestEffort';
import { isFiniteNumber } from '@/shared/utils/guards';

export type DurationProbeOptions = {
  /** Tried in order; the first positive duration wins. */
  probes: readonly MediaProbePort[];
  defaultSeconds: () => number;
  log: Logger;
};

export class DurationProbe {
  constructor(private readonly options: DurationProbeOptions) {}

  public async probe(artifact: Pick<AudioArtifact, 'path'>): Promise<number> {
    return (await this.estimate(artifact)).seconds;
  }

  public async estimate(artifact: Pick<AudioArtifact, 'path'>): Promise<DurationEstimate> {
    const { log } = this.options;
    for (const probe of this.options.probes) {
      const seconds = await bestEffort(() => probe.probeDuration(artifact.path), {
        fallback: null,
        onError: 'debug',
        label: 'duration probe failed',
        context: { probe: probe.name, file: artifact.path },
        log,
      });
      if (isFiniteNumber(seconds) && seconds > 0) {
        log.debug('duration measured', { probe: probe.name, seconds });
        return { seconds, measured: true };
      }
    }
    const seconds = this.options.defaultSeconds();
    log.debug('duration unknown; using default', { file: artifact.path, seconds });
    return { seconds, measured: false };
  }
}
