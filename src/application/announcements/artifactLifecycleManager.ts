import type { AudioArtifact } from '@/domain/announcement/types';
import type { ArtifactStorePort } from '@/ports/ArtifactStorePort';
import type { ScheduledHandle, SchedulerPort } from '@/ports/SchedulerPort';
import type { Logger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

/**
 * Deletes generated audio once its retention window has passed. Deletion is
 * idempotent; anything still pending at shutdown stays on disk.
 */
export class ArtifactLifecycleManager {
  private readonly pending = new Map<string, ScheduledHandle>();

  constructor(
    private readonly store: ArtifactStorePort,
    private readonly scheduler: SchedulerPort,
    private readonly log: Logger,
  ) {}

  public track(artifact: Pick<AudioArtifact, 'id' | 'path'>, retentionSeconds: number): void {
    this.pending.get(artifact.id)?.cancel();
    const delayMs = Math.max(0, retentionSeconds) * 1000;
    const handle = this.scheduler.schedule(delayMs, async () => {
      this.pending.delete(artifact.id);
      await this.delete(artifact);
    });
    this.pending.set(artifact.id, handle);
    this.log.debug('artifact retention scheduled', { id: artifact.id, retentionSeconds });
  }

  public async delete(artifact: Pick<AudioArtifact, 'id' | 'path'>): Promise<void> {
    this.pending.get(artifact.id)?.cancel();
    this.pending.delete(artifact.id);
    try {
      const result = await this.store.remove(artifact.path);
      this.log.debug('artifact deleted', { id: artifact.id, result });
    } catch (error) {
      this.log.warn('artifact deletion failed', { id: artifact.id, message: describeError(error) });
    }
  }

  public get pendingCount(): number {
    return this.pending.size;
  }

  public dispose(): void {
    for (const handle of this.pending.values()) {
      handle.cancel();
    }
    this.pending.clear();
  }
}
