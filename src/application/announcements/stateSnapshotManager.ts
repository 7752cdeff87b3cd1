import type { SnapshotMethod, RestorationTask } from '@/domain/announcement/types';
import { parseServiceRef } from '@/domain/config/normalize';
import type { ServiceRef } from '@/domain/config/normalize';
import type { CommandBusPort, CommandResult } from '@/ports/CommandBusPort';
import type { RestorationScheduler } from '@/application/announcements/restorationScheduler';
import type { Logger } from '@/shared/logging/logger';
import { bestEffort } from '@/shared/bestEffort';

export type SnapshotServices = {
  snapshotService: string;
  restoreService: string;
};

export type SnapshotOutcome = {
  ok: boolean;
  method: SnapshotMethod;
};

const FAILED: CommandResult = { kind: 'error', message: 'command threw' };

/**
 * Saves and later restores what a quirky player was doing. Every step is
 * best-effort: a failed snapshot only means nothing will be resumed.
 */
export class StateSnapshotManager {
  constructor(
    private readonly commands: CommandBusPort,
    private readonly restorations: RestorationScheduler,
    private readonly services: () => SnapshotServices,
    private readonly log: Logger,
  ) {}

  public async snapshot(deviceId: string): Promise<SnapshotOutcome> {
    const service = parseServiceRef(this.services().snapshotService);
    if (service) {
      const result = await this.call(service, deviceId);
      if (result.kind === 'ok') {
        this.log.debug('player state saved', { deviceId });
        return { ok: true, method: 'snapshot' };
      }
      this.log.debug('snapshot failed; stopping playback instead', { deviceId, message: result.message });
    }

    const stop = await this.call({ domain: 'media_player', action: 'media_stop' }, deviceId);
    if (stop.kind === 'ok') {
      return { ok: true, method: 'stop' };
    }
    this.log.warn('player state not saved', { deviceId, message: stop.message });
    return { ok: false, method: 'none' };
  }

  public async restore(deviceId: string): Promise<boolean> {
    const raw = this.services().restoreService;
    const service = parseServiceRef(raw);
    if (!service) {
      this.log.warn('invalid restore service', { deviceId, service: raw });
      return false;
    }
    const result = await this.call(service, deviceId);
    if (result.kind === 'error') {
      this.log.warn('player state restore failed', { deviceId, message: result.message });
      return false;
    }
    this.log.info('player state restored', { deviceId });
    return true;
  }

  public scheduleRestore(requestId: string, deviceId: string, delayMs: number): RestorationTask {
    return this.restorations.schedule(
      {
        kind: 'state-restore',
        requestId,
        deviceId,
        payload: { service: this.services().restoreService },
      },
      delayMs,
      async () => {
        await this.restore(deviceId);
      },
    );
  }

  private call(service: ServiceRef, deviceId: string): Promise<CommandResult> {
    return bestEffort(() => this.commands.call(service.domain, service.action, { entity_id: deviceId }), {
      fallback: FAILED,
      onError: 'debug',
      label: 'snapshot command threw',
      context: { deviceId, service: `${service.domain}.${service.action}` },
      log: this.log,
    });
  }
}
