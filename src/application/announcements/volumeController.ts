import type { DeviceState } from '@/ports/DeviceStatePort';
import type { CommandBusPort, CommandResult } from '@/ports/CommandBusPort';
import type { RestorationScheduler } from '@/application/announcements/restorationScheduler';
import type { RestorationTask } from '@/domain/announcement/types';
import type { Logger } from '@/shared/logging/logger';
import { isFiniteNumber } from '@/shared/utils/guards';

export type VolumeBoost = {
  originalVolume: number;
  boostedVolume: number;
};

function clampUnit(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

/**
 * Raises a player's volume for the announcement and hands the way back to the
 * restoration scheduler. Only a volume that was actually read is ever restored.
 */
export class VolumeController {
  constructor(
    private readonly commands: CommandBusPort,
    private readonly restorations: RestorationScheduler,
    private readonly log: Logger,
  ) {}

  public async boost(state: DeviceState, amount: number): Promise<VolumeBoost | null> {
    const original = state.reportedVolume;
    if (original === null || !isFiniteNumber(original)) {
      this.log.debug('volume unknown; boost skipped', { deviceId: state.deviceId });
      return null;
    }

    const boostedVolume = Math.min(clampUnit(original) + clampUnit(amount), 1);
    const result = await this.setVolume(state.deviceId, boostedVolume);
    if (result.kind === 'error') {
      this.log.warn('volume boost rejected', { deviceId: state.deviceId, message: result.message });
      return null;
    }

    this.log.debug('volume boosted', { deviceId: state.deviceId, from: original, to: boostedVolume });
    return { originalVolume: original, boostedVolume };
  }

  public scheduleRestore(
    requestId: string,
    deviceId: string,
    originalVolume: number,
    delayMs: number,
  ): RestorationTask {
    return this.restorations.schedule(
      { kind: 'volume-restore', requestId, deviceId, payload: { volume: originalVolume } },
      delayMs,
      async () => {
        const result = await this.setVolume(deviceId, originalVolume);
        if (result.kind === 'error') {
          this.log.warn('volume restore failed', { deviceId, message: result.message });
          return;
        }
        this.log.info('volume restored', { deviceId, volume: originalVolume });
      },
    );
  }

  private setVolume(deviceId: string, volume: number): Promise<CommandResult> {
    return this.commands.call('media_player', 'volume_set', {
      entity_id: deviceId,
      volume_level: volume,
    });
  }
}
