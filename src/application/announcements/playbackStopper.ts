import type { CommandBusPort } from '@/ports/CommandBusPort';
import type { TargetExpander } from '@/application/announcements/targetExpander';
import type { Logger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

export type DeviceStopOutcome = {
  deviceId: string;
  stopped: boolean;
  message?: string;
};

export type StopReport = {
  targetId: string;
  success: boolean;
  devices: DeviceStopOutcome[];
};

/**
 * Halts whatever a target is playing: every device the target expands to gets
 * `media_player.media_stop`, in parallel.
 */
export class PlaybackStopper {
  constructor(
    private readonly expander: TargetExpander,
    private readonly commands: CommandBusPort,
    private readonly log: Logger,
  ) {}

  public async stop(targetId: string): Promise<StopReport> {
    const targets = await this.expander.expand(targetId);
    const devices = await Promise.all(targets.map((deviceId) => this.stopDevice(deviceId)));
    const success = devices.some((device) => device.stopped);
    this.log.info('playback stop requested', {
      targetId,
      stopped: devices.filter((device) => device.stopped).length,
      failed: devices.filter((device) => !device.stopped).length,
    });
    return { targetId: targetId.trim(), success, devices };
  }

  private async stopDevice(deviceId: string): Promise<DeviceStopOutcome> {
    try {
      const result = await this.commands.call('media_player', 'media_stop', { entity_id: deviceId });
      if (result.kind === 'ok') {
        return { deviceId, stopped: true };
      }
      this.log.warn('stop rejected', { deviceId, message: result.message });
      return { deviceId, stopped: false, message: result.message };
    } catch (error) {
      const message = describeError(error);
      this.log.warn('stop failed', { deviceId, message });
      return { deviceId, stopped: false, message };
    }
  }
}
