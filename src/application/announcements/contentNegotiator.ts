import type { AudioArtifact, PlayAttempt } from '@/domain/announcement/types';
import { isBusyFailure, isPlayingArtifact } from '@/domain/announcement/contentTypes';
import type { NegotiationConfig } from '@/domain/config/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { CommandBusPort, CommandResult } from '@/ports/CommandBusPort';
import type { DeviceState, DeviceStatePort } from '@/ports/DeviceStatePort';
import type { Logger } from '@/shared/logging/logger';

export type NegotiationSettings = Pick<NegotiationConfig, 'verifyGraceMs' | 'busyGraceMs' | 'busyPatterns'>;

export type NegotiationParams = {
  deviceId: string;
  artifact: Pick<AudioArtifact, 'url' | 'filename'>;
  /** Ordered; the first entry is the declared type. */
  candidates: readonly string[];
  /** Poll the player after an accepted command instead of trusting it. */
  verify: boolean;
  /** Stop and retry a candidate once when the failure looks like a busy player. */
  retryBusy: boolean;
  onAttempt?: (attempt: PlayAttempt, candidateIndex: number) => void;
};

export type ExhaustedReason = 'device-unavailable' | 'candidates-exhausted';

export type NegotiationResult =
  | { kind: 'delivered'; contentType: string; candidateIndex: number; attempts: PlayAttempt[] }
  | { kind: 'exhausted'; reason: ExhaustedReason; attempts: PlayAttempt[] };

type CandidateOutcome = 'delivered' | 'next' | 'unavailable';

/**
 * Plays an artifact on one device, walking the content-type candidates until the
 * player demonstrably plays it. Players that accept a command and then do nothing
 * are caught by polling `media_content_id` after a grace period.
 */
export class ContentNegotiator {
  constructor(
    private readonly commands: CommandBusPort,
    private readonly devices: DeviceStatePort,
    private readonly clock: ClockPort,
    private readonly settings: () => NegotiationSettings,
    private readonly log: Logger,
  ) {}

  public async negotiate(params: NegotiationParams): Promise<NegotiationResult> {
    if (!params.candidates.length) {
      throw new Error(`no content type candidates for ${params.deviceId}`);
    }

    const attempts: PlayAttempt[] = [];
    const record = (attempt: PlayAttempt, index: number): void => {
      attempts.push(attempt);
      params.onAttempt?.(attempt, index);
    };

    for (const [index, contentType] of params.candidates.entries()) {
      const outcome = await this.tryCandidate(params, contentType, (attempt) => record(attempt, index));
      if (outcome === 'delivered') {
        this.log.info('announcement playing', { deviceId: params.deviceId, contentType, candidate: index });
        return { kind: 'delivered', contentType, candidateIndex: index, attempts };
      }
      if (outcome === 'unavailable') {
        this.log.warn('device became unavailable during negotiation', { deviceId: params.deviceId });
        return { kind: 'exhausted', reason: 'device-unavailable', attempts };
      }
    }

    this.log.warn('all content types failed', {
      deviceId: params.deviceId,
      candidates: params.candidates.length,
    });
    return { kind: 'exhausted', reason: 'candidates-exhausted', attempts };
  }

  private async tryCandidate(
    params: NegotiationParams,
    contentType: string,
    record: (attempt: PlayAttempt) => void,
  ): Promise<CandidateOutcome> {
    const { deviceId } = params;
    const settings = this.settings();
    let retry = false;

    for (;;) {
      if (params.verify && !(await this.isResolvable(deviceId))) {
        record({ contentType, result: 'unavailable', retry });
        return 'unavailable';
      }

      const result = await this.play(deviceId, params.artifact.url, contentType);
      if (result.kind === 'error') {
        const busy = isBusyFailure(result.message, settings.busyPatterns);
        record({ contentType, result: busy ? 'busy' : 'rejected', retry, message: result.message });
        if (busy && params.retryBusy && !retry) {
          this.log.debug('player busy; stopping before retry', { deviceId, contentType });
          await this.stop(deviceId);
          await this.clock.sleep(settings.busyGraceMs);
          retry = true;
          continue;
        }
        this.log.debug('content type rejected', { deviceId, contentType, message: result.message });
        return 'next';
      }

      if (!params.verify) {
        record({ contentType, result: 'accepted', retry });
        return 'delivered';
      }

      await this.clock.sleep(settings.verifyGraceMs);
      const state = await this.devices.getState(deviceId);
      if (!state || !state.available) {
        record({ contentType, result: 'unavailable', retry });
        return 'unavailable';
      }
      if (isPlayingArtifact(state.reportedPlayingRef, params.artifact)) {
        record({ contentType, result: 'accepted', retry });
        return 'delivered';
      }
      record({ contentType, result: 'unverified', retry, message: describePlaying(state) });
      this.log.debug('command accepted but artifact not playing', {
        deviceId,
        contentType,
        reported: state.reportedPlayingRef,
      });
      return 'next';
    }
  }

  private async isResolvable(deviceId: string): Promise<boolean> {
    const state = await this.devices.getState(deviceId);
    return Boolean(state?.available);
  }

  private play(deviceId: string, url: string, contentType: string): Promise<CommandResult> {
    return this.commands.call('media_player', 'play_media', {
      entity_id: deviceId,
      media_content_id: url,
      media_content_type: contentType,
    });
  }

  private async stop(deviceId: string): Promise<void> {
    const result = await this.commands.call('media_player', 'media_stop', { entity_id: deviceId });
    if (result.kind === 'error') {
      this.log.debug('corrective stop failed', { deviceId, message: result.message });
    }
  }
}

function describePlaying(state: DeviceState): string {
  return state.reportedPlayingRef ? `playing ${state.reportedPlayingRef}` : `state ${state.state}`;
}
