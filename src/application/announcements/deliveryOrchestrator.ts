import type {
  AnnouncementRequest,
  AudioArtifact,
  DeliveryReport,
  DeviceDeliveryState,
  DurationEstimate,
} from '@/domain/announcement/types';
import { buildContentTypeCandidates } from '@/domain/announcement/contentTypes';
import { computeRestoreDelayMs, computeStateRestoreDelayMs } from '@/domain/announcement/restoreDelay';
import type { RestoreTiming } from '@/domain/announcement/restoreDelay';
import type { DeviceStatePort } from '@/ports/DeviceStatePort';
import type { DeviceCapabilityClassifier } from '@/application/announcements/deviceClassifier';
import type { TargetExpander } from '@/application/announcements/targetExpander';
import type { VolumeController } from '@/application/announcements/volumeController';
import type { StateSnapshotManager, SnapshotOutcome } from '@/application/announcements/stateSnapshotManager';
import type { ContentNegotiator, NegotiationResult } from '@/application/announcements/contentNegotiator';
import type { DurationProbe } from '@/application/announcements/durationProbe';
import type { Logger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

export type OrchestratorSettings = {
  alternateContentTypes: readonly string[];
  timing: RestoreTiming;
};

export type DeliveryOrchestratorDeps = {
  devices: DeviceStatePort;
  expander: TargetExpander;
  classifier: DeviceCapabilityClassifier;
  volume: VolumeController;
  snapshots: StateSnapshotManager;
  negotiator: ContentNegotiator;
  durations: DurationProbe;
  settings: () => OrchestratorSettings;
  log: Logger;
};

/**
 * Fans one announcement out to every device behind its target. Each device runs
 * boost, snapshot and negotiation in order; restorations are scheduled once
 * negotiation settles, whatever its outcome. Devices never affect each other.
 */
export class DeliveryOrchestrator {
  constructor(private readonly deps: DeliveryOrchestratorDeps) {}

  public async deliver(request: AnnouncementRequest): Promise<DeliveryReport> {
    const { log } = this.deps;
    const base = {
      requestId: request.id,
      targetId: request.targetId,
      sourceKind: request.sourceKind,
    };

    const artifact = request.artifact;
    if (!artifact) {
      log.warn('announcement has no audio', { requestId: request.id });
      return { ...base, success: false, reason: 'artifact-unavailable', targets: [], devices: [] };
    }
    const artifactInfo = { filename: artifact.filename, url: artifact.url, contentType: artifact.contentType };

    const targets = [...(await this.deps.expander.expand(request.targetId))];
    if (!targets.length) {
      log.warn('target resolved to no devices', { requestId: request.id, targetId: request.targetId });
      return { ...base, success: false, reason: 'no-targets', targets, devices: [], artifact: artifactInfo };
    }

    log.info('delivering announcement', { requestId: request.id, targets, url: artifact.url });
    const estimate = this.memoizeEstimate(artifact);
    const devices = await Promise.all(
      targets.map((deviceId) => this.deliverToDevice(request, artifact, deviceId, estimate)),
    );

    const success = devices.some((device) => device.outcome === 'delivered');
    log.info('announcement finished', {
      requestId: request.id,
      success,
      delivered: devices.filter((device) => device.outcome === 'delivered').length,
      failed: devices.filter((device) => device.outcome === 'failed').length,
    });
    if (!success) {
      return { ...base, success, reason: 'all-devices-failed', targets, devices, artifact: artifactInfo };
    }
    return { ...base, success, targets, devices, artifact: artifactInfo };
  }

  private async deliverToDevice(
    request: AnnouncementRequest,
    artifact: AudioArtifact,
    deviceId: string,
    estimate: () => Promise<DurationEstimate>,
  ): Promise<DeviceDeliveryState> {
    const log = this.deps.log;
    const settings = this.deps.settings();
    const delivery: DeviceDeliveryState = {
      deviceId,
      isQuirky: false,
      originalVolume: null,
      contentTypeCandidates: [],
      attemptIndex: 0,
      attempts: [],
      outcome: 'pending',
    };
    let snapshot: SnapshotOutcome | null = null;

    try {
      const state = await this.deps.devices.getState(deviceId);
      if (!state || !state.available) {
        log.warn('device unreachable', { deviceId, requestId: request.id });
        return fail(delivery, 'device-unreachable');
      }

      delivery.isQuirky = this.deps.classifier.classify(deviceId, state.attributes).isQuirky;
      delivery.contentTypeCandidates = delivery.isQuirky
        ? buildContentTypeCandidates(artifact.contentType, settings.alternateContentTypes)
        : [artifact.contentType];

      if (request.options.volumeBoostEnabled) {
        const boost = await this.deps.volume.boost(state, request.options.volumeBoostAmount);
        delivery.originalVolume = boost?.originalVolume ?? null;
      }

      if (delivery.isQuirky) {
        snapshot = await this.deps.snapshots.snapshot(deviceId);
        delivery.snapshot = snapshot.method;
      }

      const result = await this.deps.negotiator.negotiate({
        deviceId,
        artifact,
        candidates: delivery.contentTypeCandidates,
        verify: delivery.isQuirky,
        retryBusy: delivery.isQuirky,
        onAttempt: (_attempt, index) => {
          delivery.attemptIndex = index;
        },
      });
      applyNegotiation(delivery, result);
    } catch (error) {
      log.error('device delivery failed', { deviceId, requestId: request.id, message: describeError(error) });
      fail(delivery, 'delivery-error', describeError(error));
    }

    await this.scheduleRestorations(request.id, delivery, snapshot, settings.timing, estimate);
    return delivery;
  }

  private async scheduleRestorations(
    requestId: string,
    delivery: DeviceDeliveryState,
    snapshot: SnapshotOutcome | null,
    timing: RestoreTiming,
    estimate: () => Promise<DurationEstimate>,
  ): Promise<void> {
    const stateRestore = delivery.isQuirky && delivery.outcome === 'delivered' && snapshot?.ok === true;
    if (delivery.originalVolume === null && !stateRestore) {
      return;
    }

    const volumeDelayMs = computeRestoreDelayMs(await estimate(), timing);
    delivery.restoreDelayMs = volumeDelayMs;
    if (delivery.originalVolume !== null) {
      this.deps.volume.scheduleRestore(requestId, delivery.deviceId, delivery.originalVolume, volumeDelayMs);
    }
    if (stateRestore) {
      this.deps.snapshots.scheduleRestore(
        requestId,
        delivery.deviceId,
        computeStateRestoreDelayMs(volumeDelayMs, timing),
      );
    }
  }

  /** Probes at most once per request, and only when something needs restoring. */
  private memoizeEstimate(artifact: AudioArtifact): () => Promise<DurationEstimate> {
    let pending: Promise<DurationEstimate> | null = null;
    return () => {
      if (!pending) {
        pending = this.deps.durations.estimate(artifact);
      }
      return pending;
    };
  }
}

function fail(
  delivery: DeviceDeliveryState,
  reason: NonNullable<DeviceDeliveryState['reason']>,
  message?: string,
): DeviceDeliveryState {
  delivery.outcome = 'failed';
  delivery.reason = reason;
  if (message) {
    delivery.message = message;
  }
  return delivery;
}

function applyNegotiation(delivery: DeviceDeliveryState, result: NegotiationResult): void {
  delivery.attempts = result.attempts;
  if (result.kind === 'delivered') {
    delivery.outcome = 'delivered';
    delivery.contentType = result.contentType;
    delivery.attemptIndex = result.candidateIndex;
    return;
  }
  fail(delivery, result.reason === 'device-unavailable' ? 'device-unavailable' : 'candidates-exhausted');
}
