export type SourceKind = 'recording' | 'speech';

/**
 * A generated audio file players fetch over HTTP. Passed down the call chain;
 * nothing looks it up by filename.
 */
export interface AudioArtifact {
  readonly id: string;
  readonly filename: string;
  readonly path: string;
  readonly url: string;
  /** Best guess from the actual encoding, tried first during negotiation. */
  readonly contentType: string;
  readonly createdAt: number;
  readonly retentionDeadline: number;
}

export interface AnnouncementOptions {
  volumeBoostEnabled: boolean;
  /** 0..1 */
  volumeBoostAmount: number;
}

export interface AnnouncementRequest {
  readonly id: string;
  readonly sourceKind: SourceKind;
  readonly artifact: AudioArtifact | null;
  readonly targetId: string;
  readonly options: Readonly<AnnouncementOptions>;
}

/** Ordered, de-duplicated physical device ids. */
export type TargetSet = readonly string[];

export type DeliveryOutcome = 'pending' | 'delivered' | 'failed';

export type DeviceFailureReason =
  | 'device-unreachable'
  | 'device-unavailable'
  | 'candidates-exhausted'
  | 'delivery-error';

export type PlayAttemptResult = 'accepted' | 'rejected' | 'busy' | 'unverified' | 'unavailable';

export interface PlayAttempt {
  contentType: string;
  result: PlayAttemptResult;
  /** Set on the second try of a candidate after a corrective stop. */
  retry: boolean;
  message?: string;
}

export type SnapshotMethod = 'snapshot' | 'stop' | 'none';

export interface DeviceDeliveryState {
  deviceId: string;
  isQuirky: boolean;
  originalVolume: number | null;
  contentTypeCandidates: string[];
  attemptIndex: number;
  attempts: PlayAttempt[];
  outcome: DeliveryOutcome;
  contentType?: string;
  reason?: DeviceFailureReason;
  snapshot?: SnapshotMethod;
  restoreDelayMs?: number;
  message?: string;
}

export type RequestFailureReason = 'artifact-unavailable' | 'no-targets' | 'all-devices-failed';

export interface DeliveryReport {
  requestId: string;
  targetId: string;
  sourceKind: SourceKind;
  success: boolean;
  reason?: RequestFailureReason;
  targets: string[];
  devices: DeviceDeliveryState[];
  artifact?: Pick<AudioArtifact, 'filename' | 'url' | 'contentType'>;
}

type RestorationTaskBase = {
  id: string;
  requestId: string;
  deviceId: string;
  fireAt: number;
};

export type VolumeRestoreTask = RestorationTaskBase & {
  kind: 'volume-restore';
  payload: { volume: number };
};

export type StateRestoreTask = RestorationTaskBase & {
  kind: 'state-restore';
  payload: { service: string };
};

export type RestorationTask = VolumeRestoreTask | StateRestoreTask;

export type RestorationDraft =
  | Omit<VolumeRestoreTask, 'id' | 'fireAt'>
  | Omit<StateRestoreTask, 'id' | 'fireAt'>;

export interface DurationEstimate {
  seconds: number;
  /** False when the default was used because probing failed. */
  measured: boolean;
}
