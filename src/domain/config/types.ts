import type { LogLevel } from '@/types/logLevel';

export interface AnnouncerConfig {
  system: SystemConfig;
  homeAssistant: HomeAssistantConfig;
  delivery: DeliveryConfig;
  negotiation: NegotiationConfig;
  timing: RestoreTimingConfig;
  artifacts: ArtifactConfig;
  quirkyDevices: QuirkyDeviceConfig;
  tts: TtsConfig;
  updatedAt?: string;
}

export interface SystemConfig {
  logging: LoggingConfig;
  /** Base URL under which media players can fetch `/media/<file>` from this service. */
  publicBaseUrl: string;
  /** Bearer token callers of `/api/*` must present; empty refuses every call. */
  apiToken: string;
}

export interface LoggingConfig {
  consoleLevel: LogLevel;
  json: boolean;
}

export interface HomeAssistantConfig {
  baseUrl: string;
  /** Long-lived access token. */
  token: string;
  requestTimeoutMs: number;
}

export interface DeliveryConfig {
  volumeBoostEnabled: boolean;
  /** Fraction of full scale added on top of the current volume (0..1). */
  volumeBoostAmount: number;
}

export interface NegotiationConfig {
  /** Tried in order after the declared content type. */
  alternateContentTypes: string[];
  verifyGraceMs: number;
  busyGraceMs: number;
  /** Case-insensitive substrings that mark a play failure as transient busy state. */
  busyPatterns: string[];
}

export interface RestoreTimingConfig {
  marginMs: number;
  floorMs: number;
  /** Used when the artifact duration could not be measured. */
  fallbackMs: number;
  /** Extra delay of the player-state restore after the volume restore. */
  stateRestoreLagMs: number;
  defaultDurationSeconds: number;
}

/**
 * What precedes the announcement audio: seconds of silence, a spoken attention
 * phrase, or nothing.
 */
export type LeadInMode = 'silence' | 'announcement' | 'disabled';

export const LEAD_IN_MODES: readonly LeadInMode[] = ['silence', 'announcement', 'disabled'];

export interface ArtifactConfig {
  /** Directory below `data/` holding generated announcement files. */
  directory: string;
  retentionSeconds: number;
  transcodeRecordings: boolean;
  leadIn: LeadInMode;
  leadInSilenceSeconds: number;
  /** Spoken before the audio in `announcement` mode. */
  announcementPhrase: string;
  ffprobePath: string;
  probeTimeoutMs: number;
  transcodeTimeoutMs: number;
}

export interface QuirkyDeviceConfig {
  /** Case-insensitive substrings matched against entity id and friendly name. */
  namePatterns: string[];
  /** Integration/platform tags that always need quirky handling. */
  integrations: string[];
  snapshotService: string;
  restoreService: string;
}

export interface TtsConfig {
  /** `auto` picks the first available `tts.*` entity. */
  engine: string;
  language: string;
  voice: string | null;
  speaker: string | null;
}
