import { createDefaultConfig } from '@/domain/config/defaults';
import type { AnnouncerConfig, LeadInMode } from '@/domain/config/types';
import { LEAD_IN_MODES } from '@/domain/config/types';
import { isLogLevel } from '@/types/logLevel';
import { isFiniteNumber, isRecord, normalizeString, toStringList } from '@/shared/utils/guards';

type Section = Record<string, unknown>;

function section(raw: Section, key: string): Section {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function num(raw: Section, key: string, fallback: number, min: number, max: number): number {
  const value = raw[key];
  if (!isFiniteNumber(value)) {
    return fallback;
  }
  return Math.min(Math.max(value, min), max);
}

function bool(raw: Section, key: string, fallback: boolean): boolean {
  const value = raw[key];
  return typeof value === 'boolean' ? value : fallback;
}

function str(raw: Section, key: string, fallback: string): string {
  return normalizeString(raw[key]) ?? fallback;
}

function optionalStr(raw: Section, key: string, fallback: string | null): string | null {
  if (raw[key] === null) {
    return null;
  }
  return normalizeString(raw[key]) ?? fallback;
}

function list(raw: Section, key: string, fallback: string[]): string[] {
  if (!Array.isArray(raw[key])) {
    return fallback;
  }
  return toStringList(raw[key]).map((entry) => entry.trim());
}

/**
 * Merges a stored (possibly partial or hand-edited) config over the defaults,
 * clamping numbers into their valid ranges.
 */
export function normalizeConfig(raw: unknown): AnnouncerConfig {
  const defaults = createDefaultConfig();
  if (!isRecord(raw)) {
    return defaults;
  }

  const system = section(raw, 'system');
  const logging = section(system, 'logging');
  const homeAssistant = section(raw, 'homeAssistant');
  const delivery = section(raw, 'delivery');
  const negotiation = section(raw, 'negotiation');
  const timing = section(raw, 'timing');
  const artifacts = section(raw, 'artifacts');
  const quirky = section(raw, 'quirkyDevices');
  const tts = section(raw, 'tts');

  const consoleLevel = logging.consoleLevel;
  const leadIn: LeadInMode = isLeadInMode(artifacts.leadIn) ? artifacts.leadIn : defaults.artifacts.leadIn;
  const ttsVoice = parseCombinedVoice(optionalStr(tts, 'voice', defaults.tts.voice));

  return {
    system: {
      logging: {
        consoleLevel: isLogLevel(consoleLevel) ? consoleLevel : defaults.system.logging.consoleLevel,
        json: bool(logging, 'json', defaults.system.logging.json),
      },
      publicBaseUrl: trimTrailingSlash(str(system, 'publicBaseUrl', defaults.system.publicBaseUrl)),
      apiToken: str(system, 'apiToken', defaults.system.apiToken),
    },
    homeAssistant: {
      baseUrl: trimTrailingSlash(str(homeAssistant, 'baseUrl', defaults.homeAssistant.baseUrl)),
      token: str(homeAssistant, 'token', defaults.homeAssistant.token),
      requestTimeoutMs: num(homeAssistant, 'requestTimeoutMs', defaults.homeAssistant.requestTimeoutMs, 500, 120000),
    },
    delivery: {
      volumeBoostEnabled: bool(delivery, 'volumeBoostEnabled', defaults.delivery.volumeBoostEnabled),
      volumeBoostAmount: num(delivery, 'volumeBoostAmount', defaults.delivery.volumeBoostAmount, 0, 1),
    },
    negotiation: {
      alternateContentTypes: list(negotiation, 'alternateContentTypes', defaults.negotiation.alternateContentTypes),
      verifyGraceMs: num(negotiation, 'verifyGraceMs', defaults.negotiation.verifyGraceMs, 0, 60000),
      busyGraceMs: num(negotiation, 'busyGraceMs', defaults.negotiation.busyGraceMs, 0, 60000),
      busyPatterns: list(negotiation, 'busyPatterns', defaults.negotiation.busyPatterns).map((p) => p.toLowerCase()),
    },
    timing: {
      marginMs: num(timing, 'marginMs', defaults.timing.marginMs, 0, 600000),
      floorMs: num(timing, 'floorMs', defaults.timing.floorMs, 0, 600000),
      fallbackMs: num(timing, 'fallbackMs', defaults.timing.fallbackMs, 0, 3600000),
      stateRestoreLagMs: num(timing, 'stateRestoreLagMs', defaults.timing.stateRestoreLagMs, 0, 600000),
      defaultDurationSeconds: num(timing, 'defaultDurationSeconds', defaults.timing.defaultDurationSeconds, 0, 3600),
    },
    artifacts: {
      directory: str(artifacts, 'directory', defaults.artifacts.directory),
      retentionSeconds: num(artifacts, 'retentionSeconds', defaults.artifacts.retentionSeconds, 10, 604800),
      transcodeRecordings: bool(artifacts, 'transcodeRecordings', defaults.artifacts.transcodeRecordings),
      leadIn,
      leadInSilenceSeconds: num(artifacts, 'leadInSilenceSeconds', defaults.artifacts.leadInSilenceSeconds, 0, 30),
      announcementPhrase: str(artifacts, 'announcementPhrase', defaults.artifacts.announcementPhrase),
      ffprobePath: str(artifacts, 'ffprobePath', defaults.artifacts.ffprobePath),
      probeTimeoutMs: num(artifacts, 'probeTimeoutMs', defaults.artifacts.probeTimeoutMs, 100, 60000),
      transcodeTimeoutMs: num(artifacts, 'transcodeTimeoutMs', defaults.artifacts.transcodeTimeoutMs, 1000, 600000),
    },
    quirkyDevices: {
      namePatterns: list(quirky, 'namePatterns', defaults.quirkyDevices.namePatterns).map((p) => p.toLowerCase()),
      integrations: list(quirky, 'integrations', defaults.quirkyDevices.integrations).map((p) => p.toLowerCase()),
      snapshotService: str(quirky, 'snapshotService', defaults.quirkyDevices.snapshotService),
      restoreService: str(quirky, 'restoreService', defaults.quirkyDevices.restoreService),
    },
    tts: {
      engine: str(tts, 'engine', defaults.tts.engine),
      language: str(tts, 'language', defaults.tts.language),
      voice: ttsVoice.voice,
      speaker: optionalStr(tts, 'speaker', ttsVoice.speaker ?? defaults.tts.speaker),
    },
    updatedAt: normalizeString(raw.updatedAt),
  };
}

export function isLeadInMode(value: unknown): value is LeadInMode {
  return LEAD_IN_MODES.some((mode) => mode === value);
}

export type ServiceRef = {
  domain: string;
  action: string;
};

/**
 * Splits `sonos.snapshot` into its domain and action; `null` when malformed.
 */
export function parseServiceRef(value: string): ServiceRef | null {
  const trimmed = value.trim();
  const dot = trimmed.indexOf('.');
  if (dot <= 0 || dot === trimmed.length - 1) {
    return null;
  }
  return { domain: trimmed.slice(0, dot), action: trimmed.slice(dot + 1) };
}

/**
 * Voice pickers store `voice|speaker` in one field; a plain value has no speaker.
 */
export function parseCombinedVoice(value: string | null): { voice: string | null; speaker: string | null } {
  if (!value) {
    return { voice: null, speaker: null };
  }
  const separator = value.indexOf('|');
  if (separator === -1) {
    return { voice: value, speaker: null };
  }
  const voice = value.slice(0, separator).trim();
  const speaker = value.slice(separator + 1).trim();
  return { voice: voice || null, speaker: speaker || null };
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}
