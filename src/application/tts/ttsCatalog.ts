import type { DeviceAttributes, DeviceStatePort } from '@/ports/DeviceStatePort';
import { isRecord, normalizeString, toStringList } from '@/shared/utils/guards';

export const AUTO_ENGINE = 'auto';
const TTS_PREFIX = 'tts.';

export type TtsEngine = {
  engineId: string;
  name: string;
  /** Engine takes a separate `speaker` option (Wyoming style). */
  speakerAware: boolean;
};

/** One selectable entry; `value` is the combined `voice|speaker` form. */
export type VoiceOption = {
  value: string;
  voice: string;
  speaker: string | null;
  label: string;
};

export type VoiceSelection = {
  engineId: string;
  language: string;
  voice: string | null;
  speaker: string | null;
};

export type VoiceCheckError = 'engine-not-found' | 'voice-not-available' | 'speaker-not-available';

export type VoiceCheck = { ok: true } | { ok: false; error: VoiceCheckError };

/**
 * What TTS engines, languages, voices and speakers the host offers. Engines
 * advertise these through entity attributes, each integration in its own shape.
 */
export class TtsCatalog {
  constructor(private readonly devices: DeviceStatePort) {}

  public async listEngines(): Promise<TtsEngine[]> {
    const states = await this.devices.listDevices(TTS_PREFIX);
    return [
      { engineId: AUTO_ENGINE, name: 'Auto-detect', speakerAware: false },
      ...states
        .filter((state) => state.available)
        .map((state) => ({
          engineId: state.deviceId,
          name: state.name,
          speakerAware: isSpeakerAware(state.deviceId, state.attributes),
        })),
    ];
  }

  /** `null` when the engine does not exist; `auto` has no fixed languages. */
  public async languages(engineId: string): Promise<string[] | null> {
    if (engineId === AUTO_ENGINE) {
      return [];
    }
    const attributes = await this.attributesOf(engineId);
    return attributes ? languagesFrom(attributes) : null;
  }

  public async voiceOptions(engineId: string, language: string): Promise<VoiceOption[] | null> {
    if (engineId === AUTO_ENGINE) {
      return [];
    }
    const attributes = await this.attributesOf(engineId);
    if (!attributes) {
      return null;
    }
    return voicesFrom(attributes, language).flatMap<VoiceOption>((voice) => {
      const speakers = speakersFrom(attributes, voice);
      if (!speakers.length) {
        return [{ value: voice, voice, speaker: null, label: formatVoiceLabel(voice) }];
      }
      return speakers.map((speaker) => ({
        value: `${voice}|${speaker}`,
        voice,
        speaker,
        label: `${formatVoiceLabel(voice)} - ${speaker}`,
      }));
    });
  }

  /**
   * A voice must be one the engine lists for the language, when it lists any.
   * Speaker-aware engines check the voice's speaker list; other engines only
   * know speakers folded into the voice name (`voice-speaker`).
   */
  public async validate(selection: VoiceSelection): Promise<VoiceCheck> {
    const { engineId, language, voice, speaker } = selection;
    if (engineId === AUTO_ENGINE || !voice) {
      return { ok: true };
    }
    const attributes = await this.attributesOf(engineId);
    if (!attributes) {
      return { ok: false, error: 'engine-not-found' };
    }

    const voices = voicesFrom(attributes, language);
    if (voices.length && !voices.includes(voice)) {
      return { ok: false, error: 'voice-not-available' };
    }
    if (!speaker) {
      return { ok: true };
    }

    if (isSpeakerAware(engineId, attributes) || engineId.toLowerCase().includes('piper')) {
      const speakers = speakersFrom(attributes, voice);
      return speakers.length && !speakers.includes(speaker)
        ? { ok: false, error: 'speaker-not-available' }
        : { ok: true };
    }
    return voices.includes(`${voice}-${speaker}`) ? { ok: true } : { ok: false, error: 'speaker-not-available' };
  }

  private async attributesOf(engineId: string): Promise<DeviceAttributes | null> {
    if (!engineId.startsWith(TTS_PREFIX)) {
      return null;
    }
    const state = await this.devices.getState(engineId);
    return state ? state.attributes : null;
  }
}

export function isSpeakerAware(engineId: string, attributes: DeviceAttributes): boolean {
  return (
    engineId.toLowerCase().includes('wyoming') ||
    toStringList(attributes.supported_options).includes('speaker') ||
    attributes.integration === 'wyoming' ||
    attributes.platform === 'wyoming'
  );
}

/**
 * Declared languages first, then `voices_<lang>` keys (Piper), then the keys of
 * a `supported_voices` map, then language prefixes of plain voice names.
 */
export function languagesFrom(attributes: DeviceAttributes): string[] {
  const declared = toStringList(attributes.supported_languages);
  if (declared.length) {
    return declared;
  }
  const listed = toStringList(attributes.languages);
  if (listed.length) {
    return listed;
  }

  const fromVoiceKeys = Object.keys(attributes)
    .filter((key) => key.startsWith('voices_') && key.length > 'voices_'.length)
    .map((key) => key.slice('voices_'.length));
  if (fromVoiceKeys.length) {
    return unique(fromVoiceKeys).sort();
  }

  const supported = attributes.supported_voices;
  if (isRecord(supported) && Object.keys(supported).length) {
    return Object.keys(supported).sort();
  }

  const prefixes = plainVoices(attributes)
    .map((voice) => voice.split('-')[0] ?? '')
    .filter((prefix) => prefix.includes('_') || /^[a-z]{2}$/i.test(prefix));
  return unique(prefixes).sort();
}

export function voicesFrom(attributes: DeviceAttributes, language: string): string[] {
  const perLanguage = toStringList(attributes[`voices_${language}`]);
  if (perLanguage.length) {
    return perLanguage;
  }

  const supported = attributes.supported_voices;
  if (isRecord(supported)) {
    const exact = toStringList(supported[language]);
    if (exact.length) {
      return exact;
    }
    const wanted = language.toLowerCase();
    const related = Object.keys(supported).find((key) => {
      const candidate = key.toLowerCase();
      return candidate.includes(wanted) || wanted.includes(candidate);
    });
    if (related) {
      return toStringList(supported[related]);
    }
  }

  const all = plainVoices(attributes);
  if (all.length) {
    const wanted = language.toLowerCase();
    const matching = all.filter((voice) => voice.toLowerCase().includes(wanted));
    return matching.length ? matching : all;
  }

  const byLanguage = attributes.voice_languages;
  return isRecord(byLanguage) ? toStringList(byLanguage[language]) : [];
}

export function speakersFrom(attributes: DeviceAttributes, voice: string): string[] {
  const perVoice = toStringList(attributes[`speakers_${voice}`]);
  if (perVoice.length) {
    return perVoice;
  }
  const general = toStringList(attributes.speakers);
  if (general.length) {
    return general;
  }
  const available = toStringList(attributes.available_speakers);
  if (available.length) {
    return available;
  }
  const mapping = attributes.voice_speakers;
  if (isRecord(mapping)) {
    const entry = mapping[voice];
    const single = normalizeString(entry);
    return single ? [single] : toStringList(entry);
  }
  return [];
}

/**
 * `de_DE-thorsten-low` → `Thorsten (low)`; names without that shape stay as they are.
 */
export function formatVoiceLabel(voice: string): string {
  const parts = voice.split('-').filter(Boolean);
  if (parts.length >= 3) {
    const quality = parts[parts.length - 1];
    const name = parts.slice(1, -1).map(capitalize).join(' ');
    return `${name} (${quality})`;
  }
  if (parts.length === 2) {
    const [first = '', second = ''] = parts;
    const looksLikeLanguage = first.length <= 5 && (first.includes('_') || first === first.toUpperCase());
    return looksLikeLanguage ? capitalize(second) : `${capitalize(first)} (${second})`;
  }
  return voice;
}

function plainVoices(attributes: DeviceAttributes): string[] {
  const voices = toStringList(attributes.voices);
  return voices.length ? voices : toStringList(attributes.available_voices);
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function capitalize(value: string): string {
  return value ? `${value[0]?.toUpperCase() ?? ''}${value.slice(1).toLowerCase()}` : value;
}
