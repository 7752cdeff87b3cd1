import path from 'node:path';
import type { SpeechPort, SpeechRequest, SynthesizedAudio } from '@/ports/SpeechPort';
import type { HomeAssistantClient } from '@/adapters/homeassistant/homeAssistantClient';
import { createLogger } from '@/shared/logging/logger';

const AUTO_ENGINE = 'auto';
const DEFAULT_EXTENSION = 'mp3';

/**
 * Renders speech through the host's TTS integrations and downloads the result.
 */
export class HomeAssistantSpeechAdapter implements SpeechPort {
  private readonly log = createLogger('HomeAssistant', 'Speech');

  constructor(private readonly client: HomeAssistantClient) {}

  public async synthesize(request: SpeechRequest): Promise<SynthesizedAudio | null> {
    const text = request.text.trim();
    if (!text) {
      return null;
    }
    const engineId = await this.resolveEngine(request.engine);
    if (!engineId) {
      this.log.warn('no tts engine available');
      return null;
    }

    const options: Record<string, string> = {};
    if (request.voice) {
      options.voice = request.voice;
    }
    if (request.speaker) {
      options.speaker = request.speaker;
    }

    const url = await this.client.ttsGetUrl({ engineId, message: text, language: request.language, options });
    if (!url) {
      return null;
    }
    const data = await this.client.download(url);
    if (!data || !data.length) {
      this.log.warn('tts audio download failed', { engine: engineId });
      return null;
    }
    this.log.debug('speech rendered', { engine: engineId, bytes: data.length });
    return { data, extension: extensionFromUrl(url) };
  }

  private async resolveEngine(engine: string): Promise<string | null> {
    if (engine && engine !== AUTO_ENGINE) {
      return engine;
    }
    const states = await this.client.listStates();
    const match = states.find((entity) => entity.entity_id.startsWith('tts.') && entity.state !== 'unavailable');
    return match?.entity_id ?? null;
  }
}

function extensionFromUrl(url: string): string {
  const pathname = url.split(/[?#]/)[0] ?? '';
  const ext = path.extname(pathname).slice(1).toLowerCase();
  return /^[a-z0-9]{1,5}$/.test(ext) ? ext : DEFAULT_EXTENSION;
}
