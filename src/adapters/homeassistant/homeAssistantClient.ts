import type { HomeAssistantConfig } from '@/domain/config/types';
import type { CommandParams, CommandResult } from '@/ports/CommandBusPort';
import { createLogger } from '@/shared/logging/logger';
import type { Logger } from '@/shared/logging/logger';
import { safeJsonParse, safeReadText } from '@/shared/bestEffort';
import { describeError } from '@/shared/errors';
import { isRecord, normalizeString } from '@/shared/utils/guards';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HomeAssistantSettings = Pick<HomeAssistantConfig, 'baseUrl' | 'token' | 'requestTimeoutMs'>;

export interface EntityState {
  entity_id: string;
  state: string;
  attributes: Record<string, unknown>;
}

export type TtsUrlRequest = {
  engineId: string;
  message: string;
  language: string;
  options: Record<string, string>;
};

type RawResult =
  | { kind: 'ok'; status: number; body: string }
  | { kind: 'error'; status: number | null; message: string };

/**
 * Minimal Home Assistant REST client. Transport and HTTP failures come back as
 * error results; nothing here throws for a rejected call.
 */
export class HomeAssistantClient {
  constructor(
    private readonly settings: () => HomeAssistantSettings,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init),
    private readonly log: Logger = createLogger('HomeAssistant', 'Client'),
  ) {}

  public async callService(domain: string, action: string, data: CommandParams): Promise<CommandResult> {
    const path = `/api/services/${encodeURIComponent(domain)}/${encodeURIComponent(action)}`;
    const result = await this.request('POST', path, data);
    if (result.kind === 'error') {
      this.log.debug('service call failed', { service: `${domain}.${action}`, message: result.message });
      return { kind: 'error', message: result.message };
    }
    this.log.spam('service call accepted', { service: `${domain}.${action}` });
    return { kind: 'ok' };
  }

  /** `null` when the entity does not exist or the host cannot be reached. */
  public async getState(entityId: string): Promise<EntityState | null> {
    const result = await this.request('GET', `/api/states/${encodeURIComponent(entityId)}`);
    if (result.kind === 'error') {
      if (result.status !== 404) {
        this.log.debug('state lookup failed', { entityId, message: result.message });
      }
      return null;
    }
    return parseEntityState(safeJsonParse(result.body));
  }

  public async listStates(): Promise<EntityState[]> {
    const result = await this.request('GET', '/api/states');
    if (result.kind === 'error') {
      this.log.warn('state listing failed', { message: result.message });
      return [];
    }
    const parsed = safeJsonParse(result.body);
    if (!Array.isArray(parsed)) {
      return [];
    }
    return parsed.map(parseEntityState).filter((entry): entry is EntityState => entry !== null);
  }

  /** Asks the TTS integration to render a message; returns the audio URL. */
  public async ttsGetUrl(request: TtsUrlRequest): Promise<string | null> {
    const result = await this.request('POST', '/api/tts_get_url', {
      engine_id: request.engineId,
      message: request.message,
      language: request.language,
      options: request.options,
    });
    if (result.kind === 'error') {
      this.log.warn('tts request failed', { engine: request.engineId, message: result.message });
      return null;
    }
    const parsed = safeJsonParse(result.body);
    return isRecord(parsed) ? normalizeString(parsed.url) ?? normalizeString(parsed.path) ?? null : null;
  }

  /** Fetches a file the host serves, e.g. a rendered TTS message. */
  public async download(url: string): Promise<Buffer | null> {
    const { baseUrl } = this.settings();
    let target: URL;
    try {
      target = new URL(url, `${baseUrl}/`);
    } catch {
      this.log.warn('invalid download url', { url });
      return null;
    }
    const sameHost = target.origin === new URL(`${baseUrl}/`).origin;
    return this.withTimeout(async (signal) => {
      const response = await this.fetchImpl(target.toString(), {
        method: 'GET',
        headers: sameHost ? this.headers() : undefined,
        signal,
      });
      if (!response.ok) {
        this.log.warn('download failed', { url: target.toString(), status: response.status });
        return null;
      }
      return Buffer.from(await response.arrayBuffer());
    }, () => null);
  }

  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<RawResult> {
    const { baseUrl, token } = this.settings();
    if (!token) {
      return { kind: 'error', status: null, message: 'home assistant token not configured' };
    }
    const url = `${baseUrl}${path}`;
    return this.withTimeout<RawResult>(async (signal) => {
      const response = await this.fetchImpl(url, {
        method,
        headers: { ...this.headers(), 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
      const text = await safeReadText(response);
      if (!response.ok) {
        return { kind: 'error', status: response.status, message: describeFailure(response.status, text) };
      }
      return { kind: 'ok', status: response.status, body: text };
    }, (message) => ({ kind: 'error', status: null, message }));
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.settings().token}` };
  }

  private async withTimeout<T>(
    run: (signal: AbortSignal) => Promise<T>,
    onFailure: (message: string) => T,
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = this.settings().requestTimeoutMs;
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await run(controller.signal);
    } catch (error) {
      const message = controller.signal.aborted ? `request timed out after ${timeoutMs}ms` : describeError(error);
      this.log.debug('request failed', { message });
      return onFailure(message);
    } finally {
      clearTimeout(timeout);
    }
  }
}

function describeFailure(status: number, text: string): string {
  const parsed = safeJsonParse(text);
  const detail = isRecord(parsed) ? normalizeString(parsed.message) : normalizeString(text);
  return detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`;
}

function parseEntityState(raw: unknown): EntityState | null {
  if (!isRecord(raw)) {
    return null;
  }
  const entityId = normalizeString(raw.entity_id);
  if (!entityId) {
    return null;
  }
  return {
    entity_id: entityId,
    state: typeof raw.state === 'string' ? raw.state : 'unknown',
    attributes: isRecord(raw.attributes) ? raw.attributes : {},
  };
}
