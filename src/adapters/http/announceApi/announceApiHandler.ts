import { createHash, timingSafeEqual } from 'node:crypto';
import type { AnnouncementService, OptionOverrides } from '@/application/announcements/announcementService';
import type { PlaybackStopper } from '@/application/announcements/playbackStopper';
import type { TtsCatalog } from '@/application/tts/ttsCatalog';
import type { DeviceCapabilityClassifier } from '@/application/announcements/deviceClassifier';
import type { DeliveryReport } from '@/domain/announcement/types';
import type { AnnouncerConfig } from '@/domain/config/types';
import { isLeadInMode } from '@/domain/config/normalize';
import { parseCombinedVoice } from '@/domain/config/normalize';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { DeviceStatePort } from '@/ports/DeviceStatePort';
import { logBuffer } from '@/shared/logging/logBuffer';
import { createLogger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';
import { isFiniteNumber, isRecord, normalizeString } from '@/shared/utils/guards';
import { readJsonBody, requestPath, requestQuery, sendJson } from '@/adapters/http/utils/jsonBody';
import type { ApiRequest, ResponseSink } from '@/adapters/http/utils/jsonBody';

const API_PREFIX = '/api';
const MEDIA_PLAYER_PREFIX = 'media_player.';
const DATA_URL = /^data:([^;,]+)?(?:;[^,]*)?;base64,/;

/** `params` holds the route pattern's capture groups. */
type RouteHandler = (req: ApiRequest, res: ResponseSink, params: string[]) => Promise<void>;

type Route = {
  method: string;
  pattern: RegExp;
  handler: RouteHandler;
};

export type AnnounceApiDeps = {
  announcements: Pick<AnnouncementService, 'announceRecording' | 'announceSpeech' | 'getLastReport'>;
  devices: DeviceStatePort;
  classifier: DeviceCapabilityClassifier;
  stopper: Pick<PlaybackStopper, 'stop'>;
  tts: Pick<TtsCatalog, 'listEngines' | 'languages' | 'voiceOptions' | 'validate'>;
  configPort: ConfigPort;
  maxBodyBytes: number;
};

type AnnounceInput =
  | (OptionOverrides & { kind: 'speech'; targetId: string; text: string; language?: string })
  | (OptionOverrides & { kind: 'recording'; targetId: string; data: Buffer; contentType?: string; filename?: string });

type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

const FAILURE_STATUS: Record<NonNullable<DeliveryReport['reason']>, number> = {
  'artifact-unavailable': 422,
  'no-targets': 404,
  'all-devices-failed': 502,
};

/**
 * JSON API of the announcer: trigger and stop announcements, inspect the last
 * one, list players and TTS voices, read logs and edit options. Every call
 * needs `Authorization: Bearer <system.apiToken>`.
 */
export class AnnounceApiHandler {
  private readonly log = createLogger('Http', 'AnnounceApi');
  private readonly routes: Route[];

  constructor(private readonly deps: AnnounceApiDeps) {
    this.routes = this.buildRoutes();
  }

  public matches(pathname: string): boolean {
    return pathname === API_PREFIX || pathname.startsWith(`${API_PREFIX}/`);
  }

  /** An empty configured token refuses every call. */
  private authorized(req: ApiRequest): boolean {
    const expected = this.deps.configPort.getConfig().system.apiToken;
    const presented = bearerToken(req);
    return Boolean(expected && presented && sameSecret(presented, expected));
  }

  public async handle(req: ApiRequest, res: ResponseSink): Promise<void> {
    const pathname = requestPath(req.url).slice(API_PREFIX.length).replace(/\/+$/, '') || '/';
    if (!this.authorized(req)) {
      sendJson(res, 401, { error: 'unauthorized' });
      return;
    }
    const method = (req.method ?? 'GET').toUpperCase();
    const candidates = this.routes.filter((route) => route.pattern.test(pathname));
    if (!candidates.length) {
      sendJson(res, 404, { error: 'not-found' });
      return;
    }
    const route = candidates.find((entry) => entry.method === method);
    if (!route) {
      sendJson(res, 405, { error: 'method-not-allowed' });
      return;
    }

    const params = route.pattern.exec(pathname)?.slice(1) ?? [];
    try {
      await route.handler(req, res, params);
    } catch (error) {
      this.log.error('announce api error', { path: pathname, message: describeError(error) });
      if (!res.writableEnded) {
        sendJson(res, 500, { error: 'announce-api-error' });
      }
    }
  }

  private buildRoutes(): Route[] {
    return [
      { method: 'POST', pattern: /^\/announce$/, handler: (req, res) => this.handleAnnounce(req, res) },
      { method: 'POST', pattern: /^\/stop$/, handler: (req, res) => this.handleStop(req, res) },
      { method: 'GET', pattern: /^\/announce\/last$/, handler: async (_req, res) => this.handleLast(res) },
      { method: 'GET', pattern: /^\/devices$/, handler: async (_req, res) => this.handleDevices(res) },
      { method: 'GET', pattern: /^\/tts\/engines$/, handler: async (_req, res) => this.handleEngines(res) },
      {
        method: 'GET',
        pattern: /^\/tts\/engines\/([^/]+)\/languages$/,
        handler: async (_req, res, [engineId = '']) => this.handleLanguages(res, engineId),
      },
      {
        method: 'GET',
        pattern: /^\/tts\/engines\/([^/]+)\/voices$/,
        handler: async (req, res, [engineId = '']) => this.handleVoices(req, res, engineId),
      },
      { method: 'GET', pattern: /^\/logs$/, handler: async (req, res) => this.handleLogs(req, res) },
      { method: 'GET', pattern: /^\/config$/, handler: async (_req, res) => this.handleConfigGet(res) },
      { method: 'PATCH', pattern: /^\/config$/, handler: (req, res) => this.handleConfigPatch(req, res) },
    ];
  }

  private async handleAnnounce(req: ApiRequest, res: ResponseSink): Promise<void> {
    const body = await readJsonBody(req, res, this.deps.maxBodyBytes);
    if (res.writableEnded) {
      return;
    }
    const parsed = parseAnnounceBody(body);
    if (!parsed.ok) {
      sendJson(res, 400, { error: parsed.error });
      return;
    }

    const input = parsed.value;
    const report =
      input.kind === 'speech'
        ? await this.deps.announcements.announceSpeech(input)
        : await this.deps.announcements.announceRecording(input);

    if (!report.success) {
      const reason = report.reason ?? 'all-devices-failed';
      sendJson(res, FAILURE_STATUS[reason], { error: reason, report });
      return;
    }
    sendJson(res, 200, report);
  }

  private async handleStop(req: ApiRequest, res: ResponseSink): Promise<void> {
    const body = await readJsonBody(req, res, this.deps.maxBodyBytes);
    if (res.writableEnded) {
      return;
    }
    const targetId = isRecord(body) ? normalizeString(body.target) ?? normalizeString(body.entity_id) : undefined;
    if (!targetId) {
      sendJson(res, 400, { error: 'missing-target' });
      return;
    }
    const report = await this.deps.stopper.stop(targetId);
    if (!report.devices.length) {
      sendJson(res, 404, { error: 'no-targets', report });
      return;
    }
    sendJson(res, report.success ? 200 : 502, report.success ? report : { error: 'stop-failed', report });
  }

  private handleLast(res: ResponseSink): void {
    const report = this.deps.announcements.getLastReport();
    if (!report) {
      sendJson(res, 404, { error: 'no-announcement' });
      return;
    }
    sendJson(res, 200, report);
  }

  private async handleDevices(res: ResponseSink): Promise<void> {
    const devices = await this.deps.devices.listDevices(MEDIA_PLAYER_PREFIX);
    sendJson(
      res,
      200,
      devices.map((device) => ({
        deviceId: device.deviceId,
        name: device.name,
        state: device.state,
        isQuirky: this.deps.classifier.classify(device.deviceId, device.attributes).isQuirky,
      })),
    );
  }

  private async handleEngines(res: ResponseSink): Promise<void> {
    sendJson(res, 200, await this.deps.tts.listEngines());
  }

  private async handleLanguages(res: ResponseSink, engineId: string): Promise<void> {
    const languages = await this.deps.tts.languages(engineId);
    if (!languages) {
      sendJson(res, 404, { error: 'engine-not-found' });
      return;
    }
    sendJson(res, 200, { engineId, languages });
  }

  private async handleVoices(req: ApiRequest, res: ResponseSink, engineId: string): Promise<void> {
    const language =
      normalizeString(requestQuery(req.url).get('language')) ?? this.deps.configPort.getConfig().tts.language;
    const voices = await this.deps.tts.voiceOptions(engineId, language);
    if (!voices) {
      sendJson(res, 404, { error: 'engine-not-found' });
      return;
    }
    sendJson(res, 200, { engineId, language, voices });
  }

  private handleLogs(req: ApiRequest, res: ResponseSink): void {
    const tail = Number(requestQuery(req.url).get('tail'));
    sendJson(res, 200, logBuffer.snapshot(Number.isInteger(tail) && tail > 0 ? tail : undefined));
  }

  private handleConfigGet(res: ResponseSink): void {
    sendJson(res, 200, redact(this.deps.configPort.getConfig()));
  }

  private async handleConfigPatch(req: ApiRequest, res: ResponseSink): Promise<void> {
    const body = await readJsonBody(req, res, this.deps.maxBodyBytes);
    if (res.writableEnded) {
      return;
    }
    if (!isRecord(body)) {
      sendJson(res, 400, { error: 'invalid-config' });
      return;
    }
    if (isRecord(body.tts)) {
      const preview = structuredClone(this.deps.configPort.getConfig());
      applyConfigPatch(preview, body);
      const check = await this.deps.tts.validate({
        engineId: preview.tts.engine,
        language: preview.tts.language,
        voice: preview.tts.voice,
        speaker: preview.tts.speaker,
      });
      if (!check.ok) {
        sendJson(res, 400, { error: check.error });
        return;
      }
    }
    const next = await this.deps.configPort.updateConfig((config) => applyConfigPatch(config, body));
    this.log.info('options updated', { sections: Object.keys(body) });
    sendJson(res, 200, redact(next));
  }
}

export function parseAnnounceBody(body: unknown): ParseResult<AnnounceInput> {
  if (!isRecord(body)) {
    return { ok: false, error: 'invalid-request' };
  }
  const targetId = normalizeString(body.target) ?? normalizeString(body.entity_id);
  if (!targetId) {
    return { ok: false, error: 'missing-target' };
  }

  const overrides: OptionOverrides = {};
  if (body.volumeBoost !== undefined) {
    if (typeof body.volumeBoost !== 'boolean') {
      return { ok: false, error: 'invalid-volume-boost' };
    }
    overrides.volumeBoost = body.volumeBoost;
  }
  if (body.volumeBoostAmount !== undefined) {
    const amount = body.volumeBoostAmount;
    if (!isFiniteNumber(amount) || amount < 0 || amount > 1) {
      return { ok: false, error: 'invalid-volume-boost-amount' };
    }
    overrides.volumeBoostAmount = amount;
  }

  const text = normalizeString(body.text);
  const audio = normalizeString(body.audio);
  if (text && audio) {
    return { ok: false, error: 'ambiguous-content' };
  }
  if (text) {
    const language = normalizeString(body.language);
    return { ok: true, value: { ...overrides, kind: 'speech', targetId, text, ...(language ? { language } : {}) } };
  }
  if (!audio) {
    return { ok: false, error: 'missing-content' };
  }

  const dataUrl = DATA_URL.exec(audio);
  const encoded = dataUrl ? audio.slice(dataUrl[0].length) : audio;
  if (!/^[A-Za-z0-9+/=\s_-]+$/.test(encoded)) {
    return { ok: false, error: 'invalid-audio' };
  }
  const data = Buffer.from(encoded, 'base64');
  if (!data.length) {
    return { ok: false, error: 'invalid-audio' };
  }
  const contentType = normalizeString(body.contentType) ?? normalizeString(dataUrl?.[1]);
  const filename = normalizeString(body.filename);
  return {
    ok: true,
    value: {
      ...overrides,
      kind: 'recording',
      targetId,
      data,
      ...(contentType ? { contentType } : {}),
      ...(filename ? { filename } : {}),
    },
  };
}

/** Copies the editable option fields; `normalizeConfig` validates them on save. */
export function applyConfigPatch(config: AnnouncerConfig, patch: Record<string, unknown>): void {
  const delivery = isRecord(patch.delivery) ? patch.delivery : {};
  if (typeof delivery.volumeBoostEnabled === 'boolean') {
    config.delivery.volumeBoostEnabled = delivery.volumeBoostEnabled;
  }
  if (isFiniteNumber(delivery.volumeBoostAmount)) {
    config.delivery.volumeBoostAmount = delivery.volumeBoostAmount;
  }

  const tts = isRecord(patch.tts) ? patch.tts : {};
  const engine = normalizeString(tts.engine);
  if (engine) {
    config.tts.engine = engine;
  }
  const language = normalizeString(tts.language);
  if (language) {
    config.tts.language = language;
  }
  if (tts.voice === null || typeof tts.voice === 'string') {
    const combined = parseCombinedVoice(normalizeString(tts.voice) ?? null);
    config.tts.voice = combined.voice;
    config.tts.speaker = combined.speaker;
  }
  if (tts.speaker === null || typeof tts.speaker === 'string') {
    config.tts.speaker = normalizeString(tts.speaker) ?? null;
  }

  const artifacts = isRecord(patch.artifacts) ? patch.artifacts : {};
  if (isLeadInMode(artifacts.leadIn)) {
    config.artifacts.leadIn = artifacts.leadIn;
  }
  const phrase = normalizeString(artifacts.announcementPhrase);
  if (phrase) {
    config.artifacts.announcementPhrase = phrase;
  }
  if (isFiniteNumber(artifacts.leadInSilenceSeconds)) {
    config.artifacts.leadInSilenceSeconds = artifacts.leadInSilenceSeconds;
  }
  if (isFiniteNumber(artifacts.retentionSeconds)) {
    config.artifacts.retentionSeconds = artifacts.retentionSeconds;
  }
}

function redact(config: AnnouncerConfig): AnnouncerConfig {
  return {
    ...config,
    system: { ...config.system, apiToken: config.system.apiToken ? '***' : '' },
    homeAssistant: { ...config.homeAssistant, token: config.homeAssistant.token ? '***' : '' },
  };
}

function bearerToken(req: ApiRequest): string | undefined {
  const header = req.headers?.authorization;
  const value = Array.isArray(header) ? header[0] : header;
  const match = value ? /^Bearer\s+(\S+)\s*$/i.exec(value) : null;
  return match?.[1];
}

function sameSecret(presented: string, expected: string): boolean {
  const digest = (value: string) => createHash('sha256').update(value).digest();
  return timingSafeEqual(digest(presented), digest(expected));
}
