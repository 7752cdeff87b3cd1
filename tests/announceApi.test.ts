import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import {
  AnnounceApiHandler,
  applyConfigPatch,
  parseAnnounceBody,
} from '../src/adapters/http/announceApi/announceApiHandler';
import { MediaFileHandler } from '../src/adapters/http/media/mediaFileHandler';
import { readJsonBody, requestPath, requestQuery } from '../src/adapters/http/utils/jsonBody';
import { FileArtifactStore } from '../src/adapters/artifacts/FileArtifactStore';
import type { DeviceStatePort } from '../src/ports/DeviceStatePort';
import { logBuffer } from '../src/shared/logging/logBuffer';
import { isRecord } from '../src/shared/utils/guards';
import { FakeHomeAssistant } from './fakes/homeAssistant';
import { makeConfig, makeConfigPort, TEST_API_TOKEN, TEST_BASE_URL } from './fakes/config';
import { FakeResponse, makeRequest } from './fakes/http';
import { FakeSpeech } from './fakes/media';
import { createTestPipeline } from './fakes/pipeline';

const KITCHEN = 'media_player.kitchen';

const SONOS = 'media_player.sonos_living';

type ApiOptions = {
  ha?: FakeHomeAssistant;
  devices?: DeviceStatePort;
  speech?: FakeSpeech;
  maxBodyBytes?: number;
};

function defaultHome(): FakeHomeAssistant {
  return new FakeHomeAssistant()
    .addDevice(KITCHEN, { volume: 0.5 })
    .addDevice(SONOS)
    .addDevice('light.hall');
}

function createApi(options: ApiOptions = {}) {
  const ha = options.ha ?? defaultHome();
  const p = createTestPipeline({ ha, speech: options.speech });
  const configPort = makeConfigPort(p.config);
  const handler = new AnnounceApiHandler({
    announcements: p.service,
    devices: options.devices ?? ha,
    classifier: p.classifier,
    stopper: p.stopper,
    tts: p.tts,
    configPort,
    maxBodyBytes: options.maxBodyBytes ?? 1024 * 1024,
  });
  return { handler, p, configPort };
}

async function call(
  handler: AnnounceApiHandler,
  method: string,
  url: string,
  body?: unknown,
  token: string | null = TEST_API_TOKEN,
) {
  const res = new FakeResponse();
  const raw = typeof body === 'string' ? body : body === undefined ? undefined : JSON.stringify(body);
  const headers: Record<string, string> = token === null ? {} : { authorization: `Bearer ${token}` };
  await handler.handle(makeRequest(method, url, raw, headers), res);
  return res;
}

function recordOf(value: unknown): Record<string, unknown> {
  assert.ok(isRecord(value));
  return value;
}

test('json body reader rejects oversized payloads', async () => {
  const res = new FakeResponse();

  const body = await readJsonBody(makeRequest('POST', '/api/announce', JSON.stringify({ text: 'x'.repeat(64) })), res, 16);

  assert.equal(body, null);
  assert.equal(res.status, 413);
  assert.deepEqual(res.json(), { error: 'payload-too-large' });
});

test('json body reader answers malformed json with 400', async () => {
  const res = new FakeResponse();

  assert.equal(await readJsonBody(makeRequest('POST', '/api/announce', '{"target":'), res, 1024), null);
  assert.equal(res.status, 400);
  assert.deepEqual(res.json(), { error: 'invalid-json' });
});

test('json body reader treats an empty body as null without answering', async () => {
  const res = new FakeResponse();

  assert.equal(await readJsonBody(makeRequest('POST', '/api/announce'), res, 1024), null);
  assert.equal(res.writableEnded, false);
});

test('request path and query helpers', () => {
  assert.equal(requestPath('/media/a%20b.mp3?x=1'), '/media/a b.mp3');
  assert.equal(requestPath('/bad%E0'), '/bad%E0');
  assert.equal(requestPath(undefined), '/');
  assert.equal(requestQuery('/api/logs?tail=5').get('tail'), '5');
  assert.equal(requestQuery('/api/logs').get('tail'), null);
});

test('announce endpoint delivers a recording', async () => {
  const { handler, p } = createApi();

  const res = await call(handler, 'POST', '/api/announce', {
    target: KITCHEN,
    audio: Buffer.from('mp3-bytes').toString('base64'),
    contentType: 'audio/mpeg',
  });

  assert.equal(res.status, 200);
  const report = recordOf(res.json());
  assert.equal(report.success, true);
  assert.deepEqual(report.targets, [KITCHEN]);
  assert.deepEqual(report.artifact, {
    filename: 'announcement-m2.mp3',
    url: `${TEST_BASE_URL}/media/announcement-m2.mp3`,
    contentType: 'audio/mpeg',
  });
  assert.equal(p.ha.callsTo('media_player.play_media').length, 1);
});

test('announce endpoint maps delivery failures to status codes', async () => {
  const { handler } = createApi({ speech: new FakeSpeech(null) });

  const unreachable = await call(handler, 'POST', '/api/announce', {
    target: 'media_player.nowhere',
    audio: Buffer.from('x').toString('base64'),
  });
  assert.equal(unreachable.status, 502);
  assert.equal(recordOf(unreachable.json()).error, 'all-devices-failed');

  const silent = await call(handler, 'POST', '/api/announce', { entity_id: KITCHEN, text: 'Hello' });
  assert.equal(silent.status, 422);
  const body = recordOf(silent.json());
  assert.equal(body.error, 'artifact-unavailable');
  assert.equal(recordOf(body.report).sourceKind, 'speech');
});

test('announce endpoint validates the body', async () => {
  const { handler } = createApi();

  const missing = await call(handler, 'POST', '/api/announce', { text: 'Hello' });
  assert.equal(missing.status, 400);
  assert.deepEqual(missing.json(), { error: 'missing-target' });

  const malformed = await call(handler, 'POST', '/api/announce', '{oops');
  assert.equal(malformed.status, 400);
  assert.deepEqual(malformed.json(), { error: 'invalid-json' });
});

test('last announcement is served once one exists', async () => {
  const { handler } = createApi();

  const before = await call(handler, 'GET', '/api/announce/last');
  assert.equal(before.status, 404);
  assert.deepEqual(before.json(), { error: 'no-announcement' });

  await call(handler, 'POST', '/api/announce', { target: KITCHEN, audio: Buffer.from('x').toString('base64') });
  const after = await call(handler, 'GET', '/api/announce/last/');
  assert.equal(after.status, 200);
  assert.equal(recordOf(after.json()).targetId, KITCHEN);
});

test('device listing shows media players with their classification', async () => {
  const { handler } = createApi();

  const res = await call(handler, 'GET', '/api/devices');

  assert.equal(res.status, 200);
  assert.deepEqual(res.json(), [
    { deviceId: KITCHEN, name: KITCHEN, state: 'idle', isQuirky: false },
    { deviceId: SONOS, name: SONOS, state: 'idle', isQuirky: true },
  ]);
});

test('handler failures answer 500', async () => {
  const devices: DeviceStatePort = {
    getState: async () => null,
    listDevices: async () => {
      throw new Error('host unreachable');
    },
  };
  const { handler } = createApi({ devices });

  const res = await call(handler, 'GET', '/api/devices');

  assert.equal(res.status, 500);
  assert.deepEqual(res.json(), { error: 'announce-api-error' });
});

test('unknown routes and methods are rejected', async () => {
  const { handler } = createApi();

  assert.equal((await call(handler, 'GET', '/api/nothing')).status, 404);
  const wrongMethod = await call(handler, 'PUT', '/api/config');
  assert.equal(wrongMethod.status, 405);
  assert.deepEqual(wrongMethod.json(), { error: 'method-not-allowed' });
  assert.equal(handler.matches('/api/devices'), true);
  assert.equal(handler.matches('/apix'), false);
});

test('logs endpoint returns the buffered tail', async () => {
  const { handler } = createApi();
  logBuffer.append('first line');
  logBuffer.append('second line');
  logBuffer.append('third line');

  const res = await call(handler, 'GET', '/api/logs?tail=2');

  assert.deepEqual(recordOf(res.json()).lines, ['second line', 'third line']);
});

test('config endpoints redact the token and apply patches', async () => {
  const { handler, p, configPort } = createApi();

  const current = recordOf((await call(handler, 'GET', '/api/config')).json());
  assert.equal(recordOf(current.homeAssistant).token, '***');
  assert.equal(recordOf(current.system).apiToken, '***');

  const res = await call(handler, 'PATCH', '/api/config', {
    delivery: { volumeBoostAmount: 0.3 },
    tts: { voice: 'thorsten|high' },
  });

  assert.equal(res.status, 200);
  assert.equal(configPort.updates, 1);
  assert.equal(p.config.delivery.volumeBoostAmount, 0.3);
  assert.equal(p.config.tts.voice, 'thorsten');
  assert.equal(p.config.tts.speaker, 'high');
  assert.equal(p.config.homeAssistant.token, 'test-secret');
  assert.equal(recordOf(recordOf(res.json()).homeAssistant).token, '***');

  const rejected = await call(handler, 'PATCH', '/api/config', [1, 2]);
  assert.equal(rejected.status, 400);
  assert.deepEqual(rejected.json(), { error: 'invalid-config' });
  assert.equal(configPort.updates, 1);
});

test('api calls without the bearer token are refused', async () => {
  const { handler, p, configPort } = createApi();

  const patch = await call(handler, 'PATCH', '/api/config', { delivery: { volumeBoostAmount: 0.9 } }, null);
  assert.equal(patch.status, 401);
  assert.deepEqual(patch.json(), { error: 'unauthorized' });
  assert.equal(configPort.updates, 0);
  assert.equal(p.config.delivery.volumeBoostAmount, 0.1);

  const announce = await call(
    handler,
    'POST',
    '/api/announce',
    { target: KITCHEN, audio: Buffer.from('x').toString('base64') },
    'wrong-token',
  );
  assert.equal(announce.status, 401);
  assert.deepEqual(p.ha.calls, []);

  assert.equal((await call(handler, 'GET', '/api/logs', undefined, null)).status, 401);
  assert.equal((await call(handler, 'GET', '/api/nothing', undefined, null)).status, 401);

  const basic = new FakeResponse();
  await handler.handle(makeRequest('GET', '/api/devices', undefined, { authorization: `Basic ${TEST_API_TOKEN}` }), basic);
  assert.equal(basic.status, 401);
});

test('an unset api token refuses every call', async () => {
  const { handler, p } = createApi();
  p.config.system.apiToken = '';

  const res = await call(handler, 'GET', '/api/devices');

  assert.equal(res.status, 401);
  assert.deepEqual(res.json(), { error: 'unauthorized' });
});

test('stop endpoint halts every device of the target', async () => {
  const ha = defaultHome().addGroup('group.downstairs', [KITCHEN, SONOS]);
  const { handler } = createApi({ ha });

  const res = await call(handler, 'POST', '/api/stop', { target: 'group.downstairs' });

  assert.equal(res.status, 200);
  assert.deepEqual(res.json(), {
    targetId: 'group.downstairs',
    success: true,
    devices: [
      { deviceId: KITCHEN, stopped: true },
      { deviceId: SONOS, stopped: true },
    ],
  });
  assert.deepEqual(
    ha.callsTo('media_player.media_stop').map((entry) => entry.params.entity_id),
    [KITCHEN, SONOS],
  );
});

test('stop endpoint reports missing targets and rejected stops', async () => {
  const ha = defaultHome().failService('media_player.media_stop', 'Device busy');
  const { handler } = createApi({ ha });

  const missing = await call(handler, 'POST', '/api/stop', {});
  assert.equal(missing.status, 400);
  assert.deepEqual(missing.json(), { error: 'missing-target' });

  const rejected = await call(handler, 'POST', '/api/stop', { entity_id: KITCHEN });
  assert.equal(rejected.status, 502);
  assert.deepEqual(rejected.json(), {
    error: 'stop-failed',
    report: {
      targetId: KITCHEN,
      success: false,
      devices: [{ deviceId: KITCHEN, stopped: false, message: 'Device busy' }],
    },
  });
});

function ttsHome(): FakeHomeAssistant {
  return defaultHome()
    .addDevice('tts.piper', {
      volume: null,
      attributes: {
        voices_de_DE: ['de_DE-thorsten-low', 'de_DE-eva_k-x_low'],
        voices_en_US: ['en_US-lessac-medium'],
      },
    })
    .addDevice('tts.wyoming_piper', {
      volume: null,
      attributes: {
        supported_options: ['voice', 'speaker'],
        supported_voices: { 'de-DE': ['thorsten'] },
        speakers_thorsten: ['a', 'b'],
      },
    })
    .addDevice('tts.offline', { state: 'unavailable' });
}

test('tts endpoints list engines, languages and voices', async () => {
  const { handler } = createApi({ ha: ttsHome() });

  assert.deepEqual((await call(handler, 'GET', '/api/tts/engines')).json(), [
    { engineId: 'auto', name: 'Auto-detect', speakerAware: false },
    { engineId: 'tts.piper', name: 'tts.piper', speakerAware: false },
    { engineId: 'tts.wyoming_piper', name: 'tts.wyoming_piper', speakerAware: true },
  ]);
  assert.deepEqual((await call(handler, 'GET', '/api/tts/engines/tts.piper/languages')).json(), {
    engineId: 'tts.piper',
    languages: ['de_DE', 'en_US'],
  });
  assert.deepEqual((await call(handler, 'GET', '/api/tts/engines/auto/languages')).json(), {
    engineId: 'auto',
    languages: [],
  });

  const missing = await call(handler, 'GET', '/api/tts/engines/tts.nothing/languages');
  assert.equal(missing.status, 404);
  assert.deepEqual(missing.json(), { error: 'engine-not-found' });

  assert.deepEqual((await call(handler, 'GET', '/api/tts/engines/tts.piper/voices')).json(), {
    engineId: 'tts.piper',
    language: 'de_DE',
    voices: [
      { value: 'de_DE-thorsten-low', voice: 'de_DE-thorsten-low', speaker: null, label: 'Thorsten (low)' },
      { value: 'de_DE-eva_k-x_low', voice: 'de_DE-eva_k-x_low', speaker: null, label: 'Eva_k (x_low)' },
    ],
  });
  assert.deepEqual((await call(handler, 'GET', '/api/tts/engines/tts.wyoming_piper/voices?language=de-DE')).json(), {
    engineId: 'tts.wyoming_piper',
    language: 'de-DE',
    voices: [
      { value: 'thorsten|a', voice: 'thorsten', speaker: 'a', label: 'thorsten - a' },
      { value: 'thorsten|b', voice: 'thorsten', speaker: 'b', label: 'thorsten - b' },
    ],
  });
});

test('config patch rejects voices and speakers the engine does not offer', async () => {
  const { handler, p, configPort } = createApi({ ha: ttsHome() });

  const voice = await call(handler, 'PATCH', '/api/config', { tts: { engine: 'tts.piper', voice: 'de_DE-nobody-low' } });
  assert.equal(voice.status, 400);
  assert.deepEqual(voice.json(), { error: 'voice-not-available' });

  const speaker = await call(handler, 'PATCH', '/api/config', {
    tts: { engine: 'tts.wyoming_piper', language: 'de-DE', voice: 'thorsten|c' },
  });
  assert.equal(speaker.status, 400);
  assert.deepEqual(speaker.json(), { error: 'speaker-not-available' });

  const engine = await call(handler, 'PATCH', '/api/config', { tts: { engine: 'tts.nothing', voice: 'x' } });
  assert.deepEqual(engine.json(), { error: 'engine-not-found' });
  assert.equal(configPort.updates, 0);
  assert.equal(p.config.tts.engine, 'auto');

  const accepted = await call(handler, 'PATCH', '/api/config', {
    tts: { engine: 'tts.wyoming_piper', language: 'de-DE', voice: 'thorsten|b' },
  });
  assert.equal(accepted.status, 200);
  assert.equal(p.config.tts.engine, 'tts.wyoming_piper');
  assert.equal(p.config.tts.voice, 'thorsten');
  assert.equal(p.config.tts.speaker, 'b');
});

test('announce body parsing covers every error', () => {
  const audio = Buffer.from('x').toString('base64');
  const cases: Array<[unknown, string]> = [
    [null, 'invalid-request'],
    [{ text: 'Hi' }, 'missing-target'],
    [{ target: 'a', text: 'Hi', volumeBoost: 'yes' }, 'invalid-volume-boost'],
    [{ target: 'a', text: 'Hi', volumeBoostAmount: 1.5 }, 'invalid-volume-boost-amount'],
    [{ target: 'a', text: 'Hi', audio }, 'ambiguous-content'],
    [{ target: 'a' }, 'missing-content'],
    [{ target: 'a', audio: 'not base64!' }, 'invalid-audio'],
    [{ target: 'a', audio: '====' }, 'invalid-audio'],
  ];
  for (const [body, error] of cases) {
    assert.deepEqual(parseAnnounceBody(body), { ok: false, error });
  }
});

test('announce body parsing builds speech and recording inputs', () => {
  assert.deepEqual(
    parseAnnounceBody({ entity_id: ' media_player.a ', text: ' Hi ', language: 'en_US', volumeBoost: false }),
    { ok: true, value: { volumeBoost: false, kind: 'speech', targetId: 'media_player.a', text: 'Hi', language: 'en_US' } },
  );
  assert.deepEqual(
    parseAnnounceBody({
      target: 'media_player.a',
      audio: `data:audio/ogg;codecs=opus;base64,${Buffer.from('ogg').toString('base64')}`,
      filename: 'note.ogg',
      volumeBoostAmount: 0.2,
    }),
    {
      ok: true,
      value: {
        volumeBoostAmount: 0.2,
        kind: 'recording',
        targetId: 'media_player.a',
        data: Buffer.from('ogg'),
        contentType: 'audio/ogg',
        filename: 'note.ogg',
      },
    },
  );
});

test('config patch only touches editable fields', () => {
  const config = makeConfig();

  applyConfigPatch(config, {
    delivery: { volumeBoostEnabled: false },
    tts: { engine: 'tts.piper', voice: 'a|b', speaker: 'c' },
    artifacts: { leadIn: 'disabled', retentionSeconds: 120, leadInSilenceSeconds: 'long' },
    homeAssistant: { token: 'other' },
  });

  assert.equal(config.delivery.volumeBoostEnabled, false);
  assert.equal(config.tts.engine, 'tts.piper');
  assert.equal(config.tts.voice, 'a');
  assert.equal(config.tts.speaker, 'c');
  assert.equal(config.artifacts.leadIn, 'disabled');
  assert.equal(config.artifacts.retentionSeconds, 120);
  assert.equal(config.artifacts.leadInSilenceSeconds, 3);
  assert.equal(config.homeAssistant.token, 'test-secret');

  applyConfigPatch(config, { tts: { voice: null }, artifacts: { leadIn: 'loud' } });
  assert.equal(config.tts.voice, null);
  assert.equal(config.tts.speaker, null);
  assert.equal(config.artifacts.leadIn, 'disabled');

  applyConfigPatch(config, { artifacts: { leadIn: 'announcement', announcementPhrase: ' Attention please ' } });
  assert.equal(config.artifacts.leadIn, 'announcement');
  assert.equal(config.artifacts.announcementPhrase, 'Attention please');

  applyConfigPatch(config, { system: { apiToken: 'other' } });
  assert.equal(config.system.apiToken, TEST_API_TOKEN);
});

test('media handler serves stored audio', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'announcer-media-'));
  try {
    const store = new FileArtifactStore(dir, () => TEST_BASE_URL);
    const file = await store.write(Buffer.from('ID3'), 'mp3');
    const handler = new MediaFileHandler(store);

    const get = new FakeResponse();
    await handler.handle(makeRequest('GET', `/media/${file.filename}`), get);
    assert.equal(get.status, 200);
    assert.deepEqual(get.headers, { 'Content-Type': 'audio/mpeg', 'Content-Length': '3', 'Cache-Control': 'no-cache' });
    assert.deepEqual(get.body, Buffer.from('ID3'));

    const head = new FakeResponse();
    await handler.handle(makeRequest('HEAD', `/media/${file.filename}`), head);
    assert.equal(head.status, 200);
    assert.equal(head.body, undefined);

    const missing = new FakeResponse();
    await handler.handle(makeRequest('GET', '/media/announcement-gone.mp3'), missing);
    assert.equal(missing.status, 404);

    const traversal = new FakeResponse();
    await handler.handle(makeRequest('GET', '/media/..%2F..%2Fetc%2Fpasswd'), traversal);
    assert.equal(traversal.status, 404);

    const post = new FakeResponse();
    await handler.handle(makeRequest('POST', `/media/${file.filename}`), post);
    assert.equal(post.status, 405);
    assert.equal(handler.matches('/media/x.mp3'), true);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
