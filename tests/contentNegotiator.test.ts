import assert from 'node:assert/strict';
import { test } from './testHarness';
import { ContentNegotiator } from '../src/application/announcements/contentNegotiator';
import type { NegotiationParams } from '../src/application/announcements/contentNegotiator';
import { FakeHomeAssistant } from './fakes/homeAssistant';
import type { PlayStep } from './fakes/homeAssistant';
import { InstantClock } from './fakes/clock';
import { createRecordingLogger } from './fakes/logger';
import { makeArtifact } from './fakes/media';

const DEVICE = 'media_player.sonos_office';

function setup(playScript: PlayStep[]) {
  const ha = new FakeHomeAssistant().addDevice(DEVICE, { playScript });
  const clock = new InstantClock();
  const negotiator = new ContentNegotiator(
    ha,
    ha,
    clock,
    () => ({ verifyGraceMs: 2000, busyGraceMs: 4000, busyPatterns: ['busy', 'transition'] }),
    createRecordingLogger().log,
  );
  return { ha, clock, negotiator };
}

function params(overrides: Partial<NegotiationParams> = {}): NegotiationParams {
  return {
    deviceId: DEVICE,
    artifact: makeArtifact(),
    candidates: ['audio/mpeg', 'music'],
    verify: true,
    retryBusy: true,
    ...overrides,
  };
}

test('single-shot play trusts the first accepted command', async () => {
  const { ha, clock, negotiator } = setup(['ignore']);

  const result = await negotiator.negotiate(params({ verify: false, retryBusy: false }));

  assert.deepEqual(result, {
    kind: 'delivered',
    contentType: 'audio/mpeg',
    candidateIndex: 0,
    attempts: [{ contentType: 'audio/mpeg', result: 'accepted', retry: false }],
  });
  assert.deepEqual(clock.sleeps, []);
  assert.deepEqual(ha.stateReads, []);
});

test('single-shot play does not retry a busy player', async () => {
  const { ha, negotiator } = setup([{ error: 'Device busy' }]);

  const result = await negotiator.negotiate(params({ candidates: ['audio/mpeg'], verify: false, retryBusy: false }));

  assert.equal(result.kind, 'exhausted');
  assert.equal(ha.callsTo('media_player.media_stop').length, 0);
  assert.deepEqual(result.attempts, [
    { contentType: 'audio/mpeg', result: 'busy', retry: false, message: 'Device busy' },
  ]);
});

test('busy candidate retried once then abandoned for the next', async () => {
  const { ha, clock, negotiator } = setup([{ error: 'busy' }, { error: 'still busy' }, 'ok']);

  const result = await negotiator.negotiate(params());

  assert.equal(result.kind, 'delivered');
  if (result.kind === 'delivered') {
    assert.equal(result.contentType, 'music');
    assert.equal(result.candidateIndex, 1);
  }
  assert.deepEqual(
    result.attempts.map((attempt) => [attempt.contentType, attempt.result, attempt.retry]),
    [
      ['audio/mpeg', 'busy', false],
      ['audio/mpeg', 'busy', true],
      ['music', 'accepted', false],
    ],
  );
  assert.equal(ha.callsTo('media_player.media_stop').length, 1);
  assert.deepEqual(clock.sleeps, [4000, 2000]);
});

test('rejected candidate moves straight to the next', async () => {
  const { ha, clock, negotiator } = setup([{ error: 'Unsupported media type' }, 'ok']);
  const indices: number[] = [];

  const result = await negotiator.negotiate(params({ onAttempt: (_attempt, index) => indices.push(index) }));

  assert.equal(result.kind, 'delivered');
  assert.equal(ha.callsTo('media_player.media_stop').length, 0);
  assert.deepEqual(clock.sleeps, [2000]);
  assert.deepEqual(indices, [0, 1]);
  assert.deepEqual(
    ha.callsTo('media_player.play_media').map((call) => call.params.media_content_type),
    ['audio/mpeg', 'music'],
  );
});

test('accepted but silent command counts as unverified', async () => {
  const { negotiator } = setup(['ignore', 'ignore']);

  const result = await negotiator.negotiate(params());

  assert.deepEqual(result, {
    kind: 'exhausted',
    reason: 'candidates-exhausted',
    attempts: [
      { contentType: 'audio/mpeg', result: 'unverified', retry: false, message: 'state idle' },
      { contentType: 'music', result: 'unverified', retry: false, message: 'state idle' },
    ],
  });
});

test('verification matches a rewritten url by filename', async () => {
  const { ha, negotiator } = setup(['ignore']);
  const artifact = makeArtifact();
  ha.onCall((call) => {
    if (call.action === 'play_media') {
      ha.removeDevice(DEVICE);
      ha.addDevice(DEVICE, { state: 'playing', playingRef: `http://proxy.test/stream?src=${artifact.filename}` });
    }
  });

  const result = await negotiator.negotiate(params({ artifact, candidates: ['audio/mpeg'] }));

  assert.equal(result.kind, 'delivered');
});

test('unavailable device before the first play stops negotiation', async () => {
  const { ha, negotiator } = setup([]);
  ha.setState(DEVICE, 'unavailable');

  const result = await negotiator.negotiate(params());

  assert.deepEqual(result, {
    kind: 'exhausted',
    reason: 'device-unavailable',
    attempts: [{ contentType: 'audio/mpeg', result: 'unavailable', retry: false }],
  });
  assert.equal(ha.callsTo('media_player.play_media').length, 0);
});

test('empty candidate list is rejected', async () => {
  const { negotiator } = setup([]);

  await assert.rejects(negotiator.negotiate(params({ candidates: [] })), /no content type candidates/);
});

test('winning candidate ends negotiation', async () => {
  const { ha, negotiator } = setup([{ error: 'Unsupported media type' }, 'ignore', 'ok']);

  const result = await negotiator.negotiate(params({ candidates: ['audio/mpeg', 'audio/mp3', 'music', 'audio'] }));

  assert.equal(result.kind, 'delivered');
  if (result.kind === 'delivered') {
    assert.equal(result.contentType, 'music');
    assert.equal(result.candidateIndex, 2);
  }
  assert.deepEqual(
    ha.callsTo('media_player.play_media').map((call) => call.params.media_content_type),
    ['audio/mpeg', 'audio/mp3', 'music'],
  );
});
