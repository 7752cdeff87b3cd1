import assert from 'node:assert/strict';
import { test } from './testHarness';
import { classifyDevice, DeviceCapabilityClassifier } from '../src/application/announcements/deviceClassifier';
import { TargetExpander } from '../src/application/announcements/targetExpander';
import { FakeHomeAssistant } from './fakes/homeAssistant';
import { createRecordingLogger } from './fakes/logger';

const RULES = { namePatterns: ['sonos'], integrations: ['sonos', 'heos'] };

test('classifier flags devices by id or friendly name', () => {
  assert.equal(classifyDevice('media_player.sonos_kitchen', {}, RULES).isQuirky, true);
  assert.equal(classifyDevice('media_player.kitchen', { friendly_name: 'Kitchen SONOS' }, RULES).isQuirky, true);
  assert.equal(classifyDevice('media_player.kitchen', { friendly_name: 'Kitchen' }, RULES).isQuirky, false);
});

test('classifier flags devices by integration tags and player groups', () => {
  assert.equal(classifyDevice('media_player.a', { platform: 'HEOS' }, RULES).isQuirky, true);
  assert.equal(classifyDevice('media_player.a', { device_class: 'sonos' }, RULES).isQuirky, true);
  assert.equal(classifyDevice('media_player.a', { group_members: ['media_player.b'] }, RULES).isQuirky, true);
  assert.equal(classifyDevice('media_player.a', { group_members: [] }, RULES).isQuirky, false);
  assert.equal(classifyDevice('media_player.a', null, RULES).isQuirky, false);
});

test('classifier reads the current rules on every call', () => {
  let rules = RULES;
  const classifier = new DeviceCapabilityClassifier(() => rules);
  assert.equal(classifier.classify('media_player.bose', {}).isQuirky, false);
  rules = { namePatterns: ['bose'], integrations: [] };
  assert.equal(classifier.classify('media_player.bose', {}).isQuirky, true);
});

test('expander returns a plain device as itself', async () => {
  const ha = new FakeHomeAssistant().addDevice('media_player.kitchen');
  const expander = new TargetExpander(ha, createRecordingLogger().log);

  assert.deepEqual(await expander.expand(' media_player.kitchen '), ['media_player.kitchen']);
  assert.deepEqual(await expander.expand('media_player.unknown'), ['media_player.unknown']);
  assert.deepEqual(await expander.expand('   '), []);
});

test('expander flattens nested groups without duplicates', async () => {
  const ha = new FakeHomeAssistant()
    .addGroup('group.house', ['group.upstairs', 'media_player.x'])
    .addGroup('group.upstairs', ['media_player.x', 'media_player.y'])
    .addDevice('media_player.x')
    .addDevice('media_player.y');
  const expander = new TargetExpander(ha, createRecordingLogger().log);

  assert.deepEqual(await expander.expand('group.house'), ['media_player.x', 'media_player.y']);
});

test('expander survives group cycles', async () => {
  const ha = new FakeHomeAssistant()
    .addGroup('group.loop_a', ['group.loop_b', 'media_player.z'])
    .addGroup('group.loop_b', ['group.loop_a'])
    .addDevice('media_player.z');
  const expander = new TargetExpander(ha, createRecordingLogger().log);

  assert.deepEqual(await expander.expand('group.loop_a'), ['media_player.z']);
});

test('expander leaves player-side group members alone', async () => {
  const ha = new FakeHomeAssistant().addDevice('media_player.sonos_coordinator', {
    attributes: { group_members: ['media_player.sonos_coordinator', 'media_player.sonos_bath'] },
  });
  const expander = new TargetExpander(ha, createRecordingLogger().log);

  assert.deepEqual(await expander.expand('media_player.sonos_coordinator'), ['media_player.sonos_coordinator']);
});
