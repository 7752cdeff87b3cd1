import assert from 'node:assert/strict';
import { test } from './testHarness';
import { stopWithTimeout } from '../src/runtime/stopWithTimeout';
import { createRecordingLogger } from './fakes/logger';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test('stopWithTimeout logs stopped on clean shutdown', async () => {
  const { log, entries } = createRecordingLogger();
  const result = await stopWithTimeout('http', async () => {
    await delay(5);
  }, 50, log);

  assert.equal(result.kind, 'stopped');
  assert.deepEqual(entries, [{ level: 'info', message: 'service http stopped', context: undefined }]);
});

test('stopWithTimeout reports a late failure after the timeout', async () => {
  const { log, entries } = createRecordingLogger();
  const result = await stopWithTimeout('restorations', async () => {
    await delay(30);
    throw new Error('still busy');
  }, 5, log);

  assert.equal(result.kind, 'timeout');
  await delay(40);

  assert.deepEqual(
    entries.map((entry) => [entry.level, entry.message, entry.context]),
    [
      ['warn', 'service restorations stop timed out', { timeoutMs: 5 }],
      ['error', 'failed to stop restorations', { message: 'still busy' }],
    ],
  );
});

test('stopWithTimeout logs errors on failure', async () => {
  const { log, entries } = createRecordingLogger();
  const result = await stopWithTimeout('http', async () => {
    throw new Error('boom');
  }, 50, log);

  assert.equal(result.kind, 'error');
  assert.deepEqual(entries, [{ level: 'error', message: 'failed to stop http', context: { message: 'boom' } }]);
});
