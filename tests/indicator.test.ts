import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import { test } from 'node:test';
import type { IndicatorState } from '../src/dictation/indicator';
import { setTestEnv } from './testEnv';

setTestEnv();

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test('transient states fall back to idle', async () => {
  const { IndicatorStateManager } = await import('../src/dictation/indicator');
  const indicator = new IndicatorStateManager(10);
  const seen: string[] = [];
  indicator.onChange((state) => seen.push(state.kind));

  indicator.showSuccess();
  assert.deepEqual(indicator.state, { kind: 'success' });
  await wait(40);

  assert.deepEqual(indicator.state, { kind: 'idle' });
  assert.deepEqual(seen, ['success', 'idle']);
});

test('a newer transient state restarts the hide timer', async () => {
  const { IndicatorStateManager } = await import('../src/dictation/indicator');
  const indicator = new IndicatorStateManager(40);

  indicator.showNoSpeech();
  await wait(25);
  indicator.showError('Network error: offline');
  await wait(25);

  assert.deepEqual(indicator.state, { kind: 'error', message: 'Network error: offline' });
  await wait(40);
  assert.deepEqual(indicator.state, { kind: 'idle' });
});

test('permission required persists until cleared', async () => {
  const { IndicatorStateManager } = await import('../src/dictation/indicator');
  const indicator = new IndicatorStateManager(10);

  indicator.showSuccess();
  indicator.showPermissionRequired();
  await wait(30);
  assert.deepEqual(indicator.state, { kind: 'permission_required' });

  indicator.clearPermissionRequired();
  assert.deepEqual(indicator.state, { kind: 'idle' });

  indicator.setState({ kind: 'recording' });
  indicator.clearPermissionRequired();
  assert.deepEqual(indicator.state, { kind: 'recording' });
});

test('repeating a state notifies once, except for errors', async () => {
  const { IndicatorStateManager } = await import('../src/dictation/indicator');
  const indicator = new IndicatorStateManager(1000);
  const seen: IndicatorState[] = [];
  const unsubscribe = indicator.onChange((state) => seen.push(state));

  indicator.setState({ kind: 'recording' });
  indicator.setState({ kind: 'recording' });
  indicator.showError('first');
  indicator.showError('second');
  unsubscribe();
  indicator.setState({ kind: 'idle' });
  indicator.dispose();

  assert.deepEqual(seen, [
    { kind: 'recording' },
    { kind: 'error', message: 'first' },
    { kind: 'error', message: 'second' },
  ]);
});

test('transient and persistent helpers classify states', async () => {
  const { isPersistentState, isTransientState } = await import('../src/dictation/indicator');

  assert.equal(isTransientState({ kind: 'no_speech' }), true);
  assert.equal(isTransientState({ kind: 'warning' }), false);
  assert.equal(isPersistentState({ kind: 'permission_required' }), true);
  assert.equal(isPersistentState({ kind: 'error', message: 'x' }), false);
});

test('stdout output writes one line per dictation', async () => {
  const { StdoutTextOutput } = await import('../src/dictation/textOutput');
  const stream = new PassThrough();
  const output = new StdoutTextOutput(stream);

  output.insert('first take');
  output.insert('second');
  stream.end();

  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(Buffer.from(chunk));
  assert.equal(Buffer.concat(chunks).toString('utf8'), 'first take\nsecond\n');
});

test('stripPunctuation removes unicode punctuation only', async () => {
  const { stripPunctuation } = await import('../src/dictation/punctuation');

  assert.equal(stripPunctuation('Hello, world! Isn’t it «nice»?'), 'Hello world Isnt it nice');
  assert.equal(stripPunctuation('cost: $5 + 3% = ok'), 'cost $5 + 3 = ok');
});
