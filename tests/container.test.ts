import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { test } from 'node:test';
import type { RecorderFactory, RecorderProcess } from '../src/audio/captureService';
import { MockAudioCaptureService } from './mocks/audioCapture';
import { MockCredentialStore } from './mocks/credentialStore';
import { MockTranscriptionService } from './mocks/transcription';
import { setTestEnv } from './testEnv';

setTestEnv();

class DyingRecorder implements RecorderProcess {
  public readonly output = new PassThrough();
  private exitListener?: (code: number | null, error?: Error) => void;

  public stop(): void {}

  public onExit(listener: (code: number | null, error?: Error) => void): void {
    this.exitListener = listener;
  }

  public die(): void {
    this.exitListener?.(1, new Error('no such device'));
  }
}

class DyingRecorderFactory implements RecorderFactory {
  public readonly recorder = new DyingRecorder();

  public async probe(): Promise<boolean> {
    return true;
  }

  public start(): RecorderProcess {
    return this.recorder;
  }
}

async function settingsFor(dataDir: string) {
  const { env } = await import('../src/env');
  return { ...env, DATA_DIR: dataDir };
}

test('data files live under the data directory', async () => {
  const { dataPaths } = await import('../src/container');

  assert.deepEqual(dataPaths('/var/dictation'), {
    config: '/var/dictation/config.json',
    credentials: '/var/dictation/credentials.json',
    dictionary: '/var/dictation/dictionary.json',
    history: '/var/dictation/history.json',
  });
});

test('overrides replace the production services', async () => {
  const { createDictationRuntime } = await import('../src/container');
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dictation-runtime-'));
  const capture = new MockAudioCaptureService();
  const transcription = new MockTranscriptionService();

  const runtime = await createDictationRuntime(
    { credentials: new MockCredentialStore(), capture, transcription },
    await settingsFor(dir),
  );

  assert.equal(runtime.capture, capture);
  assert.equal(runtime.transcription, transcription);
  assert.equal(runtime.router, undefined);
  assert.equal(runtime.paths.history, path.join(dir, 'history.json'));
  await runtime.session.dispose();
});

test('without a transcription override the router serves transcription', async () => {
  const { createDictationRuntime } = await import('../src/container');
  const { TranscriptionRouter } = await import('../src/stt/router');
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dictation-runtime-'));

  const runtime = await createDictationRuntime(
    { credentials: new MockCredentialStore(), capture: new MockAudioCaptureService() },
    await settingsFor(dir),
  );

  assert.ok(runtime.router instanceof TranscriptionRouter);
  assert.equal(runtime.transcription, runtime.router);
  await runtime.session.dispose();
});

test('configuration and history survive a restart', async () => {
  const { createDictationRuntime } = await import('../src/container');
  const { createTranscriptionRecord } = await import('../src/history/types');
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dictation-runtime-'));
  const settings = await settingsFor(dir);
  const overrides = () => ({
    credentials: new MockCredentialStore(),
    capture: new MockAudioCaptureService(),
    transcription: new MockTranscriptionService(),
  });

  const first = await createDictationRuntime(overrides(), settings);
  first.configuration.update({ minimumHoldDurationMs: 0, stripPunctuation: true });
  await first.history.save(createTranscriptionRecord({ id: 'kept', text: 'remember this' }));
  await first.session.dispose();

  const second = await createDictationRuntime(overrides(), settings);
  assert.equal(second.configuration.configuration.minimumHoldDurationMs, 0);
  assert.equal(second.configuration.configuration.stripPunctuation, true);
  assert.deepEqual(
    (await second.history.fetchAll()).map((r) => r.text),
    ['remember this'],
  );
  await second.session.dispose();
});

test('a recorder that dies mid-take ends the recording with an error', async () => {
  const { createDictationRuntime } = await import('../src/container');
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dictation-runtime-'));
  const recorder = new DyingRecorderFactory();

  const runtime = await createDictationRuntime(
    { credentials: new MockCredentialStore(), recorder, transcription: new MockTranscriptionService() },
    await settingsFor(dir),
  );
  runtime.configuration.update({ minimumHoldDurationMs: 0 });

  runtime.session.press();
  assert.equal(runtime.capture.isRecording, true);
  recorder.recorder.die();

  assert.equal(runtime.session.isRecording, false);
  assert.equal(runtime.capture.isRecording, false);
  assert.deepEqual(runtime.indicator.state, { kind: 'error', message: 'Audio device disconnected' });
  await runtime.session.dispose();
  runtime.indicator.dispose();
});
