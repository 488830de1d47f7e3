import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import { test } from 'node:test';
import type { RecorderFactory, RecorderOptions, RecorderProcess } from '../src/audio/captureService';
import type { AudioCaptureError } from '../src/audio/types';
import type { AppConfiguration } from '../src/config/appConfig';
import { setTestEnv } from './testEnv';

setTestEnv();

class FakeRecorder implements RecorderProcess {
  public readonly output = new PassThrough();
  public stopped = false;
  private exitListener?: (code: number | null, error?: Error) => void;

  public stop(): void {
    this.stopped = true;
  }

  public onExit(listener: (code: number | null, error?: Error) => void): void {
    this.exitListener = listener;
  }

  public exit(code: number | null, error?: Error): void {
    this.exitListener?.(code, error);
  }
}

class FakeRecorderFactory implements RecorderFactory {
  public available = true;
  public failStart = false;
  public readonly started: Array<{ options: RecorderOptions; recorder: FakeRecorder }> = [];

  public async probe(): Promise<boolean> {
    return this.available;
  }

  public start(options: RecorderOptions): RecorderProcess {
    if (this.failStart) throw new Error('spawn sox ENOENT');
    const recorder = new FakeRecorder();
    this.started.push({ options, recorder });
    return recorder;
  }

  public get last(): FakeRecorder {
    const entry = this.started[this.started.length - 1];
    assert.ok(entry, 'no recorder started');
    return entry.recorder;
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

async function makeService(overrides: Partial<AppConfiguration> = {}) {
  const { StreamAudioCaptureService } = await import('../src/audio/captureService');
  const { defaultConfiguration } = await import('../src/config/appConfig');
  const config: AppConfiguration = { ...defaultConfiguration(), ...overrides };
  const factory = new FakeRecorderFactory();
  const disconnects: AudioCaptureError[] = [];
  const service = new StreamAudioCaptureService({
    recorder: factory,
    getConfiguration: () => config,
    sampleRate: 16000,
    onDeviceDisconnected: (error) => disconnects.push(error),
  });
  return { service, factory, disconnects };
}

test('recording collects recorder output until stopped', async () => {
  const { service, factory } = await makeService({ inputDeviceUID: 'hw:1' });

  service.startRecording();
  assert.equal(service.isRecording, true);
  assert.deepEqual(factory.started[0]?.options, { sampleRate: 16000, deviceId: 'hw:1' });

  factory.last.output.write(Buffer.from([1, 2]));
  factory.last.output.write(Buffer.from([3, 4, 5]));
  await flush();

  const audio = service.stopRecording();
  assert.equal(service.isRecording, false);
  assert.equal(factory.last.stopped, true);
  assert.equal(audio.sampleRate, 16000);
  // The odd trailing byte is dropped.
  assert.deepEqual([...audio.data], [1, 2, 3, 4]);
});

test('starting twice throws already_recording', async () => {
  const { service } = await makeService();
  service.startRecording();

  assert.throws(
    () => service.startRecording(),
    (error: unknown) => error instanceof Error && error.name === 'AudioCaptureError' && error.message === 'Already recording',
  );
  service.stopRecording();
});

test('a recorder that cannot start is an engine failure', async () => {
  const { AudioCaptureError } = await import('../src/audio/types');
  const { service, factory } = await makeService();
  factory.failStart = true;

  assert.throws(
    () => service.startRecording(),
    (error: unknown) => error instanceof AudioCaptureError && error.code === 'engine_creation_failed',
  );
  assert.equal(service.isRecording, false);
});

test('stopping when idle returns the empty capture', async () => {
  const { EMPTY_CAPTURED_AUDIO } = await import('../src/audio/types');
  const { service } = await makeService();

  assert.equal(service.stopRecording(), EMPTY_CAPTURED_AUDIO);
});

test('output from a previous recording does not leak into the next', async () => {
  const { service, factory } = await makeService();

  service.startRecording();
  const first = factory.last;
  service.stopRecording();

  service.startRecording();
  first.output.write(Buffer.from([9, 9]));
  factory.last.output.write(Buffer.from([1, 0]));
  await flush();

  assert.deepEqual([...service.stopRecording().data], [1, 0]);
});

test('recorder failure while recording reports a disconnected device', async () => {
  const { service, factory, disconnects } = await makeService();

  service.startRecording();
  factory.last.exit(1, new Error('device busy'));

  assert.equal(disconnects.length, 1);
  assert.equal(disconnects[0]?.code, 'device_disconnected');
  assert.equal(disconnects[0]?.message, 'Audio device disconnected');
  service.stopRecording();
});

test('a clean exit after stop is not a disconnect', async () => {
  const { service, factory, disconnects } = await makeService();

  service.startRecording();
  service.stopRecording();
  factory.last.exit(1, new Error('killed'));

  assert.equal(disconnects.length, 0);
});

test('audio level follows the latest chunk', async () => {
  const { service, factory } = await makeService();

  service.startRecording();
  const loud = Buffer.alloc(4);
  loud.writeInt16LE(32767, 0);
  loud.writeInt16LE(-32767, 2);
  factory.last.output.write(loud);
  await new Promise((resolve) => setTimeout(resolve, 120));

  assert.equal(service.audioLevel, 1);
  service.stopRecording();
  assert.equal(service.audioLevel, 0);
});

test('microphone access mirrors the recorder probe', async () => {
  const { service, factory } = await makeService();
  assert.equal(await service.requestMicrophoneAccess(), true);

  factory.available = false;
  assert.equal(await service.requestMicrophoneAccess(), false);
});
