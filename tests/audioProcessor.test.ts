import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import type { AppConfiguration } from '../src/config/appConfig';
import { setTestEnv } from './testEnv';

setTestEnv();

function pcm(values: number[]): Buffer {
  const buf = Buffer.alloc(values.length * 2);
  values.forEach((v, i) => buf.writeInt16LE(v, i * 2));
  return buf;
}

async function makeProcessor(overrides: Partial<AppConfiguration> = {}, debugDir?: string) {
  const { AudioProcessor } = await import('../src/audio/audioProcessor');
  const { defaultConfiguration } = await import('../src/config/appConfig');
  const config: AppConfiguration = { ...defaultConfiguration(), ...overrides };
  return new AudioProcessor({ getConfiguration: () => config, debugDir });
}

test('empty capture yields the empty result', async () => {
  const { EMPTY_PROCESSED_AUDIO, createCapturedAudio } = await import('../src/audio/types');
  const processor = await makeProcessor();

  const result = await processor.process(createCapturedAudio(Buffer.alloc(0), 16000));
  assert.equal(result, EMPTY_PROCESSED_AUDIO);
  assert.equal(result.isEmpty, true);
});

test('silence is reported as empty', async () => {
  const { createCapturedAudio } = await import('../src/audio/types');
  const processor = await makeProcessor();

  const result = await processor.process(createCapturedAudio(Buffer.alloc(32000), 16000));
  assert.equal(result.isEmpty, true);
  assert.equal(result.audioData.length, 0);
});

test('bypass encodes the capture unchanged as WAV', async () => {
  const { createCapturedAudio } = await import('../src/audio/types');
  const processor = await makeProcessor({ bypassAudioProcessing: true });
  const data = pcm([0, 32767, -32767, 0]);

  const result = await processor.process(createCapturedAudio(data, 16000));
  assert.equal(result.isEmpty, false);
  assert.equal(result.mimeType, 'audio/wav');
  assert.equal(result.audioData.toString('ascii', 0, 4), 'RIFF');
  assert.equal(result.audioData.readUInt32LE(24), 16000);
  assert.deepEqual(result.audioData.subarray(44), data);
});

test('speech is cut to the padded speech segment', async () => {
  const { createCapturedAudio } = await import('../src/audio/types');
  const processor = await makeProcessor();

  // One second at 16 kHz, speech from 0.25 s to 0.75 s.
  const values = new Array<number>(16000).fill(0);
  values.fill(16384, 4000, 12000);

  const result = await processor.process(createCapturedAudio(pcm(values), 16000));
  assert.equal(result.isEmpty, false);
  // Frames 4..23 are speech; 200 ms of padding clips to [0, 12288 + 3200).
  assert.equal(result.audioData.readUInt32LE(40), 15488 * 2);
  assert.equal(result.audioData.length, 44 + 15488 * 2);
});

test('debug stages are written when a debug directory is set', async () => {
  const { createCapturedAudio } = await import('../src/audio/types');
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'audio-debug-'));
  const processor = await makeProcessor({ bypassAudioProcessing: true }, dir);

  await processor.process(createCapturedAudio(pcm([0, 32767]), 16000));

  const stages = (await fs.readdir(dir)).map((name) => name.replace(/^\d{2}-\d{2}-\d{2}_/, '')).sort();
  assert.deepEqual(stages, ['1_raw.wav', '3_final_speech_bypassed.wav']);
  await fs.rm(dir, { recursive: true, force: true });
});
