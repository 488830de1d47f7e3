const INT16_MAX = 32767;
const WAV_HEADER_BYTES = 44;

/** PCM16LE bytes to float samples in [-1, 1]. A trailing odd byte is ignored. */
export function pcm16ToFloat(pcm: Buffer): Float32Array {
  const sampleCount = Math.floor(pcm.length / 2);
  const samples = new Float32Array(sampleCount);
  for (let i = 0; i < sampleCount; i += 1) {
    samples[i] = pcm.readInt16LE(i * 2) / INT16_MAX;
  }
  return samples;
}

export function floatToPcm16(samples: Float32Array): Buffer {
  const output = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i += 1) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    output.writeInt16LE(Math.trunc(clamped * INT16_MAX), i * 2);
  }
  return output;
}

function wavHeader(pcmDataBytes: number, sampleRate: number, channels: number): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcmDataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcmDataBytes, 40);
  return header;
}

export function encodeWav(pcm16le: Buffer, sampleRate: number): Buffer {
  return Buffer.concat([wavHeader(pcm16le.length, sampleRate, 1), pcm16le]);
}

/** RMS of a float frame in dBFS, floored at `floor`. */
export function rmsDb(samples: ArrayLike<number>, start = 0, end = samples.length, floor = 1e-10): number {
  const count = end - start;
  if (count <= 0) return 20 * Math.log10(floor);
  let sum = 0;
  for (let i = start; i < end; i += 1) {
    const s = samples[i];
    sum += s * s;
  }
  const rms = Math.sqrt(sum / count);
  return 20 * Math.log10(Math.max(rms, floor));
}

/** Level meter value: -60 dB maps to 0, 0 dB maps to 1. */
export function levelFromPcm16(pcm: Buffer): number {
  const samples = pcm16ToFloat(pcm);
  if (samples.length === 0) return 0;
  const db = rmsDb(samples, 0, samples.length, 0.00001);
  return Math.max(0, Math.min(1, (db + 60) / 60));
}
