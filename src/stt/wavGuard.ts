import { log } from '../log';
import { TranscriptionError } from './errors';

/** `RIFF....WAVE` at the start of the buffer. */
export function isWavAudio(audio: Buffer): boolean {
  return (
    audio.length >= 12 &&
    audio.toString('ascii', 0, 4) === 'RIFF' &&
    audio.toString('ascii', 8, 12) === 'WAVE'
  );
}

/** Refuses a take whose processed audio is not a WAV file before it is uploaded. */
export function assertWavUpload(audio: Buffer, backend: string): void {
  if (isWavAudio(audio)) return;

  log.error(
    {
      event: 'transcription_audio_not_wav',
      backend,
      bytes: audio.length,
      header_hex: audio.subarray(0, 16).toString('hex'),
    },
    'processed audio is not a WAV file',
  );
  throw new TranscriptionError('invalid_audio');
}

/** Duration of a canonical 44-byte-header PCM WAV, or null when the header is not one. */
export function wavDurationSeconds(wav: Buffer): number | null {
  if (wav.length < 44 || !isWavAudio(wav)) return null;

  const channels = wav.readUInt16LE(22);
  const sampleRate = wav.readUInt32LE(24);
  const bitsPerSample = wav.readUInt16LE(34);
  const dataBytes = wav.readUInt32LE(40);
  const bytesPerSample = (bitsPerSample / 8) * channels;

  if (!sampleRate || !bytesPerSample) return null;
  const safeDataBytes = Math.min(dataBytes, Math.max(0, wav.length - 44));
  return safeDataBytes / (sampleRate * bytesPerSample);
}
