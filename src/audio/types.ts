/** Raw microphone capture: PCM16LE mono samples plus the rate they were taken at. */
export interface CapturedAudio {
  readonly data: Buffer;
  readonly sampleRate: number;
}

export const DEFAULT_CAPTURE_SAMPLE_RATE = 44100;

export const EMPTY_CAPTURED_AUDIO: CapturedAudio = Object.freeze({
  data: Buffer.alloc(0),
  sampleRate: DEFAULT_CAPTURE_SAMPLE_RATE,
});

export function createCapturedAudio(data: Buffer, sampleRate = DEFAULT_CAPTURE_SAMPLE_RATE): CapturedAudio {
  return Object.freeze({ data: Buffer.from(data), sampleRate });
}

export interface AudioCaptureService {
  readonly isRecording: boolean;
  /** Input level normalised to 0..1 (-60 dB .. 0 dB). */
  readonly audioLevel: number;
  requestMicrophoneAccess(): Promise<boolean>;
  startRecording(): void;
  stopRecording(): CapturedAudio;
}

export type AudioCaptureErrorCode = 'already_recording' | 'engine_creation_failed' | 'device_disconnected';

const CAPTURE_ERROR_MESSAGES: Record<AudioCaptureErrorCode, string> = {
  already_recording: 'Already recording',
  engine_creation_failed: 'Failed to create audio engine',
  device_disconnected: 'Audio device disconnected',
};

export class AudioCaptureError extends Error {
  public readonly code: AudioCaptureErrorCode;

  constructor(code: AudioCaptureErrorCode, options?: { cause?: unknown }) {
    super(CAPTURE_ERROR_MESSAGES[code], options);
    this.name = 'AudioCaptureError';
    this.code = code;
  }
}

export interface ProcessedAudioResult {
  readonly audioData: Buffer;
  readonly isEmpty: boolean;
  readonly mimeType: string;
}

export const EMPTY_PROCESSED_AUDIO: ProcessedAudioResult = Object.freeze({
  audioData: Buffer.alloc(0),
  isEmpty: true,
  mimeType: 'audio/wav',
});

/** Turns a raw capture into the payload sent for transcription. */
export interface AudioProcessing {
  process(captured: CapturedAudio): Promise<ProcessedAudioResult>;
}

export interface SpeechSegment {
  startSample: number;
  endSample: number;
}
