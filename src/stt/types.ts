import type { TranscriptionMode } from '../config/appConfig';

export type TranscriptionSource = TranscriptionMode;

export interface TranscriptionResult {
  text: string;
  confidence?: number;
  language?: string;
  /** Audio duration in seconds, when the backend reports it. */
  duration?: number;
  source?: TranscriptionSource;
  model?: string;
  metadata?: Record<string, unknown>;
}

export function createTranscriptionResult(
  text: string,
  extras: Omit<TranscriptionResult, 'text'> = {},
): TranscriptionResult {
  return { text, ...extras };
}

export interface TranscriptionService {
  transcribe(audio: Buffer): Promise<TranscriptionResult>;
}

/** Supplies the vocabulary hint sent with each request; empty means none. */
export interface PromptSource {
  buildPrompt(): string;
}
