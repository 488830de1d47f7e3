import {
  createTranscriptionResult,
  type TranscriptionResult,
  type TranscriptionService,
} from '../../src/stt/types';

/** Returns `mockResult` or throws `mockError`; counts every call. */
export class MockTranscriptionService implements TranscriptionService {
  public mockResult?: TranscriptionResult;
  public mockError?: unknown;
  public transcribeCallCount = 0;
  public lastAudio?: Buffer;

  public async transcribe(audio: Buffer): Promise<TranscriptionResult> {
    this.transcribeCallCount += 1;
    this.lastAudio = audio;

    if (this.mockError !== undefined) {
      throw this.mockError;
    }

    return this.mockResult ?? createTranscriptionResult('Mock transcription');
  }
}
