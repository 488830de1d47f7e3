import {
  EMPTY_CAPTURED_AUDIO,
  createCapturedAudio,
  type AudioCaptureService,
  type CapturedAudio,
} from '../../src/audio/types';

export class MockAudioCaptureService implements AudioCaptureService {
  public isRecording = false;
  public audioLevel = 0;
  public microphoneAccessGranted = true;
  /** Thrown by the next `startRecording()` calls while set. */
  public startError?: Error;
  public startCallCount = 0;
  public stopCallCount = 0;

  private mockCapturedAudio?: CapturedAudio;

  public setMockAudioData(data: Buffer, sampleRate = 44100): void {
    this.mockCapturedAudio = createCapturedAudio(data, sampleRate);
  }

  public async requestMicrophoneAccess(): Promise<boolean> {
    return this.microphoneAccessGranted;
  }

  public startRecording(): void {
    this.startCallCount += 1;
    if (this.startError) throw this.startError;
    this.isRecording = true;
  }

  public stopRecording(): CapturedAudio {
    this.stopCallCount += 1;
    this.isRecording = false;
    return this.mockCapturedAudio ?? EMPTY_CAPTURED_AUDIO;
  }
}
