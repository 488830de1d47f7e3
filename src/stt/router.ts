import type { AppConfiguration, TranscriptionMode } from '../config/appConfig';
import { log } from '../log';
import type { TranscriptionResult, TranscriptionService } from './types';

/** What the router needs from the local backend beyond transcribing. */
export interface LocalTranscriptionBackend extends TranscriptionService {
  readonly isConfigured: boolean;
  probe(): Promise<boolean>;
}

export interface TranscriptionRouterOptions {
  apiService: TranscriptionService;
  localService: LocalTranscriptionBackend;
  getConfiguration: () => AppConfiguration;
}

/**
 * Picks the API or local backend per call from the current configuration, so
 * a mode change applies to the next transcription without a restart.
 */
export class TranscriptionRouter implements TranscriptionService {
  private readonly apiService: TranscriptionService;
  private readonly localService: LocalTranscriptionBackend;
  private readonly getConfiguration: () => AppConfiguration;

  constructor(options: TranscriptionRouterOptions) {
    this.apiService = options.apiService;
    this.localService = options.localService;
    this.getConfiguration = options.getConfiguration;
  }

  public get currentMode(): TranscriptionMode {
    return this.getConfiguration().transcriptionMode;
  }

  public async transcribe(audio: Buffer): Promise<TranscriptionResult> {
    const mode = this.currentMode;

    switch (mode) {
      case 'api':
        log.debug({ event: 'stt_route', mode }, 'routing transcription to OpenAI API');
        return this.apiService.transcribe(audio);
      case 'local':
        log.debug({ event: 'stt_route', mode }, 'routing transcription to local model');
        return this.localService.transcribe(audio);
    }
  }

  public async isLocalAvailable(): Promise<boolean> {
    if (!this.localService.isConfigured) return false;
    return this.localService.probe();
  }
}
