export * from './audio/types';
export { AudioProcessor, type AudioProcessorOptions } from './audio/audioProcessor';
export {
  SoxRecorderFactory,
  StreamAudioCaptureService,
  type RecorderFactory,
  type RecorderOptions,
  type RecorderProcess,
  type StreamAudioCaptureOptions,
} from './audio/captureService';
export { NoiseGate } from './audio/noiseGate';
export { VoiceActivityDetector } from './audio/voiceActivityDetector';
export { encodeWav, floatToPcm16, pcm16ToFloat } from './audio/pcm';

export {
  AppConfigurationSchema,
  ConfigurationManager,
  decodeConfiguration,
  defaultConfiguration,
  type AppConfiguration,
  type TranscriptionMode,
} from './config/appConfig';

export type { CredentialStore } from './credentials/types';
export { FileCredentialStore } from './credentials/fileCredentialStore';

export * from './stt/types';
export { TranscriptionError, isTranscriptionError, type TranscriptionErrorKind } from './stt/errors';
export { OpenAIWhisperService } from './stt/providers/openaiWhisper';
export { LocalWhisperService } from './stt/providers/localWhisper';
export { TranscriptionRouter, type LocalTranscriptionBackend } from './stt/router';

export * from './dictionary/types';
export { DictionaryManager } from './dictionary/manager';
export { DictionaryStore } from './dictionary/storage';

export * from './history/types';
export { HistoryStore } from './history/storage';
export { HistorySearcher } from './history/searcher';

export { IndicatorStateManager, type IndicatorState } from './dictation/indicator';
export { DictationSession, type DictationSessionConfig } from './dictation/session';
export { StdoutTextOutput, type TextOutput } from './dictation/textOutput';
export { stripPunctuation } from './dictation/punctuation';

export { createDictationRuntime, type DictationRuntime, type RuntimeOverrides } from './container';
