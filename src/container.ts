import path from 'path';
import { AudioProcessor } from './audio/audioProcessor';
import { SoxRecorderFactory, StreamAudioCaptureService, type RecorderFactory } from './audio/captureService';
import type { AudioCaptureService } from './audio/types';
import { ConfigurationManager } from './config/appConfig';
import { FileCredentialStore } from './credentials/fileCredentialStore';
import type { CredentialStore } from './credentials/types';
import { IndicatorStateManager } from './dictation/indicator';
import { DictationSession } from './dictation/session';
import { StdoutTextOutput, type TextOutput } from './dictation/textOutput';
import { DictionaryManager } from './dictionary/manager';
import { DictionaryStore } from './dictionary/storage';
import { env, type Env } from './env';
import { HistorySearcher } from './history/searcher';
import { HistoryStore } from './history/storage';
import { log } from './log';
import { LocalWhisperService } from './stt/providers/localWhisper';
import { OpenAIWhisperService } from './stt/providers/openaiWhisper';
import { TranscriptionRouter } from './stt/router';
import type { TranscriptionService } from './stt/types';

export interface DataPaths {
  config: string;
  credentials: string;
  dictionary: string;
  history: string;
}

export function dataPaths(dataDir: string): DataPaths {
  return {
    config: path.join(dataDir, 'config.json'),
    credentials: path.join(dataDir, 'credentials.json'),
    dictionary: path.join(dataDir, 'dictionary.json'),
    history: path.join(dataDir, 'history.json'),
  };
}

/** Replacements for the production services, used by tests and embedders. */
export interface RuntimeOverrides {
  credentials?: CredentialStore;
  capture?: AudioCaptureService;
  recorder?: RecorderFactory;
  transcription?: TranscriptionService;
  output?: TextOutput;
}

export interface DictationRuntime {
  paths: DataPaths;
  configuration: ConfigurationManager;
  credentials: CredentialStore;
  capture: AudioCaptureService;
  processor: AudioProcessor;
  dictionary: DictionaryManager;
  dictionaryStore: DictionaryStore;
  history: HistoryStore;
  historySearcher: HistorySearcher;
  transcription: TranscriptionService;
  router?: TranscriptionRouter;
  indicator: IndicatorStateManager;
  session: DictationSession;
}

/** Wires every service from the environment and the data directory. */
export async function createDictationRuntime(
  overrides: RuntimeOverrides = {},
  settings: Env = env,
): Promise<DictationRuntime> {
  const paths = dataPaths(settings.DATA_DIR);
  const configuration = new ConfigurationManager(paths.config);
  const getConfiguration = () => configuration.configuration;

  const credentials =
    overrides.credentials ??
    new FileCredentialStore({ filePath: paths.credentials, legacyApiKey: settings.OPENAI_API_KEY });
  credentials.migrateIfNeeded();

  const dictionaryStore = await DictionaryStore.open({ filePath: paths.dictionary });
  const dictionary = await DictionaryManager.create(dictionaryStore);
  const history = await HistoryStore.open({ filePath: paths.history });
  const historySearcher = new HistorySearcher(history);

  const capture =
    overrides.capture ??
    new StreamAudioCaptureService({
      recorder: overrides.recorder ?? new SoxRecorderFactory(settings.RECORDER_COMMAND),
      getConfiguration,
      sampleRate: settings.CAPTURE_SAMPLE_RATE,
      onDeviceDisconnected: (error) => {
        log.warn({ event: 'capture_device_lost', err: error }, 'audio device disconnected');
        session.handleDeviceLost(error);
      },
    });

  const processor = new AudioProcessor({ getConfiguration, debugDir: settings.AUDIO_DEBUG_DIR });

  let router: TranscriptionRouter | undefined;
  let transcription = overrides.transcription;
  if (!transcription) {
    router = new TranscriptionRouter({
      apiService: new OpenAIWhisperService({
        credentials,
        getConfiguration,
        prompt: dictionary,
        baseUrl: settings.OPENAI_API_BASE_URL,
        timeoutMs: settings.OPENAI_TIMEOUT_MS,
      }),
      localService: new LocalWhisperService({
        url: settings.LOCAL_WHISPER_URL,
        getConfiguration,
        timeoutMs: settings.LOCAL_WHISPER_TIMEOUT_MS,
      }),
      getConfiguration,
    });
    transcription = router;
  }

  const indicator = new IndicatorStateManager(settings.INDICATOR_TRANSIENT_MS);
  const session = new DictationSession({
    capture,
    processor,
    transcription,
    output: overrides.output ?? new StdoutTextOutput(),
    history,
    indicator,
    getConfiguration,
  });

  log.info(
    {
      event: 'runtime_ready',
      data_dir: settings.DATA_DIR,
      transcription_mode: configuration.configuration.transcriptionMode,
      has_api_key: credentials.hasApiKeyWithoutFetch(),
    },
    'dictation runtime ready',
  );

  return {
    paths,
    configuration,
    credentials,
    capture,
    processor,
    dictionary,
    dictionaryStore,
    history,
    historySearcher,
    transcription,
    router,
    indicator,
    session,
  };
}
