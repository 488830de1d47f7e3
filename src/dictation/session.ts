import type { AppConfiguration } from '../config/appConfig';
import type { AudioCaptureService, AudioProcessing, CapturedAudio } from '../audio/types';
import { createTranscriptionRecord, type HistoryStorage } from '../history/types';
import { log } from '../log';
import { incDictationOutcome, incStageError, observeRecordingDuration, startStageTimer } from '../metrics';
import type { TranscriptionResult, TranscriptionService } from '../stt/types';
import type { IndicatorStateManager } from './indicator';
import { stripPunctuation } from './punctuation';
import type { TextOutput } from './textOutput';

export interface DictationSessionConfig {
  capture: AudioCaptureService;
  processor: AudioProcessing;
  transcription: TranscriptionService;
  output: TextOutput;
  history: HistoryStorage;
  indicator: IndicatorStateManager;
  getConfiguration: () => AppConfiguration;
  /** Millisecond clock used for recording durations. */
  now?: () => number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Push-to-talk control: `press()` and `release()` bracket a recording, with a
 * minimum hold before recording starts and a grace period of the same length
 * after release. `interrupt()` abandons the take, as when another key is hit.
 */
export class DictationSession {
  private readonly capture: AudioCaptureService;
  private readonly processor: AudioProcessing;
  private readonly transcription: TranscriptionService;
  private readonly output: TextOutput;
  private readonly history: HistoryStorage;
  private readonly indicator: IndicatorStateManager;
  private readonly getConfiguration: () => AppConfiguration;
  private readonly now: () => number;

  private holdTimer?: NodeJS.Timeout;
  private graceTimer?: NodeJS.Timeout;
  private warningTimer?: NodeJS.Timeout;
  private maxDurationTimer?: NodeJS.Timeout;

  private recording = false;
  private processing = false;
  private inGracePeriod = false;
  private recordingStartedAt?: number;
  /** The take that owns `processing`; older takes may still be saving to history. */
  private currentTake: Promise<void> | null = null;
  private readonly takes = new Set<Promise<void>>();

  constructor(config: DictationSessionConfig) {
    this.capture = config.capture;
    this.processor = config.processor;
    this.transcription = config.transcription;
    this.output = config.output;
    this.history = config.history;
    this.indicator = config.indicator;
    this.getConfiguration = config.getConfiguration;
    this.now = config.now ?? Date.now;
  }

  public get isRecording(): boolean {
    return this.recording;
  }

  public get isProcessing(): boolean {
    return this.processing;
  }

  public get isInGracePeriod(): boolean {
    return this.inGracePeriod;
  }

  public get isHolding(): boolean {
    return this.holdTimer !== undefined;
  }

  /**
   * Asks for microphone access; shows the permission-required state when it
   * is refused.
   */
  public async prepare(): Promise<boolean> {
    const granted = await this.capture.requestMicrophoneAccess();
    if (granted) {
      this.indicator.clearPermissionRequired();
    } else {
      log.warn({ event: 'microphone_access_denied' }, 'microphone access not available');
      this.indicator.showPermissionRequired();
    }
    return granted;
  }

  public press(): void {
    // Re-press during the grace period keeps the take going.
    if (this.inGracePeriod) {
      this.clearGraceTimer();
      log.debug({ event: 'dictation_grace_resumed' }, 'trigger re-pressed during grace period, continuing recording');
      return;
    }

    if (this.processing) {
      log.debug({ event: 'dictation_press_ignored', reason: 'processing' }, 'ignoring press, processing in progress');
      return;
    }

    if (this.recording || this.holdTimer) {
      log.debug({ event: 'dictation_press_ignored', reason: 'recording' }, 'ignoring press, already recording');
      return;
    }

    const holdMs = this.getConfiguration().minimumHoldDurationMs;
    if (holdMs === 0) {
      log.debug({ event: 'dictation_press' }, 'trigger pressed, instant recording');
      this.startRecording();
      return;
    }

    log.debug({ event: 'dictation_press', hold_ms: holdMs }, 'trigger pressed, starting hold timer');
    this.holdTimer = setTimeout(() => {
      this.holdTimer = undefined;
      this.startRecording();
    }, holdMs);
  }

  public release(): void {
    this.clearHoldTimer();

    if (this.recording && !this.inGracePeriod) {
      this.startGracePeriod();
    } else if (!this.recording && !this.inGracePeriod) {
      log.debug({ event: 'dictation_tap' }, 'trigger released before recording started');
    }
  }

  public interrupt(): void {
    if (this.holdTimer || this.recording || this.inGracePeriod) {
      log.info({ event: 'dictation_interrupted' }, 'recording cancelled, another key was pressed');
      this.cancel();
    }
  }

  public cancel(): void {
    this.clearHoldTimer();
    this.clearRecordingTimers();
    this.clearGraceTimer();

    if (this.recording) {
      this.capture.stopRecording();
      this.recording = false;
      this.recordingStartedAt = undefined;
      incDictationOutcome('cancelled');
      log.info({ event: 'dictation_cancelled' }, 'recording cancelled');
    }

    if (!this.processing) {
      this.indicator.setState({ kind: 'idle' });
    }
  }

  /**
   * The audio device went away mid-take: the recording is dropped and the
   * indicator shows the error.
   */
  public handleDeviceLost(error: Error): void {
    this.clearHoldTimer();
    this.clearRecordingTimers();
    this.clearGraceTimer();

    if (!this.recording) return;

    this.capture.stopRecording();
    this.recording = false;
    this.recordingStartedAt = undefined;
    incStageError('capture');
    incDictationOutcome('error');
    log.error({ event: 'recording_device_lost', err: error }, 'recording dropped, audio device lost');
    this.indicator.showError(error.message);
  }

  /** Resolves once every take in flight has been processed and saved. */
  public async whenIdle(): Promise<void> {
    while (this.takes.size > 0) {
      await Promise.all(this.takes);
    }
  }

  public async dispose(): Promise<void> {
    this.cancel();
    await this.whenIdle();
  }

  private startGracePeriod(): void {
    const graceMs = this.getConfiguration().minimumHoldDurationMs;
    log.debug({ event: 'dictation_grace_start', grace_ms: graceMs }, 'trigger released, starting grace period');
    this.inGracePeriod = true;
    this.graceTimer = setTimeout(() => {
      this.graceTimer = undefined;
      this.inGracePeriod = false;
      log.debug({ event: 'dictation_grace_end' }, 'grace period ended, stopping recording');
      this.stopRecording();
    }, graceMs);
  }

  private startRecording(): void {
    try {
      this.capture.startRecording();
    } catch (error) {
      incStageError('capture');
      log.error({ event: 'recording_start_failed', err: error }, 'failed to start recording');
      this.indicator.showError('Failed to start recording');
      return;
    }

    this.recording = true;
    this.recordingStartedAt = this.now();
    this.indicator.setState({ kind: 'recording' });
    log.info({ event: 'recording_started' }, 'recording started');

    const config = this.getConfiguration();
    this.warningTimer = setTimeout(() => {
      this.warningTimer = undefined;
      this.indicator.setState({ kind: 'warning' });
      log.info({ event: 'recording_time_warning' }, 'recording approaching time limit');
    }, config.warningDurationSeconds * 1000);
    this.maxDurationTimer = setTimeout(() => {
      this.maxDurationTimer = undefined;
      log.info(
        { event: 'recording_max_duration', max_seconds: config.maxRecordingDurationSeconds },
        'maximum recording duration reached',
      );
      this.stopRecording();
    }, config.maxRecordingDurationSeconds * 1000);
  }

  private stopRecording(): void {
    this.clearRecordingTimers();
    this.clearGraceTimer();

    if (!this.recording) return;

    const startedAt = this.recordingStartedAt ?? this.now();
    const durationSeconds = Math.max(0, this.now() - startedAt) / 1000;
    const captured = this.capture.stopRecording();
    this.recording = false;
    this.recordingStartedAt = undefined;
    observeRecordingDuration(durationSeconds);

    log.info(
      { event: 'recording_stopped', duration_s: Number(durationSeconds.toFixed(1)), bytes: captured.data.length },
      'recording stopped',
    );

    this.processing = true;
    this.indicator.setState({ kind: 'processing' });
    const take: Promise<void> = this.processAudio(captured, durationSeconds).finally(() => {
      this.takes.delete(take);
      if (this.currentTake === take) {
        this.processing = false;
        this.currentTake = null;
      }
    });
    this.currentTake = take;
    this.takes.add(take);
  }

  private async processAudio(captured: CapturedAudio, durationSeconds: number): Promise<void> {
    const config = this.getConfiguration();

    try {
      const processed = await this.processor.process(captured);
      if (processed.isEmpty) {
        this.finishWithoutSpeech('no speech detected in recording');
        return;
      }

      const endTranscribe = startStageTimer('transcribe');
      let result: TranscriptionResult;
      try {
        result = await this.transcription.transcribe(processed.audioData);
      } finally {
        endTranscribe();
      }

      const text = config.stripPunctuation ? stripPunctuation(result.text) : result.text;
      if (text.trim() === '') {
        this.finishWithoutSpeech('transcription returned empty text');
        return;
      }

      this.output.insert(text);
      this.processing = false;
      this.indicator.showSuccess();
      incDictationOutcome('success');
      log.info(
        { event: 'dictation_complete', preview: text.slice(0, 50), source: result.source },
        'transcription complete',
      );

      await this.saveToHistory(text, durationSeconds, result);
    } catch (error) {
      incStageError('dictation');
      incDictationOutcome('error');
      log.error({ event: 'dictation_failed', err: error }, 'processing failed');
      this.processing = false;
      this.indicator.showError(errorMessage(error));
    }
  }

  private finishWithoutSpeech(message: string): void {
    this.processing = false;
    this.indicator.showNoSpeech();
    incDictationOutcome('no_speech');
    log.info({ event: 'dictation_no_speech' }, message);
  }

  private async saveToHistory(text: string, durationSeconds: number, result: TranscriptionResult): Promise<void> {
    const record = createTranscriptionRecord({
      text,
      durationMs: Math.trunc(durationSeconds * 1000),
      confidence: result.confidence,
      source: result.source,
      model: result.model,
      metadata: result.metadata,
    });

    try {
      await this.history.save(record);
    } catch (error) {
      incStageError('history');
      log.warn({ event: 'history_save_failed', err: error, record_id: record.id }, 'failed to save transcription');
    }
  }

  private clearHoldTimer(): void {
    if (this.holdTimer) clearTimeout(this.holdTimer);
    this.holdTimer = undefined;
  }

  private clearGraceTimer(): void {
    if (this.graceTimer) clearTimeout(this.graceTimer);
    this.graceTimer = undefined;
    this.inGracePeriod = false;
  }

  private clearRecordingTimers(): void {
    if (this.warningTimer) clearTimeout(this.warningTimer);
    if (this.maxDurationTimer) clearTimeout(this.maxDurationTimer);
    this.warningTimer = undefined;
    this.maxDurationTimer = undefined;
  }
}
