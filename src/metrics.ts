import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * IMPORTANT NOTE:
 * prom-client Histogram.startTimer() measures SECONDS.
 * This module records TRUE milliseconds to match *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'dictation_runtime_';

// Pipeline stage duration in milliseconds (capture/process/transcribe/etc.)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Stage duration in milliseconds (process/transcribe/etc.)',
  labelNames: ['stage'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const transcriptionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}transcriptions_total`,
  help: 'Transcription requests by source and outcome',
  labelNames: ['source', 'outcome'] as const,
  registers: [register],
});

const transcriptionRetriesTotal = new client.Counter({
  name: `${METRICS_PREFIX}transcription_retries_total`,
  help: 'Transcription attempts that were retried',
  labelNames: ['source'] as const,
  registers: [register],
});

const recordingDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}recording_duration_seconds`,
  help: 'Recording duration in seconds',
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

const dictationOutcomesTotal = new client.Counter({
  name: `${METRICS_PREFIX}dictation_outcomes_total`,
  help: 'Dictation results (success/no_speech/error/cancelled)',
  labelNames: ['outcome'] as const,
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// ---------- stage timing API ----------

/**
 * Starts a stage timer and returns an end() function.
 * Records TRUE milliseconds in stageDurationMs.
 */
export function startStageTimer(stage: string): () => void {
  const start = nowNs();

  return () => {
    try {
      stageDurationMs.observe({ stage }, nsToMs(nowNs() - start));
    } catch {
      // swallow
    }
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function incTranscription(source: string, outcome: 'ok' | 'error'): void {
  transcriptionsTotal.inc({ source, outcome });
}

export function incTranscriptionRetry(source: string): void {
  transcriptionRetriesTotal.inc({ source });
}

export function observeRecordingDuration(seconds: number): void {
  recordingDurationSeconds.observe(seconds);
}

export function incDictationOutcome(outcome: 'success' | 'no_speech' | 'error' | 'cancelled'): void {
  dictationOutcomesTotal.inc({ outcome });
}

export async function metricsText(): Promise<string> {
  return register.metrics();
}
