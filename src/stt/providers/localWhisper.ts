// Local Whisper HTTP server (whisper.cpp server, faster-whisper wrappers, ...)
import { z } from 'zod';
import type { AppConfiguration } from '../../config/appConfig';
import { log } from '../../log';
import { incStageError, incTranscription, startStageTimer } from '../../metrics';
import { TranscriptionError } from '../errors';
import { defaultFetch, fetchWithTimeout, safeReadText, truncateForLog, type FetchFn } from '../http';
import type { TranscriptionResult, TranscriptionService } from '../types';
import { assertWavUpload, wavDurationSeconds } from '../wavGuard';

const PROBE_TIMEOUT_MS = 2000;

const ResponseMetaSchema = z.object({
  confidence: z.number().optional(),
  language: z.string().optional(),
});

export interface LocalWhisperServiceOptions {
  url?: string;
  getConfiguration: () => AppConfiguration;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

/**
 * Whisper servers vary a lot:
 * - { text: "..." }
 * - { transcription: "..." }
 * - { result: { text: "..." } }
 * - { segments: [{ text: "..." }, ...] }
 */
export function extractText(result: unknown): string {
  if (!result || typeof result !== 'object') return '';
  const record = result as Record<string, unknown>;

  if (typeof record.text === 'string') return record.text;
  if (typeof record.transcription === 'string') return record.transcription;

  const maybeResult = record.result;
  if (maybeResult && typeof maybeResult === 'object') {
    const r = maybeResult as Record<string, unknown>;
    if (typeof r.text === 'string') return r.text;
    if (typeof r.transcription === 'string') return r.transcription;
  }

  const segments = record.segments;
  if (Array.isArray(segments)) {
    const parts: string[] = [];
    for (const seg of segments) {
      if (seg && typeof seg === 'object') {
        const s = seg as Record<string, unknown>;
        if (typeof s.text === 'string' && s.text.trim() !== '') parts.push(s.text.trim());
      }
    }
    if (parts.length > 0) return parts.join(' ').trim();
  }

  return '';
}

export function buildWhisperUrl(whisperUrl: string, language?: string): string {
  if (!language) return whisperUrl;
  const separator = whisperUrl.includes('?') ? '&' : '?';
  return `${whisperUrl}${separator}language=${encodeURIComponent(language)}`;
}

function languageFor(config: AppConfiguration): string | undefined {
  const language = config.transcriptionLanguage.trim();
  return language === '' || language === 'auto' ? undefined : language;
}

export class LocalWhisperService implements TranscriptionService {
  private readonly url?: string;
  private readonly getConfiguration: () => AppConfiguration;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: LocalWhisperServiceOptions) {
    this.url = options.url;
    this.getConfiguration = options.getConfiguration;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.fetchFn = options.fetchFn ?? defaultFetch;
  }

  public get isConfigured(): boolean {
    return this.url !== undefined;
  }

  /** True when the server answers at all (any status below 500). */
  public async probe(): Promise<boolean> {
    if (!this.url) return false;
    try {
      const response = await fetchWithTimeout(this.fetchFn, this.url, { method: 'GET' }, PROBE_TIMEOUT_MS);
      await safeReadText(response);
      return response.status < 500;
    } catch (error) {
      log.debug({ event: 'local_whisper_probe_failed', err: error }, 'local whisper probe failed');
      return false;
    }
  }

  public async transcribe(audio: Buffer): Promise<TranscriptionResult> {
    if (!this.url) {
      throw new TranscriptionError('network_error', 'Local Whisper server URL is not configured');
    }

    assertWavUpload(audio, 'local');

    const config = this.getConfiguration();
    const whisperUrl = buildWhisperUrl(this.url, languageFor(config));
    const endTimer = startStageTimer('transcribe_local');

    try {
      log.info(
        { event: 'local_whisper_fetch_start', whisperUrl, bytes: audio.length },
        'sending wav to local whisper',
      );

      const response = await fetchWithTimeout(
        this.fetchFn,
        whisperUrl,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'audio/wav',
            Accept: 'application/json, text/plain;q=0.9, */*;q=0.1',
          },
          body: audio,
        },
        this.timeoutMs,
      );

      const contentType = response.headers.get('content-type') ?? '';
      const respText = await safeReadText(response);

      if (!response.ok) {
        log.error(
          { event: 'local_whisper_error', status: response.status, body_preview: truncateForLog(respText) },
          'local whisper request failed',
        );
        throw new TranscriptionError('network_error', `Local Whisper error (status ${response.status})`, {
          status: response.status,
        });
      }

      let text = respText;
      let confidence: number | undefined;
      let language: string | undefined;

      if (contentType.includes('application/json')) {
        let data: unknown;
        try {
          data = JSON.parse(respText);
        } catch (error) {
          throw new TranscriptionError('invalid_response', undefined, { cause: error });
        }
        text = extractText(data);
        const meta = ResponseMetaSchema.safeParse(data);
        if (meta.success) {
          confidence = meta.data.confidence;
          language = meta.data.language;
        }
      }

      incTranscription('local', 'ok');
      return {
        text: text.trim(),
        confidence,
        language,
        duration: wavDurationSeconds(audio) ?? undefined,
        source: 'local',
        model: config.selectedLocalModel ?? undefined,
      };
    } catch (error) {
      incTranscription('local', 'error');
      incStageError('transcribe_local');
      throw error;
    } finally {
      endTimer();
    }
  }
}
