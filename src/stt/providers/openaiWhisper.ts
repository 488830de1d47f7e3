import { Blob } from 'buffer';
import { FormData } from 'undici';
import { z } from 'zod';

import type { AppConfiguration } from '../../config/appConfig';
import type { CredentialStore } from '../../credentials/types';
import { log } from '../../log';
import { incStageError, incTranscription, incTranscriptionRetry, startStageTimer } from '../../metrics';
import { TranscriptionError, isTranscriptionError } from '../errors';
import { defaultFetch, fetchWithTimeout, safeReadText, sleep, truncateForLog, type FetchFn } from '../http';
import type { PromptSource, TranscriptionResult, TranscriptionService } from '../types';

const MAX_ATTEMPTS = 3;
const RETRY_DELAY_MS = 500;
const RATE_LIMIT_BACKOFF_MS = 2000;

const WhisperResponseSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  duration: z.number().optional(),
});

const ErrorResponseSchema = z.object({
  error: z.object({ message: z.string() }),
});

export interface OpenAIWhisperServiceOptions {
  credentials: CredentialStore;
  getConfiguration: () => AppConfiguration;
  prompt?: PromptSource;
  baseUrl?: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
  sleepFn?: (ms: number) => Promise<void>;
}

function parseErrorMessage(body: string): string | undefined {
  try {
    const parsed = ErrorResponseSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.error.message : undefined;
  } catch {
    return undefined;
  }
}

/**
 * OpenAI `/audio/transcriptions` client.
 *
 * Up to three attempts. Auth and client errors fail immediately; 429 backs
 * off `attempt * 2s`; every failed attempt except the last waits 500 ms.
 */
export class OpenAIWhisperService implements TranscriptionService {
  private readonly credentials: CredentialStore;
  private readonly getConfiguration: () => AppConfiguration;
  private readonly prompt?: PromptSource;
  private readonly endpointUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: OpenAIWhisperServiceOptions) {
    this.credentials = options.credentials;
    this.getConfiguration = options.getConfiguration;
    this.prompt = options.prompt;
    this.endpointUrl = `${(options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/$/, '')}/audio/transcriptions`;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.sleep = options.sleepFn ?? sleep;
  }

  public async transcribe(audio: Buffer): Promise<TranscriptionResult> {
    const apiKey = this.credentials.getApiKey();
    if (!apiKey) {
      throw new TranscriptionError('no_api_key');
    }

    const endTimer = startStageTimer('transcribe_api');
    let lastError: unknown;

    try {
      for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
        try {
          const result = await this.performTranscription(audio, apiKey);
          incTranscription('api', 'ok');
          return result;
        } catch (error) {
          if (isTranscriptionError(error, 'no_api_key') || isTranscriptionError(error, 'api_error')) {
            throw error;
          }
          if (isTranscriptionError(error, 'rate_limited') && attempt < MAX_ATTEMPTS) {
            await this.sleep(attempt * RATE_LIMIT_BACKOFF_MS);
          }
          lastError = error;
          log.warn(
            {
              event: 'whisper_api_attempt_failed',
              attempt,
              err: error instanceof Error ? error.message : String(error),
            },
            'transcription attempt failed',
          );
        }

        if (attempt < MAX_ATTEMPTS) {
          incTranscriptionRetry('api');
          await this.sleep(RETRY_DELAY_MS);
        }
      }

      throw lastError ?? new TranscriptionError('max_retries_exceeded');
    } catch (error) {
      incTranscription('api', 'error');
      incStageError('transcribe_api');
      throw error;
    } finally {
      endTimer();
    }
  }

  private async performTranscription(audio: Buffer, apiKey: string): Promise<TranscriptionResult> {
    const config = this.getConfiguration();

    const form = new FormData();
    form.append('file', new Blob([audio], { type: 'audio/wav' }), 'audio.wav');
    form.append('model', config.whisperModel);
    if (config.language) {
      form.append('language', config.language);
    }
    form.append('response_format', 'verbose_json');

    const prompt = this.prompt?.buildPrompt() ?? '';
    if (prompt !== '') {
      form.append('prompt', prompt);
      log.debug({ event: 'whisper_api_prompt_included' }, 'including dictionary prompt in transcription request');
    }

    log.debug(
      { event: 'whisper_api_request', bytes: audio.length, model: config.whisperModel },
      'sending transcription request',
    );

    const response = await fetchWithTimeout(
      this.fetchFn,
      this.endpointUrl,
      {
        method: 'POST',
        headers: { Authorization: `Bearer ${apiKey}` },
        body: form,
      },
      this.timeoutMs,
    );

    const body = await safeReadText(response);
    const status = response.status;

    if (status === 200) {
      return this.parseResponse(body, config.whisperModel);
    }
    if (status === 401) {
      throw new TranscriptionError('api_error', 'Invalid API key', { status });
    }
    if (status === 429) {
      throw new TranscriptionError('rate_limited', undefined, { status });
    }
    if (status >= 400 && status < 500) {
      throw new TranscriptionError('api_error', parseErrorMessage(body) ?? 'Client error', { status });
    }

    log.error(
      { event: 'whisper_api_error', status, body_preview: truncateForLog(body) },
      'transcription request failed',
    );
    if (status >= 500 && status < 600) {
      throw new TranscriptionError('network_error', `Server error (status ${status})`, { status });
    }
    throw new TranscriptionError('network_error', `Unexpected status code: ${status}`, { status });
  }

  private parseResponse(body: string, model: string): TranscriptionResult {
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      log.error({ event: 'whisper_api_parse_failed', err: error }, 'failed to parse transcription response');
      throw new TranscriptionError('invalid_response', undefined, { cause: error });
    }

    const parsed = WhisperResponseSchema.safeParse(data);
    if (!parsed.success) {
      log.error(
        { event: 'whisper_api_parse_failed', issues: parsed.error.issues.map((i) => i.message) },
        'failed to parse transcription response',
      );
      throw new TranscriptionError('invalid_response');
    }

    log.info({ event: 'whisper_api_success', characters: parsed.data.text.length }, 'transcription successful');
    return {
      text: parsed.data.text,
      language: parsed.data.language,
      duration: parsed.data.duration,
      source: 'api',
      model,
    };
  }
}
