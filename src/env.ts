import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true' || normalized === '1') {
      return true;
    }
    if (normalized === 'false' || normalized === '0') {
      return false;
    }
  }
  return value;
};

const DEFAULT_DATA_DIR = path.join(os.homedir(), '.dictation-runtime');

const EnvSchema = z.object({
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  DATA_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default(DEFAULT_DATA_DIR)),
  OPENAI_API_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('https://api.openai.com/v1'),
  ),
  OPENAI_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30000),
  ),
  OPENAI_API_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  LOCAL_WHISPER_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  LOCAL_WHISPER_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(60000),
  ),
  RECORDER_COMMAND: z.preprocess(emptyToUndefined, z.string().min(1).default('sox')),
  CAPTURE_SAMPLE_RATE: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(44100),
  ),
  AUDIO_DEBUG_DIR: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  INDICATOR_TRANSIENT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().nonnegative().default(2500),
  ),
  LOG_METRICS_ON_EXIT: z.preprocess(stringToBoolean, z.boolean().default(false)),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
