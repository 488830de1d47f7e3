import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { log } from '../log';

export const TRANSCRIPTION_MODES = ['api', 'local'] as const;
export type TranscriptionMode = (typeof TRANSCRIPTION_MODES)[number];

export const AppConfigurationSchema = z.object({
  minimumHoldDurationMs: z.number().int().nonnegative().default(300),

  inputDeviceUID: z.string().min(1).nullable().default(null),
  silenceThresholdDb: z.number().max(0).default(-40),
  noiseGateThresholdDb: z.number().max(0).default(-50),
  bypassAudioProcessing: z.boolean().default(false),

  maxRecordingDurationSeconds: z.number().int().positive().default(120),
  warningDurationSeconds: z.number().int().positive().default(60),

  whisperModel: z.string().min(1).default('whisper-1'),
  language: z.string().min(1).nullable().default(null),

  transcriptionMode: z.enum(TRANSCRIPTION_MODES).default('api'),
  selectedLocalModel: z.string().min(1).nullable().default(null),
  transcriptionLanguage: z.string().min(1).default('auto'),

  stripPunctuation: z.boolean().default(false),
});

export type AppConfiguration = z.infer<typeof AppConfigurationSchema>;

export function defaultConfiguration(): AppConfiguration {
  return AppConfigurationSchema.parse({});
}

/**
 * Field-by-field decode: a bad or missing field falls back to its default
 * instead of discarding the whole file.
 */
export function decodeConfiguration(raw: unknown): AppConfiguration {
  const defaults = defaultConfiguration();
  const input = z.record(z.string(), z.unknown()).safeParse(raw);
  if (!input.success) {
    return defaults;
  }

  const record = input.data;
  const merged: Record<string, unknown> = { ...defaults };

  for (const [key, schema] of Object.entries(AppConfigurationSchema.shape)) {
    if (!(key in record)) continue;
    const field = schema.safeParse(record[key]);
    if (field.success) {
      merged[key] = field.data;
    } else {
      log.warn(
        { event: 'config_field_invalid', field: key, issue: field.error.issues[0]?.message },
        'invalid configuration field, using default',
      );
    }
  }

  return AppConfigurationSchema.parse(merged);
}

export type ConfigurationListener = (config: AppConfiguration) => void;

/**
 * Holds the user's settings and persists every change as JSON.
 * Readers always see the latest value through `configuration`.
 */
export class ConfigurationManager {
  private current: AppConfiguration;
  private readonly listeners = new Set<ConfigurationListener>();

  constructor(private readonly filePath?: string) {
    this.current = filePath ? ConfigurationManager.load(filePath) : defaultConfiguration();
  }

  public get configuration(): AppConfiguration {
    return this.current;
  }

  public update(patch: Partial<AppConfiguration>): AppConfiguration {
    this.current = AppConfigurationSchema.parse({ ...this.current, ...patch });
    this.save();
    this.notify();
    return this.current;
  }

  public reset(): void {
    this.current = defaultConfiguration();
    this.save();
    this.notify();
    log.info({ event: 'config_reset' }, 'configuration reset to defaults');
  }

  public onChange(listener: ConfigurationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.current);
    }
  }

  private save(): void {
    if (!this.filePath) return;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, `${JSON.stringify(this.current, null, 2)}\n`);
      log.debug({ event: 'config_saved', file_path: this.filePath }, 'configuration saved');
    } catch (error) {
      log.error({ event: 'config_save_failed', file_path: this.filePath, err: error }, 'configuration save failed');
    }
  }

  private static load(filePath: string): AppConfiguration {
    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code !== 'ENOENT') {
        log.warn({ event: 'config_read_failed', file_path: filePath, err: error }, 'configuration read failed');
      }
      return defaultConfiguration();
    }

    try {
      return decodeConfiguration(JSON.parse(text));
    } catch (error) {
      log.warn({ event: 'config_parse_failed', file_path: filePath, err: error }, 'configuration parse failed');
      return defaultConfiguration();
    }
  }
}
