import { randomUUID } from 'crypto';
import { z } from 'zod';

export const TranscriptionRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  timestamp: z.coerce.date(),
  durationMs: z.number().int().nonnegative().optional(),
  confidence: z.number().optional(),
  source: z.string().optional(),
  model: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
  createdAt: z.coerce.date(),
});

export type TranscriptionRecord = z.infer<typeof TranscriptionRecordSchema>;

export type NewTranscriptionRecord = Pick<TranscriptionRecord, 'text'> &
  Partial<Omit<TranscriptionRecord, 'text'>>;

export function createTranscriptionRecord(input: NewTranscriptionRecord): TranscriptionRecord {
  const now = new Date();
  return {
    ...input,
    id: input.id ?? randomUUID(),
    timestamp: input.timestamp ?? now,
    createdAt: input.createdAt ?? now,
  };
}

const PREVIEW_MAX_LENGTH = 100;

export function recordPreview(record: Pick<TranscriptionRecord, 'text'>): string {
  const chars = Array.from(record.text);
  if (chars.length <= PREVIEW_MAX_LENGTH) return record.text;
  return `${chars.slice(0, PREVIEW_MAX_LENGTH).join('')}...`;
}

export function formattedDuration(record: Pick<TranscriptionRecord, 'durationMs'>): string | undefined {
  if (record.durationMs === undefined) return undefined;
  return `${(record.durationMs / 1000).toFixed(1)}s`;
}

export interface HistoryStorage {
  readonly recentRecords: readonly TranscriptionRecord[];

  save(record: TranscriptionRecord): Promise<void>;
  delete(record: Pick<TranscriptionRecord, 'id'>): Promise<void>;
  deleteAll(): Promise<void>;
  fetchAll(): Promise<TranscriptionRecord[]>;
  fetchRecent(limit?: number): Promise<TranscriptionRecord[]>;
  search(query: string): Promise<TranscriptionRecord[]>;
  getRecord(id: string): Promise<TranscriptionRecord | undefined>;
}
