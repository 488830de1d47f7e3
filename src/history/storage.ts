import { z } from 'zod';
import { log } from '../log';
import { readJsonFile, writeJsonFile } from '../storage/jsonStore';
import { TranscriptionRecordSchema, type HistoryStorage, type TranscriptionRecord } from './types';

const HistoryFileSchema = z.object({
  records: z.array(TranscriptionRecordSchema),
});

type HistoryFile = z.infer<typeof HistoryFileSchema>;

const DEFAULT_RECENT_LIMIT = 5;
const WORD_SPLIT = /[^\p{L}\p{N}]+/u;

/** Lowercased alphanumeric words, the way a unicode61 full-text tokenizer splits. */
export function tokenize(text: string): string[] {
  return text.toLocaleLowerCase().split(WORD_SPLIT).filter((word) => word !== '');
}

/** Every query token must prefix some word of the text. */
export function matchesQuery(text: string, queryTokens: string[]): boolean {
  const words = tokenize(text);
  return queryTokens.every((token) => words.some((word) => word.startsWith(token)));
}

function newestFirst(a: TranscriptionRecord, b: TranscriptionRecord): number {
  return b.timestamp.getTime() - a.timestamp.getTime();
}

export interface HistoryStoreOptions {
  /** Omit for an in-memory store. */
  filePath?: string;
  recentLimit?: number;
}

export class HistoryStore implements HistoryStorage {
  private records: TranscriptionRecord[] = [];
  private recent: TranscriptionRecord[] = [];
  private readonly filePath?: string;
  private readonly recentLimit: number;
  private writes: Promise<unknown> = Promise.resolve();

  private constructor(options: HistoryStoreOptions) {
    this.filePath = options.filePath;
    this.recentLimit = options.recentLimit ?? DEFAULT_RECENT_LIMIT;
  }

  public static async open(options: HistoryStoreOptions = {}): Promise<HistoryStore> {
    const store = new HistoryStore(options);
    if (options.filePath) {
      const file = await readJsonFile(options.filePath, HistoryFileSchema, { records: [] });
      store.records = file.records;
    }
    store.refreshRecent();
    log.info(
      { event: 'history_storage_ready', records: store.records.length, file_path: options.filePath },
      'history storage initialized',
    );
    return store;
  }

  public get recentRecords(): readonly TranscriptionRecord[] {
    return this.recent;
  }

  public async save(record: TranscriptionRecord): Promise<void> {
    await this.serialize(async () => {
      if (this.records.some((r) => r.id === record.id)) {
        throw new Error(`UNIQUE constraint failed: transcriptions.id (${record.id})`);
      }
      await this.commit([...this.records, { ...record }]);
    });
    log.debug({ event: 'history_record_saved', record_id: record.id }, 'saved transcription record');
  }

  public async delete(record: Pick<TranscriptionRecord, 'id'>): Promise<void> {
    await this.serialize(() => this.commit(this.records.filter((r) => r.id !== record.id)));
    log.debug({ event: 'history_record_deleted', record_id: record.id }, 'deleted transcription record');
  }

  public async deleteAll(): Promise<void> {
    await this.serialize(() => this.commit([]));
    log.info({ event: 'history_cleared' }, 'deleted all transcription records');
  }

  public async fetchAll(): Promise<TranscriptionRecord[]> {
    return [...this.records].sort(newestFirst);
  }

  public async fetchRecent(limit = DEFAULT_RECENT_LIMIT): Promise<TranscriptionRecord[]> {
    return (await this.fetchAll()).slice(0, Math.max(0, limit));
  }

  public async search(query: string): Promise<TranscriptionRecord[]> {
    const tokens = tokenize(query);
    if (tokens.length === 0) return this.fetchAll();
    return (await this.fetchAll()).filter((record) => matchesQuery(record.text, tokens));
  }

  public async getRecord(id: string): Promise<TranscriptionRecord | undefined> {
    return this.records.find((r) => r.id === id);
  }

  // Writes run one at a time, each starting from the last committed records.
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writes.then(task, task);
    this.writes = run.catch(() => undefined);
    return run;
  }

  private async commit(next: TranscriptionRecord[]): Promise<void> {
    if (this.filePath) {
      const file: HistoryFile = { records: next };
      await writeJsonFile(this.filePath, file);
    }
    this.records = next;
    this.refreshRecent();
  }

  private refreshRecent(): void {
    this.recent = [...this.records].sort(newestFirst).slice(0, this.recentLimit);
  }
}
