import { z } from 'zod';
import { log } from '../log';
import { readJsonFile, writeJsonFile } from '../storage/jsonStore';
import { DictionaryTermSchema, type DictionaryStorage, type DictionaryTerm } from './types';

const DictionaryFileSchema = z.object({
  nextId: z.number().int().positive(),
  terms: z.array(DictionaryTermSchema),
});

type DictionaryFile = z.infer<typeof DictionaryFileSchema>;

const EMPTY_FILE: DictionaryFile = { nextId: 1, terms: [] };

function newestFirst(a: DictionaryTerm, b: DictionaryTerm): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

function copyTerm(term: DictionaryTerm): DictionaryTerm {
  return { ...term, createdAt: new Date(term.createdAt), updatedAt: new Date(term.updatedAt) };
}

export interface DictionaryStoreOptions {
  /** Omit for an in-memory store. */
  filePath?: string;
  now?: () => Date;
}

/**
 * Term storage with a unique, case-sensitive `term` column. Persists to a JSON
 * file when given a path; otherwise lives in memory.
 */
export class DictionaryStore implements DictionaryStorage {
  private state: DictionaryFile = { nextId: EMPTY_FILE.nextId, terms: [] };
  private snapshot: DictionaryTerm[] = [];
  private readonly filePath?: string;
  private readonly now: () => Date;
  private writes: Promise<unknown> = Promise.resolve();

  private constructor(options: DictionaryStoreOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? (() => new Date());
  }

  public static async open(options: DictionaryStoreOptions = {}): Promise<DictionaryStore> {
    const store = new DictionaryStore(options);
    if (options.filePath) {
      store.state = await readJsonFile(options.filePath, DictionaryFileSchema, EMPTY_FILE);
    }
    store.refreshSnapshot();
    log.info({ event: 'dictionary_storage_ready', terms: store.state.terms.length }, 'dictionary storage initialized');
    return store;
  }

  public get terms(): readonly DictionaryTerm[] {
    return this.snapshot;
  }

  public save(termText: string, isEnabled = true): Promise<DictionaryTerm> {
    return this.serialize(async () => {
      if (this.state.terms.some((t) => t.term === termText)) {
        throw new Error(`UNIQUE constraint failed: dictionary_terms.term (${termText})`);
      }

      const now = this.now();
      const term: DictionaryTerm = {
        id: this.state.nextId,
        term: termText,
        isEnabled,
        createdAt: now,
        updatedAt: now,
      };

      await this.commit({ nextId: this.state.nextId + 1, terms: [...this.state.terms, term] });
      log.info({ event: 'dictionary_term_added', term_id: term.id }, 'dictionary term added');
      return copyTerm(term);
    });
  }

  public update(term: DictionaryTerm): Promise<DictionaryTerm> {
    return this.serialize(async () => {
      const index = this.state.terms.findIndex((t) => t.id === term.id);
      if (index === -1) {
        throw new Error(`dictionary term ${term.id} not found`);
      }
      if (this.state.terms.some((t) => t.id !== term.id && t.term === term.term)) {
        throw new Error(`UNIQUE constraint failed: dictionary_terms.term (${term.term})`);
      }

      const updated: DictionaryTerm = { ...copyTerm(term), updatedAt: this.now() };
      const terms = [...this.state.terms];
      terms[index] = updated;

      await this.commit({ ...this.state, terms });
      log.info({ event: 'dictionary_term_updated', term_id: term.id }, 'dictionary term updated');
      return copyTerm(updated);
    });
  }

  public async delete(term: DictionaryTerm): Promise<void> {
    await this.serialize(() =>
      this.commit({ ...this.state, terms: this.state.terms.filter((t) => t.id !== term.id) }),
    );
    log.info({ event: 'dictionary_term_removed', term_id: term.id }, 'dictionary term removed');
  }

  public async fetchAll(): Promise<DictionaryTerm[]> {
    return [...this.state.terms].sort(newestFirst).map(copyTerm);
  }

  public async fetchEnabled(): Promise<DictionaryTerm[]> {
    return (await this.fetchAll()).filter((t) => t.isEnabled);
  }

  public async termExists(termText: string): Promise<boolean> {
    return this.state.terms.some((t) => t.term === termText);
  }

  public async count(): Promise<number> {
    return this.state.terms.length;
  }

  // Mutations run one at a time; ids and the unique check see every earlier write.
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writes.then(task, task);
    this.writes = run.catch(() => undefined);
    return run;
  }

  private async commit(next: DictionaryFile): Promise<void> {
    if (this.filePath) {
      await writeJsonFile(this.filePath, next);
    }
    this.state = next;
    this.refreshSnapshot();
  }

  private refreshSnapshot(): void {
    this.snapshot = [...this.state.terms].sort(newestFirst).map(copyTerm);
  }
}
