import { log } from '../log';
import type { PromptSource } from '../stt/types';
import { DictionaryError, MAX_DICTIONARY_TERMS, type DictionaryStorage, type DictionaryTerm } from './types';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Validation and business rules for the custom vocabulary; the enabled terms
 * become the Whisper prompt.
 */
export class DictionaryManager implements PromptSource {
  public static readonly maxTerms = MAX_DICTIONARY_TERMS;

  private currentTerms: DictionaryTerm[] = [];
  private currentEnabled: string[] = [];
  private mutations: Promise<unknown> = Promise.resolve();

  constructor(private readonly storage: DictionaryStorage) {}

  public static async create(storage: DictionaryStorage): Promise<DictionaryManager> {
    const manager = new DictionaryManager(storage);
    await manager.refreshTerms();
    return manager;
  }

  public get terms(): readonly DictionaryTerm[] {
    return this.currentTerms;
  }

  public get enabledTerms(): readonly string[] {
    return this.currentEnabled;
  }

  public get isAtLimit(): boolean {
    return this.currentTerms.length >= DictionaryManager.maxTerms;
  }

  public get termCount(): number {
    return this.currentTerms.length;
  }

  public async refreshTerms(): Promise<void> {
    this.currentTerms = [...this.storage.terms];
    this.currentEnabled = this.currentTerms.filter((t) => t.isEnabled).map((t) => t.term);
    log.debug({ event: 'dictionary_refreshed', enabled: this.currentEnabled.length }, 'dictionary terms refreshed');
  }

  public async addTerm(termText: string): Promise<void> {
    await this.serialize(async () => {
      const trimmed = termText.trim();
      if (trimmed === '') {
        throw new DictionaryError('empty_term');
      }
      if ((await this.storage.count()) >= DictionaryManager.maxTerms) {
        throw new DictionaryError('limit_reached');
      }
      if (await this.storage.termExists(trimmed)) {
        throw new DictionaryError('duplicate_term');
      }

      try {
        await this.storage.save(trimmed);
      } catch (error) {
        throw new DictionaryError('storage_error', errorMessage(error), { cause: error });
      }
      await this.refreshTerms();
    });
  }

  public async updateTerm(term: DictionaryTerm, newText: string): Promise<void> {
    await this.serialize(async () => {
      const trimmed = newText.trim();
      if (trimmed === '') {
        throw new DictionaryError('empty_term');
      }
      if (trimmed !== term.term && (await this.storage.termExists(trimmed))) {
        throw new DictionaryError('duplicate_term');
      }

      try {
        await this.storage.update({ ...term, term: trimmed });
      } catch (error) {
        throw new DictionaryError('storage_error', errorMessage(error), { cause: error });
      }
      await this.refreshTerms();
    });
  }

  public async toggleTerm(term: DictionaryTerm): Promise<void> {
    await this.serialize(async () => {
      const isEnabled = !term.isEnabled;
      try {
        await this.storage.update({ ...term, isEnabled });
      } catch (error) {
        throw new DictionaryError('storage_error', errorMessage(error), { cause: error });
      }
      await this.refreshTerms();
      log.info(
        { event: 'dictionary_term_toggled', term_id: term.id, enabled: isEnabled },
        'dictionary term toggled',
      );
    });
  }

  public async deleteTerm(term: DictionaryTerm): Promise<void> {
    await this.serialize(async () => {
      try {
        await this.storage.delete(term);
      } catch (error) {
        throw new DictionaryError('storage_error', errorMessage(error), { cause: error });
      }
      await this.refreshTerms();
    });
  }

  /** Case-insensitive substring match; a blank query returns every term. */
  public filterTerms(query: string): DictionaryTerm[] {
    const needle = query.trim().toLocaleLowerCase();
    if (needle === '') return [...this.currentTerms];
    return this.currentTerms.filter((t) => t.term.toLocaleLowerCase().includes(needle));
  }

  public buildPrompt(): string {
    if (this.currentEnabled.length === 0) return '';
    log.debug({ event: 'dictionary_prompt_built', terms: this.currentEnabled.length }, 'dictionary prompt built');
    return `Common terms: ${this.currentEnabled.join(', ')}`;
  }

  // Validation and the write happen together, so the limit and duplicate checks
  // see every earlier change.
  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.mutations.then(task, task);
    this.mutations = run.catch(() => undefined);
    return run;
  }
}
