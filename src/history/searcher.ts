import { log } from '../log';
import type { HistoryStorage, TranscriptionRecord } from './types';

const DEFAULT_DEBOUNCE_MS = 300;

export type SearchResultsListener = (records: TranscriptionRecord[]) => void;

/**
 * Debounced history search: only the last query typed within the debounce
 * window runs, and a repeated query is not re-run.
 */
export class HistorySearcher {
  private query = '';
  private lastRunQuery: string | null = null;
  private timer: NodeJS.Timeout | null = null;
  private results: TranscriptionRecord[] = [];
  private searching = false;
  private readonly listeners = new Set<SearchResultsListener>();

  constructor(
    private readonly storage: HistoryStorage,
    private readonly debounceMs = DEFAULT_DEBOUNCE_MS,
  ) {}

  public get searchText(): string {
    return this.query;
  }

  public get searchResults(): readonly TranscriptionRecord[] {
    return this.results;
  }

  public get isSearching(): boolean {
    return this.searching;
  }

  public setSearchText(query: string): void {
    this.query = query;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      if (this.query === this.lastRunQuery) return;
      void this.performSearch(this.query);
    }, this.debounceMs);
  }

  public onResults(listener: SearchResultsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public clearSearch(): void {
    this.setSearchText('');
  }

  public dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.listeners.clear();
  }

  private async performSearch(query: string): Promise<void> {
    this.lastRunQuery = query;
    this.searching = true;
    try {
      const records = await this.storage.search(query);
      // A newer query may have started while this one ran.
      if (query !== this.query) return;
      this.results = records;
      for (const listener of this.listeners) listener(records);
    } catch (error) {
      log.error({ event: 'history_search_failed', err: error }, 'history search failed');
    } finally {
      this.searching = false;
    }
  }
}
