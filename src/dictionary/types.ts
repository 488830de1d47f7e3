import { z } from 'zod';

export const MAX_DICTIONARY_TERMS = 50;

export const DictionaryTermSchema = z.object({
  id: z.number().int().positive(),
  term: z.string().min(1),
  isEnabled: z.boolean(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type DictionaryTerm = z.infer<typeof DictionaryTermSchema>;

export interface DictionaryStorage {
  /** Snapshot from the last load, newest first. */
  readonly terms: readonly DictionaryTerm[];

  save(term: string, isEnabled?: boolean): Promise<DictionaryTerm>;
  update(term: DictionaryTerm): Promise<DictionaryTerm>;
  delete(term: DictionaryTerm): Promise<void>;
  fetchAll(): Promise<DictionaryTerm[]>;
  fetchEnabled(): Promise<DictionaryTerm[]>;
  termExists(termText: string): Promise<boolean>;
  count(): Promise<number>;
}

export type DictionaryErrorKind = 'empty_term' | 'duplicate_term' | 'limit_reached' | 'storage_error';

function describe(kind: DictionaryErrorKind, detail?: string): string {
  switch (kind) {
    case 'empty_term':
      return 'Term cannot be empty';
    case 'duplicate_term':
      return 'This term already exists';
    case 'limit_reached':
      return `Dictionary limit reached (${MAX_DICTIONARY_TERMS} terms). Delete some terms to add new ones.`;
    case 'storage_error':
      return `Storage error: ${detail ?? 'unknown'}`;
  }
}

export class DictionaryError extends Error {
  public readonly kind: DictionaryErrorKind;

  constructor(kind: DictionaryErrorKind, detail?: string, options?: { cause?: unknown }) {
    super(describe(kind, detail), options);
    this.name = 'DictionaryError';
    this.kind = kind;
  }
}
