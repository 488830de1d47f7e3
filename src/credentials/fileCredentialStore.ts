import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { log } from '../log';
import type { CredentialStore } from './types';

const API_KEY_ACCOUNT = 'openai-api-key';
const MIGRATION_MARKER = 'env-migration-v1';
const FILE_MODE = 0o600;

const CredentialFileSchema = z.record(z.string(), z.string());
type CredentialFile = z.infer<typeof CredentialFileSchema>;

export interface FileCredentialStoreOptions {
  filePath: string;
  /** Plaintext key from the environment, moved into the store by `migrateIfNeeded()`. */
  legacyApiKey?: string;
}

function maskKey(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 8) {
    return `${trimmed.slice(0, 2)}...${trimmed.slice(-2)}`;
  }
  return `${trimmed.slice(0, 4)}...${trimmed.slice(-4)}`;
}

/**
 * Secrets kept in a JSON file readable only by the owner. Failures to write
 * are logged; readers see "no key" rather than an exception.
 */
export class FileCredentialStore implements CredentialStore {
  private readonly filePath: string;
  private readonly legacyApiKey?: string;
  private present: boolean | undefined;

  constructor(options: FileCredentialStoreOptions) {
    this.filePath = options.filePath;
    this.legacyApiKey = options.legacyApiKey;
  }

  public setApiKey(key: string): void {
    this.deleteApiKey();

    const entries = this.readFile();
    entries[API_KEY_ACCOUNT] = key;
    if (this.writeFile(entries)) {
      this.present = true;
      log.info(
        { event: 'credential_saved', account: API_KEY_ACCOUNT, key_fingerprint: maskKey(key) },
        'api key saved',
      );
    }
  }

  public getApiKey(): string | undefined {
    const value = this.readFile()[API_KEY_ACCOUNT];
    this.present = value !== undefined;
    return value;
  }

  public deleteApiKey(): void {
    const entries = this.readFile();
    if (!(API_KEY_ACCOUNT in entries)) {
      this.present = false;
      return;
    }
    delete entries[API_KEY_ACCOUNT];
    if (this.writeFile(entries)) {
      this.present = false;
      log.debug({ event: 'credential_deleted', account: API_KEY_ACCOUNT }, 'api key deleted');
    }
  }

  public hasApiKey(): boolean {
    return this.getApiKey() !== undefined;
  }

  public hasApiKeyWithoutFetch(): boolean {
    if (this.present === undefined) {
      this.present = API_KEY_ACCOUNT in this.readFile();
    }
    return this.present;
  }

  public migrateIfNeeded(): void {
    const entries = this.readFile();
    if (entries[MIGRATION_MARKER] === 'done') return;

    if (this.legacyApiKey && entries[API_KEY_ACCOUNT] === undefined) {
      entries[API_KEY_ACCOUNT] = this.legacyApiKey;
      this.present = true;
      log.info(
        { event: 'credential_migrated', account: API_KEY_ACCOUNT, key_fingerprint: maskKey(this.legacyApiKey) },
        'api key migrated from environment',
      );
    }
    entries[MIGRATION_MARKER] = 'done';
    this.writeFile(entries);
  }

  private readFile(): CredentialFile {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code !== 'ENOENT') {
        log.error({ event: 'credential_read_failed', file_path: this.filePath, err: error }, 'credential read failed');
      }
      return {};
    }

    try {
      const parsed = CredentialFileSchema.safeParse(JSON.parse(text));
      if (parsed.success) return parsed.data;
      log.error({ event: 'credential_file_invalid', file_path: this.filePath }, 'credential file invalid');
    } catch (error) {
      log.error({ event: 'credential_file_invalid', file_path: this.filePath, err: error }, 'credential file invalid');
    }
    return {};
  }

  private writeFile(entries: CredentialFile): boolean {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(entries), { mode: FILE_MODE });
      // writeFileSync only applies `mode` when it creates the file.
      fs.chmodSync(this.filePath, FILE_MODE);
      return true;
    } catch (error) {
      log.error({ event: 'credential_write_failed', file_path: this.filePath, err: error }, 'credential write failed');
      return false;
    }
  }
}
