export interface CredentialStore {
  setApiKey(key: string): void;
  getApiKey(): string | undefined;
  deleteApiKey(): void;
  hasApiKey(): boolean;
  /** Presence check that does not read the secret itself. */
  hasApiKeyWithoutFetch(): boolean;
  migrateIfNeeded(): void;
}
