import type { CredentialStore } from '../../src/credentials/types';

export class MockCredentialStore implements CredentialStore {
  public storedApiKey?: string;

  public setApiKey(key: string): void {
    this.storedApiKey = key;
  }

  public getApiKey(): string | undefined {
    return this.storedApiKey;
  }

  public deleteApiKey(): void {
    this.storedApiKey = undefined;
  }

  public hasApiKey(): boolean {
    return this.storedApiKey !== undefined;
  }

  public hasApiKeyWithoutFetch(): boolean {
    return this.storedApiKey !== undefined;
  }

  public migrateIfNeeded(): void {
    // nothing to migrate
  }
}
