import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

function tempFile(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'credentials-'));
  return path.join(dir, 'nested', 'credentials.json');
}

test('set, get and delete round-trip through the file', async () => {
  const { FileCredentialStore } = await import('../src/credentials/fileCredentialStore');
  const filePath = tempFile();
  const store = new FileCredentialStore({ filePath });

  assert.equal(store.getApiKey(), undefined);
  assert.equal(store.hasApiKey(), false);

  store.setApiKey('test-secret');
  assert.equal(store.getApiKey(), 'test-secret');
  assert.equal(new FileCredentialStore({ filePath }).getApiKey(), 'test-secret');

  store.setApiKey('test-secret-2');
  assert.equal(store.getApiKey(), 'test-secret-2');

  store.deleteApiKey();
  assert.equal(store.getApiKey(), undefined);
  assert.equal(store.hasApiKey(), false);
  assert.doesNotThrow(() => store.deleteApiKey());
});

test('the credential file is readable by the owner only', async () => {
  const { FileCredentialStore } = await import('../src/credentials/fileCredentialStore');
  const filePath = tempFile();
  new FileCredentialStore({ filePath }).setApiKey('test-secret');

  assert.equal(fs.statSync(filePath).mode & 0o777, 0o600);
  assert.deepEqual(JSON.parse(fs.readFileSync(filePath, 'utf8')), { 'openai-api-key': 'test-secret' });
});

test('presence check answers from memory once known', async () => {
  const { FileCredentialStore } = await import('../src/credentials/fileCredentialStore');
  const filePath = tempFile();
  const store = new FileCredentialStore({ filePath });

  store.setApiKey('test-secret');
  fs.rmSync(filePath);

  assert.equal(store.hasApiKeyWithoutFetch(), true);
  assert.equal(store.hasApiKey(), false);
  assert.equal(store.hasApiKeyWithoutFetch(), false);
});

test('presence check reads the file when nothing is cached', async () => {
  const { FileCredentialStore } = await import('../src/credentials/fileCredentialStore');
  const filePath = tempFile();
  new FileCredentialStore({ filePath }).setApiKey('test-secret');

  assert.equal(new FileCredentialStore({ filePath }).hasApiKeyWithoutFetch(), true);
});

test('migration copies the environment key once', async () => {
  const { FileCredentialStore } = await import('../src/credentials/fileCredentialStore');
  const filePath = tempFile();

  const first = new FileCredentialStore({ filePath, legacyApiKey: 'test-secret' });
  first.migrateIfNeeded();
  assert.equal(first.getApiKey(), 'test-secret');

  first.deleteApiKey();
  const second = new FileCredentialStore({ filePath, legacyApiKey: 'test-secret' });
  second.migrateIfNeeded();
  assert.equal(second.getApiKey(), undefined);
});

test('migration keeps an existing key', async () => {
  const { FileCredentialStore } = await import('../src/credentials/fileCredentialStore');
  const filePath = tempFile();
  new FileCredentialStore({ filePath }).setApiKey('test-stored');

  const store = new FileCredentialStore({ filePath, legacyApiKey: 'test-secret' });
  store.migrateIfNeeded();
  assert.equal(store.getApiKey(), 'test-stored');
});

test('an unwritable location is logged, not thrown', async () => {
  const { FileCredentialStore } = await import('../src/credentials/fileCredentialStore');
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'credentials-'));
  const blocker = path.join(dir, 'blocker');
  fs.writeFileSync(blocker, '');
  const store = new FileCredentialStore({ filePath: path.join(blocker, 'credentials.json') });

  assert.doesNotThrow(() => store.setApiKey('test-secret'));
  assert.equal(store.getApiKey(), undefined);
});

test('a corrupt file reads as empty', async () => {
  const { FileCredentialStore } = await import('../src/credentials/fileCredentialStore');
  const filePath = tempFile();
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, '{not json');

  assert.equal(new FileCredentialStore({ filePath }).getApiKey(), undefined);
});
