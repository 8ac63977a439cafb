import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadCachedToken, loadClientSecret, saveToken } from '../src/credentialStore.js';
import { ConfigError } from '../src/errorHelpers.js';
import type { OAuthToken } from '../src/types.js';

let tempDir: string;

beforeEach(async () => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gmail-mcp-store-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(tempDir, { recursive: true, force: true });
});

async function writeJson(name: string, value: unknown): Promise<string> {
  const filePath = path.join(tempDir, name);
  await fs.writeFile(filePath, JSON.stringify(value));
  return filePath;
}

describe('loadClientSecret', () => {
  it('reads an installed-app client file', async () => {
    const credPath = await writeJson('credentials.json', {
      installed: {
        client_id: 'test-client-id',
        client_secret: 'test-secret',
        redirect_uris: ['http://localhost'],
        project_id: 'test-project',
      },
    });

    expect(await loadClientSecret(credPath)).toEqual({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      redirectUris: ['http://localhost'],
      clientType: 'installed',
    });
  });

  it('reads a web client file and defaults the redirect URIs', async () => {
    const credPath = await writeJson('credentials.json', {
      web: { client_id: 'web-client-id', client_secret: 'test-secret' },
    });

    expect(await loadClientSecret(credPath)).toEqual({
      clientId: 'web-client-id',
      clientSecret: 'test-secret',
      redirectUris: ['http://localhost'],
      clientType: 'web',
    });
  });

  it('fails with ConfigError when the file is missing', async () => {
    const credPath = path.join(tempDir, 'missing.json');

    await expect(loadClientSecret(credPath)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadClientSecret(credPath)).rejects.toThrow(
      `Credentials file not found at ${credPath}`
    );
  });

  it('fails with ConfigError when the file is not JSON', async () => {
    const credPath = path.join(tempDir, 'credentials.json');
    await fs.writeFile(credPath, '{ not json');

    await expect(loadClientSecret(credPath)).rejects.toThrow(
      `Credentials file ${credPath} is not valid JSON.`
    );
  });

  it('fails with ConfigError when neither installed nor web is present', async () => {
    const credPath = await writeJson('credentials.json', { type: 'service_account' });

    await expect(loadClientSecret(credPath)).rejects.toThrow(
      `Could not find client secrets in ${credPath}.`
    );
  });

  it('fails with ConfigError when the client secret is missing', async () => {
    const credPath = await writeJson('credentials.json', { installed: { client_id: 'id' } });

    await expect(loadClientSecret(credPath)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('loadCachedToken', () => {
  it('returns null when the file does not exist', async () => {
    expect(await loadCachedToken(path.join(tempDir, 'token.json'))).toBeNull();
  });

  it('returns null for invalid JSON', async () => {
    const tokenPath = path.join(tempDir, 'token.json');
    await fs.writeFile(tokenPath, 'garbage');

    expect(await loadCachedToken(tokenPath)).toBeNull();
  });

  it('returns null when there is no access token', async () => {
    const tokenPath = await writeJson('token.json', { refresh_token: 'only-refresh' });

    expect(await loadCachedToken(tokenPath)).toBeNull();
  });

  it('normalizes null fields written by google-auth-library', async () => {
    const tokenPath = await writeJson('token.json', {
      access_token: 'test-access',
      refresh_token: 'test-refresh',
      id_token: null,
      expiry_date: 1790000000000,
    });

    expect(await loadCachedToken(tokenPath)).toEqual({
      access_token: 'test-access',
      refresh_token: 'test-refresh',
      expiry_date: 1790000000000,
    });
  });
});

describe('saveToken', () => {
  const token: OAuthToken = {
    access_token: 'test-access',
    refresh_token: 'test-refresh',
    expiry_date: 1790000000000,
    scope: 'https://www.googleapis.com/auth/gmail.readonly',
    token_type: 'Bearer',
  };

  it('round-trips through loadCachedToken', async () => {
    const tokenPath = path.join(tempDir, 'token.json');

    expect(await saveToken(tokenPath, token)).toBe(true);
    const loaded = await loadCachedToken(tokenPath);

    expect(loaded?.access_token).toBe(token.access_token);
    expect(loaded?.refresh_token).toBe(token.refresh_token);
    expect(loaded?.expiry_date).toBe(token.expiry_date);
    expect(loaded).toEqual(token);
  });

  it('replaces previous contents', async () => {
    const tokenPath = await writeJson('token.json', {
      access_token: 'old-access',
      refresh_token: 'old-refresh',
      extra: 'stale field',
    });

    await saveToken(tokenPath, { access_token: 'new-access' });

    expect(JSON.parse(await fs.readFile(tokenPath, 'utf8'))).toEqual({ access_token: 'new-access' });
    expect(await fs.readdir(tempDir)).toEqual(['token.json']);
  });

  it('creates the parent directory and restricts permissions', async () => {
    const tokenPath = path.join(tempDir, 'nested', 'dir', 'token.json');

    expect(await saveToken(tokenPath, token)).toBe(true);

    const stat = await fs.stat(tokenPath);
    expect(stat.mode & 0o777).toBe(0o600);
  });

  it('returns false instead of throwing when the write fails', async () => {
    const blocker = path.join(tempDir, 'not-a-dir');
    await fs.writeFile(blocker, '');

    expect(await saveToken(path.join(blocker, 'token.json'), token)).toBe(false);
  });
});
