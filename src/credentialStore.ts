// src/credentialStore.ts
// Reads the OAuth client secret and the token cache, and persists tokens.

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, getErrorMessage, isNodeError } from './errorHelpers.js';
import {
  type ClientSecret,
  type OAuthToken,
  OAuthCredentialsFileSchema,
  OAuthTokenSchema,
} from './types.js';

const DEFAULT_REDIRECT_URIS = ['http://localhost'];

/**
 * Load the OAuth client secret downloaded from Google Cloud Console.
 * Accepts both "installed" (desktop) and "web" client files.
 */
export async function loadClientSecret(credPath: string): Promise<ClientSecret> {
  let content: string;
  try {
    content = await fs.readFile(credPath, 'utf8');
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      throw new ConfigError(
        `Credentials file not found at ${credPath}. Download your OAuth client JSON from Google Cloud Console and save it there.`
      );
    }
    throw new ConfigError(`Could not read credentials file ${credPath}: ${getErrorMessage(err)}`, {
      cause: err,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err: unknown) {
    throw new ConfigError(`Credentials file ${credPath} is not valid JSON.`, { cause: err });
  }

  const parsed = OAuthCredentialsFileSchema.safeParse(json);
  const key = parsed.success ? (parsed.data.installed ?? parsed.data.web) : undefined;
  if (!parsed.success || !key) {
    throw new ConfigError(
      `Could not find client secrets in ${credPath}. Expected "installed" or "web" credentials with client_id and client_secret.`
    );
  }

  return {
    clientId: key.client_id,
    clientSecret: key.client_secret,
    redirectUris:
      key.redirect_uris && key.redirect_uris.length > 0 ? key.redirect_uris : DEFAULT_REDIRECT_URIS,
    clientType: parsed.data.installed ? 'installed' : 'web',
  };
}

/**
 * Load the cached token, or null when there is none worth using.
 * A missing file is normal on first run; an unreadable one only warrants a warning.
 */
export async function loadCachedToken(tokenPath: string): Promise<OAuthToken | null> {
  let content: string;
  try {
    content = await fs.readFile(tokenPath, 'utf8');
  } catch (err: unknown) {
    if (!(isNodeError(err) && err.code === 'ENOENT')) {
      console.error(`Warning: Could not read token file ${tokenPath}: ${getErrorMessage(err)}`);
    }
    return null;
  }

  try {
    const parsed = OAuthTokenSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      console.error(`Warning: Token file ${tokenPath} has no usable access token. Re-authentication required.`);
      return null;
    }
    return parsed.data;
  } catch {
    console.error(`Warning: Token file ${tokenPath} is not valid JSON. Re-authentication required.`);
    return null;
  }
}

/**
 * Replace the token file with `token`. Returns false (after logging) when the
 * write fails; the caller keeps using the in-memory token.
 */
export async function saveToken(tokenPath: string, token: OAuthToken): Promise<boolean> {
  const tempPath = `${tokenPath}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(tokenPath), { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(token, null, 2), { mode: 0o600 });
    await fs.rename(tempPath, tokenPath);
    console.error('Token stored to', tokenPath);
    return true;
  } catch (err: unknown) {
    console.error(`Warning: Failed to save token to ${tokenPath}: ${getErrorMessage(err)}`);
    await fs.rm(tempPath, { force: true }).catch((rmErr: unknown) => {
      console.error(`Warning: Could not remove ${tempPath}: ${getErrorMessage(rmErr)}`);
    });
    return false;
  }
}
