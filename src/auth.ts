// src/auth.ts
import { google } from 'googleapis';
import type { OAuth2Client, Credentials } from 'google-auth-library';
import * as http from 'http';
import type { Socket } from 'net';
import { exec } from 'child_process';
import { AuthError, getErrorMessage } from './errorHelpers.js';
import { loadCachedToken, saveToken } from './credentialStore.js';
import { type ClientSecret, type GmailClient, type OAuthToken } from './types.js';

// READ-ONLY scope - cannot send, modify, or delete emails
export const GMAIL_READONLY_SCOPE = 'https://www.googleapis.com/auth/gmail.readonly';
const SCOPES = [GMAIL_READONLY_SCOPE];

// google-auth-library refreshes this long before expiry (eagerRefreshThresholdMillis)
export const TOKEN_EXPIRY_MARGIN_MS = 5 * 60 * 1000;

/** The two network operations behind authentication */
export interface OAuthFlow {
  /** Exchange the refresh token for a fresh access token */
  refresh(token: OAuthToken): Promise<OAuthToken>;
  /** Interactive consent: browser, loopback redirect, code exchange */
  authorize(): Promise<OAuthToken>;
}

export interface AuthorizedClient {
  client: OAuth2Client;
  token: OAuthToken;
}

export interface GetClientOptions {
  tokenPath: string;
  flow: OAuthFlow;
  now?: () => number;
}

export function createOAuth2Client(clientSecret: ClientSecret, redirectUri?: string): OAuth2Client {
  return new google.auth.OAuth2(
    clientSecret.clientId,
    clientSecret.clientSecret,
    redirectUri ?? clientSecret.redirectUris[0]
  );
}

export function isTokenExpired(token: OAuthToken | Credentials, now: number): boolean {
  return typeof token.expiry_date === 'number' && token.expiry_date <= now;
}

/**
 * Overlay a token response on the previous token. Google omits the refresh
 * token on refresh responses, so the old one is kept.
 */
export function mergeToken(previous: OAuthToken | null, credentials: Credentials): OAuthToken {
  const accessToken = credentials.access_token ?? previous?.access_token;
  if (!accessToken) {
    throw new AuthError('Token response did not include an access token.');
  }
  return {
    access_token: accessToken,
    refresh_token: credentials.refresh_token ?? previous?.refresh_token,
    scope: credentials.scope ?? previous?.scope,
    token_type: credentials.token_type ?? previous?.token_type,
    expiry_date: credentials.expiry_date ?? previous?.expiry_date,
    id_token: credentials.id_token ?? previous?.id_token,
  };
}

/**
 * Produce an authenticated client from the cached token, refreshing it or
 * running the interactive flow as needed. Every new token is persisted.
 */
export async function getClient(
  clientSecret: ClientSecret,
  cachedToken: OAuthToken | null,
  options: GetClientOptions
): Promise<AuthorizedClient> {
  const now = options.now ?? Date.now;
  let token: OAuthToken | null = null;

  if (cachedToken) {
    if (cachedToken.scope && !cachedToken.scope.includes(GMAIL_READONLY_SCOPE)) {
      console.error('Warning: Cached token does not carry the gmail.readonly scope.');
    }

    if (!isTokenExpired(cachedToken, now() + TOKEN_EXPIRY_MARGIN_MS)) {
      console.error('Using saved credentials.');
      token = cachedToken;
    } else if (cachedToken.refresh_token) {
      try {
        token = mergeToken(cachedToken, await options.flow.refresh(cachedToken));
        await saveToken(options.tokenPath, token);
        console.error('Access token refreshed.');
      } catch (err: unknown) {
        console.error(`Token refresh failed, re-authorizing: ${getErrorMessage(err)}`);
      }
    } else {
      console.error('Saved token expired and has no refresh token, re-authorizing.');
    }
  }

  if (!token) {
    console.error('Starting authentication flow...');
    try {
      token = await options.flow.authorize();
    } catch (err: unknown) {
      if (err instanceof AuthError) throw err;
      throw new AuthError(`Authentication failed: ${getErrorMessage(err)}`, { cause: err });
    }
    if (!token.refresh_token) {
      console.error('Did not receive refresh token. Token might expire.');
    }
    await saveToken(options.tokenPath, token);
    console.error('Authentication successful!');
  }

  const client = createOAuth2Client(clientSecret);
  client.setCredentials(token);
  persistRefreshedTokens(client, token, options.tokenPath);
  return { client, token };
}

/**
 * google-auth-library refreshes expired access tokens on its own before a
 * request; keep the token file in step with it.
 */
function persistRefreshedTokens(client: OAuth2Client, initial: OAuthToken, tokenPath: string): void {
  let current = initial;
  client.on('tokens', (credentials: Credentials) => {
    if (!credentials.access_token) return;
    current = mergeToken(current, credentials);
    void saveToken(tokenPath, current);
  });
}

// --- Interactive flow ---

export interface CallbackListenerOptions {
  /** 0 picks a free port */
  port: number;
  timeoutMs: number;
}

export interface CallbackListener {
  redirectUri: string;
  /** Settles once: the authorization code, or an AuthError */
  code: Promise<string>;
  close(): void;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms} ms` : `${Math.round(ms / 1000)} seconds`;
}

/**
 * Start a temporary loopback server that receives the OAuth redirect.
 */
export async function listenForAuthorizationCode(
  options: CallbackListenerOptions
): Promise<CallbackListener> {
  const server = http.createServer();
  // Track connections so we can destroy them when closing
  const connections = new Set<Socket>();
  server.on('connection', (conn) => {
    connections.add(conn);
    conn.on('close', () => connections.delete(conn));
  });

  let timeoutId: NodeJS.Timeout | undefined;
  const shutdown = (): void => {
    clearTimeout(timeoutId);
    server.close();
    connections.forEach((conn) => conn.destroy());
  };

  await new Promise<void>((resolve, reject) => {
    server.once('error', (err: NodeJS.ErrnoException) => {
      const reason =
        err.code === 'EADDRINUSE' ? `Port ${options.port} is in use.` : getErrorMessage(err);
      reject(new AuthError(`Could not start OAuth callback listener: ${reason}`, { cause: err }));
    });
    server.listen(options.port, () => resolve());
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    shutdown();
    throw new AuthError('OAuth callback listener is not bound to a TCP port.');
  }
  const redirectUri = `http://localhost:${address.port}`;

  // Once settled, the response callback owns shutdown
  let settled = false;
  let cancel: (reason: AuthError) => void = () => undefined;
  const code = new Promise<string>((resolve, reject) => {
    cancel = (reason) => {
      if (settled) return;
      settled = true;
      shutdown();
      reject(reason);
    };

    timeoutId = setTimeout(() => {
      cancel(new AuthError(`Authentication timed out after ${formatDuration(options.timeoutMs)}.`));
    }, options.timeoutMs);

    server.on('request', (req: http.IncomingMessage, res: http.ServerResponse) => {
      const url = new URL(req.url ?? '', redirectUri);
      const error = url.searchParams.get('error');
      const authCode = url.searchParams.get('code');

      if (settled) {
        res.writeHead(410, { Connection: 'close' });
        res.end();
        return;
      }

      if (error) {
        settled = true;
        clearTimeout(timeoutId);
        res.writeHead(400, { 'Content-Type': 'text/html', Connection: 'close' });
        res.end(
          `<html><body><h1>Authentication failed</h1><p>${escapeHtml(error)}</p></body></html>`,
          shutdown
        );
        reject(new AuthError(`Authorization was denied: ${error}`));
        return;
      }

      if (authCode) {
        settled = true;
        clearTimeout(timeoutId);
        res.writeHead(200, { 'Content-Type': 'text/html', Connection: 'close' });
        res.end(
          '<html><body><h1>Gmail authentication successful!</h1><p>Read-only access granted. You can close this window.</p></body></html>',
          shutdown
        );
        resolve(authCode);
        return;
      }

      res.writeHead(404);
      res.end('Not found');
    });
  });

  console.error(`Waiting for OAuth callback on ${redirectUri}`);

  return {
    redirectUri,
    code,
    close: () => cancel(new AuthError('Authentication was cancelled.')),
  };
}

// Helper to open URL in browser (cross-platform)
export function openBrowser(url: string): void {
  const platform = process.platform;
  let command: string;

  if (platform === 'darwin') {
    command = `open "${url}"`;
  } else if (platform === 'win32') {
    command = `start "" "${url}"`;
  } else {
    command = `xdg-open "${url}"`;
  }

  exec(command, (error) => {
    if (error) {
      console.error('Could not open browser automatically. Please open the URL manually.');
    }
  });
}

export interface GoogleOAuthFlowOptions {
  port: number;
  timeoutMs: number;
  /** Called with the consent URL; omit to only print it */
  openBrowser?: (url: string) => void;
}

/**
 * OAuthFlow backed by Google's OAuth2 endpoints
 */
export function createGoogleOAuthFlow(
  clientSecret: ClientSecret,
  options: GoogleOAuthFlowOptions
): OAuthFlow {
  return {
    async refresh(token) {
      const client = createOAuth2Client(clientSecret);
      client.setCredentials(token);
      try {
        // Refreshes because the token is expired
        await client.getAccessToken();
      } catch (err: unknown) {
        throw new AuthError(`Token refresh failed: ${getErrorMessage(err)}`, { cause: err });
      }
      return mergeToken(token, client.credentials);
    },

    async authorize() {
      const listener = await listenForAuthorizationCode({
        port: options.port,
        timeoutMs: options.timeoutMs,
      });
      // close() in finally rejects `code` even when we never got to await it
      listener.code.catch(() => undefined);
      try {
        const client = createOAuth2Client(clientSecret, listener.redirectUri);
        const authUrl = client.generateAuthUrl({
          access_type: 'offline',
          scope: SCOPES,
          prompt: 'consent', // Force consent to get refresh token
        });

        console.error('Authorize this app by visiting this url:', authUrl);
        options.openBrowser?.(authUrl);

        const code = await listener.code;
        try {
          const { tokens } = await client.getToken(code);
          return mergeToken(null, tokens);
        } catch (err: unknown) {
          if (err instanceof AuthError) throw err;
          throw new AuthError(`Error retrieving access token: ${getErrorMessage(err)}`, {
            cause: err,
          });
        }
      } finally {
        listener.close();
      }
    },
  };
}

// --- Session ---

export interface AuthSessionOptions {
  clientSecret: ClientSecret;
  tokenPath: string;
  flow: OAuthFlow;
  now?: () => number;
}

/**
 * Unauthenticated until the first request needs Gmail. It falls back to
 * unauthenticated when reset, or when the access token is about to expire, in
 * which case the next request refreshes or re-authorizes through getClient. A
 * failed attempt leaves it unauthenticated so the next request tries again.
 */
export class GmailAuthSession {
  private readonly options: AuthSessionOptions;
  private authorized: { gmail: GmailClient; client: AuthorizedClient } | null = null;
  private pending: Promise<GmailClient> | null = null;
  // Token of an expired session, handed to the next authentication
  private expiredToken: OAuthToken | null = null;

  constructor(options: AuthSessionOptions) {
    this.options = options;
  }

  get isAuthenticated(): boolean {
    return this.authorized !== null;
  }

  async getGmailClient(): Promise<GmailClient> {
    if (this.authorized) {
      const { client, token } = this.authorized.client;
      if (!isTokenExpired(client.credentials, this.now() + TOKEN_EXPIRY_MARGIN_MS)) {
        return this.authorized.gmail;
      }
      console.error('Gmail access token expired, re-authenticating.');
      this.expiredToken = mergeToken(token, client.credentials);
      this.authorized = null;
    }
    // Concurrent callers share one authentication attempt
    this.pending ??= this.authenticate().finally(() => {
      this.pending = null;
    });
    return this.pending;
  }

  /** Forget the current client; the next request re-authenticates */
  reset(): void {
    if (this.authorized) {
      console.error('Gmail credentials rejected, will re-authenticate on next request.');
    }
    this.authorized = null;
  }

  private now(): number {
    return (this.options.now ?? Date.now)();
  }

  private async authenticate(): Promise<GmailClient> {
    const { clientSecret, tokenPath, flow, now } = this.options;
    const carried = this.expiredToken;
    this.expiredToken = null;
    const cachedToken = carried ?? (await loadCachedToken(tokenPath));
    const client = await getClient(clientSecret, cachedToken, { tokenPath, flow, now });
    const gmail = google.gmail({ version: 'v1', auth: client.client });
    this.authorized = { gmail, client };
    return gmail;
  }
}
