import { describe, it, expect } from 'vitest';
import { DEFAULT_AUTH_TIMEOUT_MS, getServerConfigFromEnv } from '../src/config.js';
import { ConfigError } from '../src/errorHelpers.js';

const baseEnv = {
  GMAIL_CREDENTIALS_FILE: '/secrets/credentials.json',
  GMAIL_TOKEN_FILE: '/secrets/token.json',
};

describe('getServerConfigFromEnv', () => {
  it('reads the two required paths and applies defaults', () => {
    expect(getServerConfigFromEnv(baseEnv)).toEqual({
      credentialsPath: '/secrets/credentials.json',
      tokenPath: '/secrets/token.json',
      authTimeoutMs: DEFAULT_AUTH_TIMEOUT_MS,
      oauthPort: 0,
      openBrowser: true,
    });
  });

  it('reads the optional settings', () => {
    const config = getServerConfigFromEnv({
      ...baseEnv,
      GMAIL_AUTH_TIMEOUT_MS: '60000',
      GMAIL_OAUTH_PORT: '3334',
      GMAIL_NO_BROWSER: 'true',
    });

    expect(config.authTimeoutMs).toBe(60000);
    expect(config.oauthPort).toBe(3334);
    expect(config.openBrowser).toBe(false);
  });

  it('fails with ConfigError when the credentials path is missing', () => {
    expect(() => getServerConfigFromEnv({ GMAIL_TOKEN_FILE: '/secrets/token.json' })).toThrow(
      new ConfigError('Invalid configuration: GMAIL_CREDENTIALS_FILE environment variable not set')
    );
  });

  it('reports every missing variable', () => {
    expect(() => getServerConfigFromEnv({})).toThrow(
      'Invalid configuration: GMAIL_CREDENTIALS_FILE environment variable not set; GMAIL_TOKEN_FILE environment variable not set'
    );
  });

  it('rejects a blank path', () => {
    expect(() => getServerConfigFromEnv({ ...baseEnv, GMAIL_TOKEN_FILE: '  ' })).toThrow(
      'GMAIL_TOKEN_FILE environment variable is empty'
    );
  });

  it('rejects a malformed timeout', () => {
    expect(() => getServerConfigFromEnv({ ...baseEnv, GMAIL_AUTH_TIMEOUT_MS: 'soon' })).toThrow(
      /^Invalid configuration: GMAIL_AUTH_TIMEOUT_MS: /
    );
  });
});
