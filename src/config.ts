// src/config.ts - Server configuration from the environment
import { z } from 'zod';
import { ConfigError } from './errorHelpers.js';

export interface ServerConfig {
  /** Google OAuth client JSON (installed or web app) */
  credentialsPath: string;
  /** Token cache, rewritten after every refresh or authorization */
  tokenPath: string;
  /** How long the interactive consent flow waits for the redirect */
  authTimeoutMs: number;
  /** Loopback port for the OAuth redirect; 0 picks a free one */
  oauthPort: number;
  /** When false, the consent URL is only printed */
  openBrowser: boolean;
}

export const DEFAULT_AUTH_TIMEOUT_MS = 5 * 60 * 1000;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  GMAIL_CREDENTIALS_FILE: z
    .string({ required_error: 'GMAIL_CREDENTIALS_FILE environment variable not set' })
    .trim()
    .min(1, 'GMAIL_CREDENTIALS_FILE environment variable is empty'),
  GMAIL_TOKEN_FILE: z
    .string({ required_error: 'GMAIL_TOKEN_FILE environment variable not set' })
    .trim()
    .min(1, 'GMAIL_TOKEN_FILE environment variable is empty'),
  GMAIL_AUTH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_AUTH_TIMEOUT_MS),
  GMAIL_OAUTH_PORT: z.coerce.number().int().min(0).max(65535).default(0),
  GMAIL_NO_BROWSER: booleanFlag,
});

/**
 * Parse server config from environment variables.
 * Throws ConfigError listing every problem found.
 */
export function getServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 && !issue.message.includes(String(issue.path[0]))
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    );
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  return {
    credentialsPath: parsed.data.GMAIL_CREDENTIALS_FILE,
    tokenPath: parsed.data.GMAIL_TOKEN_FILE,
    authTimeoutMs: parsed.data.GMAIL_AUTH_TIMEOUT_MS,
    oauthPort: parsed.data.GMAIL_OAUTH_PORT,
    openBrowser: !parsed.data.GMAIL_NO_BROWSER,
  };
}
