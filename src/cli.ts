#!/usr/bin/env node
// src/cli.ts - CLI entrypoint for the Gmail MCP Server
import 'dotenv/config';
import { Command } from 'commander';
import * as fs from 'fs/promises';
import { z } from 'zod';
import { createGoogleOAuthFlow, isTokenExpired, openBrowser } from './auth.js';
import { type ServerConfig, getServerConfigFromEnv } from './config.js';
import { loadCachedToken, loadClientSecret, saveToken } from './credentialStore.js';
import { getErrorMessage } from './errorHelpers.js';
import { startServer } from './server.js';

const PackageJsonSchema = z.object({ version: z.string() });

interface GlobalOptions {
  credentials?: string;
  token?: string;
}

const program = new Command();

// Version from package.json
const packageJsonPath = new URL('../package.json', import.meta.url);
const packageJson = PackageJsonSchema.parse(JSON.parse(await fs.readFile(packageJsonPath, 'utf8')));

/** Environment config with the global path flags applied on top */
function resolveConfig(): ServerConfig {
  const options = program.opts<GlobalOptions>();
  if (options.credentials) process.env.GMAIL_CREDENTIALS_FILE = options.credentials;
  if (options.token) process.env.GMAIL_TOKEN_FILE = options.token;
  return getServerConfigFromEnv();
}

function fail(error: unknown): never {
  console.error(`Error: ${getErrorMessage(error)}`);
  process.exit(1);
}

program
  .name('gmail-inbox-mcp')
  .description('Gmail MCP Server - read-only access to recent and searched Gmail messages')
  .version(packageJson.version)
  .option('--credentials <path>', 'OAuth client JSON (overrides GMAIL_CREDENTIALS_FILE)')
  .option('--token <path>', 'Token cache file (overrides GMAIL_TOKEN_FILE)');

// === MCP Server Command ===
program
  .command('serve', { isDefault: true })
  .alias('mcp')
  .description('Start the MCP server on stdio (for use with Claude Desktop, VS Code, etc.)')
  .action(async () => {
    let config: ServerConfig;
    try {
      config = resolveConfig();
    } catch (error: unknown) {
      fail(error);
    }
    await startServer(config);
  });

// === Auth Command ===
program
  .command('auth')
  .description('Run the browser consent flow now and save the token')
  .action(async () => {
    try {
      const config = resolveConfig();
      const clientSecret = await loadClientSecret(config.credentialsPath);
      const flow = createGoogleOAuthFlow(clientSecret, {
        port: config.oauthPort,
        timeoutMs: config.authTimeoutMs,
        openBrowser: config.openBrowser ? openBrowser : undefined,
      });

      console.log('\n=== Gmail MCP Authentication (READ-ONLY) ===\n');
      console.log('This will grant READ-ONLY access to Gmail.');
      console.log('No ability to send, modify, or delete emails.\n');

      const token = await flow.authorize();
      if (!(await saveToken(config.tokenPath, token))) {
        fail(new Error(`Could not write token file ${config.tokenPath}`));
      }
      console.log('\n✓ Authentication successful!');
      console.log('You can now use the Gmail MCP server.\n');
    } catch (error: unknown) {
      fail(error);
    }
  });

// === Status Command ===
program
  .command('status')
  .description('Show configured paths and whether the cached token is usable')
  .action(async () => {
    try {
      const config = resolveConfig();
      console.log('🔑 Credentials file:', config.credentialsPath);
      console.log('📁 Token file:', config.tokenPath);

      await loadClientSecret(config.credentialsPath);
      console.log('✅ Credentials file is valid');

      const token = await loadCachedToken(config.tokenPath);
      if (!token) {
        console.log('❌ No cached token. Run: gmail-inbox-mcp auth');
        return;
      }

      const expiry =
        token.expiry_date !== undefined ? new Date(token.expiry_date).toISOString() : 'unknown';
      if (isTokenExpired(token, Date.now())) {
        console.log(
          token.refresh_token
            ? `⚠️  Access token expired at ${expiry}; it will be refreshed on next use`
            : `❌ Access token expired at ${expiry} and there is no refresh token. Run: gmail-inbox-mcp auth`
        );
      } else {
        console.log(`✅ Access token valid until ${expiry}`);
      }
    } catch (error: unknown) {
      fail(error);
    }
  });

await program.parseAsync(process.argv);
