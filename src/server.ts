// src/server.ts - Gmail MCP Server
import { FastMCP } from 'fastmcp';
import { GmailAuthSession, createGoogleOAuthFlow, openBrowser } from './auth.js';
import { type ServerConfig } from './config.js';
import { loadClientSecret } from './credentialStore.js';
import { getErrorMessage } from './errorHelpers.js';
import { MailClient } from './gmailClient.js';
import { registerGmailTools } from './tools/gmail.tools.js';
import { type FastMCPServer } from './types.js';

/**
 * Build the server. Fails with ConfigError when the client secret cannot be
 * loaded; authentication itself waits for the first request.
 */
export async function createGmailServer(config: ServerConfig): Promise<FastMCPServer> {
  const clientSecret = await loadClientSecret(config.credentialsPath);

  const session = new GmailAuthSession({
    clientSecret,
    tokenPath: config.tokenPath,
    flow: createGoogleOAuthFlow(clientSecret, {
      port: config.oauthPort,
      timeoutMs: config.authTimeoutMs,
      openBrowser: config.openBrowser ? openBrowser : undefined,
    }),
  });

  const mail = new MailClient({
    getMessagesApi: async () => (await session.getGmailClient()).users.messages,
    onUnauthorized: () => session.reset(),
  });

  const server: FastMCPServer = new FastMCP({
    name: 'gmail-mcp-server',
    version: '0.1.0',
  });

  registerGmailTools(server, mail);

  return server;
}

// --- Server Startup ---
export async function startServer(config: ServerConfig): Promise<void> {
  // Set up process-level unhandled error/rejection handlers to prevent crashes
  process.on('uncaughtException', (error) => {
    console.error('Uncaught Exception:', error);
  });

  process.on('unhandledRejection', (reason, _promise) => {
    console.error('Unhandled Promise Rejection:', reason);
  });

  try {
    const server = await createGmailServer(config);

    console.error('Starting Gmail MCP server...');
    await server.start({ transportType: 'stdio' });
    console.error('MCP Server running using stdio. Awaiting client connection...');
  } catch (startError: unknown) {
    console.error('FATAL: Server failed to start:', getErrorMessage(startError));
    process.exit(1);
  }
}
