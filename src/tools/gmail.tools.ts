// gmail.tools.ts - Gmail resource and tool module
import type { Context } from 'fastmcp';
import { formatToolError, getErrorDetails, toUserError } from '../errorHelpers.js';
import { type MailClient } from '../gmailClient.js';
import {
  DEFAULT_RESULT_LIMIT,
  type FastMCPServer,
  type FastMCPSessionAuth,
  type MessageSummary,
  type SearchEmailsArgs,
  SearchEmailsParameters,
} from '../types.js';

export const RECENT_INBOX_URI = 'mail://inbox/recent';
export const SEARCH_EMAILS_TOOL = 'search_emails';

type ToolLog = Pick<Context<FastMCPSessionAuth>['log'], 'info'>;

function serialize(summaries: MessageSummary[]): string {
  return JSON.stringify(summaries, null, 2);
}

/** Body of a read of the recent-inbox resource */
export async function readRecentInbox(mail: MailClient): Promise<string> {
  return serialize(await mail.listRecent(DEFAULT_RESULT_LIMIT));
}

/** Body of a search_emails call */
export async function searchEmails(mail: MailClient, args: SearchEmailsArgs): Promise<string> {
  return serialize(await mail.search(args.query, args.max_results));
}

export function registerGmailTools(server: FastMCPServer, mail: MailClient) {
  // --- Recent inbox ---
  server.addResource({
    uri: RECENT_INBOX_URI,
    name: 'Recent Gmail Messages',
    description: 'The ten most recent emails in your Gmail inbox',
    mimeType: 'application/json',
    async load() {
      try {
        return { text: await readRecentInbox(mail) };
      } catch (error: unknown) {
        console.error(`Failed to read ${RECENT_INBOX_URI}:`, getErrorDetails(error));
        throw new Error(formatToolError(RECENT_INBOX_URI, error));
      }
    },
  });

  // --- Search ---
  server.addTool(searchEmailsTool(mail));
}

/** search_emails definition; errors reach the client as an error result */
export function searchEmailsTool(mail: MailClient) {
  return {
    name: SEARCH_EMAILS_TOOL,
    description:
      'Search Gmail emails with a query (Gmail search syntax: from:, to:, subject:, has:attachment, is:unread, etc.). Returns id, sender, subject, date and snippet of each match, newest first.',
    annotations: {
      title: 'Search Gmail',
      readOnlyHint: true,
      openWorldHint: true,
    },
    parameters: SearchEmailsParameters,
    async execute(args: SearchEmailsArgs, { log }: { log: ToolLog }): Promise<string> {
      try {
        log.info('Searching Gmail', { query: args.query, max_results: args.max_results });
        return await searchEmails(mail, args);
      } catch (error: unknown) {
        console.error(`${SEARCH_EMAILS_TOOL} failed:`, getErrorDetails(error));
        throw toUserError(SEARCH_EMAILS_TOOL, error);
      }
    },
  };
}
