// src/gmailClient.ts
// Read-only calls over the Gmail REST API, mapped to MessageSummary.

import {
  AuthError,
  RemoteError,
  ValidationError,
  getErrorMessage,
  isCredentialError,
  toRemoteError,
} from './errorHelpers.js';
import {
  DEFAULT_RESULT_LIMIT,
  MAX_RESULT_LIMIT,
  type GmailMessage,
  type GmailMessageHeader,
  type GmailMessagesApi,
  type MessageSummary,
} from './types.js';

const METADATA_HEADERS = ['From', 'Subject', 'Date'];

function findHeader(headers: GmailMessageHeader[], name: string): string {
  const lower = name.toLowerCase();
  return headers.find((h) => h.name?.toLowerCase() === lower)?.value ?? '';
}

function receivedAtMillis(message: GmailMessage): number {
  const millis = Number(message.internalDate);
  return Number.isFinite(millis) ? millis : 0;
}

/**
 * Map a Gmail message to a summary. Missing fields become empty strings.
 */
export function toMessageSummary(message: GmailMessage): MessageSummary {
  const headers = message.payload?.headers ?? [];
  const millis = receivedAtMillis(message);
  return {
    id: message.id ?? '',
    threadId: message.threadId ?? '',
    from: findHeader(headers, 'From'),
    subject: findHeader(headers, 'Subject'),
    date: findHeader(headers, 'Date'),
    receivedAt: millis > 0 ? new Date(millis).toISOString() : '',
    snippet: message.snippet ?? '',
  };
}

function validateLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_RESULT_LIMIT) {
    throw new ValidationError(
      `Result limit must be an integer between 1 and ${MAX_RESULT_LIMIT}, got ${limit}.`
    );
  }
}

export interface MailClientOptions {
  /** Resolves the authenticated messages API; AuthError passes through */
  getMessagesApi: () => Promise<GmailMessagesApi>;
  /** Called on a 401 or a failed token refresh, so the caller can drop its credentials */
  onUnauthorized?: () => void;
}

/**
 * Mail client adapter. Every call goes to Gmail; nothing is cached.
 */
export class MailClient {
  private readonly options: MailClientOptions;

  constructor(options: MailClientOptions) {
    this.options = options;
  }

  /**
   * The `limit` most recent inbox messages, newest first.
   */
  async listRecent(limit: number = DEFAULT_RESULT_LIMIT): Promise<MessageSummary[]> {
    validateLimit(limit);
    return this.fetchSummaries('List inbox messages', { labelIds: ['INBOX'] }, limit);
  }

  /**
   * Messages matching a Gmail search query, newest first. The query is passed
   * to Gmail as-is.
   */
  async search(query: string, limit: number = DEFAULT_RESULT_LIMIT): Promise<MessageSummary[]> {
    if (query.trim().length === 0) {
      throw new ValidationError('Search query must not be empty.');
    }
    validateLimit(limit);
    return this.fetchSummaries('Search messages', { q: query }, limit);
  }

  private async fetchSummaries(
    operation: string,
    filter: { labelIds?: string[]; q?: string },
    limit: number
  ): Promise<MessageSummary[]> {
    const messages = await this.options.getMessagesApi();

    try {
      const listResponse = await messages.list({ userId: 'me', maxResults: limit, ...filter });
      const ids = (listResponse.data.messages ?? [])
        .map((m) => m.id)
        .filter((id): id is string => Boolean(id));

      // Any failed detail fetch fails the whole call: no partial lists
      const details = await Promise.all(
        ids.map(async (id) => {
          const response = await messages.get({
            userId: 'me',
            id,
            format: 'metadata',
            metadataHeaders: METADATA_HEADERS,
          });
          return response.data;
        })
      );

      return details
        .sort((a, b) => receivedAtMillis(b) - receivedAtMillis(a))
        .slice(0, limit)
        .map(toMessageSummary);
    } catch (error: unknown) {
      if (isCredentialError(error)) {
        this.options.onUnauthorized?.();
        throw new AuthError(
          `${operation} failed: Gmail credentials are no longer valid (${getErrorMessage(error)}).`,
          { cause: error }
        );
      }
      const remoteError = toRemoteError(operation, error);
      if (remoteError instanceof RemoteError && remoteError.status === 401) {
        this.options.onUnauthorized?.();
      }
      throw remoteError;
    }
  }
}
