// src/types.ts
import { z } from 'zod';
import { type gmail_v1 } from 'googleapis';
import { type FastMCP } from 'fastmcp';

// --- FastMCP Server Types ---
// Session auth type - matches FastMCP's internal type
export type FastMCPSessionAuth = Record<string, unknown> | undefined;

// Common type for FastMCP server instance
export type FastMCPServer = FastMCP<FastMCPSessionAuth>;

// --- Google API Client Type Aliases ---
export type GmailClient = gmail_v1.Gmail;
export type GmailMessage = gmail_v1.Schema$Message;
export type GmailMessageHeader = gmail_v1.Schema$MessagePartHeader;

/**
 * The slice of `gmail.users.messages` the adapter calls.
 * `gmail_v1.Gmail['users']['messages']` satisfies it structurally.
 */
export interface GmailMessagesApi {
  list(
    params: gmail_v1.Params$Resource$Users$Messages$List
  ): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
  get(params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<{ data: GmailMessage }>;
}

// --- Mail Types ---

/** Normalized projection of a Gmail message */
export interface MessageSummary {
  id: string;
  threadId: string;
  from: string;
  subject: string;
  /** Raw `Date` header */
  date: string;
  /** ISO-8601 rendering of Gmail's internalDate, empty when unknown */
  receivedAt: string;
  snippet: string;
}

export const DEFAULT_RESULT_LIMIT = 10;
export const MAX_RESULT_LIMIT = 500;

// --- Zod Schema Fragments ---

export const SearchEmailsParameters = z.object({
  query: z
    .string()
    .min(1)
    .describe(
      'Gmail search query (same syntax as the Gmail search box, e.g. "from:alice is:unread").'
    ),
  max_results: z
    .number()
    .int()
    .min(1)
    .max(MAX_RESULT_LIMIT)
    .optional()
    .default(DEFAULT_RESULT_LIMIT)
    .describe(`Maximum number of results (default: ${DEFAULT_RESULT_LIMIT}).`),
});
export type SearchEmailsArgs = z.infer<typeof SearchEmailsParameters>;

// --- OAuth Credential Types ---

const OAuthClientConfigSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
  auth_uri: z.string().optional(),
  token_uri: z.string().optional(),
  project_id: z.string().optional(),
});

/** Google OAuth credentials file format (installed or web app) */
export const OAuthCredentialsFileSchema = z.object({
  installed: OAuthClientConfigSchema.optional(),
  web: OAuthClientConfigSchema.optional(),
});
export type OAuthCredentialsFile = z.infer<typeof OAuthCredentialsFileSchema>;

/** Parsed OAuth client secret with required fields */
export interface ClientSecret {
  clientId: string;
  clientSecret: string;
  redirectUris: string[];
  clientType: 'installed' | 'web';
}

// google-auth-library writes null for fields a token response left out
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);
const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

/** OAuth token storage format, as google-auth-library writes `Credentials` */
export const OAuthTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: optionalString,
  scope: optionalString,
  token_type: optionalString,
  expiry_date: optionalNumber,
  id_token: optionalString,
});
export type OAuthToken = z.infer<typeof OAuthTokenSchema>;
