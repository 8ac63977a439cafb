// src/errorHelpers.ts - Error taxonomy and handling utilities
import { UserError } from 'fastmcp';

export type GmailMcpErrorKind = 'ConfigError' | 'AuthError' | 'ValidationError' | 'RemoteError';

/**
 * Base class for every error this server raises on purpose.
 * `kind` survives serialization where `instanceof` does not.
 */
export abstract class GmailMcpError extends Error {
  abstract readonly kind: GmailMcpErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed configuration; fatal at startup */
export class ConfigError extends GmailMcpError {
  readonly kind = 'ConfigError';
}

/** Consent denied, timed out, or token refresh/exchange failed */
export class AuthError extends GmailMcpError {
  readonly kind = 'AuthError';
}

/** Caller-supplied arguments rejected before any remote call */
export class ValidationError extends GmailMcpError {
  readonly kind = 'ValidationError';
}

/** Gmail API transport or HTTP failure */
export class RemoteError extends GmailMcpError {
  readonly kind = 'RemoteError';
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/**
 * Google API error structure (from gaxios)
 */
export interface GoogleApiError extends Error {
  code?: number | string;
  status?: number;
  errors?: { message: string; domain: string; reason: string }[];
  response?: {
    data?: unknown;
    status?: number;
    statusText?: string;
  };
}

/**
 * Type guard for errors with a message property
 */
export function isErrorWithMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof (error as { message: unknown }).message === 'string'
  );
}

/**
 * Type guard for Google API errors with code/status
 */
export function isGoogleApiError(error: unknown): error is GoogleApiError {
  return isErrorWithMessage(error) && error instanceof Error;
}

/** Type guard for Node.js file system errors */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Get error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return String(error);
}

/**
 * HTTP status of a failed Google API call, if the error carries one
 */
export function getHttpStatus(error: unknown): number | undefined {
  if (!isGoogleApiError(error)) return undefined;
  if (typeof error.response?.status === 'number') return error.response.status;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.code === 'number') return error.code;
  return undefined;
}

/**
 * True for token-endpoint failures that google-auth-library raises while
 * refreshing inside an API call: a revoked grant or no refresh token at all.
 */
export function isCredentialError(error: unknown): boolean {
  if (!isGoogleApiError(error)) return false;
  const data = error.response?.data;
  if (typeof data === 'object' && data !== null && 'error' in data && data.error === 'invalid_grant') {
    return true;
  }
  return error.message === 'No refresh token is set.';
}

/**
 * Get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (!isGoogleApiError(error)) {
    return { message: getErrorMessage(error) };
  }

  return {
    message: error.message,
    code: error.code,
    status: getHttpStatus(error),
    errors: error.errors,
    response: error.response?.data,
  };
}

/**
 * Wrap a failed Gmail API call. Errors already in the taxonomy pass through.
 */
export function toRemoteError(operation: string, error: unknown): GmailMcpError {
  if (error instanceof GmailMcpError) return error;
  const status = getHttpStatus(error);
  const suffix = status !== undefined ? ` (HTTP ${status})` : '';
  return new RemoteError(`${operation} failed: ${getErrorMessage(error)}${suffix}`, {
    cause: error,
    status,
  });
}

/**
 * Format error for tool response
 */
export function formatToolError(toolName: string, error: unknown): string {
  if (error instanceof GmailMcpError) {
    return `${toolName} error: ${error.kind}: ${error.message}`;
  }
  return `${toolName} error: ${getErrorMessage(error)}`;
}

/**
 * Convert any failure into FastMCP's client-facing error, which the runtime
 * reports as an `isError` tool result
 */
export function toUserError(toolName: string, error: unknown): UserError {
  return new UserError(formatToolError(toolName, error));
}
