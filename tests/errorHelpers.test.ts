import { describe, it, expect } from 'vitest';
import { UserError } from 'fastmcp';
import {
  isCredentialError,
  AuthError,
  ConfigError,
  RemoteError,
  ValidationError,
  formatToolError,
  getHttpStatus,
  toRemoteError,
  toUserError,
} from '../src/errorHelpers.js';
import { httpError } from './helpers/fakeGmail.js';

describe('error taxonomy', () => {
  it.each([
    [new ConfigError('x'), 'ConfigError'],
    [new AuthError('x'), 'AuthError'],
    [new ValidationError('x'), 'ValidationError'],
    [new RemoteError('x'), 'RemoteError'],
  ])('%s carries its kind and name', (error, kind) => {
    expect(error.kind).toBe(kind);
    expect(error.name).toBe(kind);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('getHttpStatus', () => {
  it('reads the response status of a gaxios-style error', () => {
    expect(getHttpStatus(httpError(503, 'Service Unavailable'))).toBe(503);
  });

  it('falls back to a numeric code', () => {
    expect(getHttpStatus(Object.assign(new Error('x'), { code: 404 }))).toBe(404);
  });

  it('ignores string codes and non-errors', () => {
    expect(getHttpStatus(Object.assign(new Error('x'), { code: 'ECONNRESET' }))).toBeUndefined();
    expect(getHttpStatus('boom')).toBeUndefined();
  });
});

describe('isCredentialError', () => {
  it('recognizes a revoked grant from the token endpoint', () => {
    const error = Object.assign(new Error('invalid_grant'), {
      response: { status: 400, data: { error: 'invalid_grant' } },
    });
    expect(isCredentialError(error)).toBe(true);
  });

  it('recognizes a client with no refresh token', () => {
    expect(isCredentialError(new Error('No refresh token is set.'))).toBe(true);
  });

  it('leaves ordinary API failures alone', () => {
    expect(isCredentialError(httpError(400, 'Invalid query'))).toBe(false);
    expect(isCredentialError(httpError(401, 'Invalid Credentials'))).toBe(false);
    expect(isCredentialError('invalid_grant')).toBe(false);
  });
});

describe('toRemoteError', () => {
  it('wraps API failures with the HTTP status', () => {
    const cause = httpError(500, 'Backend Error');
    const error = toRemoteError('List inbox messages', cause);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error.message).toBe('List inbox messages failed: Backend Error (HTTP 500)');
    expect(error).toHaveProperty('status', 500);
    expect(error.cause).toBe(cause);
  });

  it('wraps transport failures without a status', () => {
    const error = toRemoteError('Search messages', new Error('getaddrinfo ENOTFOUND gmail.googleapis.com'));

    expect(error.message).toBe('Search messages failed: getaddrinfo ENOTFOUND gmail.googleapis.com');
    expect(error).toHaveProperty('status', undefined);
  });

  it('passes errors from the taxonomy through', () => {
    const authError = new AuthError('Token refresh failed');
    expect(toRemoteError('Search messages', authError)).toBe(authError);
  });
});

describe('formatToolError / toUserError', () => {
  it('prefixes the kind of taxonomy errors', () => {
    expect(formatToolError('search_emails', new ValidationError('Search query must not be empty.'))).toBe(
      'search_emails error: ValidationError: Search query must not be empty.'
    );
  });

  it('formats unknown errors by message', () => {
    expect(formatToolError('search_emails', 'plain failure')).toBe('search_emails error: plain failure');
  });

  it('produces a FastMCP UserError', () => {
    const error = toUserError('search_emails', new RemoteError('Search messages failed: Backend Error (HTTP 500)'));

    expect(error).toBeInstanceOf(UserError);
    expect(error.message).toBe(
      'search_emails error: RemoteError: Search messages failed: Backend Error (HTTP 500)'
    );
  });
});
