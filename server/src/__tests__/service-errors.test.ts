import { describe, it, expect } from 'vitest';
import { ResumeError } from '../lib/errors.js';
import { isConnectivityError, toServiceError } from '../lib/service-errors.js';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('isConnectivityError', () => {
  it('recognises errno codes on the error', () => {
    expect(isConnectivityError(withCode('boom', 'ECONNREFUSED'))).toBe(true);
    expect(isConnectivityError(withCode('boom', 'enotfound'))).toBe(true);
  });

  it('recognises errno codes on the cause', () => {
    const err = new TypeError('request aborted', { cause: withCode('x', 'ETIMEDOUT') });
    expect(isConnectivityError(err)).toBe(true);
  });

  it.each([
    'fetch failed',
    'Connection reset by peer',
    'Network is unreachable',
    'socket hang up',
    'getaddrinfo EAI_AGAIN llm.example.test',
  ])('recognises "%s"', (message) => {
    expect(isConnectivityError(new Error(message))).toBe(true);
  });

  it('does not flag HTTP errors from the service', () => {
    expect(isConnectivityError(new Error('OpenAI API error 429: rate limited'))).toBe(false);
    expect(isConnectivityError(withCode('bad', 'invalid_api_key'))).toBe(false);
  });

  it('handles non-Error values', () => {
    expect(isConnectivityError('network down')).toBe(true);
    expect(isConnectivityError(undefined)).toBe(false);
  });
});

describe('toServiceError', () => {
  it('passes ResumeErrors through unchanged', () => {
    const original = new ResumeError('already classified', 'parse');
    expect(toServiceError(original)).toBe(original);
  });

  it('wraps connectivity failures with the original as cause', () => {
    const cause = new TypeError('fetch failed');
    const err = toServiceError(cause);
    expect(err.code).toBe('connectivity');
    expect(err.message).toBe('Connection error: Check your internet connection and API key. Details: fetch failed');
    expect(err.cause).toBe(cause);
  });

  it('wraps everything else as a service error', () => {
    const err = toServiceError(new Error('OpenAI API error 500: upstream'));
    expect(err.code).toBe('service');
    expect(err.message).toBe('API error: OpenAI API error 500: upstream');
  });
});
