import { describe, it, expect } from '@jest/globals';
import {
  createErrorFromProblem,
  toProblemDocument,
  BadNonceError,
  BadSignatureAlgorithmError,
  RateLimitedError,
  UserActionRequiredError,
  AcmeError,
  ACME_ERROR,
  isAcmeErrorType,
} from '../../src/index.js';

describe('isAcmeErrorType', () => {
  it('recognises RFC 8555 error URNs', () => {
    expect(isAcmeErrorType('urn:ietf:params:acme:error:badNonce')).toBe(true);
    expect(Object.values(ACME_ERROR).every(isAcmeErrorType)).toBe(true);
  });

  it('rejects other URNs', () => {
    expect(isAcmeErrorType('urn:custom:unknown:error')).toBe(false);
    expect(isAcmeErrorType('badNonce')).toBe(false);
  });
});

describe('toProblemDocument', () => {
  it('accepts objects with a type or detail', () => {
    expect(toProblemDocument({ detail: 'only detail' })).toEqual({ detail: 'only detail' });
    expect(toProblemDocument({ type: ACME_ERROR.dns, status: 400, extra: true })).toEqual({
      type: ACME_ERROR.dns,
      status: 400,
    });
  });

  it('rejects everything else', () => {
    expect(toProblemDocument('oops')).toBeUndefined();
    expect(toProblemDocument([])).toBeUndefined();
    expect(toProblemDocument({ status: 500 })).toBeUndefined();
    expect(toProblemDocument(null)).toBeUndefined();
  });
});

describe('createErrorFromProblem', () => {
  it('creates specific error type', () => {
    const err = createErrorFromProblem({
      type: ACME_ERROR.badSignatureAlgorithm,
      detail: 'algo bad',
      status: 400,
      algorithms: ['ES256', 'RS256'],
    });
    expect(err).toBeInstanceOf(BadSignatureAlgorithmError);
    if (!(err instanceof BadSignatureAlgorithmError)) return;
    expect(err.algorithms).toEqual(['ES256', 'RS256']);
  });

  it('parses rate limited error with retryAfter', () => {
    const now = Date.parse('2026-10-18T08:00:00Z');
    const err = createErrorFromProblem({
      type: ACME_ERROR.rateLimited,
      detail: 'Too many',
      retryAfter: new Date(now + 5000).toISOString(),
    });
    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err.status).toBe(429);
    if (!(err instanceof RateLimitedError)) return;
    expect(err.getRetryAfterSeconds(now)).toBe(5);
  });

  it('keeps the instance URL of userActionRequired', () => {
    const err = createErrorFromProblem({
      type: ACME_ERROR.userActionRequired,
      detail: 'Terms of service have changed',
      instance: 'https://ca/acme/agreement',
    });
    expect(err).toBeInstanceOf(UserActionRequiredError);
    expect(err.status).toBe(403);
    expect(err.instance).toBe('https://ca/acme/agreement');
  });

  it('uses the HTTP status when the document has none', () => {
    const err = createErrorFromProblem({ type: ACME_ERROR.badNonce, detail: 'stale' }, 400);
    expect(err).toBeInstanceOf(BadNonceError);
    expect(err.status).toBe(400);
  });

  it('attaches subproblems recursively', () => {
    const err = createErrorFromProblem({
      type: ACME_ERROR.compound,
      detail: 'multiple',
      subproblems: [
        { type: ACME_ERROR.badCSR, detail: 'csr bad' },
        { type: ACME_ERROR.unauthorized, detail: 'no auth' },
      ],
    });
    expect(err.subproblems).toHaveLength(2);
    expect(err.subproblems?.map((e) => e.type)).toEqual([
      ACME_ERROR.badCSR,
      ACME_ERROR.unauthorized,
    ]);
  });

  it('falls back to generic AcmeError with unknown type', () => {
    const err = createErrorFromProblem({ type: 'urn:custom:unknown:error', detail: 'x' });
    expect(err).toBeInstanceOf(AcmeError);
    expect(err.type).toBe('urn:custom:unknown:error');
  });

  it('reports bodies that are not problem documents', () => {
    const err = createErrorFromProblem(['not', 'a', 'problem'], 502);
    expect(err.message).toBe('Unknown error shape');
    expect(err.status).toBe(502);
  });
});
