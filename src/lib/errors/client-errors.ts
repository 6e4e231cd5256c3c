/**
 * Client-side error taxonomy
 *
 * Every failure leaving the client is one of four kinds:
 *
 * - {@link TransportError} - the request never produced a response (DNS, TCP, TLS, timeout)
 * - {@link ProtocolError} - the CA answered, but not with what the step requires
 *   (non-2xx status, missing Location header, ...)
 * - {@link DecodeError} - the body is not JSON or does not have the expected shape
 * - {@link SigningError} - the JWS envelope could not be produced
 *
 * Server problem documents ride along on {@link ProtocolError.problem} as typed
 * {@link AcmeError} instances.
 */

import { AcmeError, BadNonceError } from './acme-server-errors.js';

export type AcmeClientErrorKind = 'transport' | 'protocol' | 'decode' | 'signing';

export abstract class AcmeClientError extends Error {
  abstract readonly kind: AcmeClientErrorKind;

  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class TransportError extends AcmeClientError {
  readonly kind = 'transport';

  static fromCause(operation: string, url: string, cause: unknown): TransportError {
    return new TransportError(`${operation}: ${describeCause(cause)}`, { operation, url }, { cause });
  }
}

export class ProtocolError extends AcmeClientError {
  readonly kind = 'protocol';

  /** HTTP status of the offending response, when there was one */
  readonly statusCode: number | undefined;
  /** Problem document sent by the CA, when the body was one */
  readonly problem: AcmeError | undefined;

  constructor(
    message: string,
    context: Record<string, unknown> & { statusCode?: number; problem?: AcmeError } = {},
  ) {
    super(message, context, context.problem ? { cause: context.problem } : undefined);
    this.statusCode = context.statusCode;
    this.problem = context.problem;
  }

  static unexpectedStatus(
    operation: string,
    url: string,
    statusCode: number,
    problem?: AcmeError,
  ): ProtocolError {
    const suffix = problem ? ` (${problem.type}: ${problem.detail})` : '';
    return new ProtocolError(`${operation}: status = ${statusCode}${suffix}`, {
      operation,
      url,
      statusCode,
      problem,
    });
  }

  static missingHeader(operation: string, url: string, header: string): ProtocolError {
    return new ProtocolError(`${operation}: response has no ${header} header`, {
      operation,
      url,
      missing: header,
    });
  }

  static emptyIdentifiers(): ProtocolError {
    return new ProtocolError('new order requires at least one domain', { missing: 'domains' });
  }

  /** True when the CA rejected the request's anti-replay nonce */
  isBadNonce(): boolean {
    return this.problem instanceof BadNonceError;
  }
}

export class DecodeError extends AcmeClientError {
  readonly kind = 'decode';

  static invalidJson(operation: string, url: string, cause: unknown): DecodeError {
    return new DecodeError(
      `${operation}: response body is not valid JSON (${describeCause(cause)})`,
      { operation, url },
      { cause },
    );
  }

  static invalidShape(resource: string, field: string, expected: string): DecodeError {
    return new DecodeError(`invalid ${resource}: "${field}" must be ${expected}`, {
      resource,
      field,
      expected,
    });
  }
}

export class SigningError extends AcmeClientError {
  readonly kind = 'signing';

  static fromCause(url: string, cause: unknown): SigningError {
    return new SigningError(`failed to sign request for ${url}: ${describeCause(cause)}`, { url }, {
      cause,
    });
  }
}

export function isAcmeClientError(error: unknown): error is AcmeClientError {
  return error instanceof AcmeClientError;
}
