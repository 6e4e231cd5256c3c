import { ACME_ERROR } from './codes.js';

/**
 * Problem reported by the CA (RFC 7807 problem document)
 *
 * Instances are never thrown on their own by the client; they travel as the
 * `problem` of a {@link ProtocolError} so callers keep the HTTP context.
 */
export class AcmeError extends Error {
  type: string;
  detail: string;
  status: number | undefined;
  instance: string | undefined;
  subproblems?: AcmeError[];

  constructor(
    detail: string,
    status?: number,
    opts?: { type?: string; instance?: string; cause?: unknown },
  ) {
    super(detail, { cause: opts?.cause });
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = new.target.name;
    this.detail = detail;
    this.status = status;
    this.type = opts?.type ?? ACME_ERROR.serverInternal;
    this.instance = opts?.instance;
  }

  toJSON(): Record<string, unknown> {
    const res: Record<string, unknown> = { type: this.type, detail: this.detail };

    if (this.status !== undefined) {
      res.status = this.status;
    }

    if (this.instance) {
      res.instance = this.instance;
    }

    if (this.subproblems?.length) {
      res.subproblems = this.subproblems.map((p) => p.toJSON());
    }

    return res;
  }

  addSubproblem(error: AcmeError): this {
    (this.subproblems ??= []).push(error);

    return this;
  }
}

export class AccountDoesNotExistError extends AcmeError {
  constructor(detail = 'The request specified an account that does not exist', status = 400) {
    super(detail, status, { type: ACME_ERROR.accountDoesNotExist });
  }
}

export class BadCSRError extends AcmeError {
  constructor(detail = 'The CSR is unacceptable', status = 400) {
    super(detail, status, { type: ACME_ERROR.badCSR });
  }
}

/**
 * The nonce in the protected header was stale, reused or empty.
 *
 * Re-invoking the failed step draws a fresh nonce, so this is always safe to retry.
 */
export class BadNonceError extends AcmeError {
  constructor(detail = 'The client sent an unacceptable anti-replay nonce', status = 400) {
    super(detail, status, { type: ACME_ERROR.badNonce });
  }
}

export class BadSignatureAlgorithmError extends AcmeError {
  readonly algorithms: string[] | undefined;

  constructor(
    detail = 'The JWS was signed with an algorithm the server does not support',
    status = 400,
    algorithms?: string[],
  ) {
    super(detail, status, { type: ACME_ERROR.badSignatureAlgorithm });
    this.algorithms = algorithms;
  }
}

export class CompoundError extends AcmeError {
  constructor(detail = 'Multiple errors occurred', status = 400) {
    super(detail, status, { type: ACME_ERROR.compound });
  }
}

export class MalformedError extends AcmeError {
  constructor(detail = 'The request message was malformed', status = 400) {
    super(detail, status, { type: ACME_ERROR.malformed });
  }
}

export class OrderNotReadyError extends AcmeError {
  constructor(detail = 'The order is not ready to be finalized', status = 403) {
    super(detail, status, { type: ACME_ERROR.orderNotReady });
  }
}

export class RateLimitedError extends AcmeError {
  readonly retryAfter: Date | undefined;

  constructor(detail = 'The request exceeds a rate limit', status = 429, retryAfter?: Date) {
    super(detail, status, { type: ACME_ERROR.rateLimited });
    this.retryAfter = retryAfter;
  }

  /** Seconds until the CA accepts requests again, or undefined when it did not say */
  getRetryAfterSeconds(now = Date.now()): number | undefined {
    if (!this.retryAfter) return undefined;
    return Math.max(0, Math.ceil((this.retryAfter.getTime() - now) / 1000));
  }
}

export class RejectedIdentifierError extends AcmeError {
  constructor(detail = 'The server will not issue certificates for the identifier', status = 400) {
    super(detail, status, { type: ACME_ERROR.rejectedIdentifier });
  }
}

export class ServerInternalError extends AcmeError {
  constructor(detail = 'The server experienced an internal error', status = 500) {
    super(detail, status, { type: ACME_ERROR.serverInternal });
  }
}

export class UnauthorizedError extends AcmeError {
  constructor(detail = 'The client lacks sufficient authorization', status = 403) {
    super(detail, status, { type: ACME_ERROR.unauthorized });
  }
}

export class UnsupportedIdentifierError extends AcmeError {
  constructor(detail = 'An identifier is of an unsupported type', status = 400) {
    super(detail, status, { type: ACME_ERROR.unsupportedIdentifier });
  }
}

export class UserActionRequiredError extends AcmeError {
  constructor(
    detail = 'Visit the instance URL and take the actions specified there',
    status = 403,
    instance?: string,
  ) {
    super(detail, status, { type: ACME_ERROR.userActionRequired, instance });
  }
}
