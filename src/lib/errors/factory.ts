import {
  AccountDoesNotExistError,
  AcmeError,
  BadCSRError,
  BadNonceError,
  BadSignatureAlgorithmError,
  CompoundError,
  MalformedError,
  OrderNotReadyError,
  RateLimitedError,
  RejectedIdentifierError,
  ServerInternalError,
  UnauthorizedError,
  UnsupportedIdentifierError,
  UserActionRequiredError,
} from './acme-server-errors.js';
import { ACME_ERROR } from './codes.js';
import { isJsonObject } from '../utils/json.js';

type Ctor = new (detail?: string, status?: number) => AcmeError;

const FACTORY: Partial<Record<string, Ctor>> = {
  [ACME_ERROR.accountDoesNotExist]: AccountDoesNotExistError,
  [ACME_ERROR.badCSR]: BadCSRError,
  [ACME_ERROR.badNonce]: BadNonceError,
  [ACME_ERROR.compound]: CompoundError,
  [ACME_ERROR.malformed]: MalformedError,
  [ACME_ERROR.orderNotReady]: OrderNotReadyError,
  [ACME_ERROR.rejectedIdentifier]: RejectedIdentifierError,
  [ACME_ERROR.serverInternal]: ServerInternalError,
  [ACME_ERROR.unauthorized]: UnauthorizedError,
  [ACME_ERROR.unsupportedIdentifier]: UnsupportedIdentifierError,
};

/** RFC 7807 problem document as sent by ACME servers */
export interface ProblemDocument {
  type?: string;
  detail?: string;
  title?: string;
  status?: number;
  instance?: string;
  algorithms?: string[];
  retryAfter?: string | number;
  subproblems?: unknown[];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Narrow an arbitrary JSON value to a problem document.
 *
 * Anything that is an object with a string `type` or `detail` qualifies; other
 * fields are kept only when they have the expected type.
 */
export function toProblemDocument(value: unknown): ProblemDocument | undefined {
  if (!isJsonObject(value)) {
    return undefined;
  }

  const raw = value;
  const type = optionalString(raw.type);
  const detail = optionalString(raw.detail);
  if (type === undefined && detail === undefined) {
    return undefined;
  }

  const problem: ProblemDocument = { type, detail };
  problem.title = optionalString(raw.title);
  problem.instance = optionalString(raw.instance);
  if (typeof raw.status === 'number') problem.status = raw.status;
  if (Array.isArray(raw.algorithms)) {
    problem.algorithms = raw.algorithms.filter((a): a is string => typeof a === 'string');
  }
  if (typeof raw.retryAfter === 'string' || typeof raw.retryAfter === 'number') {
    problem.retryAfter = raw.retryAfter;
  }
  if (Array.isArray(raw.subproblems)) problem.subproblems = raw.subproblems;

  return problem;
}

/**
 * Build the typed {@link AcmeError} for a problem document.
 *
 * @param problem - Parsed JSON body of an error response
 * @param fallbackStatus - HTTP status to use when the document carries none
 */
export function createErrorFromProblem(problem: unknown, fallbackStatus?: number): AcmeError {
  const p = toProblemDocument(problem);
  if (!p) {
    return new AcmeError('Unknown error shape', fallbackStatus);
  }

  const type = p.type ?? ACME_ERROR.serverInternal;
  const detail = p.detail ?? p.title ?? 'Unknown error';
  const status = p.status ?? fallbackStatus;

  let err: AcmeError;
  if (type === ACME_ERROR.badSignatureAlgorithm) {
    err = new BadSignatureAlgorithmError(detail, status, p.algorithms);
  } else if (type === ACME_ERROR.rateLimited) {
    const retryAfter = p.retryAfter !== undefined ? new Date(p.retryAfter) : undefined;
    err = new RateLimitedError(detail, status ?? 429, retryAfter);
  } else if (type === ACME_ERROR.userActionRequired) {
    err = new UserActionRequiredError(detail, status ?? 403, p.instance);
  } else {
    const ctor = FACTORY[type];
    err = ctor ? new ctor(detail, status) : new AcmeError(detail, status, { type });
    err.instance = p.instance;
  }

  for (const sub of p.subproblems ?? []) {
    err.addSubproblem(createErrorFromProblem(sub));
  }

  return err;
}
