/**
 * ACME order, authorization and challenge resources (RFC 8555 Section 7.1)
 */

import type {
  AcmeAuthorizationStatus,
  AcmeChallengeStatus,
  AcmeOrderStatus,
} from './status.js';

export type {
  AcmeAuthorizationStatus,
  AcmeChallengeStatus,
  AcmeChallengeType,
  AcmeOrderStatus,
} from './status.js';

export interface AcmeIdentifier {
  /** Identifier type; this client only ever requests 'dns' */
  type: string;
  /** The domain name */
  value: string;
}

export interface AcmeChallenge {
  /** Challenge type, e.g. 'http-01' or 'tls-alpn-01' */
  type: string;
  /** URL the client posts to in order to trigger validation */
  url: string;
  status: AcmeChallengeStatus;
  /** Absent for challenge types that carry no token */
  token?: string;
  validated?: string;
  /** Problem document describing why validation failed */
  error?: unknown;
}

export interface AcmeAuthorization {
  identifier: AcmeIdentifier;
  status: AcmeAuthorizationStatus;
  expires?: string;
  challenges: AcmeChallenge[];
  wildcard?: boolean;
}

export interface AcmeOrder {
  status: AcmeOrderStatus;
  expires?: string;
  identifiers: AcmeIdentifier[];
  /** Authorization URLs, in the order the CA listed them */
  authorizations: string[];
  /** URL the CSR is submitted to once the order is ready */
  finalize: string;
  /** Certificate URL, present once the order is valid */
  certificate?: string;
  /** Order URL taken from the Location header, when the CA sent one */
  url?: string;
  error?: unknown;
}
