/**
 * ACME error type URNs (RFC 8555 Section 6.7)
 *
 * CAs report failures as RFC 7807 problem documents whose `type` field carries
 * one of these URNs.
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-6.7 | RFC 8555 Section 6.7 - Errors}
 */

const prefix = 'urn:ietf:params:acme:error:';

export const ACME_ERROR = {
  /** The request specified an account that does not exist */
  accountDoesNotExist: `${prefix}accountDoesNotExist`,
  /** The CSR is unacceptable (e.g., due to a short key) */
  badCSR: `${prefix}badCSR`,
  /** The client sent an unacceptable anti-replay nonce */
  badNonce: `${prefix}badNonce`,
  /** The JWS was signed by a public key the server does not support */
  badPublicKey: `${prefix}badPublicKey`,
  /** The JWS was signed with an algorithm the server does not support */
  badSignatureAlgorithm: `${prefix}badSignatureAlgorithm`,
  /** Certification Authority Authorization (CAA) records forbid issuance */
  caa: `${prefix}caa`,
  /** Specific error conditions are indicated in the "subproblems" array */
  compound: `${prefix}compound`,
  /** The server could not connect to the validation target */
  connection: `${prefix}connection`,
  /** There was a problem with a DNS query during identifier validation */
  dns: `${prefix}dns`,
  /** The request must include a value for the "externalAccountBinding" field */
  externalAccountRequired: `${prefix}externalAccountRequired`,
  /** Response received didn't match the challenge's requirements */
  incorrectResponse: `${prefix}incorrectResponse`,
  /** A contact URL for an account was invalid */
  invalidContact: `${prefix}invalidContact`,
  /** The request message was malformed */
  malformed: `${prefix}malformed`,
  /** The request attempted to finalize an order that is not ready */
  orderNotReady: `${prefix}orderNotReady`,
  /** The request exceeds a rate limit */
  rateLimited: `${prefix}rateLimited`,
  /** The server will not issue certificates for the identifier */
  rejectedIdentifier: `${prefix}rejectedIdentifier`,
  /** The server experienced an internal error */
  serverInternal: `${prefix}serverInternal`,
  /** The server received a TLS error during validation */
  tls: `${prefix}tls`,
  /** The client lacks sufficient authorization */
  unauthorized: `${prefix}unauthorized`,
  /** An identifier is of an unsupported type */
  unsupportedIdentifier: `${prefix}unsupportedIdentifier`,
  /** Visit the "instance" URL and take actions specified there */
  userActionRequired: `${prefix}userActionRequired`,
} as const;

export type AcmeErrorType = (typeof ACME_ERROR)[keyof typeof ACME_ERROR];

export function isAcmeErrorType(value: string): value is AcmeErrorType {
  return Object.values<string>(ACME_ERROR).includes(value);
}
