/**
 * ACME Directory (RFC 8555 Section 7.1.1)
 *
 * Every value is an absolute URL published by the CA. Clients use them as
 * opaque strings; no endpoint is ever derived by concatenating paths.
 */
export interface AcmeDirectory {
  /** URL for new nonce requests (RFC 8555 Section 7.2) */
  readonly newNonce: string;

  /** URL for new account registration (RFC 8555 Section 7.3) */
  readonly newAccount: string;

  /** URL for new order creation (RFC 8555 Section 7.4) */
  readonly newOrder: string;

  /** URL for pre-authorization (optional, RFC 8555 Section 7.4.1) */
  readonly newAuthz?: string;

  /** URL for certificate revocation (RFC 8555 Section 7.6) */
  readonly revokeCert?: string;

  /** URL for key change operations (RFC 8555 Section 7.3.5) */
  readonly keyChange?: string;

  readonly meta?: AcmeDirectoryMeta;
}

export interface AcmeDirectoryMeta {
  readonly termsOfService?: string;
  readonly website?: string;
  readonly caaIdentities?: readonly string[];
  readonly externalAccountRequired?: boolean;
}
