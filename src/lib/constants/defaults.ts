/**
 * Default configuration constants for acme-conductor
 *
 * Centralized defaults for the HTTP transport and the fixed protocol payloads.
 */

// HTTP transport defaults (undici), in milliseconds
export const HTTP_HEADERS_TIMEOUT_MS = 30_000;
export const HTTP_BODY_TIMEOUT_MS = 30_000;

// Content types
export const CONTENT_TYPE_JOSE = 'application/jose+json';
export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_PEM_CHAIN = 'application/pem-certificate-chain';

// Response headers the protocol relies on
export const REPLAY_NONCE_HEADER = 'replay-nonce';
export const LOCATION_HEADER = 'location';

export const IDENTIFIER_TYPE_DNS = 'dns';

/**
 * Account registration body: look up or create, agree to the CA's terms,
 * register without contact addresses.
 */
export const NEW_ACCOUNT_PAYLOAD = Object.freeze({
  onlyReturnExisting: false,
  termsOfServiceAgreed: true,
  contact: Object.freeze([]),
});
