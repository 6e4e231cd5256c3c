/**
 * ACME resource status values
 *
 * Runtime constants paired with their literal union types, so the decoders can
 * validate what the CA sends and callers get exhaustive switches.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.6
 */

/**
 * Order status, transitioned by the CA:
 * pending -> ready -> processing -> valid
 *            |-> invalid (on error or expiration)
 */
export const ORDER_STATUS = {
  PENDING: 'pending',
  READY: 'ready',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export type AcmeOrderStatus = (typeof ORDER_STATUS)[keyof typeof ORDER_STATUS];

export const AUTHORIZATION_STATUS = {
  PENDING: 'pending',
  VALID: 'valid',
  INVALID: 'invalid',
  DEACTIVATED: 'deactivated',
  EXPIRED: 'expired',
  REVOKED: 'revoked',
} as const;

export type AcmeAuthorizationStatus =
  (typeof AUTHORIZATION_STATUS)[keyof typeof AUTHORIZATION_STATUS];

export const CHALLENGE_STATUS = {
  PENDING: 'pending',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export type AcmeChallengeStatus = (typeof CHALLENGE_STATUS)[keyof typeof CHALLENGE_STATUS];

/** Challenge types this library knows by name; CAs may offer others */
export const CHALLENGE_TYPE = {
  HTTP_01: 'http-01',
  DNS_01: 'dns-01',
  TLS_ALPN_01: 'tls-alpn-01',
} as const;

export type AcmeChallengeType = (typeof CHALLENGE_TYPE)[keyof typeof CHALLENGE_TYPE];

function includes<T extends string>(values: Record<string, T>, value: string): value is T {
  return Object.values<string>(values).includes(value);
}

export function isAcmeOrderStatus(value: string): value is AcmeOrderStatus {
  return includes(ORDER_STATUS, value);
}

export function isAcmeAuthorizationStatus(value: string): value is AcmeAuthorizationStatus {
  return includes(AUTHORIZATION_STATUS, value);
}

export function isAcmeChallengeStatus(value: string): value is AcmeChallengeStatus {
  return includes(CHALLENGE_STATUS, value);
}

export function isAcmeChallengeType(value: string): value is AcmeChallengeType {
  return includes(CHALLENGE_TYPE, value);
}

/** Whether the CA may move an order from `from` to `to` */
export function isValidOrderStatusTransition(from: AcmeOrderStatus, to: AcmeOrderStatus): boolean {
  const next: Record<AcmeOrderStatus, readonly AcmeOrderStatus[]> = {
    [ORDER_STATUS.PENDING]: [ORDER_STATUS.READY, ORDER_STATUS.INVALID],
    [ORDER_STATUS.READY]: [ORDER_STATUS.PROCESSING, ORDER_STATUS.INVALID],
    [ORDER_STATUS.PROCESSING]: [ORDER_STATUS.VALID, ORDER_STATUS.INVALID],
    [ORDER_STATUS.VALID]: [],
    [ORDER_STATUS.INVALID]: [],
  };

  return next[from].includes(to);
}

/** Terminal order states; nothing more will happen to the order */
export function isFinalOrderStatus(status: AcmeOrderStatus): boolean {
  return status === ORDER_STATUS.VALID || status === ORDER_STATUS.INVALID;
}
