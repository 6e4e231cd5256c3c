/**
 * Runtime decoders for CA responses
 *
 * Each decoder takes the parsed JSON body and either returns the typed resource
 * or throws a {@link DecodeError} naming the first offending field. Unknown
 * fields are dropped; optional fields are kept only when well-typed.
 */

import { DecodeError } from '../errors/client-errors.js';
import type { AcmeDirectory, AcmeDirectoryMeta } from '../types/directory.js';
import type {
  AcmeAuthorization,
  AcmeChallenge,
  AcmeIdentifier,
  AcmeOrder,
} from '../types/order.js';
import {
  isAcmeAuthorizationStatus,
  isAcmeChallengeStatus,
  isAcmeOrderStatus,
} from '../types/status.js';
import { isJsonObject, type JsonObject } from './json.js';

export type Decoder<T> = (value: unknown) => T;

function objectOf(resource: string, value: unknown, field = '$'): JsonObject {
  if (!isJsonObject(value)) {
    throw DecodeError.invalidShape(resource, field, 'an object');
  }
  return value;
}

function requiredString(resource: string, obj: JsonObject, field: string): string {
  const value = obj[field];
  if (typeof value !== 'string') {
    throw DecodeError.invalidShape(resource, field, 'a string');
  }
  return value;
}

function optionalString(obj: JsonObject, field: string): string | undefined {
  const value = obj[field];
  return typeof value === 'string' ? value : undefined;
}

function stringArray(resource: string, obj: JsonObject, field: string): string[] {
  const value = obj[field];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw DecodeError.invalidShape(resource, field, 'an array of strings');
  }
  return value;
}

function decodeMeta(value: unknown): AcmeDirectoryMeta | undefined {
  if (!isJsonObject(value)) return undefined;

  const caa = value.caaIdentities;
  return {
    termsOfService: optionalString(value, 'termsOfService'),
    website: optionalString(value, 'website'),
    caaIdentities:
      Array.isArray(caa) && caa.every((v): v is string => typeof v === 'string') ? caa : undefined,
    externalAccountRequired:
      typeof value.externalAccountRequired === 'boolean'
        ? value.externalAccountRequired
        : undefined,
  };
}

/**
 * Decode a directory object. `newNonce`, `newAccount` and `newOrder` are
 * required; the result is frozen.
 */
export const decodeDirectory: Decoder<AcmeDirectory> = (value) => {
  const obj = objectOf('directory', value);

  return Object.freeze({
    newNonce: requiredString('directory', obj, 'newNonce'),
    newAccount: requiredString('directory', obj, 'newAccount'),
    newOrder: requiredString('directory', obj, 'newOrder'),
    newAuthz: optionalString(obj, 'newAuthz'),
    revokeCert: optionalString(obj, 'revokeCert'),
    keyChange: optionalString(obj, 'keyChange'),
    meta: decodeMeta(obj.meta),
  });
};

function decodeIdentifier(resource: string, value: unknown, field: string): AcmeIdentifier {
  const obj = objectOf(resource, value, field);
  return {
    type: requiredString(resource, obj, 'type'),
    value: requiredString(resource, obj, 'value'),
  };
}

export const decodeChallenge: Decoder<AcmeChallenge> = (value) => {
  const obj = objectOf('challenge', value);
  const status = requiredString('challenge', obj, 'status');
  if (!isAcmeChallengeStatus(status)) {
    throw DecodeError.invalidShape('challenge', 'status', 'a challenge status');
  }

  const challenge: AcmeChallenge = {
    type: requiredString('challenge', obj, 'type'),
    url: requiredString('challenge', obj, 'url'),
    status,
  };
  const token = optionalString(obj, 'token');
  if (token !== undefined) challenge.token = token;
  const validated = optionalString(obj, 'validated');
  if (validated !== undefined) challenge.validated = validated;
  if (obj.error !== undefined) challenge.error = obj.error;

  return challenge;
};

export const decodeAuthorization: Decoder<AcmeAuthorization> = (value) => {
  const obj = objectOf('authorization', value);
  const status = requiredString('authorization', obj, 'status');
  if (!isAcmeAuthorizationStatus(status)) {
    throw DecodeError.invalidShape('authorization', 'status', 'an authorization status');
  }
  if (!Array.isArray(obj.challenges)) {
    throw DecodeError.invalidShape('authorization', 'challenges', 'an array');
  }

  const authorization: AcmeAuthorization = {
    identifier: decodeIdentifier('authorization', obj.identifier, 'identifier'),
    status,
    challenges: obj.challenges.map(decodeChallenge),
  };
  const expires = optionalString(obj, 'expires');
  if (expires !== undefined) authorization.expires = expires;
  if (typeof obj.wildcard === 'boolean') authorization.wildcard = obj.wildcard;

  return authorization;
};

export const decodeOrder: Decoder<AcmeOrder> = (value) => {
  const obj = objectOf('order', value);
  const status = requiredString('order', obj, 'status');
  if (!isAcmeOrderStatus(status)) {
    throw DecodeError.invalidShape('order', 'status', 'an order status');
  }
  if (!Array.isArray(obj.identifiers)) {
    throw DecodeError.invalidShape('order', 'identifiers', 'an array');
  }

  const order: AcmeOrder = {
    status,
    identifiers: obj.identifiers.map((id, i) => decodeIdentifier('order', id, `identifiers[${i}]`)),
    authorizations: stringArray('order', obj, 'authorizations'),
    finalize: requiredString('order', obj, 'finalize'),
  };
  const expires = optionalString(obj, 'expires');
  if (expires !== undefined) order.expires = expires;
  const certificate = optionalString(obj, 'certificate');
  if (certificate !== undefined) order.certificate = certificate;
  if (obj.error !== undefined) order.error = obj.error;

  return order;
};

/**
 * Decode a body the CA may leave empty or partial. Text that is not JSON, or
 * that `decode` refuses, yields undefined instead of a {@link DecodeError}.
 */
export function decodeIfPresent<T>(text: string, decode: Decoder<T>): T | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }

  try {
    return decode(parsed);
  } catch (err) {
    if (err instanceof DecodeError) return undefined;
    throw err;
  }
}
