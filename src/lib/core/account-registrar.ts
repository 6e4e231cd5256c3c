/**
 * Account registration (RFC 8555 Section 7.3)
 */

import { LOCATION_HEADER, NEW_ACCOUNT_PAYLOAD } from '../constants/defaults.js';
import { ProtocolError } from '../errors/client-errors.js';
import type { AcmeKeyPair } from '../crypto/key-pair.js';
import type { Transport } from '../transport/http-client.js';
import { discardBody, headerValue } from '../transport/response.js';
import type { AcmeDirectory } from '../types/directory.js';
import { noopRecorder, type EventRecorder } from '../utils/recorder.js';
import type { RequestSigner } from './acme-request-signer.js';
import { fetchNonce } from './nonce-source.js';

const OPERATION = 'failed to create account';

export interface AccountRegistration {
  transport: Transport;
  signer: RequestSigner;
  directory: AcmeDirectory;
  keyPair: AcmeKeyPair;
  recorder?: EventRecorder;
}

/**
 * Create the account for `keyPair`, or look up the existing one, and return
 * its URL (the `kid` used in every later protected header).
 *
 * The request is signed with the public key embedded as `jwk` since no account
 * URL exists yet. The CA answers 201 for a new account and 200 for an existing
 * one; both carry the account URL in Location.
 *
 * @throws {ProtocolError} on a non-2xx status or a missing Location header
 */
export async function registerAccount({
  transport,
  signer,
  directory,
  keyPair,
  recorder = noopRecorder,
}: AccountRegistration): Promise<string> {
  recorder.record('account.register', { url: directory.newAccount });

  const nonce = await fetchNonce(transport, directory, recorder);
  const response = await signer.send({
    kind: 'post',
    keyPair,
    nonce,
    url: directory.newAccount,
    payload: NEW_ACCOUNT_PAYLOAD,
    operation: OPERATION,
  });
  await discardBody(response, OPERATION, directory.newAccount);

  const kid = headerValue(response.headers, LOCATION_HEADER);
  if (!kid) {
    throw ProtocolError.missingHeader(OPERATION, directory.newAccount, 'Location');
  }

  recorder.record('account.registered', { kid, statusCode: response.statusCode });
  return kid;
}
