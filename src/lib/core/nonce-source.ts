/**
 * Anti-replay nonces (RFC 8555 Section 7.2)
 *
 * A nonce is fetched immediately before each signed request and handed to that
 * request as a plain return value. Nothing is cached, pooled or shared, so
 * concurrent operations on one client each consume their own nonce.
 */

import { REPLAY_NONCE_HEADER } from '../constants/defaults.js';
import type { Transport } from '../transport/http-client.js';
import {
  assertSuccess,
  discardBody,
  headerValue,
  performRequest,
} from '../transport/response.js';
import type { AcmeDirectory } from '../types/directory.js';
import { noopRecorder, type EventRecorder } from '../utils/recorder.js';

const OPERATION = 'failed to get nonce';

/**
 * GET `directory.newNonce` and return the `replay-nonce` header.
 *
 * A success response without the header yields an empty string instead of an
 * error; the CA then rejects the next signed request with badNonce.
 *
 * @throws {TransportError} when the CA cannot be reached
 * @throws {ProtocolError} on a non-2xx status
 */
export async function fetchNonce(
  transport: Transport,
  directory: AcmeDirectory,
  recorder: EventRecorder = noopRecorder,
): Promise<string> {
  const url = directory.newNonce;
  recorder.record('nonce.fetch', { url });

  const response = await performRequest(transport, { method: 'GET', url }, OPERATION);
  await assertSuccess(response, OPERATION, url);
  await discardBody(response, OPERATION, url);

  const nonce = headerValue(response.headers, REPLAY_NONCE_HEADER) ?? '';
  if (nonce) {
    recorder.record('nonce.fetched', { nonce });
  } else {
    recorder.record('nonce.missing', { url, header: REPLAY_NONCE_HEADER });
  }
  return nonce;
}
