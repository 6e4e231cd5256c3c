/**
 * Directory discovery (RFC 8555 Section 7.1.1)
 *
 * The directory URL is the only URL a client is configured with; every other
 * endpoint comes from the directory object.
 */

import { CONTENT_TYPE_JSON } from '../constants/defaults.js';
import type { Transport } from '../transport/http-client.js';
import { assertSuccess, performRequest, readJson } from '../transport/response.js';
import type { AcmeDirectory } from '../types/directory.js';
import { decodeDirectory } from '../utils/decode.js';
import { noopRecorder, type EventRecorder } from '../utils/recorder.js';

const OPERATION = 'failed to load directory';

/**
 * Fetch and validate the CA directory with an unsigned GET.
 *
 * @throws {TransportError} when the CA cannot be reached
 * @throws {ProtocolError} on a non-2xx status
 * @throws {DecodeError} when the body is not JSON or lacks newNonce/newAccount/newOrder
 */
export async function fetchDirectory(
  transport: Transport,
  directoryUrl: string,
  recorder: EventRecorder = noopRecorder,
): Promise<AcmeDirectory> {
  recorder.record('directory.load', { url: directoryUrl });

  const response = await performRequest(
    transport,
    { method: 'GET', url: directoryUrl, headers: { Accept: CONTENT_TYPE_JSON } },
    OPERATION,
  );
  await assertSuccess(response, OPERATION, directoryUrl);

  const directory = decodeDirectory(await readJson(response, OPERATION, directoryUrl));

  recorder.record('directory.loaded', {
    newNonce: directory.newNonce,
    newAccount: directory.newAccount,
    newOrder: directory.newOrder,
  });
  return directory;
}
