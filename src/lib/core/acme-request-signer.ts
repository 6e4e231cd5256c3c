/**
 * ACME Request Signer
 *
 * Wraps payloads in JWS flattened envelopes (RFC 7515) and sends them to the
 * CA per RFC 8555 Section 6.2. The signer never fetches nonces itself: the
 * caller draws one immediately before the call and hands it over, so a nonce
 * is consumed by exactly the request it was drawn for.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.3
 */

import { FlattenedSign, type JWSHeaderParameters } from 'jose';

import { CONTENT_TYPE_JOSE, CONTENT_TYPE_JSON } from '../constants/defaults.js';
import { SigningError } from '../errors/client-errors.js';
import type { AcmeKeyPair } from '../crypto/key-pair.js';
import type { Transport, TransportResponse } from '../transport/http-client.js';
import { assertSuccess, performRequest, readJson } from '../transport/response.js';
import type { Decoder } from '../utils/decode.js';
import { debugSigner } from '../utils/debug.js';
import type { JsonObject } from '../utils/json.js';

interface SignedRequestBase {
  keyPair: AcmeKeyPair;
  /** Account URL; when absent the public key is embedded as `jwk` (newAccount only) */
  accountId?: string;
  /** Fresh anti-replay nonce, consumed by this request alone */
  nonce: string;
  url: string;
  /** Accept header; JSON unless stated */
  accept?: string;
  /** Operation label used in error messages */
  operation?: string;
}

/** Signed POST carrying a JSON payload */
export interface SignedPostRequest extends SignedRequestBase {
  kind: 'post';
  payload: JsonObject;
}

/** Signed POST-as-GET: the JWS payload is the empty string (RFC 8555 Section 6.3) */
export interface SignedPostAsGetRequest extends SignedRequestBase {
  kind: 'post-as-get';
}

export type SignedRequest = SignedPostRequest | SignedPostAsGetRequest;

export interface SignedJsonResult<T> {
  response: TransportResponse;
  data: T;
}

/**
 * JOSE capability used by the client for every authenticated call.
 *
 * Both variants reject non-2xx answers with a ProtocolError carrying the CA's
 * problem document.
 */
export interface RequestSigner {
  /** Raw variant: the caller reads headers and body itself */
  send(request: SignedRequest): Promise<TransportResponse>;
  /** Typed variant: the body is parsed as JSON and passed through `decode` */
  sendJson<T>(request: SignedRequest, decode: Decoder<T>): Promise<SignedJsonResult<T>>;
}

const EMPTY_PAYLOAD = new Uint8Array(0);

/** Protected header: alg, nonce, url, plus kid or jwk (RFC 8555 Section 6.2) */
export function buildProtectedHeader(request: SignedRequest): JWSHeaderParameters {
  const header: JWSHeaderParameters = {
    alg: request.keyPair.algorithm,
    nonce: request.nonce,
    url: request.url,
  };

  if (request.accountId) {
    header.kid = request.accountId;
  } else {
    header.jwk = { ...request.keyPair.publicJwk };
  }

  return header;
}

function encodePayload(request: SignedRequest): Uint8Array {
  return request.kind === 'post'
    ? new TextEncoder().encode(JSON.stringify(request.payload))
    : EMPTY_PAYLOAD;
}

/**
 * {@link RequestSigner} backed by jose's FlattenedSign and a {@link Transport}.
 */
export class JoseRequestSigner implements RequestSigner {
  constructor(private readonly transport: Transport) {}

  async send(request: SignedRequest): Promise<TransportResponse> {
    const operation = request.operation ?? `signed request to ${request.url}`;
    const body = await this.sign(request);

    const response = await performRequest(
      this.transport,
      {
        method: 'POST',
        url: request.url,
        headers: {
          'Content-Type': CONTENT_TYPE_JOSE,
          Accept: request.accept ?? CONTENT_TYPE_JSON,
        },
        body,
      },
      operation,
    );

    await assertSuccess(response, operation, request.url);
    return response;
  }

  async sendJson<T>(request: SignedRequest, decode: Decoder<T>): Promise<SignedJsonResult<T>> {
    const response = await this.send(request);
    const operation = request.operation ?? `signed request to ${request.url}`;
    const data = decode(await readJson(response, operation, request.url));
    return { response, data };
  }

  /** Serialized flattened JWS for the request */
  async sign(request: SignedRequest): Promise<string> {
    const header = buildProtectedHeader(request);
    debugSigner('signing %s kind=%s header=%j', request.url, request.kind, header);

    try {
      const jws = await new FlattenedSign(encodePayload(request))
        .setProtectedHeader(header)
        .sign(request.keyPair.privateKey);
      return JSON.stringify(jws);
    } catch (err) {
      throw SigningError.fromCause(request.url, err);
    }
  }
}
