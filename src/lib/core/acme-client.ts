import { base64url } from 'jose';

import {
  CONTENT_TYPE_PEM_CHAIN,
  IDENTIFIER_TYPE_DNS,
  LOCATION_HEADER,
} from '../constants/defaults.js';
import type { AcmeKeyPair } from '../crypto/key-pair.js';
import { ProtocolError } from '../errors/client-errors.js';
import { UndiciTransport, type Transport } from '../transport/http-client.js';
import { headerValue, readBytes } from '../transport/response.js';
import type { AcmeDirectory } from '../types/directory.js';
import type {
  AcmeAuthorization,
  AcmeChallenge,
  AcmeIdentifier,
  AcmeOrder,
} from '../types/order.js';
import {
  decodeAuthorization,
  decodeChallenge,
  decodeIfPresent,
  decodeOrder,
  type Decoder,
} from '../utils/decode.js';
import type { JsonObject } from '../utils/json.js';
import { debugRecorder, type EventRecorder } from '../utils/recorder.js';
import { registerAccount } from './account-registrar.js';
import {
  JoseRequestSigner,
  type RequestSigner,
  type SignedJsonResult,
} from './acme-request-signer.js';
import { fetchDirectory } from './directory-resolver.js';
import { fetchNonce } from './nonce-source.js';

/**
 * Configuration options for AcmeClient
 *
 * Every collaborator has a default; pass your own to change how requests
 * travel, how they are signed, or where diagnostics go.
 */
export interface AcmeClientOptions {
  /** HTTPS exchange for unsigned calls; defaults to an {@link UndiciTransport} */
  transport?: Transport;
  /** JWS signer for authenticated calls; defaults to a {@link JoseRequestSigner} over `transport` */
  signer?: RequestSigner;
  /** Diagnostics sink; defaults to the debug package under `acme-conductor:client` */
  recorder?: EventRecorder;
}

type SignedBody = { kind: 'post'; payload: JsonObject } | { kind: 'post-as-get' };

/**
 * RFC 8555 ACME session
 *
 * One instance drives one issuance session against one CA with one account
 * key. It is obtained through {@link AcmeClient.create}, which resolves the
 * directory and registers the account before handing out a client; a failed
 * setup never yields an instance.
 *
 * Every operation draws its own nonce immediately before its signed call and
 * is independent of the others: no internal retries, no polling, no shared
 * nonce state. A step that failed (a badNonce rejection included) can simply
 * be invoked again.
 *
 * @example
 * ```typescript
 * const keyPair = await AcmeKeyPair.generate();
 * const client = await AcmeClient.create(
 *   'https://acme-staging-v02.api.letsencrypt.org/directory',
 *   keyPair,
 * );
 *
 * const order = await client.newOrder(['example.com', 'www.example.com']);
 * for (const authUrl of order.authorizations) {
 *   const authz = await client.fetchAuthorization(authUrl);
 *   const http01 = authz.challenges.find((c) => c.type === 'http-01');
 *   // ...serve keyPair.keyAuthorization(http01.token) at /.well-known/acme-challenge/
 *   await client.triggerChallenge(authz.identifier.value, http01.url);
 * }
 * // ...poll fetchOrder(order.url) until ready
 * const { der } = await createAcmeCsr(['example.com', 'www.example.com']);
 * const finalized = await client.submitCsr(order.finalize, der);
 * // ...poll fetchOrder(order.url) until valid
 * const pem = await client.downloadCertificate(finalized.certificate);
 * ```
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8555 | RFC 8555 - ACME Protocol}
 */
export class AcmeClient {
  private constructor(
    private readonly transport: Transport,
    private readonly signer: RequestSigner,
    private readonly recorder: EventRecorder,
    /** Endpoints published by the CA */
    public readonly directory: AcmeDirectory,
    /** Account key, shared with the signer */
    public readonly keyPair: AcmeKeyPair,
    /** Account URL (kid) issued by the CA; fixed for the client's lifetime */
    public readonly accountId: string,
  ) {}

  /**
   * Resolve the directory and register (or look up) the account.
   *
   * Costs two unsigned round trips (directory, nonce) and one signed round trip
   * (newAccount).
   *
   * @param directoryUrl - ACME directory URL of the CA
   * @param keyPair - Account key; the same key always maps to the same account
   * @throws {TransportError | ProtocolError | DecodeError | SigningError} when setup fails
   */
  static async create(
    directoryUrl: string,
    keyPair: AcmeKeyPair,
    options: AcmeClientOptions = {},
  ): Promise<AcmeClient> {
    const transport = options.transport ?? new UndiciTransport();
    const signer = options.signer ?? new JoseRequestSigner(transport);
    const recorder = options.recorder ?? debugRecorder('client');

    const directory = await fetchDirectory(transport, directoryUrl, recorder);
    const accountId = await registerAccount({ transport, signer, directory, keyPair, recorder });

    return new AcmeClient(transport, signer, recorder, directory, keyPair, accountId);
  }

  /**
   * Create an order for `domains` (RFC 8555 Section 7.4).
   *
   * One `dns` identifier is sent per domain, in the given order; duplicates are
   * passed through to the CA unchanged.
   *
   * @throws {ProtocolError} when `domains` is empty, or the CA rejects the order
   */
  async newOrder(domains: readonly string[]): Promise<AcmeOrder> {
    if (domains.length === 0) {
      throw ProtocolError.emptyIdentifiers();
    }
    this.recorder.record('order.new', { kid: this.accountId, domains });

    const identifiers: AcmeIdentifier[] = domains.map((value) => ({
      type: IDENTIFIER_TYPE_DNS,
      value,
    }));
    const { response, data: order } = await this.signedJson(
      this.directory.newOrder,
      'failed to create order',
      { kind: 'post', payload: { identifiers } },
      decodeOrder,
    );

    const url = headerValue(response.headers, LOCATION_HEADER);
    if (url) order.url = url;

    this.recorder.record('order.created', { status: order.status, url: order.url });
    return order;
  }

  /**
   * Fetch the current state of an order (POST-as-GET).
   *
   * The client never polls on its own; call this until the order reaches the
   * status you are waiting for.
   */
  async fetchOrder(orderUrl: string): Promise<AcmeOrder> {
    this.recorder.record('order.fetch', { url: orderUrl });

    const { data: order } = await this.signedJson(
      orderUrl,
      'failed to fetch order',
      { kind: 'post-as-get' },
      decodeOrder,
    );
    order.url = orderUrl;
    return order;
  }

  /** Fetch an authorization with its challenges (RFC 8555 Section 7.5) */
  async fetchAuthorization(authUrl: string): Promise<AcmeAuthorization> {
    this.recorder.record('authorization.fetch', { url: authUrl });

    const { data: authorization } = await this.signedJson(
      authUrl,
      'failed to fetch authorization',
      { kind: 'post-as-get' },
      decodeAuthorization,
    );

    this.recorder.record('authorization.fetched', {
      identifier: authorization.identifier.value,
      status: authorization.status,
    });
    return authorization;
  }

  /**
   * Tell the CA the challenge response is in place (RFC 8555 Section 7.5.1).
   *
   * Any 2xx answer means the trigger was accepted. The body is only a courtesy:
   * when it is empty, not JSON, or not a complete challenge the step still
   * resolves, with `undefined`. Use {@link fetchAuthorization} to follow up.
   *
   * @param domain - Only used for diagnostics; never sent to the CA
   * @param challengeUrl - The challenge's `url`
   * @returns The challenge as the CA reports it after the trigger, when it sent one
   */
  async triggerChallenge(
    domain: string,
    challengeUrl: string,
  ): Promise<AcmeChallenge | undefined> {
    this.recorder.record('challenge.trigger', { domain, url: challengeUrl });

    const nonce = await this.nextNonce();
    const response = await this.signer.send({
      kind: 'post',
      keyPair: this.keyPair,
      accountId: this.accountId,
      nonce,
      url: challengeUrl,
      payload: {},
      operation: `failed to trigger challenge for ${domain}`,
    });

    let text = '';
    try {
      text = await response.body.text();
    } catch (err) {
      this.recorder.record('challenge.body.unreadable', { url: challengeUrl, error: String(err) });
    }
    const challenge = decodeIfPresent(text, decodeChallenge);

    this.recorder.record('challenge.triggered', { domain, status: challenge?.status });
    return challenge;
  }

  /**
   * Finalize an order with a CSR (RFC 8555 Section 7.4).
   *
   * @param csrDer - DER-encoded PKCS#10 request; sent base64url without padding
   */
  async submitCsr(finalizeUrl: string, csrDer: Uint8Array): Promise<AcmeOrder> {
    this.recorder.record('csr.submit', { url: finalizeUrl, bytes: csrDer.length });

    const { data } = await this.signedJson(
      finalizeUrl,
      'failed to submit CSR',
      { kind: 'post', payload: { csr: base64url.encode(csrDer) } },
      decodeOrder,
    );
    return data;
  }

  /**
   * Download the issued certificate chain (POST-as-GET).
   *
   * The body is returned byte for byte (PEM chain). Repeated calls for the same
   * URL are independent and each draw their own nonce.
   */
  async downloadCertificate(certificateUrl: string): Promise<Uint8Array> {
    const operation = 'failed to download certificate';
    this.recorder.record('certificate.download', { url: certificateUrl });

    const nonce = await this.nextNonce();
    const response = await this.signer.send({
      kind: 'post-as-get',
      keyPair: this.keyPair,
      accountId: this.accountId,
      nonce,
      url: certificateUrl,
      accept: CONTENT_TYPE_PEM_CHAIN,
      operation,
    });
    const certificate = await readBytes(response, operation, certificateUrl);

    this.recorder.record('certificate.downloaded', { bytes: certificate.length });
    return certificate;
  }

  private nextNonce(): Promise<string> {
    return fetchNonce(this.transport, this.directory, this.recorder);
  }

  private async signedJson<T>(
    url: string,
    operation: string,
    body: SignedBody,
    decode: Decoder<T>,
  ): Promise<SignedJsonResult<T>> {
    const nonce = await this.nextNonce();
    return this.signer.sendJson(
      { ...body, keyPair: this.keyPair, accountId: this.accountId, nonce, url, operation },
      decode,
    );
  }
}
