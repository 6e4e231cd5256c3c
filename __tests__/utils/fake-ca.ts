import { flattenedVerify, type JWSHeaderParameters } from 'jose';

import type { AcmeKeyPair } from '../../src/lib/crypto/key-pair.js';
import type {
  HttpMethod,
  Transport,
  TransportRequest,
  TransportResponse,
} from '../../src/lib/transport/http-client.js';

export const CA = {
  directoryUrl: 'https://ca/acme/directory',
  newNonce: 'https://ca/acme/new-nonce',
  newAccount: 'https://ca/acme/new-account',
  newOrder: 'https://ca/acme/new-order',
  accountUrl: 'https://ca/acme/acct/1',
  orderUrl: 'https://ca/acme/order/1',
  finalizeUrl: 'https://ca/acme/order/1/finalize',
  certificateUrl: 'https://ca/acme/cert/1',
} as const;

export interface ScriptedResponse {
  statusCode?: number;
  headers?: Record<string, string>;
  /** Strings and bytes are sent verbatim, anything else as JSON */
  body?: unknown;
}

export type RouteHandler = (req: TransportRequest) => ScriptedResponse | Promise<ScriptedResponse>;

function encodeBody(body: unknown): Uint8Array {
  if (body === undefined) return new Uint8Array(0);
  if (body instanceof Uint8Array) return body;
  if (typeof body === 'string') return new TextEncoder().encode(body);
  return new TextEncoder().encode(JSON.stringify(body));
}

function toResponse(scripted: ScriptedResponse): TransportResponse {
  const bytes = encodeBody(scripted.body);
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(scripted.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }

  let consumed = false;
  const take = (): Uint8Array => {
    if (consumed) throw new Error('body already consumed');
    consumed = true;
    return bytes;
  };

  return {
    statusCode: scripted.statusCode ?? 200,
    headers,
    body: {
      text: async () => new TextDecoder().decode(take()),
      arrayBuffer: async () => {
        const source = take();
        const copy = new ArrayBuffer(source.byteLength);
        new Uint8Array(copy).set(source);
        return copy;
      },
      dump: async () => {
        consumed = true;
      },
    },
  };
}

/**
 * In-process CA: routes are keyed by `METHOD url`, every request is recorded.
 */
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly routes = new Map<string, RouteHandler>();

  on(method: HttpMethod, url: string, response: ScriptedResponse | RouteHandler): this {
    this.routes.set(`${method} ${url}`, typeof response === 'function' ? response : () => response);
    return this;
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    this.requests.push(req);
    const handler = this.routes.get(`${req.method} ${req.url}`);
    if (!handler) {
      throw new Error(`no route for ${req.method} ${req.url}`);
    }
    return toResponse(await handler(req));
  }

  /** `METHOD url` of every request so far */
  trail(): string[] {
    return this.requests.map((req) => `${req.method} ${req.url}`);
  }

  posts(url: string): TransportRequest[] {
    return this.requests.filter((req) => req.method === 'POST' && req.url === url);
  }

  lastPost(url: string): TransportRequest {
    const found = this.posts(url).at(-1);
    if (!found) throw new Error(`no POST to ${url}`);
    return found;
  }
}

/**
 * A CA with a directory, a counting nonce endpoint (nonce-1, nonce-2, ...)
 * and a newAccount endpoint answering 201 with the account URL.
 */
export function createFakeCa(): FakeTransport {
  let issued = 0;

  return new FakeTransport()
    .on('GET', CA.directoryUrl, {
      headers: { 'Content-Type': 'application/json' },
      body: { newNonce: CA.newNonce, newAccount: CA.newAccount, newOrder: CA.newOrder },
    })
    .on('GET', CA.newNonce, () => {
      issued += 1;
      return { headers: { 'Replay-Nonce': `nonce-${issued}` } };
    })
    .on('POST', CA.newAccount, {
      statusCode: 201,
      headers: { Location: CA.accountUrl },
      body: { status: 'valid', contact: [] },
    });
}

export interface OpenedRequest {
  header: JWSHeaderParameters;
  /** Parsed JSON payload, or undefined for POST-as-GET */
  payload: unknown;
}

/** Verify a signed request against the account key and return its parts */
export async function openSignedRequest(
  req: TransportRequest,
  keyPair: AcmeKeyPair,
): Promise<OpenedRequest> {
  const jws = JSON.parse(req.body ?? '{}');
  const { payload, protectedHeader } = await flattenedVerify(jws, keyPair.publicKey);
  const text = new TextDecoder().decode(payload);

  return {
    header: protectedHeader ?? {},
    payload: text === '' ? undefined : JSON.parse(text),
  };
}
