import { request, type Dispatcher } from 'undici';

import { HTTP_BODY_TIMEOUT_MS, HTTP_HEADERS_TIMEOUT_MS } from '../constants/defaults.js';
import { TransportError } from '../errors/client-errors.js';
import { debugHttp } from '../utils/debug.js';
import { buildUserAgent } from '../utils/user-agent.js';

export type HttpMethod = 'GET' | 'HEAD' | 'POST';

export type ResponseHeaders = Record<string, string | string[] | undefined>;

/** Lazily consumed response body; every body must be read or dumped exactly once */
export interface ResponseBody {
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
  dump(): Promise<void>;
}

export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL */
  url: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  statusCode: number;
  /** Header names are lower-case */
  headers: ResponseHeaders;
  body: ResponseBody;
}

/**
 * HTTPS exchange used for every call to the CA.
 *
 * Implementations reject with {@link TransportError} when no response was
 * obtained; any status code, including 4xx/5xx, resolves normally.
 */
export interface Transport {
  request(req: TransportRequest): Promise<TransportResponse>;
}

export interface UndiciTransportOptions {
  /** User-Agent header; defaults to `acme-conductor/<version> (Node/<version>)` */
  userAgent?: string;
  /** Time allowed for response headers to arrive */
  headersTimeout?: number;
  /** Time allowed between body chunks */
  bodyTimeout?: number;
  /** undici dispatcher, e.g. a custom Agent or a MockAgent in tests */
  dispatcher?: Dispatcher;
}

/**
 * undici-backed {@link Transport}
 *
 * - Automatic User-Agent injection
 * - Header and body timeouts
 * - Debug logging under `acme-conductor:http`
 */
export class UndiciTransport implements Transport {
  private readonly userAgent: string;
  private readonly headersTimeout: number;
  private readonly bodyTimeout: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(opts: UndiciTransportOptions = {}) {
    this.userAgent = opts.userAgent ?? buildUserAgent();
    this.headersTimeout = opts.headersTimeout ?? HTTP_HEADERS_TIMEOUT_MS;
    this.bodyTimeout = opts.bodyTimeout ?? HTTP_BODY_TIMEOUT_MS;
    this.dispatcher = opts.dispatcher;
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    const headers = this.ensureUserAgent({ ...req.headers });
    debugHttp('%s %s init headers=%j body=%j', req.method, req.url, headers, describeBody(req.body));
    const start = Date.now();

    try {
      const res = await request(req.url, {
        method: req.method,
        headers,
        body: req.body,
        headersTimeout: this.headersTimeout,
        bodyTimeout: this.bodyTimeout,
        dispatcher: this.dispatcher,
      });
      debugHttp(
        '%s %s response status=%d durationMs=%d content-type=%s',
        req.method,
        req.url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-type'],
      );

      return { statusCode: res.statusCode, headers: res.headers, body: res.body };
    } catch (err) {
      debugHttp('%s %s network error: %s', req.method, req.url, String(err));
      throw TransportError.fromCause(`${req.method} ${req.url} failed`, req.url, err);
    }
  }

  private ensureUserAgent(headers: Record<string, string>): Record<string, string> {
    const hasUA = Object.keys(headers).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      headers['User-Agent'] = this.userAgent;
    }
    return headers;
  }
}

function describeBody(body: string | undefined): unknown {
  if (body === undefined) return { type: 'none' };
  return {
    type: 'string',
    length: body.length,
    preview: body.length > 120 ? `${body.slice(0, 120)}...` : body,
  };
}
