import {
  AcmeClientError,
  DecodeError,
  ProtocolError,
  TransportError,
} from '../errors/client-errors.js';
import { createErrorFromProblem, toProblemDocument } from '../errors/factory.js';
import type { AcmeError } from '../errors/acme-server-errors.js';
import type {
  ResponseHeaders,
  Transport,
  TransportRequest,
  TransportResponse,
} from './http-client.js';

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/** Case-insensitive header lookup; the first value wins for repeated headers */
export function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

/**
 * Run a request through any {@link Transport}, folding foreign failures into
 * {@link TransportError} so callers see a single taxonomy.
 */
export async function performRequest(
  transport: Transport,
  req: TransportRequest,
  operation: string,
): Promise<TransportResponse> {
  try {
    return await transport.request(req);
  } catch (err) {
    if (err instanceof AcmeClientError) throw err;
    throw TransportError.fromCause(operation, req.url, err);
  }
}

export async function readText(
  response: TransportResponse,
  operation: string,
  url: string,
): Promise<string> {
  try {
    return await response.body.text();
  } catch (err) {
    throw TransportError.fromCause(operation, url, err);
  }
}

export async function readBytes(
  response: TransportResponse,
  operation: string,
  url: string,
): Promise<Uint8Array> {
  try {
    return new Uint8Array(await response.body.arrayBuffer());
  } catch (err) {
    throw TransportError.fromCause(operation, url, err);
  }
}

export async function readJson(
  response: TransportResponse,
  operation: string,
  url: string,
): Promise<unknown> {
  const text = await readText(response, operation, url);
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw DecodeError.invalidJson(operation, url, err);
  }
}

/** Release a response whose body the caller has no use for */
export async function discardBody(
  response: TransportResponse,
  operation: string,
  url: string,
): Promise<void> {
  try {
    await response.body.dump();
  } catch (err) {
    throw TransportError.fromCause(operation, url, err);
  }
}

/**
 * Parse an error response body as a problem document.
 * Bodies that are unreadable or not problem documents yield undefined.
 */
export async function readProblem(response: TransportResponse): Promise<AcmeError | undefined> {
  let text: string;
  try {
    text = await response.body.text();
  } catch {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }

  return toProblemDocument(parsed) ? createErrorFromProblem(parsed, response.statusCode) : undefined;
}

/** Reject non-2xx responses with a {@link ProtocolError} carrying the CA's problem document */
export async function assertSuccess(
  response: TransportResponse,
  operation: string,
  url: string,
): Promise<void> {
  if (isSuccessStatus(response.statusCode)) return;

  const problem = await readProblem(response);
  throw ProtocolError.unexpectedStatus(operation, url, response.statusCode, problem);
}
