import { beforeEach, describe, expect, it } from '@jest/globals';

import { fetchDirectory } from '../../src/lib/core/directory-resolver.js';
import { DecodeError, ProtocolError, TransportError } from '../../src/lib/errors/client-errors.js';
import { MalformedError } from '../../src/lib/errors/acme-server-errors.js';
import { ACME_ERROR } from '../../src/lib/errors/codes.js';
import { CA, FakeTransport } from '../utils/fake-ca.js';

describe('fetchDirectory', () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
  });

  it('decodes the endpoints and optional metadata', async () => {
    transport.on('GET', CA.directoryUrl, {
      body: {
        newNonce: CA.newNonce,
        newAccount: CA.newAccount,
        newOrder: CA.newOrder,
        revokeCert: 'https://ca/acme/revoke-cert',
        keyChange: 'https://ca/acme/key-change',
        meta: {
          termsOfService: 'https://ca/terms.pdf',
          caaIdentities: ['ca.test'],
          externalAccountRequired: false,
        },
        'random-key': 'https://community.letsencrypt.org/t/adding-random-entries-to-the-directory',
      },
    });

    const directory = await fetchDirectory(transport, CA.directoryUrl);

    expect(directory).toEqual({
      newNonce: CA.newNonce,
      newAccount: CA.newAccount,
      newOrder: CA.newOrder,
      revokeCert: 'https://ca/acme/revoke-cert',
      keyChange: 'https://ca/acme/key-change',
      meta: {
        termsOfService: 'https://ca/terms.pdf',
        caaIdentities: ['ca.test'],
        externalAccountRequired: false,
      },
    });
    expect(Object.isFrozen(directory)).toBe(true);
  });

  it('issues a single unsigned GET asking for JSON', async () => {
    transport.on('GET', CA.directoryUrl, {
      body: { newNonce: CA.newNonce, newAccount: CA.newAccount, newOrder: CA.newOrder },
    });

    await fetchDirectory(transport, CA.directoryUrl);

    expect(transport.requests).toEqual([
      { method: 'GET', url: CA.directoryUrl, headers: { Accept: 'application/json' } },
    ]);
  });

  it('rejects a non-2xx status with ProtocolError', async () => {
    transport.on('GET', CA.directoryUrl, {
      statusCode: 400,
      body: { type: ACME_ERROR.malformed, detail: 'bad path' },
    });

    const error = await fetchDirectory(transport, CA.directoryUrl).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProtocolError);
    if (!(error instanceof ProtocolError)) return;
    expect(error.statusCode).toBe(400);
    expect(error.problem).toBeInstanceOf(MalformedError);
    expect(error.context).toMatchObject({ operation: 'failed to load directory', url: CA.directoryUrl });
  });

  it('rejects a body that is not JSON with DecodeError', async () => {
    transport.on('GET', CA.directoryUrl, { body: 'hello' });

    await expect(fetchDirectory(transport, CA.directoryUrl)).rejects.toBeInstanceOf(DecodeError);
  });

  it('rejects a JSON array with DecodeError', async () => {
    transport.on('GET', CA.directoryUrl, { body: [CA.newNonce] });

    await expect(fetchDirectory(transport, CA.directoryUrl)).rejects.toThrow(
      'invalid directory: "$" must be an object',
    );
  });

  it('rejects a directory whose newNonce is not a string', async () => {
    transport.on('GET', CA.directoryUrl, {
      body: { newNonce: 42, newAccount: CA.newAccount, newOrder: CA.newOrder },
    });

    await expect(fetchDirectory(transport, CA.directoryUrl)).rejects.toThrow(
      'invalid directory: "newNonce" must be a string',
    );
  });

  it('wraps foreign transport failures in TransportError', async () => {
    const error = await fetchDirectory(transport, CA.directoryUrl).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.message).toBe(`failed to load directory: no route for GET ${CA.directoryUrl}`);
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('records load and loaded events', async () => {
    const events: string[] = [];
    transport.on('GET', CA.directoryUrl, {
      body: { newNonce: CA.newNonce, newAccount: CA.newAccount, newOrder: CA.newOrder },
    });

    await fetchDirectory(transport, CA.directoryUrl, { record: (event) => events.push(event) });

    expect(events).toEqual(['directory.load', 'directory.loaded']);
  });
});
