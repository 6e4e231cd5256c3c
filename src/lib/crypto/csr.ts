/**
 * PKCS#10 Certificate Signing Request generation
 *
 * Produces the DER bytes {@link AcmeClient.submitCsr} expects: CN is the first
 * domain, the SAN extension lists every domain in the given order. The
 * certificate key is separate from the account key (RFC 8555 Section 11.1).
 */

import { webcrypto } from 'crypto';
import {
  cryptoProvider,
  Pkcs10CertificateRequestGenerator,
  SubjectAlternativeNameExtension,
} from '@peculiar/x509';

cryptoProvider.set(webcrypto);

export type CsrEcAlgorithm = {
  kind: 'ec';
  namedCurve: 'P-256' | 'P-384' | 'P-521';
  hash: 'SHA-256' | 'SHA-384' | 'SHA-512';
};

export type CsrRsaAlgorithm = {
  kind: 'rsa';
  /** 2048 minimum, 3072+ recommended */
  modulusLength: 2048 | 3072 | 4096;
  hash: 'SHA-256' | 'SHA-384' | 'SHA-512';
};

export type CsrAlgorithm = CsrEcAlgorithm | CsrRsaAlgorithm;

export const DEFAULT_CSR_ALGORITHM: CsrEcAlgorithm = {
  kind: 'ec',
  namedCurve: 'P-256',
  hash: 'SHA-256',
};

export interface CreateCsrOptions {
  algorithm?: CsrAlgorithm;
  /** Reuse an existing certificate key instead of generating one */
  keys?: webcrypto.CryptoKeyPair;
}

export interface CreateCsrResult {
  /** Raw DER bytes, ready for submitCsr() */
  der: Uint8Array;
  /** PEM form, for logging and storage */
  pem: string;
  /** Certificate key pair; the private key belongs with the issued certificate */
  keys: webcrypto.CryptoKeyPair;
}

export async function generateCertificateKeyPair(
  algorithm: CsrAlgorithm = DEFAULT_CSR_ALGORITHM,
): Promise<webcrypto.CryptoKeyPair> {
  if (algorithm.kind === 'ec') {
    return webcrypto.subtle.generateKey({ name: 'ECDSA', namedCurve: algorithm.namedCurve }, true, [
      'sign',
      'verify',
    ]);
  }

  return webcrypto.subtle.generateKey(
    {
      name: 'RSASSA-PKCS1-v1_5',
      modulusLength: algorithm.modulusLength,
      publicExponent: new Uint8Array([0x01, 0x00, 0x01]),
      hash: algorithm.hash,
    },
    true,
    ['sign', 'verify'],
  );
}

export async function createAcmeCsr(
  domains: readonly string[],
  options: CreateCsrOptions = {},
): Promise<CreateCsrResult> {
  const [commonName] = domains;
  if (commonName === undefined) {
    throw new Error('domains must contain at least one DNS name');
  }

  const algorithm = options.algorithm ?? DEFAULT_CSR_ALGORITHM;
  const keys = options.keys ?? (await generateCertificateKeyPair(algorithm));

  const san = new SubjectAlternativeNameExtension(
    domains.map((value) => ({ type: 'dns' as const, value })),
  );

  const csr = await Pkcs10CertificateRequestGenerator.create({
    name: `CN=${commonName}`,
    keys,
    signingAlgorithm:
      algorithm.kind === 'ec'
        ? { name: 'ECDSA', hash: algorithm.hash }
        : { name: 'RSASSA-PKCS1-v1_5', hash: algorithm.hash },
    extensions: [san],
  });

  return { der: new Uint8Array(csr.rawData), pem: csr.toString('pem'), keys };
}
