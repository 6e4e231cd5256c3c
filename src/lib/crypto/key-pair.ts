/**
 * ACME account key material
 *
 * {@link AcmeKeyPair} is an immutable handle shared by reference between the
 * client and the request signer. Nothing in the library copies or mutates it.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-11.1
 */

import {
  calculateJwkThumbprint,
  exportJWK,
  exportPKCS8,
  generateKeyPair,
  importJWK,
  importPKCS8,
  type JWK,
  type KeyLike,
} from 'jose';

export type AcmeJwsAlgorithm = 'ES256' | 'ES384' | 'ES512' | 'RS256';

/**
 * Detect the JWS algorithm matching a public JWK.
 * Supports EC (P-256, P-384, P-521) and RSA keys.
 */
export function detectJwsAlgorithm(jwk: JWK): AcmeJwsAlgorithm {
  if (jwk.kty === 'EC') {
    switch (jwk.crv) {
      case 'P-256':
        return 'ES256';
      case 'P-384':
        return 'ES384';
      case 'P-521':
        return 'ES512';
      default:
        throw new Error(`Unsupported EC curve: ${jwk.crv}`);
    }
  }

  if (jwk.kty === 'RSA') {
    return 'RS256';
  }

  throw new Error(`Unsupported key type: ${jwk.kty}`);
}

/** Public members only, in the shape the `jwk` protected header and thumbprints expect */
function publicJwkOf(jwk: JWK): JWK {
  if (jwk.kty === 'EC') {
    return { kty: 'EC', crv: jwk.crv, x: jwk.x, y: jwk.y };
  }
  if (jwk.kty === 'RSA') {
    return { kty: 'RSA', e: jwk.e, n: jwk.n };
  }
  throw new Error(`Unsupported key type: ${jwk.kty}`);
}

export class AcmeKeyPair {
  private constructor(
    public readonly algorithm: AcmeJwsAlgorithm,
    public readonly privateKey: KeyLike,
    public readonly publicKey: KeyLike,
    public readonly publicJwk: Readonly<JWK>,
  ) {
    Object.freeze(publicJwk);
    Object.freeze(this);
  }

  /** Generate a fresh account key (ES256 unless told otherwise) */
  static async generate(algorithm: AcmeJwsAlgorithm = 'ES256'): Promise<AcmeKeyPair> {
    const { privateKey, publicKey } = await generateKeyPair(algorithm, { extractable: true });
    return AcmeKeyPair.fromKeys(privateKey, publicKey);
  }

  /** Wrap an existing key pair; the algorithm is derived from the public key */
  static async fromKeys(privateKey: KeyLike, publicKey: KeyLike): Promise<AcmeKeyPair> {
    const publicJwk = publicJwkOf(await exportJWK(publicKey));
    return new AcmeKeyPair(detectJwsAlgorithm(publicJwk), privateKey, publicKey, publicJwk);
  }

  /**
   * Load a PKCS#8 PEM private key, deriving the public half from it.
   *
   * @param algorithm - JWS algorithm the key is meant for; must match the key
   */
  static async fromPkcs8Pem(pem: string, algorithm: AcmeJwsAlgorithm): Promise<AcmeKeyPair> {
    const privateKey = await importPKCS8(pem, algorithm, { extractable: true });
    const publicJwk = publicJwkOf(await exportJWK(privateKey));

    const detected = detectJwsAlgorithm(publicJwk);
    if (detected !== algorithm) {
      throw new Error(`Key is suitable for ${detected}, not ${algorithm}`);
    }

    const publicKey = await importJWK(publicJwk, algorithm);
    if (publicKey instanceof Uint8Array) {
      throw new Error('Expected an asymmetric public key');
    }

    return new AcmeKeyPair(algorithm, privateKey, publicKey, publicJwk);
  }

  /** PKCS#8 PEM of the private key, for the caller's own storage */
  async toPkcs8Pem(): Promise<string> {
    return exportPKCS8(this.privateKey);
  }

  /** RFC 7638 SHA-256 thumbprint of the public key, base64url */
  async thumbprint(): Promise<string> {
    return calculateJwkThumbprint(this.publicJwk, 'sha256');
  }

  /**
   * Key Authorization per RFC 8555 Section 8.1: token || '.' || thumbprint
   *
   * This is what an HTTP-01 responder serves and what a TLS-ALPN-01 certificate
   * hashes into its acmeIdentifier extension.
   */
  async keyAuthorization(token: string): Promise<string> {
    return `${token}.${await this.thumbprint()}`;
  }
}
