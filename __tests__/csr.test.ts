import { describe, test, expect } from '@jest/globals';
import { Pkcs10CertificateRequest, SubjectAlternativeNameExtension } from '@peculiar/x509';

import {
  createAcmeCsr,
  generateCertificateKeyPair,
  type CsrEcAlgorithm,
} from '../src/lib/crypto/csr.js';

describe('CSR and Key Generation', () => {
  const testDomain = 'test.example.com';

  describe('ECDSA Key Generation', () => {
    test('should generate P-256 ECDSA keys by default', async () => {
      const keyPair = await generateCertificateKeyPair();

      expect(keyPair.publicKey.algorithm).toMatchObject({ name: 'ECDSA', namedCurve: 'P-256' });
      expect(keyPair.privateKey.type).toBe('private');
    });

    test('should generate P-384 ECDSA keys', async () => {
      const algo: CsrEcAlgorithm = { kind: 'ec', namedCurve: 'P-384', hash: 'SHA-384' };
      const keyPair = await generateCertificateKeyPair(algo);

      expect(keyPair.publicKey.algorithm).toMatchObject({ name: 'ECDSA', namedCurve: 'P-384' });
    });
  });

  describe('CSR Generation', () => {
    test('should put the first domain in CN and every domain in SAN, in order', async () => {
      const domains = [testDomain, 'www.example.com', 'api.example.com'];

      const { der } = await createAcmeCsr(domains);
      const csr = new Pkcs10CertificateRequest(der);

      expect(csr.subject).toBe(`CN=${testDomain}`);
      const san = csr.getExtension(SubjectAlternativeNameExtension);
      expect(san?.names.items.map((name) => name.value)).toEqual(domains);
      expect(await csr.verify()).toBe(true);
    });

    test('should return matching DER and PEM forms', async () => {
      const { der, pem } = await createAcmeCsr([testDomain]);

      expect(der.length).toBeGreaterThan(0);
      expect(pem.startsWith('-----BEGIN CERTIFICATE REQUEST-----')).toBe(true);
      expect(new Uint8Array(new Pkcs10CertificateRequest(pem).rawData)).toEqual(der);
    });

    test('should reuse provided keys', async () => {
      const keys = await generateCertificateKeyPair();

      const result = await createAcmeCsr([testDomain], { keys });

      expect(result.keys).toBe(keys);
    });

    test('should reject an empty domain list', async () => {
      await expect(createAcmeCsr([])).rejects.toThrow('domains must contain at least one DNS name');
    });
  });
});
