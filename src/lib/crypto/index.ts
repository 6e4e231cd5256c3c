/**
 * Key material and CSR generation
 */

export {
  AcmeKeyPair,
  detectJwsAlgorithm,
  type AcmeJwsAlgorithm,
} from './key-pair.js';

export {
  createAcmeCsr,
  generateCertificateKeyPair,
  DEFAULT_CSR_ALGORITHM,
  type CsrAlgorithm,
  type CsrEcAlgorithm,
  type CsrRsaAlgorithm,
  type CreateCsrOptions,
  type CreateCsrResult,
} from './csr.js';
