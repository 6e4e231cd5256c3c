/**
 * acme-conductor - core exports
 *
 * RFC 8555 ACME session orchestration over pluggable transport and signing
 */

// Client facade and protocol steps
export { AcmeClient, type AcmeClientOptions } from './core/acme-client.js';
export { fetchDirectory } from './core/directory-resolver.js';
export { fetchNonce } from './core/nonce-source.js';
export { registerAccount, type AccountRegistration } from './core/account-registrar.js';
export {
  JoseRequestSigner,
  buildProtectedHeader,
  type RequestSigner,
  type SignedRequest,
  type SignedPostRequest,
  type SignedPostAsGetRequest,
  type SignedJsonResult,
} from './core/acme-request-signer.js';

// Error handling
export {
  AcmeClientError,
  TransportError,
  ProtocolError,
  DecodeError,
  SigningError,
  isAcmeClientError,
  type AcmeClientErrorKind,
} from './errors/client-errors.js';
export {
  AcmeError,
  AccountDoesNotExistError,
  BadCSRError,
  BadNonceError,
  BadSignatureAlgorithmError,
  CompoundError,
  MalformedError,
  OrderNotReadyError,
  RateLimitedError,
  RejectedIdentifierError,
  ServerInternalError,
  UnauthorizedError,
  UnsupportedIdentifierError,
  UserActionRequiredError,
} from './errors/acme-server-errors.js';
export {
  createErrorFromProblem,
  toProblemDocument,
  type ProblemDocument,
} from './errors/factory.js';
export { ACME_ERROR, isAcmeErrorType, type AcmeErrorType } from './errors/codes.js';

// Types
export type { AcmeDirectory, AcmeDirectoryMeta } from './types/directory.js';
export type {
  AcmeOrder,
  AcmeChallenge,
  AcmeAuthorization,
  AcmeIdentifier,
  AcmeOrderStatus,
  AcmeAuthorizationStatus,
  AcmeChallengeStatus,
  AcmeChallengeType,
} from './types/order.js';
export {
  ORDER_STATUS,
  AUTHORIZATION_STATUS,
  CHALLENGE_STATUS,
  CHALLENGE_TYPE,
  isAcmeOrderStatus,
  isAcmeAuthorizationStatus,
  isAcmeChallengeStatus,
  isAcmeChallengeType,
  isValidOrderStatusTransition,
  isFinalOrderStatus,
} from './types/status.js';

// Transport layer
export {
  UndiciTransport,
  type Transport,
  type TransportRequest,
  type TransportResponse,
  type ResponseBody,
  type ResponseHeaders,
  type HttpMethod,
  type UndiciTransportOptions,
} from './transport/http-client.js';

// Cryptographic operations
export {
  AcmeKeyPair,
  detectJwsAlgorithm,
  createAcmeCsr,
  generateCertificateKeyPair,
  DEFAULT_CSR_ALGORITHM,
  type AcmeJwsAlgorithm,
  type CsrAlgorithm,
  type CsrEcAlgorithm,
  type CsrRsaAlgorithm,
  type CreateCsrOptions,
  type CreateCsrResult,
} from './crypto/index.js';

// Utils
export {
  decodeDirectory,
  decodeOrder,
  decodeAuthorization,
  decodeChallenge,
  decodeIfPresent,
  type Decoder,
} from './utils/decode.js';
export {
  debugRecorder,
  noopRecorder,
  formatFields,
  type EventRecorder,
  type EventFields,
} from './utils/recorder.js';
export { buildUserAgent, getPackageInfo, type PackageInfo } from './utils/user-agent.js';
