export {
  flattenPath,
  canonicalJson,
  hashRequestCore,
  computeIdentityName,
  artifactFileName,
  nameFromFileName,
  MAX_PATH_PREFIX_LENGTH,
  ARTIFACT_EXTENSION,
} from './identity.js';
export { selectHeaders, omitHeaders, flattenHeaderValues } from './headers.js';
export type { HeaderSelection } from './headers.js';
export { encodeRequest, buildRequestCore } from './encoder.js';
export type { EncodeOptions, EncodedRequest } from './encoder.js';
export {
  MalformedArtifactError,
  readEncodedBody,
  toTransactionRecord,
  toSentArtifact,
  parseSentArtifact,
  parseTransactionRecord,
  isErrorArtifact,
} from './guards.js';
export { DEFAULT_HEADER_POLICY, CACHE_MODES } from './types.js';
export type {
  HeaderMap,
  CacheMode,
  RequestCore,
  TransactionStats,
  TransactionResponse,
  TransactionRecord,
  ErrorArtifact,
  SentArtifact,
  InboundRequest,
  HeaderPolicy,
} from './types.js';
