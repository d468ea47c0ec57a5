export {
  encodeBody,
  decodeBody,
  decodeUtf8,
  isEmptyBody,
  isJsonValue,
  toUtf8OrBase64,
} from './data-codec.js';
export { BODY_TYPES } from './types.js';
export type {
  JsonValue,
  JsonBody,
  TextBody,
  BinaryBody,
  EncodedBody,
  BodyType,
  RawBody,
} from './types.js';
