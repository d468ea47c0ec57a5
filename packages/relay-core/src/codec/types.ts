/**
 * Types for the body codec.
 *
 * A body is stored in a transaction file as a `payload` plus a `type` tag.
 * The tag decides how the payload turns back into bytes on the wire.
 */

/** Any value that survives a JSON round trip */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Body that parsed as JSON; the parsed structure is stored, not the text */
export interface JsonBody {
  type: 'json';
  payload: JsonValue;
}

/** Valid UTF-8 text that is not JSON (also used for empty bodies) */
export interface TextBody {
  type: 'string';
  payload: string;
}

/** Bytes that are not valid UTF-8, stored base64-encoded */
export interface BinaryBody {
  type: 'base64';
  payload: string;
}

/** Tagged body as written to disk */
export type EncodedBody = JsonBody | TextBody | BinaryBody;

/** Body type tags */
export type BodyType = EncodedBody['type'];

export const BODY_TYPES: readonly BodyType[] = ['json', 'string', 'base64'] as const;

/** Raw body as handed to or produced by the wire */
export type RawBody = Buffer | string;
