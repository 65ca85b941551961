/**
 * JSON body documents.
 *
 * Dialect handlers only read and rewrite a few known fields; every other
 * field is carried through as-is.
 *
 * @packageDocumentation
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/** Request body as handed to the dispatcher. */
export type RequestBody =
  | { kind: 'document'; document: JsonObject }
  | { kind: 'opaque'; bytes: Buffer };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a request body as a JSON object. Anything that is not a JSON
 * object (invalid JSON, an array, a bare scalar, an empty body) becomes `{}`.
 */
export function parseDocument(raw: Buffer | string): JsonObject {
  const text = typeof raw === 'string' ? raw : raw.toString('utf-8');
  if (text.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function encodeBody(body: RequestBody): Buffer {
  return body.kind === 'document'
    ? Buffer.from(JSON.stringify(body.document), 'utf-8')
    : body.bytes;
}
