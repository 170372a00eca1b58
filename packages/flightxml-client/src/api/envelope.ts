import { JsonValueSchema } from '../types/api';
import type { JsonObject, JsonValue } from '../types/api';
import { ProtocolError, RemoteError } from '../types/client';

/** Error-string prefixes the service uses for rejected alerts */
export const REMOTE_ERROR_CODES = ['OVERLIMIT', 'FLOODWARN'] as const;

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a response body into a JSON value
 */
export function parseBody(method: string, body: string): JsonValue {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw new ProtocolError(
      `Response is not JSON: ${method}: ${error instanceof Error ? error.message : String(error)}`,
      method,
      body
    );
  }

  const parsed = JsonValueSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError(`Response is not a JSON value: ${method}`, method, raw);
  }
  return parsed.data;
}

/**
 * Strip the response envelope.
 *
 * `{ "<method>Result": x }` yields `x`; then an object holding `data` yields
 * its `data`. The second step also applies when the first did not match.
 * Lists are never unwrapped further.
 */
export function unwrapEnvelope(method: string, body: JsonValue): JsonValue {
  let result = body;

  const key = `${method}Result`;
  if (isJsonObject(result) && Object.hasOwn(result, key)) {
    result = result[key] ?? null;
  }

  if (isJsonObject(result) && Object.hasOwn(result, 'data')) {
    result = result.data ?? null;
  }

  return result;
}

/**
 * Recognise an application error carried inside a successful response.
 *
 * Returns a RemoteError for `{ error: string }` objects and for strings that
 * begin with a known error code; undefined otherwise. The result itself is
 * left untouched.
 */
export function remoteErrorOf(result: JsonValue): RemoteError | undefined {
  if (isJsonObject(result) && typeof result.error === 'string') {
    return new RemoteError(result.error, codeOf(result.error), result);
  }

  if (typeof result === 'string') {
    const code = codeOf(result);
    if (code) {
      return new RemoteError(result, code, result);
    }
  }

  return undefined;
}

function codeOf(message: string): string | undefined {
  return REMOTE_ERROR_CODES.find((code) => message.startsWith(code));
}
