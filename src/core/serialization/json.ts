export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = ReadonlyArray<JsonValue>;
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object') return false;
  const proto = Reflect.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function sortJsonValue(value: JsonValue): JsonValue {
  if (isJsonArray(value)) {
    return value.map((entry) => sortJsonValue(entry));
  }
  if (value !== null && typeof value === 'object') {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      const entry = value[key];
      if (entry !== undefined) {
        sorted[key] = sortJsonValue(entry);
      }
    }
    return sorted;
  }
  return value;
}

/** JSON text with object keys in a fixed order, so equal values hash equally. */
export function stableStringifyJson(value: JsonValue): string {
  return JSON.stringify(sortJsonValue(value));
}

export function encodeBase64UrlJson(value: JsonValue): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

/**
 * Decodes text produced by `encodeBase64UrlJson`. Returns `undefined` for anything that is
 * not base64url-encoded JSON.
 */
export function decodeBase64UrlJson(text: string): unknown {
  if (!/^[A-Za-z0-9_-]+$/.test(text)) return undefined;
  try {
    return JSON.parse(Buffer.from(text, 'base64url').toString('utf8'));
  } catch {
    return undefined;
  }
}

function isJsonArray(value: JsonValue): value is JsonArray {
  return Array.isArray(value);
}
