export interface NormalizedError {
  code?: string;
  message: string;
  stack?: string;
}

/**
 * Flattens anything thrown into a loggable shape. Driver errors (pg, node:net) carry their
 * SQLSTATE or errno in `code`, which is preferred over the constructor name.
 */
export function normalizeError(
  error: unknown,
  override?: Partial<NormalizedError>,
): NormalizedError {
  const base: NormalizedError = {
    message: 'Unknown error',
  };
  if (error instanceof Error) {
    base.message = error.message;
    if (error.stack) {
      base.stack = error.stack;
    }
    const code = extractErrorCode(error);
    if (code) base.code = code;
  } else if (typeof error === 'string') {
    base.message = error;
  } else {
    try {
      base.message = JSON.stringify(error);
    } catch {
      base.message = String(error);
    }
  }
  return { ...base, ...override };
}

export function errorString(err: NormalizedError): string {
  return err.code ? `${err.code}: ${err.message}` : err.message;
}

export function extractErrorCode(error: unknown): string | undefined {
  const code = getStringProperty(error, 'code');
  if (code) return code;
  const name = getStringProperty(error, 'name');
  if (name && name !== 'Error') return name;
  return undefined;
}

function getStringProperty(value: unknown, key: string): string | undefined {
  if (!value || typeof value !== 'object') return undefined;
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'string' ? property : undefined;
}
