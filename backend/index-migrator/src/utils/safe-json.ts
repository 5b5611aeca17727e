/**
 * Safe JSON serialization utilities
 * Handles circular references and the error objects thrown by the OpenSearch client
 * @module utils/safe-json
 */

/**
 * Serialized error object interface
 */
export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  statusCode?: number;
  type?: string;
  [key: string]: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reads `error.type` out of an OpenSearch response body
 * (`{ error: { type: 'resource_already_exists_exception', ... } }`).
 */
export function extractStoreErrorType(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.error)) {
    return undefined;
  }
  return typeof body.error.type === 'string' ? body.error.type : undefined;
}

/**
 * Serializes an Error object into a plain JSON-safe object
 *
 * @example
 * ```typescript
 * try {
 *   await client.indices.create({ index });
 * } catch (error) {
 *   logger.error('create failed', { error: serializeError(error) });
 * }
 * ```
 */
export function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) {
    return {
      name: 'UnknownError',
      message: String(error),
    };
  }

  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
  };

  if (error.stack) {
    serialized.stack = error.stack;
  }

  const errorObj: Record<string, unknown> = { ...error };

  if (typeof errorObj.code === 'string') {
    serialized.code = errorObj.code;
  }

  // ResponseError exposes statusCode and body as getters on meta
  const meta = 'meta' in error && isRecord(error.meta) ? error.meta : undefined;
  const statusCode = meta?.statusCode ?? errorObj.statusCode;
  if (typeof statusCode === 'number') {
    serialized.statusCode = statusCode;
  }

  const type = extractStoreErrorType(meta?.body);
  if (type) {
    serialized.type = type;
  }

  const skipped = ['name', 'message', 'stack', 'code', 'statusCode', 'meta'];
  for (const [key, value] of Object.entries(errorObj)) {
    if (skipped.includes(key) || typeof value === 'function' || isCircularOrComplex(value)) {
      continue;
    }
    try {
      JSON.stringify(value);
      serialized[key] = value;
    } catch {
      serialized[key] = '[Unserializable]';
    }
  }

  return serialized;
}

/**
 * Checks if a value is likely to be circular or too complex to serialize
 */
function isCircularOrComplex(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const complexTypes = [
    'Socket',
    'TLSSocket',
    'ClientRequest',
    'IncomingMessage',
    'Agent',
    'Connection',
    'Transport',
    'EventEmitter',
  ];

  return complexTypes.includes(value.constructor?.name ?? '');
}

/**
 * Creates a replacer function for JSON.stringify that handles circular references
 */
export function createCircularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet<object>();

  return function replacer(_key: string, value: unknown): unknown {
    if (value instanceof Error) {
      return serializeError(value);
    }

    if (typeof value !== 'object' || value === null) {
      return value;
    }

    if (seen.has(value)) {
      return '[Circular]';
    }
    seen.add(value);

    if (Array.isArray(value)) {
      return value;
    }

    if (isCircularOrComplex(value)) {
      return `[${value.constructor?.name || 'Complex'}]`;
    }

    return value;
  };
}
