import { z, type ZodType, type ZodTypeDef } from 'zod';
import { createServiceResponseError, DeserializationError, type ServiceResponseError } from './errors.js';

/** Schema that accepts any JSON value and yields a `T`. */
export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * How a successful response body becomes a typed result.
 * - `object`: the whole JSON body
 * - `field`: one member of a JSON envelope, e.g. `{"models": [...]}`
 * - `binary`: raw bytes
 * - `void`: body discarded
 */
export type ResponseConverter<T> =
  | { readonly kind: 'object'; readonly schema: Schema<T> }
  | { readonly kind: 'field'; readonly field: string; readonly schema: Schema<T> }
  | { readonly kind: 'binary'; readonly wrap: (bytes: Uint8Array) => T }
  | { readonly kind: 'void'; readonly empty: T };

export const ResponseConverters = {
  object<T>(schema: Schema<T>): ResponseConverter<T> {
    return { kind: 'object', schema };
  },

  list<T>(field: string, itemSchema: Schema<T>): ResponseConverter<T[]> {
    return { kind: 'field', field, schema: z.array(itemSchema) };
  },

  binary(): ResponseConverter<Uint8Array> {
    return { kind: 'binary', wrap: (bytes) => bytes };
  },

  void(): ResponseConverter<void> {
    return { kind: 'void', empty: undefined };
  },
};

export async function convertResponse<T>(response: Response, converter: ResponseConverter<T>): Promise<T> {
  if (!response.ok) {
    throw await toServiceResponseError(response);
  }

  switch (converter.kind) {
    case 'void':
      await response.body?.cancel();
      return converter.empty;

    case 'binary':
      return converter.wrap(new Uint8Array(await response.arrayBuffer()));

    case 'object':
      return parseWith(converter.schema, await readJson(response));

    case 'field': {
      const data = await readJson(response);
      if (!isRecord(data) || !(converter.field in data)) {
        throw new DeserializationError(`Response is missing the "${converter.field}" field`);
      }
      return parseWith(converter.schema, data[converter.field]);
    }
  }
}

export async function toServiceResponseError(response: Response): Promise<ServiceResponseError> {
  let body = '';
  try {
    body = await response.text();
  } catch {
    body = '';
  }
  const trimmed = body.trim();
  const message = extractErrorMessage(trimmed) ?? (trimmed ? trimmed.slice(0, 200) : `HTTP ${response.status}`);
  return createServiceResponseError(response.status, message, body);
}

/**
 * Pulls a human-readable message out of a JSON error body.
 */
export function extractErrorMessage(body: string): string | undefined {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (!isRecord(data)) {
    return undefined;
  }

  const error = data.error;
  if (typeof error === 'string' && error) {
    return error;
  }
  if (isRecord(error) && typeof error.message === 'string' && error.message) {
    return error.message;
  }

  for (const key of ['error_message', 'message', 'msg', 'description']) {
    const value = data[key];
    if (typeof value === 'string' && value) {
      return value;
    }
  }
  return undefined;
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text.trim()) {
    throw new DeserializationError('Response body is empty');
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DeserializationError(
      `Response body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

function parseWith<T>(schema: Schema<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new DeserializationError(`Unexpected response shape: ${issues.join('; ')}`, { cause: result.error });
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
