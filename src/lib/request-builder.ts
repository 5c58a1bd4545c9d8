import { HttpMediaType } from './constants.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type QueryValue = string | number | boolean;

export interface FormFilePart {
  /** Form field name */
  name: string;
  /** File name sent in the part's Content-Disposition */
  filename: string;
  data: Uint8Array | Blob;
  contentType: string;
}

export type RequestBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'text'; value: string; contentType: string }
  | { kind: 'form'; parts: readonly FormFilePart[] };

/**
 * A fully specified outbound request, relative to a service endpoint.
 */
export interface ServiceRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query: ReadonlyArray<readonly [string, string]>;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: RequestBody;
}

export class RequestBuilder {
  private readonly query: Array<[string, string]> = [];
  private readonly headers: Record<string, string> = {};
  private body?: RequestBody;

  private constructor(
    private readonly method: HttpMethod,
    private readonly path: string,
  ) {}

  static get(path: string): RequestBuilder {
    return new RequestBuilder('GET', path);
  }

  static post(path: string): RequestBuilder {
    return new RequestBuilder('POST', path);
  }

  static delete(path: string): RequestBuilder {
    return new RequestBuilder('DELETE', path);
  }

  /**
   * Appends a query parameter. `undefined` values are skipped so optional
   * arguments can be passed straight through.
   */
  withQuery(name: string, value: QueryValue | undefined): this {
    if (value !== undefined) {
      this.query.push([name, String(value)]);
    }
    return this;
  }

  withHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  withBodyJson(value: unknown): this {
    this.body = { kind: 'json', value };
    return this;
  }

  withBodyContent(value: string, contentType: string): this {
    this.body = { kind: 'text', value, contentType };
    return this;
  }

  withForm(parts: readonly FormFilePart[]): this {
    this.body = { kind: 'form', parts: [...parts] };
    return this;
  }

  build(): ServiceRequest {
    return {
      method: this.method,
      path: this.path,
      query: this.query.map(([name, value]) => [name, value] as const),
      headers: { ...this.headers },
      ...(this.body ? { body: this.body } : {}),
    };
  }
}

/**
 * Joins a request's path and query onto a service endpoint.
 */
export function buildUrl(endpoint: string, request: ServiceRequest): string {
  const base = endpoint.replace(/\/+$/, '');
  const params = new URLSearchParams();
  for (const [name, value] of request.query) {
    params.append(name, value);
  }
  const search = params.toString();
  return `${base}${request.path}${search ? `?${search}` : ''}`;
}

/**
 * Encodes a request body for `fetch`. Multipart bodies leave Content-Type
 * unset so the boundary is generated by the platform.
 */
export function encodeBody(body: RequestBody): { body: NonNullable<RequestInit['body']>; contentType?: string } {
  switch (body.kind) {
    case 'json':
      return { body: JSON.stringify(body.value), contentType: HttpMediaType.APPLICATION_JSON };
    case 'text':
      return { body: body.value, contentType: body.contentType };
    case 'form': {
      const form = new FormData();
      for (const part of body.parts) {
        form.append(part.name, new Blob([part.data], { type: part.contentType }), part.filename);
      }
      return { body: form };
    }
  }
}
