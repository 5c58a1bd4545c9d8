import { DEFAULT_TIMEOUT_MS, HttpHeaders, USER_AGENT } from './constants.js';
import { ValidationError } from './errors.js';
import { buildUrl, encodeBody, type ServiceRequest } from './request-builder.js';
import { convertResponse, type ResponseConverter } from './response-converter.js';
import { ServiceCall } from './service-call.js';

// biome-ignore lint/suspicious/noExplicitAny: TS mixin constructor requirement.
export type AbstractConstructor<T = object> = abstract new (...args: any[]) => T;

// biome-ignore lint/suspicious/noExplicitAny: TS mixin constructor requirement.
export type Mixin<TBase extends AbstractConstructor, TAdded> = TBase & (abstract new (...args: any[]) => TAdded);

export interface ServiceOptions {
  /** Base URL of the service, without a trailing path such as `/v2` */
  endpoint?: string;
  username?: string;
  password?: string;
  /** Per-request timeout in milliseconds; 0 disables it */
  timeoutMs?: number;
  /** Headers sent with every request; per-request headers take precedence */
  defaultHeaders?: Record<string, string>;
}

/**
 * Shared plumbing for every service client: endpoint, credentials, default
 * headers and request dispatch. Concrete clients add their operations through
 * mixins and only ever hand back {@link ServiceCall}s.
 */
export abstract class ServiceBase {
  readonly serviceName: string;
  protected readonly timeoutMs: number;
  private endpoint: string;
  private username?: string;
  private password?: string;
  private defaultHeaders: Record<string, string>;

  constructor(serviceName: string, defaultEndpoint: string, options: ServiceOptions = {}) {
    if (options.timeoutMs !== undefined && (!Number.isFinite(options.timeoutMs) || options.timeoutMs < 0)) {
      throw new ValidationError(`Invalid timeout: ${options.timeoutMs}`);
    }
    this.serviceName = serviceName;
    this.endpoint = options.endpoint ?? defaultEndpoint;
    this.username = options.username;
    this.password = options.password;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultHeaders = { ...options.defaultHeaders };
  }

  getEndpoint(): string {
    return this.endpoint;
  }

  setEndpoint(endpoint: string): void {
    this.endpoint = endpoint;
  }

  setUsernameAndPassword(username: string, password: string): void {
    this.username = username;
    this.password = password;
  }

  setDefaultHeaders(headers: Record<string, string>): void {
    this.defaultHeaders = { ...headers };
  }

  /**
   * Wraps a built request and its converter into a lazy call handle. The
   * timeout covers both the request and reading the response body.
   */
  protected createServiceCall<T>(request: ServiceRequest, converter: ResponseConverter<T>): ServiceCall<T> {
    return new ServiceCall(() =>
      this.withTimeout(async (signal) => {
        const response = await this.send(request, signal);
        return convertResponse(response, converter);
      }),
    );
  }

  protected getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      [HttpHeaders.USER_AGENT]: USER_AGENT,
      ...this.defaultHeaders,
    };
    if (this.username !== undefined && this.password !== undefined) {
      const token = Buffer.from(`${this.username}:${this.password}`).toString('base64');
      headers[HttpHeaders.AUTHORIZATION] = `Basic ${token}`;
    }
    return headers;
  }

  protected async send(request: ServiceRequest, signal?: AbortSignal): Promise<Response> {
    const requestHeaders = new Headers(request.headers);
    const headers = new Headers(this.getHeaders());
    requestHeaders.forEach((value, name) => {
      headers.set(name, value);
    });
    const init: RequestInit = { method: request.method, headers };

    if (request.body) {
      const encoded = encodeBody(request.body);
      init.body = encoded.body;
      // The body decides its own content type unless the request names one.
      if (!requestHeaders.has(HttpHeaders.CONTENT_TYPE)) {
        if (encoded.contentType) {
          headers.set(HttpHeaders.CONTENT_TYPE, encoded.contentType);
        } else {
          headers.delete(HttpHeaders.CONTENT_TYPE);
        }
      }
    }
    if (signal) {
      init.signal = signal;
    }

    return fetch(buildUrl(this.endpoint, request), init);
  }

  /**
   * Runs `task` under the configured timeout. On expiry the signal handed to
   * `task` is aborted and the call rejects with the abort reason, even when
   * the pending work never observes the signal.
   */
  protected async withTimeout<T>(task: (signal?: AbortSignal) => Promise<T>): Promise<T> {
    if (this.timeoutMs <= 0) {
      return task();
    }
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort(
          new DOMException(`${this.serviceName} request timed out after ${this.timeoutMs} ms`, 'TimeoutError'),
        );
        reject(controller.signal.reason);
      }, this.timeoutMs);
    });
    try {
      return await Promise.race([task(controller.signal), expired]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
