/**
 * Base class for every error raised by this library. Transport failures
 * (rejections from `fetch`, timeouts) are passed through untouched and do not
 * extend it.
 */
export class NlcloudError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A call argument failed local validation. Raised before any request is sent.
 */
export class ValidationError extends NlcloudError {}

/**
 * The response body could not be parsed into the expected shape.
 */
export class DeserializationError extends NlcloudError {}

/**
 * The service answered with a non-success HTTP status.
 */
export class ServiceResponseError extends NlcloudError {
  readonly status: number;
  /** Raw response body, as text */
  readonly body: string;

  constructor(status: number, message: string, body = '') {
    super(message);
    this.status = status;
    this.body = body;
  }
}

export class BadRequestError extends ServiceResponseError {}
export class UnauthorizedError extends ServiceResponseError {}
export class ForbiddenError extends ServiceResponseError {}
export class NotFoundError extends ServiceResponseError {}
export class ConflictError extends ServiceResponseError {}
export class RequestTooLargeError extends ServiceResponseError {}
export class UnsupportedMediaTypeError extends ServiceResponseError {}
export class TooManyRequestsError extends ServiceResponseError {}
export class InternalServerError extends ServiceResponseError {}
export class ServiceUnavailableError extends ServiceResponseError {}

type ServiceResponseErrorClass = new (status: number, message: string, body?: string) => ServiceResponseError;

const ERRORS_BY_STATUS: Readonly<Record<number, ServiceResponseErrorClass>> = {
  400: BadRequestError,
  401: UnauthorizedError,
  403: ForbiddenError,
  404: NotFoundError,
  409: ConflictError,
  413: RequestTooLargeError,
  415: UnsupportedMediaTypeError,
  429: TooManyRequestsError,
  500: InternalServerError,
  503: ServiceUnavailableError,
};

export function createServiceResponseError(status: number, message: string, body = ''): ServiceResponseError {
  const ErrorClass = ERRORS_BY_STATUS[status] ?? ServiceResponseError;
  return new ErrorClass(status, message, body);
}
