/**
 * Receives the outcome of a call started with {@link ServiceCall.enqueue}.
 */
export interface ServiceCallback<T> {
  onResponse(result: T): void;
  onFailure(error: Error): void;
}

/**
 * A network operation that has been prepared but not yet sent. Nothing goes
 * over the wire until `execute()` or `enqueue()` is called, and each of those
 * sends its own request.
 *
 * @example
 * ```ts
 * const languages = await service.identify('Hola mundo').execute();
 *
 * service.getModels().enqueue({
 *   onResponse: (models) => console.log(models.length),
 *   onFailure: (error) => console.error(error.message),
 * });
 * ```
 */
export class ServiceCall<T> {
  constructor(private readonly run: () => Promise<T>) {}

  /**
   * Sends the request and resolves with the converted result. Rejects with a
   * `ServiceResponseError`, a `DeserializationError`, or the transport's own
   * error.
   */
  execute(): Promise<T> {
    return this.run();
  }

  /**
   * Sends the request without waiting for it; the outcome is reported to `callback`.
   * An exception thrown from the callback is rethrown as an uncaught error.
   */
  enqueue(callback: ServiceCallback<T>): void {
    this.run()
      .then(
        (result) => callback.onResponse(result),
        (error: unknown) => callback.onFailure(error instanceof Error ? error : new Error(String(error))),
      )
      .catch((error: unknown) => {
        queueMicrotask(() => {
          throw error;
        });
      });
  }
}
