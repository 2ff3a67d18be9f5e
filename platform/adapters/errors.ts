export type AdapterErrorKind = "transient" | "permanent";

/**
 * Raised by any ad-server adapter call.
 *
 * `transient` covers timeouts, rate limits and platform outages;
 * `permanent` covers rejected requests. The engine never retries either.
 */
export class AdapterError extends Error {
  public readonly kind: AdapterErrorKind;
  public readonly adapter: string;

  constructor(kind: AdapterErrorKind, message: string, adapter = "unknown") {
    super(message);
    this.name = "AdapterError";
    this.kind = kind;
    this.adapter = adapter;
  }

  static transient(message: string, adapter?: string): AdapterError {
    return new AdapterError("transient", message, adapter);
  }

  static permanent(message: string, adapter?: string): AdapterError {
    return new AdapterError("permanent", message, adapter);
  }
}

export function isAdapterError(err: unknown): err is AdapterError {
  return err instanceof AdapterError;
}
