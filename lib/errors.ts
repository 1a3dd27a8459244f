/**
 * Error taxonomy for the SolarEdge client
 *
 * Every failure a caller can see is one of four kinds, told apart by `kind`:
 * - transport: the server could not be reached (connection, TLS, timeout)
 * - api:       the server answered with a non-2xx status
 * - parse:     the server answered 2xx but the body has an unexpected shape
 * - request:   the call was rejected before any I/O (bad key, id or range)
 *
 * Nothing here is retried. Retry policy belongs to the caller, see
 * `estimateNextUpdate` for when the next poll is worth issuing.
 */

export type SolarEdgeErrorKind = "transport" | "api" | "parse" | "request";

export abstract class SolarEdgeError extends Error {
  abstract readonly kind: SolarEdgeErrorKind;
}

export class TransportError extends SolarEdgeError {
  readonly kind = "transport";

  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class ApiError extends SolarEdgeError {
  readonly kind = "api";

  constructor(
    public readonly status: number,
    message: string,
    public readonly body: string,
  ) {
    super(message);
    this.name = "ApiError";
  }

  /** The hourly request quota is exhausted */
  get isRateLimited(): boolean {
    return this.status === 429;
  }

  /** Usually a wrong API key or a site the key has no access to */
  get isForbidden(): boolean {
    return this.status === 403;
  }
}

export class ParseError extends SolarEdgeError {
  readonly kind = "parse";

  constructor(
    /** Dotted path of the offending field, e.g. "overview.currentPower.power" */
    public readonly field: string,
    message: string,
  ) {
    super(`Cannot parse field "${field}": ${message}`);
    this.name = "ParseError";
  }
}

export class RequestValidationError extends SolarEdgeError {
  readonly kind = "request";

  constructor(
    public readonly parameter: string,
    message: string,
  ) {
    super(`Invalid ${parameter}: ${message}`);
    this.name = "RequestValidationError";
  }
}
