/**
 * Base class for every failure raised while answering a rates query.
 * Each subclass maps to exactly one HTTP status and one CLI exit code.
 */
export class ValetError extends Error {
  readonly requestUrl?: string;

  constructor(message: string, options: { requestUrl?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.requestUrl = options.requestUrl;
  }
}

/** Caller supplied a malformed date or an end date before the start date. */
export class InputError extends ValetError {}

/** The request never produced a response (network failure, timeout). */
export class TransportError extends ValetError {}

/** Valet answered with a non-success status. */
export class ProtocolError extends ValetError {
  readonly status: number;
  /** Upstream body, pretty-printed when it was JSON. */
  readonly payload: string;

  constructor(status: number, payload: string, requestUrl?: string) {
    super(`Valet responded with HTTP ${status}`, { requestUrl });
    this.status = status;
    this.payload = payload;
  }
}

/** A success response whose body does not match the observations schema. */
export class ParseError extends ValetError {}

/** The fetched window holds no observation at or before the requested start. */
export class SelectionError extends ValetError {}

/** Local request budget towards Valet is exhausted. */
export class RateLimitError extends ValetError {
  readonly blockedUntil: number;

  constructor(message: string, blockedUntil: number) {
    super(message);
    this.blockedUntil = blockedUntil;
  }
}
