import { RATE_LIMIT_PER_MINUTE } from "./constants.js";
import type { Operation } from "./types.js";

/**
 * Base class for every failure the client surfaces. Nothing is recovered
 * internally; callers get one of the subclasses below.
 */
export class WallhavenError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "WallhavenError";
  }
}

/**
 * The operation needs an API key and none is configured. Raised before any
 * request is sent.
 */
export class AuthenticationRequiredError extends WallhavenError {
  constructor(readonly operation: Operation) {
    super(`An API key is required for '${operation}'`);
    this.name = "AuthenticationRequiredError";
  }
}

export class UnauthorizedError extends WallhavenError {
  constructor(
    readonly operation: Operation,
    readonly identifier: string,
    readonly keyProvided: boolean
  ) {
    super(
      keyProvided
        ? `API key was rejected for '${operation}' (${identifier})`
        : `Wallhaven requires an API key for '${operation}' (${identifier})`
    );
    this.name = "UnauthorizedError";
  }
}

export class NotFoundError extends WallhavenError {
  constructor(readonly operation: Operation, readonly identifier: string) {
    super(`Wallhaven could not find '${identifier}' (${operation})`);
    this.name = "NotFoundError";
  }
}

export class RateLimitedError extends WallhavenError {
  readonly status = 429;

  constructor(readonly operation: Operation) {
    super(
      `Rate limit of ${RATE_LIMIT_PER_MINUTE} requests per minute exceeded (${operation})`
    );
    this.name = "RateLimitedError";
  }
}

/**
 * Unexpected status code, or a network-level fault (timeout, DNS, reset)
 * reported by the transport.
 */
export class TransportError extends WallhavenError {
  readonly status: number | undefined;

  constructor(
    readonly operation: Operation,
    details: { status?: number; cause?: unknown }
  ) {
    const reason =
      details.status !== undefined
        ? `HTTP ${details.status}`
        : details.cause instanceof Error
          ? details.cause.message
          : "unknown transport failure";
    super(`Wallhaven request failed for '${operation}': ${reason}`, {
      cause: details.cause,
    });
    this.name = "TransportError";
    this.status = details.status;
  }
}

export class MalformedResponseError extends WallhavenError {
  constructor(
    readonly entity: string,
    readonly field: string,
    readonly detail: string
  ) {
    super(`Malformed ${entity} response at '${field}': ${detail}`);
    this.name = "MalformedResponseError";
  }
}

export class DownloadError extends WallhavenError {
  readonly status: number | undefined;

  constructor(
    readonly wallpaperId: string,
    reason: string,
    details: { status?: number; cause?: unknown } = {}
  ) {
    super(`Failed to download wallpaper ${wallpaperId}: ${reason}`, {
      cause: details.cause,
    });
    this.name = "DownloadError";
    this.status = details.status;
  }
}

export class ConfigurationError extends WallhavenError {
  constructor(readonly variable: string, detail: string) {
    super(`Invalid ${variable}: ${detail}`);
    this.name = "ConfigurationError";
  }
}
