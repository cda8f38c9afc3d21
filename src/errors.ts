/** @file
  Error Module

  Error taxonomy for the proxy and the normalizer that turns any thrown
  value into the JSON error envelope sent to clients.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { REDACTED } from "./constants.js";
import type { ErrorEnvelope, ErrorKind, ErrorStatus } from "./types.js";

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base class for every failure the proxy reports to its callers.
 * Each subclass pins one `kind` to one HTTP status.
 */
export abstract class ProxyError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: ErrorStatus;
  /** Status returned by Strava, when the failure came from a response */
  readonly upstreamStatus?: number;

  constructor(message: string, options: { upstreamStatus?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.upstreamStatus = options.upstreamStatus;
  }
}

/** Missing or malformed credentials at startup. */
export class ConfigError extends ProxyError {
  readonly kind = "config_error";
  readonly status = 500;
}

/** The client omitted a required token or parameter. */
export class MissingCredentialError extends ProxyError {
  readonly kind = "missing_credential";
  readonly status = 400;
}

/** Strava rejected an authorization code or refresh token. Not retryable. */
export class AuthExchangeError extends ProxyError {
  readonly kind = "auth_exchange_failed";
  readonly status = 401;
}

/** Strava rejected the bearer token on a data call; refresh or re-authorize. */
export class TokenRejectedError extends ProxyError {
  readonly kind = "token_rejected";
  readonly status = 401;
}

/** Network failure, timeout, or an unusable upstream response. */
export class UpstreamUnavailableError extends ProxyError {
  readonly kind = "upstream_unavailable";
  readonly status = 502;
}

export class InternalError extends ProxyError {
  readonly kind = "internal_error";
  readonly status = 500;
}

export class NotFoundError extends ProxyError {
  readonly kind = "not_found";
  readonly status = 404;
}

// =============================================================================
// Normalizer
// =============================================================================

/**
 * Replace every occurrence of the given secrets with a placeholder.
 * Empty strings are ignored.
 */
export function redactSecrets(text: string, secrets: readonly string[]): string {
  return secrets.reduce(
    (result, secret) => (secret ? result.split(secret).join(REDACTED) : result),
    text
  );
}

/**
 * Convert any thrown value into the external error envelope.
 * Errors outside the taxonomy are reported as `internal_error` without
 * their message, which may carry upstream-internal detail.
 */
export function toErrorEnvelope(error: unknown, secrets: readonly string[] = []): ErrorEnvelope {
  if (!(error instanceof ProxyError)) {
    return {
      status_code: 500,
      error_kind: "internal_error",
      message: "Internal server error",
    };
  }

  const envelope: ErrorEnvelope = {
    status_code: error.status,
    error_kind: error.kind,
    message: redactSecrets(error.message, secrets),
  };

  if (error.upstreamStatus !== undefined) {
    envelope.upstream_status = error.upstreamStatus;
  }

  return envelope;
}
