/** @file
  Proxy Types

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

/**
 * Process-wide configuration, read once at startup and frozen.
 */
export interface ProxyConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly defaultRedirectUri: string;
  readonly defaultScopes: readonly string[];
  readonly upstreamTimeoutMs: number;
  readonly port: number;
}

export interface AuthorizationRequest {
  redirectUri?: string;
  /** Comma-separated scope list */
  scopes?: string;
  state?: string;
}

/**
 * Token response minted by Strava. Fields beyond the ones named here
 * (`expires_in`, `athlete`, ...) are passed through untouched.
 */
export interface TokenPair {
  token_type: string;
  access_token: string;
  refresh_token: string;
  /** Epoch seconds */
  expires_at: number;
  expires_in?: number;
  [field: string]: unknown;
}

export type TokenExchangeRequest =
  | { grant: "authorization_code"; code: string }
  | { grant: "refresh_token"; refreshToken: string };

/**
 * Successful upstream data response, relayed as-is.
 */
export interface UpstreamPayload {
  status: number;
  contentType: string;
  body: string;
}

/** External HTTP statuses the proxy reports errors with */
export type ErrorStatus = 400 | 401 | 404 | 500 | 502;

export interface ErrorEnvelope {
  status_code: ErrorStatus;
  error_kind: ErrorKind;
  message: string;
  upstream_status?: number;
}

export type ErrorKind =
  | "config_error"
  | "missing_credential"
  | "auth_exchange_failed"
  | "token_rejected"
  | "upstream_unavailable"
  | "internal_error"
  | "not_found";

export interface DebugInfo {
  strava_client_id_set: boolean;
  strava_client_secret_set: boolean;
  expected_redirect_uri: string;
  default_scopes: string;
  upstream_timeout_ms: number;
  server_time: string;
  node_version: string;
}
