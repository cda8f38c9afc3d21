/** @file
  Token Exchange Module

  Trades authorization codes and refresh tokens for Strava token pairs.
  Each call makes exactly one request to the token endpoint; retrying is
  left to the client.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { REDACTED, STRAVA_TOKEN_URL } from "../constants.js";
import {
  AuthExchangeError,
  MissingCredentialError,
  UpstreamUnavailableError,
} from "../errors.js";
import { describeUpstreamError, fetchWithTimeout, isRecord, parseJson } from "../api/upstream.js";
import type { ProxyConfig, TokenExchangeRequest, TokenPair } from "../types.js";

const TOKEN_FIELDS = new Set(["access_token", "refresh_token", "client_secret", "code"]);

/**
 * Copy a payload with every token-bearing field replaced, for logging.
 */
export function redactTokenFields(payload: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(payload).map(([key, value]) => [key, TOKEN_FIELDS.has(key) ? REDACTED : value])
  );
}

export function isTokenPair(value: unknown): value is TokenPair {
  return (
    isRecord(value) &&
    typeof value.access_token === "string" &&
    typeof value.refresh_token === "string" &&
    typeof value.expires_at === "number" &&
    typeof value.token_type === "string"
  );
}

function buildTokenForm(config: ProxyConfig, request: TokenExchangeRequest): URLSearchParams {
  const form = new URLSearchParams({
    client_id: config.clientId,
    client_secret: config.clientSecret,
  });

  if (request.grant === "authorization_code") {
    form.set("code", request.code);
  } else {
    form.set("refresh_token", request.refreshToken);
  }
  form.set("grant_type", request.grant);

  return form;
}

/**
 * Send one grant to the Strava token endpoint.
 *
 * 4xx responses (other than 429) mean Strava rejected the grant and become
 * AuthExchangeError. Everything else that is not a usable token pair is
 * UpstreamUnavailableError.
 */
export async function requestTokens(
  config: ProxyConfig,
  request: TokenExchangeRequest,
  signal?: AbortSignal
): Promise<TokenPair> {
  const form = buildTokenForm(config, request);
  const label = request.grant === "authorization_code" ? "exchange" : "refresh";

  console.log(
    `[token] ${label} request: ${JSON.stringify(redactTokenFields(Object.fromEntries(form)))}`
  );

  const response = await fetchWithTimeout(
    STRAVA_TOKEN_URL,
    {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: form,
    },
    { timeoutMs: config.upstreamTimeoutMs, signal }
  );

  console.log(`[token] ${label} response status: ${response.status}`);

  if (!response.ok) {
    const secrets = [config.clientSecret];
    const message = describeUpstreamError(response, { secrets });
    console.error(
      `[token] ${label} failed: ${describeUpstreamError(response, { secrets, includeRawBody: true })}`
    );
    const rejected = response.status >= 400 && response.status < 500 && response.status !== 429;
    if (rejected) {
      throw new AuthExchangeError(message, { upstreamStatus: response.status });
    }
    throw new UpstreamUnavailableError(message, { upstreamStatus: response.status });
  }

  const payload = parseJson(response.text);
  if (!isTokenPair(payload)) {
    throw new UpstreamUnavailableError("Strava returned a malformed token response", {
      upstreamStatus: response.status,
    });
  }

  console.log(`[token] ${label} succeeded: ${JSON.stringify(redactTokenFields(payload))}`);
  return payload;
}

/**
 * Exchange a single-use authorization code for a token pair.
 * The code is sent exactly as given; only a blank one is refused.
 */
export async function exchangeCode(
  config: ProxyConfig,
  code: string,
  signal?: AbortSignal
): Promise<TokenPair> {
  if (!code.trim()) {
    throw new MissingCredentialError("No authorization code provided");
  }
  return requestTokens(config, { grant: "authorization_code", code }, signal);
}

/**
 * Trade a refresh token for a new pair. Strava may rotate the refresh
 * token; callers must store the returned one.
 */
export async function refreshAccessToken(
  config: ProxyConfig,
  refreshToken: string,
  signal?: AbortSignal
): Promise<TokenPair> {
  if (!refreshToken.trim()) {
    throw new MissingCredentialError("No refresh token provided");
  }
  return requestTokens(config, { grant: "refresh_token", refreshToken }, signal);
}
