/** @file
  OAuth Module

  Builds the Strava authorization URL for the client to open.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { STRAVA_APPROVAL_PROMPT, STRAVA_AUTHORIZATION_URL } from "../constants.js";
import { parseCsv } from "../config.js";
import { InternalError } from "../errors.js";
import type { AuthorizationRequest, ProxyConfig } from "../types.js";

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pick the caller's redirect URI when it parses as an absolute URL,
 * else the configured default. There is no allow-list check here.
 */
export function resolveRedirectUri(config: ProxyConfig, requested?: string): string {
  const candidate = requested?.trim();
  return candidate && isAbsoluteUrl(candidate) ? candidate : config.defaultRedirectUri;
}

/**
 * Resolve the scope string, keeping caller order and duplicates.
 */
export function resolveScopes(config: ProxyConfig, requested?: string): string {
  const scopes = parseCsv(requested);
  return (scopes.length > 0 ? scopes : config.defaultScopes).join(",");
}

/**
 * Build the OAuth authorization URL for Strava.
 */
export function buildAuthorizationUrl(config: ProxyConfig, request: AuthorizationRequest = {}): string {
  try {
    const url = new URL(STRAVA_AUTHORIZATION_URL);
    url.searchParams.set("client_id", config.clientId);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("redirect_uri", resolveRedirectUri(config, request.redirectUri));
    url.searchParams.set("approval_prompt", STRAVA_APPROVAL_PROMPT);
    url.searchParams.set("scope", resolveScopes(config, request.scopes));
    if (request.state) {
      url.searchParams.set("state", request.state);
    }
    return url.toString();
  } catch (error) {
    throw new InternalError("Failed to build authorization URL", { cause: error });
  }
}
