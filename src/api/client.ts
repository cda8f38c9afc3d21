/** @file
  Strava API Client

  Forwards authenticated read requests to the Strava API using the
  caller's own bearer token.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { STRAVA_API_BASE_URL, type StravaDataPath } from "../constants.js";
import { MissingCredentialError, TokenRejectedError, UpstreamUnavailableError } from "../errors.js";
import { describeUpstreamError, fetchWithTimeout } from "./upstream.js";
import type { ProxyConfig, UpstreamPayload } from "../types.js";

/**
 * Pull the token out of an `Authorization: Bearer <token>` header.
 * Returns an empty string when the header is absent or uses another scheme.
 */
export function extractBearerToken(header: string | undefined): string {
  const match = header?.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim() ?? "";
}

/**
 * Build the upstream URL, appending every query pair in its original order.
 */
export function buildDataUrl(path: StravaDataPath, query: URLSearchParams): string {
  const url = new URL(`${STRAVA_API_BASE_URL}/${path}`);
  for (const [key, value] of query) {
    url.searchParams.append(key, value);
  }
  return url.toString();
}

/**
 * Fetch athlete data from Strava on behalf of the caller.
 *
 * The token is never inspected; Strava alone decides whether it is valid.
 * This never refreshes on 401, since the refresh token stays with the client.
 */
export async function fetchAthleteData(
  config: ProxyConfig,
  path: StravaDataPath,
  bearerToken: string,
  query: URLSearchParams = new URLSearchParams(),
  signal?: AbortSignal
): Promise<UpstreamPayload> {
  if (!bearerToken) {
    throw new MissingCredentialError("No access token provided");
  }

  const response = await fetchWithTimeout(
    buildDataUrl(path, query),
    {
      method: "GET",
      headers: {
        Authorization: `Bearer ${bearerToken}`,
        Accept: "application/json",
      },
    },
    { timeoutMs: config.upstreamTimeoutMs, signal }
  );

  if (response.status === 401 || response.status === 403) {
    console.warn(`[api] ${path} rejected the access token (${response.status})`);
    throw new TokenRejectedError(
      "Strava rejected the access token. Refresh it or re-authorize.",
      { upstreamStatus: response.status }
    );
  }

  if (!response.ok) {
    const secrets = [config.clientSecret];
    const message = describeUpstreamError(response, { secrets });
    console.error(`[api] ${path} failed: ${describeUpstreamError(response, { secrets, includeRawBody: true })}`);
    throw new UpstreamUnavailableError(message, { upstreamStatus: response.status });
  }

  return {
    status: response.status,
    contentType: response.contentType,
    body: response.text,
  };
}
