/** @file
  Strava Token Proxy Constants

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

// =============================================================================
// OAuth Configuration
// =============================================================================

export const STRAVA_AUTHORIZATION_URL = "https://www.strava.com/oauth/authorize";
export const STRAVA_TOKEN_URL = "https://www.strava.com/api/v3/oauth/token";

/** Default scope set, in the order it is sent to Strava */
export const STRAVA_DEFAULT_SCOPES = ["read", "activity:read_all", "profile:read_all"] as const;

/** Fixed `approval_prompt` value; "force" would re-prompt users who already approved */
export const STRAVA_APPROVAL_PROMPT = "auto";

export const DEFAULT_REDIRECT_URI = "http://localhost:3000/exchange_token";

// =============================================================================
// API Endpoints
// =============================================================================

export const STRAVA_API_BASE_URL = "https://www.strava.com/api/v3";

/** Upstream data paths the bearer proxy is allowed to reach */
export const STRAVA_DATA_PATHS = {
  activities: "athlete/activities",
  athleteZones: "athlete/zones",
} as const;

export type StravaDataPath = (typeof STRAVA_DATA_PATHS)[keyof typeof STRAVA_DATA_PATHS];

// =============================================================================
// Transport
// =============================================================================

/** Fetch timeout for upstream calls */
export const FETCH_TIMEOUT_MS = 10_000;

/** Upstream error bodies are truncated to this many characters */
export const UPSTREAM_ERROR_BODY_LIMIT = 500;

export const REDACTED = "[REDACTED]";

export const DEFAULT_PORT = 8080;
