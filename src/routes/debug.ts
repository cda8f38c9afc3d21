/** @file
  Debug Route

  GET /api/debug-info - Non-sensitive configuration summary.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { Hono } from "hono";
import type { DebugInfo, ProxyConfig } from "../types.js";

/**
 * Summarize the running configuration. Reports whether credentials are
 * set, never their values.
 */
export function buildDebugInfo(config: ProxyConfig, now: Date = new Date()): DebugInfo {
  return {
    strava_client_id_set: config.clientId.length > 0,
    strava_client_secret_set: config.clientSecret.length > 0,
    expected_redirect_uri: config.defaultRedirectUri,
    default_scopes: config.defaultScopes.join(","),
    upstream_timeout_ms: config.upstreamTimeoutMs,
    server_time: now.toISOString().replace(/\.\d{3}Z$/, "Z"),
    node_version: process.versions.node,
  };
}

export function createDebugRoutes(config: ProxyConfig): Hono {
  const debug = new Hono();

  debug.get("/debug-info", (c) => {
    return c.json(buildDebugInfo(config));
  });

  return debug;
}
