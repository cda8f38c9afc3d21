/** @file
  Main entry point

  Loads configuration from the environment and serves the proxy on Node.js.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { serve } from "@hono/node-server";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createApp } from "./server.js";
import type { ProxyConfig } from "./types.js";

function loadConfigOrExit(): ProxyConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.error(`[config] ${error.message}`);
    console.error("");
    console.error("Required environment variables:");
    console.error("  STRAVA_CLIENT_ID        - Strava API application client ID");
    console.error("  STRAVA_CLIENT_SECRET    - Strava API application client secret");
    console.error("");
    console.error("Optional:");
    console.error("  EXPECTED_REDIRECT_URI   - Default OAuth redirect URI");
    console.error("  STRAVA_DEFAULT_SCOPES   - Default scopes (comma-separated)");
    console.error("  STRAVA_TIMEOUT_MS       - Upstream request timeout in ms");
    console.error("  PORT                    - Listen port (default 8080)");
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const app = createApp(config);

console.log(`[config] Expected redirect URI: ${config.defaultRedirectUri}`);

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`
Strava Token Proxy

🚀 Server listening on http://localhost:${info.port}

Available endpoints:
  GET  /api/auth-url          - Strava authorization URL
  POST /api/exchange-token    - Exchange authorization code for tokens
  POST /api/refresh-token     - Refresh an access token
  GET  /api/activities        - Athlete activities (Bearer token)
  GET  /api/athlete/zones     - Athlete training zones (Bearer token)
  GET  /api/debug-info        - Configuration summary (no secrets)
  GET  /health                - Health check
`);
});
