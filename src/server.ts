/** @file
  Strava Token Proxy Server

  Keeps the Strava client secret on the server: performs the OAuth code
  exchange and refresh for clients and relays authenticated reads.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { NotFoundError, ProxyError, redactSecrets, toErrorEnvelope } from "./errors.js";
import { createAthleteRoutes } from "./routes/athlete.js";
import { createAuthRoutes } from "./routes/auth.js";
import { createDebugRoutes } from "./routes/debug.js";
import type { ProxyConfig } from "./types.js";

export interface AppOptions {
  /** Disable per-request log lines (tests) */
  requestLogging?: boolean;
}

export function createApp(config: ProxyConfig, options: AppOptions = {}): Hono {
  const app = new Hono();

  // Middleware
  if (options.requestLogging !== false) {
    app.use("*", logger());
  }
  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
    })
  );

  // Health check
  app.get("/", (c) => {
    return c.json({
      status: "ok",
      server: "strava-token-proxy",
      version: "0.1.0",
    });
  });

  app.get("/health", (c) => {
    return c.json({ status: "healthy" });
  });

  app.route("/api", createAuthRoutes(config));
  app.route("/api", createAthleteRoutes(config));
  app.route("/api", createDebugRoutes(config));

  // Error handling
  const secrets = [config.clientSecret];
  app.onError((err, c) => {
    if (err instanceof ProxyError) {
      console.error(`[server] ${err.name}: ${redactSecrets(err.message, secrets)}`);
    } else {
      console.error("[server] Unhandled error:", err);
    }
    const envelope = toErrorEnvelope(err, secrets);
    return c.json(envelope, envelope.status_code);
  });

  // 404 handler
  app.notFound((c) => {
    const envelope = toErrorEnvelope(new NotFoundError(`Not found: ${c.req.path}`));
    return c.json(envelope, 404);
  });

  return app;
}
