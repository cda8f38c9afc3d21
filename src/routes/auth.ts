/** @file
  Auth Routes

  Authorization URL, code exchange and token refresh endpoints.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { Hono, type Context } from "hono";
import { buildAuthorizationUrl } from "../auth/oauth.js";
import { exchangeCode, refreshAccessToken } from "../auth/token.js";
import { MissingCredentialError } from "../errors.js";
import { isRecord } from "../api/upstream.js";
import type { ProxyConfig } from "../types.js";

/**
 * Read a string field from the JSON request body, unmodified.
 * A body that is not a JSON object counts as a missing field.
 */
async function readBodyField(c: Context, field: string): Promise<string> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (error) {
    throw new MissingCredentialError(`Request body must be a JSON object with "${field}"`, {
      cause: error,
    });
  }

  const value = isRecord(body) ? body[field] : undefined;
  return typeof value === "string" ? value : "";
}

export function createAuthRoutes(config: ProxyConfig): Hono {
  const auth = new Hono();

  /**
   * GET /api/auth-url
   * Query: redirect_uri?, scopes? (comma-separated), state?
   */
  auth.get("/auth-url", (c) => {
    const url = buildAuthorizationUrl(config, {
      redirectUri: c.req.query("redirect_uri"),
      scopes: c.req.query("scopes"),
      state: c.req.query("state"),
    });
    console.log(
      `[auth] Generated authorization URL (redirect_uri: ${new URL(url).searchParams.get("redirect_uri")})`
    );

    // `url` is the field name older clients read
    return c.json({ auth_url: url, url });
  });

  /**
   * POST /api/exchange-token
   * Body: { "code": "..." }
   */
  auth.post("/exchange-token", async (c) => {
    const code = await readBodyField(c, "code");
    const tokens = await exchangeCode(config, code, c.req.raw.signal);
    return c.json(tokens);
  });

  /**
   * POST /api/refresh-token
   * Body: { "refresh_token": "..." }
   */
  auth.post("/refresh-token", async (c) => {
    const refreshToken = await readBodyField(c, "refresh_token");
    const tokens = await refreshAccessToken(config, refreshToken, c.req.raw.signal);
    return c.json(tokens);
  });

  return auth;
}
