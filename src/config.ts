/** @file
  Configuration Module

  Reads the Strava credentials and server settings from the environment.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import {
  DEFAULT_PORT,
  DEFAULT_REDIRECT_URI,
  FETCH_TIMEOUT_MS,
  STRAVA_DEFAULT_SCOPES,
} from "./constants.js";
import { ConfigError } from "./errors.js";
import type { ProxyConfig } from "./types.js";

export type Env = Record<string, string | undefined>;

/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 * Order and duplicates are preserved.
 */
export function parseCsv(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function firstSet(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number | null {
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) return null;
  const value = parseInt(raw, 10);
  return value > 0 ? value : null;
}

/**
 * Build the immutable proxy configuration.
 * Throws ConfigError listing every missing or invalid variable.
 */
export function loadConfig(env: Env = process.env): ProxyConfig {
  const clientId = firstSet(env, "STRAVA_CLIENT_ID");
  const clientSecret = firstSet(env, "STRAVA_CLIENT_SECRET");
  const defaultRedirectUri = firstSet(env, "EXPECTED_REDIRECT_URI") ?? DEFAULT_REDIRECT_URI;

  const configuredScopes = parseCsv(env["STRAVA_DEFAULT_SCOPES"]);
  const upstreamTimeoutMs = parsePositiveInt(firstSet(env, "STRAVA_TIMEOUT_MS"), FETCH_TIMEOUT_MS);
  const port = parsePositiveInt(firstSet(env, "PORT"), DEFAULT_PORT);

  const problems: string[] = [];
  if (!clientId) problems.push("STRAVA_CLIENT_ID is not set");
  if (!clientSecret) problems.push("STRAVA_CLIENT_SECRET is not set");
  if (upstreamTimeoutMs === null) problems.push("STRAVA_TIMEOUT_MS must be a positive integer");
  if (port === null) problems.push("PORT must be a positive integer");

  if (!clientId || !clientSecret || upstreamTimeoutMs === null || port === null) {
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  return Object.freeze({
    clientId,
    clientSecret,
    defaultRedirectUri,
    defaultScopes: Object.freeze(
      configuredScopes.length > 0 ? configuredScopes : [...STRAVA_DEFAULT_SCOPES]
    ),
    upstreamTimeoutMs,
    port,
  });
}
