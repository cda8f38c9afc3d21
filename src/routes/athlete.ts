/** @file
  Athlete Routes

  Bearer-authenticated passthrough to Strava activities and training zones.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { Hono, type Context } from "hono";
import { extractBearerToken, fetchAthleteData } from "../api/client.js";
import { STRAVA_DATA_PATHS } from "../constants.js";
import type { ProxyConfig, UpstreamPayload } from "../types.js";

const PASSTHROUGH_STATUSES = [200, 201, 202, 203, 206] as const;
type PassthroughStatus = (typeof PASSTHROUGH_STATUSES)[number];

function isPassthroughStatus(status: number): status is PassthroughStatus {
  return PASSTHROUGH_STATUSES.some((code) => code === status);
}

function relay(c: Context, payload: UpstreamPayload): Response {
  const status = isPassthroughStatus(payload.status) ? payload.status : 200;
  return c.body(payload.body, status, { "Content-Type": payload.contentType });
}

export function createAthleteRoutes(config: ProxyConfig): Hono {
  const athlete = new Hono();

  /**
   * GET /api/activities
   * Every query parameter (page, per_page, before, after, ...) is forwarded as-is.
   */
  athlete.get("/activities", async (c) => {
    const token = extractBearerToken(c.req.header("Authorization"));
    const query = new URL(c.req.url).searchParams;
    const payload = await fetchAthleteData(
      config,
      STRAVA_DATA_PATHS.activities,
      token,
      query,
      c.req.raw.signal
    );
    return relay(c, payload);
  });

  /**
   * GET /api/athlete/zones
   */
  athlete.get("/athlete/zones", async (c) => {
    const token = extractBearerToken(c.req.header("Authorization"));
    const payload = await fetchAthleteData(
      config,
      STRAVA_DATA_PATHS.athleteZones,
      token,
      new URLSearchParams(),
      c.req.raw.signal
    );
    return relay(c, payload);
  });

  return athlete;
}
