import { beforeEach, describe, expect, it } from "vitest";

import { isRecord } from "../src/api/upstream.js";
import { buildDebugInfo } from "../src/routes/debug.js";
import { createApp } from "../src/server.js";
import {
  TEST_CLIENT_ID,
  TEST_SECRET,
  captureConsole,
  createTestConfig,
  createTokenPair,
  hangingFetch,
  jsonResponse,
  stubFetch,
} from "./fixtures.js";

const postJson = (body: unknown): RequestInit => ({
  method: "POST",
  headers: { "Content-Type": "application/json" },
  body: JSON.stringify(body),
});

describe("createApp", () => {
  const config = createTestConfig();
  const app = createApp(config, { requestLogging: false });

  beforeEach(() => {
    captureConsole();
  });

  describe("GET /api/auth-url", () => {
    it("should return the authorization URL with permissive CORS headers", async () => {
      const res = await app.request("/api/auth-url");
      const body: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(res.headers.get("access-control-allow-origin")).toBe("*");
      expect(body).toEqual({
        auth_url: expect.stringContaining(`client_id=${TEST_CLIENT_ID}`),
        url: expect.stringContaining(`client_id=${TEST_CLIENT_ID}`),
      });
    });

    it("should honour redirect_uri, scopes and state overrides", async () => {
      const query = new URLSearchParams({
        redirect_uri: "https://app.example.com/callback",
        scopes: "read,activity:read",
        state: "s-1",
      });
      const res = await app.request(`/api/auth-url?${query.toString()}`);
      const body: unknown = await res.json();
      const authUrl = isRecord(body) ? body.auth_url : undefined;
      expect(typeof authUrl).toBe("string");
      const params = new URL(String(authUrl)).searchParams;

      expect(params.get("redirect_uri")).toBe("https://app.example.com/callback");
      expect(params.get("scope")).toBe("read,activity:read");
      expect(params.get("state")).toBe("s-1");
    });
  });

  describe("POST /api/exchange-token", () => {
    it("should return the token pair unchanged", async () => {
      const upstream = createTokenPair();
      stubFetch(async () => jsonResponse(upstream));

      const res = await app.request("/api/exchange-token", postJson({ code: "valid-code" }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual(upstream);
    });

    it("should reject a missing code without calling Strava", async () => {
      const fetchMock = stubFetch(async () => jsonResponse(createTokenPair()));

      const res = await app.request("/api/exchange-token", postJson({}));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status_code: 400,
        error_kind: "missing_credential",
        message: "No authorization code provided",
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("should reject a body that is not JSON", async () => {
      const res = await app.request("/api/exchange-token", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "code=abc",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status_code: 400,
        error_kind: "missing_credential",
        message: 'Request body must be a JSON object with "code"',
      });
    });

    it("should report a reused code as auth_exchange_failed after one call", async () => {
      const fetchMock = stubFetch(async () =>
        jsonResponse(
          { message: "Bad Request", errors: [{ resource: "AuthorizationCode", field: "code", code: "invalid" }] },
          400
        )
      );

      const res = await app.request("/api/exchange-token", postJson({ code: "already-used-code" }));

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        status_code: 401,
        error_kind: "auth_exchange_failed",
        message: "Strava API error: 400 - Bad Request (AuthorizationCode code invalid)",
        upstream_status: 400,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("should forward the code without trimming it and refuse a blank one", async () => {
      const fetchMock = stubFetch(async () => jsonResponse(createTokenPair()));

      const blank = await app.request("/api/exchange-token", postJson({ code: "  " }));
      expect(blank.status).toBe(400);
      expect(fetchMock).not.toHaveBeenCalled();

      const res = await app.request("/api/exchange-token", postJson({ code: " valid-code " }));
      expect(res.status).toBe(200);
      const form = new URLSearchParams(String(fetchMock.mock.calls[0]?.[1]?.body));
      expect(form.get("code")).toBe(" valid-code ");
    });
  });

  describe("POST /api/refresh-token", () => {
    it("should return the rotated refresh token", async () => {
      stubFetch(async () => jsonResponse(createTokenPair({ refresh_token: "refresh-new" })));

      const res = await app.request("/api/refresh-token", postJson({ refresh_token: "refresh-old" }));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ refresh_token: "refresh-new" });
    });

    it("should reject a missing refresh token", async () => {
      const res = await app.request("/api/refresh-token", postJson({ refresh_token: "" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status_code: 400,
        error_kind: "missing_credential",
        message: "No refresh token provided",
      });
    });
  });

  describe("GET /api/activities", () => {
    it("should require a bearer token", async () => {
      const fetchMock = stubFetch(async () => jsonResponse([]));

      const res = await app.request("/api/activities");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status_code: 400,
        error_kind: "missing_credential",
        message: "No access token provided",
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("should forward the query string verbatim and relay the body", async () => {
      const fetchMock = stubFetch(async () => jsonResponse([{ id: 7 }]));

      const res = await app.request("/api/activities?per_page=5&page=2&after=1700000000", {
        headers: { Authorization: "Bearer valid" },
      });

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("application/json");
      expect(await res.text()).toBe('[{"id":7}]');
      expect(fetchMock.mock.calls[0]?.[0]).toBe(
        "https://www.strava.com/api/v3/athlete/activities?per_page=5&page=2&after=1700000000"
      );
    });
  });

  describe("GET /api/athlete/zones", () => {
    it("should report a rejected token as 401 token_rejected", async () => {
      stubFetch(async () => jsonResponse({ message: "Authorization Error" }, 401));

      const res = await app.request("/api/athlete/zones", {
        headers: { Authorization: "Bearer valid" },
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        status_code: 401,
        error_kind: "token_rejected",
        message: "Strava rejected the access token. Refresh it or re-authorize.",
        upstream_status: 401,
      });
    });

    it("should relay the zones body", async () => {
      stubFetch(async () => jsonResponse({ heart_rate: { custom_zones: false } }));

      const res = await app.request("/api/athlete/zones", {
        headers: { Authorization: "Bearer valid" },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ heart_rate: { custom_zones: false } });
    });
  });

  describe("upstream timeouts", () => {
    const slowApp = createApp(createTestConfig({ upstreamTimeoutMs: 20 }), { requestLogging: false });

    it.each<{ path: string; init: RequestInit }>([
      { path: "/api/exchange-token", init: postJson({ code: "valid-code" }) },
      { path: "/api/refresh-token", init: postJson({ refresh_token: "refresh-old" }) },
      { path: "/api/activities", init: { headers: { Authorization: "Bearer valid" } } },
    ])("should answer $path with 502 upstream_unavailable", async ({ path, init }) => {
      stubFetch(hangingFetch);

      const res = await slowApp.request(path, init);

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({
        status_code: 502,
        error_kind: "upstream_unavailable",
        message: "Strava did not respond within 20ms",
      });
    });
  });

  describe("CORS on error responses", () => {
    const slowApp = createApp(createTestConfig({ upstreamTimeoutMs: 20 }), { requestLogging: false });
    const bearer: RequestInit = { headers: { Authorization: "Bearer valid" } };

    it.each<{ path: string; init?: RequestInit; upstream: typeof fetch; status: number; kind: string }>([
      { path: "/api/activities", upstream: async () => jsonResponse([]), status: 400, kind: "missing_credential" },
      {
        path: "/api/athlete/zones",
        init: bearer,
        upstream: async () => jsonResponse({ message: "Authorization Error" }, 401),
        status: 401,
        kind: "token_rejected",
      },
      { path: "/api/activities", init: bearer, upstream: hangingFetch, status: 502, kind: "upstream_unavailable" },
      { path: "/api/nope", upstream: async () => jsonResponse({}), status: 404, kind: "not_found" },
    ])("should send access-control-allow-origin with a $status $kind envelope", async ({ path, init, upstream, status, kind }) => {
      stubFetch(upstream);

      const res = await slowApp.request(path, init);

      expect(res.status).toBe(status);
      expect(res.headers.get("access-control-allow-origin")).toBe("*");
      expect(await res.json()).toMatchObject({ status_code: status, error_kind: kind });
    });
  });

  describe("GET /api/debug-info", () => {
    it("should summarize configuration without the client secret", async () => {
      const res = await app.request("/api/debug-info");
      const text = await res.text();
      const body: unknown = JSON.parse(text);

      expect(res.status).toBe(200);
      expect(text.includes(TEST_SECRET)).toBe(false);
      expect(text.includes(TEST_CLIENT_ID)).toBe(false);
      expect(body).toMatchObject({
        strava_client_id_set: true,
        strava_client_secret_set: true,
        expected_redirect_uri: "http://localhost:3000/exchange_token",
        default_scopes: "read,activity:read_all,profile:read_all",
        upstream_timeout_ms: 1000,
      });
      expect(body).not.toHaveProperty("using_firebase_config");
    });
  });

  describe("fallbacks", () => {
    it("should answer unknown routes with a not_found envelope", async () => {
      const res = await app.request("/api/nope");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        status_code: 404,
        error_kind: "not_found",
        message: "Not found: /api/nope",
      });
    });

    it("should answer CORS preflight requests", async () => {
      const res = await app.request("/api/exchange-token", {
        method: "OPTIONS",
        headers: {
          Origin: "https://app.example.com",
          "Access-Control-Request-Method": "POST",
        },
      });

      expect(res.status).toBe(204);
      expect(res.headers.get("access-control-allow-origin")).toBe("*");
      expect(res.headers.get("access-control-allow-methods")).toBe("GET,POST,OPTIONS");
      expect(res.headers.get("access-control-allow-headers")).toBe("Content-Type,Authorization");
    });

    it("should report health", async () => {
      const res = await app.request("/health");

      expect(await res.json()).toEqual({ status: "healthy" });
    });
  });
});

describe("fn:buildDebugInfo", () => {
  it("should format server time to the second in UTC", () => {
    const info = buildDebugInfo(createTestConfig(), new Date("2026-01-02T03:04:05.678Z"));

    expect(info.server_time).toBe("2026-01-02T03:04:05Z");
    expect(info.node_version).toBe(process.versions.node);
  });
});
