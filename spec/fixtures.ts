import { vi } from "vitest";

import type { Mock } from "vitest";

import type { ProxyConfig, TokenPair } from "../src/types.js";

export const TEST_CLIENT_ID = "test-client-id";
export const TEST_SECRET = "test-secret";

export const createTestConfig = (
  overrides: Partial<ProxyConfig> = {},
): ProxyConfig => ({
  clientId: TEST_CLIENT_ID,
  clientSecret: TEST_SECRET,
  defaultRedirectUri: "http://localhost:3000/exchange_token",
  defaultScopes: ["read", "activity:read_all", "profile:read_all"],
  upstreamTimeoutMs: 1000,
  port: 8080,
  ...overrides,
});

export const createTokenPair = (overrides: Partial<TokenPair> = {}): TokenPair => ({
  token_type: "Bearer",
  expires_at: 1_700_000_000,
  expires_in: 21_600,
  refresh_token: "refresh-1",
  access_token: "access-1",
  athlete: { id: 42, firstname: "Test" },
  ...overrides,
});

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

/**
 * Replace the global fetch for the current test.
 * vitest's `unstubGlobals` restores the original afterwards.
 */
export const stubFetch = (impl: typeof fetch): Mock<typeof fetch> => {
  const mock = vi.fn<typeof fetch>(impl);
  vi.stubGlobal("fetch", mock);

  return mock;
};

/** a fetch that never answers and only settles when its signal aborts */
export const hangingFetch: typeof fetch = async (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (signal?.aborted) {
      reject(new Error("This operation was aborted"));

      return;
    }
    signal?.addEventListener(
      "abort",
      () => reject(new Error("This operation was aborted")),
      { once: true },
    );
  });

/** collect everything written through console.log/warn/error */
export const captureConsole = (): (() => string) => {
  const lines: string[] = [];
  const record = (...args: unknown[]): void => {
    lines.push(args.map((arg) => String(arg)).join(" "));
  };
  vi.spyOn(console, "log").mockImplementation(record);
  vi.spyOn(console, "warn").mockImplementation(record);
  vi.spyOn(console, "error").mockImplementation(record);

  return () => lines.join("\n");
};
