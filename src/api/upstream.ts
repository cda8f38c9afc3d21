/** @file
  Upstream Transport

  One bounded-timeout call to Strava per invocation. The response body is
  read inside the same time bound, and no retry happens here.

  Copyright (c) 2026, Cory Bennett. All rights reserved.
  SPDX-License-Identifier: Apache-2.0
**/

import { UPSTREAM_ERROR_BODY_LIMIT } from "../constants.js";
import { UpstreamUnavailableError, redactSecrets } from "../errors.js";

export interface UpstreamRequestOptions {
  timeoutMs: number;
  /** Inbound request signal; aborting it abandons the outbound call */
  signal?: AbortSignal;
}

export interface DescribeErrorOptions {
  /** Values replaced with [REDACTED] wherever they appear */
  secrets?: readonly string[];
  /** Append the truncated text of a non-JSON body. For log lines only. */
  includeRawBody?: boolean;
}

export interface UpstreamResponse {
  status: number;
  ok: boolean;
  contentType: string;
  text: string;
}

/**
 * Perform a single fetch with a timeout and read the whole body.
 * Any transport failure surfaces as UpstreamUnavailableError.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  options: UpstreamRequestOptions
): Promise<UpstreamResponse> {
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = (): void => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener("abort", onAbort, { once: true });
  }

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    const text = await response.text();
    return {
      status: response.status,
      ok: response.ok,
      contentType: response.headers.get("content-type") ?? "application/json",
      text,
    };
  } catch (error) {
    if (timedOut) {
      throw new UpstreamUnavailableError(`Strava did not respond within ${options.timeoutMs}ms`, {
        cause: error,
      });
    }
    if (options.signal?.aborted) {
      throw new UpstreamUnavailableError("Request aborted by client", { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new UpstreamUnavailableError(`Could not reach Strava: ${reason}`, { cause: error });
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Parse a JSON body, returning undefined when it is not JSON.
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a human-readable description of a failed upstream response.
 *
 * Strava error bodies look like
 * `{"message":"Bad Request","errors":[{"resource":"AuthorizationCode","field":"code","code":"invalid"}]}`.
 * A body that is not a JSON object (a gateway HTML page, say) is reduced to
 * the bare status unless `includeRawBody` is set.
 */
export function describeUpstreamError(
  response: UpstreamResponse,
  options: DescribeErrorOptions = {}
): string {
  const { secrets = [], includeRawBody = false } = options;
  const prefix = `Strava API error: ${response.status}`;
  const data = parseJson(response.text);

  if (!isRecord(data)) {
    const text = includeRawBody ? response.text.trim().slice(0, UPSTREAM_ERROR_BODY_LIMIT) : "";
    return redactSecrets(text ? `${prefix} - ${text}` : prefix, secrets);
  }

  const parts: string[] = [];
  if (typeof data.message === "string") {
    parts.push(data.message);
  } else if (typeof data.error === "string") {
    parts.push(data.error);
  }

  if (Array.isArray(data.errors)) {
    const details = data.errors
      .filter(isRecord)
      .map((entry) =>
        [entry.resource, entry.field, entry.code].filter((v) => typeof v === "string").join(" ")
      )
      .filter((detail) => detail.length > 0);
    if (details.length > 0) parts.push(`(${details.join(", ")})`);
  }

  if (parts.length === 0) {
    parts.push(response.text.slice(0, UPSTREAM_ERROR_BODY_LIMIT));
  }

  return redactSecrets(`${prefix} - ${parts.join(" ")}`, secrets);
}
