// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Endpoint URL construction and auth token attachment.
 */

import type { TokenSource } from "./types.js";

/**
 * Attaches auth token to URL as query parameter.
 */
export function attachTokenToUrl(
  url: string | URL,
  token: string,
  queryParam: string,
): URL {
  const urlObj = typeof url === "string" ? new URL(url) : new URL(url.href);
  urlObj.searchParams.set(queryParam, token);
  return urlObj;
}

/**
 * Retrieves auth token (handles literal, sync and async sources).
 */
export async function getAuthToken(
  source?: TokenSource,
): Promise<string | null | undefined> {
  if (source === undefined) return undefined;
  if (typeof source === "string") return source;
  return await source();
}

/**
 * Builds the URL a transport connects to: base URL, extra query params,
 * then the token (which wins over a param of the same name).
 */
export async function buildEndpointUrl(
  base: string | URL,
  params: Record<string, string>,
  auth: { token?: TokenSource; queryParam: string },
): Promise<URL> {
  let url = typeof base === "string" ? new URL(base) : new URL(base.href);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }

  const token = await getAuthToken(auth.token);
  if (token) {
    url = attachTokenToUrl(url, token, auth.queryParam);
  }
  return url;
}

/**
 * URL with the token parameter masked, for logs and error messages.
 */
export function redactUrl(url: URL, queryParam: string): string {
  if (!url.searchParams.has(queryParam)) return url.href;
  const copy = new URL(url.href);
  copy.searchParams.set(queryParam, "***");
  return copy.href;
}
