import { buildStatusPath, parseStatusResponse } from "../../shared/src/index.ts";
import type { StatusFetcher } from "./poller.ts";

/**
 * Status fetcher backed by `fetch`, resolving the polling path against `baseUrl`.
 */
export function createFetchStatusFetcher(baseUrl: string, fetchImpl: typeof fetch = fetch): StatusFetcher {
  return async (batchId, mediaKeys, signal) => {
    const url = new URL(buildStatusPath(batchId, mediaKeys), baseUrl);
    const response = await fetchImpl(url, {
      signal,
      cache: "no-store",
      headers: { Accept: "application/json" }
    });

    if (!response.ok) {
      throw new Error(`status request failed with HTTP ${response.status}`);
    }

    return parseStatusResponse(await response.json());
  };
}
