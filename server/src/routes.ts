import type { ServerResponse } from "node:http";

import {
  parsePageNumber,
  parseStatusQuery,
  type HealthResponse,
  type JobGroupSummary,
  type JobsDashboardResponse,
  type SourceJobsResponse,
  type StatusQuery,
  type StatusResponse
} from "../../packages/shared/src/index.ts";
import { ORIGINALS_PREFIX, isValidSourceId, type ImageCatalog } from "./catalog/images.ts";
import { paginate } from "./catalog/paginate.ts";
import type { ClientBundle } from "./client-bundle.ts";
import type { ServerConfig } from "./config.ts";
import type { Router } from "./http/router.ts";
import { errorMessage, noStore, writeBinary, writeHtml, writeJson } from "./http/utils.ts";
import type { AsyncResolver } from "./media/resolver.ts";
import { renderSourceBrowsePage } from "./pages/browse.ts";
import { MediaObjectNotFoundError, type StorageAdapter } from "./storage/adapter.ts";
import { THUMBNAIL_PREFIX, type ThumbnailService } from "./thumbnails/service.ts";

export interface RouteDependencies {
  config: Pick<
    ServerConfig,
    "imagesPerPage" | "jobsPerPage" | "thumbnailWidth" | "thumbnailHeight" | "clientScriptUrl"
  >;
  resolver: AsyncResolver;
  storage: StorageAdapter;
  staticFiles: StorageAdapter;
  catalog: ImageCatalog;
  thumbnails: ThumbnailService;
  clientBundle: Pick<ClientBundle, "load">;
  now?: () => Date;
}

/**
 * Register every HTTP route of the service.
 */
export function registerRoutes(router: Router, deps: RouteDependencies): void {
  const now = deps.now ?? (() => new Date());

  router.register("GET", "/health", ({ res }) => {
    const payload: HealthResponse = {
      ok: true,
      service: "lazythumb-server",
      timestamp: now().toISOString()
    };
    writeJson(res, 200, payload);
  });

  router.register("GET", "/sources/:sourceId/browse", async ({ res, url, params }) => {
    const sourceId = params.sourceId ?? "";
    if (!isValidSourceId(sourceId)) {
      writeJson(res, 400, { error: "invalid_source_id" });
      return;
    }

    let pageNumber: number;
    try {
      pageNumber = parsePageNumber(url.searchParams.get("page"));
    } catch (error) {
      writeJson(res, 400, { error: "invalid_page", message: errorMessage(error, "invalid page") });
      return;
    }

    const html = await renderSourceBrowsePage(
      {
        catalog: deps.catalog,
        thumbnails: deps.thumbnails,
        resolver: deps.resolver,
        imagesPerPage: deps.config.imagesPerPage,
        thumbnailWidth: deps.config.thumbnailWidth,
        thumbnailHeight: deps.config.thumbnailHeight,
        clientScriptUrl: deps.config.clientScriptUrl
      },
      sourceId,
      pageNumber
    );

    if (html === null) {
      writeJson(res, 404, { error: "source_not_found" });
      return;
    }

    writeHtml(res, 200, html);
  });

  router.register("GET", "/sources/:sourceId/jobs", ({ res, url, params }) => {
    const sourceId = params.sourceId ?? "";
    if (!isValidSourceId(sourceId)) {
      writeJson(res, 400, { error: "invalid_source_id" });
      return;
    }

    let pageNumber: number;
    try {
      pageNumber = parsePageNumber(url.searchParams.get("page"));
    } catch (error) {
      writeJson(res, 400, { error: "invalid_page", message: errorMessage(error, "invalid page") });
      return;
    }

    const page = paginate(deps.resolver.listJobs(sourceId), pageNumber, deps.config.jobsPerPage);
    const payload: SourceJobsResponse = {
      sourceId,
      pageNumber: page.pageNumber,
      pageCount: page.pageCount,
      totalJobs: page.totalItems,
      jobs: page.items
    };
    noStore(res);
    writeJson(res, 200, payload);
  });

  router.register("GET", "/status", ({ res, url }) => {
    let query: StatusQuery;
    try {
      query = parseStatusQuery(url.searchParams);
    } catch (error) {
      writeJson(res, 400, { error: "invalid_status_query", message: errorMessage(error, "invalid query") });
      return;
    }

    const payload: StatusResponse = {
      batchId: query.batchId,
      entries: deps.resolver.status(query.batchId, query.mediaKeys)
    };
    noStore(res);
    writeJson(res, 200, payload);
  });

  router.register("GET", "/jobs", ({ res }) => {
    const snapshot = deps.resolver.snapshot();
    const payload: JobsDashboardResponse = {
      generatedAt: now().toISOString(),
      openBatches: snapshot.openBatches,
      totals: snapshot.totals,
      groups: [...snapshot.groups].sort(compareGroups)
    };
    noStore(res);
    writeJson(res, 200, payload);
  });

  router.register("GET", "/media/originals/:sourceId/:file", async ({ res, params }) => {
    const sourceId = params.sourceId ?? "";
    if (!isValidSourceId(sourceId)) {
      writeJson(res, 400, { error: "invalid_source_id" });
      return;
    }

    await sendStoredObject(res, deps.storage, `${ORIGINALS_PREFIX}/${sourceId}/${params.file ?? ""}`);
  });

  router.register("GET", "/media/thumbnails/:file", async ({ res, params }) => {
    await sendStoredObject(res, deps.storage, `${THUMBNAIL_PREFIX}/${params.file ?? ""}`, "public, max-age=86400");
  });

  // An absolute URL points at a script hosted elsewhere.
  if (isLocalPath(deps.config.clientScriptUrl)) {
    router.register("GET", new URL(deps.config.clientScriptUrl, "http://localhost").pathname, async ({ res }) => {
      let script: string;
      try {
        script = await deps.clientBundle.load();
      } catch (error) {
        console.error("client bundle failed:", error);
        writeJson(res, 500, { error: "client_bundle_failed", message: errorMessage(error, "bundle failed") });
        return;
      }

      writeBinary(res, 200, Buffer.from(script, "utf8"), "text/javascript; charset=utf-8", "public, max-age=3600");
    });
  }

  router.register("GET", "/static/:file", async ({ res, params }) => {
    await sendStoredObject(res, deps.staticFiles, params.file ?? "", "public, max-age=3600");
  });
}

async function sendStoredObject(
  res: ServerResponse,
  storage: StorageAdapter,
  storageKey: string,
  cacheControl?: string
): Promise<void> {
  if (storageKey.endsWith("/") || storageKey.includes("..")) {
    writeJson(res, 400, { error: "invalid_media_path" });
    return;
  }

  try {
    const object = await storage.getMediaObject(storageKey);
    writeBinary(res, 200, object.bytes, object.mimeType, cacheControl);
  } catch (error) {
    if (error instanceof MediaObjectNotFoundError) {
      writeJson(res, 404, { error: "media_not_found" });
      return;
    }

    writeJson(res, 500, { error: "media_read_failed", message: errorMessage(error, "media read failed") });
  }
}

function isLocalPath(url: string): boolean {
  return url.startsWith("/") && !url.startsWith("//");
}

/**
 * Groups with outstanding work first, then by name.
 */
function compareGroups(left: JobGroupSummary, right: JobGroupSummary): number {
  const leftOutstanding = left.queued + left.inProgress;
  const rightOutstanding = right.queued + right.inProgress;
  if (leftOutstanding !== rightOutstanding) {
    return rightOutstanding - leftOutstanding;
  }

  return left.group.localeCompare(right.group);
}
