import { createServer } from "node:http";
import type { Socket } from "node:net";

import { ImageCatalog } from "./catalog/images.ts";
import { ClientBundle } from "./client-bundle.ts";
import { loadConfig, type ServerConfig } from "./config.ts";
import { Router } from "./http/router.ts";
import { applyCors, errorMessage, writeJson } from "./http/utils.ts";
import { BatchExpiryWorker } from "./media/expiry-worker.ts";
import { AsyncResolver } from "./media/resolver.ts";
import { registerRoutes } from "./routes.ts";
import type { StorageAdapter } from "./storage/adapter.ts";
import { createStorageAdapter } from "./storage/factory.ts";
import { LocalStorageAdapter } from "./storage/local-storage.ts";
import { ThumbnailService, type MediaTransform } from "./thumbnails/service.ts";

interface AppServer {
  start: () => Promise<void>;
  stop: () => Promise<void>;
  resolver: AsyncResolver;
}

export interface AppServerOptions {
  config?: ServerConfig;
  storage?: StorageAdapter;
  transform?: MediaTransform;
}

/**
 * Build and configure the HTTP application server.
 */
export function createAppServer(options: AppServerOptions = {}): AppServer {
  const config = options.config ?? loadConfig();
  const storage = options.storage ?? createStorageAdapter(config);
  const resolver = new AsyncResolver({
    batchTtlMs: config.batchTtlMs,
    maxAttempts: config.maxGenerationAttempts,
    attemptTimeoutMs: config.generationAttemptTimeoutMs,
    retryBackoffMs: config.generationRetryBackoffMs,
    concurrency: config.workerConcurrency
  });
  const thumbnails = new ThumbnailService(
    storage,
    { width: config.thumbnailWidth, height: config.thumbnailHeight },
    options.transform
  );
  const expiryWorker = new BatchExpiryWorker({
    resolver,
    intervalMs: config.batchExpiryCheckIntervalMs,
    onEvicted: (count) => {
      console.log(`evicted ${count} expired batch${count === 1 ? "" : "es"}`);
    }
  });
  const router = new Router();
  const activeSockets = new Set<Socket>();

  registerRoutes(router, {
    config,
    resolver,
    storage,
    staticFiles: new LocalStorageAdapter(config.staticDirectory),
    catalog: new ImageCatalog(storage),
    thumbnails,
    clientBundle: new ClientBundle()
  });

  const httpServer = createServer(async (req, res) => {
    try {
      applyCors(res);
      if (req.method === "OPTIONS") {
        res.statusCode = 204;
        res.end();
        return;
      }

      const result = await router.dispatch(req, res);
      if (result === "not_found") {
        writeJson(res, 404, { error: "not_found" });
      } else if (result === "method_not_allowed") {
        writeJson(res, 405, { error: "method_not_allowed" });
      }
    } catch (error) {
      console.error("request failed:", error);
      if (res.headersSent) {
        res.destroy();
        return;
      }
      writeJson(res, 500, {
        error: "internal_error",
        message: errorMessage(error, "unexpected error")
      });
    }
  });

  httpServer.on("connection", (socket) => {
    activeSockets.add(socket);
    socket.on("close", () => {
      activeSockets.delete(socket);
    });
  });

  return {
    resolver,
    start: async () => {
      await new Promise<void>((resolve) => {
        httpServer.listen(config.port, config.host, () => {
          console.log(`lazythumb server listening on http://${config.host}:${config.port}`);
          resolve();
        });
      });
      expiryWorker.start();
    },
    stop: async () => {
      expiryWorker.stop();
      resolver.stop();
      for (const socket of activeSockets) {
        socket.destroy();
      }
      activeSockets.clear();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
            return;
          }

          resolve();
        });
      });
    }
  };
}
