import path from "node:path";
import { fileURLToPath } from "node:url";

const DEFAULT_STATIC_DIRECTORY = fileURLToPath(new URL("../static", import.meta.url));

/**
 * Runtime configuration for the lazythumb server process.
 */
export interface ServerConfig {
  host: string;
  port: number;
  dataDirectory: string;
  storageDriver: "local" | "s3";
  mediaDirectory: string;
  s3BucketName: string;
  s3Region: string;
  s3Endpoint: string | null;
  staticDirectory: string;
  clientScriptUrl: string;
  thumbnailWidth: number;
  thumbnailHeight: number;
  imagesPerPage: number;
  jobsPerPage: number;
  batchTtlMs: number;
  maxGenerationAttempts: number;
  generationAttemptTimeoutMs: number;
  generationRetryBackoffMs: number;
  workerConcurrency: number;
  batchExpiryCheckIntervalMs: number;
}

type Env = Record<string, string | undefined>;

/**
 * Build process config from environment with safe defaults.
 */
export function loadConfig(cwd: string = process.cwd(), env: Env = process.env): ServerConfig {
  const dataDirectory = env.LAZYTHUMB_DATA_DIR ?? path.join(cwd, "data");

  return {
    host: env.LAZYTHUMB_HOST ?? "127.0.0.1",
    port: positiveInteger(env.LAZYTHUMB_PORT, 8790),
    dataDirectory,
    storageDriver: env.LAZYTHUMB_STORAGE_DRIVER === "s3" ? "s3" : "local",
    mediaDirectory: env.LAZYTHUMB_MEDIA_DIR ?? path.join(dataDirectory, "media"),
    s3BucketName: env.LAZYTHUMB_S3_BUCKET ?? "unset-bucket",
    s3Region: env.LAZYTHUMB_S3_REGION ?? "us-east-1",
    s3Endpoint: env.LAZYTHUMB_S3_ENDPOINT ?? null,
    staticDirectory: env.LAZYTHUMB_STATIC_DIR ?? DEFAULT_STATIC_DIRECTORY,
    clientScriptUrl: env.LAZYTHUMB_CLIENT_SCRIPT_URL ?? "/static/async-media.js",
    thumbnailWidth: positiveInteger(env.LAZYTHUMB_THUMBNAIL_WIDTH, 150),
    thumbnailHeight: positiveInteger(env.LAZYTHUMB_THUMBNAIL_HEIGHT, 150),
    imagesPerPage: positiveInteger(env.LAZYTHUMB_IMAGES_PER_PAGE, 20),
    jobsPerPage: positiveInteger(env.LAZYTHUMB_JOBS_PER_PAGE, 50),
    batchTtlMs: positiveNumber(env.LAZYTHUMB_BATCH_TTL_MS, 10 * 60 * 1000),
    maxGenerationAttempts: positiveInteger(env.LAZYTHUMB_MAX_GENERATION_ATTEMPTS, 3),
    generationAttemptTimeoutMs: positiveNumber(env.LAZYTHUMB_GENERATION_TIMEOUT_MS, 30_000),
    generationRetryBackoffMs: positiveNumber(env.LAZYTHUMB_GENERATION_BACKOFF_MS, 500),
    workerConcurrency: positiveInteger(env.LAZYTHUMB_WORKER_CONCURRENCY, 4),
    batchExpiryCheckIntervalMs: positiveNumber(env.LAZYTHUMB_BATCH_EXPIRY_INTERVAL_MS, 30_000)
  };
}

function positiveNumber(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw != null && Number.isFinite(value) && value > 0 ? value : fallback;
}

function positiveInteger(raw: string | undefined, fallback: number): number {
  const value = positiveNumber(raw, fallback);
  return Number.isInteger(value) ? value : fallback;
}
