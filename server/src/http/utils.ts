import type { ServerResponse } from "node:http";

/**
 * Serialize a JSON response with status code.
 */
export function writeJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Content-Length", Buffer.byteLength(body));
  res.end(body);
}

/**
 * Serialize an HTML document response.
 */
export function writeHtml(res: ServerResponse, statusCode: number, html: string): void {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "text/html; charset=utf-8");
  res.setHeader("Content-Length", Buffer.byteLength(html));
  res.end(html);
}

/**
 * Serialize a binary response with status code and MIME type.
 */
export function writeBinary(
  res: ServerResponse,
  statusCode: number,
  payload: Buffer,
  mimeType: string,
  cacheControl?: string
): void {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", mimeType);
  res.setHeader("Content-Length", payload.length);
  if (cacheControl) {
    res.setHeader("Cache-Control", cacheControl);
  }
  res.end(payload);
}

/**
 * Mark a response as never cacheable; used for polling endpoints.
 */
export function noStore(res: ServerResponse): void {
  res.setHeader("Cache-Control", "no-store");
}

/**
 * Apply permissive CORS headers for cross-origin pollers.
 */
export function applyCors(res: ServerResponse): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
  res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
}

/**
 * Error message for a caught value.
 */
export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
