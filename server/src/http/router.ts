import { URL } from "node:url";
import type { IncomingMessage, ServerResponse } from "node:http";

export interface RequestContext {
  req: IncomingMessage;
  res: ServerResponse;
  url: URL;
  params: Record<string, string>;
}

export type RouteHandler = (context: RequestContext) => Promise<void> | void;

/**
 * `not_found` when no pattern matches the path, `method_not_allowed` when one does for another method.
 */
export type DispatchResult = "handled" | "not_found" | "method_not_allowed";

interface RouteRecord {
  method: string;
  segments: string[];
  handler: RouteHandler;
}

/**
 * Lightweight HTTP router with named path params.
 */
export class Router {
  private readonly routes: RouteRecord[] = [];

  register(method: string, pattern: string, handler: RouteHandler): void {
    this.routes.push({
      method: method.toUpperCase(),
      segments: splitPath(pattern),
      handler
    });
  }

  async dispatch(req: IncomingMessage, res: ServerResponse): Promise<DispatchResult> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = (req.method ?? "GET").toUpperCase();
    const pathSegments = splitPath(url.pathname);
    let pathMatched = false;

    for (const route of this.routes) {
      const params = matchSegments(route.segments, pathSegments);
      if (!params) {
        continue;
      }

      if (route.method !== method) {
        pathMatched = true;
        continue;
      }

      await route.handler({ req, res, url, params });
      return "handled";
    }

    return pathMatched ? "method_not_allowed" : "not_found";
  }
}

function splitPath(pathname: string): string[] {
  return pathname.split("/").filter((item) => item.length > 0);
}

function matchSegments(routeSegments: string[], pathSegments: string[]): Record<string, string> | null {
  if (routeSegments.length !== pathSegments.length) {
    return null;
  }

  const params: Record<string, string> = {};

  for (let index = 0; index < routeSegments.length; index += 1) {
    const routeSegment = routeSegments[index];
    const pathSegment = pathSegments[index];
    if (!routeSegment || !pathSegment) {
      return null;
    }

    if (routeSegment.startsWith(":")) {
      const decoded = safeDecode(pathSegment);
      if (decoded === null) {
        return null;
      }
      params[routeSegment.slice(1)] = decoded;
      continue;
    }

    if (routeSegment !== pathSegment) {
      return null;
    }
  }

  return params;
}

function safeDecode(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}
