import type { IncomingMessage } from "node:http";
import { HttpError } from "./http-error.ts";

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface RouteContext {
  request: IncomingMessage;
  params: Record<string, string>;
  query: URLSearchParams;
}

export interface RouteResponse {
  status?: number;
  body: unknown;
}

export type RouteHandler = (context: RouteContext) => Promise<RouteResponse>;

interface Route {
  method: HttpMethod;
  segments: string[];
  handler: RouteHandler;
}

export interface RouteMatch {
  handler: RouteHandler;
  params: Record<string, string>;
}

const split = (path: string) => path.split("/").filter((segment) => segment !== "");

/**
 * Method and path routing. Path patterns are literal segments and `:name`
 * parameters, e.g. `/devices/:id/state`.
 */
export class Router {
  private readonly routes: Route[] = [];

  add(method: HttpMethod, pattern: string, handler: RouteHandler): this {
    this.routes.push({ method, segments: split(pattern), handler });
    return this;
  }

  /**
   * Finds the handler for a request.
   *
   * @throws HttpError 404 if no route has the path, 405 if none has the method
   */
  match(method: string, pathname: string): RouteMatch {
    const segments = split(pathname);
    let pathMatched = false;

    for (const route of this.routes) {
      const params = matchSegments(route.segments, segments);
      if (!params) continue;
      pathMatched = true;
      if (route.method === method) return { handler: route.handler, params };
    }

    if (pathMatched) throw new HttpError(405, "MethodNotAllowed", `${method} is not supported on ${pathname}`);
    throw new HttpError(404, "NotFound", `No route for ${method} ${pathname}`);
  }
}

function matchSegments(pattern: string[], segments: string[]): Record<string, string> | null {
  if (pattern.length !== segments.length) return null;

  const params: Record<string, string> = {};
  for (const [i, expected] of pattern.entries()) {
    const actual = segments[i]!;
    if (expected.startsWith(":")) {
      try {
        params[expected.slice(1)] = decodeURIComponent(actual);
      } catch {
        throw new HttpError(400, "BadRequest", `Malformed path segment ${actual}`);
      }
    } else if (expected !== actual) {
      return null;
    }
  }
  return params;
}
