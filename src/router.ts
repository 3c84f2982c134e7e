/**
 * Fetch-API router: `Request` in, `Response` out.
 *
 * Patterns are `/`-separated; a `:name` segment captures one percent-decoded
 * path segment into `params`. Trailing and doubled slashes are ignored.
 * Handler errors go through `errorFromException`, so typed assistant errors
 * keep their status and kind.
 */

import { errorFromException, methodNotAllowed, notFound } from "./routes/helpers";

export type RouteHandler = (
  request: Request,
  params: Record<string, string>,
  query: URLSearchParams,
) => Response | Promise<Response>;

type Method = "GET" | "POST";

interface Route {
  method: Method;
  segments: string[];
  handler: RouteHandler;
}

/**
 * @example
 *   splitPath("/threads/abc/runs/") // → ["threads", "abc", "runs"]
 *   splitPath("/")                  // → []
 */
export function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

/**
 * Params captured by a pattern from a path, or null when they do not match.
 *
 * @example
 *   matchSegments(["threads", ":thread_id"], ["threads", "abc"]) // → { thread_id: "abc" }
 */
export function matchSegments(
  pattern: string[],
  path: string[],
): Record<string, string> | null {
  if (pattern.length !== path.length) {
    return null;
  }
  const params: Record<string, string> = {};
  for (const [index, segment] of pattern.entries()) {
    const value = path[index];
    if (segment.startsWith(":")) {
      params[segment.slice(1)] = decodeURIComponent(value);
    } else if (segment !== value) {
      return null;
    }
  }
  return params;
}

export class Router {
  private readonly routes: Route[] = [];

  get(pattern: string, handler: RouteHandler): this {
    return this.add("GET", pattern, handler);
  }

  post(pattern: string, handler: RouteHandler): this {
    return this.add("POST", pattern, handler);
  }

  get routeCount(): number {
    return this.routes.length;
  }

  /**
   * First route whose pattern and method both match wins. A path that only
   * matches under another method is a 405; anything else unmatched a 404.
   */
  async handle(request: Request): Promise<Response> {
    const url = new URL(request.url);
    const path = splitPath(url.pathname);
    const method = request.method.toUpperCase();
    let pathMatched = false;

    for (const route of this.routes) {
      const params = matchSegments(route.segments, path);
      if (params === null) {
        continue;
      }
      if (route.method !== method) {
        pathMatched = true;
        continue;
      }
      try {
        return await route.handler(request, params, url.searchParams);
      } catch (error: unknown) {
        console.error(`[router] ${method} ${url.pathname} failed:`, error);
        return errorFromException(error);
      }
    }

    return pathMatched ? methodNotAllowed() : notFound();
  }

  private add(method: Method, pattern: string, handler: RouteHandler): this {
    this.routes.push({ method, segments: splitPath(pattern), handler });
    return this;
  }
}
