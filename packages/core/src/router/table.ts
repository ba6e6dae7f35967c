import { InvalidMethodError, RouteTableSealedError } from "~/errors/mod.ts";
import { stripTrailingSlash } from "~/router/path.ts";
import type { Handler, HttpMethod, Route } from "~/router/types.ts";

/**
 * Parse a method name case-insensitively.
 *
 * @throws {InvalidMethodError} for anything other than GET or POST
 */
export function parseMethod(name: string): HttpMethod {
  const method = toHttpMethod(name);
  if (!method) {
    throw new InvalidMethodError(name);
  }
  return method;
}

export function toHttpMethod(name: string): HttpMethod | null {
  const upper = name.toUpperCase();
  if (upper === "GET" || upper === "POST") return upper;
  return null;
}

/**
 * Per-method route storage keyed by normalized pattern.
 *
 * Iteration follows first-insertion order; registering an existing
 * (method, pattern) pair swaps the handler without moving the entry.
 */
export class RouteTable {
  private tables: Map<HttpMethod, Map<string, Route>>;
  private sealed = false;

  constructor() {
    this.tables = new Map();
  }

  register(method: HttpMethod, pattern: string, handler: Handler): Route {
    const normalized = stripTrailingSlash(pattern);
    if (this.sealed) {
      throw new RouteTableSealedError(method, normalized);
    }

    let table = this.tables.get(method);
    if (!table) {
      table = new Map();
      this.tables.set(method, table);
    }

    const route: Route = { method, pattern: normalized, handler };
    table.set(normalized, route);
    return route;
  }

  candidates(method: HttpMethod): readonly Route[] {
    const table = this.tables.get(method);
    return table ? [...table.values()] : [];
  }

  all(): Route[] {
    const routes: Route[] = [];
    for (const table of this.tables.values()) {
      routes.push(...table.values());
    }
    return routes;
  }

  /** Freeze the table for serving. Further registrations throw. */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  size(): number {
    let n = 0;
    for (const table of this.tables.values()) n += table.size;
    return n;
  }
}
