/**
 * Dispatcher: finds the first route that accepts a request.
 *
 * Candidates are walked in table order. For each one the strategies are
 * tried in fixed priority (exact, typed, untyped, query-augmented exact) and
 * the scan stops at the first success.
 */

import type { RequestSnapshot } from "~/context/request.ts";
import { lookupConverter } from "~/router/converters.ts";
import { PatternCompiler } from "~/router/compiler.ts";
import { type RouteTable, toHttpMethod } from "~/router/table.ts";
import type { CompiledPattern, Match, Route } from "~/router/types.ts";

function captures(compiled: CompiledPattern, path: string): string[] | null {
  const m = compiled.regex.exec(path);
  if (!m) return null;
  return compiled.names.map((name) => m.groups?.[name] ?? "");
}

export class Dispatcher {
  private table: RouteTable;
  private compiler: PatternCompiler;

  constructor(
    table: RouteTable,
    compiler: PatternCompiler = new PatternCompiler(),
  ) {
    this.table = table;
    this.compiler = compiler;
  }

  /**
   * Match a snapshot against the table.
   *
   * Compilation and conversion errors propagate; the caller turns them into
   * an error page.
   */
  match(
    snapshot: Pick<RequestSnapshot, "method" | "path" | "query">,
  ): Match | null {
    const method = toHttpMethod(snapshot.method);
    if (!method) return null;

    const { path } = snapshot;
    const hasQuery = Object.keys(snapshot.query).length > 0;

    for (const route of this.table.candidates(method)) {
      const found = this.matchRoute(route, path, hasQuery);
      if (found) return found;
    }
    return null;
  }

  private matchRoute(
    route: Route,
    path: string,
    hasQuery: boolean,
  ): Match | null {
    if (path === route.pattern) {
      return { route, params: [], strategy: "exact" };
    }

    if (path !== "/") {
      const compiled = this.compiler.compile(route.pattern);

      if (compiled.mode === "typed") {
        const raw = captures(compiled, path);
        if (raw) {
          const params = raw.map((value, i) =>
            lookupConverter(compiled.kinds[i]).convert(value)
          );
          return { route, params, strategy: "typed" };
        }
      }

      if (compiled.mode === "untyped") {
        const raw = captures(compiled, path);
        if (raw) {
          return { route, params: raw, strategy: "untyped" };
        }
      }
    }

    // Subsumed by the exact check above.
    if (hasQuery && path === route.pattern) {
      return { route, params: [], strategy: "query" };
    }

    return null;
  }
}
