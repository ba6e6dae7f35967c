/**
 * Per-request snapshot and the async-local scope that exposes it to handlers.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { SpokeError } from "~/errors/mod.ts";
import { parseQuery, splitRawPath } from "~/router/path.ts";
import type { ParamValue } from "~/router/types.ts";

/**
 * Ephemeral request state computed during dispatch.
 *
 * @example
 * ```typescript
 * app.get("/search", () => {
 *   const { query } = useRequest();
 *   return `<p>${query.q ?? ""}</p>`;
 * });
 * ```
 */
export interface RequestSnapshot {
  /** Method as received, upper-cased. */
  readonly method: string;
  /** Request target as received, including the query string. */
  readonly rawPath: string;
  /** Path with the query string and one trailing slash removed. */
  readonly path: string;
  /** Query arguments, verbatim (no percent-decoding). */
  readonly query: Readonly<Record<string, string>>;
  /** Positional parameters handed to the handler. */
  readonly params: readonly ParamValue[];
}

export function createSnapshot(
  method: string,
  rawPath: string,
): RequestSnapshot {
  const { path, query } = splitRawPath(rawPath);
  return {
    method: method.toUpperCase(),
    rawPath,
    path,
    query: parseQuery(query),
    params: [],
  };
}

export function withParams(
  snapshot: RequestSnapshot,
  params: readonly ParamValue[],
): RequestSnapshot {
  return { ...snapshot, params };
}

const storage = new AsyncLocalStorage<RequestSnapshot>();

/**
 * Run `fn` with `snapshot` as the current request for everything it
 * awaits.
 */
export function runWithRequest<T>(snapshot: RequestSnapshot, fn: () => T): T {
  return storage.run(snapshot, fn);
}

export function currentRequest(): RequestSnapshot | undefined {
  return storage.getStore();
}

/**
 * Snapshot of the request being handled.
 *
 * @throws {SpokeError} when called outside a route handler
 */
export function useRequest(): RequestSnapshot {
  const snapshot = storage.getStore();
  if (!snapshot) {
    throw new SpokeError(
      "useRequest() called outside of a request",
      500,
      "NO_REQUEST",
    );
  }
  return snapshot;
}
