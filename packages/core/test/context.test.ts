/**
 * Tests for request snapshots and the async-local request scope.
 */

import { describe, expect, it } from "vitest";
import {
  createSnapshot,
  currentRequest,
  runWithRequest,
  useRequest,
  withParams,
} from "~/context/mod.ts";
import { SpokeError } from "~/errors/mod.ts";

describe("createSnapshot", () => {
  it("should normalize the method, path and query", () => {
    const snapshot = createSnapshot("get", "/search/?q=shoes&page=2");

    expect(snapshot).toEqual({
      method: "GET",
      rawPath: "/search/?q=shoes&page=2",
      path: "/search",
      query: { q: "shoes", page: "2" },
      params: [],
    });
  });

  it("should keep query values verbatim", () => {
    const { query } = createSnapshot("GET", "/s?q=a%20b&x=1=2");
    expect(query.q).toBe("a%20b");
    expect(query.x).toBe("1=2");
  });

  it("should attach params without touching the original", () => {
    const base = createSnapshot("GET", "/user/1");
    const next = withParams(base, [1]);

    expect(next.params).toEqual([1]);
    expect(base.params).toEqual([]);
    expect(next.path).toBe("/user/1");
  });
});

describe("request scope", () => {
  it("should expose the snapshot inside the scope only", () => {
    const snapshot = createSnapshot("GET", "/a");

    expect(currentRequest()).toBeUndefined();
    const seen = runWithRequest(snapshot, () => useRequest());
    expect(seen).toBe(snapshot);
    expect(currentRequest()).toBeUndefined();
  });

  it("should survive awaits", async () => {
    const snapshot = createSnapshot("POST", "/b");

    const method = await runWithRequest(snapshot, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return useRequest().method;
    });

    expect(method).toBe("POST");
  });

  it("should throw outside a request", () => {
    expect(() => useRequest()).toThrow(SpokeError);
    expect(() => useRequest()).toThrow(
      "useRequest() called outside of a request",
    );
  });
});
