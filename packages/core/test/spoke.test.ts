/**
 * Tests for the Spoke application class.
 */

import { describe, expect, expectTypeOf, it, vi } from "vitest";
import { Spoke } from "~/app/spoke.ts";
import type { Logger } from "~/app/types.ts";
import { useRequest } from "~/context/mod.ts";
import {
  ConfigError,
  HandlerError,
  InvalidMethodError,
  UnknownConverterKindError,
} from "~/errors/mod.ts";
import type { PatternParams } from "~/router/mod.ts";

const quiet = () => new Spoke({ log: { level: "silent" } });

function fakeLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  const logger: Logger & { lines: string[] } = {
    lines,
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn((msg: string) => {
      lines.push(msg);
    }),
    warn: vi.fn(),
    error: vi.fn((msg: string) => {
      lines.push(`error: ${msg}`);
    }),
    fatal: vi.fn(),
    child: () => logger,
  };
  return logger;
}

describe("Spoke", () => {
  describe("constructor", () => {
    it("should create instance with defaults", () => {
      expect(new Spoke()).toBeInstanceOf(Spoke);
    });

    it("should reject invalid config", () => {
      expect(() => new Spoke({ prefix: "api" })).toThrow(ConfigError);
    });
  });

  describe("route registration", () => {
    it("should register under several methods", async () => {
      const app = quiet();
      app.route("/form", ["get", "POST"], () => "form");

      expect(app.routes()).toEqual([
        { method: "GET", pattern: "/form" },
        { method: "POST", pattern: "/form" },
      ]);
      expect((await app.handle("POST", "/form")).body).toBe("form");
    });

    it("should reject invalid methods", () => {
      const app = quiet();
      expect(() => app.route("/a", "PUT", () => "a")).toThrow(
        InvalidMethodError,
      );
    });

    it("should not register anything when one method is invalid", () => {
      const app = quiet();
      expect(() => app.route("/a", ["GET", "PATCH"], () => "a")).toThrow(
        "Invalid method: PATCH",
      );
      expect(app.routes()).toEqual([]);
    });

    it("should apply the configured prefix", async () => {
      const app = new Spoke({ prefix: "/api", log: { level: "silent" } });
      app.get("/users", () => "users");

      expect(app.routes()).toEqual([{ method: "GET", pattern: "/api/users" }]);
      expect((await app.handle("GET", "/api/users")).body).toBe("users");
    });

    it("should surface compile errors at registration with precompile", () => {
      const app = new Spoke({ precompile: true, log: { level: "silent" } });
      expect(() => app.get("/x/<uuid:id>", () => "x")).toThrow(
        UnknownConverterKindError,
      );
      expect(app.routes()).toEqual([]);
    });

    it("should infer handler parameter types from the pattern", () => {
      expectTypeOf<PatternParams<"/user/<int:id>">>().toEqualTypeOf<
        [number]
      >();
      expectTypeOf<PatternParams<"/item/<slug>">>().toEqualTypeOf<[string]>();
      expectTypeOf<PatternParams<"/a/<float:p>/<slug>">>().toEqualTypeOf<
        [number]
      >();
      expectTypeOf<PatternParams<"/s/<string:a>/<int:b>">>().toEqualTypeOf<
        [string, number]
      >();
      expectTypeOf<PatternParams<"/about">>().toEqualTypeOf<[]>();
    });
  });

  describe("handle()", () => {
    it("should answer exact routes with and without trailing slash", async () => {
      const app = quiet();
      app.get("/hello", () => "<h1>Hello</h1>");

      const a = await app.handle("GET", "/hello");
      const b = await app.handle("GET", "/hello/");

      expect(a).toMatchObject({ state: "matched", status: 200 });
      expect(a.body).toBe("<h1>Hello</h1>");
      expect(b.body).toBe("<h1>Hello</h1>");
      expect(a.headers).toEqual({ "Content-Type": "text/html; charset=utf-8" });
    });

    it("should pass an int parameter as a number", async () => {
      const app = quiet();
      app.get("/user/<int:id>", (id) => `${typeof id}:${id + 1}`);

      expect((await app.handle("GET", "/user/42")).body).toBe("number:43");
      expect((await app.handle("GET", "/user/abc")).status).toBe(404);
    });

    it("should pass a float parameter as a number", async () => {
      const app = quiet();
      app.get("/price/<float:p>", (p) => `${p * 2}`);

      expect((await app.handle("GET", "/price/3.14")).body).toBe("6.28");
      expect((await app.handle("GET", "/price/3")).status).toBe(404);
    });

    it("should pass an untyped parameter as a string", async () => {
      const app = quiet();
      app.get("/item/<slug>", (slug) => `item:${slug}`);

      expect((await app.handle("GET", "/item/red-shoes")).body).toBe(
        "item:red-shoes",
      );
      expect((await app.handle("GET", "/item/a/b")).status).toBe(404);
    });

    it("should accept async handlers", async () => {
      const app = quiet();
      app.get("/later", async () => {
        await Promise.resolve();
        return "done";
      });

      expect((await app.handle("GET", "/later")).body).toBe("done");
    });

    it("should render the not found page", async () => {
      const app = quiet();
      const handler = vi.fn(() => "never");
      app.get("/known", handler);

      const result = await app.handle("GET", "/unknown");

      expect(result.state).toBe("not_found");
      expect(result.status).toBe(404);
      expect(result.body).toContain("<title>404 Not Found</title>");
      expect(result.body).toContain("<p>Page Not Found</p>");
      expect(handler).not.toHaveBeenCalled();
    });

    it("should answer unsupported methods with not found", async () => {
      const app = quiet();
      app.get("/a", () => "a");

      expect((await app.handle("PUT", "/a")).status).toBe(404);
    });

    it("should render handler failures with status 500", async () => {
      const app = quiet();
      app.get("/boom", () => {
        throw new Error("database unreachable");
      });

      const result = await app.handle("GET", "/boom");

      expect(result.state).toBe("failed");
      expect(result.status).toBe(500);
      expect(result.body).toContain("<h1>500 Internal Server Error</h1>");
      expect(result.body).toContain("<p>database unreachable</p>");
      expect(result.error).toBeInstanceOf(HandlerError);
      expect(result.strategy).toBe("exact");
    });

    it("should render rejected promises the same way", async () => {
      const app = quiet();
      app.get("/reject", () => Promise.reject(new Error("timed out")));

      const result = await app.handle("GET", "/reject");
      expect(result.status).toBe(500);
      expect(result.body).toContain("<p>timed out</p>");
    });

    it("should describe non-Error failures by their string form", async () => {
      const app = quiet();
      app.get("/odd", () => {
        throw "plain text";
      });

      expect((await app.handle("GET", "/odd")).body).toContain(
        "<p>plain text</p>",
      );
    });

    it("should show failure text with dollar sequences as written", async () => {
      const app = quiet();
      app.get("/boom", () => {
        throw new Error("costs $& now, then $'");
      });

      const result = await app.handle("GET", "/boom");
      expect(result.body).toContain("<p>costs $& now, then $'</p>");
      expect(result.body).not.toContain("{{ message }}");
    });

    it("should keep status 200 for failures in legacy mode", async () => {
      const app = new Spoke({
        legacyErrorStatus: true,
        log: { level: "silent" },
      });
      app.get("/boom", () => {
        throw new Error("kaput");
      });

      const result = await app.handle("GET", "/boom");
      expect(result.status).toBe(200);
      expect(result.state).toBe("failed");
      expect(result.body).toContain("500 Internal Server Error");
      expect(result.body).toContain("kaput");
    });

    it("should fail the request for unknown converters", async () => {
      const app = quiet();
      app.get("/x/<uuid:id>", () => "x");

      const result = await app.handle("GET", "/x/1");
      expect(result.status).toBe(500);
      expect(result.error).toBeInstanceOf(UnknownConverterKindError);
      expect(result.body).toContain(
        'Unknown converter kind "uuid" in pattern /x/<uuid:id>',
      );
    });

    it("should shadow later routes behind an unknown converter", async () => {
      const app = quiet();
      app.get("/x/<uuid:id>", () => "x");
      app.get("/about", () => "about");

      const result = await app.handle("GET", "/about");
      expect(result.status).toBe(500);
      expect(result.error).toBeInstanceOf(UnknownConverterKindError);
    });

    it("should keep later routes reachable when precompile rejects the pattern", async () => {
      const app = new Spoke({ precompile: true, log: { level: "silent" } });
      expect(() => app.get("/x/<uuid:id>", () => "x")).toThrow(
        UnknownConverterKindError,
      );
      app.get("/about", () => "about");

      const result = await app.handle("GET", "/about");
      expect(result.status).toBe(200);
      expect(result.body).toBe("about");
    });

    it("should fail the request for int overflow", async () => {
      const app = quiet();
      app.get("/n/<int:n>", (n) => `${n}`);

      const result = await app.handle("GET", "/n/99999999999999999999");
      expect(result.status).toBe(500);
      expect(result.error?.code).toBe("CONVERSION_FAILED");
    });

    it("should treat non-string results as failures", async () => {
      const app = quiet();
      // Untyped JSON slips past the compile-time check.
      app.route("/obj", "GET", (): string => JSON.parse("42"));

      const result = await app.handle("GET", "/obj");
      expect(result.status).toBe(500);
      expect(result.body).toContain(
        "Handler for /obj returned number instead of a string",
      );
    });

    it("should match query-string requests on exact routes", async () => {
      const app = quiet();
      const handler = vi.fn((..._params: unknown[]) => "search");
      app.get("/search", handler);

      const result = await app.handle("GET", "/search?a=1&b=2");

      expect(result.body).toBe("search");
      expect(handler).toHaveBeenCalledWith();
    });

    it("should invoke only the latest handler for a re-registered route", async () => {
      const app = quiet();
      const first = vi.fn(() => "first");
      const second = vi.fn(() => "second");
      app.get("/page", first);
      app.get("/page", second);

      expect((await app.handle("GET", "/page")).body).toBe("second");
      expect(first).not.toHaveBeenCalled();
      expect(app.routes()).toHaveLength(1);
    });
  });

  describe("request snapshot", () => {
    it("should expose query arguments and params to the handler", async () => {
      const app = quiet();
      app.get("/user/<int:id>", () => {
        const req = useRequest();
        return `${req.path}|${req.query.tab}|${req.params.join(",")}`;
      });

      expect((await app.handle("GET", "/user/9/?tab=posts")).body).toBe(
        "/user/9|posts|9",
      );
    });

    it("should keep concurrent requests apart", async () => {
      const app = quiet();
      app.get("/echo", async () => {
        const before = useRequest().query.v;
        await new Promise((resolve) => setTimeout(resolve, 5));
        return `${before}-${useRequest().query.v}`;
      });

      const [a, b] = await Promise.all([
        app.handle("GET", "/echo?v=a"),
        app.handle("GET", "/echo?v=b"),
      ]);

      expect(a.body).toBe("a-a");
      expect(b.body).toBe("b-b");
    });
  });

  describe("fetch()", () => {
    it("should return an HTML Response", async () => {
      const app = quiet();
      app.get("/item/<slug>", (slug) => `<p>${slug}</p>`);

      const res = await app.fetch(
        new Request("http://localhost:8000/item/boots?x=1"),
      );

      expect(res.status).toBe(200);
      expect(res.headers.get("Content-Type")).toBe("text/html; charset=utf-8");
      expect(await res.text()).toBe("<p>boots</p>");
    });

    it("should answer 404 for unknown paths", async () => {
      const app = quiet();
      const res = await app.fetch(new Request("http://localhost/missing"));

      expect(res.status).toBe(404);
      expect(await res.text()).toContain("404 Not Found");
    });
  });

  describe("logging", () => {
    it("should log one line per request", async () => {
      const logger = fakeLogger();
      const app = new Spoke({ logger });
      app.get("/a", () => "a");

      await app.handle("GET", "/a?x=1");

      expect(logger.lines).toHaveLength(1);
      expect(logger.lines[0]).toMatch(/^GET \/a\?x=1 200 [\d.]+ms$/);
    });

    it("should log failures at error level", async () => {
      const logger = fakeLogger();
      const app = new Spoke({ logger });
      app.get("/boom", () => {
        throw new Error("nope");
      });

      await app.handle("GET", "/boom");

      expect(logger.error).toHaveBeenCalledWith("Request failed", {
        method: "GET",
        path: "/boom",
        message: "nope",
        code: "HANDLER_FAILED",
        status: 500,
      });
    });
  });

  describe("listen()", () => {
    it("should reject invalid listen options before sealing", async () => {
      const app = quiet();
      await expect(app.listen({ port: 70000 })).rejects.toThrow(ConfigError);

      app.get("/still-open", () => "ok");
      expect(app.routes()).toHaveLength(1);
    });
  });
});
