import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { resolveListenOptions, validateConfig } from "~/app/config.ts";
import { elapsedMs, HTML_HEADERS, requestTarget } from "~/app/helpers.ts";
import { createLogger } from "~/app/logger.ts";
import { createRequestListener, logServerErrors } from "~/app/server.ts";
import type {
  ListenInfo,
  ListenOptions,
  Logger,
  SpokeConfig,
} from "~/app/types.ts";
import {
  createSnapshot,
  type RequestSnapshot,
  runWithRequest,
  withParams,
} from "~/context/mod.ts";
import {
  describeError,
  HandlerError,
  isOperationalError,
  SpokeError,
  toSpokeError,
} from "~/errors/mod.ts";
import { ErrorPageRenderer } from "~/render/mod.ts";
import {
  Dispatcher,
  type Handler,
  type HttpMethod,
  joinPath,
  type Match,
  type MatchStrategy,
  parseMethod,
  PatternCompiler,
  type PatternParams,
  RouteTable,
  stripTrailingSlash,
} from "~/router/mod.ts";

export type DispatchState = "matched" | "not_found" | "failed";

/**
 * Outcome of one request: what to send and how dispatch ended.
 */
export interface DispatchResult {
  state: DispatchState;
  status: number;
  body: string;
  headers: Readonly<Record<string, string>>;
  /** Strategy that matched, when a route was found. */
  strategy?: MatchStrategy;
  /** Failure behind a `failed` result. */
  error?: SpokeError;
}

export interface RouteInfo {
  method: HttpMethod;
  pattern: string;
}

/**
 * Spoke application: route registration plus request dispatch.
 *
 * Handlers receive the converted path parameters positionally and return
 * the HTML body. The request snapshot (query arguments included) is
 * available inside a handler through `useRequest()`.
 *
 * Handlers have no timeout; one that never settles holds its request open.
 *
 * Patterns compile on first use. A pattern with an unknown converter kind
 * (`<uuid:id>`) then fails every request that reaches it in the scan, and
 * so shadows the routes registered after it. Set `precompile: true` to
 * reject such patterns at registration instead.
 *
 * @example
 * ```typescript
 * const app = new Spoke();
 *
 * app.get("/", () => "<h1>Home</h1>");
 * app.get("/user/<int:id>", (id) => `<p>User ${id + 1}</p>`);
 * app.route("/item/<slug>", ["GET", "POST"], (slug) => `<p>${slug}</p>`);
 *
 * await app.listen({ port: 8000 });
 * ```
 */
export class Spoke {
  private table: RouteTable;
  private compiler: PatternCompiler;
  private dispatcher: Dispatcher;
  private pages: ErrorPageRenderer;
  private logger: Logger;
  private basePath: string;
  private legacyErrorStatus: boolean;
  private precompile: boolean;
  private server: Server | null = null;

  constructor(config: SpokeConfig = {}) {
    validateConfig(config);

    this.logger = config.logger ??
      createLogger({ name: "spoke", ...config.log });
    this.basePath = config.prefix ?? "/";
    this.legacyErrorStatus = config.legacyErrorStatus ?? false;
    this.precompile = config.precompile ?? false;

    this.table = new RouteTable();
    this.compiler = new PatternCompiler({ cache: config.cachePatterns });
    this.dispatcher = new Dispatcher(this.table, this.compiler);
    this.pages = new ErrorPageRenderer(
      config.errorTemplate,
      this.logger.child({ name: "render" }),
    );
  }

  /**
   * Register `handler` for `pattern` under one or more methods
   * (case-insensitive, GET or POST). Registering the same method and
   * pattern again replaces the handler.
   *
   * @throws {InvalidMethodError} for any other method name
   */
  route<P extends string>(
    pattern: P,
    methods: string | readonly string[],
    handler: Handler<PatternParams<P>>,
  ): this {
    const list = typeof methods === "string" ? [methods] : methods;
    const parsed = list.map(parseMethod);
    const fullPath = joinPath(this.basePath, pattern);

    if (this.precompile) {
      this.compiler.compile(stripTrailingSlash(fullPath));
    }

    for (const method of parsed) {
      const route = this.table.register(method, fullPath, handler);
      this.logger.debug("Route registered", {
        method,
        pattern: route.pattern,
      });
    }
    return this;
  }

  get<P extends string>(pattern: P, handler: Handler<PatternParams<P>>): this {
    return this.route(pattern, "GET", handler);
  }

  post<P extends string>(pattern: P, handler: Handler<PatternParams<P>>): this {
    return this.route(pattern, "POST", handler);
  }

  routes(): RouteInfo[] {
    return this.table.all().map(({ method, pattern }) => ({ method, pattern }));
  }

  /**
   * Dispatch one request. Never rejects: every failure becomes an error
   * page.
   */
  async handle(method: string, rawPath: string): Promise<DispatchResult> {
    const start = performance.now();
    const snapshot = createSnapshot(method, rawPath);
    const result = await this.dispatch(snapshot);

    this.logger.info(
      `${snapshot.method} ${rawPath} ${result.status} ${elapsedMs(start)}ms`,
    );
    return result;
  }

  fetch = async (request: Request): Promise<Response> => {
    const target = requestTarget(request.url);
    const result = await this.handle(request.method, target);
    return new Response(result.body, {
      status: result.status,
      headers: result.headers,
    });
  };

  /**
   * Seal the route table and serve over `node:http`.
   */
  async listen(options: ListenOptions = {}): Promise<ListenInfo> {
    if (this.server) {
      throw new SpokeError(
        "Server already listening",
        500,
        "ALREADY_LISTENING",
      );
    }
    const { hostname, port } = resolveListenOptions(options);
    this.table.seal();

    const listener = createRequestListener(this, this.logger);
    const server = createServer((req, res) => {
      listener(req, res).catch((error: unknown) => {
        this.logger.error("Failed to write response", {
          error: describeError(error),
        });
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, hostname, () => {
        server.off("error", reject);
        resolve();
      });
    });
    logServerErrors(server, this.logger);
    this.server = server;

    const address = server.address();
    const info: ListenInfo = {
      hostname,
      port: isAddressInfo(address) ? address.port : port,
    };

    this.logger.info(`Server running at http://${info.hostname}:${info.port}`);
    options.onListen?.(info);
    return info;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.logger.info("Server stopped");
  }

  private async dispatch(snapshot: RequestSnapshot): Promise<DispatchResult> {
    let match: Match | null;
    try {
      match = this.dispatcher.match(snapshot);
    } catch (error) {
      return this.fail(snapshot, toSpokeError(error), 500);
    }

    if (!match) {
      return {
        state: "not_found",
        status: 404,
        body: await this.pages.notFound(),
        headers: HTML_HEADERS,
      };
    }

    const { route, params, strategy } = match;
    this.logger.debug("Route matched", { pattern: route.pattern, strategy });

    try {
      const body = await runWithRequest(
        withParams(snapshot, params),
        () => route.handler(...params),
      );
      if (typeof body !== "string") {
        throw new HandlerError(
          `Handler for ${route.pattern} returned ${typeof body} instead of a string`,
          body,
        );
      }
      return {
        state: "matched",
        status: 200,
        body,
        headers: HTML_HEADERS,
        strategy,
      };
    } catch (error) {
      const status = this.legacyErrorStatus ? 200 : 500;
      return this.fail(snapshot, toSpokeError(error), status, strategy);
    }
  }

  private async fail(
    snapshot: RequestSnapshot,
    error: SpokeError,
    status: number,
    strategy?: MatchStrategy,
  ): Promise<DispatchResult> {
    const { error: detail } = error.toJSON(!isOperationalError(error));
    this.logger.error("Request failed", {
      method: snapshot.method,
      path: snapshot.path,
      ...detail,
    });

    return {
      state: "failed",
      status,
      body: await this.pages.internalError(error.message),
      headers: HTML_HEADERS,
      strategy,
      error,
    };
  }
}

function isAddressInfo(value: unknown): value is AddressInfo {
  return typeof value === "object" && value !== null && "port" in value;
}
