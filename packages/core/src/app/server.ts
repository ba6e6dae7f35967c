/**
 * Adapter between Node's `http` server and the dispatcher.
 */

import type { Logger } from "~/app/types.ts";
import { HTML_HEADERS, INTERNAL_ERROR_BODY } from "~/app/helpers.ts";
import type { DispatchResult } from "~/app/spoke.ts";
import { describeError } from "~/errors/mod.ts";

/** The parts of `http.IncomingMessage` the adapter reads. */
export interface IncomingRequest {
  method?: string;
  url?: string;
}

/** The parts of `http.ServerResponse` the adapter writes. */
export interface OutgoingResponse {
  readonly headersSent: boolean;
  writeHead(status: number, headers: Record<string, string>): unknown;
  end(body: string): unknown;
}

/** The part of `http.Server` that emits runtime errors. */
export interface ErrorEmitter {
  on(event: "error", listener: (error: Error) => void): unknown;
}

/**
 * Log `error` events from a listening server so they do not take the
 * process down.
 */
export function logServerErrors(server: ErrorEmitter, logger: Logger): void {
  server.on("error", (error) => {
    logger.error("Server error", { error: describeError(error) });
  });
}

export interface RequestHandlerApp {
  handle(method: string, rawPath: string): Promise<DispatchResult>;
}

/**
 * Build an `http.createServer` listener. The full body is produced before
 * the status line is written.
 */
export function createRequestListener(
  app: RequestHandlerApp,
  logger?: Logger,
): (req: IncomingRequest, res: OutgoingResponse) => Promise<void> {
  return (req, res) =>
    app.handle(req.method ?? "GET", req.url ?? "/").then(
      (result) => {
        res.writeHead(result.status, { ...result.headers });
        res.end(result.body);
      },
      (error: unknown) => {
        logger?.error("Unhandled dispatch failure", {
          error: describeError(error),
        });
        if (!res.headersSent) {
          res.writeHead(500, { ...HTML_HEADERS });
        }
        res.end(INTERNAL_ERROR_BODY);
      },
    );
}
