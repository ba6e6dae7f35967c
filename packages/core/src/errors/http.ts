/**
 * Errors raised while handling a request or reading configuration.
 */

import { SpokeError } from "~/errors/base.ts";
import type { ConfigIssue } from "~/errors/types.ts";

/**
 * A route handler threw, rejected, or returned something other than a string.
 */
export class HandlerError extends SpokeError {
  override readonly cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message, 500, "HANDLER_FAILED", undefined);
    this.name = "HandlerError";
    this.cause = cause;
  }
}

/**
 * Configuration failed schema validation.
 */
export class ConfigError extends SpokeError {
  readonly issues: ConfigIssue[];

  constructor(message = "Invalid configuration", issues: ConfigIssue[] = []) {
    super(message, 500, "INVALID_CONFIG", issues);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
