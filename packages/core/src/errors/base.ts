/**
 * Base error class for Spoke.
 */

import type { ErrorJSON } from "./types.ts";

/**
 * Base error class for all Spoke errors.
 *
 * Carries the HTTP status the failure maps to when it surfaces during
 * dispatch, plus a machine-readable code.
 *
 * @example
 * ```typescript
 * throw new SpokeError("Something went wrong", 500, "INTERNAL_ERROR");
 * ```
 */
export class SpokeError extends Error {
  /** HTTP status code */
  readonly status: number;
  /** Machine-readable error code */
  readonly code: string;
  /** Additional error details */
  readonly details?: unknown;
  /** Whether this error is operational (expected) vs programming error */
  readonly isOperational: boolean;

  constructor(
    message: string,
    status = 500,
    code = "INTERNAL_ERROR",
    details?: unknown,
    isOperational = true,
  ) {
    super(message);
    this.name = "SpokeError";
    this.status = status;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Convert error to a plain object.
   * @param development Include stack trace and details
   */
  toJSON(development = false): ErrorJSON {
    const json: ErrorJSON = {
      error: {
        message: this.message,
        code: this.code,
        status: this.status,
      },
    };

    if (development) {
      if (this.details !== undefined) {
        json.error.details = this.details;
      }
      if (this.stack) {
        json.error.stack = this.stack.split("\n").map((l) => l.trim());
      }
    }

    return json;
  }
}
