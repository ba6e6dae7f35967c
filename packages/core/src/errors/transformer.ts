/**
 * Error transformation utilities.
 */

import { SpokeError } from "~/errors/base.ts";
import { HandlerError } from "~/errors/http.ts";

/**
 * Textual description of anything thrown: the message of an Error,
 * otherwise its string form.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Default error transformer.
 * Spoke errors pass through; anything else becomes a HandlerError.
 */
export function toSpokeError(error: unknown): SpokeError {
  if (error instanceof SpokeError) {
    return error;
  }
  return new HandlerError(describeError(error), error);
}

/**
 * Type guard to check if a value is a SpokeError.
 */
export function isSpokeError(error: unknown): error is SpokeError {
  return error instanceof SpokeError;
}

/**
 * Type guard to check if an error is operational (expected).
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof SpokeError) {
    return error.isOperational;
  }
  return false;
}
