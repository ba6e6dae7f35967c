/**
 * Errors raised while registering, compiling and matching routes.
 */

import { SpokeError } from "~/errors/base.ts";

/**
 * A route was registered under a method other than GET or POST.
 */
export class InvalidMethodError extends SpokeError {
  readonly method: string;

  constructor(method: string) {
    super(`Invalid method: ${method}`, 500, "INVALID_METHOD", { method });
    this.name = "InvalidMethodError";
    this.method = method;
  }
}

/**
 * A typed placeholder names a converter that does not exist.
 */
export class UnknownConverterKindError extends SpokeError {
  readonly kind: string;

  constructor(kind: string, pattern?: string) {
    super(
      pattern
        ? `Unknown converter kind "${kind}" in pattern ${pattern}`
        : `Unknown converter kind "${kind}"`,
      500,
      "UNKNOWN_CONVERTER",
      { kind, pattern },
      false,
    );
    this.name = "UnknownConverterKindError";
    this.kind = kind;
  }
}

/**
 * A pattern could not be turned into a regular expression.
 */
export class InvalidPatternError extends SpokeError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(
      `Invalid pattern ${pattern}: ${reason}`,
      500,
      "INVALID_PATTERN",
      { pattern },
      false,
    );
    this.name = "InvalidPatternError";
    this.pattern = pattern;
  }
}

/**
 * Captured text did not satisfy its converter.
 */
export class ConversionError extends SpokeError {
  readonly kind: string;
  readonly value: string;

  constructor(kind: string, value: string, reason = "does not match") {
    super(
      `Cannot convert "${value}" with ${kind} converter: ${reason}`,
      500,
      "CONVERSION_FAILED",
      { kind, value },
      false,
    );
    this.name = "ConversionError";
    this.kind = kind;
    this.value = value;
  }
}

/**
 * A route was registered after the table was sealed for serving.
 */
export class RouteTableSealedError extends SpokeError {
  constructor(method: string, pattern: string) {
    super(
      `Cannot register ${method} ${pattern}: route table is sealed`,
      500,
      "ROUTES_SEALED",
      { method, pattern },
    );
    this.name = "RouteTableSealedError";
  }
}
