/**
 * Errors module - structured error handling.
 */

export { SpokeError } from "~/errors/base.ts";
export {
  ConfigError,
  HandlerError,
} from "~/errors/http.ts";
export {
  ConversionError,
  InvalidMethodError,
  InvalidPatternError,
  RouteTableSealedError,
  UnknownConverterKindError,
} from "~/errors/router.ts";
export {
  describeError,
  isOperationalError,
  isSpokeError,
  toSpokeError,
} from "~/errors/transformer.ts";
export type { ConfigIssue, ErrorJSON } from "~/errors/types.ts";
