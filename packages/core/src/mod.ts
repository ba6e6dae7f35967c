/**
 * Spoke Core
 */

export { createLogger, isLogger, loadEnvConfig, Spoke } from "~/app/mod.ts";
export { createRequestListener, logServerErrors } from "~/app/mod.ts";
export type {
  DispatchResult,
  DispatchState,
  ErrorEmitter,
  IncomingRequest,
  ListenInfo,
  ListenOptions,
  Logger,
  LoggerConfig,
  LogLevel,
  OutgoingResponse,
  RouteInfo,
  ServerSettings,
  SpokeConfig,
} from "~/app/mod.ts";

export { currentRequest, useRequest } from "~/context/mod.ts";
export type { RequestSnapshot } from "~/context/mod.ts";

export {
  ConfigError,
  ConversionError,
  describeError,
  HandlerError,
  InvalidMethodError,
  InvalidPatternError,
  isOperationalError,
  isSpokeError,
  RouteTableSealedError,
  SpokeError,
  toSpokeError,
  UnknownConverterKindError,
} from "~/errors/mod.ts";
export type { ConfigIssue, ErrorJSON } from "~/errors/mod.ts";

export { render, renderTemplate } from "~/render/mod.ts";
export type { TemplateVars } from "~/render/mod.ts";

export {
  compilePattern,
  Dispatcher,
  lookupConverter,
  PatternCompiler,
  RouteTable,
} from "~/router/mod.ts";
export type {
  CompiledPattern,
  Converter,
  ConverterKind,
  Handler,
  HttpMethod,
  Match,
  MatchStrategy,
  ParamValue,
  PatternParams,
  Route,
} from "~/router/mod.ts";
