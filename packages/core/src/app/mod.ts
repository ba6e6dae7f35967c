export { Spoke } from "~/app/spoke.ts";
export type { DispatchResult, DispatchState, RouteInfo } from "~/app/spoke.ts";
export {
  DEFAULT_HOSTNAME,
  DEFAULT_PORT,
  loadEnvConfig,
  resolveListenOptions,
  SpokeConfigSchema,
  validateConfig,
} from "~/app/config.ts";
export type { ServerSettings } from "~/app/config.ts";
export { createLogger, isLogger } from "~/app/logger.ts";
export { createRequestListener, logServerErrors } from "~/app/server.ts";
export type {
  ErrorEmitter,
  IncomingRequest,
  OutgoingResponse,
} from "~/app/server.ts";
export type {
  ListenInfo,
  ListenOptions,
  Logger,
  LoggerConfig,
  LogLevel,
  SpokeConfig,
} from "~/app/types.ts";
