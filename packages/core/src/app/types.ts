export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  timestamp?: boolean;
  json?: boolean;
}

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface SpokeConfig {
  /** Prefix prepended to every registered pattern. */
  prefix?: string;
  /** Path of the error page template. */
  errorTemplate?: string;
  /**
   * Answer handler failures with status 200, as servers that commit the
   * status line before running the handler do. Off by default: failures get
   * a 500.
   */
  legacyErrorStatus?: boolean;
  /** Memoize compiled patterns (default: true). */
  cachePatterns?: boolean;
  /** Compile each pattern when it is registered (default: false). */
  precompile?: boolean;
  log?: LoggerConfig;
  logger?: Logger;
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
  onListen?: (params: { hostname: string; port: number }) => void;
}

export interface ListenInfo {
  hostname: string;
  port: number;
}
