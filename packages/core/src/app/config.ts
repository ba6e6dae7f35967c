/**
 * Configuration schemas and validation.
 *
 * Plain-data options are checked against TypeBox schemas; every failing
 * field is reported in a single ConfigError.
 */

import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { isLogger } from "~/app/logger.ts";
import type {
  ListenInfo,
  ListenOptions,
  SpokeConfig,
} from "~/app/types.ts";
import { ConfigError, type ConfigIssue } from "~/errors/mod.ts";

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOSTNAME = "0.0.0.0";

export const LogLevelSchema = Type.Union([
  Type.Literal("trace"),
  Type.Literal("debug"),
  Type.Literal("info"),
  Type.Literal("warn"),
  Type.Literal("error"),
  Type.Literal("fatal"),
  Type.Literal("silent"),
]);

export const LoggerConfigSchema = Type.Object({
  level: Type.Optional(LogLevelSchema),
  name: Type.Optional(Type.String()),
  timestamp: Type.Optional(Type.Boolean()),
  json: Type.Optional(Type.Boolean()),
});

export const SpokeConfigSchema = Type.Object({
  prefix: Type.Optional(Type.String({ pattern: "^/" })),
  errorTemplate: Type.Optional(Type.String({ minLength: 1 })),
  legacyErrorStatus: Type.Optional(Type.Boolean()),
  cachePatterns: Type.Optional(Type.Boolean()),
  precompile: Type.Optional(Type.Boolean()),
  log: Type.Optional(LoggerConfigSchema),
});

export const ListenOptionsSchema = Type.Object({
  port: Type.Optional(Type.Integer({ minimum: 0, maximum: 65535 })),
  hostname: Type.Optional(Type.String({ minLength: 1 })),
});

export const EnvConfigSchema = Type.Object({
  SPOKE_HOST: Type.Optional(Type.String({ minLength: 1 })),
  SPOKE_PORT: Type.Optional(Type.Integer({ minimum: 0, maximum: 65535 })),
  SPOKE_LOG_LEVEL: Type.Optional(LogLevelSchema),
});

export type EnvConfig = Static<typeof EnvConfigSchema>;

export interface ServerSettings {
  hostname: string;
  port: number;
  logLevel?: Static<typeof LogLevelSchema>;
}

function issuesOf(schema: TSchema, data: unknown): ConfigIssue[] {
  return [...Value.Errors(schema, data)].map((err) => ({
    field: err.path.replace(/^\//, "").replace(/\//g, ".") || "(root)",
    message: err.message,
    code: err.type.toString(),
  }));
}

/**
 * Check `data` against `schema`.
 *
 * @throws {ConfigError} listing every failing field
 */
export function validateOrThrow<T extends TSchema>(
  schema: T,
  data: unknown,
  label: string,
): Static<T> {
  if (Value.Check(schema, data)) {
    return data;
  }
  const issues = issuesOf(schema, data);
  const summary = issues.map((i) => `${i.field}: ${i.message}`).join(", ");
  throw new ConfigError(`Invalid ${label}: ${summary}`, issues);
}

export function validateConfig(config: SpokeConfig): SpokeConfig {
  const { logger, ...plain } = config;
  validateOrThrow(SpokeConfigSchema, plain, "config");
  if (logger !== undefined && !isLogger(logger)) {
    throw new ConfigError("Invalid config: logger: Expected a logger", [
      { field: "logger", message: "Expected a logger" },
    ]);
  }
  return config;
}

export function resolveListenOptions(options: ListenOptions): ListenInfo {
  const { onListen: _, ...plain } = options;
  validateOrThrow(ListenOptionsSchema, plain, "listen options");
  return {
    port: options.port ?? DEFAULT_PORT,
    hostname: options.hostname ?? DEFAULT_HOSTNAME,
  };
}

/**
 * Read server settings from environment variables.
 *
 * `SPOKE_PORT` is converted from its string form before validation.
 */
export function loadEnvConfig(
  env: Record<string, string | undefined> = process.env,
): ServerSettings {
  const raw = {
    SPOKE_HOST: env.SPOKE_HOST,
    SPOKE_PORT: env.SPOKE_PORT,
    SPOKE_LOG_LEVEL: env.SPOKE_LOG_LEVEL,
  };
  const defined = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined && v !== ""),
  );
  const parsed = validateOrThrow(
    EnvConfigSchema,
    Value.Convert(EnvConfigSchema, defined),
    "environment",
  );

  return {
    hostname: parsed.SPOKE_HOST ?? DEFAULT_HOSTNAME,
    port: parsed.SPOKE_PORT ?? DEFAULT_PORT,
    logLevel: parsed.SPOKE_LOG_LEVEL,
  };
}
