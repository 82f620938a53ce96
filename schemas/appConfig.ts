/**
 * APPLICATION CONFIG
 *
 * Defaults for the CLI and HTTP server, overridden from the environment:
 *   DCIS_WINDOW_SIZE, DCIS_WINDOW_OVERLAP, DCIS_MODEL_NAME, PORT, LOG_LEVEL
 */

import { Either, Schema as S } from "effect";
import { ConfigError, formatParseError } from "../services/errors";

export const AppConfigSchema = S.Struct({
  windowSize: S.Int.pipe(S.positive()),
  overlap: S.Int.pipe(S.nonNegative()),
  modelName: S.NonEmptyString,
  port: S.Int.pipe(S.between(0, 65535)),
  logLevel: S.Literal("debug", "info", "warn", "error"),
}).pipe(
  S.filter((config) => config.overlap < config.windowSize, {
    message: () => "overlap must be smaller than windowSize",
  })
);

export type AppConfig = S.Schema.Type<typeof AppConfigSchema>;

export const defaultAppConfig: AppConfig = {
  windowSize: 200,
  overlap: 20,
  modelName: "gpt-4o",
  port: 8000,
  logLevel: "info",
};

const ENV_KEYS = {
  windowSize: "DCIS_WINDOW_SIZE",
  overlap: "DCIS_WINDOW_OVERLAP",
  modelName: "DCIS_MODEL_NAME",
  port: "PORT",
  logLevel: "LOG_LEVEL",
} as const;

type Env = Readonly<Record<string, string | undefined>>;

const numberFrom = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === "") return fallback;
  return Number(raw.trim());
};

const textFrom = (raw: string | undefined, fallback: string): string => {
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw.trim();
};

/**
 * Merge environment overrides onto the defaults and validate the result
 */
export const loadAppConfig = (env: Env = process.env): Either.Either<AppConfig, ConfigError> => {
  const candidate = {
    windowSize: numberFrom(env[ENV_KEYS.windowSize], defaultAppConfig.windowSize),
    overlap: numberFrom(env[ENV_KEYS.overlap], defaultAppConfig.overlap),
    modelName: textFrom(env[ENV_KEYS.modelName], defaultAppConfig.modelName),
    port: numberFrom(env[ENV_KEYS.port], defaultAppConfig.port),
    logLevel: textFrom(env[ENV_KEYS.logLevel], defaultAppConfig.logLevel).toLowerCase(),
  };
  return S.decodeUnknownEither(AppConfigSchema, { errors: "all" })(candidate).pipe(
    Either.mapLeft((error) => new ConfigError({ problems: formatParseError(error) }))
  );
};
