/**
 * EFFECT RUNTIME
 *
 * Runs Effect programs at the edges (CLI, HTTP handlers, plain boundary
 * functions) with the app logger installed in place of Effect's default one.
 */

import { Effect, Layer, Logger, LogLevel } from "effect";
import { appLogger } from "./appLogger";
import type { ServiceError } from "./errors";

// ============================================================================
// RUNTIME CONFIGURATION
// ============================================================================

const toMetadata = (annotations: Iterable<readonly [string, unknown]>): Record<string, unknown> =>
  Object.fromEntries(annotations);

const renderMessage = (message: unknown): string => {
  if (Array.isArray(message)) return message.map(renderMessage).join(" ");
  return typeof message === "string" ? message : JSON.stringify(message);
};

/**
 * Routes Effect.log* calls through appLogger (level filtering + redaction)
 */
const AppLogger = Logger.make(({ logLevel, message, annotations }) => {
  const text = renderMessage(message);
  const metadata = toMetadata(annotations);

  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Error)) {
    appLogger.error(text, metadata);
  } else if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) {
    appLogger.warn(text, metadata);
  } else if (LogLevel.greaterThanEqual(logLevel, LogLevel.Info)) {
    appLogger.info(text, metadata);
  } else {
    appLogger.debug(text, metadata);
  }
});

// appLogger owns the threshold, so every level reaches it
const AppLayer = Layer.merge(
  Logger.replace(Logger.defaultLogger, AppLogger),
  Logger.minimumLogLevel(LogLevel.All)
);

// ============================================================================
// RUNTIME HELPERS
// ============================================================================

export type RunResult<A, E> = { success: true; data: A } | { success: false; error: E };

/**
 * Run Effect as Promise; failures come back as values
 *
 * @example
 * const result = await runPromise(fillResectionForm(report).pipe(Effect.provide(ModelLive)));
 * if (!result.success) appLogger.warn("fill_failed", result.error.toJSON());
 */
export const runPromise = <A, E>(effect: Effect.Effect<A, E, never>): Promise<RunResult<A, E>> =>
  Effect.runPromise(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) => Effect.succeed({ success: false as const, error }))
    )
  );

/**
 * Run Effect synchronously with Result type (no exceptions for typed failures)
 */
export const runSyncResult = <A, E>(effect: Effect.Effect<A, E, never>): RunResult<A, E> =>
  Effect.runSync(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) => Effect.succeed({ success: false as const, error }))
    )
  );

/**
 * Convert ServiceError to JSON for logging
 */
export const serializeError = (error: ServiceError): Record<string, unknown> => error.toJSON();

export { AppLayer, AppLogger };
