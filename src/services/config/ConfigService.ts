import { z } from "zod";
import { AppConfig, Result, failure, success } from "@core/types";
import { ConfigError } from "@core/errors";
import {
  DEVICE_DEFAULT_HOST,
  DEVICE_DEFAULT_PATH,
  DEVICE_DEFAULT_PORT,
  FLUSH_DEFAULT_INTERVAL_MS,
  QUEUE_DEFAULT_CAPACITY,
  SAMPLE_DEFAULT_INITIAL_DELAY_MS,
  SAMPLE_DEFAULT_INTERVAL_MS,
  STREAM_DEFAULT_RECONNECT_DELAY_MS,
  WEB_DEFAULT_HOST,
  WEB_DEFAULT_PORT,
} from "@core/constants";

/**
 * Unset and blank variables both fall back to the default
 */
const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const text = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const integer = (fallback: number, min: number, max?: number) => {
  let schema = z.coerce
    .number({ message: "must be a number" })
    .int("must be an integer")
    .min(min, `must be at least ${min}`);
  if (max !== undefined) {
    schema = schema.max(max, `must be at most ${max}`);
  }
  return z.preprocess(blankToUndefined, schema.default(fallback));
};

const port = (fallback: number) => integer(fallback, 1, 65535);

/**
 * Environment variables read at startup
 */
export const environmentSchema = z.object({
  GPS_DB_CONNECTION_STRING: z.preprocess(blankToUndefined, z.string().trim()),
  GPS_MAPS_API_KEY: optionalText,
  DEVICE_HOST: text(DEVICE_DEFAULT_HOST),
  DEVICE_PORT: port(DEVICE_DEFAULT_PORT),
  DEVICE_PATH: text(DEVICE_DEFAULT_PATH).refine(
    (value) => value.startsWith("/"),
    "must start with /",
  ),
  STREAM_RECONNECT_DELAY_MS: integer(STREAM_DEFAULT_RECONNECT_DELAY_MS, 0),
  SAMPLE_INITIAL_DELAY_MS: integer(SAMPLE_DEFAULT_INITIAL_DELAY_MS, 0),
  SAMPLE_INTERVAL_MS: integer(SAMPLE_DEFAULT_INTERVAL_MS, 1),
  FLUSH_INTERVAL_MS: integer(FLUSH_DEFAULT_INTERVAL_MS, 1),
  QUEUE_CAPACITY: integer(QUEUE_DEFAULT_CAPACITY, 1),
  WEB_HOST: text(WEB_DEFAULT_HOST),
  WEB_PORT: port(WEB_DEFAULT_PORT),
});

/**
 * Config Service
 *
 * Builds the application configuration from environment variables.
 * Only GPS_DB_CONNECTION_STRING is required.
 */
export class ConfigService {
  static load(
    env: NodeJS.ProcessEnv = process.env,
  ): Result<AppConfig, ConfigError> {
    const parsed = environmentSchema.safeParse(env);
    if (!parsed.success) {
      return failure(ConfigService.toConfigError(parsed.error, env));
    }

    const vars = parsed.data;
    return success({
      device: {
        host: vars.DEVICE_HOST,
        port: vars.DEVICE_PORT,
        path: vars.DEVICE_PATH,
        reconnectDelayMs: vars.STREAM_RECONNECT_DELAY_MS,
      },
      database: {
        connectionString: vars.GPS_DB_CONNECTION_STRING,
      },
      logging: {
        sampleInitialDelayMs: vars.SAMPLE_INITIAL_DELAY_MS,
        sampleIntervalMs: vars.SAMPLE_INTERVAL_MS,
        flushIntervalMs: vars.FLUSH_INTERVAL_MS,
        queueCapacity: vars.QUEUE_CAPACITY,
      },
      web: {
        host: vars.WEB_HOST,
        port: vars.WEB_PORT,
        mapsApiKey: vars.GPS_MAPS_API_KEY,
      },
    });
  }

  /**
   * Report the first failing variable
   */
  private static toConfigError(
    error: z.ZodError,
    env: NodeJS.ProcessEnv,
  ): ConfigError {
    const issue = error.issues[0];
    const field = String(issue.path[0] ?? "environment");
    const value = env[field];

    if (value === undefined || value.trim() === "") {
      return ConfigError.missingField(field);
    }
    return ConfigError.invalidValue(field, value, issue.message);
  }
}
