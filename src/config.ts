/**
 * Configuration types for the Qdrant client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './observability/logging.js';

/** Default Qdrant REST endpoint. */
export const DEFAULT_BASE_URL = 'http://localhost:6333';

/** Default log level. */
export const DEFAULT_LOG_LEVEL: LogLevel = 'off';

/**
 * Qdrant client configuration.
 */
export interface QdrantConfig {
  /**
   * REST endpoint, e.g. `http://localhost:6333`.
   * Stored verbatim; trailing slashes are dropped when paths are composed.
   */
  baseUrl: string;

  /**
   * API key sent as the `api-key` header on every request.
   * This value is secret and will never be logged.
   */
  apiKey?: string;

  /**
   * Minimum level for the built-in console logger.
   * @default 'off'
   */
  logLevel: LogLevel;
}

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'off']);

const configSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
      message: 'Base URL must start with http:// or https://',
    }),
  apiKey: z.string().min(1, 'API key cannot be empty').optional(),
  logLevel: logLevelSchema,
});

/**
 * Creates a default Qdrant configuration.
 */
export function createDefaultConfig(): QdrantConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    apiKey: undefined,
    logLevel: DEFAULT_LOG_LEVEL,
  };
}

/**
 * Validates a Qdrant configuration.
 * @throws {ConfigurationError} If the configuration is invalid.
 */
export function validateConfig(config: QdrantConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') ?? 'config';
    throw new ConfigurationError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`, {
      field,
    });
  }
}

/**
 * Builder for QdrantConfig with fluent API.
 */
export class QdrantConfigBuilder {
  private config: QdrantConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the REST endpoint.
   */
  withBaseUrl(baseUrl: string): this {
    this.config.baseUrl = baseUrl;
    return this;
  }

  /**
   * Sets the API key.
   */
  withApiKey(apiKey: string): this {
    this.config.apiKey = apiKey;
    return this;
  }

  /**
   * Sets the log level of the built-in console logger.
   */
  withLogLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): QdrantConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

/**
 * Creates a configuration builder from environment variables.
 *
 * Environment variables:
 * - QDRANT_URL: REST endpoint (default "http://localhost:6333")
 * - QDRANT_API_KEY: API key for authentication
 * - QDRANT_LOG_LEVEL: debug | info | warn | error | off
 *
 * @param env - Environment to read; defaults to `process.env`.
 * @throws {ConfigurationError} If QDRANT_LOG_LEVEL is not a known level.
 */
export function createConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): QdrantConfigBuilder {
  const builder = new QdrantConfigBuilder();

  const url = env.QDRANT_URL;
  if (url) {
    builder.withBaseUrl(url.trim());
  }

  const apiKey = env.QDRANT_API_KEY;
  if (apiKey) {
    builder.withApiKey(apiKey);
  }

  const logLevel = env.QDRANT_LOG_LEVEL;
  if (logLevel) {
    const parsed = logLevelSchema.safeParse(logLevel.toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid QDRANT_LOG_LEVEL environment variable: ${logLevel} (expected one of ${LOG_LEVELS.join(', ')})`
      );
    }
    builder.withLogLevel(parsed.data);
  }

  return builder;
}

/**
 * Sanitizes a configuration for logging by removing sensitive information.
 */
export function sanitizeConfigForLogging(config: QdrantConfig): Record<string, unknown> {
  return {
    baseUrl: config.baseUrl,
    apiKey: config.apiKey ? '[REDACTED]' : undefined,
    logLevel: config.logLevel,
  };
}
