/**
 * Application configuration.
 * Validates and exposes typed configuration values read from the environment.
 */

import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvInt } from "./env.js";

export { ConfigError } from "./env.js";

// Re-export harvest run configuration
export * from "./harvest/index.js";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
type ConfiguredLogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is ConfiguredLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface SourceCredentials {
  /** E-utilities API key; raises the upstream rate limit when present */
  readonly apiKey: string;
  /** Contact address sent with every request */
  readonly email: string;
  /** Tool name sent with every request */
  readonly tool: string;
  /** Base URL of the E-utilities endpoints, with trailing slash */
  readonly baseUrl: string;
  /** Per-request timeout */
  readonly timeoutMs: number;
}

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Upstream catalog credentials */
  readonly source: SourceCredentials;
  /** Root of the durable state (logs, ledgers, caches) */
  readonly dataDir: string;
  /** Root of the published artifacts */
  readonly docsDir: string;
}

function loadConfig(): AppConfig {
  const appName = optionalEnv("APP_NAME", "seqcat-harvester");
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName,
    source: {
      apiKey: optionalEnv("NCBI_API_KEY", ""),
      email: optionalEnv("NCBI_EMAIL", ""),
      tool: optionalEnv("NCBI_TOOL", appName),
      baseUrl: optionalEnv(
        "EUTILS_BASE_URL",
        "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/"
      ),
      timeoutMs: optionalEnvInt("HTTP_TIMEOUT_MS", 60_000),
    },
    dataDir: optionalEnv("DATA_DIR", "data"),
    docsDir: optionalEnv("DOCS_DIR", "docs"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Resolve the configured log level, failing on unknown values.
 */
export function configuredLogLevel(): ConfiguredLogLevel {
  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
  return config.logLevel;
}

/**
 * Validate that all required configuration is present.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  configuredLogLevel();

  if (config.source.timeoutMs <= 0) {
    throw new ConfigError(`HTTP_TIMEOUT_MS must be positive, got: ${config.source.timeoutMs}`);
  }

  if (!config.source.baseUrl.endsWith("/")) {
    throw new ConfigError(
      `EUTILS_BASE_URL must end with "/", got: ${config.source.baseUrl}`
    );
  }
}
