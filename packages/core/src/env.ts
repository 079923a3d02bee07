/**
 * @spanwise/core - Environment Variables
 * Typed access to process environment variables
 */

/**
 * Environment variable overrides, consulted before `process.env`.
 * Lets tests and embedders supply configuration without mutating the process.
 */
let envOverrides: Record<string, string | undefined> = {};

/**
 * Set environment overrides
 *
 * @example
 * ```typescript
 * setEnvOverrides({ OTEL_EXPORTER_OTLP_ENDPOINT: "http://collector:4318" });
 * ```
 */
export function setEnvOverrides(env: Record<string, string | undefined>): void {
  envOverrides = { ...envOverrides, ...env };
}

/**
 * Clear environment overrides
 */
export function clearEnvOverrides(): void {
  envOverrides = {};
}

/**
 * Get an environment variable value
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  if (key in envOverrides) {
    return envOverrides[key] ?? defaultValue;
  }

  if (typeof process !== "undefined") {
    return process.env[key] ?? defaultValue;
  }

  return defaultValue;
}

/**
 * Get an environment variable as a number
 */
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = getEnv(key);
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Environment mode
 */
export type EnvMode = "development" | "production" | "test";

/**
 * Get current environment mode
 */
export function getEnvMode(): EnvMode {
  const env = getEnv("NODE_ENV");
  if (env === "production") return "production";
  if (env === "test") return "test";
  return "development";
}

/**
 * Check if running in development mode
 */
export function isDevelopment(): boolean {
  return getEnvMode() === "development";
}
