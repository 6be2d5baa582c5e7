/**
 * Service configuration.
 *
 * Environment variables:
 *   PRICE_INTEGRITY_KEY=<base64>   (required)
 *   PRICE_ENCRYPTION_KEY=<base64>  (required)
 *   PRICE_KEY_ENCODING=url         (std | url | raw-std | raw-url)
 *   PORT=3001
 *   HOST=0.0.0.0
 *   LOG_LEVEL=info
 */

import { BASE64_VARIANTS, parseKeys, type Base64Variant, type PriceKeys } from "@pricecodec/crypto";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  keys: PriceKeys;
}

function isVariant(value: string): value is Base64Variant {
  return BASE64_VARIANTS.some((v) => v === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

/**
 * Build the service configuration from environment variables.
 *
 * @param env - process.env or equivalent key-value map
 * @throws if a key is missing or malformed, or a setting is out of range
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const encoding = env.PRICE_KEY_ENCODING ?? "url";
  if (!isVariant(encoding)) {
    throw new Error(
      `PRICE_KEY_ENCODING must be one of ${BASE64_VARIANTS.join(", ")}, got "${encoding}"`
    );
  }

  const integrityText = env.PRICE_INTEGRITY_KEY;
  const encryptionText = env.PRICE_ENCRYPTION_KEY;
  if (!integrityText || !encryptionText) {
    throw new Error("PRICE_INTEGRITY_KEY and PRICE_ENCRYPTION_KEY environment variables are required");
  }

  const port = Number(env.PORT ?? 3001);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
  }

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`);
  }

  return {
    port,
    host: env.HOST ?? "0.0.0.0",
    logLevel,
    keys: parseKeys(encoding, integrityText, encryptionText),
  };
}
