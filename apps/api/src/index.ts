/**
 * Fastify API Server — Entry Point
 *
 * Loads configuration from the environment (and .env), then starts the
 * price codec service.
 */

import "dotenv/config";
import { buildApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  console.error(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

const app = await buildApp(config);

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
