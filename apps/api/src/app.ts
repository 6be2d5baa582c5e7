/**
 * Fastify application factory.
 *
 * Kept separate from the entry point so tests can drive the routes through
 * app.inject() without opening a socket.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import type { AppConfig } from "./config.js";
import { priceRoutes } from "./routes/price.js";

export async function buildApp(config: AppConfig): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: config.logLevel },
  });

  // The macro is decoded by ad servers and browser tooling alike
  await app.register(cors, {
    origin: true,
    methods: ["GET", "POST"],
  });

  await app.register(priceRoutes, { keys: config.keys });

  // Health check endpoint
  app.get("/health", async () => ({ status: "ok" }));

  return app;
}
