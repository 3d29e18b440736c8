import Fastify from "fastify";
import { Server } from "socket.io";
import { config } from "@src/config/index.js";
import { getRedisClient } from "./redis.js";
import { createHealthRoutes } from "./health.js";
import { createMetricsRoutes } from "./metrics.js";
import { logger } from "./logger.js";
import { initializeSocket } from "@src/socket/index.js";
import type { RosterStore } from "@src/domains/roster/roster.store.js";

function createHttpServer() {
  return Fastify({ loggerInstance: logger });
}

export type HttpServer = ReturnType<typeof createHttpServer>;

export interface BootstrapResult {
  server: HttpServer;
  io: Server;
  rosterStore: RosterStore;
}

export async function bootstrapServer(): Promise<BootstrapResult> {
  const fastify = createHttpServer();
  const redis = getRedisClient();

  const io = new Server(fastify.server, {
    cors: {
      origin: [...config.CORS_ORIGINS],
      methods: ["GET", "POST"],
      credentials: true,
    },
  });

  const { rosterStore } = await initializeSocket(io, redis);

  // Register health check
  await fastify.register(createHealthRoutes(redis));

  // Register metrics
  await fastify.register(createMetricsRoutes(rosterStore));

  return {
    server: fastify,
    io,
    rosterStore,
  };
}
