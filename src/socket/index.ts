import type { Server } from "socket.io";
import type { Redis } from "ioredis";
import { config } from "@src/config/index.js";
import { logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import { registerAllDomains } from "@src/domains/index.js";
import { RosterService, RosterStore } from "@src/domains/roster/index.js";
import { ChatPlatformClient } from "@src/integrations/chat-platform/index.js";
import { RateLimiter } from "@src/utils/rateLimiter.js";
import type { AppContext } from "@src/context.js";

export async function initializeSocket(
  io: Server,
  redis: Redis,
): Promise<AppContext> {
  const rosterStore = new RosterStore(redis, {
    stateKey: config.ROSTER_STATE_KEY,
    defaultTime: config.DEFAULT_EVENT_TIME,
    defaultVenue: config.DEFAULT_VENUE,
  });
  // A malformed stored document aborts startup here
  await rosterStore.loadOrEmpty();

  const chatPlatform = new ChatPlatformClient(
    {
      baseUrl: config.CHAT_API_URL,
      apiKey: config.CHAT_API_KEY,
      timeoutMs: config.CHAT_API_TIMEOUT_MS,
      cacheTtlMs: config.ADMIN_CACHE_TTL_MS,
      cacheMaxEntries: config.ADMIN_CACHE_MAX_ENTRIES,
    },
    logger,
  );

  const rosterService = new RosterService(rosterStore, chatPlatform);
  const rateLimiter = new RateLimiter(redis);

  const appContext: AppContext = {
    io,
    redis,
    rosterStore,
    rosterService,
    chatPlatform,
    rateLimiter,
  };

  io.on("connection", (socket) => {
    logger.info({ socketId: socket.id }, "Gateway connected");
    metrics.socketConnections.inc();

    registerAllDomains(socket, appContext);

    socket.on("disconnect", (reason) => {
      logger.info({ socketId: socket.id, reason }, "Gateway disconnected");
      metrics.socketConnections.dec();
    });
  });

  return appContext;
}
