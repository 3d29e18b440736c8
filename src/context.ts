import type { Server } from "socket.io";
import type { Redis } from "ioredis";
import type { RosterStore } from "./domains/roster/roster.store.js";
import type { RosterService } from "./domains/roster/roster.service.js";
import type { ChatPlatformClient } from "./integrations/chat-platform/chat-platform.client.js";
import type { RateLimiter } from "./utils/rateLimiter.js";

export interface AppContext {
  io: Server;
  redis: Redis;
  rosterStore: RosterStore;
  rosterService: RosterService;
  chatPlatform: ChatPlatformClient;
  rateLimiter: RateLimiter;
}
