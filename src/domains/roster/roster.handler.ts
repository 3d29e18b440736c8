/**
 * roster:message - one chat message forwarded by the gateway
 * roster:list    - current roster of a chat
 */
import type { Socket } from "socket.io";
import { rosterListSchema, rosterMessageSchema } from "@src/socket/schemas.js";
import type { AppContext } from "@src/context.js";
import { config } from "@src/config/index.js";
import { Errors } from "@src/shared/errors.js";
import { createHandler } from "@src/shared/handler.utils.js";
import { parseRosterCommand } from "./roster.commands.js";

const handleRosterMessage = createHandler(
  "roster:message",
  rosterMessageSchema,
  async (payload, _socket, context) => {
    // Ordinary chat passes straight through, only commands count toward the limit
    if (!parseRosterCommand(payload.text)) {
      return { success: true, data: { handled: false } };
    }

    const allowed = await context.rateLimiter.isAllowed(
      `roster:${payload.sender.id}:${payload.chatId}`,
      config.RATE_LIMIT_MESSAGES_PER_MINUTE,
      60,
    );
    if (!allowed) {
      return { success: false, error: Errors.RATE_LIMITED };
    }

    const outcome = await context.rosterService.handleMessage(payload);
    if (!outcome.handled) {
      return { success: true, data: { handled: false } };
    }

    return {
      success: true,
      data: {
        handled: true,
        command: outcome.command,
        accepted: outcome.success,
        reply: outcome.reply,
      },
    };
  },
);

const handleRosterList = createHandler(
  "roster:list",
  rosterListSchema,
  async (payload, _socket, context) => {
    const reply = await context.rosterService.list(payload.chatId);
    return { success: true, data: { reply } };
  },
);

export const rosterHandler = (socket: Socket, context: AppContext) => {
  socket.on("roster:message", handleRosterMessage(socket, context));
  socket.on("roster:list", handleRosterList(socket, context));
};
