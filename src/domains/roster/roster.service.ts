/**
 * Roster Service - executes chat commands against the roster store
 *
 * Admin lookups happen before the chat lock is taken; everything between
 * locating the caller and persisting the result runs inside it.
 */
import { logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import { Errors } from "@src/shared/errors.js";
import type { ChatRoster } from "./chat.roster.js";
import { identityOf, type ChatUserProfile } from "./identity.matcher.js";
import {
  isParticipantCommand,
  parseRosterCommand,
  requiresAdmin,
  type AdminCommand,
  type ParticipantCommand,
  type RosterCommand,
} from "./roster.commands.js";
import { HELP_TEXT, describeFailure, describeSuccess } from "./roster.messages.js";
import { renderRoster } from "./roster.render.js";
import type { RosterStore } from "./roster.store.js";
import type { RosterActionResult, RosterIdentity } from "./roster.types.js";

export type ChatType = "private" | "group" | "supergroup" | "channel";

export interface RosterMessage {
  chatId: string;
  chatType: ChatType;
  sender: ChatUserProfile;
  text: string;
}

export interface AdminOracle {
  isChatAdmin(chatId: string, userId: string): Promise<boolean>;
}

export type RosterReply =
  | { handled: false }
  | {
      handled: true;
      command: RosterCommand["type"];
      success: boolean;
      reply: string;
      result?: RosterActionResult;
    };

const GROUP_CHAT_TYPES: ReadonlySet<ChatType> = new Set(["group", "supergroup"]);

export class RosterService {
  constructor(
    private readonly store: RosterStore,
    private readonly admins: AdminOracle,
  ) {}

  async handleMessage(message: RosterMessage): Promise<RosterReply> {
    const command = parseRosterCommand(message.text);
    if (!command) return { handled: false };

    // Signups only make sense where there is a group to sign up with
    if (isParticipantCommand(command) && !GROUP_CHAT_TYPES.has(message.chatType)) {
      return { handled: false };
    }

    if (requiresAdmin(command)) {
      const isAdmin = await this.admins.isChatAdmin(message.chatId, message.sender.id);
      if (!isAdmin) {
        logger.info(
          { chatId: message.chatId, userId: message.sender.id, command: command.type },
          "Admin command refused",
        );
        metrics.rosterCommands.inc({ command: command.type, result: "NOT_AUTHORIZED" });
        return { handled: true, command: command.type, success: false, reply: Errors.NOT_AUTHORIZED };
      }
    }

    const reply = await this.execute(message, command);
    metrics.rosterCommands.inc({
      command: command.type,
      result: reply.result && !reply.result.success ? reply.result.error : "success",
    });
    return reply;
  }

  /** Rendered roster for a chat */
  async list(chatId: string): Promise<string> {
    return renderRoster(await this.store.view(chatId));
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private async execute(
    message: RosterMessage,
    command: RosterCommand,
  ): Promise<Extract<RosterReply, { handled: true }>> {
    switch (command.type) {
      case "help":
        return { handled: true, command: command.type, success: true, reply: HELP_TEXT };
      case "list":
        return {
          handled: true,
          command: command.type,
          success: true,
          reply: await this.list(message.chatId),
        };
      case "usage":
        return {
          handled: true,
          command: command.type,
          success: false,
          reply: `Usage: ${command.hint}`,
        };
    }

    const action: ParticipantCommand | AdminCommand = command;
    const identity = identityOf(message.sender);
    const { result, roster } = await this.store.mutate(message.chatId, (live) =>
      isParticipantCommand(action)
        ? applyParticipantCommand(live, action, identity)
        : applyAdminCommand(live, action),
    );

    logger.info(
      {
        chatId: message.chatId,
        userId: message.sender.id,
        command: command.type,
        success: result.success,
        ...(result.success ? { slotDelta: result.slotDelta } : { error: result.error }),
      },
      "Roster command executed",
    );

    return {
      handled: true,
      command: command.type,
      success: result.success,
      reply: formatReply(result, roster),
      result,
    };
  }
}

function applyParticipantCommand(
  roster: ChatRoster,
  command: ParticipantCommand,
  identity: RosterIdentity,
): RosterActionResult {
  switch (command.type) {
    case "join":
      return roster.join(identity);
    case "leave":
      return roster.leave(identity);
    case "addGuests":
      return roster.addGuests(identity, command.count);
    case "removeGuests":
      return roster.removeGuests(identity, command.count);
  }
}

function applyAdminCommand(
  roster: ChatRoster,
  command: AdminCommand,
): RosterActionResult {
  switch (command.type) {
    case "open":
      return roster.openSignup(command.date, command.time);
    case "close":
      return roster.closeSignup();
    case "setDate":
      return roster.setDate(command.value);
    case "setTime":
      return roster.setTime(command.value);
    case "setVenue":
      return roster.setVenue(command.value);
    case "setLimit":
      return roster.setLimit(command.value);
    case "remove":
      return roster.removeByKey(command.key);
    case "reset":
      return roster.reset();
  }
}

function formatReply(result: RosterActionResult, roster: ChatRoster): string {
  if (!result.success) return describeFailure(result);
  return `${describeSuccess(result)}\n\n${renderRoster(roster)}`;
}
