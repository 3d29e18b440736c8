/**
 * Roster command parser
 *
 * Turns one chat message into a tagged command. Text recognition lives here
 * only; the state machine never sees raw text.
 */

export type ParticipantCommand =
  | { type: "join" }
  | { type: "leave" }
  | { type: "addGuests"; count: number }
  | { type: "removeGuests"; count: number };

export type PublicCommand = { type: "list" } | { type: "help" };

export type AdminCommand =
  | { type: "open"; date?: string; time?: string }
  | { type: "close" }
  | { type: "setDate"; value: string }
  | { type: "setTime"; value: string }
  | { type: "setVenue"; value: string }
  | { type: "setLimit"; value: string }
  | { type: "remove"; key: string }
  | { type: "reset" };

/** A slash command recognised but missing its argument */
export type UsageCommand = { type: "usage"; command: string; hint: string };

export type RosterCommand =
  | ParticipantCommand
  | PublicCommand
  | AdminCommand
  | UsageCommand;

const PLUS = "[+➕]";
const MINUS = "[-—–➖]";

const JOIN_PATTERN = new RegExp(`^\\s*${PLUS}\\s*$`, "u");
const LEAVE_PATTERN = new RegExp(`^\\s*${MINUS}\\s*$`, "u");
const ADD_GUESTS_PATTERN = new RegExp(`^\\s*${PLUS}\\s*(\\d{1,2})\\s*$`, "u");
const REMOVE_GUESTS_PATTERN = new RegExp(`^\\s*${MINUS}\\s*(\\d{1,2})\\s*$`, "u");
const SLASH_PATTERN = /^\/([a-z]+)(?:@\S+)?(?:\s+([\s\S]*))?$/i;

const ADMIN_COMMANDS = new Set<RosterCommand["type"]>([
  "open",
  "close",
  "setDate",
  "setTime",
  "setVenue",
  "setLimit",
  "remove",
  "reset",
]);

const PARTICIPANT_COMMANDS = new Set<RosterCommand["type"]>([
  "join",
  "leave",
  "addGuests",
  "removeGuests",
]);

export function isAdminCommand(command: RosterCommand): command is AdminCommand {
  return ADMIN_COMMANDS.has(command.type);
}

/** Admin commands, and usage hints for them, need the admin check */
export function requiresAdmin(command: RosterCommand): boolean {
  return command.type === "usage" || isAdminCommand(command);
}

export function isParticipantCommand(
  command: RosterCommand,
): command is ParticipantCommand {
  return PARTICIPANT_COMMANDS.has(command.type);
}

/**
 * @returns the command, or null when the message is ordinary chat
 */
export function parseRosterCommand(text: string): RosterCommand | null {
  const guestsAdded = ADD_GUESTS_PATTERN.exec(text);
  if (guestsAdded) {
    const count = Number(guestsAdded[1]);
    return count > 0 ? { type: "addGuests", count } : null;
  }

  const guestsRemoved = REMOVE_GUESTS_PATTERN.exec(text);
  if (guestsRemoved) {
    const count = Number(guestsRemoved[1]);
    return count > 0 ? { type: "removeGuests", count } : null;
  }

  if (JOIN_PATTERN.test(text)) return { type: "join" };
  if (LEAVE_PATTERN.test(text)) return { type: "leave" };

  const slash = SLASH_PATTERN.exec(text.trim());
  if (!slash) return null;

  const name = slash[1].toLowerCase();
  const rest = (slash[2] ?? "").trim();
  const args = rest === "" ? [] : rest.split(/\s+/);

  switch (name) {
    case "start":
    case "help":
      return { type: "help" };
    case "list":
      return { type: "list" };
    case "open":
      return {
        type: "open",
        ...(args[0] !== undefined && { date: args[0] }),
        ...(args[1] !== undefined && { time: args[1] }),
      };
    case "close":
      return { type: "close" };
    case "reset":
      return { type: "reset" };
    case "setdate":
      return args[0] !== undefined
        ? { type: "setDate", value: args[0] }
        : usage(name, "/setdate DD/MM/YY");
    case "settime":
      return args[0] !== undefined
        ? { type: "setTime", value: args[0] }
        : usage(name, "/settime HH:MM-HH:MM");
    case "setfield":
    case "setvenue":
      return rest !== ""
        ? { type: "setVenue", value: rest }
        : usage(name, `/${name} Horizon Arena`);
    case "setlimit":
      return args[0] !== undefined
        ? { type: "setLimit", value: args[0] }
        : usage(name, "/setlimit 28 (0 = no limit)");
    case "remove":
      return rest !== ""
        ? { type: "remove", key: rest }
        : usage(name, "/remove @username or /remove Name");
    default:
      return null;
  }
}

function usage(command: string, hint: string): UsageCommand {
  return { type: "usage", command, hint };
}
