/**
 * Roster Domain - Barrel Export
 */

// Handler registration
export { rosterHandler } from "./roster.handler.js";

// State machine and storage
export { ChatRoster } from "./chat.roster.js";
export { RosterStore, toPersisted, fromPersisted } from "./roster.store.js";
export type { RosterStoreOptions, RosterMutation, RosterStateBackend } from "./roster.store.js";
export { RosterService } from "./roster.service.js";
export type { AdminOracle, RosterMessage, RosterReply, ChatType } from "./roster.service.js";

// Pure helpers
export { encodeEntry, decodeEntry, sanitizeDisplayName, GUEST_ONLY_MARKER } from "./entry.codec.js";
export { findEntryIndex, buildDisplayName, identityOf } from "./identity.matcher.js";
export { totalOccupied, expandEntries, wouldExceed } from "./capacity.js";
export { parseRosterCommand } from "./roster.commands.js";
export type { RosterCommand } from "./roster.commands.js";
export { renderRoster } from "./roster.render.js";

// Types
export type {
  RosterEntry,
  RosterIdentity,
  ChatRosterState,
  PersistedChatRoster,
  PersistedRosterCollection,
  RosterActionResult,
  RosterErrorCategory,
  RosterOutcome,
} from "./roster.types.js";
