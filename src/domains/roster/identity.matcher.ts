/**
 * Identity matcher - decides which roster entry belongs to a caller
 */
import { encodeEntry, sanitizeDisplayName } from "./entry.codec.js";
import type { RosterEntry, RosterIdentity } from "./roster.types.js";

export interface ChatUserProfile {
  id: string;
  firstName?: string;
  lastName?: string;
  username?: string;
}

/**
 * Scan entries in order. For each entry the handle is tried first, then the
 * name, so an earlier name match still wins over a later handle match.
 *
 * @returns index of the matching entry, or -1
 */
export function findEntryIndex(
  entries: readonly RosterEntry[],
  displayName: string,
  handle?: string,
): number {
  const name = displayName.trim().toLowerCase();
  const handleToken = handle ? `@${handle.toLowerCase()}` : null;

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (handleToken && encodeEntry(entry).toLowerCase().includes(handleToken)) {
      return i;
    }
    if (entry.hostDisplay.trim().toLowerCase() === name) {
      return i;
    }
  }
  return -1;
}

export function findIdentity(
  entries: readonly RosterEntry[],
  identity: RosterIdentity,
): number {
  return findEntryIndex(entries, identity.displayName, identity.handle);
}

/**
 * Label a chat member the way they appear on the roster:
 * "First Last (@username)", falling back to the username, then the id.
 * Names are sanitized so the label survives the stored entry format.
 */
export function buildDisplayName(user: ChatUserProfile): string {
  const parts = [user.firstName, user.lastName]
    .map((part) => sanitizeDisplayName(part ?? ""))
    .filter((part) => part !== "");
  const name =
    parts.length > 0 ? sanitizeDisplayName(parts.join(" ")) : (user.username ?? user.id);
  return user.username ? `${name} (@${user.username})` : name;
}

export function identityOf(user: ChatUserProfile): RosterIdentity {
  return {
    displayName: buildDisplayName(user),
    ...(user.username ? { handle: user.username } : {}),
  };
}
