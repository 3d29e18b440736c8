/**
 * Entry codec - flat string form of a roster entry
 *
 *   "Alice"        host, no guests
 *   "Alice +2"     host with two guests
 *   "Alice +2\u200b"  guests only, host has left
 *
 * The zero-width marker is invisible when the list is shown to users and
 * never leaves this module.
 */
import { MAX_GUESTS_PER_HOST, type RosterEntry } from "./roster.types.js";

export const GUEST_ONLY_MARKER = "\u200b";

const GUEST_SUFFIX = /^(.*\S)\s+\+(\d+)(\u200b?)$/s;
const TRAILING_COUNT = /\s+\+(\d+)$/;

/**
 * Make a member's label safe to store: drops the guest-only marker and glues
 * a trailing "+N" to the name so it cannot be read back as a guest count.
 */
export function sanitizeDisplayName(name: string): string {
  return name.replaceAll(GUEST_ONLY_MARKER, "").trim().replace(TRAILING_COUNT, "+$1");
}

export function encodeEntry(entry: RosterEntry): string {
  if (entry.guestCount === 0) {
    return entry.hostDisplay;
  }
  const marker = entry.hostPresent ? "" : GUEST_ONLY_MARKER;
  return `${entry.hostDisplay} +${entry.guestCount}${marker}`;
}

export function decodeEntry(raw: string): RosterEntry {
  const match = GUEST_SUFFIX.exec(raw);
  if (match) {
    const [, hostDisplay, count, marker] = match;
    const guestCount = Number(count);
    if (guestCount >= 1 && guestCount <= MAX_GUESTS_PER_HOST) {
      return {
        hostDisplay: hostDisplay.trim(),
        hostPresent: marker === "",
        guestCount,
      };
    }
  }
  return { hostDisplay: raw.trim(), hostPresent: true, guestCount: 0 };
}
