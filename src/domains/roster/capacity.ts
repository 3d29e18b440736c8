/**
 * Capacity accounting over a roster's entries
 */
import type { RosterEntry } from "./roster.types.js";

function occupiedSlots(entry: RosterEntry): number {
  return (entry.hostPresent ? 1 : 0) + entry.guestCount;
}

export function totalOccupied(entries: readonly RosterEntry[]): number {
  return entries.reduce((sum, entry) => sum + occupiedSlots(entry), 0);
}

/**
 * One display line per slot. Guests are always listed individually.
 */
export function expandEntries(entries: readonly RosterEntry[]): string[] {
  const lines: string[] = [];
  for (const entry of entries) {
    if (entry.hostPresent) {
      lines.push(entry.hostDisplay);
    }
    for (let i = 0; i < entry.guestCount; i++) {
      lines.push(`${entry.hostDisplay} +1`);
    }
  }
  return lines;
}

export function wouldExceed(
  entries: readonly RosterEntry[],
  limit: number,
  addedSlots: number,
): boolean {
  return limit > 0 && totalOccupied(entries) + addedSlots > limit;
}
