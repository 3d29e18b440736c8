/**
 * ChatRoster - per-chat signup state machine
 *
 * Every operation either applies completely or leaves the state untouched and
 * returns a failure naming the reason. Capacity is checked against the exact
 * slot delta of each transition before anything is written.
 */
import type { ErrorCode } from "@src/shared/errors.js";
import { totalOccupied, wouldExceed } from "./capacity.js";
import { encodeEntry } from "./entry.codec.js";
import { findIdentity } from "./identity.matcher.js";
import {
  MAX_GUESTS_PER_HOST,
  type ChatRosterState,
  type RosterActionResult,
  type RosterEntry,
  type RosterErrorCategory,
  type RosterFailure,
  type RosterIdentity,
  type RosterOutcome,
  type RosterSuccess,
} from "./roster.types.js";
import { isValidDate, isValidTime } from "./roster.format.js";

const INTEGER = /^[+-]?\d+$/;

export class ChatRoster {
  constructor(private readonly state: ChatRosterState) {}

  get open(): boolean {
    return this.state.open;
  }

  get date(): string {
    return this.state.date;
  }

  get time(): string {
    return this.state.time;
  }

  get venue(): string {
    return this.state.venue;
  }

  get limit(): number {
    return this.state.limit;
  }

  get entries(): readonly RosterEntry[] {
    return this.state.entries;
  }

  get occupied(): number {
    return totalOccupied(this.state.entries);
  }

  /** Deep copy of the current state */
  snapshot(): ChatRosterState {
    return {
      ...this.state,
      entries: this.state.entries.map((entry) => ({ ...entry })),
    };
  }

  // ─────────────────────────────────────────────────────────────────
  // Administrative operations
  // ─────────────────────────────────────────────────────────────────

  /**
   * Open signup. A malformed date or time is skipped and reported, the
   * roster opens regardless.
   */
  openSignup(date?: string, time?: string): RosterActionResult {
    const rejectedFields: Array<"date" | "time"> = [];

    if (date !== undefined) {
      if (isValidDate(date)) this.state.date = date;
      else rejectedFields.push("date");
    }
    if (time !== undefined) {
      if (isValidTime(time)) this.state.time = time;
      else rejectedFields.push("time");
    }

    this.state.open = true;
    return {
      ...succeed("OPENED"),
      ...(rejectedFields.length > 0 && { rejectedFields }),
    };
  }

  closeSignup(): RosterActionResult {
    this.state.open = false;
    return succeed("CLOSED");
  }

  setLimit(value: number | string): RosterActionResult {
    let parsed: number;
    if (typeof value === "number") {
      parsed = value;
    } else {
      const trimmed = value.trim();
      if (!INTEGER.test(trimmed)) return fail("INVALID_LIMIT", "validation");
      parsed = Number(trimmed);
    }
    if (!Number.isSafeInteger(parsed)) return fail("INVALID_LIMIT", "validation");

    this.state.limit = Math.max(0, parsed);
    return succeed("LIMIT_SET");
  }

  setDate(value: string): RosterActionResult {
    if (!isValidDate(value)) return fail("INVALID_DATE", "validation");
    this.state.date = value;
    return succeed("DATE_SET");
  }

  setTime(value: string): RosterActionResult {
    if (!isValidTime(value)) return fail("INVALID_TIME", "validation");
    this.state.time = value;
    return succeed("TIME_SET");
  }

  setVenue(value: string): RosterActionResult {
    const venue = value.trim();
    if (venue === "") return fail("EMPTY_VENUE", "validation");
    this.state.venue = venue;
    return succeed("VENUE_SET");
  }

  /** Drop every entry whose stored form contains `key`, ignoring case */
  removeByKey(key: string): RosterActionResult {
    const needle = key.toLowerCase();
    const before = this.occupied;
    const kept = this.state.entries.filter(
      (entry) => !encodeEntry(entry).toLowerCase().includes(needle),
    );
    const removed = this.state.entries.length - kept.length;
    this.state.entries = kept;
    return { ...succeed("ENTRIES_REMOVED", this.occupied - before), removed };
  }

  reset(): RosterActionResult {
    const before = this.occupied;
    this.state.entries = [];
    return succeed("RESET", -before);
  }

  // ─────────────────────────────────────────────────────────────────
  // Participant operations
  // ─────────────────────────────────────────────────────────────────

  join(identity: RosterIdentity): RosterActionResult {
    if (!this.state.open) return fail("ROSTER_CLOSED", "conflict");

    const index = findIdentity(this.state.entries, identity);
    if (index !== -1) {
      const entry = this.state.entries[index];
      if (entry.hostPresent) return fail("ALREADY_JOINED", "conflict");
      if (this.exceeds(1)) return this.limitReached();

      this.state.entries[index] = { ...entry, hostPresent: true };
      return succeed("HOST_RESTORED", 1);
    }

    if (this.exceeds(1)) return this.limitReached();
    this.state.entries.push({
      hostDisplay: identity.displayName.trim(),
      hostPresent: true,
      guestCount: 0,
    });
    return succeed("JOINED", 1);
  }

  leave(identity: RosterIdentity): RosterActionResult {
    const index = findIdentity(this.state.entries, identity);
    if (index === -1) return fail("NOT_IN_ROSTER", "not_found");

    const entry = this.state.entries[index];
    if (!entry.hostPresent) return fail("ONLY_GUESTS_REMAIN", "conflict");

    if (entry.guestCount > 0) {
      this.state.entries[index] = { ...entry, hostPresent: false };
      return succeed("LEFT_GUESTS_KEPT", -1);
    }

    this.state.entries.splice(index, 1);
    return succeed("LEFT", -1);
  }

  /**
   * Add guests under the caller's entry. Never brings the host back: a
   * guest-only entry stays guest-only.
   */
  addGuests(identity: RosterIdentity, count: number): RosterActionResult {
    if (!this.state.open) return fail("ROSTER_CLOSED", "conflict");
    if (!Number.isInteger(count) || count < 1) {
      return fail("INVALID_GUEST_COUNT", "validation");
    }

    const index = findIdentity(this.state.entries, identity);
    if (index === -1) {
      if (count > MAX_GUESTS_PER_HOST) return fail("GUEST_CAP_EXCEEDED", "capacity");
      if (this.exceeds(1 + count)) return this.limitReached();

      this.state.entries.push({
        hostDisplay: identity.displayName.trim(),
        hostPresent: true,
        guestCount: count,
      });
      return succeed("GUESTS_ADDED", 1 + count);
    }

    const entry = this.state.entries[index];
    if (entry.guestCount + count > MAX_GUESTS_PER_HOST) {
      return fail("GUEST_CAP_EXCEEDED", "capacity");
    }
    if (this.exceeds(count)) return this.limitReached();

    this.state.entries[index] = { ...entry, guestCount: entry.guestCount + count };
    return succeed("GUESTS_ADDED", count);
  }

  removeGuests(identity: RosterIdentity, count: number): RosterActionResult {
    if (!Number.isInteger(count) || count < 1) {
      return fail("INVALID_GUEST_COUNT", "validation");
    }

    const index = findIdentity(this.state.entries, identity);
    if (index === -1) return fail("NOT_IN_ROSTER", "not_found");

    const entry = this.state.entries[index];
    if (entry.guestCount === 0) return fail("NO_GUESTS", "conflict");

    if (count >= entry.guestCount) {
      if (!entry.hostPresent) {
        this.state.entries.splice(index, 1);
        return succeed("GUEST_ONLY_REMOVED", -entry.guestCount);
      }
      this.state.entries[index] = { ...entry, guestCount: 0 };
      return succeed("GUESTS_REMOVED", -entry.guestCount);
    }

    this.state.entries[index] = { ...entry, guestCount: entry.guestCount - count };
    return succeed("GUESTS_REMOVED", -count);
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private exceeds(addedSlots: number): boolean {
    return wouldExceed(this.state.entries, this.state.limit, addedSlots);
  }

  private limitReached(): RosterFailure {
    return { ...fail("LIMIT_REACHED", "capacity"), limit: this.state.limit };
  }
}

function succeed(outcome: RosterOutcome, slotDelta = 0): RosterSuccess {
  return { success: true, outcome, slotDelta };
}

function fail(error: ErrorCode, category: RosterErrorCategory): RosterFailure {
  return { success: false, error, category };
}
