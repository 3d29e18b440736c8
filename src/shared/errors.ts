/**
 * Shared error message constants for consistent error responses
 */
export const Errors = {
  // General
  INVALID_PAYLOAD: "Invalid payload",
  INTERNAL_ERROR: "Internal server error",
  NOT_AUTHORIZED: "Only chat admins can do that",
  RATE_LIMITED: "Too many messages",

  // Roster state
  ROSTER_CLOSED: "Signup is closed ⛔️. Admins: /open",
  ALREADY_JOINED: "You are already on the list ✅",
  ONLY_GUESTS_REMAIN: "Only your guests remain on the list. To remove them, send -1.",
  NOT_IN_ROSTER: "You are not on the list, nothing changed.",
  NO_GUESTS: "You have no guests on the list.",

  // Capacity
  LIMIT_REACHED: "No free slots left",
  GUEST_CAP_EXCEEDED: "Too many guests: at most 5 per person",

  // Validation
  INVALID_GUEST_COUNT: "Guest count must be at least 1",
  INVALID_DATE: "Invalid date. Example: 24/05/25",
  INVALID_TIME: "Invalid time. Example: 20:00-22:00",
  INVALID_LIMIT: "Invalid value. Example: /setlimit 28",
  EMPTY_VENUE: "Venue name must not be empty",
} as const;

export type ErrorCode = keyof typeof Errors;
