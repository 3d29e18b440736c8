/**
 * Reply text for roster commands
 */
import { Errors } from "@src/shared/errors.js";
import type { RosterFailure, RosterSuccess } from "./roster.types.js";

export const HELP_TEXT = [
  "Hi! I keep the signup list for the next game.",
  "Players: '+' (sign up), '-' (drop out), '+N' (bring N guests), '-N' (remove N guests)",
  "",
  "Admins:",
  "/open [DD/MM/YY] [HH:MM-HH:MM]",
  "/setdate DD/MM/YY",
  "/settime HH:MM-HH:MM",
  "/setfield NAME",
  "/setlimit N",
  "/remove @username|Name",
  "/list",
  "/reset",
  "/close",
  "/help",
].join("\n");

const FIELD_ERRORS = {
  date: Errors.INVALID_DATE,
  time: Errors.INVALID_TIME,
} as const;

export function describeSuccess(result: RosterSuccess): string {
  switch (result.outcome) {
    case "OPENED": {
      const warnings = (result.rejectedFields ?? []).map(
        (field) => `\n⚠️ ${field} not changed. ${FIELD_ERRORS[field]}`,
      );
      return `Signup is open ✅${warnings.join("")}`;
    }
    case "CLOSED":
      return "Signup is closed ⛔️";
    case "LIMIT_SET":
      return "Limit updated ✅";
    case "DATE_SET":
      return "Date updated ✅";
    case "TIME_SET":
      return "Time updated ✅";
    case "VENUE_SET":
      return "Venue updated ✅";
    case "ENTRIES_REMOVED":
      return `Removed: ${result.removed ?? 0}`;
    case "RESET":
      return "List cleared 🧹";
    case "JOINED":
      return "You're in! ✅";
    case "HOST_RESTORED":
      return "Welcome back, your guests stay 👥✅";
    case "LEFT":
      return "Removed you from the list 👌";
    case "LEFT_GUESTS_KEPT":
      return "Removed you, your guests stay 👤➡️👥";
    case "GUESTS_ADDED":
      return "Added your guests 👥✅";
    case "GUESTS_REMOVED":
    case "GUEST_ONLY_REMOVED":
      return "Removed your guests 👌";
  }
}

export function describeFailure(result: RosterFailure): string {
  if (result.error === "LIMIT_REACHED" && result.limit !== undefined) {
    return `⚠️ ${Errors.LIMIT_REACHED} (limit ${result.limit}).`;
  }
  if (result.category === "capacity") {
    return `⚠️ ${Errors[result.error]}`;
  }
  return Errors[result.error];
}
