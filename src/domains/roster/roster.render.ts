/**
 * Human-facing roster listing
 */
import { expandEntries } from "./capacity.js";
import type { ChatRoster } from "./chat.roster.js";
import { weekdayName } from "./roster.format.js";

export const EMPTY_ROSTER_TEXT = "Empty so far. Send '+' to sign up.";

function renderHeader(roster: ChatRoster): string {
  return [
    `📅 ${roster.date} (${weekdayName(roster.date)})`,
    `🏟️ Venue: ${roster.venue}`,
    `⏰ Time: ${roster.time}`,
  ].join("\n");
}

export function renderRoster(roster: ChatRoster): string {
  const lines = expandEntries(roster.entries);
  const count = lines.length;

  const body =
    count > 0
      ? lines.map((line, i) => `${i + 1}. ${line}`).join("\n")
      : EMPTY_ROSTER_TEXT;

  const cap =
    roster.limit > 0 && count >= roster.limit
      ? `\n\n⚠️ Limit reached (${roster.limit}).`
      : "";
  const status = roster.open ? "Open ✅" : "Closed ⛔️";

  return `${renderHeader(roster)}\n\nStatus: ${status}\nParticipants: ${count}${cap}\n\n${body}`;
}
