import { describe, it, expect } from "vitest";
import { ChatRoster } from "@src/domains/roster/chat.roster.js";
import { EMPTY_ROSTER_TEXT, renderRoster } from "@src/domains/roster/roster.render.js";
import type { ChatRosterState } from "@src/domains/roster/roster.types.js";

function makeRoster(overrides: Partial<ChatRosterState> = {}): ChatRoster {
  return new ChatRoster({
    open: true,
    date: "24/05/25",
    time: "20:00-22:00",
    venue: "Horizon Arena",
    limit: 0,
    entries: [],
    ...overrides,
  });
}

describe("renderRoster", () => {
  it("renders the header, status, count and numbered lines", () => {
    const roster = makeRoster({
      entries: [
        { hostDisplay: "Alice (@a)", hostPresent: true, guestCount: 0 },
        { hostDisplay: "Bob", hostPresent: true, guestCount: 1 },
      ],
    });

    expect(renderRoster(roster)).toBe(
      [
        "📅 24/05/25 (Saturday)",
        "🏟️ Venue: Horizon Arena",
        "⏰ Time: 20:00-22:00",
        "",
        "Status: Open ✅",
        "Participants: 3",
        "",
        "1. Alice (@a)",
        "2. Bob",
        "3. Bob +1",
      ].join("\n"),
    );
  });

  it("shows the placeholder for an empty closed roster", () => {
    const text = renderRoster(makeRoster({ open: false }));

    expect(text.endsWith(`Status: Closed ⛔️\nParticipants: 0\n\n${EMPTY_ROSTER_TEXT}`)).toBe(true);
  });

  it("marks a roster that reached its limit", () => {
    const roster = makeRoster({
      limit: 2,
      entries: [{ hostDisplay: "Bob", hostPresent: false, guestCount: 2 }],
    });

    expect(renderRoster(roster)).toContain(
      "Participants: 2\n\n⚠️ Limit reached (2).\n\n1. Bob +1\n2. Bob +1",
    );
  });

  it("renders an unknown weekday for a malformed date", () => {
    const roster = makeRoster({ date: "someday" });

    expect(renderRoster(roster).split("\n")[0]).toBe("📅 someday (?)");
  });
});
