import { describe, it, expect } from "vitest";
import {
  isAdminCommand,
  isParticipantCommand,
  parseRosterCommand,
  requiresAdmin,
} from "@src/domains/roster/roster.commands.js";

describe("parseRosterCommand", () => {
  describe("participant commands", () => {
    it.each(["+", " + ", "➕"])("parses %j as join", (text) => {
      expect(parseRosterCommand(text)).toEqual({ type: "join" });
    });

    it.each(["-", "—", "–", "➖"])("parses %j as leave", (text) => {
      expect(parseRosterCommand(text)).toEqual({ type: "leave" });
    });

    it("parses guest additions", () => {
      expect(parseRosterCommand("+2")).toEqual({ type: "addGuests", count: 2 });
      expect(parseRosterCommand("+ 3")).toEqual({ type: "addGuests", count: 3 });
      expect(parseRosterCommand("➕1")).toEqual({ type: "addGuests", count: 1 });
    });

    it("parses guest removals", () => {
      expect(parseRosterCommand("-1")).toEqual({ type: "removeGuests", count: 1 });
      expect(parseRosterCommand("— 2")).toEqual({ type: "removeGuests", count: 2 });
    });

    it("passes over-cap counts through to the roster", () => {
      expect(parseRosterCommand("+12")).toEqual({ type: "addGuests", count: 12 });
    });

    it("ignores zero and three-digit counts", () => {
      expect(parseRosterCommand("+0")).toBeNull();
      expect(parseRosterCommand("-0")).toBeNull();
      expect(parseRosterCommand("+100")).toBeNull();
    });

    it("ignores ordinary chat", () => {
      expect(parseRosterCommand("see you there +")).toBeNull();
      expect(parseRosterCommand("++")).toBeNull();
      expect(parseRosterCommand("")).toBeNull();
    });
  });

  describe("slash commands", () => {
    it("parses /start and /help as help", () => {
      expect(parseRosterCommand("/start")).toEqual({ type: "help" });
      expect(parseRosterCommand("/help")).toEqual({ type: "help" });
    });

    it("strips a bot mention", () => {
      expect(parseRosterCommand("/list@roster_bot")).toEqual({ type: "list" });
    });

    it("is case-insensitive on the command name", () => {
      expect(parseRosterCommand("/CLOSE")).toEqual({ type: "close" });
    });

    it("parses /open with optional date and time", () => {
      expect(parseRosterCommand("/open")).toEqual({ type: "open" });
      expect(parseRosterCommand("/open 24/05/25")).toEqual({
        type: "open",
        date: "24/05/25",
      });
      expect(parseRosterCommand("/open 24/05/25 19:00-21:00")).toEqual({
        type: "open",
        date: "24/05/25",
        time: "19:00-21:00",
      });
    });

    it("keeps the whole venue text", () => {
      expect(parseRosterCommand("/setfield  North  Pitch ")).toEqual({
        type: "setVenue",
        value: "North  Pitch",
      });
      expect(parseRosterCommand("/setvenue Hall B")).toEqual({
        type: "setVenue",
        value: "Hall B",
      });
    });

    it("parses /remove with a name or handle", () => {
      expect(parseRosterCommand("/remove @alice")).toEqual({
        type: "remove",
        key: "@alice",
      });
      expect(parseRosterCommand("/remove Bob Stone")).toEqual({
        type: "remove",
        key: "Bob Stone",
      });
    });

    it("leaves the limit value for the roster to validate", () => {
      expect(parseRosterCommand("/setlimit abc")).toEqual({
        type: "setLimit",
        value: "abc",
      });
    });

    it("returns a usage hint when an argument is missing", () => {
      expect(parseRosterCommand("/setdate")).toEqual({
        type: "usage",
        command: "setdate",
        hint: "/setdate DD/MM/YY",
      });
      expect(parseRosterCommand("/setfield")).toEqual({
        type: "usage",
        command: "setfield",
        hint: "/setfield Horizon Arena",
      });
      expect(parseRosterCommand("/remove")).toEqual({
        type: "usage",
        command: "remove",
        hint: "/remove @username or /remove Name",
      });
    });

    it("ignores unknown commands", () => {
      expect(parseRosterCommand("/weather")).toBeNull();
    });
  });
});

describe("command classification", () => {
  it("marks admin commands and their usage hints", () => {
    expect(isAdminCommand({ type: "reset" })).toBe(true);
    expect(isAdminCommand({ type: "list" })).toBe(false);
    expect(requiresAdmin({ type: "usage", command: "setdate", hint: "" })).toBe(true);
    expect(requiresAdmin({ type: "help" })).toBe(false);
  });

  it("marks participant commands", () => {
    expect(isParticipantCommand({ type: "addGuests", count: 1 })).toBe(true);
    expect(isParticipantCommand({ type: "open" })).toBe(false);
  });
});
