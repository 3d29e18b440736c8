import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock logger
vi.mock("@src/infrastructure/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import {
  RosterStore,
  type RosterStateBackend,
} from "@src/domains/roster/roster.store.js";
import { identityOf } from "@src/domains/roster/identity.matcher.js";
import type { RosterIdentity } from "@src/domains/roster/roster.types.js";

// ─── In-memory Redis stand-in ───────────────────────────────────────

function createBackend(initial: Record<string, string> = {}) {
  const data = new Map(Object.entries(initial));
  const backend = {
    data,
    get: vi.fn(async (key: string) => data.get(key) ?? null),
    set: vi.fn(async (key: string, value: string) => {
      data.set(key, value);
      return "OK";
    }),
  };
  return backend satisfies RosterStateBackend;
}

const STATE_KEY = "roster:state";
const alice: RosterIdentity = { displayName: "Alice (@alice)", handle: "alice" };

function createStore(backend: RosterStateBackend) {
  return new RosterStore(backend, {
    stateKey: STATE_KEY,
    defaultTime: "20:00-22:00",
    defaultVenue: "Horizon Arena",
    now: () => new Date(2025, 4, 24, 12, 0),
  });
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("RosterStore", () => {
  let backend: ReturnType<typeof createBackend>;
  let store: RosterStore;

  beforeEach(() => {
    backend = createBackend();
    store = createStore(backend);
  });

  describe("get", () => {
    it("creates a closed roster with defaults on first touch", () => {
      const roster = store.get("-100");

      expect(roster.snapshot()).toEqual({
        open: false,
        date: "24/05/25",
        time: "20:00-22:00",
        venue: "Horizon Arena",
        limit: 0,
        entries: [],
      });
      expect(store.size).toBe(1);
    });

    it("returns the same roster on later calls", () => {
      expect(store.get("-100")).toBe(store.get("-100"));
    });
  });

  describe("loadOrEmpty", () => {
    it("starts empty when nothing is stored", async () => {
      await expect(store.loadOrEmpty()).resolves.toBe(0);
      expect(store.size).toBe(0);
    });

    it("decodes stored entries", async () => {
      backend.data.set(
        STATE_KEY,
        JSON.stringify({
          "-100": {
            open: true,
            date: "24/05/25",
            time: "19:00-21:00",
            field: "North Pitch",
            limit: 12,
            users: ["Alice (@alice)", "Bob +2", "Cleo +1\u200b"],
          },
        }),
      );

      await expect(store.loadOrEmpty()).resolves.toBe(1);

      const roster = store.get("-100");
      expect(roster.venue).toBe("North Pitch");
      expect(roster.limit).toBe(12);
      expect(roster.entries).toEqual([
        { hostDisplay: "Alice (@alice)", hostPresent: true, guestCount: 0 },
        { hostDisplay: "Bob", hostPresent: true, guestCount: 2 },
        { hostDisplay: "Cleo", hostPresent: false, guestCount: 1 },
      ]);
    });

    it("throws on a document that is not JSON", async () => {
      backend.data.set(STATE_KEY, "{not json");

      await expect(store.loadOrEmpty()).rejects.toThrow("not valid JSON");
    });

    it("throws on a document with the wrong shape", async () => {
      backend.data.set(STATE_KEY, JSON.stringify({ "-100": { open: "yes" } }));

      await expect(store.loadOrEmpty()).rejects.toThrow("invalid shape");
    });
  });

  describe("persist", () => {
    it("writes the whole collection under one key", async () => {
      await store.mutate("-100", (live) => live.openSignup());
      await store.mutate("-100", (live) => live.join(alice));
      await store.mutate("-100", (live) => live.addGuests(alice, 2));
      await store.mutate("-100", (live) => live.leave(alice));
      await store.mutate("-200", (live) => live.closeSignup());

      await store.persist();

      expect(backend.set).toHaveBeenCalledTimes(6);
      expect(JSON.parse(backend.data.get(STATE_KEY) ?? "null")).toEqual({
        "-100": {
          open: true,
          date: "24/05/25",
          time: "20:00-22:00",
          field: "Horizon Arena",
          limit: 0,
          users: ["Alice (@alice) +2\u200b"],
        },
        "-200": {
          open: false,
          date: "24/05/25",
          time: "20:00-22:00",
          field: "Horizon Arena",
          limit: 0,
          users: [],
        },
      });
    });

    it("writes only what has been committed", async () => {
      await store.mutate("-100", (live) => live.openSignup());
      store.get("-300").openSignup();

      await store.persist();

      expect(Object.keys(JSON.parse(backend.data.get(STATE_KEY) ?? "{}"))).toEqual(["-100"]);
    });

    it("round-trips through a fresh store", async () => {
      await store.mutate("-100", (live) => live.openSignup("01/06/25"));
      await store.mutate("-100", (live) => live.addGuests(alice, 3));

      const reloaded = createStore(backend);
      await reloaded.loadOrEmpty();

      expect(reloaded.get("-100").snapshot()).toEqual(store.get("-100").snapshot());
    });

    it("keeps a trailing +N in a member's name as part of the name", async () => {
      const max = identityOf({ id: "7", firstName: "Max +3" });
      await store.mutate("-100", (live) => live.openSignup());
      await store.mutate("-100", (live) => live.join(max));

      const reloaded = createStore(backend);
      await reloaded.loadOrEmpty();

      expect(reloaded.get("-100").occupied).toBe(1);
      expect(reloaded.get("-100").entries).toEqual([
        { hostDisplay: "Max+3", hostPresent: true, guestCount: 0 },
      ]);
    });
  });

  describe("mutate", () => {
    it("persists successful operations", async () => {
      store.get("-100").openSignup();

      const { result, roster } = await store.mutate("-100", (live) => live.join(alice));

      expect(result.success).toBe(true);
      expect(roster.occupied).toBe(1);
      expect(backend.set).toHaveBeenCalledTimes(1);
    });

    it("does not write after a rejected operation", async () => {
      const { result } = await store.mutate("-100", (live) => live.join(alice));

      expect(result).toMatchObject({ success: false, error: "ROSTER_CLOSED" });
      expect(backend.set).not.toHaveBeenCalled();
    });

    it("hands back a copy, not the live roster", async () => {
      store.get("-100").openSignup();

      const { roster } = await store.mutate("-100", (live) => live.join(alice));

      expect(roster).not.toBe(store.get("-100"));
    });

    it("rolls the roster back when the write fails", async () => {
      store.get("-100").openSignup();
      backend.set.mockRejectedValueOnce(new Error("Connection refused"));

      await expect(
        store.mutate("-100", (live) => live.join(alice)),
      ).rejects.toThrow("Connection refused");

      expect(store.get("-100").entries).toEqual([]);
    });

    it("never writes a rolled-back change through another chat's save", async () => {
      let failFirstWrite: (err: Error) => void = () => {};
      const firstWrite = new Promise<void>((_resolve, reject) => {
        failFirstWrite = reject;
      });
      backend.set.mockImplementationOnce(async () => {
        await firstWrite;
        return "OK";
      });
      store.get("-100").openSignup();
      store.get("-200").openSignup();

      const first = store.mutate("-100", (live) => live.join(alice));
      await vi.waitFor(() => expect(backend.set).toHaveBeenCalledTimes(1));
      const second = store.mutate("-200", (live) => live.join({ displayName: "Bob" }));
      // Let the second save queue up behind the first
      await new Promise((r) => setTimeout(r, 0));

      failFirstWrite(new Error("Connection refused"));

      await expect(first).rejects.toThrow("Connection refused");
      await second;

      expect(store.get("-100").entries).toEqual([]);
      expect(JSON.parse(backend.data.get(STATE_KEY) ?? "null")).toEqual({
        "-200": {
          open: true,
          date: "24/05/25",
          time: "20:00-22:00",
          field: "Horizon Arena",
          limit: 0,
          users: ["Bob"],
        },
      });
    });

    it("serializes concurrent commands so the limit holds", async () => {
      const roster = store.get("-100");
      roster.openSignup();
      roster.setLimit(1);

      const results = await Promise.all([
        store.mutate("-100", (live) => live.join(alice)),
        store.mutate("-100", (live) => live.join({ displayName: "Bob" })),
      ]);

      expect(results.map(({ result }) => result.success)).toEqual([true, false]);
      expect(store.get("-100").occupied).toBe(1);
    });
  });

  describe("view", () => {
    it("returns a detached copy", async () => {
      const copy = await store.view("-100");
      copy.openSignup();

      expect(store.get("-100").open).toBe(false);
    });
  });
});
