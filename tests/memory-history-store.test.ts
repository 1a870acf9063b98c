import { beforeEach, describe, expect, it } from "vitest";
import { MemoryHistoryStore } from "../src/infrastructure/storage/memory-history-store.js";

describe("MemoryHistoryStore", () => {
  let clock: number;
  let store: MemoryHistoryStore;

  beforeEach(() => {
    clock = Date.UTC(2024, 0, 1);
    store = new MemoryHistoryStore({ maxTurns: 3, ttlSeconds: 60, now: () => clock });
  });

  it("keeps the newest messages when more than maxTurns are appended", async () => {
    const roles = ["user", "assistant", "user", "assistant", "user"];
    for (const [index, role] of roles.entries()) {
      await store.append("s1", role, `m${index}`);
    }

    const messages = await store.read("s1");
    expect(messages.map((message) => message.role)).toEqual(["user", "assistant", "user"]);
    expect(messages.map((message) => message.content)).toEqual(["m2", "m3", "m4"]);
  });

  it("returns the last min(N, maxTurns) messages for any N", async () => {
    for (let n = 0; n <= 6; n++) {
      const session = `n${n}`;
      for (let i = 0; i < n; i++) {
        await store.append(session, "user", `m${i}`);
      }
      const expected = Array.from({ length: n }, (_, i) => `m${i}`).slice(-3);
      const contents = (await store.read(session)).map((message) => message.content);
      expect(contents).toEqual(n === 0 ? [] : expected);
    }
  });

  it("stamps messages with the clock and normalizes unknown roles", async () => {
    await store.append("s1", "robot", "beep");

    expect(await store.read("s1")).toEqual([
      { role: "user", content: "beep", timestamp: "2024-01-01T00:00:00.000Z" },
    ]);
  });

  it("returns an empty list for unknown sessions", async () => {
    expect(await store.read("missing")).toEqual([]);
    expect(await store.count("missing")).toBe(0);
    expect(await store.ttl("missing")).toBeNull();
  });

  it("refreshes the ttl on every append", async () => {
    await store.append("s1", "user", "first");
    expect(await store.ttl("s1")).toBe(60);

    clock += 50_000;
    expect(await store.ttl("s1")).toBe(10);

    await store.append("s1", "assistant", "second");
    expect(await store.ttl("s1")).toBe(60);
    expect(await store.count("s1")).toBe(2);
  });

  it("discards the whole conversation once the ttl elapses", async () => {
    await store.append("s1", "user", "first");
    await store.append("s1", "assistant", "second");

    clock += 60_000;

    expect(await store.read("s1")).toEqual([]);
    expect(await store.ttl("s1")).toBeNull();
    expect(store.size).toBe(0);
  });

  it("frees expired sessions that are never accessed again", async () => {
    for (let i = 0; i < 1000; i++) {
      await store.append(`old${i}`, "user", "hi");
    }
    expect(store.size).toBe(1000);

    clock += 3_600_000;
    for (let i = 0; i < 10; i++) {
      await store.append(`new${i}`, "user", "hi");
    }

    expect(store.size).toBe(10);
  });

  it("keeps live sessions when sweeping", async () => {
    await store.append("old", "user", "hi");
    clock += 30_000;
    await store.append("recent", "user", "hi");
    clock += 40_000;
    await store.append("s1", "user", "hi");

    expect(store.size).toBe(2);
    expect(await store.count("recent")).toBe(1);
  });

  it("clears a session", async () => {
    await store.append("s1", "user", "first");
    await store.clear("s1");

    expect(await store.read("s1")).toEqual([]);
  });

  it("removes the newest message", async () => {
    await store.append("s1", "user", "first");
    await store.append("s1", "user", "second");

    const removed = await store.removeLast("s1");

    expect(removed?.content).toBe("second");
    expect((await store.read("s1")).map((message) => message.content)).toEqual(["first"]);
    expect(await store.removeLast("missing")).toBeNull();
  });

  it("keeps sessions apart", async () => {
    await store.append("a", "user", "for a");
    await store.append("b", "user", "for b");

    expect((await store.read("a")).map((message) => message.content)).toEqual(["for a"]);
    expect((await store.read("b")).map((message) => message.content)).toEqual(["for b"]);
  });

  it("does not expose stored messages to mutation", async () => {
    await store.append("s1", "user", "original");
    const [message] = await store.read("s1");
    message.content = "changed";

    expect((await store.read("s1"))[0].content).toBe("original");
  });
});
