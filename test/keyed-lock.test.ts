import { describe, expect, it } from "vitest";
import { KeyedLock } from "../src/utils/keyed-lock.js";

function delay(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("KeyedLock", () => {
  it("runs sections with the same key one at a time", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const section = (name: string, ms: number) =>
      lock.run("key", async () => {
        events.push(`${name}:start`);
        await delay(ms);
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section("first", 20), section("second", 0)]);

    expect(results).toEqual(["first", "second"]);
    expect(events).toEqual(["first:start", "first:end", "second:start", "second:end"]);
    expect(lock.size).toBe(0);
  });

  it("lets different keys overlap", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("a", async () => {
        events.push("a:start");
        await delay(20);
        events.push("a:end");
      }),
      lock.run("b", async () => {
        events.push("b:start");
        events.push("b:end");
      }),
    ]);

    expect(events).toEqual(["a:start", "b:start", "b:end", "a:end"]);
  });

  it("releases the key when a section throws", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("key", () => Promise.reject(new Error("boom")))
    ).rejects.toThrow("boom");
    await expect(lock.run("key", () => Promise.resolve(1))).resolves.toBe(1);
    expect(lock.size).toBe(0);
  });
});
