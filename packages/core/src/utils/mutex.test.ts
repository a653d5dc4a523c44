import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { Mutex } from "./mutex.js";

describe("Mutex", () => {
  it("runs critical sections one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const log: string[] = [];

    const task = (name: string, delay: number) =>
      mutex.runExclusive(async () => {
        log.push(`${name}:start`);
        await sleep(delay);
        log.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task("a", 20), task("b", 1), task("c", 5)]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(log).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("releases the lock when the section throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(mutex.isLocked).toBe(false);
    await expect(mutex.runExclusive(() => "ok")).resolves.toBe("ok");
  });

  it("ignores a second release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();
    release();
    release();

    const second = await waiting;
    expect(mutex.isLocked).toBe(true);
    second();
    expect(mutex.isLocked).toBe(false);
  });
});
