import { mkdtemp, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { NamespaceLock } from "../../src/ingestion/namespace-lock.js";

const pause = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("NamespaceLock", () => {
  test("should run operations on one namespace one after another", async () => {
    const lock = new NamespaceLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("default", async () => {
        order.push("first:start");
        await pause(20);
        order.push("first:end");
      }),
      lock.run("default", async () => {
        order.push("second:start");
        order.push("second:end");
      }),
    ]);

    expect(order).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  test("should not block other namespaces", async () => {
    const lock = new NamespaceLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("en", async () => {
        order.push("en:start");
        await pause(20);
        order.push("en:end");
      }),
      lock.run("de", async () => {
        order.push("de:start");
        order.push("de:end");
      }),
    ]);

    expect(order).toEqual(["en:start", "de:start", "de:end", "en:end"]);
  });

  test("should report whether a namespace is held", async () => {
    const lock = new NamespaceLock();
    expect(lock.isLocked("default")).toBe(false);

    const running = lock.run("default", () => pause(10));
    expect(lock.isLocked("default")).toBe(true);

    await running;
    expect(lock.isLocked("default")).toBe(false);
  });

  test("should release the namespace when an operation fails", async () => {
    const lock = new NamespaceLock();

    await expect(
      lock.run("default", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.run("default", async () => "next")).resolves.toBe("next");
  });
});

describe("NamespaceLock with a lock directory", () => {
  let lockDir: string;

  beforeEach(async () => {
    lockDir = await mkdtemp(path.join(tmpdir(), "namespace-lock-"));
  });

  afterEach(async () => {
    await rm(lockDir, { recursive: true, force: true });
  });

  test("should serialize separate instances sharing the directory", async () => {
    const first = new NamespaceLock({ lockDir });
    const second = new NamespaceLock({ lockDir });
    const order: string[] = [];

    await Promise.all([
      first.run("default", async () => {
        order.push("first:start");
        await pause(100);
        order.push("first:end");
      }),
      pause(10).then(() =>
        second.run("default", async () => {
          order.push("second:start");
          order.push("second:end");
        }),
      ),
    ]);

    expect(order).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  test("should keep namespaces independent across instances", async () => {
    const first = new NamespaceLock({ lockDir });
    const second = new NamespaceLock({ lockDir });
    const order: string[] = [];

    await Promise.all([
      first.run("en", async () => {
        order.push("en:start");
        await pause(100);
        order.push("en:end");
      }),
      pause(10).then(() =>
        second.run("de", async () => {
          order.push("de:start");
          order.push("de:end");
        }),
      ),
    ]);

    expect(order).toEqual(["en:start", "de:start", "de:end", "en:end"]);
  });

  test("should remove the lock file once the operation settles", async () => {
    const lock = new NamespaceLock({ lockDir });

    await expect(
      lock.run("en/us", async () => {
        expect(await readdir(lockDir)).toEqual(["namespace-en_us.lock"]);
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await readdir(lockDir)).toEqual([]);
  });
});
