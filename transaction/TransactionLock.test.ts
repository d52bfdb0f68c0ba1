import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TransactionBusyError } from "../core/errors.js";
import { fileExists } from "../core/fsUtils.js";
import { makeTempDir, removeTempDir } from "../test-support/fixtures.js";
import { TransactionLock } from "./TransactionLock.js";

describe("TransactionLock", () => {
  let root: string;
  let lockFile: string;

  beforeEach(async () => {
    root = await makeTempDir();
    lockFile = path.join(root, "ws", ".transaction.lock");
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it("lets only one holder in at a time", async () => {
    const first = new TransactionLock(lockFile);
    const second = new TransactionLock(lockFile);

    await first.acquire();

    await expect(second.acquire()).rejects.toBeInstanceOf(TransactionBusyError);
    await expect(first.acquire()).rejects.toBeInstanceOf(TransactionBusyError);

    await first.release();
    await second.acquire();
    expect(await fileExists(lockFile)).toBe(true);
    await second.release();
    expect(await fileExists(lockFile)).toBe(false);
  });

  it("releases after the callback throws", async () => {
    const lock = new TransactionLock(lockFile);

    await expect(
      lock.withLock(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await lock.inspect()).toBeNull();
    expect(await lock.withLock(async () => 42)).toBe(42);
  });

  it("records the holder's pid", async () => {
    const lock = new TransactionLock(lockFile);
    await lock.acquire();

    const contents = await lock.inspect();

    expect(JSON.parse(contents ?? "{}")).toMatchObject({ pid: process.pid });
    await lock.release();
  });

  it("clears a lock left behind", async () => {
    await new TransactionLock(lockFile).acquire();
    const lock = new TransactionLock(lockFile);

    expect(await lock.clear()).toBe(true);
    expect(await lock.clear()).toBe(false);
    await lock.acquire();
    await lock.release();
  });
});
