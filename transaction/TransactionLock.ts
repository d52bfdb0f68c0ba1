/**
 * Transaction Lock
 *
 * Exclusive lock file guarding the snapshot slot. Creation with the `wx`
 * flag fails when another run already holds it.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { TransactionBusyError } from "../core/errors.js";
import { isErrnoException, readIfExists } from "../core/fsUtils.js";

export class TransactionLock {
  private held = false;

  constructor(private lockFile: string) {}

  async acquire(): Promise<void> {
    if (this.held) {
      throw new TransactionBusyError(this.lockFile);
    }

    await fs.mkdir(path.dirname(this.lockFile), { recursive: true });

    let handle: fs.FileHandle;
    try {
      handle = await fs.open(this.lockFile, "wx");
    } catch (error: unknown) {
      if (isErrnoException(error, "EEXIST")) {
        throw new TransactionBusyError(this.lockFile);
      }
      throw error;
    }

    try {
      await handle.writeFile(
        JSON.stringify({ pid: process.pid, since: new Date().toISOString() }),
      );
    } finally {
      await handle.close();
    }
    this.held = true;
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    await fs.rm(this.lockFile, { force: true });
    this.held = false;
  }

  /**
   * Run `fn` while holding the lock
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Lock file contents if some run holds it, otherwise null
   */
  async inspect(): Promise<string | null> {
    return readIfExists(this.lockFile);
  }

  /**
   * Remove a lock left behind by an interrupted run
   */
  async clear(): Promise<boolean> {
    const existing = await this.inspect();
    if (existing === null) {
      return false;
    }
    await fs.rm(this.lockFile, { force: true });
    this.held = false;
    return true;
  }
}
