/**
 * Snapshot Store
 *
 * Single-slot backup of the master record and the active config. Each
 * capture replaces the previous one; only one level of undo exists.
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isErrnoException, readIfExists, writeFileAtomic } from "../core/fsUtils.js";
import type { SnapshotManifest } from "../core/types.js";

export interface SnapshotEntry {
  original: string;
  backup: string;
}

export class SnapshotStore {
  constructor(
    private entries: SnapshotEntry[],
    private manifestPath: string,
  ) {}

  /**
   * Copy every original to its backup slot and record hashes
   */
  async capture(): Promise<SnapshotManifest> {
    const manifest: SnapshotManifest = {
      timestamp: new Date().toISOString(),
      files: [],
    };

    for (const { original, backup } of this.entries) {
      let content: Buffer;
      try {
        content = await fs.readFile(original);
      } catch (error: unknown) {
        if (!isErrnoException(error, "ENOENT")) {
          throw error;
        }
        // Recorded as absent; restore removes whatever appears later
        await fs.rm(backup, { force: true });
        manifest.files.push({ original, backup, hash: null });
        console.log(`  ⏭️  ${path.basename(original)} does not exist yet`);
        continue;
      }

      await writeFileAtomic(backup, content);
      manifest.files.push({ original, backup, hash: hash(content) });
      console.log(`  💾 Backed up ${path.basename(original)}`);
    }

    await writeFileAtomic(this.manifestPath, JSON.stringify(manifest, null, 2));
    return manifest;
  }

  /**
   * Put every original back to its captured state
   */
  async restore(): Promise<void> {
    const manifest = await this.read();
    if (!manifest) {
      throw new Error(`No snapshot to restore (${this.manifestPath} missing)`);
    }

    for (const entry of manifest.files) {
      if (entry.hash === null) {
        await fs.rm(entry.original, { force: true });
        console.log(`  🗑️  Removed ${path.basename(entry.original)}`);
        continue;
      }

      const content = await fs.readFile(entry.backup);
      if (hash(content) !== entry.hash) {
        console.warn(
          `  ⚠️  Hash mismatch for ${entry.backup}, continuing anyway`,
        );
      }

      await writeFileAtomic(entry.original, content);
      console.log(`  ✅ Restored ${path.basename(entry.original)}`);
    }
  }

  async read(): Promise<SnapshotManifest | null> {
    const text = await readIfExists(this.manifestPath);
    if (text === null) {
      return null;
    }
    const parsed: SnapshotManifest = JSON.parse(text);
    return parsed;
  }
}

function hash(content: Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}
