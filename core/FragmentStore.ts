/**
 * Fragment Store
 *
 * One file per module under the fragments directory
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { glob } from "glob";
import {
  fileExists,
  isErrnoException,
  readIfExists,
  writeFileAtomic,
} from "./fsUtils.js";

export interface WriteFragmentOptions {
  /** Replace an existing fragment (default: false) */
  overwrite?: boolean;
}

export class FragmentStore {
  constructor(
    private fragmentsDir: string,
    private extension = ".js",
  ) {}

  pathFor(name: string): string {
    if (
      name === "" ||
      name.includes("/") ||
      name.includes("\\") ||
      name === "." ||
      name === ".."
    ) {
      throw new Error(`Invalid module name for a fragment: "${name}"`);
    }
    return path.join(this.fragmentsDir, `${name}${this.extension}`);
  }

  async has(name: string): Promise<boolean> {
    return fileExists(this.pathFor(name));
  }

  async read(name: string): Promise<string | null> {
    return readIfExists(this.pathFor(name));
  }

  /**
   * Write a fragment. Returns false when one exists and overwrite is off.
   */
  async write(
    name: string,
    text: string,
    options: WriteFragmentOptions = {},
  ): Promise<boolean> {
    const fragmentPath = this.pathFor(name);
    if (!options.overwrite && (await fileExists(fragmentPath))) {
      return false;
    }
    await writeFileAtomic(fragmentPath, text);
    return true;
  }

  async remove(name: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(name));
      return true;
    } catch (error: unknown) {
      if (isErrnoException(error, "ENOENT")) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Names of all stored fragments, sorted
   */
  async list(): Promise<string[]> {
    const paths = await glob(`*${this.extension}`, {
      cwd: this.fragmentsDir,
      nodir: true,
    });
    return paths
      .map((p) => path.basename(p, this.extension))
      .sort();
  }
}
