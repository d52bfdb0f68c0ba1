/**
 * Module Discovery
 *
 * Lists installed modules and exposes the documentation and sample text
 * each one ships, for template population
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isErrnoException, readIfExists } from "./fsUtils.js";

export interface ModuleSource {
  listInstalled(): Promise<string[]>;
  readDocumentation(name: string): Promise<string | null>;
  readSample(name: string): Promise<string | null>;
}

export const RESERVED_MODULE_DIR = "default";

export class ModuleDiscovery implements ModuleSource {
  constructor(private modulesDir: string) {}

  /**
   * Installed module directories, without the bundled defaults and hidden entries
   */
  async listInstalled(): Promise<string[]> {
    let entries;
    try {
      entries = await fs.readdir(this.modulesDir, { withFileTypes: true });
    } catch (error: unknown) {
      if (isErrnoException(error, "ENOENT")) {
        console.warn(`⚠️  Modules directory not found: ${this.modulesDir}`);
        return [];
      }
      throw error;
    }

    const names: string[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith(".") || entry.name === RESERVED_MODULE_DIR) {
        continue;
      }
      if (
        entry.isDirectory() ||
        (entry.isSymbolicLink() && (await this.linksToDirectory(entry.name)))
      ) {
        names.push(entry.name);
      }
    }
    return names.sort();
  }

  private async linksToDirectory(name: string): Promise<boolean> {
    try {
      return (await fs.stat(path.join(this.modulesDir, name))).isDirectory();
    } catch (error: unknown) {
      // Dangling link
      if (isErrnoException(error, "ENOENT")) {
        return false;
      }
      throw error;
    }
  }

  async readDocumentation(name: string): Promise<string | null> {
    return readIfExists(path.join(this.modulesDir, name, "README.md"));
  }

  async readSample(name: string): Promise<string | null> {
    return readIfExists(path.join(this.modulesDir, name, "sample", `${name}.js`));
  }
}
