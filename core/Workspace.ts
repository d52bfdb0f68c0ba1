/**
 * Workspace
 *
 * Owns the persisted file layout and the master record
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { listDeclaredEntities } from "./BlockExtractor.js";
import { EnvironmentFailureError } from "./errors.js";
import { fileExists, readIfExists, writeFileAtomic } from "./fsUtils.js";
import type { Settings, WorkspaceLayout } from "./types.js";

export function resolveLayout(settings: Settings): WorkspaceLayout {
  const { workspace, mirrorHome } = settings;
  return {
    head: path.join(workspace, "head"),
    tail: path.join(workspace, "tail"),
    pages: path.join(workspace, "pages"),
    fragmentsDir: path.join(workspace, "templates"),
    master: path.join(workspace, "config.Master"),
    masterBackup: path.join(workspace, "config.Master.bak"),
    output: path.join(mirrorHome, "config", "config.js"),
    outputBackup: path.join(workspace, "config.js.bak"),
    snapshotManifest: path.join(workspace, "snapshot.json"),
    lockFile: path.join(workspace, ".transaction.lock"),
    modulesDir: path.join(mirrorHome, "modules"),
  };
}

export class Workspace {
  readonly layout: WorkspaceLayout;

  constructor(private settings: Settings) {
    this.layout = resolveLayout(settings);
  }

  /**
   * Check the mirror installation and prepare the workspace directories.
   * Seeds the master record from the active config on first run.
   */
  async ensure(): Promise<void> {
    const { mirrorHome } = this.settings;

    if (!(await fileExists(mirrorHome))) {
      throw new EnvironmentFailureError(
        mirrorHome,
        `MagicMirror directory not found: ${mirrorHome}`,
      );
    }

    await fs.mkdir(this.layout.fragmentsDir, { recursive: true });

    if (await fileExists(this.layout.master)) {
      return;
    }

    const output = await readIfExists(this.layout.output);
    if (output === null) {
      throw new EnvironmentFailureError(
        this.layout.output,
        `Cannot seed master record: ${this.layout.output} not found`,
      );
    }

    console.log(`📋 Creating ${path.basename(this.layout.master)} from ${this.layout.output}`);
    await writeFileAtomic(this.layout.master, output);
  }

  async readMaster(): Promise<string> {
    const text = await readIfExists(this.layout.master);
    if (text === null) {
      throw new EnvironmentFailureError(
        this.layout.master,
        `Master record not found: ${this.layout.master}`,
      );
    }
    return text;
  }

  /**
   * Module names declared in the master record, in document order
   */
  async masterModules(): Promise<string[]> {
    return listDeclaredEntities(await this.readMaster());
  }

  async usesPages(): Promise<boolean> {
    return (await this.masterModules()).includes(this.settings.pagesModule);
  }
}
