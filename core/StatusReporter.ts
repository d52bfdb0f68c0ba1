/**
 * StatusReporter
 *
 * Reports which modules are in use, which have templates, and the state of
 * the snapshot slot
 */

import * as path from "node:path";
import type { ConfigManager } from "./ConfigManager.js";
import { fileExists } from "./fsUtils.js";

export interface StatusSummary {
  masterModules: Array<{ name: string; hasTemplate: boolean }>;
  installedWithoutTemplate: string[];
  usesPages: boolean;
  snapshotTimestamp: string | null;
  locked: boolean;
}

export class StatusReporter {
  constructor(private manager: ConfigManager) {}

  async collect(): Promise<StatusSummary> {
    const { workspace, store, modules, snapshots, lock } = this.manager;
    const templates = new Set(await store.list());

    const masterModules = (await workspace.masterModules()).map((name) => ({
      name,
      hasTemplate: templates.has(name),
    }));
    const installedWithoutTemplate = (await modules.listInstalled()).filter(
      (name) => !templates.has(name),
    );
    const snapshot = await snapshots.read();

    return {
      masterModules,
      installedWithoutTemplate,
      usesPages: await workspace.usesPages(),
      snapshotTimestamp: snapshot?.timestamp ?? null,
      locked: (await lock.inspect()) !== null,
    };
  }

  /**
   * Show status of the workspace
   */
  async showStatus(): Promise<void> {
    const { layout } = this.manager.workspace;
    const status = await this.collect();

    console.log("📊 Config Management Status\n");
    console.log(`Master:    ${layout.master}`);
    console.log(`Output:    ${layout.output}${(await fileExists(layout.output)) ? "" : " (missing)"}`);
    console.log(`Templates: ${path.relative(process.cwd(), layout.fragmentsDir) || "."}\n`);

    console.log(`Modules in master (${status.masterModules.length}):`);
    for (const { name, hasTemplate } of status.masterModules) {
      console.log(`  ${hasTemplate ? "✅" : "❌"} ${name}`);
    }

    if (status.installedWithoutTemplate.length > 0) {
      console.log(`\nInstalled without template (${status.installedWithoutTemplate.length}):`);
      console.log(`  ${status.installedWithoutTemplate.join(", ")}`);
    }

    console.log(`\nPages: ${status.usesPages ? `in use (${this.manager.settings.pagesModule})` : "not in use"}`);
    console.log(
      `Snapshot: ${status.snapshotTimestamp ? `captured ${status.snapshotTimestamp}` : "empty"}`,
    );
    if (status.locked) {
      console.log("\n⚠️  A transaction lock is held. Run 'mirror-config unlock' if no other run is active.");
    }
  }
}
