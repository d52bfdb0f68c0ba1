/**
 * Config Manager
 *
 * Main orchestrator: wires the workspace, fragment store, populator,
 * assembler and transaction manager together and runs the test and remove
 * workflows on top of them
 */

import { SnapshotStore } from "../transaction/SnapshotStore.js";
import { TransactionLock } from "../transaction/TransactionLock.js";
import {
  type TransactionOutcome,
  TransactionManager,
} from "../transaction/TransactionManager.js";
import { ExecFileRunner } from "../verification/CommandRunner.js";
import { Pm2ProcessResolver, Pm2Verifier } from "../verification/Pm2.js";
import type { Verifier } from "../verification/Verifier.js";
import { ConfigAssembler } from "./ConfigAssembler.js";
import { FragmentStore } from "./FragmentStore.js";
import { ModuleDiscovery, type ModuleSource } from "./ModuleDiscovery.js";
import { TemplatePopulator } from "./TemplatePopulator.js";
import type {
  ConfigManagerOptions,
  FragmentSource,
  PopulateReport,
  Prompter,
  Settings,
} from "./types.js";
import { Workspace } from "./Workspace.js";

export interface ConfigManagerDependencies {
  prompter: Prompter;
  /** Defaults to pm2 */
  verifier?: Verifier;
  /** Defaults to the mirror's modules directory */
  modules?: ModuleSource;
}

export class ConfigManager {
  readonly settings: Settings;
  readonly workspace: Workspace;
  readonly store: FragmentStore;
  readonly modules: ModuleSource;
  readonly lock: TransactionLock;
  readonly snapshots: SnapshotStore;
  private populator: TemplatePopulator;
  private transactions: TransactionManager;
  private prompter: Prompter;

  constructor(
    options: ConfigManagerOptions,
    dependencies: ConfigManagerDependencies,
  ) {
    const { settings } = options;
    this.settings = settings;
    this.prompter = dependencies.prompter;
    this.workspace = new Workspace(settings);

    const { layout } = this.workspace;
    this.store = new FragmentStore(layout.fragmentsDir, settings.fragmentExtension);
    this.modules = dependencies.modules ?? new ModuleDiscovery(layout.modulesDir);
    this.populator = new TemplatePopulator(
      this.store,
      this.modules,
      () => this.workspace.readMaster(),
      { protectedPrefix: settings.protectedPrefix, verbose: options.verbose },
    );

    const verifier =
      dependencies.verifier ?? ConfigManager.createPm2Verifier(settings);

    this.lock = new TransactionLock(layout.lockFile);
    this.snapshots = new SnapshotStore(
      [
        { original: layout.master, backup: layout.masterBackup },
        { original: layout.output, backup: layout.outputBackup },
      ],
      layout.snapshotManifest,
    );
    this.transactions = new TransactionManager(
      { master: layout.master, output: layout.output },
      new ConfigAssembler(layout, this.store, {
        indent: settings.indent,
        placeholder: settings.placeholder,
      }),
      this.snapshots,
      this.lock,
      verifier,
      settings.verifyTimeoutMs,
    );
  }

  static createPm2Verifier(settings: Settings): Verifier {
    const runner = new ExecFileRunner();
    return new Pm2Verifier(
      runner,
      new Pm2ProcessResolver(runner, settings.process, settings.verifyTimeoutMs),
      settings.verifyTimeoutMs,
    );
  }

  /**
   * Check the environment and seed the master record
   */
  async initialize(): Promise<void> {
    await this.workspace.ensure();
  }

  /**
   * Create templates for installed, master and baseline modules that have none
   */
  async populate(): Promise<PopulateReport> {
    const names = [
      ...new Set([
        ...(await this.modules.listInstalled()),
        ...(await this.workspace.masterModules()),
        ...this.settings.baselineModules,
      ]),
    ];
    console.log(`🔍 Checking templates for ${names.length} modules...\n`);

    const report = await this.populator.populate(names);

    console.log(
      `\n📊 ${report.created.length} created, ${report.existing.length} existing, ${report.skipped.length} skipped`,
    );
    return report;
  }

  /**
   * Rebuild one module's template even if it exists
   */
  async refresh(name: string): Promise<FragmentSource | null> {
    return this.populator.refresh(name);
  }

  async listModules(): Promise<string[]> {
    return this.workspace.masterModules();
  }

  /**
   * Test a module alone, optionally beside a baseline on two pages, then
   * within the full master config where the result may be accepted
   */
  async testModule(name: string): Promise<TransactionOutcome | null> {
    const masterModules = await this.workspace.masterModules();

    console.log("\n=== Testing module alone ===");
    await this.transactions.run(
      { modules: [name], usePages: false },
      { label: `${name} alone`, confirm: (q) => this.prompter.confirm(q) },
    );

    if (
      masterModules.includes(this.settings.pagesModule) &&
      (await this.prompter.confirm("Test with 2 pages?"))
    ) {
      console.log("\n=== Testing module with pages ===");
      await this.transactions.run(
        {
          modules: [...this.settings.baselineModules, name],
          usePages: true,
          pagesModuleName: name,
        },
        { label: `${name} with pages`, confirm: (q) => this.prompter.confirm(q) },
      );
    }

    if (!(await this.prompter.confirm("Test with full master?"))) {
      console.log("Testing cancelled.");
      return null;
    }

    console.log("\n=== Testing with full master config ===");
    const finalModules = [...masterModules];
    if (finalModules.includes(name)) {
      console.log(`${name} already in master config`);
    } else {
      console.log(`Adding ${name} to master config...`);
      finalModules.push(name);
    }

    return this.transactions.run(
      { modules: finalModules, usePages: false },
      {
        label: `master config with ${name}`,
        offerAccept: true,
        confirm: (q) => this.prompter.confirm(q),
      },
    );
  }

  /**
   * Drop a module from the master config, verified before it is accepted
   */
  async removeModule(name: string): Promise<TransactionOutcome | null> {
    const masterModules = await this.workspace.masterModules();
    if (!masterModules.includes(name)) {
      throw new Error(`Module ${name} is not in the master config`);
    }

    if (!(await this.prompter.confirm(`Remove ${name} from config?`))) {
      return null;
    }

    return this.transactions.run(
      { modules: masterModules.filter((m) => m !== name), usePages: false },
      {
        label: `master config without ${name}`,
        offerAccept: true,
        confirm: (q) => this.prompter.confirm(q),
      },
    );
  }
}
