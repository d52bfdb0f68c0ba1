#!/usr/bin/env node

/**
 * Mirror Config CLI
 *
 * Assemble MagicMirror config.js from per-module templates, verify it on the
 * running mirror and roll back when it breaks
 */

import { Command } from "commander";
import { watch } from "chokidar";
import * as path from "node:path";
import { ConfigManager } from "../core/ConfigManager.js";
import { loadSettings } from "../core/Settings.js";
import { StatusReporter } from "../core/StatusReporter.js";
import { ErrorSeverity } from "../core/types.js";
import { Validator } from "../validation/Validator.js";
import { ReadlinePrompter } from "./ReadlinePrompter.js";

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  yes?: boolean;
}

const program = new Command();

program
  .name("mirror-config")
  .description("Assemble, test and roll back MagicMirror configurations from module templates")
  .version("1.0.0")
  .option("-c, --config <file>", "Settings file (YAML, TOML or JSON)")
  .option("--verbose", "Detailed output")
  .option("-y, --yes", "Answer yes to every confirmation");

/**
 * Load settings, build the manager and run `fn`, exiting 1 on failure
 */
async function withManager(
  action: string,
  fn: (manager: ConfigManager, prompter: ReadlinePrompter) => Promise<void>,
): Promise<void> {
  const options = program.opts<GlobalOptions>();
  const prompter = new ReadlinePrompter(options.yes);

  try {
    const settings = await loadSettings({ configPath: options.config });
    const manager = new ConfigManager(
      { settings, verbose: options.verbose },
      { prompter },
    );
    await manager.initialize();
    await fn(manager, prompter);
  } catch (error) {
    console.error(
      `\n❌ Error ${action}:`,
      error instanceof Error ? error.message : error,
    );
    process.exitCode = 1;
  } finally {
    prompter.close();
  }
}

// Interactive menu
program
  .command("menu", { isDefault: true })
  .description("Interactive menu: test or remove modules")
  .action(async () => {
    await withManager("running menu", async (manager, prompter) => {
      await manager.populate();

      for (;;) {
        const choice = await prompter.choose("MagicMirror Config Manager", [
          "Test a module",
          "Remove a module",
          "Exit",
        ]);

        if (choice === "Test a module") {
          const name = await prompter.choose(
            "Select module to test",
            await manager.store.list(),
          );
          if (name) {
            await manager.testModule(name);
          }
        } else if (choice === "Remove a module") {
          const name = await prompter.choose(
            "Select module to remove",
            await manager.listModules(),
          );
          if (name) {
            await manager.removeModule(name);
          }
        } else if (choice === "Exit") {
          return;
        }
      }
    });
  });

// Populate command
program
  .command("populate")
  .description("Create templates for modules that have none")
  .action(async () => {
    await withManager("populating templates", async (manager) => {
      await manager.populate();
    });
  });

// Refresh command
program
  .command("refresh <module>")
  .description("Rebuild a module template from its sources, replacing the stored one")
  .action(async (name: string) => {
    await withManager("refreshing template", async (manager) => {
      const source = await manager.refresh(name);
      if (source === null) {
        process.exitCode = 1;
      }
    });
  });

// Test command
program
  .command("test <module>")
  .description("Test a module alone, with pages, then within the full master config")
  .action(async (name: string) => {
    await withManager("testing module", async (manager) => {
      await manager.testModule(name);
    });
  });

// Remove command
program
  .command("remove <module>")
  .description("Remove a module from the master config")
  .action(async (name: string) => {
    await withManager("removing module", async (manager) => {
      await manager.removeModule(name);
    });
  });

// List command
program
  .command("list")
  .description("List modules in the master config")
  .action(async () => {
    await withManager("listing modules", async (manager) => {
      const modules = await manager.listModules();
      modules.forEach((name, i) => {
        console.log(`${String(i + 1).padStart(2)}) ${name}`);
      });
    });
  });

// Status command
program
  .command("status")
  .description("Show configuration management status")
  .action(async () => {
    await withManager("showing status", async (manager) => {
      await new StatusReporter(manager).showStatus();
    });
  });

// Validate command
program
  .command("validate")
  .description("Validate head, tail, pages and module templates")
  .option("--strict", "Fail on warnings")
  .action(async (options: { strict?: boolean }) => {
    await withManager("validating workspace", async (manager) => {
      const validator = new Validator(
        manager.workspace,
        manager.store,
        manager.modules,
        manager.settings,
      );
      const result = await validator.validate();

      if (!result.valid) {
        process.exitCode = 1;
        return;
      }

      if (options.strict && result.errors.some((e) => e.severity === ErrorSeverity.WARNING)) {
        console.log("\n❌ Strict mode: Warnings present");
        process.exitCode = 1;
      }
    });
  });

// Unlock command
program
  .command("unlock")
  .description("Clear a transaction lock left by an interrupted run")
  .action(async () => {
    await withManager("clearing lock", async (manager) => {
      if (await manager.lock.clear()) {
        console.log("🔓 Lock cleared");
      } else {
        console.log("ℹ️  No lock held");
      }
    });
  });

// Watch command
program
  .command("watch")
  .description("Create templates as new modules are installed")
  .action(async () => {
    await withManager("watching modules", async (manager) => {
      const { modulesDir } = manager.workspace.layout;

      console.log("👀 Watching for new modules...\n");
      console.log(`  Watching: ${modulesDir}`);
      console.log("\nPress Ctrl+C to stop\n");

      const watcher = watch(modulesDir, {
        depth: 0,
        ignored: (file: string) => path.basename(file).startsWith("."),
        persistent: true,
        ignoreInitial: true,
      });

      let populating = false;

      const populate = async () => {
        if (populating) return;

        populating = true;
        const timestamp = new Date().toLocaleTimeString();
        try {
          console.log(`\n[${timestamp}] 🔄 Populating templates...`);
          await manager.populate();
          console.log(`[${timestamp}] ✅ Done`);
        } catch (error) {
          console.error(`\n[${timestamp}] ❌ Error:`, error);
        } finally {
          populating = false;
        }
      };

      await new Promise<void>((resolve) => {
        watcher
          .on("addDir", (dir) => {
            if (dir === modulesDir) return;
            console.log(`\n[${new Date().toLocaleTimeString()}] ➕ Installed: ${path.basename(dir)}`);
            void populate();
          })
          .on("error", (error) => {
            console.error("\n❌ Watcher error:", error);
          });

        process.once("SIGINT", () => {
          console.log("\n\n👋 Stopping watcher...");
          watcher.close().then(resolve, (error: unknown) => {
            console.error("\n❌ Failed to stop watcher:", error);
            resolve();
          });
        });
      });
    });
  });

await program.parseAsync();
