/**
 * Template Populator
 *
 * Creates a fragment for every installed module that lacks one, trying the
 * master record, then the module's README, then its sample file
 */

import { extractBlock } from "./BlockExtractor.js";
import type { FragmentStore } from "./FragmentStore.js";
import type { ModuleSource } from "./ModuleDiscovery.js";
import type { FragmentSource, PopulateReport } from "./types.js";

export interface TemplatePopulatorOptions {
  /** Modules with this prefix belong to the bundled set and are never templated */
  protectedPrefix: string;
  verbose?: boolean;
}

export class TemplatePopulator {
  constructor(
    private store: FragmentStore,
    private modules: ModuleSource,
    private readMaster: () => Promise<string>,
    private options: TemplatePopulatorOptions,
  ) {}

  /**
   * Create missing fragments. Existing fragments are left untouched.
   */
  async populate(names: string[]): Promise<PopulateReport> {
    const report: PopulateReport = {
      created: [],
      existing: [],
      skipped: [],
      protected: [],
    };
    const masterText = await this.readMaster();

    for (const name of names) {
      if (name.startsWith(this.options.protectedPrefix)) {
        report.protected.push(name);
        continue;
      }

      try {
        await this.populateOne(name, masterText, report);
      } catch (error) {
        console.warn(
          `  ⚠️  Could not create template for ${name} (${error instanceof Error ? error.message : String(error)}), skipping`,
        );
        report.skipped.push(name);
      }
    }

    return report;
  }

  private async populateOne(
    name: string,
    masterText: string,
    report: PopulateReport,
  ): Promise<void> {
    if (await this.store.has(name)) {
      if (this.options.verbose) {
        console.log(`  ✅ Template exists: ${name}`);
      }
      report.existing.push(name);
      return;
    }

    const found = await this.findTemplate(name, masterText);
    if (!found) {
      console.warn(`  ⚠️  No template source found for ${name}, skipping`);
      report.skipped.push(name);
      return;
    }

    await this.store.write(name, found.text);
    console.log(`  📝 Template written: ${name} (from ${found.source})`);
    report.created.push({ name, source: found.source });
  }

  /**
   * Rebuild one fragment from its sources, replacing the stored one
   */
  async refresh(name: string): Promise<FragmentSource | null> {
    const found = await this.findTemplate(name, await this.readMaster());
    if (!found) {
      console.warn(`  ⚠️  No template source found for ${name}, fragment kept`);
      return null;
    }

    await this.store.write(name, found.text, { overwrite: true });
    console.log(`  🔄 Template refreshed: ${name} (from ${found.source})`);
    return found.source;
  }

  private async findTemplate(
    name: string,
    masterText: string,
  ): Promise<{ text: string; source: FragmentSource } | null> {
    const fromMaster = extractBlock(masterText, name);
    if (fromMaster) {
      return { text: fromMaster.text, source: "master" };
    }

    const readme = await this.modules.readDocumentation(name);
    if (readme !== null) {
      const fromReadme = extractBlock(readme, name);
      if (fromReadme) {
        return { text: fromReadme.text, source: "documentation" };
      }
    }

    const sample = await this.modules.readSample(name);
    if (sample !== null) {
      return { text: sample, source: "sample" };
    }

    return null;
  }
}
