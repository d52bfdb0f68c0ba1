/**
 * Validator
 *
 * Checks the workspace before anything is assembled: head and tail present,
 * a usable pages template, and a sane fragment for every module in use
 */

import {
  braceBalance,
  listDeclaredEntities,
} from "../core/BlockExtractor.js";
import { fileExists, readIfExists } from "../core/fsUtils.js";
import type { FragmentStore } from "../core/FragmentStore.js";
import type { ModuleSource } from "../core/ModuleDiscovery.js";
import { TemplateVariableResolver } from "../core/TemplateVariableResolver.js";
import {
  type ConfigError,
  ErrorSeverity,
  type Settings,
  type ValidationResult,
  type WorkspaceLayout,
} from "../core/types.js";
import type { Workspace } from "../core/Workspace.js";

export class Validator {
  private errors: ConfigError[] = [];
  private layout: WorkspaceLayout;

  constructor(
    private workspace: Workspace,
    private store: FragmentStore,
    private modules: ModuleSource,
    private settings: Settings,
  ) {
    this.layout = workspace.layout;
  }

  /**
   * Validate the workspace
   */
  async validate(): Promise<ValidationResult> {
    console.log("✅ Validating workspace...\n");

    this.errors = [];

    await this.validateStaticSections();
    await this.validatePages();
    await this.validateFragments();
    await this.validateCoverage();

    this.printResults();

    return {
      valid: !this.errors.some((e) => e.severity === ErrorSeverity.ERROR),
      errors: this.errors,
    };
  }

  private async validateStaticSections(): Promise<void> {
    console.log("📋 Validating head and tail...");

    if (!(await fileExists(this.layout.head))) {
      this.addError({
        severity: ErrorSeverity.ERROR,
        code: "MISSING_HEAD",
        message: "Head file not found",
        file: this.layout.head,
        suggestion: "Copy everything above the first module in config.js into it",
      });
    }
    if (!(await fileExists(this.layout.tail))) {
      this.addError({
        severity: ErrorSeverity.ERROR,
        code: "MISSING_TAIL",
        message: "Tail file not found",
        file: this.layout.tail,
        suggestion: "Copy everything below the last module in config.js into it",
      });
    }
  }

  private async validatePages(): Promise<void> {
    console.log("📑 Validating pages template...");

    const pages = await readIfExists(this.layout.pages);
    if (pages === null) {
      return;
    }

    const occurrences = TemplateVariableResolver.countOccurrences(
      pages,
      this.settings.placeholder,
    );
    if (occurrences !== 1) {
      this.addError({
        severity: ErrorSeverity.ERROR,
        code: "PAGES_PLACEHOLDER",
        message: `Pages template must contain the placeholder "${this.settings.placeholder}" exactly once (found ${occurrences})`,
        file: this.layout.pages,
      });
    }
  }

  private async validateFragments(): Promise<void> {
    console.log("📦 Validating templates...");

    const names = await this.store.list();
    console.log(`  Found ${names.length} templates`);

    for (const name of names) {
      const text = await this.store.read(name);
      if (text === null) {
        continue;
      }
      const file = this.store.pathFor(name);

      const balance = braceBalance(text);
      if (balance !== 0) {
        this.addError({
          severity: ErrorSeverity.WARNING,
          code: "UNBALANCED_FRAGMENT",
          message: `Template for ${name} has ${Math.abs(balance)} unmatched ${balance > 0 ? "opening" : "closing"} brace(s)`,
          file,
        });
      }

      const declared = listDeclaredEntities(text);
      if (!declared.includes(name)) {
        this.addError({
          severity: ErrorSeverity.WARNING,
          code: "FRAGMENT_NAME_MISMATCH",
          message:
            declared.length === 0
              ? `Template for ${name} declares no module`
              : `Template for ${name} declares ${declared.join(", ")}`,
          file,
          suggestion: `Rebuild it with: mirror-config refresh ${name}`,
        });
      }
    }
  }

  private async validateCoverage(): Promise<void> {
    console.log("🔗 Validating module coverage...\n");

    const available = new Set(await this.store.list());

    if (await fileExists(this.layout.master)) {
      for (const name of await this.workspace.masterModules()) {
        if (name.startsWith(this.settings.protectedPrefix)) {
          continue;
        }
        if (!available.has(name)) {
          this.addError({
            severity: ErrorSeverity.ERROR,
            code: "MISSING_FRAGMENT",
            message: `Module ${name} is in the master config but has no template`,
            file: this.store.pathFor(name),
            suggestion: "Run: mirror-config populate",
          });
        }
      }
    }

    for (const name of await this.modules.listInstalled()) {
      if (!available.has(name)) {
        this.addError({
          severity: ErrorSeverity.INFO,
          code: "NO_FRAGMENT",
          message: `Installed module ${name} has no template`,
        });
      }
    }
  }

  private addError(error: ConfigError): void {
    this.errors.push(error);
  }

  private printResults(): void {
    if (this.errors.length === 0) {
      console.log("✅ Validation Report\n");
      console.log("═".repeat(60));
      console.log("\n✅ All validation checks passed!\n");
      return;
    }

    console.log("\n⚠️  Validation Report\n");
    console.log("═".repeat(60));

    const errors = this.errors.filter((e) => e.severity === ErrorSeverity.ERROR);
    const warnings = this.errors.filter(
      (e) => e.severity === ErrorSeverity.WARNING,
    );
    const infos = this.errors.filter((e) => e.severity === ErrorSeverity.INFO);

    if (errors.length > 0) {
      console.log("\n❌ Errors:");
      for (const error of errors) {
        this.printError(error);
      }
    }

    if (warnings.length > 0) {
      console.log("\n⚠️  Warnings:");
      for (const warning of warnings) {
        this.printError(warning);
      }
    }

    if (infos.length > 0) {
      console.log("\nℹ️  Information:");
      for (const info of infos) {
        this.printError(info);
      }
    }

    console.log(`\n${"═".repeat(60)}`);
    console.log(
      `\n📊 Summary: ${errors.length} errors, ${warnings.length} warnings, ${infos.length} info`,
    );

    if (errors.length > 0) {
      console.log("\n❌ Validation failed - fix errors before testing modules");
    }
  }

  private printError(error: ConfigError): void {
    const icon =
      error.severity === ErrorSeverity.ERROR
        ? "❌"
        : error.severity === ErrorSeverity.WARNING
          ? "⚠️"
          : "ℹ️";
    console.log(`\n  ${icon} [${error.code}] ${error.message}`);

    if (error.file) {
      console.log(`     File: ${error.file}`);
    }

    if (error.suggestion) {
      console.log(`     💡 ${error.suggestion}`);
    }
  }
}
