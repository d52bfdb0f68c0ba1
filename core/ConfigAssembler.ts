/**
 * Config Assembler
 *
 * Builds config.js from the head file, one fragment per module, an optional
 * paged section and the tail file
 */

import { MissingResourceError } from "./errors.js";
import { readIfExists } from "./fsUtils.js";
import type { FragmentStore } from "./FragmentStore.js";
import { TemplateVariableResolver } from "./TemplateVariableResolver.js";
import type { AssemblyPlan, WorkspaceLayout } from "./types.js";

export interface ConfigAssemblerOptions {
  /** Prefixed to every fragment */
  indent: string;
  /** Token in the paged section replaced by the plan's module name */
  placeholder: string;
}

export class ConfigAssembler {
  constructor(
    private layout: Pick<WorkspaceLayout, "head" | "tail" | "pages">,
    private store: FragmentStore,
    private options: ConfigAssemblerOptions,
  ) {}

  /**
   * Assemble the document for a plan. Module order is kept exactly.
   * @throws MissingResourceError naming the first absent file
   */
  async assemble(plan: AssemblyPlan): Promise<string> {
    let output = await this.require(this.layout.head, "head file");
    const tail = await this.require(this.layout.tail, "tail file");

    for (const [index, name] of plan.modules.entries()) {
      const fragment = await this.store.read(name);
      if (fragment === null) {
        throw new MissingResourceError(
          this.store.pathFor(name),
          `template for ${name}`,
        );
      }

      output += this.options.indent + stripSeparator(fragment);

      const isLast = index === plan.modules.length - 1;
      if (!isLast || plan.usePages) {
        output += ",";
      }
      output += "\n";
    }

    if (plan.usePages) {
      const pages = await this.require(this.layout.pages, "pages file");
      output += plan.pagesModuleName
        ? TemplateVariableResolver.substitute(
            pages,
            this.options.placeholder,
            plan.pagesModuleName,
          )
        : pages;
    }

    return output + tail;
  }

  private async require(filePath: string, what: string): Promise<string> {
    const text = await readIfExists(filePath);
    if (text === null) {
      throw new MissingResourceError(filePath, what);
    }
    return text;
  }
}

/**
 * Trim surrounding whitespace and at most one trailing comma. The first
 * line's own indentation gives way to the configured indent.
 */
export function stripSeparator(fragment: string): string {
  const trimmed = fragment.trim();
  return trimmed.endsWith(",") ? trimmed.slice(0, -1) : trimmed;
}
