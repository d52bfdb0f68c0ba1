/**
 * Template Variable Resolver
 *
 * Resolves {{VARIABLE}} placeholders in settings paths and substitutes the
 * paged-section placeholder token
 */

import * as os from "node:os";
import { escapeRegExp } from "./BlockExtractor.js";

export type VariableSource = Record<string, string | undefined>;

export class TemplateVariableResolver {
  /**
   * Resolve template variables in a string
   * @param template String containing {{VARIABLE}} placeholders
   * @param variables Lookup table, defaults to the environment with HOME filled in
   * @throws Error if any variable has no value
   */
  static resolve(
    template: string,
    variables: VariableSource = TemplateVariableResolver.environment(),
  ): string {
    const missingVars = TemplateVariableResolver.extractVariables(
      template,
    ).filter((varName) => variables[varName] === undefined);

    if (missingVars.length > 0) {
      throw new Error(
        `Missing required environment variables: ${missingVars.join(", ")}\n` +
          `Template: ${template}`,
      );
    }

    return template.replace(
      /\{\{(\w+)\}\}/g,
      (_match, varName: string) => variables[varName] ?? "",
    );
  }

  /**
   * Extract all variable names from a template
   */
  static extractVariables(template: string): string[] {
    const matches = Array.from(template.matchAll(/\{\{(\w+)\}\}/g));
    return [...new Set(matches.map((m) => m[1]))];
  }

  /**
   * Replace every occurrence of a literal token
   */
  static substitute(text: string, token: string, value: string): string {
    if (token === "") {
      return text;
    }
    return text.replace(new RegExp(escapeRegExp(token), "g"), () => value);
  }

  /**
   * Number of literal occurrences of `token` in `text`
   */
  static countOccurrences(text: string, token: string): number {
    if (token === "") {
      return 0;
    }
    return text.split(token).length - 1;
  }

  static environment(): VariableSource {
    return { HOME: os.homedir(), ...process.env };
  }
}
