/**
 * Readline Prompter
 *
 * Terminal prompts for the interactive menu and confirmations
 */

import * as readline from "node:readline/promises";
import type { Prompter } from "../core/types.js";

export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface | null = null;

  /**
   * @param assumeYes Answer every confirmation with yes (--yes)
   */
  constructor(private assumeYes = false) {}

  async confirm(question: string): Promise<boolean> {
    if (this.assumeYes) {
      console.log(`${question} [y/N]: y`);
      return true;
    }
    const answer = await this.ask(`${question} [y/N]: `);
    return answer.trim().toLowerCase() === "y";
  }

  async choose(title: string, items: string[]): Promise<string | null> {
    if (items.length === 0) {
      console.log("No items available");
      return null;
    }

    console.log(`\n${title}:`);
    console.log("-".repeat(40));
    items.forEach((item, i) => {
      console.log(`${String(i + 1).padStart(2)}) ${item}`);
    });
    console.log();

    const choice = Number.parseInt(await this.ask("Enter number: "), 10);
    if (Number.isNaN(choice) || choice < 1 || choice > items.length) {
      console.log("Invalid selection");
      return null;
    }
    return items[choice - 1];
  }

  async ask(question: string): Promise<string> {
    if (!this.rl) {
      this.rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
      });
    }
    return this.rl.question(question);
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
