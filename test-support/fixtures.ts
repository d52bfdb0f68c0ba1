/**
 * Shared test fixtures: temp directories, settings and in-process fakes for
 * the prompter, verifier and module source
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { VerificationFailureError } from "../core/errors.js";
import type { ModuleSource } from "../core/ModuleDiscovery.js";
import { DEFAULT_SETTINGS } from "../core/Settings.js";
import type { Prompter, Settings } from "../core/types.js";
import type { Verifier } from "../verification/Verifier.js";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "mirror-config-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testSettings(root: string, overrides: Partial<Settings> = {}): Settings {
  return {
    ...DEFAULT_SETTINGS,
    mirrorHome: path.join(root, "MagicMirror"),
    workspace: path.join(root, "my_config"),
    verifyTimeoutMs: 1000,
    ...overrides,
  };
}

/**
 * Write files relative to `root`, creating directories as needed
 */
export async function writeFiles(
  root: string,
  files: Record<string, string>,
): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(root, relative);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf-8");
}

/**
 * Answers confirmations from a script, in order; runs out as "no"
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(
    private answers: boolean[],
    private choices: Array<string | null> = [],
  ) {}

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return this.answers.shift() ?? false;
  }

  async choose(_title: string, _items: string[]): Promise<string | null> {
    return this.choices.shift() ?? null;
  }
}

type VerifyBehaviour = "pass" | "fail" | "hang" | "throw-plain";

/**
 * Records the active config at every verification. A hanging verification
 * ends only when its signal aborts.
 */
export class FakeVerifier implements Verifier {
  readonly seen: string[] = [];
  aborted = 0;
  private script: VerifyBehaviour[];

  constructor(
    private outputPath: string,
    script: VerifyBehaviour[] = [],
    private fallback: VerifyBehaviour = "pass",
  ) {
    this.script = [...script];
  }

  async target(): Promise<string> {
    return "MagicMirror";
  }

  async verify(target: string, signal?: AbortSignal): Promise<void> {
    const content = await fs.readFile(this.outputPath, "utf-8").catch(() => "<missing>");
    this.seen.push(content);

    const behaviour = this.script.shift() ?? this.fallback;
    if (behaviour === "fail") {
      throw new VerificationFailureError(target, "process is errored");
    }
    if (behaviour === "throw-plain") {
      throw new Error("pm2 exploded");
    }
    if (behaviour === "hang") {
      await new Promise<never>((_resolve, reject) => {
        signal?.addEventListener(
          "abort",
          () => {
            this.aborted++;
            reject(new Error("aborted"));
          },
          { once: true },
        );
      });
    }
  }
}

export class MemoryModuleSource implements ModuleSource {
  constructor(
    private installed: string[],
    private readmes: Record<string, string> = {},
    private samples: Record<string, string> = {},
  ) {}

  async listInstalled(): Promise<string[]> {
    return [...this.installed];
  }

  async readDocumentation(name: string): Promise<string | null> {
    return this.readmes[name] ?? null;
  }

  async readSample(name: string): Promise<string | null> {
    return this.samples[name] ?? null;
  }
}
