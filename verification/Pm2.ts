/**
 * pm2 integration
 *
 * Guesses which pm2 process runs the mirror and restarts it to verify a
 * freshly written config
 */

import { VerificationFailureError } from "../core/errors.js";
import type { ProcessDescriptor, ProcessSettings } from "../core/types.js";
import type {
  CommandRunner,
  ProcessNameResolver,
  Verifier,
} from "./Verifier.js";

const PM2 = "pm2";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse `pm2 jlist` output into process descriptors
 */
export function parseProcessList(stdout: string): ProcessDescriptor[] {
  const parsed: unknown = JSON.parse(stdout);
  if (!Array.isArray(parsed)) {
    throw new Error("pm2 jlist did not return a list");
  }

  const descriptors: ProcessDescriptor[] = [];
  for (const entry of parsed) {
    if (!isRecord(entry) || typeof entry.name !== "string") {
      continue;
    }
    const env: Record<string, unknown> = isRecord(entry.pm2_env)
      ? entry.pm2_env
      : {};
    descriptors.push({
      name: entry.name,
      status: typeof env.status === "string" ? env.status : undefined,
      execPath:
        typeof env.pm_exec_path === "string" ? env.pm_exec_path : undefined,
    });
  }
  return descriptors;
}

/**
 * First process whose exec path mentions the mirror, or whose name is one
 * of the known names; null when nothing matches
 */
export function pickProcessName(
  processes: ProcessDescriptor[],
  settings: ProcessSettings,
): string | null {
  const hint = settings.pathHint.toLowerCase();

  for (const proc of processes) {
    const execPath = proc.execPath?.toLowerCase() ?? "";
    if (hint !== "" && execPath.includes(hint)) {
      return proc.name;
    }
    if (settings.knownNames.includes(proc.name.toLowerCase())) {
      return proc.name;
    }
  }
  return null;
}

export class Pm2ProcessResolver implements ProcessNameResolver {
  constructor(
    private runner: CommandRunner,
    private settings: ProcessSettings,
    private timeoutMs: number,
  ) {}

  async resolve(): Promise<string> {
    let processes: ProcessDescriptor[];
    try {
      const { stdout } = await this.runner.run(PM2, ["jlist"], this.timeoutMs);
      processes = parseProcessList(stdout);
    } catch (error) {
      console.warn(
        `  ⚠️  Could not query pm2 (${error instanceof Error ? error.message : String(error)}), using '${this.settings.fallbackName}'`,
      );
      return this.settings.fallbackName;
    }

    const name = pickProcessName(processes, this.settings);
    if (name === null) {
      console.warn(
        `  ⚠️  Could not detect pm2 process, using '${this.settings.fallbackName}'`,
      );
      return this.settings.fallbackName;
    }

    console.log(`  🔍 Detected pm2 process: ${name}`);
    return name;
  }
}

export class Pm2Verifier implements Verifier {
  private resolved: string | null = null;

  constructor(
    private runner: CommandRunner,
    private resolver: ProcessNameResolver,
    private timeoutMs: number,
  ) {}

  async target(): Promise<string> {
    if (this.resolved === null) {
      this.resolved = await this.resolver.resolve();
    }
    return this.resolved;
  }

  /**
   * Restart the process, then require pm2 to report it online
   */
  async verify(target: string, signal?: AbortSignal): Promise<void> {
    console.log(`  🔄 Restarting MagicMirror (${target})...`);

    try {
      await this.runner.run(PM2, ["restart", target], this.timeoutMs, signal);
    } catch (error) {
      throw new VerificationFailureError(target, "pm2 restart failed", {
        cause: error,
      });
    }

    let processes: ProcessDescriptor[];
    try {
      const { stdout } = await this.runner.run(PM2, ["jlist"], this.timeoutMs, signal);
      processes = parseProcessList(stdout);
    } catch (error) {
      throw new VerificationFailureError(target, "pm2 status unavailable", {
        cause: error,
      });
    }

    const proc = processes.find((p) => p.name === target);
    if (!proc) {
      throw new VerificationFailureError(target, "process not listed by pm2");
    }
    if (proc.status !== "online") {
      throw new VerificationFailureError(
        target,
        `process is ${proc.status ?? "in an unknown state"}`,
      );
    }
  }
}
