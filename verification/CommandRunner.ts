/**
 * Command Runner
 *
 * execFile-backed runner used for pm2 calls
 */

import * as childProcess from "node:child_process";
import { promisify } from "node:util";
import type { CommandResult, CommandRunner } from "./Verifier.js";

const execFile = promisify(childProcess.execFile);

export class ExecFileRunner implements CommandRunner {
  async run(
    command: string,
    args: string[],
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<CommandResult> {
    const { stdout, stderr } = await execFile(command, args, {
      timeout: timeoutMs,
      signal,
      encoding: "utf-8",
      maxBuffer: 16 * 1024 * 1024,
    });
    return { stdout, stderr };
  }
}
