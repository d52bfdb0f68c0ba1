/**
 * Verification contracts
 *
 * A verifier reloads the running mirror with the config on disk and
 * rejects when the mirror does not come back up.
 */

export interface Verifier {
  /** Identifier of the process to reload */
  target(): Promise<string>;
  /** Abandoned work should stop once `signal` aborts */
  verify(target: string, signal?: AbortSignal): Promise<void>;
}

export interface ProcessNameResolver {
  resolve(): Promise<string>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /**
   * Run a command without a shell. Rejects on spawn failure, non-zero exit
   * when `timeoutMs` elapses or when `signal` aborts.
   */
  run(
    command: string,
    args: string[],
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<CommandResult>;
}
