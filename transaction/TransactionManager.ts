/**
 * Transaction Manager
 *
 * Wraps every change to config.js: snapshot, assemble and write, verify
 * against the running mirror, then accept into the master record or roll
 * back. Only an accepted transaction touches the master record.
 */

import * as fs from "node:fs/promises";
import type { ConfigAssembler } from "../core/ConfigAssembler.js";
import { VerificationFailureError, VerificationTimeoutError } from "../core/errors.js";
import { writeFileAtomic } from "../core/fsUtils.js";
import type { AssemblyPlan, TransactionState } from "../core/types.js";
import type { Verifier } from "../verification/Verifier.js";
import type { SnapshotStore } from "./SnapshotStore.js";
import { Transaction } from "./Transaction.js";
import type { TransactionLock } from "./TransactionLock.js";

export interface TransactionPaths {
  master: string;
  output: string;
}

export interface TransactionRunOptions {
  /** Shown in progress output */
  label: string;
  /** Ask to make the result the new master record */
  offerAccept?: boolean;
  /**
   * Asked while the candidate config is live. With offerAccept the answer
   * decides acceptance; otherwise it is reported back and the change is
   * rolled back either way.
   */
  confirm: (question: string) => Promise<boolean>;
}

export interface TransactionOutcome {
  state: Extract<TransactionState, "accepted" | "rolled-back">;
  /** The user's answer after a successful verification */
  approved: boolean;
  history: readonly TransactionState[];
}

export class TransactionManager {
  constructor(
    private paths: TransactionPaths,
    private assembler: ConfigAssembler,
    private snapshots: SnapshotStore,
    private lock: TransactionLock,
    private verifier: Verifier,
    private verifyTimeoutMs: number,
  ) {}

  /**
   * Run one transaction for a plan. Any failure is rolled back before it
   * is re-thrown.
   */
  async run(
    plan: AssemblyPlan,
    options: TransactionRunOptions,
  ): Promise<TransactionOutcome> {
    return this.lock.withLock(async () => {
      const tx = new Transaction();

      console.log(`\n🧪 ${options.label}`);
      await this.snapshots.capture();
      tx.transition("backed-up");

      let restarted = false;
      try {
        const document = await this.assembler.assemble(plan);
        await writeFileAtomic(this.paths.output, document);
        tx.transition("applied");
        console.log(`  📄 Wrote ${this.paths.output} (${plan.modules.length} modules)`);

        restarted = true;
        await this.verify();
        console.log("  ✅ Verification passed");

        const approved = await options.confirm(
          options.offerAccept
            ? "Update master?"
            : "Does the mirror look right?",
        );

        if (options.offerAccept && approved) {
          const accepted = await fs.readFile(this.paths.output, "utf-8");
          await writeFileAtomic(this.paths.master, accepted);
          tx.transition("accepted");
          console.log("  📝 Master updated.");
          return { state: "accepted", approved, history: tx.history };
        }

        await this.rollback(tx, restarted);
        return { state: "rolled-back", approved, history: tx.history };
      } catch (error) {
        console.error(
          `  ❌ ${error instanceof Error ? error.message : String(error)}`,
        );
        if (!tx.finished) {
          try {
            await this.rollback(tx, restarted);
          } catch (rollbackError) {
            console.error(
              `  ❌ Rollback failed: ${rollbackError instanceof Error ? rollbackError.message : String(rollbackError)}`,
            );
          }
        }
        throw error;
      }
    });
  }

  private async rollback(tx: Transaction, reload: boolean): Promise<void> {
    console.log("  🔄 Rolling back…");
    await this.snapshots.restore();
    tx.transition("rolled-back");

    if (!reload) {
      return;
    }
    try {
      await this.verify();
    } catch (error) {
      console.error(
        `  ❌ Restored config did not reload: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async verify(): Promise<void> {
    const target = await this.verifier.target();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new VerificationTimeoutError(target, this.verifyTimeoutMs));
        // Stops in-flight pm2 calls before a rollback reload or the next run
        controller.abort();
      }, this.verifyTimeoutMs);
    });

    try {
      await Promise.race([
        this.verifier.verify(target, controller.signal),
        timeout,
      ]);
    } catch (error) {
      if (error instanceof VerificationFailureError) {
        throw error;
      }
      throw new VerificationFailureError(
        target,
        error instanceof Error ? error.message : String(error),
        { cause: error },
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
