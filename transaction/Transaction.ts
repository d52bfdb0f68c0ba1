/**
 * Transaction
 *
 * State machine for one backup → apply → verify → accept/rollback cycle
 */

import { TransactionStateError } from "../core/errors.js";
import type { TransactionState } from "../core/types.js";

const TRANSITIONS: Record<TransactionState, readonly TransactionState[]> = {
  idle: ["backed-up"],
  "backed-up": ["applied", "rolled-back"],
  applied: ["accepted", "rolled-back"],
  accepted: [],
  "rolled-back": [],
};

export class Transaction {
  private current: TransactionState = "idle";
  private readonly trail: TransactionState[] = ["idle"];

  get state(): TransactionState {
    return this.current;
  }

  /**
   * States visited so far, starting with idle
   */
  get history(): readonly TransactionState[] {
    return this.trail;
  }

  get finished(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: TransactionState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: TransactionState): void {
    if (!this.canTransition(to)) {
      throw new TransactionStateError(this.current, to);
    }
    this.current = to;
    this.trail.push(to);
  }
}
