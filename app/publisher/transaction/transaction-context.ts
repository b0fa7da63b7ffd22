import type { valueof } from "~/types/utils";

export type TRANSACTION_STATE = valueof<typeof TRANSACTION_STATE>;
export const TRANSACTION_STATE = {
  IDLE: "Idle",
  OPEN: "Open",
} as const;

/**
 * Tracks which filesystems have a transaction opened by the current publish run.
 * Owned by whoever drives the run and passed to every `TransactionService` call.
 * A filesystem that was never touched is Idle.
 */
export class TransactionContext {
  private readonly states = new Map<string, TRANSACTION_STATE>();

  state(filesystem: string): TRANSACTION_STATE {
    return this.states.get(filesystem) ?? TRANSACTION_STATE.IDLE;
  }

  isOpen(filesystem: string): boolean {
    return this.state(filesystem) === TRANSACTION_STATE.OPEN;
  }

  setState(filesystem: string, state: TRANSACTION_STATE): void {
    this.states.set(filesystem, state);
  }
}
