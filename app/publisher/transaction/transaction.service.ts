import type winston from "winston";

import { TRANSACTION_ERROR, TransactionError } from "../errors";

import type { TransactionBackend } from "./transaction-backend";
import type { TransactionContext } from "./transaction-context";
import { TRANSACTION_STATE } from "./transaction-context";

import { Token } from "~/token";
import { displayError } from "~/utils.shared";

/**
 * Brackets writes to a shared filesystem in begin/commit/abort. Only one transaction can be open
 * on a filesystem at a time, which the backend enforces across processes; the context only keeps a
 * single run from opening the same filesystem twice. Nothing here retries.
 */
export class TransactionService {
  static inject = [Token.Logger, Token.TransactionBackend] as const;

  constructor(
    private readonly logger: winston.Logger,
    private readonly backend: TransactionBackend,
  ) {}

  async begin(ctx: TransactionContext, filesystem: string): Promise<void> {
    if (ctx.isOpen(filesystem)) {
      return;
    }
    if (await this.backend.hasOpenTransaction(filesystem)) {
      this.logger.warn(`Found a transaction left open on ${filesystem}, recovering`);
      const status = await this.abort(ctx, filesystem);
      if (status !== 0) {
        this.logger.error(
          `Failed to abort lingering transaction on ${filesystem} (exit status ${status})`,
        );
        throw new TransactionError(TRANSACTION_ERROR.RECOVERY_FAILED, filesystem, status);
      }
    }
    const status = await this.backend.begin(filesystem);
    if (status !== 0) {
      ctx.setState(filesystem, TRANSACTION_STATE.IDLE);
      this.logger.error(
        `Transaction start on ${filesystem} failed (exit status ${status}); will not attempt update`,
      );
      throw new TransactionError(TRANSACTION_ERROR.BEGIN_FAILED, filesystem, status);
    }
    ctx.setState(filesystem, TRANSACTION_STATE.OPEN);
    this.logger.info(`Opened transaction on ${filesystem}`);
  }

  /**
   * The context returns to Idle even when the commit fails, the backend terminates the
   * transaction either way.
   */
  async commit(ctx: TransactionContext, filesystem: string): Promise<void> {
    if (!ctx.isOpen(filesystem)) {
      return;
    }
    ctx.setState(filesystem, TRANSACTION_STATE.IDLE);
    const status = await this.backend.commit(filesystem);
    if (status !== 0) {
      this.logger.error(`Commit on ${filesystem} failed (exit status ${status})`);
      throw new TransactionError(TRANSACTION_ERROR.COMMIT_FAILED, filesystem, status);
    }
    this.logger.info(`Committed transaction on ${filesystem}`);
  }

  /**
   * Best effort, never throws. Returns the backend's exit status, or -1 if the backend itself threw.
   */
  async abort(ctx: TransactionContext, filesystem: string): Promise<number> {
    this.logger.warn(`Aborting transaction on ${filesystem}`);
    ctx.setState(filesystem, TRANSACTION_STATE.IDLE);
    let status: number;
    try {
      status = await this.backend.abort(filesystem);
    } catch (err) {
      this.logger.error(`Abort on ${filesystem} threw: ${displayError(err)}`);
      return -1;
    }
    if (status !== 0) {
      this.logger.error(`Abort on ${filesystem} failed (exit status ${status})`);
    }
    return status;
  }
}
