import type { valueof } from "~/types/utils";

export type TRANSACTION_ERROR = valueof<typeof TRANSACTION_ERROR>;
export const TRANSACTION_ERROR = {
  /** A transaction left open by a crashed run could not be aborted. */
  RECOVERY_FAILED: "RecoveryFailed",
  BEGIN_FAILED: "BeginFailed",
  COMMIT_FAILED: "CommitFailed",
} as const;

export class TransactionError extends Error {
  constructor(
    public readonly kind: TRANSACTION_ERROR,
    public readonly filesystem: string,
    /** Exit status of the failed transaction command. */
    public readonly status: number,
  ) {
    super(`Transaction ${kind} on ${filesystem} (exit status ${status})`);
    this.name = this.constructor.name;
  }
}

export type STORE_ERROR = valueof<typeof STORE_ERROR>;
export const STORE_ERROR = {
  INVALID_DIGEST: "InvalidDigest",
  BUILD_FAILED: "BuildFailed",
} as const;

export class StoreError extends Error {
  constructor(
    public readonly kind: STORE_ERROR,
    message: string,
    public readonly context: { digest: string; path?: string },
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export type LINK_ERROR = valueof<typeof LINK_ERROR>;
export const LINK_ERROR = {
  /** Something other than a symlink occupies the tag path. */
  OCCUPIED: "Occupied",
  IO: "Io",
} as const;

export class LinkError extends Error {
  constructor(
    public readonly kind: LINK_ERROR,
    message: string,
    public readonly tagPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export type PUBLISH_ERROR = valueof<typeof PUBLISH_ERROR>;
export const PUBLISH_ERROR = {
  RESOLVE_FAILED: "ResolveFailed",
  INVALID_DIGEST: "InvalidDigest",
  TX_BEGIN_FAILED: "TxBeginFailed",
  BUILD_FAILED: "BuildFailed",
  LINK_FAILED: "LinkFailed",
  TX_COMMIT_FAILED: "TxCommitFailed",
} as const;

export interface PublishErrorContext {
  image: string;
  filesystem: string;
  digest?: string;
  contentPath?: string;
  tagPath?: string;
}

export class PublishError extends Error {
  constructor(
    public readonly kind: PUBLISH_ERROR,
    public readonly context: PublishErrorContext,
    options: { cause: unknown },
  ) {
    const cause = options.cause instanceof Error ? options.cause.message : String(options.cause);
    const details = Object.entries(context)
      .map(([key, value]) => `${key}=${value}`)
      .join(", ");
    super(`Publish failed with ${kind} (${details}): ${cause}`, options);
    this.name = this.constructor.name;
  }
}
