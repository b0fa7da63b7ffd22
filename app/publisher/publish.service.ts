import path from "path";

import type winston from "winston";

import type { ContentStoreService } from "./content-store/content-store.service";
import type { Digest } from "./digest";
import {
  InvalidDigestError,
  digestPath,
  formatDigest,
  parseDigest,
  relativeDigestPath,
} from "./digest";
import type { PublishErrorContext } from "./errors";
import { PUBLISH_ERROR, PublishError, STORE_ERROR, StoreError } from "./errors";
import type { ImageBuilder } from "./image-builder";
import type { ImageReference } from "./image-reference";
import type { ImageResolver, RegistryCredentials } from "./image-resolver";
import type { LINK_OUTCOME, TagLinkerService } from "./tag-linker/tag-linker.service";
import { TransactionContext } from "./transaction/transaction-context";
import type { TransactionService } from "./transaction/transaction.service";

import type { Config, PublisherConfig } from "~/config";
import { Token } from "~/token";

export interface PublishOutcome {
  digest: string;
  contentPath: string;
  tagPath: string;
  /** True when this call materialized the content, false when it was already stored. */
  built: boolean;
  link: LINK_OUTCOME;
}

export interface PublishOptions {
  credentials?: RegistryCredentials;
  /** Lets several publishes share one run. A fresh context is used when omitted. */
  ctx?: TransactionContext;
}

/**
 * Publishes one image: begin, store the content once per digest, point the tag, commit.
 * Any failure after the transaction is opened aborts it before the error is reported.
 */
export class PublishService {
  static inject = [
    Token.Logger,
    Token.Config,
    Token.TransactionService,
    Token.ContentStoreService,
    Token.TagLinkerService,
    Token.ImageBuilder,
    Token.ImageResolver,
  ] as const;
  private readonly publisherConfig: PublisherConfig;

  constructor(
    private readonly logger: winston.Logger,
    config: Config,
    private readonly transactionService: TransactionService,
    private readonly contentStore: ContentStoreService,
    private readonly tagLinker: TagLinkerService,
    private readonly builder: ImageBuilder,
    private readonly resolver: ImageResolver,
  ) {
    this.publisherConfig = config.publisher();
  }

  /** `<cvmfsRoot>/<filesystem>/<rootSubdir>/<namespace>/<project>` */
  contentRoot(imageRef: ImageReference, filesystem: string, rootSubdir: string): string {
    return path.join(
      this.publisherConfig.cvmfsRoot,
      filesystem,
      rootSubdir,
      imageRef.namespace,
      imageRef.project,
    );
  }

  async publish(
    imageRef: ImageReference,
    filesystem: string,
    rootSubdir = "",
    opts: PublishOptions = {},
  ): Promise<PublishOutcome> {
    const ctx = opts.ctx ?? new TransactionContext();
    const context: PublishErrorContext = { image: imageRef.name(), filesystem };
    const fail = (kind: PUBLISH_ERROR, cause: unknown): PublishError =>
      new PublishError(kind, { ...context }, { cause });

    let rawDigest: string;
    try {
      rawDigest = imageRef.digest ?? (await this.resolver.resolve(imageRef, this.credentials(opts)));
    } catch (err) {
      throw fail(PUBLISH_ERROR.RESOLVE_FAILED, err);
    }
    context.digest = rawDigest;
    let digest: Digest;
    try {
      digest = parseDigest(rawDigest);
    } catch (err) {
      if (err instanceof InvalidDigestError) {
        throw fail(PUBLISH_ERROR.INVALID_DIGEST, err);
      }
      throw err;
    }

    const contentRoot = this.contentRoot(imageRef, filesystem, rootSubdir);
    const tagPath = path.join(contentRoot, imageRef.tag);
    const contentPath = digestPath(contentRoot, digest);
    context.contentPath = contentPath;
    context.tagPath = tagPath;

    try {
      await this.transactionService.begin(ctx, filesystem);
    } catch (err) {
      throw fail(PUBLISH_ERROR.TX_BEGIN_FAILED, err);
    }

    let built: boolean;
    try {
      const ensured = await this.contentStore.ensure({
        contentRoot,
        digest: formatDigest(digest),
        imageRef,
        builder: this.builder,
      });
      built = ensured.created;
    } catch (err) {
      await this.transactionService.abort(ctx, filesystem);
      const kind =
        err instanceof StoreError && err.kind === STORE_ERROR.INVALID_DIGEST
          ? PUBLISH_ERROR.INVALID_DIGEST
          : PUBLISH_ERROR.BUILD_FAILED;
      throw fail(kind, err);
    }

    let link: LINK_OUTCOME;
    try {
      // Relative to the tag's directory so the link resolves wherever the repository is mounted
      link = await this.tagLinker.point(tagPath, relativeDigestPath(digest));
    } catch (err) {
      await this.transactionService.abort(ctx, filesystem);
      throw fail(PUBLISH_ERROR.LINK_FAILED, err);
    }

    try {
      await this.transactionService.commit(ctx, filesystem);
    } catch (err) {
      throw fail(PUBLISH_ERROR.TX_COMMIT_FAILED, err);
    }

    this.logger.info(`Published ${imageRef.name()} as ${formatDigest(digest)}`, {
      filesystem,
      tagPath,
      built,
      link,
    });
    return { digest: formatDigest(digest), contentPath, tagPath, built, link };
  }

  private credentials(opts: PublishOptions): RegistryCredentials | undefined {
    if (opts.credentials !== void 0) {
      return opts.credentials;
    }
    const { registryUsername, registryToken } = this.publisherConfig;
    if (registryUsername !== void 0 && registryToken !== void 0) {
      return { username: registryUsername, token: registryToken };
    }
    return void 0;
  }
}
