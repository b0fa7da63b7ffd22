/* eslint-disable filename-rules/match */

import type { valueof } from "./types/utils";

/**
 * Injection tokens
 */
export type Token = valueof<typeof Token>;
export const Token = {
  Config: "ConfigT",
  Logger: "LoggerT",
  TransactionBackend: "TransactionBackendT",
  TransactionService: "TransactionServiceT",
  OsRootDetector: "OsRootDetectorT",
  ContentStoreService: "ContentStoreServiceT",
  TagLinkerService: "TagLinkerServiceT",
  ImageBuilder: "ImageBuilderT",
  ImageResolver: "ImageResolverT",
  PublishService: "PublishServiceT",
} as const;
