import { ContentStoreService } from "./content-store/content-store.service";
import { hasOsReleaseFile } from "./content-store/os-root-detector";
import { factoryImageBuilder } from "./image-builder";
import { factoryImageResolver } from "./image-resolver";
import { PublishService } from "./publish.service";
import { TagLinkerService } from "./tag-linker/tag-linker.service";
import { factoryTransactionBackend } from "./transaction/transaction-backend";
import { TransactionService } from "./transaction/transaction.service";

import { config } from "~/config";
import type { GenericProviderMap, ProvidersOverrides } from "~/di/injector.server";
import { Injector } from "~/di/injector.server";
import { overrideProviders } from "~/di/utils.server";
import { newLogger } from "~/logger.server";
import { Token } from "~/token";

type Providers = typeof providers;
type ProviderMap = GenericProviderMap<Providers>;
export type PublisherProviderOverrides = ProvidersOverrides<Providers>;
export type PublisherInjector = Injector<ProviderMap>;

const providers = [
  { token: Token.Config, provide: { value: config } },
  { token: Token.Logger, provide: { factory: newLogger } },
  { token: Token.TransactionBackend, provide: { factory: factoryTransactionBackend } },
  { token: Token.TransactionService, provide: { class: TransactionService } },
  { token: Token.OsRootDetector, provide: { value: hasOsReleaseFile } },
  { token: Token.ContentStoreService, provide: { class: ContentStoreService } },
  { token: Token.TagLinkerService, provide: { class: TagLinkerService } },
  { token: Token.ImageBuilder, provide: { factory: factoryImageBuilder } },
  { token: Token.ImageResolver, provide: { factory: factoryImageResolver } },
  { token: Token.PublishService, provide: { class: PublishService } },
] as const;

export const createPublisherInjector = (
  overrides?: PublisherProviderOverrides,
): PublisherInjector => {
  return new Injector<ProviderMap>(overrideProviders(providers, overrides ?? {}));
};
