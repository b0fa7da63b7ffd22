// A small token-keyed injector. Providers are declared in dependency order,
// classes and factories list the tokens they need in a static `inject` array.

import { match } from "ts-pattern";
import type { Any } from "ts-toolbelt";

import { InjectValidator } from "./inject.validator.server";

import type { valueof } from "~/types/utils";

export type Scope = valueof<typeof Scope>;
export const Scope = {
  Transient: "transient",
  Singleton: "singleton",
} as const;

// Constructor and factory arguments come from other providers, so their types
// cannot be checked here. The `inject` arrays are validated at runtime instead.
/* eslint-disable @typescript-eslint/no-explicit-any */
export type Provide<V> =
  | { value: V; class?: undefined; factory?: undefined }
  | { class: new (...args: any[]) => V; value?: undefined; factory?: undefined }
  | { factory: (...args: any[]) => V; value?: undefined; class?: undefined };
/* eslint-enable @typescript-eslint/no-explicit-any */

export type ProviderValue<P> = P extends Provider<infer _, infer V> ? V : never;

export type Provider<T extends string, V> = {
  token: T;
  scope?: Scope;
  provide: Provide<V>;
};

export type GenericProviderMap<T> = T extends {
  [key in keyof T]: Provider<infer _1, infer _2>;
}
  ? {
      [K in keyof T & string as T[K]["token"]]: T[K]["provide"] extends Provide<infer V>
        ? V
        : never;
    }
  : never;

export type ProvidersOverrides<T> = T extends { [_1 in keyof T]: Provider<infer _2, infer _3> }
  ? { [K in keyof T & string as T[K]["token"]]?: Omit<Provider<"", ProviderValue<T[K]>>, "token"> }
  : never;

type ResolveResult<M, K extends keyof M> = Any.Equals<M[K], unknown> extends 0 ? M[K] : never;

const getInject = (provider: Provider<string, unknown>): string[] | undefined => {
  const target: unknown = provider.provide.class ?? provider.provide.factory;
  const inject = typeof target === "function" && "inject" in target ? target.inject : void 0;
  const { success, value } = InjectValidator.SafeParse(inject);
  if (!success) {
    throw new Error(`Invalid inject value for provider ${provider.token}`);
  }
  return value;
};

export class Injector<M> {
  private readonly providers = new Map<string, () => unknown>();

  constructor(providers: readonly Provider<string, unknown>[]) {
    for (const provider of providers) {
      const paramFns: (() => unknown)[] = [];
      for (const token of getInject(provider) ?? []) {
        const dependencyProvider = this.providers.get(token);
        if (dependencyProvider == null) {
          throw new Error(`Missing dependency ${token} for provider ${provider.token}`);
        }
        paramFns.push(dependencyProvider);
      }

      const getValue = (): unknown => {
        const provide = provider.provide;
        const params = paramFns.map((fn) => fn());
        if (provide.class != null) {
          return new provide.class(...params);
        } else if (provide.factory != null) {
          return provide.factory(...params);
        } else if (provide.value !== void 0) {
          return provide.value;
        }
        throw new Error(`Invalid provide value for provider ${provider.token}`);
      };

      match(provider.scope ?? Scope.Singleton)
        .with(Scope.Transient, () => {
          this.providers.set(provider.token, getValue);
        })
        .with(Scope.Singleton, () => {
          const value = getValue();
          this.providers.set(provider.token, () => value);
        })
        .exhaustive();
    }
  }

  resolve<K extends keyof M & string>(token: K): ResolveResult<M, K> {
    const provider = this.providers.get(token);
    if (provider == null) {
      throw new Error(`Missing provider for token ${token}`);
    }
    // The provider registered under `token` produces `M[K]` by construction.
    return provider() as ResolveResult<M, K>;
  }
}
