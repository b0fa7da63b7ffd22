import type { Provider } from "./injector.server";

/**
 * Replaces the `provide` and `scope` of every provider whose token appears in `overrides`,
 * keeping the original order so that dependencies are still declared before their users.
 */
export const overrideProviders = (
  providers: readonly Provider<string, unknown>[],
  overrides: Partial<Record<string, Omit<Provider<"", unknown>, "token">>>,
): Provider<string, unknown>[] =>
  providers.map((provider) => {
    const override = overrides[provider.token];
    return override != null ? { token: provider.token, ...override } : provider;
  });
