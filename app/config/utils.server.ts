import type { valueof } from "~/types/utils";

export type Env = valueof<typeof Env>;
export const Env = {
  Production: "production",
  Development: "development",
  Test: "test",
} as const;

const isEnv = (value: string | undefined): value is Env =>
  Object.values<string | undefined>(Env).includes(value);

export const getEnv = (): Env => {
  const env = process.env.NODE_ENV;
  if (!isEnv(env)) {
    throw new Error(`Invalid NODE_ENV: ${env}. Must be one of ${Object.values(Env)}`);
  }
  return env;
};

/**
 * Reads an env var. The default is only used in development and tests,
 * in production a missing variable is an error.
 */
export const get = <D>(envVarName: string, defaultValue: D): string | D => {
  const envVar = process.env[envVarName];
  if (envVar == null) {
    const env = process.env.NODE_ENV;
    if (env === Env.Development || env === Env.Test) {
      return defaultValue;
    }
    throw new Error(`Missing env var ${envVarName}`);
  }
  return envVar;
};

export const getOneOf = <T extends string>(
  envVarName: string,
  allowedValues: readonly T[],
  defaultValue: T,
): T => {
  const value = process.env[envVarName] ?? defaultValue;
  const allowed = allowedValues.find((v) => v === value);
  if (allowed === void 0) {
    throw new Error(`Invalid ${envVarName}: ${value}. Must be one of ${allowedValues.join(", ")}`);
  }
  return allowed;
};

type ConfigGetter<T> = () => T;
export const makeConfig =
  <K extends string>() =>
  <V, T extends Record<K, ConfigGetter<V>>>(configGetters: T): T =>
    configGetters;
