import { makeConfig, get, getEnv, getOneOf } from "./utils.server";

import type { valueof } from "~/types/utils";

/**
 * What happens to a digest directory whose build failed.
 * `retain` leaves it for postmortem, `remove` deletes it before the error is reported.
 */
export type OrphanedBuildPolicy = valueof<typeof OrphanedBuildPolicy>;
export const OrphanedBuildPolicy = {
  Retain: "retain",
  Remove: "remove",
} as const;

export type Config = typeof config;
export const config = makeConfig()({
  env: getEnv,
  logLevel: () => get("LOG_LEVEL", "info"),
  publisher: () => ({
    // Repositories are mounted under <cvmfsRoot>/<filesystem>
    cvmfsRoot: get("PUBLISHER_CVMFS_ROOT", "/cvmfs"),
    // cvmfs_server keeps its per-repository state here, including the transaction lock
    spoolRoot: get("PUBLISHER_SPOOL_ROOT", "/var/spool/cvmfs"),
    // `get` is not used for the binaries because the defaults are right in production too
    cvmfsServerBin: process.env.PUBLISHER_CVMFS_SERVER_BIN ?? "cvmfs_server",
    singularityBin: process.env.PUBLISHER_SINGULARITY_BIN ?? "singularity",
    skopeoBin: process.env.PUBLISHER_SKOPEO_BIN ?? "skopeo",
    orphanedBuildPolicy: getOneOf(
      "PUBLISHER_ORPHANED_BUILD_POLICY",
      Object.values(OrphanedBuildPolicy),
      OrphanedBuildPolicy.Retain,
    ),
    registryUsername: process.env.PUBLISHER_REGISTRY_USERNAME ?? void 0,
    registryToken: process.env.PUBLISHER_REGISTRY_TOKEN ?? void 0,
  }),
});

export type PublisherConfig = ReturnType<Config["publisher"]>;

/** Lets tests replace parts of the publisher config. */
export type ConfigOverrides = {
  logLevel?: string;
  publisher?: Partial<PublisherConfig>;
};
