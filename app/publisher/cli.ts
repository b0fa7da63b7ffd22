import { parseArgs } from "util";

import { ImageReference } from "./image-reference";

import { ValidationError } from "~/schema/utils.server";

export const USAGE =
  "Usage: cvmfs-image-publish --image <[registry/]namespace/project[:tag][@digest]> " +
  "--filesystem <repository> [--root-subdir <dir>] [--digest <algorithm:hex>]";

export interface PublishArgs {
  imageRef: ImageReference;
  filesystem: string;
  rootSubdir: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${USAGE}`);
    this.name = this.constructor.name;
  }
}

export const parsePublishArgs = (argv: string[]): PublishArgs => {
  let values: { image?: string; filesystem?: string; "root-subdir"?: string; digest?: string };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        image: { type: "string" },
        filesystem: { type: "string" },
        "root-subdir": { type: "string" },
        digest: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new UsageError(String(err));
  }
  if (values.image === void 0) {
    throw new UsageError("Missing --image");
  }
  const filesystem = values.filesystem;
  if (filesystem === void 0 || filesystem === "") {
    throw new UsageError("Missing --filesystem");
  }
  if (filesystem.includes("/") || filesystem === "." || filesystem === "..") {
    throw new UsageError(`Invalid --filesystem: ${filesystem}`);
  }
  const rootSubdir = values["root-subdir"] ?? "";
  if (rootSubdir.split("/").includes("..")) {
    throw new UsageError(`Invalid --root-subdir, ".." is not allowed: ${rootSubdir}`);
  }
  return { imageRef: parseImageRef(values.image, values.digest), filesystem, rootSubdir };
};

const parseImageRef = (image: string, digest: string | undefined): ImageReference => {
  try {
    const imageRef = ImageReference.parse(image);
    if (digest === void 0) {
      return imageRef;
    }
    return ImageReference.create({
      ...(imageRef.registry !== void 0 ? { registry: imageRef.registry } : {}),
      namespace: imageRef.namespace,
      project: imageRef.project,
      tag: imageRef.tag,
      digest,
    });
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new UsageError(`Invalid --image ${image}: ${err.message}`);
    }
    throw err;
  }
};
