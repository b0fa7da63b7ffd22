import type { Static } from "@sinclair/typebox";
import type { Any } from "ts-toolbelt";

import { ImageReferenceSchema } from "~/schema/image-reference.schema.server";
import { compileSchema } from "~/schema/utils.server";

export type ImageReferenceFields = Any.Compute<Static<typeof ImageReferenceSchema>>;
export const ImageReferenceValidator = compileSchema(ImageReferenceSchema);
