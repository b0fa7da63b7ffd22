import type { Static } from "@sinclair/typebox";
import type { Any } from "ts-toolbelt";

import { SkopeoInspectSchema } from "~/schema/skopeo-inspect.schema.server";
import { compileSchema } from "~/schema/utils.server";

export type SkopeoInspect = Any.Compute<Static<typeof SkopeoInspectSchema>>;
export const SkopeoInspectValidator = compileSchema(SkopeoInspectSchema);
