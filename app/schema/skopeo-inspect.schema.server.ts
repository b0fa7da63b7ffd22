import { Type as t } from "@sinclair/typebox";

/** The part of `skopeo inspect` output the resolver relies on. */
export const SkopeoInspectSchema = t.Object({
  Name: t.Optional(t.String()),
  Digest: t.String({ minLength: 1 }),
});
