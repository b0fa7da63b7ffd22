import { Type as t } from "@sinclair/typebox";

// Same component grammar as OCI image references, so every part is safe to use as a path segment.
const PATH_COMPONENT = "[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*";

export const ImageReferenceSchema = t.Object({
  registry: t.Optional(t.String({ pattern: "^[A-Za-z0-9.-]+(?::[0-9]+)?$", maxLength: 255 })),
  namespace: t.String({ pattern: `^${PATH_COMPONENT}(?:/${PATH_COMPONENT})*$`, maxLength: 255 }),
  project: t.String({ pattern: `^${PATH_COMPONENT}$`, maxLength: 255 }),
  tag: t.String({ pattern: "^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$" }),
  digest: t.Optional(t.String({ minLength: 1 })),
});
