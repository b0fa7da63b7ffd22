import { ImageReference } from "./image-reference";

import { ValidationError } from "~/schema/utils.server";

test.concurrent("name joins the non-empty parts", async () => {
  const withRegistry = ImageReference.create({
    registry: "registry.example.com",
    namespace: "team",
    project: "tools",
    tag: "v2",
  });
  expect(withRegistry.name()).toBe("registry.example.com/team/tools:v2");

  const withoutRegistry = ImageReference.create({ namespace: "library", project: "ubuntu" });
  expect(withoutRegistry.tag).toBe("latest");
  expect(withoutRegistry.name()).toBe("library/ubuntu:latest");
  expect(withoutRegistry.toString()).toBe("library/ubuntu:latest");
});

test.concurrent("references are immutable", async () => {
  const ref = ImageReference.create({ namespace: "library", project: "ubuntu" });
  expect(Object.isFrozen(ref)).toBe(true);
});

test.concurrent("parse", async () => {
  const cases: [string, string | undefined, string, string, string, string | undefined][] = [
    ["ubuntu", undefined, "library", "ubuntu", "latest", undefined],
    ["ubuntu:22.04", undefined, "library", "ubuntu", "22.04", undefined],
    ["docker://team/tools:v1", undefined, "team", "tools", "v1", undefined],
    ["localhost:5000/tools", "localhost:5000", "library", "tools", "latest", undefined],
    [
      "registry.example.com/org/team/tools:v1@sha256:00",
      "registry.example.com",
      "org/team",
      "tools",
      "v1",
      "sha256:00",
    ],
    ["team/tools@sha256:11", undefined, "team", "tools", "latest", "sha256:11"],
  ];
  for (const [input, registry, namespace, project, tag, digest] of cases) {
    const ref = ImageReference.parse(input);
    expect([ref.registry, ref.namespace, ref.project, ref.tag, ref.digest]).toEqual([
      registry,
      namespace,
      project,
      tag,
      digest,
    ]);
  }
  expect(ImageReference.parse("team/tools@sha256:11").toString()).toBe(
    "team/tools:latest@sha256:11",
  );
});

test.concurrent("parse rejects references that are not safe path segments", async () => {
  for (const input of ["team/../tools", "Team/tools", "team/tools:", "team/tools:a/b", ""]) {
    expect(() => ImageReference.parse(input)).toThrow(ValidationError);
  }
});
