import { ImageReferenceValidator } from "./image-reference.validator.server";
import { SkopeoInspectValidator } from "./skopeo-inspect.validator.server";

test("ImageReference", () => {
  const valid = [
    { namespace: "library", project: "ubuntu", tag: "22.04" },
    { registry: "registry.example.com:5000", namespace: "team/tools", project: "build-env", tag: "v1" },
    { namespace: "a", project: "b__c", tag: "_latest", digest: "sha256:ab" },
  ];
  for (const value of valid) {
    expect(ImageReferenceValidator.SafeParse(value).success).toBe(true);
  }
  const invalid = [
    { namespace: "Library", project: "ubuntu", tag: "latest" },
    { namespace: "library", project: "..", tag: "latest" },
    { namespace: "library/", project: "ubuntu", tag: "latest" },
    { namespace: "library", project: "ubuntu", tag: ".hidden" },
    { namespace: "library", project: "ubuntu", tag: "a/b" },
    { registry: "https://registry.example.com", namespace: "a", project: "b", tag: "c" },
  ];
  for (const value of invalid) {
    expect(ImageReferenceValidator.SafeParse(value).success).toBe(false);
  }
});

test("SkopeoInspect", () => {
  expect(SkopeoInspectValidator.Parse({ Name: "x", Digest: "sha256:00", Layers: [] }).Digest).toBe(
    "sha256:00",
  );
  expect(() => SkopeoInspectValidator.Parse({ Name: "x" })).toThrow(/Digest/);
});
