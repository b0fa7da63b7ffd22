import {
  type ImageReferenceFields,
  ImageReferenceValidator,
} from "~/schema/image-reference.validator.server";

const DEFAULT_TAG = "latest";
const DEFAULT_NAMESPACE = "library";
const TRANSPORT_PREFIX = "docker://";

/**
 * Identifies a source image. Construct it through `ImageReference.create` or `ImageReference.parse`,
 * both of which validate every field, so namespace, project and tag are safe path segments.
 */
export class ImageReference {
  readonly registry: string | undefined;
  readonly namespace: string;
  readonly project: string;
  readonly tag: string;
  readonly digest: string | undefined;

  private constructor(fields: ImageReferenceFields) {
    this.registry = fields.registry;
    this.namespace = fields.namespace;
    this.project = fields.project;
    this.tag = fields.tag;
    this.digest = fields.digest;
    Object.freeze(this);
  }

  static create(
    fields: Omit<ImageReferenceFields, "tag"> & { tag?: string | undefined },
  ): ImageReference {
    return new ImageReference(
      ImageReferenceValidator.Parse({ ...fields, tag: fields.tag ?? DEFAULT_TAG }),
    );
  }

  /**
   * Parses `[docker://][registry/]namespace/project[:tag][@digest]`.
   * The first component is treated as a registry when it looks like a host (contains `.` or `:`,
   * or is `localhost`) and more components follow. A lone project gets the `library` namespace.
   */
  static parse(ref: string): ImageReference {
    let rest = ref.startsWith(TRANSPORT_PREFIX) ? ref.slice(TRANSPORT_PREFIX.length) : ref;

    let digest: string | undefined = void 0;
    const at = rest.indexOf("@");
    if (at !== -1) {
      digest = rest.slice(at + 1);
      rest = rest.slice(0, at);
    }

    let tag: string | undefined = void 0;
    const lastSlash = rest.lastIndexOf("/");
    const colon = rest.indexOf(":", lastSlash + 1);
    if (colon !== -1) {
      tag = rest.slice(colon + 1);
      rest = rest.slice(0, colon);
    }

    const components = rest.split("/");
    let registry: string | undefined = void 0;
    const first = components[0];
    if (
      components.length > 1 &&
      first !== void 0 &&
      (first.includes(".") || first.includes(":") || first === "localhost")
    ) {
      registry = first;
      components.shift();
    }
    const project = components.pop() ?? "";
    const namespace = components.length > 0 ? components.join("/") : DEFAULT_NAMESPACE;

    return ImageReference.create({
      ...(registry !== void 0 ? { registry } : {}),
      namespace,
      project,
      tag,
      ...(digest !== void 0 ? { digest } : {}),
    });
  }

  /** Composite name used to address the builder and the resolver, e.g. `registry/namespace/project:tag`. */
  name(): string {
    return [this.registry, this.namespace, this.project].filter(Boolean).join("/") + ":" + this.tag;
  }

  toString(): string {
    return this.digest !== void 0 ? `${this.name()}@${this.digest}` : this.name();
  }
}
