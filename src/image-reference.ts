/**
 * @fileoverview Immutable image reference value type.
 * Parses and prints `[registry/][namespace/]repository[:tag][@digest]` and provides the
 * structural key used to cache registry lookups.
 */

/**
 * Fields of an image reference.
 */
export type ImageReferenceFields = {
  readonly registry?: string;
  readonly namespace?: string;
  readonly repository: string;
  readonly tag?: string;
  readonly digest?: string;
};

/**
 * Namespace that Docker Hub style registries use for official images.
 */
export const DEFAULT_NAMESPACE = 'library';

/**
 * Checks whether the first path component of an image name is a registry host.
 * Follows the Docker convention: a host contains a dot or a port, or is `localhost`.
 *
 * @param component - The text before the first slash
 * @returns True if the component names a registry
 */
function isRegistryComponent(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}

/**
 * Identifies an image by registry, namespace, repository and either a tag or a digest.
 * A digest-addressed reference is an immutable identity; a tag-addressed one is a mutable pointer.
 */
export class ImageReference {
  readonly registry?: string;
  readonly namespace?: string;
  readonly repository: string;
  readonly tag?: string;
  readonly digest?: string;

  private constructor(fields: ImageReferenceFields) {
    if (!fields.repository) {
      throw new Error('Image reference requires a repository');
    }
    this.registry = fields.registry || undefined;
    this.namespace = fields.namespace || undefined;
    this.repository = fields.repository;
    // A digest pins the content, so a tag next to it means nothing for pulls
    this.digest = fields.digest || undefined;
    this.tag = this.digest ? undefined : fields.tag || undefined;
  }

  /**
   * Creates a reference from its fields.
   *
   * @param fields - Reference components
   * @returns The new reference
   */
  static of(fields: ImageReferenceFields): ImageReference {
    return new ImageReference(fields);
  }

  /**
   * Parses an image name.
   *
   * @param imageName - Image name, e.g. `registry.example.com:5000/ns/app:1.0` or `app@sha256:...`
   * @returns The parsed reference
   * @example
   * // { registry: 'quay.io', namespace: 'team', repository: 'base', tag: '8.1' }
   * ImageReference.parse('quay.io/team/base:8.1')
   */
  static parse(imageName: string): ImageReference {
    const trimmed = imageName.trim();
    if (!trimmed) {
      throw new Error('Cannot parse an empty image name');
    }

    const [nameWithTag, digest] = trimmed.split('@', 2);

    const lastSlash = nameWithTag.lastIndexOf('/');
    const lastColon = nameWithTag.lastIndexOf(':');
    const hasTag = lastColon > lastSlash;
    const name = hasTag ? nameWithTag.slice(0, lastColon) : nameWithTag;
    const tag = hasTag ? nameWithTag.slice(lastColon + 1) : undefined;

    const components = name.split('/');
    const registry = components.length > 1 && isRegistryComponent(components[0]) ? components.shift() : undefined;
    const namespace = components.length > 1 ? components.shift() : undefined;

    return new ImageReference({
      registry,
      namespace,
      repository: components.join('/'),
      tag,
      digest,
    });
  }

  /**
   * Repository path as used by the registry HTTP API (`namespace/repository`).
   */
  get repositoryPath(): string {
    return this.namespace ? `${this.namespace}/${this.repository}` : this.repository;
  }

  /**
   * Tag or digest used when asking a registry for a manifest.
   */
  get manifestReference(): string {
    return this.digest ?? this.tag ?? 'latest';
  }

  get isDigestAddressed(): boolean {
    return this.digest !== undefined;
  }

  /**
   * Canonical string form, used as the cache key.
   */
  get key(): string {
    return this.toString();
  }

  withRegistry(registry: string | undefined): ImageReference {
    return new ImageReference({ ...this.fields(), registry });
  }

  withNamespace(namespace: string | undefined): ImageReference {
    return new ImageReference({ ...this.fields(), namespace });
  }

  withTag(tag: string): ImageReference {
    return new ImageReference({ ...this.fields(), tag, digest: undefined });
  }

  withDigest(digest: string): ImageReference {
    return new ImageReference({ ...this.fields(), tag: undefined, digest });
  }

  /**
   * Prints the reference, optionally without its tag or digest.
   *
   * @param includeReference - Whether to append `:tag` or `@digest`
   * @returns Image name string
   */
  toString(includeReference = true): string {
    const name = this.registry ? `${this.registry}/${this.repositoryPath}` : this.repositoryPath;
    if (!includeReference) {
      return name;
    }
    if (this.digest) {
      return `${name}@${this.digest}`;
    }
    return this.tag ? `${name}:${this.tag}` : name;
  }

  private fields(): ImageReferenceFields {
    return {
      registry: this.registry,
      namespace: this.namespace,
      repository: this.repository,
      tag: this.tag,
      digest: this.digest,
    };
  }
}
