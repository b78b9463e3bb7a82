/**
 * @fileoverview Resolves manifest lists of parent images and checks their architecture coverage.
 * One resolver belongs to one build: its cache is never shared between builds.
 */

import * as core from '@actions/core';
import { difference, uniq } from 'lodash';

import {
  MalformedConfigBlobError,
  ManifestListUnavailableError,
  MissingArchitecturesError,
  PlatformMappingError,
} from './errors';
import { ImageReference } from './image-reference';
import { PlatformArchMapping } from './platform-mapping';
import { ManifestList, RegistryApi, RegistryCredential, RegistryEndpoint } from './registry-client';

/**
 * Labels of the image config that together name the tag a manifest list is published under.
 */
const VERSION_LABEL = 'version';
const RELEASE_LABEL = 'release';

export type ManifestListResolverOptions = {
  readonly insecure: boolean;
  readonly credential?: RegistryCredential;
  readonly mapping?: PlatformArchMapping;
};

/**
 * Fetches and caches manifest lists for one build.
 */
export class ManifestListResolver {
  private readonly registryApi: RegistryApi;
  private readonly options: ManifestListResolverOptions;
  private readonly cache = new Map<string, ManifestList | undefined>();

  constructor(registryApi: RegistryApi, options: ManifestListResolverOptions) {
    this.registryApi = registryApi;
    this.options = options;
  }

  /**
   * Returns the manifest list of an image, fetching it at most once per reference.
   *
   * A digest reference whose manifest list cannot be found is retried under the tag
   * `version-release` read from its config blob, because manifest lists are sometimes
   * only discoverable by tag.
   *
   * @param image - Image to look up
   * @returns The manifest list, or undefined when the image has none
   */
  async getManifestList(image: ImageReference): Promise<ManifestList | undefined> {
    if (this.cache.has(image.key)) {
      return this.cache.get(image.key);
    }

    if (!image.registry) {
      core.debug(`Cannot fetch manifest list for ${image.toString()} because it names no registry`);
      this.cache.set(image.key, undefined);
      return undefined;
    }

    const endpoint = this.endpointFor(image.registry);
    let fetchedAs = image;
    let manifestList = await this.registryApi.fetchManifestList(image, endpoint);

    if (!manifestList && image.isDigestAddressed) {
      const configBlob = await this.registryApi.fetchConfigBlob(image, endpoint);
      const version = configBlob.labels[VERSION_LABEL];
      const release = configBlob.labels[RELEASE_LABEL];
      if (!version) {
        throw new MalformedConfigBlobError(image.toString(), `no '${VERSION_LABEL}' label`);
      }
      if (!release) {
        throw new MalformedConfigBlobError(image.toString(), `no '${RELEASE_LABEL}' label`);
      }

      fetchedAs = image.withTag(`${version}-${release}`);
      core.info(`No manifest list for ${image.toString()}, trying ${fetchedAs.toString()}`);
      manifestList = await this.registryApi.fetchManifestList(fetchedAs, endpoint);
    }

    this.cache.set(image.key, manifestList);
    this.cache.set(fetchedAs.key, manifestList);
    return manifestList;
  }

  /**
   * Fetches the manifest list and checks that it covers the required architectures.
   *
   * @param image - Image to resolve
   * @param requiredArchitectures - Architectures the list must contain; empty skips the check
   * @returns The manifest list, or undefined when the image has none
   * @throws MissingArchitecturesError when a required architecture is absent
   */
  async resolve(image: ImageReference, requiredArchitectures: readonly string[] = []): Promise<ManifestList | undefined> {
    const manifestList = await this.getManifestList(image);
    if (!manifestList || requiredArchitectures.length === 0) {
      return manifestList;
    }

    const presentArchitectures = uniq(manifestList.manifests.map((manifest) => manifest.architecture));
    const missingArchitectures = difference(uniq(requiredArchitectures), presentArchitectures).sort();

    core.info(
      `Manifest list arches: ${presentArchitectures.join(', ')}, expected arches: ${uniq(requiredArchitectures).join(', ')}`
    );
    if (missingArchitectures.length > 0) {
      throw new MissingArchitecturesError(image.toString(), missingArchitectures);
    }
    return manifestList;
  }

  /**
   * @param image - Image whose manifest list to search
   * @param architecture - Registry architecture, e.g. `arm64`
   * @returns The image pinned to that architecture's digest, or undefined when not listed
   */
  async architectureDigest(image: ImageReference, architecture: string): Promise<ImageReference | undefined> {
    const manifestList = await this.getManifestList(image);
    const entry = manifestList?.manifests.find((manifest) => manifest.architecture === architecture);
    return entry ? image.withDigest(entry.digest) : undefined;
  }

  /**
   * Ensures the image provides every platform the build expects.
   *
   * Validation is skipped, with an info message, for single-platform builds, images without a
   * registry, and when the platform descriptors cannot map the expected platforms.
   *
   * @param image - Parent image
   * @param expectedPlatforms - Logical platforms of the build, if known
   * @throws ManifestListUnavailableError when the image has no manifest list
   * @throws MissingArchitecturesError when the list lacks an expected architecture
   */
  async validatePlatforms(image: ImageReference, expectedPlatforms: readonly string[] | undefined): Promise<void> {
    if (!expectedPlatforms || expectedPlatforms.length === 0) {
      core.info('Skipping validation of available platforms because expected platforms are unknown');
      return;
    }
    if (expectedPlatforms.length === 1) {
      core.info('Skipping validation of available platforms for base image because this is a single platform build');
      return;
    }
    if (!image.registry) {
      core.info('Cannot validate available platforms for base image because base image registry is not defined');
      return;
    }

    const expectedArchitectures = this.mapPlatforms(expectedPlatforms);
    if (!expectedArchitectures) {
      core.info('Cannot validate available platforms for base image because platform descriptors are not defined');
      return;
    }

    const manifestList = await this.resolve(image, expectedArchitectures);
    if (!manifestList) {
      throw new ManifestListUnavailableError(image.toString());
    }

    core.info('Base image is a manifest list for all required platforms');
  }

  /**
   * Picks the image to use when the build runs on a platform the manifest list may not contain.
   *
   * When the current platform is missing, the reference is pinned to the digest of the last
   * platform the list does contain. This is a best-effort policy: when the list or the platform
   * descriptors are unavailable the image is returned unchanged.
   *
   * @param image - Parent image
   * @param currentPlatform - Logical platform the build is running on
   * @returns The image to pull
   */
  async imageForPlatform(image: ImageReference, currentPlatform: string): Promise<ImageReference> {
    const manifestList = await this.getManifestList(image);
    if (!manifestList) {
      return image;
    }

    const { mapping } = this.options;
    if (!mapping) {
      core.info('Cannot validate available platforms for base image because platform descriptors are not defined');
      return image;
    }

    try {
      const imagesByPlatform = new Map<string, ImageReference>();
      let presentPlatform: string | undefined;
      for (const manifest of manifestList.manifests) {
        presentPlatform = mapping.architectureToPlatform(manifest.architecture);
        imagesByPlatform.set(presentPlatform, image.withDigest(manifest.digest));
      }

      if (presentPlatform === undefined || imagesByPlatform.has(currentPlatform)) {
        return image;
      }

      const replacement = imagesByPlatform.get(presentPlatform) ?? image;
      core.info(
        `Platform ${currentPlatform} is not in the manifest list of ${image.toString()}, using ${replacement.toString()}`
      );
      return replacement;
    } catch (error) {
      if (error instanceof PlatformMappingError) {
        core.info('Cannot validate available platforms for base image because platform descriptors are not defined');
        return image;
      }
      throw error;
    }
  }

  private mapPlatforms(platforms: readonly string[]): string[] | undefined {
    const { mapping } = this.options;
    if (!mapping) {
      return undefined;
    }
    try {
      return platforms.map((platform) => mapping.platformToArchitecture(platform));
    } catch (error) {
      if (error instanceof PlatformMappingError) {
        core.debug(error.message);
        return undefined;
      }
      throw error;
    }
  }

  private endpointFor(registry: string): RegistryEndpoint {
    return { registry, insecure: this.options.insecure, credential: this.options.credential };
  }
}
