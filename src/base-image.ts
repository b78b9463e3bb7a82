/**
 * @fileoverview Pulls the parent images a build uses and tags each under a name unique to the build.
 *
 * When the build is an automatic rebuild, the base image is the one from the triggering image change
 * rather than the one named in the Dockerfile. Parent images may be forced to come from one registry.
 */

import * as core from '@actions/core';
import { sortBy, uniq } from 'lodash';

import { BuildContext } from './build-steps';
import { RegistryMismatchError } from './errors';
import { ImageReference } from './image-reference';
import { ManifestListResolver } from './manifest-list-resolver';
import { PullAndTagEngine } from './pull-and-tag';

export type BaseImageOptions = {
  /** Base image as named in the Dockerfile */
  readonly baseImage: string;
  /** Every parent image of the Dockerfile; the base image is added when missing */
  readonly parentImages: readonly string[];
  /** The only registry parent images may come from */
  readonly parentRegistry?: string;
  readonly parentRegistryInsecure: boolean;
  /** Validate that parent images provide all platforms expected for the build */
  readonly checkPlatforms: boolean;
  /** Logical platform the build is running on */
  readonly currentPlatform: string;
};

/**
 * Outcome for one parent image.
 */
export type ParentImageResult = {
  /** Parent image as named in the Dockerfile */
  readonly parent: string;
  /** Image that was actually pulled */
  readonly pulled: string;
  /** Unique name the pulled image is available under */
  readonly unique: string;
  readonly attempts: number;
  readonly isBaseImage: boolean;
};

export type BaseImageResult = {
  readonly parentImages: readonly ParentImageResult[];
  /** Unique name of the base image */
  readonly baseImage: string;
};

export type BaseImageCollaborators = {
  readonly resolver: ManifestListResolver;
  readonly engine: PullAndTagEngine;
};

/**
 * If this is an automatic rebuild, uses the image from the trigger instead of the Dockerfile base image.
 *
 * @param context - Build facts
 * @param baseImage - Base image named in the Dockerfile
 * @returns The base image to use
 */
export function resolveBaseImage(context: BuildContext, baseImage: ImageReference): ImageReference {
  if (context.triggerImageId) {
    core.info(`using ${context.triggerImageId} from build trigger as base image.`);
    return ImageReference.parse(context.triggerImageId);
  }
  core.info(`using ${baseImage.toString()} as base image.`);
  return baseImage;
}

/**
 * Makes sure the image comes from the configured parent registry.
 *
 * @param image - Parent image
 * @param parentRegistry - Registry parent images must come from, if any
 * @returns The image with the parent registry set
 * @throws RegistryMismatchError when the image names another registry
 */
export function ensureImageRegistry(image: ImageReference, parentRegistry: string | undefined): ImageReference {
  if (!parentRegistry) {
    return image;
  }
  if (image.registry && image.registry !== parentRegistry) {
    const error = new RegistryMismatchError(image.toString(), parentRegistry);
    core.error(error.message);
    throw error;
  }
  return image.withRegistry(parentRegistry);
}

/**
 * Pulls parent images and retags them uniquely for this build.
 * Images are processed in sorted order; the position in that order is the tag of the unique name.
 *
 * @param context - Build facts
 * @param options - Images and pull settings
 * @param collaborators - Manifest list resolver and pull-and-tag engine of this build
 * @returns The unique name of every parent image and of the base image
 */
export async function pullParentImages(
  context: BuildContext,
  options: BaseImageOptions,
  collaborators: BaseImageCollaborators
): Promise<BaseImageResult> {
  const baseImageName = ImageReference.parse(options.baseImage).toString();
  const parents = sortBy(uniq([...options.parentImages.map((p) => ImageReference.parse(p).toString()), baseImageName]));

  const results: ParentImageResult[] = [];
  for (const [nonce, parent] of parents.entries()) {
    const isBaseImage = parent === baseImageName;
    let image = ImageReference.parse(parent);
    if (isBaseImage) {
      image = resolveBaseImage(context, image);
    }
    image = ensureImageRegistry(image, options.parentRegistry);

    if (options.checkPlatforms) {
      await collaborators.resolver.validatePlatforms(image, context.expectedPlatforms);
      image = await collaborators.resolver.imageForPlatform(image, options.currentPlatform);
    }

    const { image: uniqueImage, source, attempts } = await collaborators.engine.pullAndTag(image, {
      insecure: options.parentRegistryInsecure,
      uniqueName: context.uniqueBuildName,
      nonce: String(nonce),
    });

    results.push({
      parent,
      pulled: source.toString(),
      unique: uniqueImage.toString(),
      attempts: attempts.length,
      isBaseImage,
    });
  }

  const base = results.find((result) => result.isBaseImage);
  if (!base) {
    throw new Error(`Base image ${baseImageName} was not processed`);
  }

  return { parentImages: results, baseImage: base.unique };
}
