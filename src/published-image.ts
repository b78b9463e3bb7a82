/**
 * @fileoverview Verifies that the built image is available from the publish registry and works out
 * which manifest media types it is served with.
 */

import * as core from '@actions/core';
import { sortBy, uniq } from 'lodash';

import { BuildContext, ExitStep, PostBuildStep } from './build-steps';
import { deriveExpectations, PollTiming, RegistryDigestPoller } from './digest-poller';
import { ImageRuntime } from './docker-command';
import { PlatformArchMapping } from './platform-mapping';
import { MEDIA_TYPES, RegistryCredential } from './registry-client';

/**
 * How the image reached the publish registry besides the schema 2 push.
 * - `v1`: legacy v1 push
 * - `v2-schema1`: schema 1 manifests synced to the registry
 */
export type PushKind = 'v1' | 'v2-schema1';

export const PUSH_KINDS: readonly PushKind[] = ['v1', 'v2-schema1'];

const PUSH_KIND_MEDIA_TYPES: Readonly<Record<PushKind, string>> = {
  v1: MEDIA_TYPES.DOCKER_V1,
  'v2-schema1': MEDIA_TYPES.DOCKER_V2_SCHEMA1,
};

export type VerifyOptions = {
  readonly insecure: boolean;
  readonly credential?: RegistryCredential;
  readonly timing: PollTiming;
  readonly expectV2Schema2: boolean;
  readonly pushKinds: readonly PushKind[];
  readonly mapping?: PlatformArchMapping;
};

export type VerificationResult = {
  readonly skipped: boolean;
  /** The image that was verified */
  readonly image?: string;
  /** Sorted manifest media types the image is available as */
  readonly mediaTypes: readonly string[];
  /** Image ID, known only when the image had to be pulled */
  readonly imageId?: string;
};

export type VerifyCollaborators = {
  readonly poller: RegistryDigestPoller;
  readonly runtime: Pick<ImageRuntime, 'pullImage' | 'inspectImage'>;
};

const SKIPPED: VerificationResult = { skipped: true, mediaTypes: [] };

function sortedMediaTypes(mediaTypes: readonly string[]): string[] {
  return sortBy(uniq(mediaTypes));
}

/**
 * Checks the published image and reports its media types.
 *
 * @param context - Build facts
 * @param options - Registry access and what was pushed
 * @param collaborators - Digest poller and image runtime
 * @returns The media types, and the image ID when the image was pulled
 */
export async function verifyPublishedImage(
  context: BuildContext,
  options: VerifyOptions,
  collaborators: VerifyCollaborators
): Promise<VerificationResult> {
  if (context.buildFailed) {
    core.info('Build failed, not verifying the published image');
    return SKIPPED;
  }

  const [uniqueImage] = context.uniqueImages;
  const [registry] = context.registries;
  if (!uniqueImage || !registry) {
    throw new Error('Cannot verify the published image: a unique image name and a publish registry are required');
  }

  const image = uniqueImage.withRegistry(registry.uri);
  const imageName = image.toString();
  const mediaTypes = options.pushKinds.map((kind) => PUSH_KIND_MEDIA_TYPES[kind]);

  if (registry.serverSideSync) {
    const expectations = deriveExpectations({
      expectV2Schema2: options.expectV2Schema2,
      manifestListGrouped: context.manifestListGrouped,
      expectedPlatforms: context.expectedPlatforms,
      mapping: options.mapping,
    });
    const digests = await collaborators.poller.pollUntilMatch(
      image,
      { registry: registry.uri, insecure: options.insecure, credential: options.credential },
      expectations,
      options.timing
    );

    if (digests.v2List) {
      core.info('Manifest list found');
      mediaTypes.push(MEDIA_TYPES.DOCKER_V2_MANIFEST_LIST);
      if (expectations.has('v2-schema2-list-only')) {
        return { skipped: false, image: imageName, mediaTypes: [MEDIA_TYPES.DOCKER_V2_MANIFEST_LIST] };
      }
    }

    if (digests.v2) {
      core.info('V2 schema 2 digest found, returning');
      mediaTypes.push(MEDIA_TYPES.DOCKER_V2_SCHEMA2);
      return { skipped: false, image: imageName, mediaTypes: sortedMediaTypes(mediaTypes) };
    }

    core.info('No schema 2 digest found, pulling the image');
  }

  const localName = await collaborators.runtime.pullImage(image, options.insecure);
  context.ledger.record(localName);
  const metadata = await collaborators.runtime.inspectImage(localName);
  core.info(`Published image ${imageName} has image ID ${metadata.Id}`);

  return { skipped: false, image: imageName, mediaTypes: sortedMediaTypes(mediaTypes), imageId: metadata.Id };
}

/**
 * Runs the verification either right after the build or when the job ends.
 */
export class PublishedImageVerifier implements PostBuildStep<VerificationResult>, ExitStep<VerificationResult> {
  private readonly options: VerifyOptions;
  private readonly collaborators: VerifyCollaborators;

  constructor(options: VerifyOptions, collaborators: VerifyCollaborators) {
    this.options = options;
    this.collaborators = collaborators;
  }

  runAsPostBuild(context: BuildContext): Promise<VerificationResult> {
    return verifyPublishedImage(context, this.options, this.collaborators);
  }

  runAsExit(context: BuildContext): Promise<VerificationResult> {
    return verifyPublishedImage(context, this.options, this.collaborators);
  }
}
