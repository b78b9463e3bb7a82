/**
 * @fileoverview Pulls a parent image and tags it under a name unique to this build.
 *
 * Builds on the same host share the local image store and remove the images they pulled when they
 * finish. A build can therefore lose its freshly pulled image to another build's cleanup between
 * the pull and the tag, in which case the image is simply pulled again.
 */

import * as core from '@actions/core';

import { ImageRuntime } from './docker-command';
import { ImageNotFoundError, ImagePullError, PullTagExhaustedError } from './errors';
import { DEFAULT_NAMESPACE, ImageReference } from './image-reference';
import { PulledImagesLedger } from './pulled-images-ledger';

/**
 * Upper bound on pulls for one image. The race should never need this many, it only guarantees termination.
 */
export const MAX_PULL_TAG_ATTEMPTS = 20;

/**
 * States of one pull-and-tag run.
 */
export type PullTagState = 'pulling' | 'retrying-with-namespace' | 'tagging' | 'retrying-after-removal';

export type PullAttemptOutcome = 'success' | 'retryable-failure' | 'fatal-failure';

/**
 * One pull-and-tag cycle.
 */
export type PullAttempt = {
  readonly state: PullTagState;
  readonly source: string;
  readonly target: string;
  readonly outcome: PullAttemptOutcome;
};

export type PullAndTagOptions = {
  /** Registry to pull from instead of the one in the source reference */
  readonly registry?: string;
  readonly insecure: boolean;
  /** Repository name of the unique tag, usually the build name */
  readonly uniqueName: string;
  /** Tag of the unique name, distinguishing parent images of one build */
  readonly nonce: string;
};

export type PullAndTagResult = {
  /** The unique reference */
  readonly image: ImageReference;
  /** The reference that was pulled, after any registry override and namespace retry */
  readonly source: ImageReference;
  readonly attempts: readonly PullAttempt[];
};

/**
 * Runs the pull-and-tag protocol against the local image store.
 */
export class PullAndTagEngine {
  private readonly runtime: Pick<ImageRuntime, 'pullImage' | 'tagImage'>;
  private readonly ledger: PulledImagesLedger;

  constructor(runtime: Pick<ImageRuntime, 'pullImage' | 'tagImage'>, ledger: PulledImagesLedger) {
    this.runtime = runtime;
    this.ledger = ledger;
  }

  /**
   * Pulls the image and tags it as `uniqueName:nonce`.
   *
   * A failed pull of an image without a namespace is retried once under `library/`. If that retry
   * fails too, the first failure is reported since it names the image the caller asked for.
   *
   * @param sourceImage - Image to pull
   * @param options - Registry override and unique name
   * @returns The unique reference, the reference actually pulled and the attempts it took
   * @throws ImagePullError when the pull fails for good
   * @throws PullTagExhaustedError after {@link MAX_PULL_TAG_ATTEMPTS} pulls
   */
  async pullAndTag(sourceImage: ImageReference, options: PullAndTagOptions): Promise<PullAndTagResult> {
    const target = ImageReference.of({ repository: options.uniqueName, tag: options.nonce });
    const attempts: PullAttempt[] = [];

    let image = options.registry ? sourceImage.withRegistry(options.registry) : sourceImage;
    let state: PullTagState = 'pulling';
    let firstFailure: ImagePullError | undefined;

    const recordAttempt = (outcome: PullAttemptOutcome): void => {
      attempts.push({ state, source: image.toString(), target: target.toString(), outcome });
      core.debug(`Pull attempt ${attempts.length} (${state}) for ${image.toString()}: ${outcome}`);
    };

    while (attempts.length < MAX_PULL_TAG_ATTEMPTS) {
      let localName: string;
      try {
        localName = await this.runtime.pullImage(image, options.insecure);
      } catch (error) {
        if (!(error instanceof ImagePullError)) {
          recordAttempt('fatal-failure');
          throw error;
        }
        if (firstFailure) {
          recordAttempt('fatal-failure');
          throw firstFailure;
        }
        if (image.namespace) {
          recordAttempt('fatal-failure');
          throw error;
        }

        recordAttempt('retryable-failure');
        core.info(`'${image.toString()}' not found`);
        firstFailure = error;
        image = image.withNamespace(DEFAULT_NAMESPACE);
        state = 'retrying-with-namespace';
        core.info(`trying '${image.toString()}'`);
        continue;
      }

      // Recorded right away so images from abandoned attempts are cleaned up too
      this.ledger.record(localName);
      state = 'tagging';

      try {
        core.info('tagging pulled image');
        const taggedName = await this.runtime.tagImage(localName, target);
        this.ledger.record(taggedName);
        recordAttempt('success');
        core.debug(`image '${localName}' is available as '${taggedName}'`);
        return { image: target, source: image, attempts };
      } catch (error) {
        if (!(error instanceof ImageNotFoundError)) {
          recordAttempt('fatal-failure');
          throw error;
        }
        // Another build removed the image after our pull; pull it again
        recordAttempt('retryable-failure');
        state = 'retrying-after-removal';
        core.info('re-pulling removed image');
      }
    }

    core.error('giving up trying to pull image');
    throw new PullTagExhaustedError(image.toString(), attempts.length);
  }
}
