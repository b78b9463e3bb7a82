/**
 * @fileoverview Build facts and step roles shared by the flows of this action.
 */

import { ImageReference } from './image-reference';
import { PulledImagesLedger } from './pulled-images-ledger';

/**
 * A registry the build publishes to.
 */
export type PublishRegistry = {
  readonly uri: string;
  /** Whether the registry syncs pushed content itself, so digests can be polled instead of pulled */
  readonly serverSideSync: boolean;
};

/**
 * The facts about the running build that the flows read. Passed explicitly to every flow.
 */
export type BuildContext = {
  /** Unique build name, used as the repository of uniquely tagged parent images */
  readonly uniqueBuildName: string;
  /** Image ID of the image change that triggered an automatic rebuild */
  readonly triggerImageId?: string;
  /** Logical platforms the build produces, when known */
  readonly expectedPlatforms?: readonly string[];
  /** Unique names the built image was pushed under */
  readonly uniqueImages: readonly ImageReference[];
  readonly registries: readonly PublishRegistry[];
  readonly ledger: PulledImagesLedger;
  /** Whether a manifest list grouping step ran and produced output */
  readonly manifestListGrouped: boolean;
  readonly buildFailed: boolean;
};

/**
 * A step that runs after the image is built, while the job is still running.
 */
export type PostBuildStep<TResult> = {
  runAsPostBuild(context: BuildContext): Promise<TResult>;
};

/**
 * A step that runs when the job ends, whatever its outcome.
 */
export type ExitStep<TResult> = {
  runAsExit(context: BuildContext): Promise<TResult>;
};

/**
 * Where a step that can play both roles is scheduled.
 */
export type StepRole = 'post-build' | 'exit';
