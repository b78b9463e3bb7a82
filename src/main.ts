/**
 * @fileoverview Main entry point of the action.
 * Pulls and uniquely tags the parent images of a build, or verifies the image the build published.
 */

import * as core from '@actions/core';

import { logVerification, setPullOutputs, setVerifyOutputs, writePullSummary } from './action-outputs';
import { pullParentImages } from './base-image';
import { BuildContext } from './build-steps';
import { ActionConfig, getActionConfig, PullConfig, VerifyConfig } from './config';
import { RegistryDigestPoller } from './digest-poller';
import { dockerRuntime } from './docker-command';
import { getErrorMessage } from './errors';
import { ImageReference } from './image-reference';
import { ManifestListResolver } from './manifest-list-resolver';
import { resolveCurrentPlatform } from './oci-platform';
import { PublishedImageVerifier } from './published-image';
import { PullAndTagEngine } from './pull-and-tag';
import { ActionStateLedger, PulledImagesLedger, readPulledImages } from './pulled-images-ledger';
import { RegistryClient } from './registry-client';

/**
 * Collects the build facts the flows read.
 *
 * @param config - Action configuration
 * @param ledger - Ledger of pulled images
 */
export function createBuildContext(config: ActionConfig, ledger: PulledImagesLedger): BuildContext {
  return {
    uniqueBuildName: config.buildName,
    triggerImageId: config.triggerImageId,
    expectedPlatforms: config.platforms,
    uniqueImages: (config.verify?.images ?? []).map((image) => ImageReference.parse(image)),
    registries: config.verify ? [{ uri: config.verify.registry, serverSideSync: config.verify.serverSideSync }] : [],
    ledger,
    manifestListGrouped: config.verify?.manifestListGrouped ?? false,
    buildFailed: config.buildFailed,
  };
}

/**
 * Creates the published image verifier for the configuration.
 */
export function createVerifier(config: ActionConfig, verify: VerifyConfig): PublishedImageVerifier {
  return new PublishedImageVerifier(
    {
      insecure: verify.insecure,
      credential: verify.credential,
      timing: { timeoutSeconds: verify.timeoutSeconds, retryDelaySeconds: verify.retryDelaySeconds },
      expectV2Schema2: verify.expectV2Schema2,
      pushKinds: verify.pushKinds,
      mapping: config.mapping,
    },
    { poller: new RegistryDigestPoller(new RegistryClient()), runtime: dockerRuntime }
  );
}

async function runPullBaseImage(config: ActionConfig, pull: PullConfig, context: BuildContext): Promise<void> {
  const startTime = performance.now();
  const resolver = new ManifestListResolver(new RegistryClient(), {
    insecure: pull.parentRegistryInsecure,
    credential: pull.credential,
    mapping: config.mapping,
  });
  const engine = new PullAndTagEngine(dockerRuntime, context.ledger);

  const result = await pullParentImages(
    context,
    {
      baseImage: pull.baseImage,
      parentImages: pull.parentImages,
      parentRegistry: pull.parentRegistry,
      parentRegistryInsecure: pull.parentRegistryInsecure,
      checkPlatforms: pull.checkPlatforms,
      currentPlatform: resolveCurrentPlatform(pull.currentPlatform, config.mapping),
    },
    { resolver, engine }
  );

  setPullOutputs(result);
  await writePullSummary(result, performance.now() - startTime);
  core.info(`Base image is available as ${result.baseImage}`);
}

/**
 * Main function that runs the GitHub Action.
 * Handles all orchestration, output, and error management for the action.
 */
export async function run(): Promise<void> {
  try {
    const config = getActionConfig();
    const context = createBuildContext(config, new ActionStateLedger(readPulledImages()));

    if (config.pull) {
      await runPullBaseImage(config, config.pull, context);
      return;
    }
    if (!config.verify) {
      return;
    }
    if (config.verify.role === 'exit') {
      core.info('Published image is verified when the job ends');
      return;
    }

    const result = await createVerifier(config, config.verify).runAsPostBuild(context);
    setVerifyOutputs(result);
    logVerification(result);
  } catch (error) {
    core.setFailed(getErrorMessage(error));
  }
}

if (require.main === module) {
  void run();
}
