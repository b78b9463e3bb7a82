/**
 * @fileoverview Post entry point, run when the job ends.
 * Verifies the published image when configured to do so at exit, then removes the images this
 * action pulled.
 */

import * as core from '@actions/core';

import { logVerification } from './action-outputs';
import { getActionConfig } from './config';
import { dockerRuntime } from './docker-command';
import { getErrorMessage } from './errors';
import { createBuildContext, createVerifier } from './main';
import { ActionStateLedger, readPulledImages, removePulledImages } from './pulled-images-ledger';

/**
 * Runs the exit steps. Pulled images are removed even when verification fails.
 */
export async function runPost(): Promise<void> {
  const ledger = new ActionStateLedger(readPulledImages());
  let removeImages = true;

  try {
    const config = getActionConfig();
    removeImages = config.removePulledImages;

    if (config.verify?.role === 'exit') {
      const result = await createVerifier(config, config.verify).runAsExit(createBuildContext(config, ledger));
      logVerification(result);
    }
  } catch (error) {
    core.setFailed(getErrorMessage(error));
  }

  if (!removeImages) {
    core.info(`Keeping ${ledger.names.length} pulled image(s)`);
    return;
  }
  await removePulledImages(dockerRuntime, ledger.names);
}

if (require.main === module) {
  void runPost();
}
