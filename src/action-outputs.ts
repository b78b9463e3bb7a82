/**
 * @fileoverview Action outputs and job summary for both modes.
 */

import * as core from '@actions/core';

import { BaseImageResult } from './base-image';
import { formatTimeBetween } from './date-utils';
import { VerificationResult } from './published-image';

/**
 * Sets the outputs of the pull-base-image mode.
 *
 * @param result - Unique names of the parent images
 */
export function setPullOutputs(result: BaseImageResult): void {
  core.setOutput('base-image', result.baseImage);
  core.setOutput(
    'parent-images',
    JSON.stringify(Object.fromEntries(result.parentImages.map((parent) => [parent.parent, parent.unique])))
  );
}

/**
 * Writes the parent image table to the job summary.
 *
 * @param result - Unique names of the parent images
 * @param executionTimeMs - Time the mode took
 */
export async function writePullSummary(result: BaseImageResult, executionTimeMs: number): Promise<void> {
  await core.summary
    .addHeading('Parent Images', 2)
    .addTable([
      [
        { data: 'Parent Image', header: true },
        { data: 'Pulled As', header: true },
        { data: 'Unique Name', header: true },
        { data: 'Attempts', header: true },
      ],
      ...result.parentImages.map((parent) => [
        { data: parent.isBaseImage ? `${parent.parent} (base)` : parent.parent },
        { data: parent.pulled },
        { data: parent.unique },
        { data: `${parent.attempts}` },
      ]),
    ])
    .addRaw(`Completed in ${formatTimeBetween(0, executionTimeMs)}`, true)
    .write();
}

/**
 * Sets the outputs of the verify-published mode.
 * Outputs are only set when the verification ran.
 *
 * @param result - Verification result
 */
export function setVerifyOutputs(result: VerificationResult): void {
  if (result.skipped) {
    return;
  }
  core.setOutput('media-types', JSON.stringify(result.mediaTypes));
  if (result.imageId) {
    core.setOutput('image-id', result.imageId);
  }
}

/**
 * Logs the verification outcome.
 */
export function logVerification(result: VerificationResult): void {
  if (result.skipped || !result.image) {
    core.info('Published image verification skipped');
    return;
  }
  core.info(`${result.image} is available as ${result.mediaTypes.join(', ') || 'no known media type'}`);
}
