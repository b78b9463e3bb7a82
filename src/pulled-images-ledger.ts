/**
 * @fileoverview Ledger of images pulled during this build and their deferred removal.
 * Names are kept in the action state so the post step can remove them whether the build succeeded or not.
 */

import * as core from '@actions/core';

import { getErrorMessage } from './errors';
import { ImageRuntime } from './docker-command';

const STATE_KEY = 'pulled-images';

/**
 * Sink for names of images this build put into the local store.
 */
export type PulledImagesLedger = {
  record(name: string): void;
  readonly names: readonly string[];
};

/**
 * Reads the names recorded by the main step.
 *
 * @returns Recorded image names, empty when nothing was recorded
 */
export function readPulledImages(): string[] {
  const raw = core.getState(STATE_KEY);
  if (!raw) {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((name): name is string => typeof name === 'string') : [];
  } catch (error) {
    core.warning(`Ignoring unreadable pulled images state: ${getErrorMessage(error)}`);
    return [];
  }
}

/**
 * Ledger persisted in the GitHub Actions step state.
 */
export class ActionStateLedger implements PulledImagesLedger {
  private readonly pulled: Set<string>;

  constructor(initialNames: readonly string[] = []) {
    this.pulled = new Set(initialNames);
  }

  record(name: string): void {
    if (this.pulled.has(name)) {
      return;
    }
    this.pulled.add(name);
    core.saveState(STATE_KEY, JSON.stringify([...this.pulled]));
    core.debug(`Recorded ${name} for removal after the build`);
  }

  get names(): readonly string[] {
    return [...this.pulled];
  }
}

/**
 * Removes every recorded image, newest first so tags go before the images they point to.
 *
 * @param runtime - Local image store
 * @param names - Image names to remove
 * @returns Number of images removed
 */
export async function removePulledImages(
  runtime: Pick<ImageRuntime, 'removeImage'>,
  names: readonly string[]
): Promise<number> {
  let removed = 0;
  for (const name of [...names].reverse()) {
    if (await runtime.removeImage(name)) {
      removed += 1;
    }
  }
  core.info(`Removed ${removed} of ${names.length} pulled image(s)`);
  return removed;
}
