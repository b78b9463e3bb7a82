/**
 * @fileoverview Polls a registry until a published image is served with the expected manifest shape.
 *
 * Content pushed to the distribution side becomes visible some time later. Until then the registry
 * answers 404, or answers successfully without the manifest kind we wait for; both are retried
 * until the time budget runs out.
 */

import * as core from '@actions/core';
import { setTimeout as delay } from 'timers/promises';

import { formatTimeBetween } from './date-utils';
import { getErrorMessage, RegistryHttpError, RegistryTimeoutError } from './errors';
import { ImageReference } from './image-reference';
import { PlatformArchMapping } from './platform-mapping';
import { DigestSet, RegistryApi, RegistryEndpoint } from './registry-client';

/**
 * Architecture whose build produces the single schema 2 manifest.
 */
export const SCHEMA2_ARCHITECTURE = 'amd64';

/**
 * What the poller waits for.
 * - `v2-schema2`: a single schema 2 manifest
 * - `v2-schema2-list`: a manifest list
 * - `v2-schema2-list-only`: only the manifest list; no schema 2 manifest will ever appear
 */
export type DigestExpectation = 'v2-schema2' | 'v2-schema2-list' | 'v2-schema2-list-only';

export type DigestExpectations = ReadonlySet<DigestExpectation>;

export type ExpectationInputs = {
  readonly expectV2Schema2: boolean;
  /** Whether a manifest list grouping step ran for this build and produced output */
  readonly manifestListGrouped: boolean;
  readonly expectedPlatforms?: readonly string[];
  readonly mapping?: PlatformArchMapping;
};

export type PollTiming = {
  readonly timeoutSeconds: number;
  readonly retryDelaySeconds: number;
};

/**
 * Time source and wait used between polls.
 */
export type PollerClock = {
  now(): number;
  sleep(milliseconds: number): Promise<void>;
};

export const systemClock: PollerClock = {
  now: () => Date.now(),
  sleep: async (milliseconds) => {
    await delay(milliseconds);
  },
};

/**
 * Works out what to wait for. Runs once, before polling starts.
 *
 * @param inputs - Build facts the expectations depend on
 * @returns The expectation set
 */
export function deriveExpectations(inputs: ExpectationInputs): Set<DigestExpectation> {
  const expectations = new Set<DigestExpectation>();
  if (inputs.expectV2Schema2) {
    expectations.add('v2-schema2');
  }
  if (!inputs.manifestListGrouped) {
    return expectations;
  }

  expectations.add('v2-schema2-list');

  const { expectedPlatforms, mapping } = inputs;
  if (!expectedPlatforms || expectedPlatforms.length === 0) {
    core.debug('Cannot check if only manifest list digest should be checked because we have no platforms list');
    return expectations;
  }
  if (!mapping) {
    core.debug('Cannot check if only manifest list digest should be checked because there are no platform descriptors');
    return expectations;
  }

  let builtSchema2Architecture: boolean;
  try {
    builtSchema2Architecture = expectedPlatforms.some(
      (platform) => mapping.platformToArchitecture(platform) === SCHEMA2_ARCHITECTURE
    );
  } catch (error) {
    core.debug(`Cannot check if only manifest list digest should be checked: ${getErrorMessage(error)}`);
    return expectations;
  }

  if (!builtSchema2Architecture) {
    core.debug(`${SCHEMA2_ARCHITECTURE} was not built, only manifest list digest is available`);
    expectations.add('v2-schema2-list-only');
    expectations.delete('v2-schema2');
  }
  return expectations;
}

/**
 * Checks a lookup result against the expectations.
 *
 * @returns A description of what is missing, or undefined when the result matches
 */
export function findExpectationMiss(digests: DigestSet, expectations: DigestExpectations): string | undefined {
  if (expectations.has('v2-schema2-list') && !digests.v2List) {
    return 'Expected schema 2 manifest list';
  }
  if (!expectations.has('v2-schema2-list-only') && expectations.has('v2-schema2') && !digests.v2) {
    return 'Expected schema 2 manifest';
  }
  return undefined;
}

function describeForbidden(error: RegistryHttpError): string {
  const { exchange } = error;
  return (
    `[${exchange.status}] ${exchange.statusText} ${JSON.stringify(exchange.responseHeaders)} ` +
    `${JSON.stringify(exchange.responseBody)}: from ${exchange.url} ${JSON.stringify(exchange.requestHeaders)}`
  );
}

/**
 * Polls digest lookups until the expectations are met or the time budget is spent.
 */
export class RegistryDigestPoller {
  private readonly registryApi: Pick<RegistryApi, 'lookupDigests'>;
  private readonly clock: PollerClock;

  constructor(registryApi: Pick<RegistryApi, 'lookupDigests'>, clock: PollerClock = systemClock) {
    this.registryApi = registryApi;
    this.clock = clock;
  }

  /**
   * @param image - Published image
   * @param endpoint - Registry serving the published content
   * @param expectations - Result of {@link deriveExpectations}
   * @param timing - Time budget and delay between polls
   * @returns The first digest set that meets the expectations
   * @throws RegistryTimeoutError when the budget is exceeded
   * @throws RegistryHttpError for any HTTP status other than 404 and 403
   */
  async pollUntilMatch(
    image: ImageReference,
    endpoint: RegistryEndpoint,
    expectations: DigestExpectations,
    timing: PollTiming
  ): Promise<DigestSet> {
    const startTime = this.clock.now();

    for (;;) {
      try {
        // Absent variants are a miss against the expectations, not an error
        const digests = await this.registryApi.lookupDigests(image, endpoint, false);
        const miss = findExpectationMiss(digests, expectations);
        if (!miss) {
          return digests;
        }
        core.warning(miss);
      } catch (error) {
        if (!(error instanceof RegistryHttpError)) {
          throw error;
        }
        if (error.status === 403) {
          // Seen occasionally from the distribution side without a known cause
          core.error(describeForbidden(error));
        } else if (error.status !== 404) {
          throw error;
        }
      }

      const now = this.clock.now();
      const elapsedSeconds = Math.floor((now - startTime) / 1000);
      if (now - startTime > timing.timeoutSeconds * 1000) {
        throw new RegistryTimeoutError(image.toString(), elapsedSeconds, timing.timeoutSeconds);
      }

      core.info(
        `not found after ${formatTimeBetween(startTime, now)}; will try again in ${timing.retryDelaySeconds}s`
      );
      await this.clock.sleep(timing.retryDelaySeconds * 1000);
    }
  }
}
