/**
 * @fileoverview Reads the action inputs once into a typed configuration.
 */

import * as core from '@actions/core';

import { StepRole } from './build-steps';
import { parsePlatformDescriptors, PlatformArchMapping } from './platform-mapping';
import { PUSH_KINDS, PushKind } from './published-image';
import { RegistryCredential } from './registry-client';

export type RunMode = 'pull-base-image' | 'verify-published';

const RUN_MODES: readonly RunMode[] = ['pull-base-image', 'verify-published'];
const STEP_ROLES: readonly StepRole[] = ['post-build', 'exit'];

const FAILED_BUILD_STATUSES = ['failure', 'cancelled'];

const DEFAULT_TIMEOUT_SECONDS = 1200;
const DEFAULT_RETRY_DELAY_SECONDS = 30;

export type PullConfig = {
  readonly baseImage: string;
  readonly parentImages: readonly string[];
  readonly parentRegistry?: string;
  readonly parentRegistryInsecure: boolean;
  readonly credential?: RegistryCredential;
  readonly checkPlatforms: boolean;
  /** Logical platform of the build machine, when set explicitly */
  readonly currentPlatform?: string;
};

export type VerifyConfig = {
  readonly role: StepRole;
  readonly images: readonly string[];
  readonly registry: string;
  readonly insecure: boolean;
  readonly credential?: RegistryCredential;
  readonly serverSideSync: boolean;
  readonly timeoutSeconds: number;
  readonly retryDelaySeconds: number;
  readonly expectV2Schema2: boolean;
  readonly manifestListGrouped: boolean;
  readonly pushKinds: readonly PushKind[];
};

export type ActionConfig = {
  readonly mode: RunMode;
  readonly buildName: string;
  readonly triggerImageId?: string;
  readonly platforms?: readonly string[];
  readonly mapping?: PlatformArchMapping;
  readonly buildFailed: boolean;
  readonly removePulledImages: boolean;
  readonly pull?: PullConfig;
  readonly verify?: VerifyConfig;
};

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

function getChoiceInput<T extends string>(name: string, choices: readonly T[], fallback: T): T {
  const value = core.getInput(name) || fallback;
  if (!isOneOf(choices, value)) {
    throw new Error(`Input ${name} must be one of ${choices.join(', ')}, got '${value}'`);
  }
  return value;
}

function getOptionalInput(name: string): string | undefined {
  return core.getInput(name) || undefined;
}

function getRequiredInput(name: string, mode: RunMode): string {
  const value = core.getInput(name);
  if (!value) {
    throw new Error(`Input ${name} is required in ${mode} mode`);
  }
  return value;
}

function getBooleanInputOr(name: string, fallback: boolean): boolean {
  return core.getInput(name) ? core.getBooleanInput(name) : fallback;
}

function getSecondsInput(name: string, fallback: number): number {
  const raw = core.getInput(name);
  if (!raw) {
    return fallback;
  }
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`Input ${name} must be a non-negative number of seconds, got '${raw}'`);
  }
  return seconds;
}

/**
 * Turns a free-form build name into a valid local repository name.
 *
 * @param name - Build name
 * @returns Lower-case name with only characters allowed in a repository path component
 */
export function toRepositoryName(name: string): string {
  const sanitized = name
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^[^a-z0-9]+|[^a-z0-9]+$/g, '');
  return sanitized || 'build';
}

function defaultBuildName(): string {
  const runId = process.env.GITHUB_RUN_ID;
  if (!runId) {
    return 'build';
  }
  return `build-${runId}-${process.env.GITHUB_RUN_ATTEMPT || '1'}`;
}

function getCredential(): RegistryCredential | undefined {
  const username = core.getInput('registry-username');
  const password = core.getInput('registry-password');
  if (password) {
    core.setSecret(password);
  }
  if (!username || !password) {
    return undefined;
  }
  return { username, password };
}

function getPushKinds(): PushKind[] {
  return core.getMultilineInput('push-kinds').map((kind) => {
    if (!isOneOf(PUSH_KINDS, kind)) {
      throw new Error(`Input push-kinds accepts ${PUSH_KINDS.join(', ')}, got '${kind}'`);
    }
    return kind;
  });
}

function getPullConfig(mode: RunMode): PullConfig {
  return {
    baseImage: getRequiredInput('base-image', mode),
    parentImages: core.getMultilineInput('parent-images'),
    parentRegistry: getOptionalInput('parent-registry'),
    parentRegistryInsecure: getBooleanInputOr('parent-registry-insecure', false),
    credential: getCredential(),
    checkPlatforms: getBooleanInputOr('check-platforms', false),
    currentPlatform: getOptionalInput('current-platform'),
  };
}

function getVerifyConfig(mode: RunMode): VerifyConfig {
  return {
    role: getChoiceInput('verify-as', STEP_ROLES, 'post-build'),
    images: core.getMultilineInput('images'),
    registry: getRequiredInput('registry', mode),
    insecure: getBooleanInputOr('registry-insecure', false),
    credential: getCredential(),
    serverSideSync: getBooleanInputOr('server-side-sync', false),
    timeoutSeconds: getSecondsInput('timeout', DEFAULT_TIMEOUT_SECONDS),
    retryDelaySeconds: getSecondsInput('retry-delay', DEFAULT_RETRY_DELAY_SECONDS),
    expectV2Schema2: getBooleanInputOr('expect-v2schema2', true),
    manifestListGrouped: getBooleanInputOr('manifest-list-grouped', false),
    pushKinds: getPushKinds(),
  };
}

/**
 * Gets action configuration from GitHub Actions inputs.
 *
 * @returns Configuration for the selected mode
 * @throws Error when an input is missing or invalid
 */
export function getActionConfig(): ActionConfig {
  const mode = getChoiceInput('mode', RUN_MODES, 'pull-base-image');
  const platforms = core.getMultilineInput('platforms');

  return {
    mode,
    buildName: toRepositoryName(core.getInput('build-name') || defaultBuildName()),
    triggerImageId: getOptionalInput('trigger-image-id'),
    platforms: platforms.length > 0 ? platforms : undefined,
    mapping: parsePlatformDescriptors(core.getInput('platform-descriptors')),
    buildFailed: FAILED_BUILD_STATUSES.includes(core.getInput('build-status')),
    removePulledImages: getBooleanInputOr('remove-pulled-images', true),
    pull: mode === 'pull-base-image' ? getPullConfig(mode) : undefined,
    verify: mode === 'verify-published' ? getVerifyConfig(mode) : undefined,
  };
}
