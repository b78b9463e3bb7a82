/**
 * @fileoverview Detects the architecture and logical platform of the machine running the build.
 * Node.js reports architectures with its own names, so they are mapped to the names registries use
 * in manifest lists before being looked up in the platform descriptors.
 */

import * as core from '@actions/core';
import * as os from 'os';

import { getErrorMessage } from './errors';
import { PlatformArchMapping } from './platform-mapping';

/**
 * Logical platform assumed when nothing better is known.
 */
export const FALLBACK_PLATFORM = 'x86_64';

/**
 * Maps Node.js architecture identifiers (`process.arch`) to their OCI equivalents.
 * Only includes entries where Node.js and OCI values differ.
 * @see https://nodejs.org/api/process.html#processarch
 */
const NODE_TO_OCI_ARCH: Readonly<Record<string, string>> = {
  x64: 'amd64',
  ia32: '386',
  ppc64: 'ppc64le',
  mipsel: 'mipsle',
  aarch64: 'arm64',
  x86_64: 'amd64',
  x86: '386',
  mips64el: 'mips64le',
} as const;

/**
 * Converts a Node.js architecture identifier to its OCI architecture equivalent.
 * If not found in the mapping, returns the original value.
 *
 * @param arch - Node.js architecture identifier (e.g., 'x64', 'arm64').
 * @returns OCI architecture identifier (e.g., 'amd64', 'arm64').
 */
export function toOciArch(arch: string): string {
  return NODE_TO_OCI_ARCH[arch] ?? arch;
}

/**
 * Returns the OCI architecture of the current Node.js runtime.
 */
export function getCurrentOciArchitecture(): string {
  return toOciArch(process.arch);
}

/**
 * Works out the logical platform the build is executing on.
 *
 * Order of precedence: an explicitly configured platform, the platform descriptors applied to the
 * runtime architecture, the kernel machine name, and finally {@link FALLBACK_PLATFORM}.
 *
 * @param configuredPlatform - Platform set by the workflow, if any
 * @param mapping - Platform descriptors, if configured
 * @returns Logical platform name
 */
export function resolveCurrentPlatform(
  configuredPlatform: string | undefined,
  mapping: PlatformArchMapping | undefined
): string {
  if (configuredPlatform) {
    return configuredPlatform;
  }

  const architecture = getCurrentOciArchitecture();
  if (mapping) {
    try {
      return mapping.architectureToPlatform(architecture);
    } catch (error) {
      core.debug(`Cannot map runtime architecture to a platform: ${getErrorMessage(error)}`);
    }
  }

  return os.machine() || FALLBACK_PLATFORM;
}
