/**
 * @fileoverview Bidirectional mapping between logical build platforms and registry architectures.
 * The mapping is built once from the platform descriptors configured for the action and is read-only afterwards.
 */

import * as yaml from 'js-yaml';

import { PlatformMappingError } from './errors';

/**
 * One platform descriptor: a logical build platform and the architecture registries use for it.
 */
export type PlatformDescriptor = {
  readonly platform: string;
  readonly architecture: string;
};

/**
 * Read-only lookup between logical platforms and registry architectures.
 */
export class PlatformArchMapping {
  private readonly platformToArch: ReadonlyMap<string, string>;
  private readonly archToPlatform: ReadonlyMap<string, string>;

  constructor(descriptors: readonly PlatformDescriptor[]) {
    this.platformToArch = new Map(descriptors.map((d) => [d.platform, d.architecture]));
    // With several platforms on one architecture the first descriptor wins
    this.archToPlatform = new Map(
      [...descriptors].reverse().map((d) => [d.architecture, d.platform])
    );
  }

  /**
   * @param platform - Logical platform, e.g. `x86_64`
   * @returns Registry architecture, e.g. `amd64`
   * @throws PlatformMappingError if no descriptor defines the platform
   */
  platformToArchitecture(platform: string): string {
    const architecture = this.platformToArch.get(platform);
    if (architecture === undefined) {
      throw new PlatformMappingError('platform', platform);
    }
    return architecture;
  }

  /**
   * @param architecture - Registry architecture, e.g. `arm64`
   * @returns Logical platform, e.g. `aarch64`
   * @throws PlatformMappingError if no descriptor defines the architecture
   */
  architectureToPlatform(architecture: string): string {
    const platform = this.archToPlatform.get(architecture);
    if (platform === undefined) {
      throw new PlatformMappingError('architecture', architecture);
    }
    return platform;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts one parsed YAML entry of the list form into a descriptor.
 */
function toDescriptor(entry: unknown, index: number): PlatformDescriptor {
  if (isRecord(entry) && typeof entry.platform === 'string' && typeof entry.architecture === 'string') {
    return { platform: entry.platform, architecture: entry.architecture };
  }
  throw new Error(`Platform descriptor #${index + 1} must have string 'platform' and 'architecture' fields`);
}

/**
 * Parses platform descriptors from YAML.
 *
 * Two forms are accepted, a plain mapping and a descriptor list:
 * ```yaml
 * x86_64: amd64
 * aarch64: arm64
 * ```
 * ```yaml
 * - platform: x86_64
 *   architecture: amd64
 * ```
 *
 * @param source - YAML text
 * @returns The mapping, or undefined when the text is empty
 */
export function parsePlatformDescriptors(source: string): PlatformArchMapping | undefined {
  if (!source.trim()) {
    return undefined;
  }

  const document: unknown = yaml.load(source);

  if (Array.isArray(document)) {
    return new PlatformArchMapping(document.map(toDescriptor));
  }

  if (isRecord(document)) {
    const descriptors = Object.entries(document).map(([platform, architecture]): PlatformDescriptor => {
      if (typeof architecture !== 'string') {
        throw new Error(`Architecture for platform '${platform}' must be a string`);
      }
      return { platform, architecture };
    });
    return new PlatformArchMapping(descriptors);
  }

  throw new Error('Platform descriptors must be a YAML mapping or list');
}
