/**
 * @fileoverview Failure vocabulary shared by base-image resolution, pull-and-tag and digest polling.
 * Every error carries a condition name so callers and job logs can tell failures apart without parsing messages.
 */

/**
 * Named failure conditions.
 */
export type FailureCondition =
  | 'configuration-incomplete'
  | 'registry-unreachable'
  | 'malformed-config-blob'
  | 'missing-architectures'
  | 'manifest-list-unavailable'
  | 'registry-mismatch'
  | 'pull-tag-exhausted'
  | 'registry-timeout'
  | 'image-pull-failed'
  | 'image-not-found'
  | 'registry-http';

/**
 * Base class for every failure raised while talking to a registry or the local image store.
 */
export class RegistryInteractionError extends Error {
  readonly condition: FailureCondition;

  constructor(condition: FailureCondition, message: string) {
    super(message);
    this.name = new.target.name;
    this.condition = condition;
  }
}

/**
 * A platform or architecture is missing from the platform descriptors.
 * Callers treat this as a reason to skip dependent validation, never as a build failure.
 */
export class PlatformMappingError extends RegistryInteractionError {
  readonly key: string;

  constructor(kind: 'platform' | 'architecture', key: string) {
    super('configuration-incomplete', `No platform descriptor defines ${kind} '${key}'`);
    this.key = key;
  }
}

/**
 * The registry could not be reached or answered a request with an error.
 */
export class RegistryUnreachableError extends RegistryInteractionError {
  constructor(message: string) {
    super('registry-unreachable', message);
  }
}

export class MalformedConfigBlobError extends RegistryInteractionError {
  constructor(image: string, detail: string) {
    super('malformed-config-blob', `Malformed config blob for ${image}: ${detail}`);
  }
}

/**
 * The base image manifest list does not cover every architecture the build needs.
 */
export class MissingArchitecturesError extends RegistryInteractionError {
  readonly missingArchitectures: readonly string[];

  constructor(image: string, missingArchitectures: readonly string[]) {
    super(
      'missing-architectures',
      `Missing arches in manifest list for base image ${image}: ${missingArchitectures.join(', ')}`
    );
    this.missingArchitectures = missingArchitectures;
  }
}

export class ManifestListUnavailableError extends RegistryInteractionError {
  constructor(image: string) {
    super('manifest-list-unavailable', `Unable to fetch manifest list for base image ${image}`);
  }
}

export class RegistryMismatchError extends RegistryInteractionError {
  constructor(image: string, expectedRegistry: string) {
    super(
      'registry-mismatch',
      `Registry specified in dockerfile image doesn't match configured one. Dockerfile: '${image}'; expected registry: '${expectedRegistry}'`
    );
  }
}

export class PullTagExhaustedError extends RegistryInteractionError {
  readonly attempts: number;

  constructor(image: string, attempts: number) {
    super('pull-tag-exhausted', `Too many attempts to pull and tag image ${image}: gave up after ${attempts} attempts`);
    this.attempts = attempts;
  }
}

/**
 * The published image did not show up with the expected manifest shape in time.
 */
export class RegistryTimeoutError extends RegistryInteractionError {
  readonly elapsedSeconds: number;

  constructor(image: string, elapsedSeconds: number, timeoutSeconds: number) {
    super(
      'registry-timeout',
      `${image} did not appear in the registry: ${elapsedSeconds} seconds elapsed, ${timeoutSeconds} seconds exceeded`
    );
    this.elapsedSeconds = elapsedSeconds;
  }
}

/**
 * A pull through the image runtime failed. The pull-and-tag engine may retry it.
 */
export class ImagePullError extends RegistryInteractionError {
  readonly image: string;

  constructor(image: string, detail: string) {
    super('image-pull-failed', `Failed to pull image ${image}: ${detail}`);
    this.image = image;
  }
}

/**
 * The local image store no longer has the image, usually because another build removed it.
 */
export class ImageNotFoundError extends RegistryInteractionError {
  constructor(image: string) {
    super('image-not-found', `No such image: ${image}`);
  }
}

/**
 * Request and response details of a failed registry HTTP call.
 */
export type HttpExchange = {
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly responseHeaders: Readonly<Record<string, string>>;
  readonly responseBody: string;
  readonly requestHeaders: Readonly<Record<string, string>>;
};

/**
 * The registry answered with a non-success HTTP status.
 */
export class RegistryHttpError extends RegistryInteractionError {
  readonly exchange: HttpExchange;

  constructor(exchange: HttpExchange) {
    super('registry-http', `[${exchange.status}] ${exchange.statusText} from ${exchange.url}`);
    this.exchange = exchange;
  }

  get status(): number {
    return this.exchange.status;
  }
}

/**
 * Extracts a printable message from any thrown value.
 *
 * @param error - The caught value
 * @returns The error message, or the value converted to a string
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error ?? 'Unknown error');
}
