/**
 * @fileoverview Local image store operations through the Docker CLI.
 * Provides pull, tag, inspect and remove with the error signals the pull-and-tag engine classifies.
 */

import * as core from '@actions/core';
import * as exec from '@actions/exec';

import { getErrorMessage, ImageNotFoundError, ImagePullError } from './errors';
import { ImageReference } from './image-reference';

/**
 * Docker image metadata from inspect command.
 * Contains essential information about a Docker image.
 */
export type DockerImageMetadata = {
  readonly Id: string;
  readonly Architecture?: string;
  readonly Os?: string;
  readonly RepoTags?: readonly string[];
  readonly RepoDigests?: readonly string[];
};

/**
 * Operations on the local image store shared by all builds on the host.
 */
export type ImageRuntime = {
  /**
   * Pulls an image into the local store.
   * @returns Name under which the image is available locally
   * @throws ImagePullError when the pull fails
   */
  pullImage(reference: ImageReference, insecure: boolean): Promise<string>;
  /**
   * Tags a local image.
   * @returns Canonical name of the new tag
   * @throws ImageNotFoundError when the source image is no longer present
   */
  tagImage(sourceName: string, target: ImageReference): Promise<string>;
  inspectImage(name: string): Promise<DockerImageMetadata>;
  removeImage(name: string): Promise<boolean>;
};

type CommandResult = { exitCode: number; stdout: string; stderr: string };

/**
 * Executes a command and logs execution time.
 *
 * @param tool - Executable to run
 * @param args - Array of command arguments.
 * @returns Promise resolving to object containing exit code, stdout, and stderr.
 */
async function executeCommand(tool: string, args: readonly string[]): Promise<CommandResult> {
  const fullCommand = `${tool} ${args.join(' ')}`;
  core.info(`Executing: ${fullCommand}`);

  const startTime = performance.now();
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];

  const execOptions: exec.ExecOptions = {
    ignoreReturnCode: true,
    silent: true,
    listeners: {
      stdout: (data: Buffer) => {
        stdoutChunks.push(data.toString());
      },
      stderr: (data: Buffer) => {
        stderrChunks.push(data.toString());
      },
    },
  };

  try {
    const exitCode = await exec.exec(tool, [...args], execOptions);
    const executionTimeMs = Math.round(performance.now() - startTime);
    core.info(`Command completed in ${executionTimeMs}ms: ${fullCommand}`);

    return { exitCode, stdout: stdoutChunks.join(''), stderr: stderrChunks.join('') };
  } catch (error) {
    const executionTimeMs = Math.round(performance.now() - startTime);
    core.error(`Command failed after ${executionTimeMs}ms: ${fullCommand}`);
    throw error;
  }
}

/**
 * Local name an insecure pull is copied to.
 * The docker-daemon transport needs a tag: a digest becomes the tag, and an untagged name gets `latest`.
 */
function localNameForInsecurePull(reference: ImageReference): string {
  if (reference.digest) {
    return `${reference.toString(false)}:${reference.digest.replace(':', '-')}`;
  }
  return `${reference.toString(false)}:${reference.tag ?? 'latest'}`;
}

/**
 * Pulls an image into the local Docker store.
 *
 * The Docker CLI has no per-pull switch for plain HTTP registries, so insecure pulls are
 * copied into the daemon with skopeo and TLS verification disabled.
 *
 * @param reference - Image to pull
 * @param insecure - Allow plain HTTP and unverified TLS towards the registry
 * @returns Name of the pulled image in the local store
 */
export async function pullImage(reference: ImageReference, insecure: boolean): Promise<string> {
  const imageName = reference.toString();

  const localName = insecure ? localNameForInsecurePull(reference) : imageName;
  const [tool, args]: [string, readonly string[]] = insecure
    ? ['skopeo', ['copy', '--src-tls-verify=false', `docker://${imageName}`, `docker-daemon:${localName}`]]
    : ['docker', ['pull', imageName]];

  let result: CommandResult;
  try {
    result = await executeCommand(tool, args);
  } catch (error) {
    throw new ImagePullError(imageName, getErrorMessage(error));
  }

  if (result.exitCode !== 0) {
    core.warning(`Failed to pull image ${imageName}: ${result.stderr.trim()}`);
    throw new ImagePullError(imageName, `exit code ${result.exitCode}`);
  }

  return localName;
}

/**
 * Tags a local image under a new name.
 *
 * @param sourceName - Local name of the image to tag
 * @param target - New name
 * @returns The new name
 */
export async function tagImage(sourceName: string, target: ImageReference): Promise<string> {
  const targetName = target.toString();
  const { exitCode, stderr } = await executeCommand('docker', ['tag', sourceName, targetName]);

  if (exitCode !== 0) {
    if (/no such image/i.test(stderr)) {
      throw new ImageNotFoundError(sourceName);
    }
    throw new Error(`Failed to tag image ${sourceName} as ${targetName}: ${stderr.trim()}`);
  }

  return targetName;
}

/**
 * Inspects a local Docker image.
 *
 * @param imageName - Local image name
 * @returns Image metadata
 */
export async function inspectImage(imageName: string): Promise<DockerImageMetadata> {
  const { exitCode, stdout, stderr } = await executeCommand('docker', [
    'image',
    'inspect',
    '--format',
    '{{json .}}',
    imageName,
  ]);

  if (exitCode !== 0) {
    if (/no such image/i.test(stderr)) {
      throw new ImageNotFoundError(imageName);
    }
    throw new Error(`Failed to inspect image ${imageName}: ${stderr.trim()}`);
  }

  const inspectData: unknown = JSON.parse(stdout.trim());
  if (
    typeof inspectData === 'object' &&
    inspectData !== null &&
    'Id' in inspectData &&
    typeof inspectData.Id === 'string'
  ) {
    return { ...inspectData, Id: inspectData.Id };
  }
  throw new Error(`Inspect output for ${imageName} has no image ID`);
}

/**
 * Removes a local image. Failures are reported as warnings.
 *
 * @param imageName - Local image name
 * @returns True if the image was removed
 */
export async function removeImage(imageName: string): Promise<boolean> {
  try {
    const { exitCode, stderr } = await executeCommand('docker', ['rmi', imageName]);
    if (exitCode !== 0) {
      core.warning(`Failed to remove image ${imageName}: ${stderr.trim()}`);
      return false;
    }
    return true;
  } catch (error) {
    core.warning(`Failed to remove image ${imageName}: ${getErrorMessage(error)}`);
    return false;
  }
}

/**
 * The Docker CLI as an {@link ImageRuntime}.
 */
export const dockerRuntime: ImageRuntime = {
  pullImage,
  tagImage,
  inspectImage,
  removeImage,
};
