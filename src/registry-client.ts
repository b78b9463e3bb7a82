/**
 * @fileoverview Client for the Docker Registry HTTP API v2.
 * Fetches manifest lists and image config blobs and checks which manifest schema variants a
 * registry currently serves for a reference.
 * @see https://distribution.github.io/distribution/spec/api/
 */

import * as core from '@actions/core';
import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';

import {
  getErrorMessage,
  MalformedConfigBlobError,
  RegistryHttpError,
  RegistryUnreachableError,
} from './errors';
import { ImageReference } from './image-reference';

/**
 * Manifest media types served by Docker registries.
 */
export const MEDIA_TYPES = {
  DOCKER_V1: 'application/json',
  DOCKER_V2_SCHEMA1: 'application/vnd.docker.distribution.manifest.v1+json',
  DOCKER_V2_SCHEMA1_SIGNED: 'application/vnd.docker.distribution.manifest.v1+prettyjws',
  DOCKER_V2_SCHEMA2: 'application/vnd.docker.distribution.manifest.v2+json',
  DOCKER_V2_MANIFEST_LIST: 'application/vnd.docker.distribution.manifest.list.v2+json',
  OCI_INDEX: 'application/vnd.oci.image.index.v1+json',
} as const;

const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Basic credential for a registry.
 */
export type RegistryCredential = {
  readonly username: string;
  readonly password: string;
};

/**
 * Where and how to reach a registry.
 */
export type RegistryEndpoint = {
  readonly registry: string;
  readonly insecure: boolean;
  readonly credential?: RegistryCredential;
};

export type ManifestListEntry = {
  readonly digest: string;
  readonly architecture: string;
};

/**
 * Per-architecture manifests of one image, in registry order.
 */
export type ManifestList = {
  readonly manifests: readonly ManifestListEntry[];
};

export type ConfigBlob = {
  readonly labels: Readonly<Record<string, string>>;
};

export type DigestKind = 'v1' | 'v2' | 'v2List';

const DIGEST_KINDS: readonly DigestKind[] = ['v1', 'v2', 'v2List'];

/**
 * Which manifest schema variants a registry serves for a reference.
 */
export type DigestSet = Readonly<Record<DigestKind, boolean>>;

/**
 * Registry operations the resolver and the poller depend on.
 */
export type RegistryApi = {
  fetchManifestList(reference: ImageReference, endpoint: RegistryEndpoint): Promise<ManifestList | undefined>;
  fetchConfigBlob(reference: ImageReference, endpoint: RegistryEndpoint): Promise<ConfigBlob>;
  lookupDigests(reference: ImageReference, endpoint: RegistryEndpoint, requireDigest: boolean): Promise<DigestSet>;
};

/**
 * Parameters of a `WWW-Authenticate: Bearer` challenge.
 */
type BearerChallenge = {
  readonly realm: string;
  readonly service?: string;
  readonly scope?: string;
};

type FetchedManifest = {
  readonly mediaType: string | undefined;
  readonly body: unknown;
};

const DIGEST_KIND_MEDIA_TYPES: Readonly<Record<DigestKind, readonly string[]>> = {
  v1: [MEDIA_TYPES.DOCKER_V2_SCHEMA1, MEDIA_TYPES.DOCKER_V2_SCHEMA1_SIGNED],
  v2: [MEDIA_TYPES.DOCKER_V2_SCHEMA2],
  v2List: [MEDIA_TYPES.DOCKER_V2_MANIFEST_LIST],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flattens response or request headers into plain strings with lower-case names.
 */
function flattenHeaders(headers: unknown): Record<string, string> {
  if (!isRecord(headers)) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(headers)
      .filter(([, value]) => ['string', 'number', 'boolean'].includes(typeof value))
      .map(([name, value]) => [name.toLowerCase(), String(value)])
  );
}

function maskAuthorization(headers: Record<string, string>): Record<string, string> {
  return 'authorization' in headers ? { ...headers, authorization: '***' } : headers;
}

function stripMediaTypeParameters(contentType: string | undefined): string | undefined {
  return contentType?.split(';')[0].trim() || undefined;
}

/**
 * Reads a Bearer challenge such as `Bearer realm="https://auth.example.com/token",service="registry"`.
 */
function parseBearerChallenge(header: string | undefined): BearerChallenge | undefined {
  const match = /^Bearer\s+(.*)$/i.exec(header?.trim() ?? '');
  if (!match) {
    return undefined;
  }
  const params = new Map<string, string>();
  for (const [, name, value] of match[1].matchAll(/(\w+)="([^"]*)"/g)) {
    params.set(name.toLowerCase(), value);
  }
  const realm = params.get('realm');
  if (!realm) {
    return undefined;
  }
  return { realm, service: params.get('service'), scope: params.get('scope') };
}

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

/**
 * Reads the per-architecture entries of a manifest list body.
 * Entries without a digest or an architecture are left out.
 */
export function parseManifestList(body: unknown): ManifestList | undefined {
  if (!isRecord(body) || !Array.isArray(body.manifests)) {
    return undefined;
  }
  const manifests = body.manifests.flatMap((entry: unknown): ManifestListEntry[] => {
    if (
      isRecord(entry) &&
      typeof entry.digest === 'string' &&
      isRecord(entry.platform) &&
      typeof entry.platform.architecture === 'string'
    ) {
      return [{ digest: entry.digest, architecture: entry.platform.architecture }];
    }
    return [];
  });
  return { manifests };
}

/**
 * Registry HTTP API v2 client backed by axios.
 */
export class RegistryClient implements RegistryApi {
  private readonly http: AxiosInstance;

  constructor() {
    this.http = axios.create({
      timeout: REQUEST_TIMEOUT_MS,
      responseType: 'text',
      headers: { 'User-Agent': 'parent-image-registry-action' },
    });
  }

  /**
   * Fetches the manifest list of an image.
   *
   * @returns The manifest list, or undefined when the registry has none for this reference
   * @throws RegistryUnreachableError when the registry cannot be reached or answers with an error other than 404
   */
  async fetchManifestList(reference: ImageReference, endpoint: RegistryEndpoint): Promise<ManifestList | undefined> {
    try {
      const manifest = await this.fetchManifest(
        reference,
        endpoint,
        `${MEDIA_TYPES.DOCKER_V2_MANIFEST_LIST}, ${MEDIA_TYPES.OCI_INDEX}`
      );
      if (manifest.mediaType !== MEDIA_TYPES.DOCKER_V2_MANIFEST_LIST && manifest.mediaType !== MEDIA_TYPES.OCI_INDEX) {
        core.debug(`${reference.toString()} is not a manifest list (media type: ${manifest.mediaType ?? 'unknown'})`);
        return undefined;
      }
      return parseManifestList(manifest.body);
    } catch (error) {
      if (!(error instanceof RegistryHttpError)) {
        throw error;
      }
      if (error.status === 404) {
        core.info(`No manifest list for ${reference.toString()}: ${error.message}`);
        return undefined;
      }
      throw new RegistryUnreachableError(
        `Unable to fetch manifest list for ${reference.toString()}: ${error.message}`
      );
    }
  }

  /**
   * Fetches the image configuration of a schema 2 image and returns its labels.
   *
   * @throws RegistryUnreachableError on any HTTP or transport failure
   * @throws MalformedConfigBlobError when the manifest or config blob lacks the expected fields
   */
  async fetchConfigBlob(reference: ImageReference, endpoint: RegistryEndpoint): Promise<ConfigBlob> {
    const imageName = reference.toString();
    try {
      const manifest = await this.fetchManifest(reference, endpoint, MEDIA_TYPES.DOCKER_V2_SCHEMA2);
      const configDigest =
        isRecord(manifest.body) && isRecord(manifest.body.config) ? manifest.body.config.digest : undefined;
      if (typeof configDigest !== 'string') {
        throw new MalformedConfigBlobError(imageName, 'manifest does not reference a config blob');
      }

      const url = this.buildUrl(endpoint, `/v2/${reference.repositoryPath}/blobs/${configDigest}`);
      const response = await this.request(url, endpoint, {});
      const blob = parseBody(response.data);
      const labels = isRecord(blob) && isRecord(blob.config) ? blob.config.Labels : undefined;

      return {
        labels: Object.fromEntries(
          Object.entries(isRecord(labels) ? labels : {}).filter(
            (entry): entry is [string, string] => typeof entry[1] === 'string'
          )
        ),
      };
    } catch (error) {
      if (error instanceof RegistryHttpError) {
        core.warning(`Unable to fetch config for ${imageName}, got error ${error.status}`);
        throw new RegistryUnreachableError(`Unable to fetch config for base image ${imageName}: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Asks the registry for each manifest schema variant of a reference.
   *
   * A 404 for one variant only means that variant is missing. Any other HTTP error is thrown.
   *
   * @param requireDigest - Throw the last 404 when no variant at all is found
   * @returns Which variants are served
   */
  async lookupDigests(
    reference: ImageReference,
    endpoint: RegistryEndpoint,
    requireDigest: boolean
  ): Promise<DigestSet> {
    const served = new Set<DigestKind>();
    let savedNotFound: RegistryHttpError | undefined;

    for (const kind of DIGEST_KINDS) {
      const acceptedTypes = DIGEST_KIND_MEDIA_TYPES[kind];
      try {
        const manifest = await this.fetchManifest(reference, endpoint, acceptedTypes.join(', '));
        // Registries fall back to another schema when the requested one is missing
        if (manifest.mediaType && acceptedTypes.includes(manifest.mediaType)) {
          served.add(kind);
        }
      } catch (error) {
        if (error instanceof RegistryHttpError && error.status === 404) {
          savedNotFound = error;
          continue;
        }
        throw error;
      }
    }

    if (served.size === 0 && requireDigest && savedNotFound) {
      throw savedNotFound;
    }

    return { v1: served.has('v1'), v2: served.has('v2'), v2List: served.has('v2List') };
  }

  private buildUrl(endpoint: RegistryEndpoint, path: string): string {
    const scheme = endpoint.insecure ? 'http' : 'https';
    return `${scheme}://${endpoint.registry}${path}`;
  }

  private async fetchManifest(
    reference: ImageReference,
    endpoint: RegistryEndpoint,
    accept: string
  ): Promise<FetchedManifest> {
    const url = this.buildUrl(endpoint, `/v2/${reference.repositoryPath}/manifests/${reference.manifestReference}`);
    const response = await this.request(url, endpoint, { Accept: accept });
    const headers = flattenHeaders(response.headers);
    const body = parseBody(response.data);
    const bodyMediaType = isRecord(body) && typeof body.mediaType === 'string' ? body.mediaType : undefined;

    return {
      mediaType: stripMediaTypeParameters(headers['content-type']) ?? bodyMediaType,
      body,
    };
  }

  /**
   * Sends a GET with basic credentials if any. A 401 carrying a Bearer challenge is answered once
   * with a token from the challenge's realm.
   */
  private async request(
    url: string,
    endpoint: RegistryEndpoint,
    headers: Record<string, string>
  ): Promise<{ data: unknown; headers: unknown }> {
    const config: AxiosRequestConfig = { headers };
    if (endpoint.credential) {
      config.auth = { username: endpoint.credential.username, password: endpoint.credential.password };
    }

    try {
      return await this.send(url, config);
    } catch (error) {
      const challenge =
        error instanceof RegistryHttpError && error.status === 401
          ? parseBearerChallenge(error.exchange.responseHeaders['www-authenticate'])
          : undefined;
      if (!challenge) {
        throw error;
      }
      const token = await this.fetchBearerToken(challenge, endpoint);
      return this.send(url, { headers: { ...headers, Authorization: `Bearer ${token}` } });
    }
  }

  private async fetchBearerToken(challenge: BearerChallenge, endpoint: RegistryEndpoint): Promise<string> {
    core.debug(`Requesting token from ${challenge.realm} for ${challenge.scope ?? 'no scope'}`);
    const params: Record<string, string> = {};
    if (challenge.service) {
      params.service = challenge.service;
    }
    if (challenge.scope) {
      params.scope = challenge.scope;
    }
    const config: AxiosRequestConfig = { headers: {}, params };
    if (endpoint.credential) {
      config.auth = { username: endpoint.credential.username, password: endpoint.credential.password };
    }

    const response = await this.send(challenge.realm, config);
    const body = parseBody(response.data);
    const token = isRecord(body) ? (body.token ?? body.access_token) : undefined;
    if (typeof token !== 'string' || token === '') {
      throw new RegistryUnreachableError(`Token service ${challenge.realm} returned no token`);
    }
    return token;
  }

  private async send(url: string, config: AxiosRequestConfig): Promise<{ data: unknown; headers: unknown }> {
    try {
      const response = await this.http.get<unknown>(url, config);
      return { data: response.data, headers: response.headers };
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const { response } = error;
        throw new RegistryHttpError({
          url,
          status: response.status,
          statusText: response.statusText,
          responseHeaders: flattenHeaders(response.headers),
          responseBody: typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? ''),
          requestHeaders: maskAuthorization(flattenHeaders(error.config?.headers)),
        });
      }
      throw new RegistryUnreachableError(`Unable to reach ${url}: ${getErrorMessage(error)}`);
    }
  }
}
