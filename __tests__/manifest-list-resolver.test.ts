import * as core from '@actions/core';

import {
  MalformedConfigBlobError,
  ManifestListUnavailableError,
  MissingArchitecturesError,
  RegistryUnreachableError,
} from '../src/errors';
import { ImageReference } from '../src/image-reference';
import { ManifestListResolver } from '../src/manifest-list-resolver';
import { PlatformArchMapping } from '../src/platform-mapping';
import { ManifestList } from '../src/registry-client';

jest.mock('@actions/core', () => ({
  info: jest.fn(),
  debug: jest.fn(),
}));

const createRegistryApi = (
  lists: Record<string, ManifestList>,
  labels: Record<string, string> = {}
) => ({
  fetchManifestList: jest.fn(async (reference: ImageReference) => lists[reference.toString()]),
  fetchConfigBlob: jest.fn(async () => ({ labels })),
  lookupDigests: jest.fn(),
});

const mapping = new PlatformArchMapping([
  { platform: 'x86_64', architecture: 'amd64' },
  { platform: 'aarch64', architecture: 'arm64' },
  { platform: 'ppc64le', architecture: 'ppc64le' },
  { platform: 's390x', architecture: 's390x' },
]);

const list = (...architectures: string[]): ManifestList => ({
  manifests: architectures.map((architecture) => ({ digest: `sha256:${architecture}`, architecture })),
});

describe('ManifestListResolver', () => {
  const image = ImageReference.parse('registry.example.com/base:8.1');

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('getManifestList', () => {
    it('fetches each reference once', async () => {
      const registryApi = createRegistryApi({ 'registry.example.com/base:8.1': list('amd64') });
      const resolver = new ManifestListResolver(registryApi, { insecure: true });

      await resolver.getManifestList(image);
      await resolver.getManifestList(ImageReference.parse('registry.example.com/base:8.1'));

      expect(registryApi.fetchManifestList).toHaveBeenCalledTimes(1);
      expect(registryApi.fetchManifestList).toHaveBeenCalledWith(image, {
        registry: 'registry.example.com',
        insecure: true,
        credential: undefined,
      });
    });

    it('caches a missing manifest list too', async () => {
      const registryApi = createRegistryApi({});
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      await expect(resolver.getManifestList(image)).resolves.toBeUndefined();
      await expect(resolver.getManifestList(image)).resolves.toBeUndefined();

      expect(registryApi.fetchManifestList).toHaveBeenCalledTimes(1);
    });

    it('does not fetch for an image without a registry', async () => {
      const registryApi = createRegistryApi({});
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      await expect(resolver.getManifestList(ImageReference.parse('fedora:39'))).resolves.toBeUndefined();

      expect(registryApi.fetchManifestList).not.toHaveBeenCalled();
      expect(core.debug).toHaveBeenCalledWith('Cannot fetch manifest list for fedora:39 because it names no registry');
    });

    it('retries a digest reference under the version-release tag of its config', async () => {
      const pinned = ImageReference.parse('registry.example.com/base@sha256:abc');
      const registryApi = createRegistryApi(
        { 'registry.example.com/base:8.1-3': list('amd64', 'arm64') },
        { version: '8.1', release: '3' }
      );
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      await expect(resolver.getManifestList(pinned)).resolves.toEqual(list('amd64', 'arm64'));

      expect(registryApi.fetchConfigBlob).toHaveBeenCalledTimes(1);
      expect(registryApi.fetchManifestList).toHaveBeenCalledTimes(2);
      expect(registryApi.fetchManifestList.mock.calls[1][0].toString()).toBe('registry.example.com/base:8.1-3');

      // Both references are cached
      await resolver.getManifestList(ImageReference.parse('registry.example.com/base:8.1-3'));
      await resolver.getManifestList(pinned);
      expect(registryApi.fetchManifestList).toHaveBeenCalledTimes(2);
      expect(registryApi.fetchConfigBlob).toHaveBeenCalledTimes(1);
    });

    it('fails when the config lacks the release label', async () => {
      const pinned = ImageReference.parse('registry.example.com/base@sha256:abc');
      const registryApi = createRegistryApi({}, { version: '8.1' });
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      const lookup = resolver.getManifestList(pinned);

      await expect(lookup).rejects.toBeInstanceOf(MalformedConfigBlobError);
      await expect(lookup).rejects.toThrow(
        "Malformed config blob for registry.example.com/base@sha256:abc: no 'release' label"
      );
    });

    it('propagates config blob fetch failures', async () => {
      const registryApi = createRegistryApi({});
      registryApi.fetchConfigBlob.mockRejectedValue(new RegistryUnreachableError('Unable to fetch config'));
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      await expect(
        resolver.getManifestList(ImageReference.parse('registry.example.com/base@sha256:abc'))
      ).rejects.toBeInstanceOf(RegistryUnreachableError);
    });

    it('fails on a registry error without falling back to the config blob', async () => {
      const registryApi = createRegistryApi({});
      registryApi.fetchManifestList.mockRejectedValue(
        new RegistryUnreachableError('Unable to fetch manifest list for registry.example.com/base@sha256:abc')
      );
      const resolver = new ManifestListResolver(registryApi, { insecure: false, mapping });

      const validation = resolver.validatePlatforms(ImageReference.parse('registry.example.com/base@sha256:abc'), [
        'x86_64',
        'aarch64',
      ]);

      await expect(validation).rejects.toBeInstanceOf(RegistryUnreachableError);
      expect(registryApi.fetchConfigBlob).not.toHaveBeenCalled();
    });

    it('does not read the config of a tag reference', async () => {
      const registryApi = createRegistryApi({});
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      await resolver.getManifestList(image);

      expect(registryApi.fetchConfigBlob).not.toHaveBeenCalled();
    });
  });

  describe('resolve', () => {
    it('accepts a list covering every required architecture', async () => {
      const registryApi = createRegistryApi({ 'registry.example.com/base:8.1': list('amd64', 'arm64', 'ppc64le') });
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      await expect(resolver.resolve(image, ['arm64', 'amd64'])).resolves.toEqual(list('amd64', 'arm64', 'ppc64le'));
      expect(core.info).toHaveBeenCalledWith(
        'Manifest list arches: amd64, arm64, ppc64le, expected arches: arm64, amd64'
      );
    });

    it('names the missing architectures', async () => {
      const registryApi = createRegistryApi({ 'registry.example.com/base:8.1': list('amd64') });
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      const error: unknown = await resolver.resolve(image, ['s390x', 'amd64', 'ppc64le']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MissingArchitecturesError);
      if (error instanceof MissingArchitecturesError) {
        expect(error.condition).toBe('missing-architectures');
        expect(error.missingArchitectures).toEqual(['ppc64le', 's390x']);
        expect(error.message).toBe(
          'Missing arches in manifest list for base image registry.example.com/base:8.1: ppc64le, s390x'
        );
      }
    });

    it('skips the coverage check without required architectures', async () => {
      const registryApi = createRegistryApi({ 'registry.example.com/base:8.1': list('amd64') });
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      await expect(resolver.resolve(image)).resolves.toEqual(list('amd64'));
      expect(core.info).not.toHaveBeenCalled();
    });
  });

  describe('architectureDigest', () => {
    it('pins the image to the digest of the architecture', async () => {
      const registryApi = createRegistryApi({ 'registry.example.com/base:8.1': list('amd64', 'arm64') });
      const resolver = new ManifestListResolver(registryApi, { insecure: false });

      const pinned = await resolver.architectureDigest(image, 'arm64');

      expect(pinned?.toString()).toBe('registry.example.com/base@sha256:arm64');
      await expect(resolver.architectureDigest(image, 's390x')).resolves.toBeUndefined();
    });
  });

  describe('validatePlatforms', () => {
    it('skips single platform builds without fetching', async () => {
      const registryApi = createRegistryApi({});
      const resolver = new ManifestListResolver(registryApi, { insecure: false, mapping });

      await resolver.validatePlatforms(image, ['x86_64']);

      expect(registryApi.fetchManifestList).not.toHaveBeenCalled();
      expect(core.info).toHaveBeenCalledWith(
        'Skipping validation of available platforms for base image because this is a single platform build'
      );
    });

    it('skips when expected platforms are unknown', async () => {
      const registryApi = createRegistryApi({});
      const resolver = new ManifestListResolver(registryApi, { insecure: false, mapping });

      await resolver.validatePlatforms(image, undefined);

      expect(registryApi.fetchManifestList).not.toHaveBeenCalled();
    });

    it('skips images without a registry', async () => {
      const registryApi = createRegistryApi({});
      const resolver = new ManifestListResolver(registryApi, { insecure: false, mapping });

      await resolver.validatePlatforms(ImageReference.parse('base:8.1'), ['x86_64', 'aarch64']);

      expect(registryApi.fetchManifestList).not.toHaveBeenCalled();
      expect(core.info).toHaveBeenCalledWith(
        'Cannot validate available platforms for base image because base image registry is not defined'
      );
    });

    it('skips when the platform descriptors are missing or incomplete', async () => {
      const registryApi = createRegistryApi({});

      await new ManifestListResolver(registryApi, { insecure: false }).validatePlatforms(image, ['x86_64', 'aarch64']);
      await new ManifestListResolver(registryApi, { insecure: false, mapping }).validatePlatforms(image, [
        'x86_64',
        'riscv64',
      ]);

      expect(registryApi.fetchManifestList).not.toHaveBeenCalled();
      expect(core.info).toHaveBeenCalledTimes(2);
      expect(core.info).toHaveBeenCalledWith(
        'Cannot validate available platforms for base image because platform descriptors are not defined'
      );
    });

    it('passes when the list covers every platform', async () => {
      const registryApi = createRegistryApi({ 'registry.example.com/base:8.1': list('amd64', 'arm64') });
      const resolver = new ManifestListResolver(registryApi, { insecure: false, mapping });

      await resolver.validatePlatforms(image, ['x86_64', 'aarch64']);

      expect(core.info).toHaveBeenCalledWith('Base image is a manifest list for all required platforms');
    });

    it('fails when a platform is missing from the list', async () => {
      const registryApi = createRegistryApi({ 'registry.example.com/base:8.1': list('amd64') });
      const resolver = new ManifestListResolver(registryApi, { insecure: false, mapping });

      await expect(resolver.validatePlatforms(image, ['x86_64', 'aarch64'])).rejects.toThrow(
        'Missing arches in manifest list for base image registry.example.com/base:8.1: arm64'
      );
    });

    it('fails when there is no manifest list', async () => {
      const registryApi = createRegistryApi({});
      const resolver = new ManifestListResolver(registryApi, { insecure: false, mapping });

      const validation = resolver.validatePlatforms(image, ['x86_64', 'aarch64']);

      await expect(validation).rejects.toBeInstanceOf(ManifestListUnavailableError);
      await expect(validation).rejects.toThrow(
        'Unable to fetch manifest list for base image registry.example.com/base:8.1'
      );
    });
  });

  describe('imageForPlatform', () => {
    it('keeps the image when the current platform is listed', async () => {
      const registryApi = createRegistryApi({ 'registry.example.com/base:8.1': list('amd64', 'arm64') });
      const resolver = new ManifestListResolver(registryApi, { insecure: false, mapping });

      await expect(resolver.imageForPlatform(image, 'aarch64')).resolves.toBe(image);
    });

    it('pins to the last listed platform when the current one is missing', async () => {
      const registryApi = createRegistryApi({ 'registry.example.com/base:8.1': list('ppc64le', 's390x') });
      const resolver = new ManifestListResolver(registryApi, { insecure: false, mapping });

      const chosen = await resolver.imageForPlatform(image, 'x86_64');

      expect(chosen.toString()).toBe('registry.example.com/base@sha256:s390x');
      expect(core.info).toHaveBeenCalledWith(
        'Platform x86_64 is not in the manifest list of registry.example.com/base:8.1, using registry.example.com/base@sha256:s390x'
      );
    });

    it('keeps the image without a manifest list', async () => {
      const resolver = new ManifestListResolver(createRegistryApi({}), { insecure: false, mapping });
      await expect(resolver.imageForPlatform(image, 'x86_64')).resolves.toBe(image);
    });

    it('keeps the image when the descriptors are missing or incomplete', async () => {
      const lists = { 'registry.example.com/base:8.1': list('amd64', 'riscv64') };

      await expect(
        new ManifestListResolver(createRegistryApi(lists), { insecure: false }).imageForPlatform(image, 'aarch64')
      ).resolves.toBe(image);
      await expect(
        new ManifestListResolver(createRegistryApi(lists), { insecure: false, mapping }).imageForPlatform(
          image,
          'aarch64'
        )
      ).resolves.toBe(image);
    });
  });
});
