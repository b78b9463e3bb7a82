import {
  getErrorMessage,
  ImagePullError,
  ManifestListUnavailableError,
  RegistryHttpError,
  RegistryInteractionError,
  RegistryTimeoutError,
} from '../src/errors';

describe('errors', () => {
  it('carries the condition and the class name', () => {
    const error = new ManifestListUnavailableError('registry.example.com/base:8.1');

    expect(error).toBeInstanceOf(RegistryInteractionError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ManifestListUnavailableError');
    expect(error.condition).toBe('manifest-list-unavailable');
    expect(error.message).toBe('Unable to fetch manifest list for base image registry.example.com/base:8.1');
  });

  it('names the elapsed and configured seconds on timeout', () => {
    const error = new RegistryTimeoutError('registry.example.com/app:build-7', 1230, 1200);
    expect(error.elapsedSeconds).toBe(1230);
    expect(error.message).toBe(
      'registry.example.com/app:build-7 did not appear in the registry: 1230 seconds elapsed, 1200 seconds exceeded'
    );
  });

  it('exposes the HTTP status', () => {
    const error = new RegistryHttpError({
      url: 'https://registry.example.com/v2/app/manifests/1',
      status: 404,
      statusText: 'Not Found',
      responseHeaders: {},
      responseBody: '',
      requestHeaders: {},
    });
    expect(error.status).toBe(404);
    expect(error.message).toBe('[404] Not Found from https://registry.example.com/v2/app/manifests/1');
  });

  describe('getErrorMessage', () => {
    it('reads the message of errors', () => {
      expect(getErrorMessage(new ImagePullError('fedora', 'exit code 1'))).toBe(
        'Failed to pull image fedora: exit code 1'
      );
    });

    it('converts other values', () => {
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage(undefined)).toBe('Unknown error');
    });
  });
});
