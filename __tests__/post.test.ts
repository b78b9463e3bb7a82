import * as core from '@actions/core';

import { BuildContext } from '../src/build-steps';
import { dockerRuntime } from '../src/docker-command';
import { runPost } from '../src/post';

jest.mock('@actions/core', () => ({
  getInput: jest.fn(),
  getMultilineInput: jest.fn(),
  getBooleanInput: jest.fn(),
  getState: jest.fn(),
  saveState: jest.fn(),
  setSecret: jest.fn(),
  info: jest.fn(),
  warning: jest.fn(),
  debug: jest.fn(),
  error: jest.fn(),
  setFailed: jest.fn(),
}));

jest.mock('../src/docker-command', () => ({
  dockerRuntime: {
    pullImage: jest.fn(),
    tagImage: jest.fn(),
    inspectImage: jest.fn(),
    removeImage: jest.fn(),
  },
}));

const mockRunAsExit = jest.fn();

jest.mock('../src/published-image', () => ({
  ...jest.requireActual('../src/published-image'),
  PublishedImageVerifier: jest.fn(() => ({ runAsPostBuild: jest.fn(), runAsExit: mockRunAsExit })),
}));

const mockInputs = (inputs: Record<string, string>) => {
  (core.getInput as jest.Mock).mockImplementation((name: string) => inputs[name] ?? '');
  (core.getMultilineInput as jest.Mock).mockImplementation((name: string) =>
    (inputs[name] ?? '').split('\n').filter((line) => line !== '')
  );
  (core.getBooleanInput as jest.Mock).mockImplementation((name: string) => inputs[name] === 'true');
};

describe('post', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    (core.getState as jest.Mock).mockReturnValue('["registry.example.com/base:8.1","build-7:0"]');
    (dockerRuntime.removeImage as jest.Mock).mockResolvedValue(true);
  });

  it('removes the pulled images newest first', async () => {
    mockInputs({ 'base-image': 'registry.example.com/base:8.1' });

    await runPost();

    expect((dockerRuntime.removeImage as jest.Mock).mock.calls).toEqual([
      ['build-7:0'],
      ['registry.example.com/base:8.1'],
    ]);
    expect(core.info).toHaveBeenCalledWith('Removed 2 of 2 pulled image(s)');
  });

  it('keeps the images when removal is disabled', async () => {
    mockInputs({ 'base-image': 'registry.example.com/base:8.1', 'remove-pulled-images': 'false' });

    await runPost();

    expect(dockerRuntime.removeImage).not.toHaveBeenCalled();
    expect(core.info).toHaveBeenCalledWith('Keeping 2 pulled image(s)');
  });

  it('verifies in the exit role and removes the images it pulled too', async () => {
    mockInputs({
      mode: 'verify-published',
      'verify-as': 'exit',
      images: 'app:build-7',
      registry: 'registry.example.com',
    });
    mockRunAsExit.mockImplementationOnce(async (context: BuildContext) => {
      context.ledger.record('registry.example.com/app:build-7');
      return { skipped: false, image: 'registry.example.com/app:build-7', mediaTypes: [], imageId: 'sha256:123' };
    });

    await runPost();

    expect(mockRunAsExit).toHaveBeenCalledTimes(1);
    expect(dockerRuntime.removeImage).toHaveBeenCalledTimes(3);
    expect(dockerRuntime.removeImage).toHaveBeenNthCalledWith(1, 'registry.example.com/app:build-7');
  });

  it('does not verify in the post-build role', async () => {
    mockInputs({ mode: 'verify-published', images: 'app:build-7', registry: 'registry.example.com' });
    await runPost();

    expect(mockRunAsExit).not.toHaveBeenCalled();
    expect(dockerRuntime.removeImage).toHaveBeenCalledTimes(2);
  });

  it('still removes images when verification fails', async () => {
    mockInputs({
      mode: 'verify-published',
      'verify-as': 'exit',
      images: 'app:build-7',
      registry: 'registry.example.com',
    });
    mockRunAsExit.mockRejectedValueOnce(new Error('registry timeout'));

    await runPost();

    expect(core.setFailed).toHaveBeenCalledWith('registry timeout');
    expect(dockerRuntime.removeImage).toHaveBeenCalledTimes(2);
  });
});
