import * as core from '@actions/core';

import { ActionStateLedger, readPulledImages, removePulledImages } from '../src/pulled-images-ledger';

jest.mock('@actions/core', () => ({
  getState: jest.fn(),
  saveState: jest.fn(),
  info: jest.fn(),
  debug: jest.fn(),
  warning: jest.fn(),
}));

describe('pulled-images-ledger', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('ActionStateLedger', () => {
    it('saves every new name to the action state', () => {
      const ledger = new ActionStateLedger();

      ledger.record('registry.example.com/base:8.1');
      ledger.record('build-7:0');

      expect(ledger.names).toEqual(['registry.example.com/base:8.1', 'build-7:0']);
      expect(core.saveState).toHaveBeenLastCalledWith(
        'pulled-images',
        '["registry.example.com/base:8.1","build-7:0"]'
      );
    });

    it('ignores names already recorded', () => {
      const ledger = new ActionStateLedger(['build-7:0']);

      ledger.record('build-7:0');

      expect(ledger.names).toEqual(['build-7:0']);
      expect(core.saveState).not.toHaveBeenCalled();
    });
  });

  describe('readPulledImages', () => {
    it('reads the names saved by the main step', () => {
      (core.getState as jest.Mock).mockReturnValue('["a:1","b:2"]');
      expect(readPulledImages()).toEqual(['a:1', 'b:2']);
      expect(core.getState).toHaveBeenCalledWith('pulled-images');
    });

    it('returns nothing when no state was saved', () => {
      (core.getState as jest.Mock).mockReturnValue('');
      expect(readPulledImages()).toEqual([]);
    });

    it('ignores unreadable state', () => {
      (core.getState as jest.Mock).mockReturnValue('not-json');
      expect(readPulledImages()).toEqual([]);
      expect(core.warning).toHaveBeenCalledWith(expect.stringMatching(/^Ignoring unreadable pulled images state: /));
    });

    it('keeps only string entries', () => {
      (core.getState as jest.Mock).mockReturnValue('["a:1", 2, null]');
      expect(readPulledImages()).toEqual(['a:1']);
    });
  });

  describe('removePulledImages', () => {
    it('removes images newest first and counts the removals', async () => {
      const removed: string[] = [];
      const runtime = {
        removeImage: jest.fn(async (name: string) => {
          removed.push(name);
          return name !== 'b:2';
        }),
      };

      await expect(removePulledImages(runtime, ['a:1', 'b:2', 'c:3'])).resolves.toBe(2);

      expect(removed).toEqual(['c:3', 'b:2', 'a:1']);
      expect(core.info).toHaveBeenCalledWith('Removed 2 of 3 pulled image(s)');
    });
  });
});
