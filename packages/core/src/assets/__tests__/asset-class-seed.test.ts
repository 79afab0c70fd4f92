import { describe, it, expect } from 'vitest';
import { createSeededDirectory } from '../asset-class-seed.js';
import { DESTRUCTION_CAPABILITY } from '../asset-class.js';

describe('createSeededDirectory', () => {
  it('should attach a minted collection per seed', async () => {
    const directory = createSeededDirectory([
      { classId: 'cans', destructible: true, units: { C1: 'alice', C2: 'bob' } },
      { classId: 'bottles', destructible: false, units: {} },
    ]);

    const cans = directory.resolve('cans');
    const bottles = directory.resolve('bottles');

    await expect(cans?.ownerOf('C2')).resolves.toBe('bob');
    await expect(cans?.supportsCapability(DESTRUCTION_CAPABILITY)).resolves.toBe(true);
    await expect(bottles?.supportsCapability(DESTRUCTION_CAPABILITY)).resolves.toBe(false);
    expect(directory.resolve('glass')).toBeUndefined();
  });

  it('should return an empty directory for no seeds', () => {
    expect(createSeededDirectory([]).resolve('cans')).toBeUndefined();
  });
});
