import { describe, it, expect } from 'vitest';
import { largestPhoto } from '../../adapters/telegram/ResidentBot';

describe('largestPhoto', () => {
  it('picks the size with the most pixels', () => {
    const sizes = [
      { file_id: 'small', file_unique_id: 's', width: 90, height: 60 },
      { file_id: 'large', file_unique_id: 'l', width: 1280, height: 853 },
      { file_id: 'medium', file_unique_id: 'm', width: 320, height: 213 },
    ];

    expect(largestPhoto(sizes)?.file_id).toBe('large');
  });

  it('returns undefined for an empty list', () => {
    expect(largestPhoto([])).toBeUndefined();
  });
});
