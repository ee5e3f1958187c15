import { describe, expect, it } from 'vitest';
import { releaseQuietly } from '../src/browser/cleanup';

describe('releaseQuietly', () => {
  it('runs the release step', async () => {
    const released: string[] = [];
    await releaseQuietly('context', async () => {
      released.push('context');
    });
    expect(released).toEqual(['context']);
  });

  it('does not let a failing release replace the original error', async () => {
    const attempt = async (): Promise<void> => {
      try {
        throw new Error('addInitScript failed');
      } catch (error) {
        await releaseQuietly('context', async () => {
          throw new Error('context already closed');
        });
        throw error;
      }
    };

    await expect(attempt()).rejects.toThrow('addInitScript failed');
  });
});
