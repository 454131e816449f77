import { describe, it, expect, vi } from 'vitest';
import { DiskGuard } from '../../../src/main/pipeline/diskSpace';
import { DiskLowError, formatBytes } from '../../../src/main/pipeline/errors';

describe('DiskGuard', () => {
  it('returns the free byte count when above the threshold', async () => {
    const guard = new DiskGuard('/archive', 1024, async () => 4096);

    await expect(guard.assertFree()).resolves.toBe(4096);
  });

  it('throws DiskLowError below the threshold', async () => {
    const guard = new DiskGuard('/archive', 2 * 1024 ** 3, async () => 512 * 1024 ** 2);

    const error = await guard.assertFree().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DiskLowError);
    if (error instanceof DiskLowError) {
      expect(error.message).toBe('Disk low on /archive: 512.0 MB free, 2.0 GB required');
      expect(error.freeBytes).toBe(512 * 1024 ** 2);
      expect(error.severity).toBe('transient');
    }
  });

  it('does not probe when the threshold is zero', async () => {
    const probe = vi.fn(async () => 0);
    const guard = new DiskGuard('/archive', 0, probe);

    await expect(guard.assertFree()).resolves.toBe(Number.POSITIVE_INFINITY);
    expect(probe).not.toHaveBeenCalled();
  });

  it('logs and passes when the probe fails', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const guard = new DiskGuard(
      '/archive',
      1024,
      async () => {
        throw new Error('ENOSYS');
      },
      logger
    );

    await expect(guard.assertFree()).resolves.toBe(Number.POSITIVE_INFINITY);
    expect(logger.warn).toHaveBeenCalledWith('Free space check failed for /archive: ENOSYS');
  });
});

describe('formatBytes', () => {
  it('picks the largest fitting unit', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(3 * 1024 ** 2)).toBe('3.0 MB');
    expect(formatBytes(1024 ** 3)).toBe('1.0 GB');
  });
});
