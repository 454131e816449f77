/**
 * Free-space probe used to gate dispatch and merges.
 */

import { statfs } from 'fs/promises';
import { DiskLowError } from './errors';
import { silentLogger, type PipelineLogger } from './types';

/** Returns the bytes available to the current user on the volume of `path`. */
export type DiskSpaceProbe = (path: string) => Promise<number>;

export const statfsProbe: DiskSpaceProbe = async (path) => {
  const stats = await statfs(path);
  return stats.bavail * stats.bsize;
};

export class DiskGuard {
  constructor(
    private readonly path: string,
    private readonly thresholdBytes: number,
    private readonly probe: DiskSpaceProbe = statfsProbe,
    private readonly logger: PipelineLogger = silentLogger
  ) {}

  /**
   * Throws DiskLowError when free space is below the threshold. When the
   * volume cannot be probed at all the check is logged and passes.
   */
  async assertFree(): Promise<number> {
    if (this.thresholdBytes <= 0) {
      return Number.POSITIVE_INFINITY;
    }

    let free: number;
    try {
      free = await this.probe(this.path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Free space check failed for ${this.path}: ${message}`);
      return Number.POSITIVE_INFINITY;
    }

    if (free < this.thresholdBytes) {
      throw new DiskLowError(this.path, free, this.thresholdBytes);
    }
    return free;
  }
}
