/**
 * Graph Log Compactor - rewrites the append-only graph log as a snapshot
 *
 * Every commit appends to the log, so superseded entity versions and edge
 * updates pile up. Compaction replaces the log with one line per live
 * record once enough commits or bytes have accumulated.
 */
import { promises as fs } from 'fs';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import Config from '../config';
import { errnoCode } from '../errors';

export interface CompactionThresholds {
  /** Commits since the last compaction */
  commits: number;
  megabytes: number;
}

export type CompactionReason = 'forced' | 'commits' | 'size';

export interface Compactor {
  /**
   * Run `snapshot` if a threshold has been crossed; resolves to whether the
   * log was rewritten
   */
  maybeCompact(graphPath: string, snapshot: () => Promise<void>, commitCount: number, force?: boolean): Promise<boolean>;

  getFileSizeMB(graphPath: string): Promise<number>;

  /** ISO timestamp of the last compaction, or null if never compacted */
  getLastCompactionTimestamp(): string | null;
}

const BYTES_PER_MB = 1024 * 1024;

export function compactionReason(
  thresholds: CompactionThresholds,
  commitCount: number,
  sizeMB: number,
  force: boolean
): CompactionReason | null {
  if (force) return 'forced';
  if (commitCount >= thresholds.commits) return 'commits';
  if (sizeMB >= thresholds.megabytes) return 'size';
  return null;
}

export class DefaultCompactor implements Compactor {
  private lastCompactedAt: string | null = null;

  constructor(
    private readonly thresholds: CompactionThresholds = {
      commits: Config.storage.compactThreshold,
      megabytes: Config.storage.compactMbLimit,
    }
  ) {}

  async maybeCompact(graphPath: string, snapshot: () => Promise<void>, commitCount: number, force = false): Promise<boolean> {
    const beforeMB = await this.getFileSizeMB(graphPath);
    const reason = compactionReason(this.thresholds, commitCount, beforeMB, force);
    if (reason === null) return false;

    logger.info({ graphPath, reason, commitCount, sizeMB: beforeMB }, 'Compacting graph log');
    const endTimer = metrics.graphCompactionTimeSeconds.startTimer();

    try {
      await snapshot();
    } catch (error) {
      // The previous log is still in place; the next commit retries
      logger.error({ error, graphPath, reason }, 'Graph log compaction failed');
      return false;
    } finally {
      endTimer();
    }

    const afterMB = await this.getFileSizeMB(graphPath);
    metrics.graphCompactionsTotal.inc();
    metrics.graphLogBytes.set(afterMB * BYTES_PER_MB);
    this.lastCompactedAt = new Date().toISOString();

    logger.info({ graphPath, reason, beforeMB, afterMB }, 'Graph log compacted');
    return true;
  }

  async getFileSizeMB(graphPath: string): Promise<number> {
    try {
      const { size } = await fs.stat(graphPath);
      return size / BYTES_PER_MB;
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        logger.error({ error, graphPath }, 'Could not stat graph log');
      }
      return 0;
    }
  }

  getLastCompactionTimestamp(): string | null {
    return this.lastCompactedAt;
  }
}

export const compactor = new DefaultCompactor();
