/**
 * Sync Pipeline - incremental sync for one (provider, account)
 *
 * State machine: Idle -> InProgress -> Idle on success, or -> Failed on
 * error. The watermark only advances after a batch is durably committed,
 * so a crash or failure replays from the last committed watermark.
 */
import Config, { SyncPolicy } from '../config';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import { backoffDelay, withTimeout } from '../utils/timeout';
import { ConnectorError, errorMessage, IndexError } from '../errors';
import { Connector, ConnectorBatch, ProviderSource, SyncCursor } from '../types/provider';
import { BatchProcessor } from './batch-processor';
import { CursorStore } from './cursor-store';
import { SyncNotifier } from './notifier';

export class SyncPipeline {
  private cursor: SyncCursor;
  private running: Promise<void> | null = null;
  private rerunRequested = false;
  private retryTimer: NodeJS.Timeout | null = null;
  private fetchController: AbortController | null = null;
  private stopped = false;

  constructor(
    private readonly connector: Connector,
    private readonly processor: BatchProcessor,
    private readonly cursors: CursorStore,
    private readonly notifier: SyncNotifier,
    cursor: SyncCursor,
    private readonly policy: SyncPolicy = Config.sync
  ) {
    this.cursor = cursor;
  }

  get key(): string {
    return `${this.connector.provider}/${this.connector.account}`;
  }

  /** Copy of the current cursor */
  snapshot(): SyncCursor {
    return { ...this.cursor, stats: { ...this.cursor.stats } };
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * Run sync until the connector reports no more data. A trigger that
   * arrives while a run is in progress is coalesced into one follow-up run.
   * Resolves when the current run ends; never rejects.
   */
  trigger(): Promise<void> {
    if (this.stopped) {
      logger.warn({ pipeline: this.key }, 'Trigger ignored, pipeline is deregistered');
      return Promise.resolve();
    }

    if (this.running) {
      this.rerunRequested = true;
      logger.debug({ pipeline: this.key }, 'Sync already in progress, coalescing trigger');
      return this.running;
    }

    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }

    this.running = this.run().finally(() => {
      this.running = null;
      if (this.rerunRequested && !this.stopped) {
        this.rerunRequested = false;
        this.trigger().catch(error => logger.error({ error, pipeline: this.key }, 'Coalesced sync run failed'));
      }
    });
    return this.running;
  }

  /** Stop scheduling work and wait for an in-flight run to wind down */
  async stop(): Promise<void> {
    this.stopped = true;
    this.rerunRequested = false;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    this.fetchController?.abort(new Error('Pipeline stopped'));
    if (this.running) {
      await this.running;
    }
  }

  private async run(): Promise<void> {
    try {
      await this.transition({ state: 'InProgress' });
      logger.info({ pipeline: this.key, watermark: this.cursor.watermark }, 'Sync started');

      let hasMore = true;
      while (hasMore && !this.stopped) {
        hasMore = await this.runBatch();
      }
      if (this.stopped) return;

      if (this.cursor.degraded) {
        metrics.providersDegraded.dec();
        logger.info({ pipeline: this.key }, 'Provider recovered from degraded state');
      }
      await this.transition({ state: 'Idle', failureReason: null, degraded: false, attempts: 0 });
      logger.info({ pipeline: this.key, watermark: this.cursor.watermark }, 'Sync finished');
    } catch (error) {
      if (this.stopped) {
        logger.info({ pipeline: this.key }, 'Sync interrupted by deregistration');
        return;
      }
      await this.fail(error);
    }
  }

  /** Fetch, process and commit one batch, then advance the watermark */
  private async runBatch(): Promise<boolean> {
    const timer = metrics.batchDuration.startTimer();
    const controller = new AbortController();
    this.fetchController = controller;

    let batch: ConnectorBatch;
    try {
      batch = await withTimeout(
        this.connector.fetchBatch(this.cursor.watermark, controller.signal),
        this.policy.fetchTimeoutMs,
        `fetch ${this.key}`,
        controller
      );
    } finally {
      this.fetchController = null;
    }

    const source: ProviderSource = { provider: this.connector.provider, account: this.connector.account };
    const outcome = await this.processor.process(source, batch.records, batch.nextWatermark);
    if (this.stopped) return false;

    const stats = this.cursor.stats;
    await this.transition({
      watermark: batch.nextWatermark,
      lastCommittedAt: new Date().toISOString(),
      stats: {
        batches: stats.batches + 1,
        created: stats.created + outcome.counts.created,
        updated: stats.updated + outcome.counts.updated,
        deleted: stats.deleted + outcome.counts.deleted,
        noop: stats.noop + outcome.counts.noop,
        quarantined: stats.quarantined + outcome.counts.quarantined,
      },
    });

    timer();
    metrics.batchesCommitted.inc({ provider: this.connector.provider });
    await this.publish(() => this.notifier.batchCommitted(this.snapshot(), outcome));
    return batch.hasMore;
  }

  private async fail(error: unknown): Promise<void> {
    const permanent = error instanceof ConnectorError && error.kind === 'permanent';
    const reason = errorMessage(error);
    const attempts = this.cursor.attempts + 1;
    const wasDegraded = this.cursor.degraded;

    metrics.batchesFailed.inc({
      provider: this.connector.provider,
      reason: error instanceof IndexError ? error.code : 'UNKNOWN',
    });

    try {
      await this.transition({ state: 'Failed', failureReason: reason, attempts, degraded: wasDegraded || permanent });
    } catch (writeError) {
      logger.error({ error: writeError, pipeline: this.key }, 'Failed to persist failed cursor');
    }

    if (permanent) {
      if (!wasDegraded) metrics.providersDegraded.inc();
      logger.error({ pipeline: this.key, reason }, 'Provider degraded after permanent connector error, operator action required');
      await this.publish(() => this.notifier.providerDegraded(this.snapshot(), reason));
    } else if (attempts <= this.policy.maxRetries) {
      const delay = backoffDelay(attempts - 1, this.policy.retryBaseMs, this.policy.retryMaxMs);
      logger.warn({ pipeline: this.key, reason, attempts, delay }, 'Sync failed, retry scheduled');
      this.scheduleRetry(delay);
    } else {
      logger.error({ pipeline: this.key, reason, attempts }, 'Sync failed, retries exhausted');
    }

    await this.publish(() => this.notifier.syncFailed(this.snapshot(), reason, permanent));
  }

  private scheduleRetry(delay: number): void {
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.trigger().catch(error => logger.error({ error, pipeline: this.key }, 'Retry run failed'));
    }, delay);
    this.retryTimer.unref();
  }

  private async transition(changes: Partial<SyncCursor>): Promise<void> {
    this.cursor = { ...this.cursor, ...changes };
    await this.cursors.write(this.cursor);
  }

  /** Event publication never fails a sync run */
  private async publish(send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (error) {
      logger.error({ error, pipeline: this.key }, 'Failed to publish sync event');
    }
  }
}
