/**
 * Incremental Sync Coordinator - owns one pipeline per registered
 * (provider, account), schedules periodic runs and routes triggers
 */
import Config, { SyncPolicy } from '../config';
import { logger } from '../utils/logger';
import { Connector, SyncCursor } from '../types/provider';
import { SyncTrigger } from '../types/events';
import { BatchProcessor } from './batch-processor';
import { CursorStore } from './cursor-store';
import { SyncNotifier } from './notifier';
import { SyncPipeline } from './pipeline';

export class UnknownPipelineError extends Error {
  constructor(provider: string, account: string) {
    super(`No connector registered for ${provider}/${account}`);
    this.name = 'UnknownPipelineError';
  }
}

const pipelineKey = (provider: string, account: string): string => `${provider}/${account}`;

export class SyncCoordinator {
  private pipelines: Map<string, SyncPipeline> = new Map();
  private interval: NodeJS.Timeout | null = null;

  constructor(
    private readonly processor: BatchProcessor,
    private readonly cursors: CursorStore,
    private readonly notifier: SyncNotifier,
    private readonly policy: SyncPolicy = Config.sync
  ) {}

  /**
   * Register a connector and load (or create) its cursor. A cursor left
   * InProgress by a crash resumes from its last committed watermark.
   */
  async register(connector: Connector): Promise<SyncPipeline> {
    const key = pipelineKey(connector.provider, connector.account);
    if (this.pipelines.has(key)) {
      throw new Error(`Connector already registered for ${key}`);
    }

    let cursor = await this.cursors.ensure(connector.provider, connector.account);
    if (cursor.state === 'InProgress') {
      logger.warn({ pipeline: key, watermark: cursor.watermark }, 'Previous run was interrupted, resuming from last committed watermark');
      cursor = { ...cursor, state: 'Idle' };
      await this.cursors.write(cursor);
    }

    const pipeline = new SyncPipeline(connector, this.processor, this.cursors, this.notifier, cursor, this.policy);
    this.pipelines.set(key, pipeline);
    logger.info({ pipeline: key, watermark: cursor.watermark, degraded: cursor.degraded }, 'Connector registered');
    return pipeline;
  }

  /** Stop the pipeline and forget its cursor. Terminal for that account. */
  async deregister(provider: string, account: string): Promise<void> {
    const key = pipelineKey(provider, account);
    const pipeline = this.pipelines.get(key);
    if (!pipeline) {
      throw new UnknownPipelineError(provider, account);
    }

    this.pipelines.delete(key);
    await pipeline.stop();
    await this.cursors.remove(provider, account);
    logger.info({ pipeline: key }, 'Connector deregistered');
  }

  trigger(provider: string, account: string): Promise<void> {
    const pipeline = this.pipelines.get(pipelineKey(provider, account));
    if (!pipeline) {
      return Promise.reject(new UnknownPipelineError(provider, account));
    }
    return pipeline.trigger();
  }

  /** Trigger every pipeline, optionally only one provider's accounts */
  async triggerAll(provider?: string, options: { skipDegraded?: boolean } = {}): Promise<void> {
    const targets = Array.from(this.pipelines.values()).filter(pipeline => {
      const cursor = pipeline.snapshot();
      if (provider !== undefined && cursor.provider !== provider) return false;
      return !(options.skipDegraded && cursor.degraded);
    });
    await Promise.all(targets.map(pipeline => pipeline.trigger()));
  }

  /** Route a broker trigger event */
  async handleTrigger(event: SyncTrigger): Promise<void> {
    if (event.provider !== undefined && event.account !== undefined) {
      await this.trigger(event.provider, event.account);
      return;
    }
    await this.triggerAll(event.provider);
  }

  /** Periodic sync. Degraded providers wait for an explicit trigger. */
  start(intervalMs: number = this.policy.intervalMs): void {
    if (this.interval) return;
    this.interval = setInterval(() => {
      this.triggerAll(undefined, { skipDegraded: true })
        .catch(error => logger.error({ error }, 'Scheduled sync failed'));
    }, intervalMs);
    this.interval.unref();
    logger.info({ intervalMs, pipelines: this.pipelines.size }, 'Sync scheduler started');
  }

  async stop(): Promise<void> {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    await Promise.all(Array.from(this.pipelines.values(), pipeline => pipeline.stop()));
    logger.info('Sync coordinator stopped');
  }

  get(provider: string, account: string): SyncPipeline | undefined {
    return this.pipelines.get(pipelineKey(provider, account));
  }

  list(): SyncCursor[] {
    return Array.from(this.pipelines.values(), pipeline => pipeline.snapshot());
  }

  /** Persisted cursors of accounts with no registered connector */
  async unregistered(): Promise<SyncCursor[]> {
    const persisted = await this.cursors.list();
    return persisted.filter(cursor => !this.pipelines.has(pipelineKey(cursor.provider, cursor.account)));
  }
}
