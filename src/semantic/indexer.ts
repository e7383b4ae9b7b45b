/**
 * Semantic Indexer - embeds describable entities off the write path
 *
 * A queue of embedding tasks drained by a bounded pool of workers. Failed
 * tasks come back with exponential backoff; after maxAttempts the entity is
 * marked unembeddable and left out of semantic search until retried.
 */
import Config, { SemanticPolicy } from '../config';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import { backoffDelay, withTimeout } from '../utils/timeout';
import { EmbeddingError, errorMessage, IndexErrorCode } from '../errors';
import { CanonicalEntity } from '../types/canonical';
import { VectorHit } from '../types/query';
import { StorageGateway } from '../storage/gateway';
import { describableText } from '../model/text';
import { EmbeddingService } from './embedding';
import { cosineSimilarity, topK } from './vector-math';

export interface EmbeddingTask {
  entityId: string;
  text: string;
  /** Attempts already made */
  attempt: number;
  nextAttemptAt: number;
  controller: AbortController;
  cancelled: boolean;
}

export interface IndexerStatus {
  queued: number;
  inFlight: number;
  concurrency: number;
  stopped: boolean;
}

export class SemanticIndexer {
  private waiting: Map<string, EmbeddingTask> = new Map();
  private inFlight: Map<string, EmbeddingTask> = new Map();
  private wakeTimer: NodeJS.Timeout | null = null;
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(
    private readonly store: StorageGateway,
    private readonly service: EmbeddingService,
    private readonly policy: SemanticPolicy = Config.semantic
  ) {}

  /**
   * Queue an entity for embedding. Returns false for kinds without text and
   * for tombstones. An earlier task for the same entity is cancelled.
   */
  enqueue(entity: CanonicalEntity): boolean {
    if (this.stopped || entity.deleted) return false;
    const text = describableText(entity);
    if (text === undefined) return false;

    this.cancel(entity.entityId);
    this.waiting.set(entity.entityId, {
      entityId: entity.entityId,
      text,
      attempt: 0,
      nextAttemptAt: Date.now(),
      controller: new AbortController(),
      cancelled: false,
    });
    this.updateDepth();
    this.pump();
    return true;
  }

  enqueueAll(entities: CanonicalEntity[]): number {
    return entities.filter(entity => this.enqueue(entity)).length;
  }

  /** Drop a queued task and abort an in-flight request for the entity */
  cancel(entityId: string): boolean {
    let found = false;
    if (this.waiting.delete(entityId)) found = true;

    const running = this.inFlight.get(entityId);
    if (running) {
      running.cancelled = true;
      running.controller.abort(new Error('Embedding task cancelled'));
      this.inFlight.delete(entityId);
      found = true;
    }

    if (found) {
      this.updateDepth();
      this.notifyIfIdle();
    }
    return found;
  }

  /** Re-queue every entity previously marked unembeddable */
  async retryUnembeddable(): Promise<number> {
    const ids = await this.store.listUnembeddable();
    const entities = await this.store.getEntities(ids);
    const queued = this.enqueueAll(entities);
    logger.info({ unembeddable: ids.length, queued }, 'Retrying unembeddable entities');
    return queued;
  }

  /** Resolves once nothing is queued or in flight */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    this.waiting.clear();
    for (const entityId of Array.from(this.inFlight.keys())) {
      this.cancel(entityId);
    }
    this.updateDepth();
    this.notifyIfIdle();
    logger.info('Semantic indexer stopped');
  }

  status(): IndexerStatus {
    return {
      queued: this.waiting.size,
      inFlight: this.inFlight.size,
      concurrency: this.policy.concurrency,
      stopped: this.stopped,
    };
  }

  // --- Search ---

  /**
   * Cosine scores of the given candidates against the text, best first.
   * Candidates without a stored vector are left out. Throws EmbeddingError
   * when the query text cannot be embedded.
   */
  async scoreCandidates(text: string, entityIds: string[], k: number): Promise<VectorHit[]> {
    if (entityIds.length === 0) return [];
    const query = await this.embedQuery(text);
    const vectors = await this.store.getVectors(entityIds);

    const hits: VectorHit[] = [];
    for (const entityId of entityIds) {
      const vector = vectors[entityId];
      if (vector) hits.push({ entityId, score: cosineSimilarity(query, vector) });
    }
    return topK(hits, k);
  }

  /** Store-wide top-K, used when a query has no structural clause */
  async searchSimilar(text: string, k: number): Promise<VectorHit[]> {
    const query = await this.embedQuery(text);
    return this.store.queryVectors(query, k);
  }

  private async embedQuery(text: string): Promise<number[]> {
    const controller = new AbortController();
    try {
      return await withTimeout(
        this.service.embed(text, controller.signal),
        this.policy.requestTimeoutMs,
        'embed query',
        controller
      );
    } catch (error) {
      if (error instanceof EmbeddingError) throw error;
      throw new EmbeddingError(`Query embedding failed: ${errorMessage(error)}`);
    }
  }

  // --- Worker pool ---

  private pump(): void {
    if (this.stopped) return;

    const now = Date.now();
    while (this.inFlight.size < this.policy.concurrency) {
      const next = this.nextDue(now);
      if (!next) break;
      this.waiting.delete(next.entityId);
      this.inFlight.set(next.entityId, next);
      this.run(next).catch(error => logger.error({ error, entityId: next.entityId }, 'Embedding worker crashed'));
    }

    this.scheduleWake(now);
    this.updateDepth();
  }

  private nextDue(now: number): EmbeddingTask | undefined {
    let due: EmbeddingTask | undefined;
    for (const task of this.waiting.values()) {
      if (task.nextAttemptAt <= now && (!due || task.nextAttemptAt < due.nextAttemptAt)) {
        due = task;
      }
    }
    return due;
  }

  /** Wake up when the earliest backed-off task becomes due */
  private scheduleWake(now: number): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    if (this.waiting.size === 0 || this.inFlight.size >= this.policy.concurrency) return;

    let earliest = Infinity;
    for (const task of this.waiting.values()) earliest = Math.min(earliest, task.nextAttemptAt);
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      this.pump();
    }, Math.max(0, earliest - now));
    this.wakeTimer.unref();
  }

  private async run(task: EmbeddingTask): Promise<void> {
    try {
      const vector = await withTimeout(
        this.service.embed(task.text, task.controller.signal),
        this.policy.requestTimeoutMs,
        `embed ${task.entityId}`,
        task.controller
      );
      if (task.cancelled) return;
      if (vector.length !== this.service.dimension) {
        throw new EmbeddingError(
          `Embedding has ${vector.length} dimensions, expected ${this.service.dimension}`,
          'DIMENSION_MISMATCH'
        );
      }

      await this.store.putVector(task.entityId, vector);
      metrics.embeddingsCompleted.inc();
      logger.debug({ entityId: task.entityId, attempt: task.attempt + 1 }, 'Entity embedded');
    } catch (error) {
      if (task.cancelled) return;
      await this.handleFailure(task, error);
    } finally {
      if (this.inFlight.get(task.entityId) === task) {
        this.inFlight.delete(task.entityId);
      }
      this.pump();
      this.notifyIfIdle();
    }
  }

  private async handleFailure(task: EmbeddingTask, error: unknown): Promise<void> {
    const code: IndexErrorCode = error instanceof EmbeddingError ? error.code : 'EMBEDDING_FAILED';
    const attempt = task.attempt + 1;
    metrics.embeddingFailures.inc({ reason: code });

    // A wrong dimension will not fix itself on retry
    if (code === 'DIMENSION_MISMATCH' || attempt >= this.policy.maxAttempts) {
      await this.giveUp(task, code === 'TIMEOUT' ? 'EMBEDDING_FAILED' : code, error);
      return;
    }

    const delay = backoffDelay(task.attempt, this.policy.backoffBaseMs, this.policy.backoffMaxMs);
    logger.warn({ entityId: task.entityId, attempt, delay, error: errorMessage(error) }, 'Embedding failed, retry scheduled');

    // A newer enqueue for the same entity wins
    if (!this.waiting.has(task.entityId) && !this.stopped) {
      this.waiting.set(task.entityId, {
        ...task,
        attempt,
        nextAttemptAt: Date.now() + delay,
        controller: new AbortController(),
      });
    }
  }

  private async giveUp(task: EmbeddingTask, reason: IndexErrorCode, error: unknown): Promise<void> {
    try {
      await this.store.markUnembeddable(task.entityId, reason);
      metrics.entitiesUnembeddable.inc();
      logger.warn({ entityId: task.entityId, reason, attempts: task.attempt + 1, error: errorMessage(error) }, 'Entity marked unembeddable');
    } catch (markError) {
      logger.error({ error: markError, entityId: task.entityId }, 'Failed to mark entity unembeddable');
    }
  }

  private isIdle(): boolean {
    return this.waiting.size === 0 && this.inFlight.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }

  private updateDepth(): void {
    metrics.embeddingQueueDepth.set(this.waiting.size + this.inFlight.size);
  }
}
