/**
 * Batch Processor - turns one connector batch into one atomic commit
 *
 * Records are normalized once. Resolution, edge building and the commit are
 * repeated from fresh reads when the store reports a version conflict.
 */
import { v4 as uuidv4 } from 'uuid';
import Config, { SyncPolicy } from '../config';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import { withTimeout } from '../utils/timeout';
import { ConflictError, MergeFailure, NormalizationError } from '../errors';
import { CanonicalEntity, RelationshipEdge } from '../types/canonical';
import { NormalizedRecord, ProviderSource } from '../types/provider';
import { normalize } from '../normalizer';
import { isEmptyUnit, StorageGateway } from '../storage/gateway';
import { BatchOverlay } from '../identity/overlay';
import { IdentityResolver, ResolutionOutcome } from '../identity/resolver';
import { RelationshipBuilder } from '../relationships/builder';
import { QuarantinedRecord, QuarantineLog } from './quarantine';

export type BatchCounts = Record<ResolutionOutcome, number> & { quarantined: number; edges: number };

export interface BatchOutcome {
  batchId: string;
  counts: BatchCounts;
  /** Commit attempts, 1 unless a version conflict forced a retry */
  attempts: number;
  /** Live entities whose describable content is new or replaced */
  changed: CanonicalEntity[];
}

export type CommittedListener = (entities: CanonicalEntity[]) => void;

export interface BatchProcessorOptions {
  resolver: IdentityResolver;
  builder: RelationshipBuilder;
  quarantine: QuarantineLog;
  policy: Pick<SyncPolicy, 'commitTimeoutMs' | 'maxConflictRetries'>;
  onCommitted: CommittedListener;
}

const emptyCounts = (): BatchCounts => ({ created: 0, updated: 0, deleted: 0, noop: 0, quarantined: 0, edges: 0 });

export class BatchProcessor {
  private readonly resolver: IdentityResolver;
  private readonly builder: RelationshipBuilder;
  private readonly quarantine: QuarantineLog;
  private readonly policy: Pick<SyncPolicy, 'commitTimeoutMs' | 'maxConflictRetries'>;
  private readonly listeners: CommittedListener[] = [];

  constructor(private readonly store: StorageGateway, options: Partial<BatchProcessorOptions> = {}) {
    this.resolver = options.resolver ?? new IdentityResolver();
    this.builder = options.builder ?? new RelationshipBuilder();
    this.quarantine = options.quarantine ?? new QuarantineLog();
    this.policy = options.policy ?? Config.sync;
    if (options.onCommitted) this.listeners.push(options.onCommitted);
  }

  /** Register a callback for entities that need embedding after each commit */
  onCommitted(listener: CommittedListener): void {
    this.listeners.push(listener);
  }

  async process(source: ProviderSource, records: unknown[], watermark: string | null): Promise<BatchOutcome> {
    const batchId = uuidv4();
    const { drafts, rejected } = this.normalizeAll(source, records, watermark, batchId);
    const maxAttempts = this.policy.maxConflictRetries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const overlay = new BatchOverlay(this.store);
      const session = this.builder.begin();
      const counts = emptyCounts();
      const edges: RelationshipEdge[] = [];
      const changed: Map<string, CanonicalEntity> = new Map();

      for (const draft of drafts) {
        const resolution = await this.resolver.resolve(draft, overlay, batchId);
        counts[resolution.outcome]++;

        const entity = resolution.entity;
        if (draft.deleted || entity === null || resolution.outcome === 'noop') continue;

        edges.push(...(await session.build(entity, draft, overlay)));
        if (resolution.contentChanged) changed.set(entity.entityId, entity);
      }

      const unit = overlay.toCommitUnit(batchId, edges);
      try {
        if (!isEmptyUnit(unit)) {
          const result = await withTimeout(this.store.commitBatch(unit), this.policy.commitTimeoutMs, `commit batch ${batchId}`);
          counts.edges = result.edges;
        }
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;

        metrics.versionConflicts.inc();
        logger.warn({ batchId, attempt, entityId: error.entityId }, 'Version conflict on commit, retrying batch');
        continue;
      }

      session.commit();
      counts.quarantined = rejected.length;
      await this.quarantine.append(source, rejected);

      for (const outcome of ['created', 'updated', 'deleted', 'noop'] as const) {
        if (counts[outcome] > 0) metrics.recordsProcessed.inc({ provider: source.provider, outcome }, counts[outcome]);
      }
      if (rejected.length > 0) metrics.recordsQuarantined.inc({ provider: source.provider }, rejected.length);

      // Entities changed again later in the batch carry their staged state
      const staged = new Map(overlay.stagedEntities.map(entity => [entity.entityId, entity]));
      const toEmbed = Array.from(changed.keys())
        .map(entityId => staged.get(entityId))
        .filter((entity): entity is CanonicalEntity => entity !== undefined && !entity.deleted);
      if (toEmbed.length > 0) this.notify(toEmbed);

      logger.info({ batchId, provider: source.provider, account: source.account, attempt, ...counts }, 'Batch committed');
      return { batchId, counts, attempts: attempt, changed: toEmbed };
    }

    throw new MergeFailure(`Batch ${batchId} still conflicted after ${maxAttempts} attempts`, maxAttempts);
  }

  private normalizeAll(
    source: ProviderSource,
    records: unknown[],
    watermark: string | null,
    batchId: string
  ): { drafts: NormalizedRecord[]; rejected: Array<Omit<QuarantinedRecord, 'provider' | 'account'>> } {
    const drafts: NormalizedRecord[] = [];
    const rejected: Array<Omit<QuarantinedRecord, 'provider' | 'account'>> = [];
    const at = new Date().toISOString();

    for (const record of records) {
      try {
        drafts.push(normalize(record, source, watermark));
      } catch (error) {
        if (!(error instanceof NormalizationError)) throw error;
        rejected.push({
          nativeId: error.nativeId,
          batchId,
          reason: error.message,
          violations: error.violations,
          record,
          at,
        });
      }
    }
    return { drafts, rejected };
  }

  private notify(entities: CanonicalEntity[]): void {
    for (const listener of this.listeners) {
      try {
        listener(entities);
      } catch (error) {
        logger.error({ error, count: entities.length }, 'Committed-entities listener failed');
      }
    }
  }
}
