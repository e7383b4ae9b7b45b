/**
 * Batch-local overlay over the storage gateway. Records later in a batch
 * must see entities created or changed earlier in the same batch, before
 * anything is committed. Deferred references are staged the same way and
 * go out with the batch's commit unit.
 */
import { CanonicalEntity, EntityKind, MergeRecord, PendingReference, RelationshipEdge } from '../types/canonical';
import { CommitUnit, StorageGateway } from '../storage/gateway';
import { findEntry } from '../model/provenance';
import { spansOverlap, timeSpan, TimeSpan } from '../model/time';

export interface EntityLookup {
  getEntity(entityId: string): Promise<CanonicalEntity | null>;
  findByProvenance(key: string): Promise<CanonicalEntity[]>;
  findByFingerprint(fingerprint: string): Promise<CanonicalEntity[]>;
  /** Live entities of a kind whose time span overlaps the window */
  candidates(kind: EntityKind, window: TimeSpan): Promise<CanonicalEntity[]>;
}

/** Persisted references waiting for their target, as seen by the current batch */
export interface ReferenceLedger {
  pendingFor(targetKey: string): Promise<PendingReference[]>;
  defer(ref: PendingReference): void;
  /** Consume every reference waiting on targetKey */
  resolve(targetKey: string): void;
}

export class BatchOverlay implements EntityLookup, ReferenceLedger {
  // Staged entity plus the version it was read at
  private staged: Map<string, { entity: CanonicalEntity; expectedVersion: number }> = new Map();
  private merges: MergeRecord[] = [];
  private deferred: PendingReference[] = [];
  private resolved: Set<string> = new Set();

  constructor(private readonly store: StorageGateway) {}

  /**
   * Replace stored entities with their staged versions and add staged
   * entities the store does not know about yet
   */
  private overlay(fromStore: CanonicalEntity[], predicate: (entity: CanonicalEntity) => boolean): CanonicalEntity[] {
    const result: Map<string, CanonicalEntity> = new Map();
    for (const stored of fromStore) {
      const current = this.staged.get(stored.entityId)?.entity ?? stored;
      if (predicate(current)) result.set(current.entityId, current);
    }
    for (const { entity } of this.staged.values()) {
      if (!result.has(entity.entityId) && predicate(entity)) {
        result.set(entity.entityId, entity);
      }
    }
    return Array.from(result.values());
  }

  async getEntity(entityId: string): Promise<CanonicalEntity | null> {
    return this.staged.get(entityId)?.entity ?? this.store.getEntity(entityId);
  }

  async findByProvenance(key: string): Promise<CanonicalEntity[]> {
    return this.overlay(await this.store.findByProvenance(key), entity => findEntry(entity, key) !== undefined);
  }

  async findByFingerprint(fingerprint: string): Promise<CanonicalEntity[]> {
    return this.overlay(
      await this.store.findByFingerprint(fingerprint),
      entity => entity.contentFingerprint === fingerprint || entity.aliasFingerprints.includes(fingerprint)
    );
  }

  async candidates(kind: EntityKind, window: TimeSpan): Promise<CanonicalEntity[]> {
    const fromStore = await this.store.query({
      kind,
      timeRange: { from: new Date(window.start).toISOString(), to: new Date(window.end).toISOString() },
    });
    return this.overlay(fromStore, entity => {
      if (entity.kind !== kind || entity.deleted) return false;
      const span = timeSpan(entity);
      return span !== null && spansOverlap(span, window);
    });
  }

  /** Stage an entity; the first staging fixes the version the commit expects */
  stage(entity: CanonicalEntity): void {
    const existing = this.staged.get(entity.entityId);
    this.staged.set(entity.entityId, {
      entity,
      expectedVersion: existing ? existing.expectedVersion : entity.version,
    });
  }

  recordMerge(merge: MergeRecord): void {
    this.merges.push(merge);
  }

  async pendingFor(targetKey: string): Promise<PendingReference[]> {
    const stored = this.resolved.has(targetKey) ? [] : await this.store.getPendingReferences(targetKey);
    return [...stored, ...this.deferred.filter(ref => ref.targetKey === targetKey)];
  }

  defer(ref: PendingReference): void {
    this.deferred.push(ref);
  }

  resolve(targetKey: string): void {
    this.resolved.add(targetKey);
    this.deferred = this.deferred.filter(ref => ref.targetKey !== targetKey);
  }

  get stagedEntities(): CanonicalEntity[] {
    return Array.from(this.staged.values(), ({ entity }) => entity);
  }

  toCommitUnit(batchId: string, edges: RelationshipEdge[]): CommitUnit {
    return {
      batchId,
      entities: Array.from(this.staged.values(), ({ entity, expectedVersion }) => ({ entity, expectedVersion })),
      edges,
      merges: [...this.merges],
      resolvedReferences: Array.from(this.resolved),
      deferred: [...this.deferred],
    };
  }
}
