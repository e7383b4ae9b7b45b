/**
 * Local Graph Store - in-memory index backed by an append-only JSONL log
 *
 * Every commit is written as one framed JSON line and then applied to
 * memory in a single synchronous step, so readers always see a committed
 * snapshot. A torn frame is skipped whole on replay. The log is replayed
 * on start and compacted into a snapshot once it grows past the configured
 * thresholds.
 */
import { dirname } from 'path';
import { promises as fs } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import { Mutex } from '../utils/mutex';
import Config from '../config';
import { ConflictError, errnoCode } from '../errors';
import {
  CanonicalEntity,
  MergeRecord,
  PendingReference,
  RelationshipEdge,
  SemanticStatus,
  SYMMETRIC_RELATIONS
} from '../types/canonical';
import { StructuralQuery, VectorHit } from '../types/query';
import { CommitResult, CommitUnit, DiskFootprint, EdgeFilter, StorageGateway, StoreStats, vectorRef } from './gateway';
import { compactor as defaultCompactor, Compactor } from './compactor';
import { keyOf, mergeEdge } from '../model/edges';
import { entryKey } from '../model/provenance';
import { anchorTime, spansOverlap, timeSpan } from '../model/time';
import { cosineSimilarity, topK } from '../semantic/vector-math';

type LogRecord =
  | { type: 'entity'; data: CanonicalEntity }
  | { type: 'edge'; data: RelationshipEdge }
  | { type: 'vector'; data: { entityId: string; embedding: number[] } }
  | { type: 'status'; data: { entityId: string; status: SemanticStatus | null } }
  | { type: 'merge'; data: MergeRecord }
  | { type: 'pending'; data: PendingReference }
  | { type: 'resolved'; data: { targetKey: string } };

/** All records of one commit, written as a single line */
type CommitFrame = { type: 'commit'; data: { batchId: string; records: LogRecord[] } };

type LogLine = LogRecord | CommitFrame;

const LOG_RECORD_TYPES = new Set(['entity', 'edge', 'vector', 'status', 'merge', 'pending', 'resolved']);

function isTagged(value: unknown): value is { type: string; data: object } {
  return value !== null && typeof value === 'object' && 'type' in value && 'data' in value &&
    typeof value.type === 'string' && value.data !== null && typeof value.data === 'object';
}

function isLogRecord(value: unknown): value is LogRecord {
  return isTagged(value) && LOG_RECORD_TYPES.has(value.type);
}

function isCommitFrame(value: unknown): value is CommitFrame {
  if (!isTagged(value) || value.type !== 'commit') return false;
  const { data } = value;
  return 'batchId' in data && typeof data.batchId === 'string' &&
    'records' in data && Array.isArray(data.records) && data.records.every(isLogRecord);
}

function samePending(a: PendingReference, b: PendingReference): boolean {
  return a.fromId === b.fromId && a.relationKind === b.relationKind;
}

function fingerprintsOf(entity: CanonicalEntity): string[] {
  return [entity.contentFingerprint, ...entity.aliasFingerprints];
}

/** Copy without the fields hydrated from the vector collection */
function stripHydrated(entity: CanonicalEntity): CanonicalEntity {
  const copy = structuredClone(entity);
  delete copy.semanticVectorRef;
  delete copy.semanticStatus;
  return copy;
}

function addToIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  const ids = index.get(key);
  if (ids) {
    ids.add(id);
  } else {
    index.set(key, new Set([id]));
  }
}

function removeFromIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  const ids = index.get(key);
  if (!ids) return;
  ids.delete(id);
  if (ids.size === 0) index.delete(key);
}

export interface LocalGraphStoreOptions {
  graphPath: string;
  fsync: boolean;
  compactor: Compactor;
}

export class LocalGraphStore implements StorageGateway, DiskFootprint {
  // In-memory snapshot
  private entities: Map<string, CanonicalEntity> = new Map();
  private edges: Map<string, RelationshipEdge> = new Map();
  private vectors: Map<string, number[]> = new Map();
  private unembeddable: Map<string, SemanticStatus> = new Map();
  private merges: Map<string, MergeRecord[]> = new Map();
  private mergeTotal = 0;
  // target provenance key -> references waiting for it
  private pending: Map<string, PendingReference[]> = new Map();

  // Secondary indexes
  private byFingerprint: Map<string, Set<string>> = new Map();
  private byProvenance: Map<string, Set<string>> = new Map();
  private adjacency: Map<string, Set<string>> = new Map();

  // Serializes log writes and compaction
  private readonly writeMutex = new Mutex();
  private commitsSinceCompaction = 0;

  private readonly graphPath: string;
  private readonly fsync: boolean;
  private readonly compactor: Compactor;

  constructor(options: Partial<LocalGraphStoreOptions> = {}) {
    this.graphPath = options.graphPath ?? Config.storage.graphPath;
    this.fsync = options.fsync ?? Config.storage.fsync;
    this.compactor = options.compactor ?? defaultCompactor;
  }

  /**
   * Load the graph log from disk, or start empty when there is none
   */
  async init(): Promise<void> {
    logger.info({ path: this.graphPath }, 'Initializing graph store');

    await fs.mkdir(dirname(this.graphPath), { recursive: true });
    this.clear();

    let data = '';
    try {
      data = await fs.readFile(this.graphPath, 'utf8');
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        logger.error({ error: err }, 'Error loading graph log');
        throw err;
      }
      logger.info('Graph log not found, starting with an empty index');
    }

    let skipped = 0;
    for (const line of data.split('\n')) {
      if (line.trim() === '') continue;
      try {
        const record: unknown = JSON.parse(line);
        if (isCommitFrame(record)) {
          record.data.records.forEach(inner => this.apply(inner));
        } else if (isLogRecord(record)) {
          this.apply(record);
        } else {
          skipped++;
        }
      } catch (err) {
        // A crash mid-append leaves a torn final line; none of its commit is applied
        logger.warn({ error: err, line: line.slice(0, 200) }, 'Error parsing graph log line, skipping');
        skipped++;
      }
    }

    this.updateMetrics();

    logger.info({
      entities: this.entities.size,
      edges: this.edges.size,
      vectors: this.vectors.size,
      skipped
    }, 'Graph store initialized');
  }

  async close(): Promise<void> {
    // Wait for in-flight writes
    await this.writeMutex.runExclusive(async () => undefined);
    logger.info({ path: this.graphPath }, 'Graph store closed');
  }

  private clear(): void {
    this.entities.clear();
    this.edges.clear();
    this.vectors.clear();
    this.unembeddable.clear();
    this.merges.clear();
    this.mergeTotal = 0;
    this.pending.clear();
    this.byFingerprint.clear();
    this.byProvenance.clear();
    this.adjacency.clear();
  }

  // --- Applying records to memory ---

  private apply(record: LogRecord): void {
    switch (record.type) {
      case 'entity':
        this.setEntity(record.data);
        break;
      case 'edge':
        this.setEdge(record.data);
        break;
      case 'vector':
        this.vectors.set(record.data.entityId, record.data.embedding);
        break;
      case 'status':
        if (record.data.status) {
          this.unembeddable.set(record.data.entityId, record.data.status);
        } else {
          this.unembeddable.delete(record.data.entityId);
        }
        break;
      case 'merge': {
        const journal = this.merges.get(record.data.entityId) ?? [];
        journal.push(record.data);
        this.merges.set(record.data.entityId, journal);
        this.mergeTotal++;
        break;
      }
      case 'pending': {
        const waiting = this.pending.get(record.data.targetKey) ?? [];
        if (!waiting.some(ref => samePending(ref, record.data))) waiting.push(record.data);
        this.pending.set(record.data.targetKey, waiting);
        break;
      }
      case 'resolved':
        this.pending.delete(record.data.targetKey);
        break;
    }
  }

  private setEntity(entity: CanonicalEntity): void {
    const previous = this.entities.get(entity.entityId);
    if (previous) {
      for (const fp of fingerprintsOf(previous)) removeFromIndex(this.byFingerprint, fp, previous.entityId);
      for (const entry of previous.provenance) removeFromIndex(this.byProvenance, entryKey(entry), previous.entityId);
    }
    this.entities.set(entity.entityId, entity);
    for (const fp of fingerprintsOf(entity)) addToIndex(this.byFingerprint, fp, entity.entityId);
    for (const entry of entity.provenance) addToIndex(this.byProvenance, entryKey(entry), entity.entityId);
  }

  private setEdge(edge: RelationshipEdge): void {
    const key = keyOf(edge);
    this.edges.set(key, edge);
    addToIndex(this.adjacency, edge.fromId, key);
    addToIndex(this.adjacency, edge.toId, key);
  }

  // --- Reads ---

  private hydrate(entity: CanonicalEntity): CanonicalEntity {
    const copy = structuredClone(entity);
    if (this.vectors.has(entity.entityId)) {
      copy.semanticVectorRef = vectorRef(entity.entityId);
    }
    const status = this.unembeddable.get(entity.entityId);
    if (status) {
      copy.semanticStatus = { ...status };
    }
    return copy;
  }

  private lookup(ids: Iterable<string> | undefined): CanonicalEntity[] {
    const result: CanonicalEntity[] = [];
    for (const id of ids ?? []) {
      const entity = this.entities.get(id);
      if (entity) result.push(this.hydrate(entity));
    }
    return result;
  }

  async getEntity(entityId: string): Promise<CanonicalEntity | null> {
    const entity = this.entities.get(entityId);
    return entity ? this.hydrate(entity) : null;
  }

  async getEntities(entityIds: string[]): Promise<CanonicalEntity[]> {
    return this.lookup(entityIds);
  }

  async findByFingerprint(fingerprint: string): Promise<CanonicalEntity[]> {
    return this.lookup(this.byFingerprint.get(fingerprint));
  }

  async findByProvenance(key: string): Promise<CanonicalEntity[]> {
    return this.lookup(this.byProvenance.get(key));
  }

  /**
   * Structural query. Results are ordered by anchor time, most recent first.
   */
  async query(query: StructuralQuery): Promise<CanonicalEntity[]> {
    const range = query.timeRange
      ? { start: Date.parse(query.timeRange.from), end: Date.parse(query.timeRange.to) }
      : null;
    const source = query.ids ? this.lookupRaw(query.ids) : Array.from(this.entities.values());

    const matches = source.filter(entity => {
      if (!query.includeDeleted && entity.deleted) return false;
      if (query.kind && entity.kind !== query.kind) return false;
      if (range) {
        const span = timeSpan(entity);
        if (!span || !spansOverlap(span, range)) return false;
      }
      return true;
    });

    return matches
      .map(entity => ({ entity, anchor: anchorTime(entity) ?? Number.NEGATIVE_INFINITY }))
      .sort((a, b) => b.anchor - a.anchor || (a.entity.entityId < b.entity.entityId ? -1 : 1))
      .map(({ entity }) => this.hydrate(entity));
  }

  private lookupRaw(ids: string[]): CanonicalEntity[] {
    const result: CanonicalEntity[] = [];
    for (const id of new Set(ids)) {
      const entity = this.entities.get(id);
      if (entity) result.push(entity);
    }
    return result;
  }

  async getEdges(entityId: string, filter: EdgeFilter = {}): Promise<RelationshipEdge[]> {
    const direction = filter.direction ?? 'both';
    const result: RelationshipEdge[] = [];
    for (const key of this.adjacency.get(entityId) ?? []) {
      const edge = this.edges.get(key);
      if (!edge) continue;
      if (filter.relationKind && edge.relationKind !== filter.relationKind) continue;
      const symmetric = SYMMETRIC_RELATIONS.has(edge.relationKind);
      if (direction === 'out' && !symmetric && edge.fromId !== entityId) continue;
      if (direction === 'in' && !symmetric && edge.toId !== entityId) continue;
      result.push({ ...edge });
    }
    return result;
  }

  // --- Writes ---

  async upsertEntity(entity: CanonicalEntity, expectedVersion: number): Promise<number> {
    const result = await this.commitBatch({
      batchId: uuidv4(),
      entities: [{ entity, expectedVersion }],
      edges: [],
      merges: [],
    });
    return result.versions[entity.entityId];
  }

  async upsertEdge(edge: RelationshipEdge): Promise<RelationshipEdge> {
    await this.commitBatch({ batchId: uuidv4(), entities: [], edges: [edge], merges: [] });
    const stored = this.edges.get(keyOf(edge));
    if (!stored) {
      throw new Error(`Edge ${keyOf(edge)} was not stored`);
    }
    return { ...stored };
  }

  /**
   * Atomically apply a commit unit: every entity version is checked and the
   * fingerprint arena is verified before anything is written.
   */
  async commitBatch(unit: CommitUnit): Promise<CommitResult> {
    const result = await this.writeMutex.runExclusive(async () => {
      this.checkVersions(unit);
      this.checkFingerprints(unit);

      const records: LogRecord[] = [];
      const versions: Record<string, number> = {};

      for (const { entity, expectedVersion } of unit.entities) {
        const committed = { ...stripHydrated(entity), version: expectedVersion + 1 };
        versions[entity.entityId] = committed.version;
        records.push({ type: 'entity', data: committed });
      }

      // Edges within one unit may repeat; fold them before writing
      const edgeUpdates: Map<string, RelationshipEdge> = new Map();
      for (const edge of unit.edges) {
        if (edge.fromId === edge.toId) continue;
        const key = keyOf(edge);
        edgeUpdates.set(key, mergeEdge(edgeUpdates.get(key) ?? this.edges.get(key), edge));
      }
      for (const edge of edgeUpdates.values()) {
        records.push({ type: 'edge', data: edge });
      }

      for (const merge of unit.merges) {
        records.push({ type: 'merge', data: merge });
      }
      for (const targetKey of unit.resolvedReferences ?? []) {
        records.push({ type: 'resolved', data: { targetKey } });
      }
      for (const ref of unit.deferred ?? []) {
        records.push({ type: 'pending', data: ref });
      }

      await this.appendRecords(unit.batchId, records);

      // Nothing below awaits, so readers never observe a partial commit
      for (const record of records) {
        this.apply(record);
      }
      for (const edge of edgeUpdates.values()) {
        metrics.edgesUpserted.inc({ relation: edge.relationKind });
      }
      this.commitsSinceCompaction++;
      this.updateMetrics();

      logger.debug({
        batchId: unit.batchId,
        entities: unit.entities.length,
        edges: edgeUpdates.size,
        merges: unit.merges.length,
        deferred: unit.deferred?.length ?? 0
      }, 'Committed batch to graph store');

      return { versions, edges: edgeUpdates.size };
    });

    await this.maybeCompact();
    return result;
  }

  private checkVersions(unit: CommitUnit): void {
    const seen = new Set<string>();
    for (const { entity, expectedVersion } of unit.entities) {
      if (seen.has(entity.entityId)) {
        throw new ConflictError(`Entity ${entity.entityId} appears twice in batch ${unit.batchId}`, entity.entityId);
      }
      seen.add(entity.entityId);

      const stored = this.entities.get(entity.entityId);
      const current = stored ? stored.version : 0;
      if (current !== expectedVersion) {
        logger.warn({
          entityId: entity.entityId,
          expectedVersion,
          currentVersion: current,
          batchId: unit.batchId
        }, 'Version conflict on commit');
        throw new ConflictError(
          `Version conflict on ${entity.entityId}: expected ${expectedVersion}, found ${current}`,
          entity.entityId
        );
      }
    }
  }

  /**
   * At most one live entity may carry a given fingerprint, primary or alias,
   * once the unit is applied.
   */
  private checkFingerprints(unit: CommitUnit): void {
    const incoming: Map<string, CanonicalEntity> = new Map(unit.entities.map(({ entity }) => [entity.entityId, entity]));
    const finalState = (id: string): CanonicalEntity | undefined => incoming.get(id) ?? this.entities.get(id);

    for (const entity of incoming.values()) {
      if (entity.deleted) continue;
      for (const fp of fingerprintsOf(entity)) {
        const holders = new Set(this.byFingerprint.get(fp) ?? []);
        for (const other of incoming.values()) {
          if (fingerprintsOf(other).includes(fp)) holders.add(other.entityId);
        }
        for (const holderId of holders) {
          if (holderId === entity.entityId) continue;
          const holder = finalState(holderId);
          if (holder && !holder.deleted && fingerprintsOf(holder).includes(fp)) {
            throw new ConflictError(
              `Fingerprint ${fp} already belongs to live entity ${holderId}`,
              entity.entityId
            );
          }
        }
      }
    }
  }

  /**
   * Append records to the graph log as one commit frame
   */
  private async appendRecords(batchId: string, records: LogRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.appendLine({ type: 'commit', data: { batchId, records } });
  }

  private async appendLine(line: LogLine): Promise<void> {
    await fs.mkdir(dirname(this.graphPath), { recursive: true });
    const fd = await fs.open(this.graphPath, 'a');
    try {
      await fd.appendFile(JSON.stringify(line) + '\n');

      // Sync to disk only when configured
      if (this.fsync) {
        await fd.sync();
      }
    } finally {
      await fd.close();
    }
  }

  async putVector(entityId: string, embedding: number[]): Promise<string> {
    await this.writeMutex.runExclusive(async () => {
      const records: LogRecord[] = [{ type: 'vector', data: { entityId, embedding: [...embedding] } }];
      if (this.unembeddable.has(entityId)) {
        records.push({ type: 'status', data: { entityId, status: null } });
      }
      await this.appendRecords(uuidv4(), records);
      records.forEach(record => this.apply(record));
    });
    return vectorRef(entityId);
  }

  async getVectors(entityIds: string[]): Promise<Record<string, number[]>> {
    const result: Record<string, number[]> = {};
    for (const id of entityIds) {
      const vector = this.vectors.get(id);
      if (vector) result[id] = [...vector];
    }
    return result;
  }

  /**
   * Top-K cosine search over live entities. Vectors of another dimension
   * are left out rather than compared.
   */
  async queryVectors(embedding: number[], k: number): Promise<VectorHit[]> {
    const hits: VectorHit[] = [];
    for (const [entityId, vector] of this.vectors) {
      const entity = this.entities.get(entityId);
      if (!entity || entity.deleted || vector.length !== embedding.length) continue;
      hits.push({ entityId, score: cosineSimilarity(embedding, vector) });
    }
    return topK(hits, k);
  }

  async markUnembeddable(entityId: string, reason: string): Promise<void> {
    await this.writeMutex.runExclusive(async () => {
      const record: LogRecord = { type: 'status', data: { entityId, status: { state: 'unembeddable', reason } } };
      await this.appendLine(record);
      this.apply(record);
    });
  }

  async listUnembeddable(): Promise<string[]> {
    return Array.from(this.unembeddable.keys());
  }

  async getMerges(entityId: string): Promise<MergeRecord[]> {
    return structuredClone(this.merges.get(entityId) ?? []);
  }

  async getPendingReferences(targetKey: string): Promise<PendingReference[]> {
    return (this.pending.get(targetKey) ?? []).map(ref => ({ ...ref }));
  }

  async stats(): Promise<StoreStats> {
    let live = 0;
    for (const entity of this.entities.values()) {
      if (!entity.deleted) live++;
    }
    return {
      entities: this.entities.size,
      liveEntities: live,
      edges: this.edges.size,
      vectors: this.vectors.size,
      unembeddable: this.unembeddable.size,
      merges: this.mergeTotal,
    };
  }

  // --- Compaction ---

  /**
   * Rewrite the log as a snapshot when the compactor's thresholds are crossed
   * @param force Whether to compact regardless of thresholds
   */
  async maybeCompact(force: boolean = false): Promise<boolean> {
    const compacted = await this.compactor.maybeCompact(
      this.graphPath,
      () => this.writeMutex.runExclusive(() => this.saveSnapshot()),
      this.commitsSinceCompaction,
      force
    );
    if (compacted) {
      this.commitsSinceCompaction = 0;
    }
    return compacted;
  }

  /**
   * Write the full in-memory state to a temp file and atomically replace the log
   */
  private async saveSnapshot(): Promise<void> {
    const lines: string[] = [];
    for (const entity of this.entities.values()) lines.push(JSON.stringify({ type: 'entity', data: entity }));
    for (const edge of this.edges.values()) lines.push(JSON.stringify({ type: 'edge', data: edge }));
    for (const [entityId, embedding] of this.vectors) lines.push(JSON.stringify({ type: 'vector', data: { entityId, embedding } }));
    for (const [entityId, status] of this.unembeddable) lines.push(JSON.stringify({ type: 'status', data: { entityId, status } }));
    for (const journal of this.merges.values()) {
      for (const merge of journal) lines.push(JSON.stringify({ type: 'merge', data: merge }));
    }
    for (const waiting of this.pending.values()) {
      for (const ref of waiting) lines.push(JSON.stringify({ type: 'pending', data: ref }));
    }

    await fs.mkdir(dirname(this.graphPath), { recursive: true });
    const tempPath = `${this.graphPath}.new`;
    await fs.writeFile(tempPath, lines.length > 0 ? lines.join('\n') + '\n' : '', 'utf8');
    await fs.rename(tempPath, this.graphPath);

    logger.info({ path: this.graphPath, lines: lines.length }, 'Saved graph snapshot to disk');
  }

  async getFileSizeMB(): Promise<number> {
    return this.compactor.getFileSizeMB(this.graphPath);
  }

  getLastCompactionTimestamp(): string | null {
    return this.compactor.getLastCompactionTimestamp();
  }

  private updateMetrics(): void {
    metrics.graphNodesTotal.set(this.entities.size);
    metrics.graphEdgesTotal.set(this.edges.size);
  }
}
