/**
 * Storage Gateway - persistence interface for entities, edges, vectors and
 * the merge journal. Every other component reaches storage through it.
 */
import { CanonicalEntity, MergeRecord, PendingReference, RelationKind, RelationshipEdge } from '../types/canonical';
import { StructuralQuery, TraversalDirection, VectorHit } from '../types/query';

/** One batch's worth of writes, applied atomically */
export interface CommitUnit {
  batchId: string;
  /** expectedVersion 0 means the entity must not exist yet */
  entities: Array<{ entity: CanonicalEntity; expectedVersion: number }>;
  edges: RelationshipEdge[];
  merges: MergeRecord[];
  /** Target keys whose pending references were turned into edges; applied before `deferred` */
  resolvedReferences?: string[];
  deferred?: PendingReference[];
}

export function isEmptyUnit(unit: CommitUnit): boolean {
  return unit.entities.length === 0 && unit.edges.length === 0 && unit.merges.length === 0 &&
    (unit.resolvedReferences ?? []).length === 0 && (unit.deferred ?? []).length === 0;
}

export interface CommitResult {
  /** New version per committed entity id */
  versions: Record<string, number>;
  edges: number;
}

export interface EdgeFilter {
  relationKind?: RelationKind;
  /** out: entity is fromId; in: entity is toId; symmetric edges match both */
  direction?: TraversalDirection;
}

export interface StoreStats {
  entities: number;
  liveEntities: number;
  edges: number;
  vectors: number;
  unembeddable: number;
  merges: number;
}

export interface StorageGateway {
  init(): Promise<void>;
  close(): Promise<void>;

  getEntity(entityId: string): Promise<CanonicalEntity | null>;
  getEntities(entityIds: string[]): Promise<CanonicalEntity[]>;
  /** Entities carrying the fingerprint as primary or alias, tombstones included */
  findByFingerprint(fingerprint: string): Promise<CanonicalEntity[]>;
  /** Entities holding a provenance entry with this key, removed entries included */
  findByProvenance(key: string): Promise<CanonicalEntity[]>;
  query(query: StructuralQuery): Promise<CanonicalEntity[]>;

  /** Throws ConflictError when the stored version differs from expectedVersion */
  upsertEntity(entity: CanonicalEntity, expectedVersion: number): Promise<number>;
  /** Merges into an existing edge with the same key */
  upsertEdge(edge: RelationshipEdge): Promise<RelationshipEdge>;
  getEdges(entityId: string, filter?: EdgeFilter): Promise<RelationshipEdge[]>;
  commitBatch(unit: CommitUnit): Promise<CommitResult>;

  /** Stores an embedding and returns the entity's vector reference */
  putVector(entityId: string, embedding: number[]): Promise<string>;
  getVectors(entityIds: string[]): Promise<Record<string, number[]>>;
  queryVectors(embedding: number[], k: number): Promise<VectorHit[]>;
  markUnembeddable(entityId: string, reason: string): Promise<void>;
  listUnembeddable(): Promise<string[]>;

  getMerges(entityId: string): Promise<MergeRecord[]>;
  /** References still waiting for an entity indexed under this provenance key */
  getPendingReferences(targetKey: string): Promise<PendingReference[]>;
  stats(): Promise<StoreStats>;
}

export const vectorRef = (entityId: string): string => `vec:${entityId}`;

/** Size of the on-disk log, for stores that keep one */
export interface DiskFootprint {
  getFileSizeMB(): Promise<number>;
  getLastCompactionTimestamp(): string | null;
}
