import { CanonicalEntity, EntityKind, RelationKind, RelationshipEdge } from './canonical';

export interface TimeRange {
  from: string;
  to: string;
}

export type TraversalDirection = 'out' | 'in' | 'both';

export interface CompositeQuery {
  kind?: EntityKind;
  timeRange?: TimeRange;
  relation?: {
    seed: string;
    relationKind?: RelationKind;
    maxDepth: number;
    direction?: TraversalDirection;
  };
  semantic?: {
    text: string;
    k: number;
  };
  includeDeleted?: boolean;
  limit?: number;
}

/** Structural clauses understood by the storage gateway */
export interface StructuralQuery {
  kind?: EntityKind;
  timeRange?: TimeRange;
  ids?: string[];
  includeDeleted?: boolean;
}

export interface SearchHit {
  entity: CanonicalEntity;
  score: number;
  /** Hop count from the relational seed, when a relation clause was given */
  depth?: number;
}

export interface SearchResult {
  hits: SearchHit[];
  semantic: 'applied' | 'skipped' | 'unavailable';
}

export interface EdgeView {
  edge: RelationshipEdge;
  neighborId: string;
  neighbor: CanonicalEntity | null;
  neighborDeleted: boolean;
}

export interface VectorHit {
  entityId: string;
  score: number;
}
