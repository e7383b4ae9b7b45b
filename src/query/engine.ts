/**
 * Query Engine - composite structural, relational and semantic search
 *
 * Cheap clauses run first: structural filters at the store, then a
 * depth-bounded walk over edges. The semantic clause only ever scores the
 * candidates those clauses leave, and is dropped (not fatal) when the
 * embedding service is unavailable.
 */
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import { EmbeddingError } from '../errors';
import { CanonicalEntity } from '../types/canonical';
import { CompositeQuery, EdgeView, SearchHit, SearchResult, VectorHit } from '../types/query';
import { EdgeFilter, StorageGateway } from '../storage/gateway';
import { anchorTime } from '../model/time';
import { validateCompositeQueryMessage } from '../utils/schema-validator';

/** The part of the semantic indexer the engine depends on */
export interface SemanticSearch {
  scoreCandidates(text: string, entityIds: string[], k: number): Promise<VectorHit[]>;
  searchSimilar(text: string, k: number): Promise<VectorHit[]>;
}

export const DEFAULT_LIMIT = 100;

interface Reached {
  depth: number;
  /** Product of edge confidences along the best path */
  confidence: number;
}

const anchorOf = (entity: CanonicalEntity): number => anchorTime(entity) ?? Number.NEGATIVE_INFINITY;

function byAnchor(a: SearchHit, b: SearchHit): number {
  return anchorOf(b.entity) - anchorOf(a.entity) || compareIds(a, b);
}

function compareIds(a: SearchHit, b: SearchHit): number {
  return a.entity.entityId < b.entity.entityId ? -1 : a.entity.entityId > b.entity.entityId ? 1 : 0;
}

export class QueryEngine {
  constructor(private readonly store: StorageGateway, private readonly semantic: SemanticSearch | null = null) {}

  /** Validate and run a composite query; throws SchemaValidationError on bad input */
  async search(input: unknown): Promise<SearchResult> {
    const query = validateCompositeQueryMessage(input);
    const end = metrics.queryDuration.startTimer({ semantic: query.semantic ? 'yes' : 'no' });
    try {
      return await this.execute(query);
    } finally {
      end();
    }
  }

  private async execute(query: CompositeQuery): Promise<SearchResult> {
    const limit = query.limit ?? DEFAULT_LIMIT;
    const hasStructural = query.kind !== undefined || query.timeRange !== undefined;

    if (!hasStructural && !query.relation) {
      return this.unconstrained(query, limit);
    }

    // 1. Relational clause
    let reached: Map<string, Reached> | undefined;
    if (query.relation) {
      reached = await this.traverse(query.relation);
    }

    // 2. Structural clause, intersected with what the walk reached
    const entities = await this.store.query({
      kind: query.kind,
      timeRange: query.timeRange,
      includeDeleted: query.includeDeleted,
      ids: reached ? Array.from(reached.keys()) : undefined,
    });

    let hits: SearchHit[] = entities.map(entity => {
      const via = reached?.get(entity.entityId);
      return via ? { entity, score: via.confidence, depth: via.depth } : { entity, score: 0 };
    });
    hits.sort(reached ? QueryEngine.byRelation : byAnchor);

    // 3. Semantic clause over the candidates only
    if (!query.semantic) {
      return { hits: hits.slice(0, limit), semantic: 'skipped' };
    }

    metrics.semanticCandidatesScored.observe(hits.length);
    try {
      hits = await this.rankSemantically(hits, query.semantic.text, query.semantic.k);
      return { hits: hits.slice(0, limit), semantic: 'applied' };
    } catch (error) {
      if (!(error instanceof EmbeddingError)) throw error;
      logger.warn({ error: error.message, candidates: hits.length }, 'Semantic scoring unavailable, returning structural results');
      return { hits: hits.slice(0, limit), semantic: 'unavailable' };
    }
  }

  /** No structural or relational clause: store-wide vector search, or everything by recency */
  private async unconstrained(query: CompositeQuery, limit: number): Promise<SearchResult> {
    if (query.semantic && this.semantic) {
      try {
        const vectorHits = await this.semantic.searchSimilar(query.semantic.text, query.semantic.k);
        const entities = new Map(
          (await this.store.getEntities(vectorHits.map(hit => hit.entityId))).map(entity => [entity.entityId, entity])
        );
        const hits: SearchHit[] = [];
        for (const hit of vectorHits) {
          const entity = entities.get(hit.entityId);
          if (entity && (query.includeDeleted || !entity.deleted)) hits.push({ entity, score: hit.score });
        }
        return { hits: hits.slice(0, limit), semantic: 'applied' };
      } catch (error) {
        if (!(error instanceof EmbeddingError)) throw error;
        logger.warn({ error: error.message }, 'Semantic search unavailable, returning recent entities');
      }
    }

    const entities = await this.store.query({ includeDeleted: query.includeDeleted });
    const hits = entities.map(entity => ({ entity, score: 0 })).sort(byAnchor).slice(0, limit);
    return { hits, semantic: query.semantic ? 'unavailable' : 'skipped' };
  }

  /**
   * Scored candidates first, best first; candidates with no vector yet
   * follow in their structural order. At most k hits.
   */
  private async rankSemantically(hits: SearchHit[], text: string, k: number): Promise<SearchHit[]> {
    if (!this.semantic) {
      throw new EmbeddingError('No semantic indexer configured');
    }
    const scored = await this.semantic.scoreCandidates(text, hits.map(hit => hit.entity.entityId), hits.length);
    const byId = new Map(hits.map(hit => [hit.entity.entityId, hit]));

    const ranked: SearchHit[] = [];
    for (const { entityId, score } of scored) {
      const hit = byId.get(entityId);
      if (hit) {
        ranked.push({ ...hit, score });
        byId.delete(entityId);
      }
    }
    for (const hit of hits) {
      if (byId.has(hit.entity.entityId)) ranked.push({ ...hit, score: 0 });
    }
    return ranked.slice(0, k);
  }

  /** Breadth-first walk from the seed; the seed itself is never a result */
  private async traverse(relation: NonNullable<CompositeQuery['relation']>): Promise<Map<string, Reached>> {
    const filter: EdgeFilter = { relationKind: relation.relationKind, direction: relation.direction ?? 'both' };
    const reached: Map<string, Reached> = new Map();
    let frontier: Array<{ id: string; confidence: number }> = [{ id: relation.seed, confidence: 1 }];

    for (let depth = 1; depth <= relation.maxDepth && frontier.length > 0; depth++) {
      const next: Array<{ id: string; confidence: number }> = [];
      for (const node of frontier) {
        for (const edge of await this.store.getEdges(node.id, filter)) {
          const neighbor = edge.fromId === node.id ? edge.toId : edge.fromId;
          if (neighbor === relation.seed) continue;

          const confidence = node.confidence * edge.confidence;
          const seen = reached.get(neighbor);
          if (!seen) {
            reached.set(neighbor, { depth, confidence });
            next.push({ id: neighbor, confidence });
          } else if (seen.depth === depth && confidence > seen.confidence) {
            seen.confidence = confidence;
          }
        }
      }
      frontier = next;
    }

    logger.debug({ seed: relation.seed, maxDepth: relation.maxDepth, reached: reached.size }, 'Relational traversal complete');
    return reached;
  }

  private static byRelation(a: SearchHit, b: SearchHit): number {
    return (a.depth ?? Infinity) - (b.depth ?? Infinity) || b.score - a.score || byAnchor(a, b);
  }

  /** Edges of an entity with the entity at the other end, tombstones flagged */
  async describeEdges(entityId: string, filter: EdgeFilter = {}): Promise<EdgeView[]> {
    const edges = await this.store.getEdges(entityId, filter);
    const neighborIds = edges.map(edge => (edge.fromId === entityId ? edge.toId : edge.fromId));
    const neighbors = new Map((await this.store.getEntities(neighborIds)).map(entity => [entity.entityId, entity]));

    return edges.map((edge, index) => {
      const neighborId = neighborIds[index];
      const neighbor = neighbors.get(neighborId) ?? null;
      return { edge, neighborId, neighbor, neighborDeleted: neighbor === null || neighbor.deleted };
    });
  }
}
