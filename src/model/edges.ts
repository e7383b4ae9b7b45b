import { RelationKind, RelationshipEdge, SYMMETRIC_RELATIONS } from '../types/canonical';

/** Symmetric relations are stored with the smaller id first */
export function orientEdge(edge: RelationshipEdge): RelationshipEdge {
  if (SYMMETRIC_RELATIONS.has(edge.relationKind) && edge.toId < edge.fromId) {
    return { ...edge, fromId: edge.toId, toId: edge.fromId };
  }
  return edge;
}

export function edgeKey(fromId: string, toId: string, relationKind: RelationKind): string {
  if (SYMMETRIC_RELATIONS.has(relationKind) && toId < fromId) {
    return `${toId}|${relationKind}|${fromId}`;
  }
  return `${fromId}|${relationKind}|${toId}`;
}

export const keyOf = (edge: RelationshipEdge): string => edgeKey(edge.fromId, edge.toId, edge.relationKind);

/** Noisy-or: independent observations strengthen each other, capped at 1 */
export function combineConfidence(a: number, b: number): number {
  return 1 - (1 - a) * (1 - b);
}

/**
 * Merge a newly observed edge into the stored one. Confidence strengthens,
 * observations accumulate and the latest evidence wins.
 */
export function mergeEdge(existing: RelationshipEdge | undefined, incoming: RelationshipEdge): RelationshipEdge {
  const oriented = orientEdge(incoming);
  if (!existing) {
    return { ...oriented, observations: Math.max(1, oriented.observations) };
  }
  return {
    ...existing,
    confidence: combineConfidence(existing.confidence, oriented.confidence),
    evidence: oriented.evidence,
    observations: existing.observations + Math.max(1, oriented.observations),
  };
}
