/**
 * Relationship Builder - derives edges from explicit references and from
 * temporal/spatial co-occurrence
 *
 * Work happens in a session per batch. The sliding window only changes
 * when the session is committed, so a batch that fails and is retried starts
 * from the same state. References whose target is not indexed yet are staged
 * on the batch's ReferenceLedger and persisted with its commit.
 */
import Config, { RelationshipPolicy } from '../config';
import { logger } from '../utils/logger';
import { CanonicalEntity, GeoPoint, RelationshipEdge } from '../types/canonical';
import { EntityDraft } from '../types/provider';
import { coordinatesOf, haversineMeters } from '../model/geo';
import { provenanceKey } from '../model/provenance';
import { anchorTime } from '../model/time';
import { orientEdge } from '../model/edges';
import { EntityLookup, ReferenceLedger } from '../identity/overlay';

export interface WindowEntry {
  entityId: string;
  anchor: number;
  coordinates?: GeoPoint;
  author?: string;
}

export type BatchLookup = EntityLookup & ReferenceLedger;

const MINUTE_MS = 60 * 1000;

/** Move an entry to the front of the window, evicting the oldest past the size bound */
function touchWindow(window: WindowEntry[], entry: WindowEntry, size: number): WindowEntry[] {
  return [entry, ...window.filter(other => other.entityId !== entry.entityId)].slice(0, size);
}

export class RelationshipBuilder {
  private window: WindowEntry[] = [];

  constructor(private readonly policy: RelationshipPolicy = Config.relationships) {}

  begin(): RelationshipSession {
    return new RelationshipSession(this.policy, [...this.window], touched => this.apply(touched));
  }

  /**
   * Replay a committed session's touches onto the shared window. Sessions of
   * concurrently syncing providers commit independently, so touches are
   * replayed rather than the session's copy swapped in.
   */
  private apply(touched: WindowEntry[]): void {
    for (const entry of touched) {
      this.window = touchWindow(this.window, entry, this.policy.windowSize);
    }
  }

  get windowSize(): number {
    return this.window.length;
  }
}

export class RelationshipSession {
  private committed = false;
  private readonly touched: WindowEntry[] = [];

  constructor(
    private readonly policy: RelationshipPolicy,
    private window: WindowEntry[],
    private readonly onCommit: (touched: WindowEntry[]) => void
  ) {}

  /**
   * Edges for one resolved entity. `draft` carries the explicit references
   * and the author identity of the record that produced it.
   */
  async build(entity: CanonicalEntity, draft: EntityDraft, lookup: BatchLookup): Promise<RelationshipEdge[]> {
    if (entity.deleted) return [];

    const edges: RelationshipEdge[] = [
      ...(await this.explicitEdges(entity, draft, lookup)),
      ...(await this.resolvePending(entity, draft, lookup)),
    ];

    const anchor = anchorTime(entity);
    if (anchor !== null && !Number.isNaN(anchor)) {
      const entry: WindowEntry = {
        entityId: entity.entityId,
        anchor,
        coordinates: coordinatesOf(entity),
        author: draft.author,
      };
      edges.push(...this.inferredEdges(entry));
      this.touch(entry);
    }

    return edges.map(orientEdge);
  }

  private async explicitEdges(entity: CanonicalEntity, draft: EntityDraft, lookup: BatchLookup): Promise<RelationshipEdge[]> {
    const edges: RelationshipEdge[] = [];
    for (const reference of draft.references) {
      const targetKey = provenanceKey(draft.source, reference.targetNativeId);
      const targets = await lookup.findByProvenance(targetKey);
      const target = targets.find(candidate => !candidate.deleted);

      if (target) {
        if (target.entityId !== entity.entityId) {
          edges.push({
            fromId: entity.entityId,
            toId: target.entityId,
            relationKind: reference.relationKind,
            confidence: 1,
            evidence: reference.evidence,
            observations: 1,
          });
        }
        continue;
      }

      const waiting = await lookup.pendingFor(targetKey);
      if (!waiting.some(ref => ref.fromId === entity.entityId && ref.relationKind === reference.relationKind)) {
        lookup.defer({
          targetKey,
          fromId: entity.entityId,
          relationKind: reference.relationKind,
          evidence: reference.evidence,
        });
        logger.debug({ targetKey, fromId: entity.entityId }, 'Reference target not indexed yet, deferring edge');
      }
    }
    return edges;
  }

  /** Emit edges for references that were waiting for this record */
  private async resolvePending(entity: CanonicalEntity, draft: EntityDraft, ledger: ReferenceLedger): Promise<RelationshipEdge[]> {
    const key = provenanceKey(draft.source, draft.nativeId);
    const waiting = await ledger.pendingFor(key);
    if (waiting.length === 0) return [];
    ledger.resolve(key);

    return waiting
      .filter(ref => ref.fromId !== entity.entityId)
      .map(ref => ({
        fromId: ref.fromId,
        toId: entity.entityId,
        relationKind: ref.relationKind,
        confidence: 1,
        evidence: ref.evidence,
        observations: 1,
      }));
  }

  /**
   * Co-occurrence and shared authorship against the sliding window.
   * Confidence halves every timeHalfLife minutes and, when both sides carry
   * coordinates, every distanceHalfLife meters.
   */
  private inferredEdges(entry: WindowEntry): RelationshipEdge[] {
    const policy = this.policy;
    const edges: RelationshipEdge[] = [];

    for (const other of this.window) {
      if (other.entityId === entry.entityId) continue;

      const deltaMs = Math.abs(entry.anchor - other.anchor);
      if (deltaMs > policy.windowMinutes * MINUTE_MS) continue;
      const timeFactor = Math.pow(0.5, deltaMs / (policy.timeHalfLifeMinutes * MINUTE_MS));

      let distance: number | undefined;
      if (entry.coordinates && other.coordinates) {
        distance = haversineMeters(entry.coordinates, other.coordinates);
      }

      if (distance === undefined || distance <= policy.windowMeters) {
        const distanceFactor = distance === undefined ? 1 : Math.pow(0.5, distance / policy.distanceHalfLifeMeters);
        const confidence = timeFactor * distanceFactor;
        if (confidence >= policy.minConfidence) {
          edges.push({
            fromId: entry.entityId,
            toId: other.entityId,
            relationKind: 'CoOccurredWith',
            confidence,
            evidence: distance === undefined
              ? `${Math.round(deltaMs / 1000)}s apart`
              : `${Math.round(deltaMs / 1000)}s and ${Math.round(distance)}m apart`,
            observations: 1,
          });
        }
      }

      if (entry.author !== undefined && entry.author === other.author) {
        const confidence = policy.sharedAuthorConfidence * timeFactor;
        if (confidence >= policy.minConfidence) {
          edges.push({
            fromId: entry.entityId,
            toId: other.entityId,
            relationKind: 'SharedAuthor',
            confidence,
            evidence: `authored by ${entry.author}`,
            observations: 1,
          });
        }
      }
    }

    return edges;
  }

  private touch(entry: WindowEntry): void {
    this.window = touchWindow(this.window, entry, this.policy.windowSize);
    this.touched.push(entry);
  }

  /** Publish this session's window changes; call after the batch commits */
  commit(): void {
    if (this.committed) return;
    this.committed = true;
    this.onCommit(this.touched);
  }
}
