/**
 * Identity Resolver - decides whether a normalized record is a new entity,
 * an update to a known one, a deletion, or nothing new
 */
import { v4 as uuidv4 } from 'uuid';
import Config, { IdentityPolicy } from '../config';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import { MergeAmbiguity } from '../errors';
import { CanonicalEntity, MergeRecord } from '../types/canonical';
import { DeletionDraft, EntityDraft, NormalizedRecord } from '../types/provider';
import { findEntry, liveEntries, provenanceKey } from '../model/provenance';
import { timeSpan } from '../model/time';
import { similarity } from './heuristics';
import { createEntity, hasChanged, mergeInto, mergeRecordFor, removeProvenance, updateInPlace } from './merge';
import { BatchOverlay } from './overlay';

export type ResolutionOutcome = 'created' | 'updated' | 'deleted' | 'noop';

export interface Resolution {
  outcome: ResolutionOutcome;
  /** Entity after resolution; null only for a delete of an unknown item */
  entity: CanonicalEntity | null;
  matchedBy?: MergeRecord['matchedBy'];
  confidence?: number;
  ambiguity?: MergeAmbiguity;
  /** Describable content is new or replaced, so the entity needs (re)embedding */
  contentChanged?: boolean;
}

interface ScoredCandidate {
  entity: CanonicalEntity;
  confidence: number;
}

export interface ResolverOptions {
  policy: IdentityPolicy;
  newId: () => string;
  now: () => string;
}

const round = (value: number): number => Math.round(value * 1000) / 1000;

export class IdentityResolver {
  private readonly policy: IdentityPolicy;
  private readonly newId: () => string;
  private readonly now: () => string;

  constructor(options: Partial<ResolverOptions> = {}) {
    this.policy = options.policy ?? Config.identity;
    this.newId = options.newId ?? uuidv4;
    this.now = options.now ?? (() => new Date().toISOString());
  }

  /**
   * Resolve one record against the overlay. Changed entities are staged on
   * the overlay; nothing is written to storage here.
   */
  async resolve(record: NormalizedRecord, overlay: BatchOverlay, batchId: string): Promise<Resolution> {
    if (record.deleted) {
      return this.resolveDeletion(record, overlay);
    }
    return this.resolveDraft(record, overlay, batchId);
  }

  private async resolveDeletion(record: DeletionDraft, overlay: BatchOverlay): Promise<Resolution> {
    const key = provenanceKey(record.source, record.nativeId);
    const holders = await overlay.findByProvenance(key);
    const holder = holders.find(entity => findEntry(entity, key)?.removed === false);

    if (!holder) {
      logger.debug({ key }, 'Delete for unknown or already removed item');
      return { outcome: 'noop', entity: null };
    }

    const updated = removeProvenance(holder, key);
    overlay.stage(updated);

    logger.debug({ entityId: holder.entityId, key, tombstoned: updated.deleted }, 'Removed provenance entry');
    return { outcome: 'deleted', entity: updated, matchedBy: 'provenance' };
  }

  private async resolveDraft(draft: EntityDraft, overlay: BatchOverlay, batchId: string): Promise<Resolution> {
    const key = provenanceKey(draft.source, draft.nativeId);

    // 1. Provenance continuity
    const holders = await overlay.findByProvenance(key);
    const holder =
      holders.find(entity => findEntry(entity, key)?.removed === false) ??
      holders.find(entity => !entity.deleted) ??
      holders[0];

    if (holder) {
      const sameContent =
        holder.kind === draft.kind &&
        (holder.contentFingerprint === draft.contentFingerprint || holder.aliasFingerprints.includes(draft.contentFingerprint));

      if (sameContent) {
        return this.merge(holder, draft, overlay, batchId, { matchedBy: 'provenance', confidence: 1, candidates: [] });
      }

      const otherLive = liveEntries(holder).filter(entry => provenanceKey(entry, entry.nativeId) !== key);
      const collision = (await overlay.findByFingerprint(draft.contentFingerprint))
        .some(entity => entity.entityId !== holder.entityId && !entity.deleted);

      if (holder.kind === draft.kind && otherLive.length === 0 && !collision) {
        const updated = updateInPlace(holder, draft);
        overlay.stage(updated);
        overlay.recordMerge(mergeRecordFor(holder, draft, {
          mergeId: this.newId(),
          batchId,
          matchedBy: 'provenance',
          confidence: 1,
          candidates: [],
          at: this.now(),
        }));
        logger.debug({ entityId: holder.entityId, key }, 'Content changed at provider, updated in place');
        return { outcome: 'updated', entity: updated, matchedBy: 'provenance', confidence: 1, contentChanged: true };
      }

      // Other providers still report the old content: split this record off
      if (findEntry(holder, key)?.removed === false) {
        overlay.stage(removeProvenance(holder, key));
      }
      logger.info({ entityId: holder.entityId, key }, 'Detached provenance after content divergence');
    }

    // 2. Exact fingerprint, primary or alias
    const exact = (await overlay.findByFingerprint(draft.contentFingerprint)).filter(entity => entity.kind === draft.kind);
    const match =
      exact.find(entity => !entity.deleted && entity.contentFingerprint === draft.contentFingerprint) ??
      exact.find(entity => !entity.deleted) ??
      exact.find(entity => entity.contentFingerprint === draft.contentFingerprint) ??
      exact[0];

    if (match) {
      const matchedBy = match.contentFingerprint === draft.contentFingerprint ? 'fingerprint' : 'alias';
      return this.merge(match, draft, overlay, batchId, { matchedBy, confidence: 1, candidates: [] });
    }

    // 3. Similarity
    const scored = await this.scoreCandidates(draft, overlay);
    const decision = this.decide(draft, scored);

    if (decision.winner) {
      metrics.similarityMerges.inc({ kind: draft.kind });
      return this.merge(decision.winner.entity, draft, overlay, batchId, {
        matchedBy: 'similarity',
        confidence: decision.winner.confidence,
        candidates: scored.map(c => ({ entityId: c.entity.entityId, confidence: c.confidence })),
      });
    }

    // 4. New entity
    const entity = createEntity(draft, this.newId());
    overlay.stage(entity);
    return { outcome: 'created', entity, ambiguity: decision.ambiguity, contentChanged: true };
  }

  private async scoreCandidates(draft: EntityDraft, overlay: BatchOverlay): Promise<ScoredCandidate[]> {
    const span = timeSpan(draft);
    if (!span || Number.isNaN(span.start)) return [];

    const window = { start: span.start - this.policy.candidateWindowMs, end: span.end + this.policy.candidateWindowMs };
    const candidates = await overlay.candidates(draft.kind, window);

    return candidates
      // Two items from the same account are distinct at the provider
      .filter(entity => !liveEntries(entity).some(entry =>
        entry.provider === draft.source.provider && entry.account === draft.source.account))
      .map(entity => ({ entity, confidence: round(similarity(draft, entity, this.policy)) }))
      .filter(candidate => candidate.confidence > 0)
      .sort((a, b) => b.confidence - a.confidence);
  }

  /**
   * Pick a merge target among scored candidates, or report ambiguity.
   * Above the threshold, more provenance wins, then higher confidence.
   */
  private decide(draft: EntityDraft, scored: ScoredCandidate[]): { winner?: ScoredCandidate; ambiguity?: MergeAmbiguity } {
    const { matchThreshold, ambiguityFloor } = this.policy;
    const above = scored.filter(c => c.confidence >= matchThreshold);
    const near = scored.filter(c => c.confidence >= ambiguityFloor && c.confidence < matchThreshold);
    const summary = (list: ScoredCandidate[]) => list.map(c => ({ entityId: c.entity.entityId, confidence: c.confidence }));

    if (above.length === 1) {
      return { winner: above[0] };
    }

    if (above.length > 1) {
      const ranked = [...above].sort((a, b) =>
        liveEntries(b.entity).length - liveEntries(a.entity).length || b.confidence - a.confidence);
      const [first, second] = ranked;
      const tied =
        liveEntries(first.entity).length === liveEntries(second.entity).length && first.confidence === second.confidence;

      if (!tied) {
        logger.warn({
          nativeId: draft.nativeId,
          chosen: first.entity.entityId,
          candidates: summary(ranked)
        }, 'Similarity tie-break applied, flagged for review');
        return { winner: first };
      }
      return { ambiguity: this.ambiguity(draft, summary(ranked)) };
    }

    if (near.length >= 2) {
      return { ambiguity: this.ambiguity(draft, summary(near)) };
    }

    return {};
  }

  private ambiguity(draft: EntityDraft, candidates: Array<{ entityId: string; confidence: number }>): MergeAmbiguity {
    metrics.mergeAmbiguities.inc({ kind: draft.kind });
    logger.warn({
      kind: draft.kind,
      provider: draft.source.provider,
      account: draft.source.account,
      nativeId: draft.nativeId,
      candidates
    }, 'Ambiguous identity, creating a new entity');
    return new MergeAmbiguity(`Ambiguous identity for ${draft.nativeId}`, candidates);
  }

  private async merge(
    target: CanonicalEntity,
    draft: EntityDraft,
    overlay: BatchOverlay,
    batchId: string,
    details: Pick<MergeRecord, 'matchedBy' | 'confidence' | 'candidates'>
  ): Promise<Resolution> {
    const merged = mergeInto(target, draft, details.matchedBy === 'similarity');

    if (!hasChanged(target, merged)) {
      return { outcome: 'noop', entity: target, matchedBy: details.matchedBy, confidence: details.confidence };
    }

    overlay.stage(merged);
    overlay.recordMerge(mergeRecordFor(target, draft, {
      ...details,
      mergeId: this.newId(),
      batchId,
      at: this.now(),
    }));

    logger.debug({
      entityId: target.entityId,
      matchedBy: details.matchedBy,
      confidence: details.confidence,
      restored: target.deleted
    }, 'Merged record into existing entity');

    return { outcome: 'updated', entity: merged, matchedBy: details.matchedBy, confidence: details.confidence };
  }
}
