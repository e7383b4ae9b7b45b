/**
 * Similarity heuristics for the identity resolver. Each returns a score in
 * [0, 1] as a weighted sum of per-signal matches; weights come from the
 * identity policy.
 */
import { IdentityPolicy } from '../config';
import { CanonicalEntity, EntityPayload, TimestampObservation } from '../types/canonical';
import { haversineMeters } from '../model/geo';
import { anchorTime } from '../model/time';

type Scored = EntityPayload & { timestamps: TimestampObservation[] };

function tokens(value: string): Set<string> {
  return new Set(
    value
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter(token => token !== '')
  );
}

export function jaccard<T>(a: Set<T>, b: Set<T>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let shared = 0;
  for (const item of a) {
    if (b.has(item)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

/** 1 for a case-insensitive match, otherwise token overlap */
export function textSimilarity(a: string | undefined, b: string | undefined): number {
  if (a === undefined || b === undefined) return 0;
  if (a.toLowerCase() === b.toLowerCase()) return 1;
  return jaccard(tokens(a), tokens(b));
}

const REPLY_PREFIX = /^((re|fw|fwd|aw|sv)\s*:\s*)+/i;

function baseSubject(subject: string | undefined): string | undefined {
  return subject === undefined ? undefined : subject.replace(REPLY_PREFIX, '').trim().toLowerCase();
}

/** Overlap of two intervals relative to their union */
export function intervalOverlap(aStart: number, aEnd: number, bStart: number, bEnd: number): number {
  const union = Math.max(aEnd, bEnd) - Math.min(aStart, bStart);
  if (union === 0) return 1;
  const overlap = Math.min(aEnd, bEnd) - Math.max(aStart, bStart);
  return overlap <= 0 ? 0 : overlap / union;
}

function withinTolerance(a: number | null, b: number | null, toleranceMs: number): boolean {
  return a !== null && b !== null && Math.abs(a - b) <= toleranceMs;
}

/**
 * Score how likely a draft and a stored entity describe the same item.
 * Different kinds never match; folders only match by fingerprint.
 */
export function similarity(draft: Scored, candidate: CanonicalEntity, policy: IdentityPolicy): number {
  if (draft.kind === 'File' && candidate.kind === 'File') {
    const a = draft.attributes;
    const b = candidate.attributes;
    // Differing content hashes are proof of different bytes
    if (a.contentHash && b.contentHash && a.contentHash !== b.contentHash) return 0;
    const weights = policy.file;
    return (
      weights.name * (a.name.toLowerCase() === b.name.toLowerCase() ? 1 : 0) +
      weights.size * (a.size === b.size ? 1 : 0) +
      weights.modified * (withinTolerance(anchorTime(draft), anchorTime(candidate), weights.modifiedToleranceMs) ? 1 : 0)
    );
  }

  if (draft.kind === 'Event' && candidate.kind === 'Event') {
    const a = draft.attributes;
    const b = candidate.attributes;
    const weights = policy.event;
    return (
      weights.participants * jaccard(new Set(a.participants), new Set(b.participants)) +
      weights.time * intervalOverlap(Date.parse(a.start), Date.parse(a.end), Date.parse(b.start), Date.parse(b.end)) +
      weights.title * textSimilarity(a.title, b.title)
    );
  }

  if (draft.kind === 'Message' && candidate.kind === 'Message') {
    const a = draft.attributes;
    const b = candidate.attributes;
    const weights = policy.message;
    const sameThread = a.threadId !== undefined && a.threadId === b.threadId;
    const sameSubject = baseSubject(a.subject) !== undefined && baseSubject(a.subject) === baseSubject(b.subject);
    return (
      weights.sender * (a.sender === b.sender ? 1 : 0) +
      weights.sent * (withinTolerance(Date.parse(a.sentAt), Date.parse(b.sentAt), weights.sentToleranceMs) ? 1 : 0) +
      weights.subject * (sameThread || sameSubject ? 1 : 0)
    );
  }

  if (draft.kind === 'LocationSample' && candidate.kind === 'LocationSample') {
    const a = draft.attributes;
    const b = candidate.attributes;
    const weights = policy.location;
    return (
      weights.distance * (haversineMeters(a, b) <= weights.toleranceMeters ? 1 : 0) +
      weights.time * (withinTolerance(Date.parse(a.observedAt), Date.parse(b.observedAt), weights.toleranceMs) ? 1 : 0)
    );
  }

  return 0;
}
