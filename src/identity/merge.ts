/**
 * Entity construction and merge rules
 */
import { CanonicalEntity, EntityPayload, MergeRecord, ProvenanceEntry } from '../types/canonical';
import { EntityDraft } from '../types/provider';
import { stableStringify } from '../model/fingerprint';
import { entryKey, provenanceKey } from '../model/provenance';
import { unionTimestamps } from '../model/time';

/** Copy of just the kind and attributes */
export function payloadOf(value: EntityPayload): EntityPayload {
  switch (value.kind) {
    case 'File':
      return { kind: 'File', attributes: { ...value.attributes } };
    case 'Folder':
      return { kind: 'Folder', attributes: { ...value.attributes } };
    case 'Event':
      return { kind: 'Event', attributes: { ...value.attributes } };
    case 'Message':
      return { kind: 'Message', attributes: { ...value.attributes } };
    case 'LocationSample':
      return { kind: 'LocationSample', attributes: { ...value.attributes } };
  }
}

/** Fill attributes the base lacks from another report of the same item */
function fillMissing<T extends object>(base: T, extra: T): T {
  const result = { ...base };
  for (const key in extra) {
    if (result[key] === undefined && extra[key] !== undefined) {
      result[key] = extra[key];
    }
  }
  return result;
}

function enrichedPayload(entity: CanonicalEntity, draft: EntityDraft): EntityPayload {
  if (entity.kind === 'File' && draft.kind === 'File') {
    return { kind: 'File', attributes: fillMissing(entity.attributes, draft.attributes) };
  }
  if (entity.kind === 'Folder' && draft.kind === 'Folder') {
    return { kind: 'Folder', attributes: fillMissing(entity.attributes, draft.attributes) };
  }
  if (entity.kind === 'Event' && draft.kind === 'Event') {
    return { kind: 'Event', attributes: fillMissing(entity.attributes, draft.attributes) };
  }
  if (entity.kind === 'Message' && draft.kind === 'Message') {
    return { kind: 'Message', attributes: fillMissing(entity.attributes, draft.attributes) };
  }
  if (entity.kind === 'LocationSample' && draft.kind === 'LocationSample') {
    return { kind: 'LocationSample', attributes: fillMissing(entity.attributes, draft.attributes) };
  }
  return payloadOf(entity);
}

function entryFor(draft: EntityDraft): ProvenanceEntry {
  return {
    provider: draft.source.provider,
    account: draft.source.account,
    nativeId: draft.nativeId,
    lastSeenWatermark: draft.watermark,
    removed: false,
  };
}

export function createEntity(draft: EntityDraft, entityId: string): CanonicalEntity {
  return {
    entityId,
    contentFingerprint: draft.contentFingerprint,
    aliasFingerprints: [],
    previousFingerprints: [],
    timestamps: [...draft.timestamps],
    provenance: [entryFor(draft)],
    deleted: false,
    version: 0,
    ...payloadOf(draft),
  };
}

/**
 * Attach a draft's provenance to an entity: append the entry or revive a
 * removed one, union the timestamps and restore a tombstoned entity.
 */
function withProvenance(entity: CanonicalEntity, draft: EntityDraft): Pick<CanonicalEntity, 'provenance' | 'timestamps' | 'deleted'> {
  const key = provenanceKey(draft.source, draft.nativeId);
  const exists = entity.provenance.some(entry => entryKey(entry) === key);
  const provenance = exists
    ? entity.provenance.map(entry =>
        entryKey(entry) === key && entry.removed
          ? { ...entry, removed: false, lastSeenWatermark: draft.watermark ?? entry.lastSeenWatermark }
          : { ...entry }
      )
    : [...entity.provenance.map(entry => ({ ...entry })), entryFor(draft)];

  return {
    provenance,
    timestamps: unionTimestamps(entity.timestamps, draft.timestamps),
    deleted: false,
  };
}

/** Merge a draft into a matching entity */
export function mergeInto(entity: CanonicalEntity, draft: EntityDraft, aliasFingerprint: boolean): CanonicalEntity {
  const aliasFingerprints =
    aliasFingerprint &&
    draft.contentFingerprint !== entity.contentFingerprint &&
    !entity.aliasFingerprints.includes(draft.contentFingerprint)
      ? [...entity.aliasFingerprints, draft.contentFingerprint]
      : [...entity.aliasFingerprints];

  return {
    ...entity,
    ...withProvenance(entity, draft),
    aliasFingerprints,
    ...enrichedPayload(entity, draft),
  };
}

/**
 * Content changed at the only provider reporting the item: take the new
 * content and fingerprint, keeping the old fingerprint for reference.
 */
export function updateInPlace(entity: CanonicalEntity, draft: EntityDraft): CanonicalEntity {
  return {
    ...entity,
    ...withProvenance(entity, draft),
    contentFingerprint: draft.contentFingerprint,
    previousFingerprints: entity.previousFingerprints.includes(entity.contentFingerprint)
      ? [...entity.previousFingerprints]
      : [...entity.previousFingerprints, entity.contentFingerprint],
    ...payloadOf(draft),
  };
}

/**
 * Mark one provenance entry removed. The entity is tombstoned once no live
 * entry remains; it is never physically removed.
 */
export function removeProvenance(entity: CanonicalEntity, key: string): CanonicalEntity {
  const provenance = entity.provenance.map(entry => (entryKey(entry) === key ? { ...entry, removed: true } : { ...entry }));
  return {
    ...entity,
    provenance,
    deleted: provenance.every(entry => entry.removed),
  };
}

/**
 * Whether a merge changed anything worth writing. Watermark-only
 * refreshes of a provenance entry do not count.
 */
export function hasChanged(before: CanonicalEntity, after: CanonicalEntity): boolean {
  const comparable = (entity: CanonicalEntity): string =>
    stableStringify({
      ...entity,
      provenance: entity.provenance.map(entry => ({ ...entry, lastSeenWatermark: null })),
      semanticVectorRef: undefined,
      semanticStatus: undefined,
      version: undefined,
    });
  return comparable(before) !== comparable(after);
}

export function mergeRecordFor(
  before: CanonicalEntity,
  draft: EntityDraft,
  details: Pick<MergeRecord, 'mergeId' | 'batchId' | 'matchedBy' | 'confidence' | 'candidates' | 'at'>
): MergeRecord {
  return {
    ...details,
    entityId: before.entityId,
    provenanceKey: provenanceKey(draft.source, draft.nativeId),
    draftFingerprint: draft.contentFingerprint,
    before: {
      version: before.version,
      provenance: before.provenance.map(entry => ({ ...entry })),
      timestamps: before.timestamps.map(t => ({ ...t })),
      aliasFingerprints: [...before.aliasFingerprints],
      deleted: before.deleted,
    },
  };
}
