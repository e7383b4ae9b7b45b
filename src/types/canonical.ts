/**
 * Canonical record model shared by every provider
 */

export const ENTITY_KINDS = ['File', 'Folder', 'Event', 'Message', 'LocationSample'] as const;
export type EntityKind = typeof ENTITY_KINDS[number];

export const RELATION_KINDS = ['ContainedIn', 'CoOccurredWith', 'ReferTo', 'SharedAuthor'] as const;
export type RelationKind = typeof RELATION_KINDS[number];

/** Relations stored once per unordered pair */
export const SYMMETRIC_RELATIONS: ReadonlySet<RelationKind> = new Set<RelationKind>(['CoOccurredWith', 'SharedAuthor']);

export type TimestampLabel = 'created' | 'modified' | 'accessed' | 'changed' | 'observed';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/**
 * One timestamp as reported by one source. Sources disagree, so an entity
 * keeps every observation instead of a single scalar.
 */
export interface TimestampObservation {
  label: TimestampLabel;
  /** ISO 8601, UTC */
  value: string;
  /** Provenance key of the reporting source */
  source: string;
}

export interface ProvenanceEntry {
  provider: string;
  account: string;
  nativeId: string;
  lastSeenWatermark: string | null;
  /** Set when the provider reported the item as deleted */
  removed: boolean;
}

export interface FileAttributes {
  name: string;
  path?: string;
  size: number;
  contentHash?: string;
  mimeType?: string;
  owner?: string;
  geo?: GeoPoint;
}

export interface FolderAttributes {
  name: string;
  path?: string;
  owner?: string;
}

export interface EventAttributes {
  title: string;
  start: string;
  end: string;
  participants: string[];
  organizer?: string;
  description?: string;
  location?: { name?: string } & Partial<GeoPoint>;
}

export interface MessageAttributes {
  sender: string;
  recipients: string[];
  subject?: string;
  body: string;
  sentAt: string;
  threadId?: string;
}

export interface LocationSampleAttributes {
  latitude: number;
  longitude: number;
  observedAt: string;
  source: string;
  accuracy?: number;
  altitude?: number;
}

export type EntityPayload =
  | { kind: 'File'; attributes: FileAttributes }
  | { kind: 'Folder'; attributes: FolderAttributes }
  | { kind: 'Event'; attributes: EventAttributes }
  | { kind: 'Message'; attributes: MessageAttributes }
  | { kind: 'LocationSample'; attributes: LocationSampleAttributes };

export type AttributesOf<K extends EntityKind> = Extract<EntityPayload, { kind: K }>['attributes'];

export interface SemanticStatus {
  state: 'unembeddable';
  reason: string;
}

export interface EntityBase {
  entityId: string;
  contentFingerprint: string;
  /** Fingerprints of records merged in through the similarity pass */
  aliasFingerprints: string[];
  /** Fingerprints the entity carried before an in-place content update */
  previousFingerprints: string[];
  timestamps: TimestampObservation[];
  provenance: ProvenanceEntry[];
  semanticVectorRef?: string;
  semanticStatus?: SemanticStatus;
  deleted: boolean;
  /** Optimistic concurrency version, owned by the store (0 = never stored) */
  version: number;
}

export type CanonicalEntity = EntityBase & EntityPayload;

export interface RelationshipEdge {
  fromId: string;
  toId: string;
  relationKind: RelationKind;
  confidence: number;
  evidence: string;
  observations: number;
}

/** Explicit reference whose target has not been indexed yet */
export interface PendingReference {
  /** Provenance key the target will be indexed under */
  targetKey: string;
  fromId: string;
  relationKind: RelationKind;
  evidence: string;
}

/**
 * Journal entry written for every merge into an existing entity, holding
 * enough of the prior state to undo the merge by hand.
 */
export interface MergeRecord {
  mergeId: string;
  entityId: string;
  batchId: string;
  matchedBy: 'fingerprint' | 'alias' | 'provenance' | 'similarity';
  confidence: number;
  provenanceKey: string;
  draftFingerprint: string;
  candidates: Array<{ entityId: string; confidence: number }>;
  before: {
    version: number;
    provenance: ProvenanceEntry[];
    timestamps: TimestampObservation[];
    aliasFingerprints: string[];
    deleted: boolean;
  };
  at: string;
}
