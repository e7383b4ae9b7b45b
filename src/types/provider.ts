/**
 * Connector-facing types: the raw record contract and sync cursors
 */
import { EntityKind, EntityPayload, TimestampObservation } from './canonical';

/**
 * Raw record as produced by a provider connector. `data` carries the
 * provider's own field names; `meta` carries sync noise (etags, revisions,
 * fetch times) that must never influence identity.
 */
export interface RawProviderRecord {
  nativeId: string;
  kind: EntityKind;
  /** Provider's last-modified indicator (ISO 8601) */
  lastModified: string;
  deleted?: boolean;
  data?: Record<string, unknown>;
  meta?: Record<string, unknown>;
}

export interface ProviderSource {
  provider: string;
  account: string;
}

/** Explicit reference from one provider item to another, by native id */
export interface ExplicitReference {
  relationKind: 'ContainedIn' | 'ReferTo';
  targetNativeId: string;
  evidence: string;
}

/**
 * Output of the normalizer: everything needed to resolve and store one
 * record, without an entity id yet.
 */
export type EntityDraft = EntityPayload & {
  source: ProviderSource;
  nativeId: string;
  watermark: string | null;
  contentFingerprint: string;
  timestamps: TimestampObservation[];
  references: ExplicitReference[];
  /** Text handed to the embedding service, absent for non-describable kinds */
  text?: string;
  /** Author identity used for shared-authorship inference */
  author?: string;
  deleted: false;
};

export interface DeletionDraft {
  kind: EntityKind;
  source: ProviderSource;
  nativeId: string;
  watermark: string | null;
  deleted: true;
}

export type NormalizedRecord = EntityDraft | DeletionDraft;

export type SyncState = 'Idle' | 'InProgress' | 'Failed';

export interface SyncStats {
  batches: number;
  created: number;
  updated: number;
  deleted: number;
  noop: number;
  quarantined: number;
}

export interface SyncCursor {
  provider: string;
  account: string;
  watermark: string | null;
  state: SyncState;
  failureReason: string | null;
  /** Set after a permanent connector error; cleared by a successful run */
  degraded: boolean;
  attempts: number;
  lastCommittedAt: string | null;
  stats: SyncStats;
}

export interface ConnectorBatch {
  /** Expected in the RawProviderRecord shape; the normalizer checks each one */
  records: unknown[];
  nextWatermark: string | null;
  hasMore: boolean;
}

/**
 * A provider connector. One implementation per provider; the core only
 * ever calls fetchBatch.
 */
export interface Connector extends ProviderSource {
  fetchBatch(watermark: string | null, signal: AbortSignal): Promise<ConnectorBatch>;
}
