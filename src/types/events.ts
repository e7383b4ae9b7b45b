/**
 * Broker event payloads. Each has a JSON schema under src/schemas.
 */

export interface SyncTrigger {
  event_id: string;
  /** Omitted provider/account triggers every registered pipeline */
  provider?: string;
  account?: string;
  timestamp?: string;
}

export interface BatchCommitted {
  event_id: string;
  batch_id: string;
  provider: string;
  account: string;
  watermark: string | null;
  created: number;
  updated: number;
  deleted: number;
  noop: number;
  quarantined: number;
  edges: number;
  timestamp: string;
}

export interface SyncFailed {
  event_id: string;
  provider: string;
  account: string;
  reason: string;
  /** Permanent failures degrade the provider until an operator intervenes */
  permanent: boolean;
  watermark: string | null;
  timestamp: string;
}
