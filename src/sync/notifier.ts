/**
 * Sync lifecycle events published to the broker
 */
import { v4 as uuidv4 } from 'uuid';
import Config from '../config';
import { logger } from '../utils/logger';
import { BatchCommitted, SyncFailed } from '../types/events';
import { SyncCursor } from '../types/provider';
import { validateBatchCommittedMessage, validateSyncFailedMessage } from '../utils/schema-validator';
import { BatchOutcome } from './batch-processor';

export interface SyncNotifier {
  batchCommitted(cursor: SyncCursor, outcome: BatchOutcome): Promise<void>;
  syncFailed(cursor: SyncCursor, reason: string, permanent: boolean): Promise<void>;
  providerDegraded(cursor: SyncCursor, reason: string): Promise<void>;
}

/** Anything that can publish JSON to a subject, normally the BrokerAdapter */
export interface Publisher {
  publish<T>(subject: string, data: T): Promise<void>;
}

export class BrokerSyncNotifier implements SyncNotifier {
  constructor(private readonly publisher: Publisher, private readonly topics = Config.topics.out) {}

  async batchCommitted(cursor: SyncCursor, outcome: BatchOutcome): Promise<void> {
    const event: BatchCommitted = validateBatchCommittedMessage({
      event_id: uuidv4(),
      batch_id: outcome.batchId,
      provider: cursor.provider,
      account: cursor.account,
      watermark: cursor.watermark,
      created: outcome.counts.created,
      updated: outcome.counts.updated,
      deleted: outcome.counts.deleted,
      noop: outcome.counts.noop,
      quarantined: outcome.counts.quarantined,
      edges: outcome.counts.edges,
      timestamp: new Date().toISOString(),
    });
    await this.publisher.publish(this.topics.batchCommitted, event);
  }

  async syncFailed(cursor: SyncCursor, reason: string, permanent: boolean): Promise<void> {
    await this.publisher.publish(this.topics.syncFailed, this.failure(cursor, reason, permanent));
  }

  async providerDegraded(cursor: SyncCursor, reason: string): Promise<void> {
    await this.publisher.publish(this.topics.providerDegraded, this.failure(cursor, reason, true));
  }

  private failure(cursor: SyncCursor, reason: string, permanent: boolean): SyncFailed {
    return validateSyncFailedMessage({
      event_id: uuidv4(),
      provider: cursor.provider,
      account: cursor.account,
      reason,
      permanent,
      watermark: cursor.watermark,
      timestamp: new Date().toISOString(),
    });
  }
}

/** Used when the broker is disabled */
export class LoggingSyncNotifier implements SyncNotifier {
  async batchCommitted(cursor: SyncCursor, outcome: BatchOutcome): Promise<void> {
    logger.debug({ provider: cursor.provider, account: cursor.account, batchId: outcome.batchId }, 'Batch committed event (broker disabled)');
  }

  async syncFailed(cursor: SyncCursor, reason: string, permanent: boolean): Promise<void> {
    logger.debug({ provider: cursor.provider, account: cursor.account, reason, permanent }, 'Sync failed event (broker disabled)');
  }

  async providerDegraded(cursor: SyncCursor, reason: string): Promise<void> {
    logger.debug({ provider: cursor.provider, account: cursor.account, reason }, 'Provider degraded event (broker disabled)');
  }
}
