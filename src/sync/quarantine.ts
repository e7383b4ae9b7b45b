/**
 * Quarantine log for records the normalizer rejected. One JSON line per
 * record, kept for an operator to inspect and replay.
 */
import { dirname } from 'path';
import { promises as fs } from 'fs';
import Config from '../config';
import { logger } from '../utils/logger';
import { errnoCode, FieldViolation } from '../errors';
import { ProviderSource } from '../types/provider';

export interface QuarantinedRecord {
  provider: string;
  account: string;
  nativeId: string;
  batchId: string;
  reason: string;
  violations: FieldViolation[];
  record: unknown;
  at: string;
}

function isQuarantinedRecord(value: unknown): value is QuarantinedRecord {
  if (value === null || typeof value !== 'object') return false;
  return 'provider' in value && typeof value.provider === 'string' &&
    'account' in value && typeof value.account === 'string' &&
    'nativeId' in value && typeof value.nativeId === 'string' &&
    'batchId' in value && typeof value.batchId === 'string' &&
    'reason' in value && typeof value.reason === 'string' &&
    'violations' in value && Array.isArray(value.violations) &&
    'record' in value &&
    'at' in value && typeof value.at === 'string';
}

export class QuarantineLog {
  constructor(private readonly path: string = Config.sync.quarantinePath) {}

  async append(source: ProviderSource, entries: Array<Omit<QuarantinedRecord, 'provider' | 'account'>>): Promise<void> {
    if (entries.length === 0) return;
    await fs.mkdir(dirname(this.path), { recursive: true });
    const lines = entries.map(entry => JSON.stringify({ provider: source.provider, account: source.account, ...entry }));
    await fs.appendFile(this.path, lines.join('\n') + '\n', 'utf8');
    logger.warn({ provider: source.provider, account: source.account, count: entries.length, path: this.path }, 'Quarantined records');
  }

  async read(): Promise<QuarantinedRecord[]> {
    let data: string;
    try {
      data = await fs.readFile(this.path, 'utf8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw err;
    }
    const records: QuarantinedRecord[] = [];
    let skipped = 0;
    for (const line of data.split('\n')) {
      if (line.trim() === '') continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isQuarantinedRecord(parsed)) {
          records.push(parsed);
        } else {
          skipped++;
        }
      } catch (err) {
        logger.warn({ error: err, path: this.path }, 'Unparseable quarantine line');
        skipped++;
      }
    }
    if (skipped > 0) {
      logger.warn({ path: this.path, skipped }, 'Skipped malformed quarantine lines');
    }
    return records;
  }
}
