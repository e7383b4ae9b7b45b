/**
 * Cursor Store - durable per-provider sync cursors
 *
 * One JSON file per (provider, account), replaced atomically through a
 * temp file and rename so a crash never leaves a half-written cursor.
 */
import { join } from 'path';
import { promises as fs } from 'fs';
import { logger } from '../utils/logger';
import Config from '../config';
import { errnoCode } from '../errors';
import { SyncCursor } from '../types/provider';

export function emptyCursor(provider: string, account: string): SyncCursor {
  return {
    provider,
    account,
    watermark: null,
    state: 'Idle',
    failureReason: null,
    degraded: false,
    attempts: 0,
    lastCommittedAt: null,
    stats: { batches: 0, created: 0, updated: 0, deleted: 0, noop: 0, quarantined: 0 },
  };
}

function isCursor(value: unknown): value is SyncCursor {
  if (value === null || typeof value !== 'object') return false;
  return 'provider' in value && typeof value.provider === 'string' &&
    'account' in value && typeof value.account === 'string' &&
    'watermark' in value && (value.watermark === null || typeof value.watermark === 'string') &&
    'state' in value && typeof value.state === 'string' &&
    'stats' in value && value.stats !== null && typeof value.stats === 'object';
}

export class CursorStore {
  constructor(private readonly dir: string = Config.sync.cursorDir) {}

  private pathFor(provider: string, account: string): string {
    const safe = (value: string) => encodeURIComponent(value);
    return join(this.dir, `${safe(provider)}__${safe(account)}.json`);
  }

  async read(provider: string, account: string): Promise<SyncCursor | null> {
    const path = this.pathFor(provider, account);
    let raw: string;
    try {
      raw = await fs.readFile(path, 'utf8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return null;
      }
      throw err;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isCursor(parsed)) {
      throw new Error(`Cursor file ${path} is malformed`);
    }
    return parsed;
  }

  async write(cursor: SyncCursor): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const path = this.pathFor(cursor.provider, cursor.account);
    const tempPath = `${path}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(cursor, null, 2), 'utf8');
    await fs.rename(tempPath, path);
    logger.debug({ provider: cursor.provider, account: cursor.account, watermark: cursor.watermark, state: cursor.state }, 'Persisted sync cursor');
  }

  /** Read the cursor, creating an Idle one at registration */
  async ensure(provider: string, account: string): Promise<SyncCursor> {
    const existing = await this.read(provider, account);
    if (existing) return existing;
    const cursor = emptyCursor(provider, account);
    await this.write(cursor);
    return cursor;
  }

  async remove(provider: string, account: string): Promise<void> {
    await fs.rm(this.pathFor(provider, account), { force: true });
  }

  async list(): Promise<SyncCursor[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw err;
    }

    const cursors: SyncCursor[] = [];
    for (const file of files.filter(f => f.endsWith('.json'))) {
      try {
        const parsed: unknown = JSON.parse(await fs.readFile(join(this.dir, file), 'utf8'));
        if (isCursor(parsed)) cursors.push(parsed);
      } catch (err) {
        logger.warn({ file, error: err }, 'Skipping unreadable cursor file');
      }
    }
    return cursors;
  }
}
