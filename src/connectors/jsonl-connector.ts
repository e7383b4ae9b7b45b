/**
 * JSONL export connector - reads raw provider records from an append-only
 * export file, one JSON record per line. The watermark is the number of
 * lines already consumed.
 */
import { promises as fs } from 'fs';
import { logger } from '../utils/logger';
import { ConnectorError, errnoCode, errorMessage } from '../errors';
import { Connector, ConnectorBatch } from '../types/provider';

export interface JsonlConnectorOptions {
  provider: string;
  account: string;
  path: string;
  batchSize: number;
}

export class JsonlConnector implements Connector {
  readonly provider: string;
  readonly account: string;
  private readonly path: string;
  private readonly batchSize: number;

  constructor(options: JsonlConnectorOptions) {
    this.provider = options.provider;
    this.account = options.account;
    this.path = options.path;
    this.batchSize = options.batchSize;
  }

  async fetchBatch(watermark: string | null, signal: AbortSignal): Promise<ConnectorBatch> {
    const offset = this.parseWatermark(watermark);

    let data: string;
    try {
      data = await fs.readFile(this.path, { encoding: 'utf8', signal });
    } catch (err) {
      if (signal.aborted) {
        throw ConnectorError.transient(`Fetch from ${this.path} aborted`);
      }
      const code = errnoCode(err);
      if (code === 'ENOENT' || code === 'EACCES') {
        throw ConnectorError.permanent(`Export file ${this.path} is not readable: ${errorMessage(err)}`);
      }
      throw ConnectorError.transient(`Failed to read ${this.path}: ${errorMessage(err)}`);
    }

    // A final line without a newline may still be being written
    const lines = data.split('\n');
    lines.pop();

    const slice = lines.slice(offset, offset + this.batchSize);
    const records: unknown[] = [];
    slice.forEach((line, index) => {
      if (line.trim() === '') return;
      try {
        records.push(JSON.parse(line));
      } catch {
        logger.warn({ path: this.path, line: offset + index + 1 }, 'Unparseable export line, passing through for quarantine');
        records.push(line);
      }
    });

    const consumed = offset + slice.length;
    return {
      records,
      nextWatermark: String(consumed),
      hasMore: consumed < lines.length,
    };
  }

  private parseWatermark(watermark: string | null): number {
    if (watermark === null) return 0;
    const offset = Number(watermark);
    if (!Number.isInteger(offset) || offset < 0) {
      throw ConnectorError.permanent(`Watermark ${watermark} is not a line offset`);
    }
    return offset;
  }
}
