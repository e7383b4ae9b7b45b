/**
 * Unit tests for the JSONL export connector and connector registry
 */
import { promises as fs } from 'fs';
import { join } from 'path';
import { JsonlConnector } from '../../src/connectors/jsonl-connector';
import { loadConnectors } from '../../src/connectors/registry';
import { ConnectorError } from '../../src/errors';
import { SchemaValidationError } from '../../src/utils/schema-validator';
import { tmpDir } from '../fixtures/records';

describe('JsonlConnector', () => {
  const testDir = tmpDir('jsonl-connector');
  const exportPath = join(testDir, 'export.jsonl');
  const signal = new AbortController().signal;
  const connector = (batchSize = 2, path = exportPath) =>
    new JsonlConnector({ provider: 'drive', account: 'alice@example.com', path, batchSize });

  beforeAll(async () => {
    await fs.mkdir(testDir, { recursive: true });
    await fs.writeFile(exportPath, [
      '{"nativeId":"f-1","kind":"File"}',
      '',
      'not json',
      '{"nativeId":"f-2","kind":"File"}',
      '{"nativeId":"f-3","ki',
    ].join('\n'));
  });

  afterAll(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should read from the start when there is no watermark', async () => {
    const batch = await connector().fetchBatch(null, signal);

    expect(batch).toEqual({
      records: [{ nativeId: 'f-1', kind: 'File' }],
      nextWatermark: '2',
      hasMore: true,
    });
  });

  it('should pass unparseable lines through as strings', async () => {
    const batch = await connector().fetchBatch('2', signal);

    expect(batch).toEqual({
      records: ['not json', { nativeId: 'f-2', kind: 'File' }],
      nextWatermark: '4',
      hasMore: false,
    });
  });

  it('should hold back a final line that has no newline yet', async () => {
    const batch = await connector(10).fetchBatch('4', signal);

    expect(batch).toEqual({ records: [], nextWatermark: '4', hasMore: false });
  });

  it('should fail permanently on a watermark that is not a line offset', async () => {
    const error = await connector().fetchBatch('cursor-abc', signal).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConnectorError);
    expect(error).toMatchObject({ kind: 'permanent', message: 'Watermark cursor-abc is not a line offset' });
  });

  it('should fail permanently when the export file is missing', async () => {
    const error = await connector(2, join(testDir, 'missing.jsonl')).fetchBatch(null, signal).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConnectorError);
    expect(error).toMatchObject({ kind: 'permanent', code: 'CONNECTOR_PERMANENT' });
  });

  it('should fail transiently when the fetch is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(connector().fetchBatch(null, controller.signal)).rejects.toMatchObject({
      kind: 'transient',
      message: `Fetch from ${exportPath} aborted`,
    });
  });
});

describe('loadConnectors', () => {
  const testDir = tmpDir('connector-registry');

  beforeAll(async () => {
    await fs.mkdir(testDir, { recursive: true });
  });

  afterAll(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should build a connector per registration', async () => {
    const path = join(testDir, 'connectors.json');
    await fs.writeFile(path, JSON.stringify([
      { provider: 'drive', account: 'alice@example.com', type: 'jsonl', path: 'drive.jsonl' },
      { provider: 'calendar', account: 'alice@example.com', type: 'jsonl', path: 'calendar.jsonl', batchSize: 50 },
    ]));

    const connectors = await loadConnectors(path);

    expect(connectors.map(c => `${c.provider}/${c.account}`)).toEqual(['drive/alice@example.com', 'calendar/alice@example.com']);
    expect(connectors.every(c => c instanceof JsonlConnector)).toBe(true);
  });

  it('should treat a missing registrations file as no connectors', async () => {
    expect(await loadConnectors(join(testDir, 'absent.json'))).toEqual([]);
  });

  it('should reject an invalid registration', async () => {
    const path = join(testDir, 'invalid.json');
    await fs.writeFile(path, JSON.stringify([{ provider: 'drive', type: 'imap', path: 'x' }]));

    await expect(loadConnectors(path)).rejects.toBeInstanceOf(SchemaValidationError);
  });
});
