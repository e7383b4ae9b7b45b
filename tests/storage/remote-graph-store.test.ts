/**
 * Unit tests for the HTTP storage gateway against an in-process store service
 */
import express from 'express';
import { Server } from 'http';
import { promises as fs } from 'fs';
import { join } from 'path';
import request from 'supertest';
import { LocalGraphStore } from '../../src/storage/local-graph-store';
import { RemoteGraphStore } from '../../src/storage/remote-graph-store';
import { createGraphStoreRouter } from '../../src/storage/http-router';
import { ConflictError } from '../../src/errors';
import { fileEntity, tmpDir } from '../fixtures/records';

describe('RemoteGraphStore', () => {
  const testDir = tmpDir('remote-store');
  let local: LocalGraphStore;
  let remote: RemoteGraphStore;
  let app: express.Express;
  let server: Server;

  beforeAll(async () => {
    local = new LocalGraphStore({ graphPath: join(testDir, 'graph.jsonl') });
    await local.init();

    app = express();
    app.use('/graph', createGraphStoreRouter(local));
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
    const { port } = address;
    remote = new RemoteGraphStore({ baseUrl: `http://127.0.0.1:${port}/graph`, timeoutMs: 5000 });
    await remote.init();
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should round-trip a commit through the service', async () => {
    const result = await remote.commitBatch({
      batchId: 'b-1',
      entities: [
        { entity: fileEntity('r-1', 'fp-r1'), expectedVersion: 0 },
        { entity: fileEntity('r-2', 'fp-r2'), expectedVersion: 0 },
      ],
      edges: [{ fromId: 'r-1', toId: 'r-2', relationKind: 'ReferTo', confidence: 1, evidence: 'test', observations: 1 }],
      merges: [],
    });

    expect(result).toEqual({ versions: { 'r-1': 1, 'r-2': 1 }, edges: 1 });
    expect(await remote.getEntity('r-1')).toEqual(await local.getEntity('r-1'));
    expect((await remote.getEdges('r-2', { direction: 'in' })).map(edge => edge.fromId)).toEqual(['r-1']);
    expect((await remote.findByFingerprint('fp-r2')).map(entity => entity.entityId)).toEqual(['r-2']);
    expect((await remote.findByProvenance('drive/alice@example.com/r-1')).map(entity => entity.entityId)).toEqual(['r-1']);
  });

  it('should return null for a missing entity', async () => {
    expect(await remote.getEntity('missing')).toBeNull();
  });

  it('should raise a version conflict as ConflictError', async () => {
    await remote.upsertEntity(fileEntity('r-3', 'fp-r3'), 0);

    const error = await remote.upsertEntity(fileEntity('r-3', 'fp-r3'), 0).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ entityId: 'r-3', message: 'Version conflict on r-3: expected 0, found 1' });
  });

  it('should store and search vectors remotely', async () => {
    await remote.upsertEntity(fileEntity('r-4', 'fp-r4'), 0);

    expect(await remote.putVector('r-4', [0, 1])).toBe('vec:r-4');
    expect(await remote.getVectors(['r-4', 'missing'])).toEqual({ 'r-4': [0, 1] });
    expect(await remote.queryVectors([0, 1], 1)).toEqual([{ entityId: 'r-4', score: 1 }]);
  });

  it('should track unembeddable entities remotely', async () => {
    await remote.upsertEntity(fileEntity('r-5', 'fp-r5'), 0);
    await remote.markUnembeddable('r-5', 'DIMENSION_MISMATCH');

    expect(await remote.listUnembeddable()).toEqual(['r-5']);
    expect((await remote.getEntity('r-5'))?.semanticStatus).toEqual({ state: 'unembeddable', reason: 'DIMENSION_MISMATCH' });
  });

  it('should persist and resolve pending references through the service', async () => {
    const ref = { targetKey: 'drive/alice@example.com/dir-7', fromId: 'r-1', relationKind: 'ContainedIn' as const, evidence: 'parent folder' };

    await remote.commitBatch({ batchId: 'b-2', entities: [], edges: [], merges: [], deferred: [ref] });
    expect(await remote.getPendingReferences(ref.targetKey)).toEqual([ref]);

    await remote.commitBatch({ batchId: 'b-3', entities: [], edges: [], merges: [], resolvedReferences: [ref.targetKey] });
    expect(await remote.getPendingReferences(ref.targetKey)).toEqual([]);
  });

  it('should reject a commit unit with a malformed deferred reference', async () => {
    const response = await request(app).post('/graph/batches').send({
      batchId: 'b-x',
      entities: [],
      edges: [],
      merges: [],
      deferred: [{ targetKey: 'k', fromId: 'r-1', relationKind: 'Knows', evidence: 'x' }],
    });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ message: 'Invalid commit unit' });
  });

  it('should reject malformed bodies with 400', async () => {
    const response = await request(app).post('/graph/batches').send({ batchId: 'b-x' });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ message: 'Invalid commit unit' });
  });

  it('should reject an unknown relation kind filter', async () => {
    const response = await request(app).get('/graph/entities/r-1/edges').query({ relationKind: 'Knows' });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ message: 'Unknown relation kind Knows' });
  });
});
