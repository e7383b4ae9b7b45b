/**
 * Unit tests for the batch processor
 */
import { promises as fs } from 'fs';
import { join } from 'path';
import { BatchProcessor } from '../../src/sync/batch-processor';
import { QuarantineLog } from '../../src/sync/quarantine';
import { LocalGraphStore } from '../../src/storage/local-graph-store';
import { ConflictError, MergeFailure, TimeoutError } from '../../src/errors';
import { metrics } from '../../src/metrics/metrics';
import { entryKey } from '../../src/model/provenance';
import { CommitUnit } from '../../src/storage/gateway';
import { CanonicalEntity, SYMMETRIC_RELATIONS } from '../../src/types/canonical';
import { ProviderSource, RawProviderRecord } from '../../src/types/provider';
import { calendar, drive, dropbox, fileRecord, raw, tmpDir } from '../fixtures/records';

/** Store contents with entity ids replaced by the provenance keys they hold */
async function stateOf(target: LocalGraphStore, pendingKeys: string[] = []) {
  const entities = await target.query({ includeDeleted: true });
  const labels = new Map(entities.map(entity => [entity.entityId, entity.provenance.map(entryKey).sort().join(' + ')]));
  const label = (entityId: string): string => labels.get(entityId) ?? entityId;

  const edges = new Set<string>();
  const merges: string[] = [];
  for (const entity of entities) {
    for (const edge of await target.getEdges(entity.entityId)) {
      const ends = [label(edge.fromId), label(edge.toId)];
      if (SYMMETRIC_RELATIONS.has(edge.relationKind)) ends.sort();
      edges.add(`${ends[0]} ${edge.relationKind} ${ends[1]} ${edge.confidence} ${edge.observations}`);
    }
    for (const merge of await target.getMerges(entity.entityId)) {
      merges.push(`${label(merge.entityId)} ${merge.matchedBy} ${merge.provenanceKey}`);
    }
  }

  const pending: string[] = [];
  for (const key of pendingKeys) {
    for (const ref of await target.getPendingReferences(key)) pending.push(`${label(ref.fromId)} ${ref.relationKind} ${key}`);
  }

  return {
    entities: entities
      .map(entity => ({
        key: label(entity.entityId),
        fingerprints: [entity.contentFingerprint, ...entity.aliasFingerprints].sort(),
        attributes: entity.attributes,
        version: entity.version,
        deleted: entity.deleted,
      }))
      .sort((a, b) => (a.key < b.key ? -1 : 1)),
    edges: Array.from(edges).sort(),
    merges: merges.sort(),
    pending,
  };
}

describe('BatchProcessor', () => {
  const testDir = tmpDir('batch-processor');
  let store: LocalGraphStore;
  let quarantine: QuarantineLog;
  let run = 0;

  const files = [
    raw('File', 'f-1', { name: 'agenda.md', size: 10, mtime: '2024-04-01T00:00:00Z' }),
    raw('File', 'f-2', { name: 'slides.pdf', size: 20, mtime: '2024-04-02T00:00:00Z' }),
    raw('File', 'f-3', { name: 'notes.txt', size: 30, mtime: '2024-04-03T00:00:00Z' }),
  ];
  const event = raw('Event', 'ev-1', {
    title: 'Design review',
    start: '2024-05-01T09:00:00Z',
    end: '2024-05-01T10:00:00Z',
    attachments: ['f-1', 'f-2', 'f-3'],
  });

  beforeEach(async () => {
    run++;
    store = new LocalGraphStore({ graphPath: join(testDir, `graph-${run}.jsonl`) });
    await store.init();
    quarantine = new QuarantineLog(join(testDir, `quarantine-${run}.jsonl`));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  async function openStore(name: string): Promise<LocalGraphStore> {
    const opened = new LocalGraphStore({ graphPath: join(testDir, `graph-${run}-${name}.jsonl`) });
    await opened.init();
    return opened;
  }

  it('should commit an event and its attachments with one edge per attachment', async () => {
    const processor = new BatchProcessor(store, { quarantine });

    const outcome = await processor.process(calendar, [...files, event], 'w-1');

    expect(outcome.attempts).toBe(1);
    expect(outcome.counts).toEqual({ created: 4, updated: 0, deleted: 0, noop: 0, quarantined: 0, edges: 3 });

    const [stored] = await store.findByProvenance('calendar/alice@example.com/ev-1');
    const edges = await store.getEdges(stored.entityId, { direction: 'out', relationKind: 'ReferTo' });
    const targets = await store.getEntities(edges.map(edge => edge.toId));
    expect(targets.map(entity => entity.provenance[0].nativeId).sort()).toEqual(['f-1', 'f-2', 'f-3']);
    expect(stored.provenance[0].lastSeenWatermark).toBe('w-1');
  });

  it('should report a replayed batch as noop without committing', async () => {
    const processor = new BatchProcessor(store, { quarantine });
    await processor.process(calendar, [...files, event], 'w-1');
    const commit = jest.spyOn(store, 'commitBatch');

    const outcome = await processor.process(calendar, [...files, event], 'w-1');

    expect(outcome.counts).toEqual({ created: 0, updated: 0, deleted: 0, noop: 4, quarantined: 0, edges: 0 });
    expect(outcome.changed).toEqual([]);
    expect(commit).not.toHaveBeenCalled();
  });

  it('should quarantine records that fail normalization and index the rest', async () => {
    const processor = new BatchProcessor(store, { quarantine });
    const broken = raw('File', 'bad-1', { name: 'broken.bin' });

    const outcome = await processor.process(calendar, [files[0], broken, 'not a record'], null);

    expect(outcome.counts.created).toBe(1);
    expect(outcome.counts.quarantined).toBe(2);

    const entries = await quarantine.read();
    expect(entries.map(entry => entry.nativeId)).toEqual(['bad-1', '<unknown>']);
    expect(entries[0]).toMatchObject({
      provider: 'calendar',
      account: 'alice@example.com',
      batchId: outcome.batchId,
      reason: 'Record bad-1 does not satisfy the canonical attribute schema',
      violations: [{ path: '/', message: "must have required property 'size'" }],
      record: broken,
    });
  });

  it('should retry the batch from fresh reads after a version conflict', async () => {
    const conflicts = jest.spyOn(metrics.versionConflicts, 'inc');
    jest.spyOn(store, 'commitBatch').mockRejectedValueOnce(new ConflictError('Version conflict on x', 'x'));
    const processor = new BatchProcessor(store, { quarantine });

    const outcome = await processor.process(calendar, files, null);

    expect(outcome.attempts).toBe(2);
    expect(outcome.counts.created).toBe(3);
    expect(conflicts).toHaveBeenCalledTimes(1);
    expect((await store.stats()).entities).toBe(3);
  });

  it('should give up with MergeFailure once conflict retries are exhausted', async () => {
    jest.spyOn(store, 'commitBatch').mockRejectedValue(new ConflictError('Version conflict on x', 'x'));
    const processor = new BatchProcessor(store, {
      quarantine,
      policy: { commitTimeoutMs: 1000, maxConflictRetries: 1 },
    });

    const error = await processor.process(calendar, files, null).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MergeFailure);
    expect(error).toMatchObject({ attempts: 2 });
    expect(await quarantine.read()).toEqual([]);
  });

  it('should hand changed live entities to committed listeners', async () => {
    const received: CanonicalEntity[][] = [];
    const processor = new BatchProcessor(store, { quarantine, onCommitted: entities => received.push(entities) });

    await processor.process(calendar, files, null);
    await processor.process(calendar, [raw('File', 'f-1', { name: 'agenda.md', size: 11, mtime: '2024-04-01T00:00:00Z' })], null);

    expect(received.map(batch => batch.length)).toEqual([3, 1]);
    expect(received[1][0].attributes).toEqual({ name: 'agenda.md', size: 11 });
  });

  it('should keep notifying other listeners when one throws', async () => {
    const processor = new BatchProcessor(store, { quarantine });
    const second = jest.fn();
    processor.onCommitted(() => {
      throw new Error('listener failed');
    });
    processor.onCommitted(second);

    await processor.process(calendar, files.slice(0, 1), null);

    expect(second).toHaveBeenCalledTimes(1);
  });

  describe('deferred references', () => {
    const child = raw('File', 'x-1', { name: 'x.txt', size: 3, mtime: '2024-04-01T00:00:00Z', parentId: 'folder-1' });
    const folder = raw('Folder', 'folder-1', { name: 'Projects' });
    const folderKey = 'calendar/alice@example.com/folder-1';

    it('should link a child to a folder indexed after a restart', async () => {
      await new BatchProcessor(store, { quarantine }).process(calendar, [child], 'w-1');
      expect(await store.getPendingReferences(folderKey)).toHaveLength(1);

      const reopened = new LocalGraphStore({ graphPath: join(testDir, `graph-${run}.jsonl`) });
      await reopened.init();
      const outcome = await new BatchProcessor(reopened, { quarantine }).process(calendar, [folder], 'w-2');

      const [file] = await reopened.findByProvenance('calendar/alice@example.com/x-1');
      const [dir] = await reopened.findByProvenance(folderKey);
      expect(outcome.counts.edges).toBe(1);
      expect(await reopened.getEdges(dir.entityId, { relationKind: 'ContainedIn' })).toEqual([{
        fromId: file.entityId,
        toId: dir.entityId,
        relationKind: 'ContainedIn',
        confidence: 1,
        evidence: 'parent folder',
        observations: 1,
      }]);
      expect(await reopened.getPendingReferences(folderKey)).toEqual([]);
    });

    it('should keep the reference when a timed-out commit was applied anyway', async () => {
      const commit = store.commitBatch.bind(store);
      jest.spyOn(store, 'commitBatch').mockImplementationOnce(async (unit: CommitUnit) => {
        await commit(unit);
        throw new TimeoutError('commit batch', 1);
      });
      const processor = new BatchProcessor(store, { quarantine });

      await expect(processor.process(calendar, [child], 'w-1')).rejects.toBeInstanceOf(TimeoutError);
      const replay = await processor.process(calendar, [child], 'w-1');
      await processor.process(calendar, [folder], 'w-2');

      expect(replay.counts.noop).toBe(1);
      const [dir] = await store.findByProvenance(folderKey);
      expect(await store.getEdges(dir.entityId, { relationKind: 'ContainedIn' })).toHaveLength(1);
    });

    it('should resolve a reference to a target later in the same batch without persisting it', async () => {
      const commit = jest.spyOn(store, 'commitBatch');

      await new BatchProcessor(store, { quarantine }).process(calendar, [child, folder], 'w-1');

      expect(commit.mock.calls[0][0].deferred).toEqual([]);
      expect(commit.mock.calls[0][0].resolvedReferences).toEqual([folderKey]);
      expect(await store.getPendingReferences(folderKey)).toEqual([]);
    });
  });

  describe('re-runs', () => {
    const report = fileRecord('d-1', 'Report.pdf', 1000, { md5Checksum: 'aa11', mtime: '2024-05-01T09:01:00Z' });
    const sameReport = raw('File', 'x-1', {
      filename: 'Report.pdf',
      bytes: 1000,
      content_hash: 'AA11',
      client_modified: '2024-05-01T09:01:00Z',
    });
    const notes = raw('File', 'x-2', { name: 'notes.txt', size: 5, client_modified: '2024-05-01T09:02:00Z', parentId: 'dir-1' });

    it('should reach the same state re-running a batch whose commit failed as with one clean run', async () => {
      const clean = await openStore('clean');
      const cleanProcessor = new BatchProcessor(clean, { quarantine });
      await cleanProcessor.process(drive, [report], 'w-1');
      await cleanProcessor.process(dropbox, [sameReport, notes], 'w-2');

      const retried = await openStore('retried');
      const retriedProcessor = new BatchProcessor(retried, { quarantine });
      await retriedProcessor.process(drive, [report], 'w-1');
      jest.spyOn(retried, 'commitBatch').mockRejectedValueOnce(new Error('disk full'));
      await expect(retriedProcessor.process(dropbox, [sameReport, notes], 'w-2')).rejects.toThrow('disk full');
      await retriedProcessor.process(dropbox, [sameReport, notes], 'w-2');

      const expected = await stateOf(clean, ['dropbox/alice/dir-1']);
      expect(expected.entities).toHaveLength(2);
      expect(expected.edges).toHaveLength(1);
      expect(expected.merges).toEqual(['drive/alice@example.com/d-1 + dropbox/alice/x-1 fingerprint dropbox/alice/x-1']);
      expect(expected.pending).toEqual(['dropbox/alice/x-2 ContainedIn dropbox/alice/dir-1']);
      expect(await stateOf(retried, ['dropbox/alice/dir-1'])).toEqual(expected);
    });

    it('should unify the same items whichever provider reports them first', async () => {
      const outlook: ProviderSource = { provider: 'outlook', account: 'alice' };
      const participants = ['alice@example.com', 'bob@example.com'];
      const submissions: Array<[ProviderSource, RawProviderRecord]> = [
        [drive, fileRecord('d-1', 'Report.pdf', 1000, { md5Checksum: 'aa11' })],
        [calendar, raw('Event', 'ev-1', { title: 'Quarterly review', start: '2024-05-01T09:00:00Z', end: '2024-05-01T10:00:00Z', participants })],
        [dropbox, raw('File', 'x-1', { filename: 'Report.pdf', bytes: 1000, content_hash: 'AA11' })],
        [outlook, raw('Event', 'ol-7', { title: 'Quarterly Review', start: '2024-05-01T09:00:00Z', end: '2024-05-01T10:00:00Z', participants })],
      ];
      const identities = async (target: LocalGraphStore) => (await stateOf(target)).entities.map(({ key, fingerprints }) => ({ key, fingerprints }));

      const forward = await openStore('forward');
      const forwardProcessor = new BatchProcessor(forward, { quarantine });
      for (const [source, record] of submissions) await forwardProcessor.process(source, [record], null);

      const reversed = await openStore('reversed');
      const reversedProcessor = new BatchProcessor(reversed, { quarantine });
      for (const [source, record] of [...submissions].reverse()) await reversedProcessor.process(source, [record], null);

      const expected = await identities(forward);
      expect(expected.map(identity => identity.key)).toEqual([
        'calendar/alice@example.com/ev-1 + outlook/alice/ol-7',
        'drive/alice@example.com/d-1 + dropbox/alice/x-1',
      ]);
      expect(expected[1].fingerprints).toEqual(['aa11']);
      expect(expected[0].fingerprints).toHaveLength(2);
      expect(await identities(reversed)).toEqual(expected);
    });
  });
});
