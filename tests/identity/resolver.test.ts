/**
 * Unit tests for the identity resolver
 */
import { promises as fs } from 'fs';
import { join } from 'path';
import { IdentityResolver, Resolution } from '../../src/identity/resolver';
import { BatchOverlay } from '../../src/identity/overlay';
import { LocalGraphStore } from '../../src/storage/local-graph-store';
import { normalize } from '../../src/normalizer';
import { MergeAmbiguity } from '../../src/errors';
import { ProviderSource, RawProviderRecord } from '../../src/types/provider';
import { calendar, deletion, drive, dropbox, fileRecord, raw, tmpDir } from '../fixtures/records';

describe('IdentityResolver', () => {
  const testDir = tmpDir('resolver');
  let store: LocalGraphStore;
  let resolver: IdentityResolver;
  let ids: number;
  let run = 0;

  beforeEach(async () => {
    run++;
    store = new LocalGraphStore({ graphPath: join(testDir, `graph-${run}.jsonl`) });
    await store.init();
    ids = 0;
    resolver = new IdentityResolver({ newId: () => `id-${++ids}`, now: () => '2024-06-01T00:00:00.000Z' });
  });

  afterAll(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  /** Resolve one record and commit whatever it staged */
  async function apply(record: RawProviderRecord, source: ProviderSource): Promise<Resolution> {
    const overlay = new BatchOverlay(store);
    const resolution = await resolver.resolve(normalize(record, source), overlay, `batch-${run}`);
    await store.commitBatch(overlay.toCommitUnit(`batch-${run}`, []));
    return resolution;
  }

  const report = (nativeId: string) => fileRecord(nativeId, 'Report.pdf', 1000, { md5Checksum: 'aa11' });

  it('should create a new entity for an unseen record', async () => {
    const resolution = await apply(report('drive-1'), drive);

    expect(resolution.outcome).toBe('created');
    expect(resolution.contentChanged).toBe(true);
    expect(resolution.entity?.entityId).toBe('id-1');

    const stored = await store.getEntity('id-1');
    expect(stored?.version).toBe(1);
    expect(stored?.provenance).toEqual([
      { provider: 'drive', account: 'alice@example.com', nativeId: 'drive-1', lastSeenWatermark: null, removed: false },
    ]);
  });

  it('should merge the same bytes reported by two providers into one entity', async () => {
    await apply(report('drive-1'), drive);
    const resolution = await apply(
      raw('File', 'dbx-9', { filename: 'Report.pdf', bytes: 1000, content_hash: 'AA11' }),
      dropbox
    );

    expect(resolution.outcome).toBe('updated');
    expect(resolution.matchedBy).toBe('fingerprint');
    expect(resolution.contentChanged).toBeUndefined();

    const stats = await store.stats();
    expect(stats.entities).toBe(1);

    const entity = await store.getEntity('id-1');
    expect(entity?.provenance.map(entry => `${entry.provider}/${entry.nativeId}`)).toEqual(['drive/drive-1', 'dropbox/dbx-9']);

    const merges = await store.getMerges('id-1');
    expect(merges).toHaveLength(1);
    expect(merges[0].matchedBy).toBe('fingerprint');
    expect(merges[0].provenanceKey).toBe('dropbox/alice/dbx-9');
    expect(merges[0].before.provenance).toHaveLength(1);
  });

  it('should report a re-sync of unchanged content as noop', async () => {
    await apply(report('drive-1'), drive);
    const resolution = await apply(report('drive-1'), drive);

    expect(resolution.outcome).toBe('noop');
    expect(resolution.matchedBy).toBe('provenance');
    expect((await store.getEntity('id-1'))?.version).toBe(1);
  });

  it('should tombstone an entity only when its last provenance entry is removed', async () => {
    await apply(report('drive-1'), drive);
    await apply(raw('File', 'dbx-9', { name: 'Report.pdf', size: 1000, contentHash: 'aa11' }), dropbox);

    const first = await apply(deletion('File', 'drive-1'), drive);
    expect(first.outcome).toBe('deleted');
    expect(first.entity?.deleted).toBe(false);

    const second = await apply(deletion('File', 'dbx-9'), dropbox);
    expect(second.outcome).toBe('deleted');
    expect(second.entity?.deleted).toBe(true);

    const stored = await store.getEntity('id-1');
    expect(stored?.deleted).toBe(true);
    expect(stored?.provenance.every(entry => entry.removed)).toBe(true);
  });

  it('should restore a tombstoned entity when the item reappears', async () => {
    await apply(report('drive-1'), drive);
    await apply(deletion('File', 'drive-1'), drive);

    const resolution = await apply(report('drive-1'), drive);

    expect(resolution.outcome).toBe('updated');
    expect(resolution.entity?.entityId).toBe('id-1');
    expect(resolution.entity?.deleted).toBe(false);
    expect(resolution.entity?.provenance[0].removed).toBe(false);
  });

  it('should treat a delete of an unknown item as noop', async () => {
    const resolution = await apply(deletion('File', 'never-seen'), drive);

    expect(resolution).toEqual({ outcome: 'noop', entity: null });
  });

  it('should update content in place when only one provider reports the item', async () => {
    await apply(fileRecord('drive-2', 'draft.txt', 10), drive);
    const before = await store.getEntity('id-1');

    const resolution = await apply(fileRecord('drive-2', 'draft.txt', 25), drive);

    expect(resolution.outcome).toBe('updated');
    expect(resolution.contentChanged).toBe(true);
    expect(resolution.entity?.attributes).toEqual({ name: 'draft.txt', size: 25 });
    expect(resolution.entity?.previousFingerprints).toEqual([before?.contentFingerprint]);
    expect(resolution.entity?.contentFingerprint).not.toBe(before?.contentFingerprint);
  });

  it('should keep two hash-less files with the same name and size apart', async () => {
    await apply(fileRecord('g-1', '.gitkeep', 0, { path: '/app/logs/.gitkeep', mtime: '2024-05-01T10:00:00Z' }), drive);

    const resolution = await apply(fileRecord('g-2', '.gitkeep', 0, { path: '/app/tmp/.gitkeep', mtime: '2024-05-01T10:00:01Z' }), drive);

    expect(resolution.outcome).toBe('created');
    expect(resolution.entity?.entityId).toBe('id-2');
    const [first, second] = await store.getEntities(['id-1', 'id-2']);
    expect(second.contentFingerprint).not.toBe(first.contentFingerprint);
  });

  describe('similarity pass', () => {
    it('should merge a hash-less file seen by two providers a second apart', async () => {
      await apply(fileRecord('d-5', 'notes.txt', 42, { mtime: '2024-05-01T10:00:00Z' }), drive);

      const resolution = await apply(
        raw('File', 'x-5', { name: 'notes.txt', size: 42, client_modified: '2024-05-01T10:00:01Z' }),
        dropbox
      );

      expect(resolution.outcome).toBe('updated');
      expect(resolution.matchedBy).toBe('similarity');
      expect(resolution.confidence).toBe(1);
      expect(resolution.entity?.entityId).toBe('id-1');
      expect(resolution.entity?.aliasFingerprints).toHaveLength(1);
    });

    const event = (nativeId: string, title: string, start: string, end: string) =>
      raw('Event', nativeId, { title, start, end, participants: ['alice@example.com', 'bob@example.com'] });

    it('should merge a near-identical event from another provider', async () => {
      await apply(event('ev-1', 'Quarterly review', '2024-05-01T09:00:00Z', '2024-05-01T10:00:00Z'), calendar);

      const resolution = await apply(
        event('ol-7', 'Quarterly Review', '2024-05-01T09:00:00Z', '2024-05-01T10:00:00Z'),
        { provider: 'outlook', account: 'alice' }
      );

      expect(resolution.outcome).toBe('updated');
      expect(resolution.matchedBy).toBe('similarity');
      expect(resolution.confidence).toBe(1);
      expect(resolution.entity?.entityId).toBe('id-1');
      expect(resolution.entity?.aliasFingerprints).toHaveLength(1);
    });

    it('should keep similar items from the same account apart', async () => {
      await apply(event('ev-1', 'Quarterly review', '2024-05-01T09:00:00Z', '2024-05-01T10:00:00Z'), calendar);

      const resolution = await apply(
        event('ev-2', 'Quarterly Review', '2024-05-01T09:00:00Z', '2024-05-01T10:00:00Z'),
        calendar
      );

      expect(resolution.outcome).toBe('created');
      expect(resolution.entity?.entityId).toBe('id-2');
    });

    it('should create a new entity and report ambiguity between two near candidates', async () => {
      await apply(event('a-1', 'Planning', '2024-05-01T09:00:00Z', '2024-05-01T10:00:00Z'), { provider: 'a', account: 'x' });
      await apply(event('b-1', 'Planning', '2024-05-01T10:00:00Z', '2024-05-01T11:00:00Z'), { provider: 'b', account: 'x' });

      const resolution = await apply(
        event('c-1', 'Planning', '2024-05-01T09:30:00Z', '2024-05-01T10:30:00Z'),
        { provider: 'c', account: 'x' }
      );

      expect(resolution.outcome).toBe('created');
      expect(resolution.ambiguity).toBeInstanceOf(MergeAmbiguity);
      expect(resolution.ambiguity?.candidates.map(c => c.confidence)).toEqual([0.733, 0.733]);
      expect((await store.stats()).entities).toBe(3);
    });
  });
});
