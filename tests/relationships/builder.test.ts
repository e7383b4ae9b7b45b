/**
 * Unit tests for the relationship builder
 */
import Config from '../../src/config';
import { RelationshipBuilder } from '../../src/relationships/builder';
import { EntityLookup, ReferenceLedger } from '../../src/identity/overlay';
import { createEntity } from '../../src/identity/merge';
import { normalize } from '../../src/normalizer';
import { entryKey } from '../../src/model/provenance';
import { CanonicalEntity, PendingReference } from '../../src/types/canonical';
import { EntityDraft, ProviderSource, RawProviderRecord } from '../../src/types/provider';
import { calendar, drive, raw } from '../fixtures/records';

class FakeLookup implements EntityLookup, ReferenceLedger {
  pending: PendingReference[] = [];

  constructor(private readonly entities: CanonicalEntity[] = []) {}

  async getEntity(entityId: string): Promise<CanonicalEntity | null> {
    return this.entities.find(entity => entity.entityId === entityId) ?? null;
  }

  async findByProvenance(key: string): Promise<CanonicalEntity[]> {
    return this.entities.filter(entity => entity.provenance.some(entry => entryKey(entry) === key));
  }

  async findByFingerprint(fingerprint: string): Promise<CanonicalEntity[]> {
    return this.entities.filter(entity => entity.contentFingerprint === fingerprint);
  }

  async candidates(): Promise<CanonicalEntity[]> {
    return [];
  }

  async pendingFor(targetKey: string): Promise<PendingReference[]> {
    return this.pending.filter(ref => ref.targetKey === targetKey);
  }

  defer(ref: PendingReference): void {
    this.pending.push(ref);
  }

  resolve(targetKey: string): void {
    this.pending = this.pending.filter(ref => ref.targetKey !== targetKey);
  }
}

function resolved(record: RawProviderRecord, source: ProviderSource, entityId: string): { entity: CanonicalEntity; draft: EntityDraft } {
  const draft = normalize(record, source);
  if (draft.deleted) throw new Error('unexpected deletion');
  return { entity: createEntity(draft, entityId), draft };
}

const file = (nativeId: string, mtime: string, extra: Record<string, unknown> = {}) =>
  raw('File', nativeId, { name: `${nativeId}.txt`, size: 1, mtime, ...extra });

describe('RelationshipBuilder', () => {
  const lookup = new FakeLookup();

  it('should link an event to attachments that are already indexed', async () => {
    const files = ['f-1', 'f-2', 'f-3'].map((id, index) =>
      resolved(file(id, '2024-04-01T00:00:00Z'), calendar, `file-${index + 1}`).entity);
    const { entity, draft } = resolved(raw('Event', 'ev-1', {
      title: 'Design review',
      start: '2024-05-01T09:00:00Z',
      end: '2024-05-01T10:00:00Z',
      attachments: ['f-1', 'f-2', 'f-3'],
    }), calendar, 'event-1');

    const session = new RelationshipBuilder().begin();
    const edges = await session.build(entity, draft, new FakeLookup(files));

    expect(edges.filter(edge => edge.relationKind === 'ReferTo')).toEqual(['file-1', 'file-2', 'file-3'].map(toId => ({
      fromId: 'event-1',
      toId,
      relationKind: 'ReferTo',
      confidence: 1,
      evidence: 'event attachment',
      observations: 1,
    })));
  });

  it('should defer a reference until its target is indexed', async () => {
    const builder = new RelationshipBuilder();
    const ledger = new FakeLookup();
    const event = resolved(raw('Event', 'ev-1', {
      title: 'Design review',
      start: '2024-05-01T09:00:00Z',
      attachments: ['f-9'],
    }), calendar, 'event-1');

    expect(await builder.begin().build(event.entity, event.draft, ledger)).toEqual([]);
    expect(ledger.pending).toEqual([{
      targetKey: 'calendar/alice@example.com/f-9',
      fromId: 'event-1',
      relationKind: 'ReferTo',
      evidence: 'event attachment',
    }]);

    const target = resolved(file('f-9', '2024-01-01T00:00:00Z'), calendar, 'file-9');
    const edges = await builder.begin().build(target.entity, target.draft, ledger);

    expect(edges).toEqual([{
      fromId: 'event-1',
      toId: 'file-9',
      relationKind: 'ReferTo',
      confidence: 1,
      evidence: 'event attachment',
      observations: 1,
    }]);
    expect(ledger.pending).toEqual([]);
  });

  it('should not defer the same reference twice', async () => {
    const ledger = new FakeLookup();
    const event = resolved(raw('Event', 'ev-2', {
      title: 'Standup',
      start: '2024-05-01T09:00:00Z',
      attachments: ['f-8'],
    }), calendar, 'event-2');

    await new RelationshipBuilder().begin().build(event.entity, event.draft, ledger);
    await new RelationshipBuilder().begin().build(event.entity, event.draft, ledger);

    expect(ledger.pending).toHaveLength(1);
  });

  it('should leave shared state untouched when a session is not committed', async () => {
    const builder = new RelationshipBuilder();
    const a = resolved(file('a', '2024-05-01T10:00:00Z'), drive, 'e-a');

    await builder.begin().build(a.entity, a.draft, lookup);

    expect(builder.windowSize).toBe(0);
  });

  it('should infer co-occurrence with time decay', async () => {
    const builder = new RelationshipBuilder();
    const a = resolved(file('a', '2024-05-01T10:00:00Z'), drive, 'e-b');
    const b = resolved(file('b', '2024-05-01T10:01:00Z'), drive, 'e-a');

    const session = builder.begin();
    expect(await session.build(a.entity, a.draft, lookup)).toEqual([]);
    const edges = await session.build(b.entity, b.draft, lookup);

    expect(edges).toHaveLength(1);
    expect(edges[0]).toMatchObject({ fromId: 'e-a', toId: 'e-b', relationKind: 'CoOccurredWith', evidence: '60s apart' });
    expect(edges[0].confidence).toBeCloseTo(Math.pow(0.5, 60 / (Config.relationships.timeHalfLifeMinutes * 60)));
  });

  it('should infer shared authorship from the same owner', async () => {
    const session = new RelationshipBuilder().begin();
    const a = resolved(file('a', '2024-05-01T10:00:00Z', { owner: 'carol@example.com' }), drive, 'e-a');
    const b = resolved(file('b', '2024-05-01T10:00:00Z', { owner: 'Carol@Example.com' }), drive, 'e-b');

    await session.build(a.entity, a.draft, lookup);
    const edges = await session.build(b.entity, b.draft, lookup);

    expect(edges.map(edge => edge.relationKind)).toEqual(['CoOccurredWith', 'SharedAuthor']);
    expect(edges[1]).toMatchObject({
      fromId: 'e-a',
      toId: 'e-b',
      confidence: Config.relationships.sharedAuthorConfidence,
      evidence: 'authored by carol@example.com',
    });
  });

  it('should not relate items outside the time window', async () => {
    const session = new RelationshipBuilder().begin();
    const a = resolved(file('a', '2024-05-01T10:00:00Z'), drive, 'e-a');
    const b = resolved(file('b', '2024-05-01T11:00:00Z'), drive, 'e-b');

    await session.build(a.entity, a.draft, lookup);

    expect(await session.build(b.entity, b.draft, lookup)).toEqual([]);
  });

  it('should not relate items too far apart in space', async () => {
    const session = new RelationshipBuilder().begin();
    const a = resolved(file('a', '2024-05-01T10:00:00Z', { lat: 48.8584, lng: 2.2945 }), drive, 'e-a');
    const b = resolved(file('b', '2024-05-01T10:00:00Z', { lat: 48.8606, lng: 2.3376 }), drive, 'e-b');

    await session.build(a.entity, a.draft, lookup);

    expect(await session.build(b.entity, b.draft, lookup)).toEqual([]);
  });

  it('should build nothing for a tombstone', async () => {
    const session = new RelationshipBuilder().begin();
    const a = resolved(file('a', '2024-05-01T10:00:00Z'), drive, 'e-a');

    expect(await session.build({ ...a.entity, deleted: true }, a.draft, lookup)).toEqual([]);
  });
});
