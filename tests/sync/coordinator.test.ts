/**
 * Unit tests for the sync coordinator and its per-provider pipelines
 */
import { promises as fs } from 'fs';
import { join } from 'path';
import waitForExpect from 'wait-for-expect';
import { SyncPolicy } from '../../src/config';
import { SyncCoordinator, UnknownPipelineError } from '../../src/sync/coordinator';
import { BatchProcessor } from '../../src/sync/batch-processor';
import { CursorStore, emptyCursor } from '../../src/sync/cursor-store';
import { QuarantineLog } from '../../src/sync/quarantine';
import { SyncNotifier } from '../../src/sync/notifier';
import { LocalGraphStore } from '../../src/storage/local-graph-store';
import { ConnectorError } from '../../src/errors';
import { Connector, ConnectorBatch } from '../../src/types/provider';
import { fileRecord, tmpDir } from '../fixtures/records';

type Step = ConnectorBatch | Error | (() => Promise<ConnectorBatch>);

/** Connector that replays a script of batches and failures */
class ScriptedConnector implements Connector {
  readonly watermarks: Array<string | null> = [];

  constructor(readonly provider: string, readonly account: string, private readonly script: Step[] = []) {}

  async fetchBatch(watermark: string | null): Promise<ConnectorBatch> {
    this.watermarks.push(watermark);
    const step = this.script.shift();
    if (step === undefined) return { records: [], nextWatermark: watermark, hasMore: false };
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step();
    return step;
  }
}

const batch = (nativeIds: string[], nextWatermark: string, hasMore = false): ConnectorBatch => ({
  records: nativeIds.map(id => fileRecord(id, `${id}.txt`, id.length)),
  nextWatermark,
  hasMore,
});

const policy: SyncPolicy = {
  intervalMs: 60000,
  fetchTimeoutMs: 1000,
  commitTimeoutMs: 1000,
  maxRetries: 3,
  retryBaseMs: 10,
  retryMaxMs: 50,
  maxConflictRetries: 2,
};

describe('SyncCoordinator', () => {
  const testDir = tmpDir('coordinator');
  let store: LocalGraphStore;
  let cursors: CursorStore;
  let notifier: jest.Mocked<SyncNotifier>;
  let coordinator: SyncCoordinator;
  let run = 0;

  beforeEach(async () => {
    run++;
    store = new LocalGraphStore({ graphPath: join(testDir, `graph-${run}.jsonl`) });
    await store.init();
    cursors = new CursorStore(join(testDir, `cursors-${run}`));
    notifier = {
      batchCommitted: jest.fn().mockResolvedValue(undefined),
      syncFailed: jest.fn().mockResolvedValue(undefined),
      providerDegraded: jest.fn().mockResolvedValue(undefined),
    };
    const processor = new BatchProcessor(store, { quarantine: new QuarantineLog(join(testDir, `quarantine-${run}.jsonl`)) });
    coordinator = new SyncCoordinator(processor, cursors, notifier, policy);
  });

  afterEach(async () => {
    await coordinator.stop();
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should sync every batch and advance the watermark after each commit', async () => {
    const connector = new ScriptedConnector('drive', 'alice', [batch(['a-1'], 'w-1', true), batch(['a-2', 'a-3'], 'w-2')]);
    await coordinator.register(connector);

    await coordinator.trigger('drive', 'alice');

    expect(connector.watermarks).toEqual([null, 'w-1']);
    const cursor = await cursors.read('drive', 'alice');
    expect(cursor).toMatchObject({ watermark: 'w-2', state: 'Idle', attempts: 0, failureReason: null });
    expect(cursor?.stats).toEqual({ batches: 2, created: 3, updated: 0, deleted: 0, noop: 0, quarantined: 0 });
    expect(notifier.batchCommitted).toHaveBeenCalledTimes(2);
    expect((await store.stats()).entities).toBe(3);
  });

  it('should coalesce triggers that arrive during a run into one follow-up run', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const connector = new ScriptedConnector('drive', 'alice', [
      async () => {
        await gate;
        return batch(['a-1'], 'w-1');
      },
    ]);
    const pipeline = await coordinator.register(connector);

    const first = pipeline.trigger();
    const second = pipeline.trigger();
    pipeline.trigger().catch(() => undefined);
    expect(second).toBe(first);

    release();
    await first;

    await waitForExpect(() => {
      expect(connector.watermarks).toEqual([null, 'w-1']);
      expect(pipeline.isRunning).toBe(false);
    });
  });

  it('should mark a provider degraded after a permanent connector error', async () => {
    const connector = new ScriptedConnector('drive', 'alice', [ConnectorError.permanent('token revoked'), batch(['a-1'], 'w-1')]);
    const pipeline = await coordinator.register(connector);

    await coordinator.trigger('drive', 'alice');

    expect(pipeline.snapshot()).toMatchObject({ state: 'Failed', degraded: true, failureReason: 'token revoked', watermark: null });
    expect(notifier.providerDegraded).toHaveBeenCalledWith(expect.objectContaining({ degraded: true }), 'token revoked');
    expect(notifier.syncFailed).toHaveBeenCalledWith(expect.objectContaining({ provider: 'drive' }), 'token revoked', true);

    // Scheduled runs skip degraded providers
    await coordinator.triggerAll(undefined, { skipDegraded: true });
    expect(connector.watermarks).toEqual([null]);

    await coordinator.trigger('drive', 'alice');
    expect(pipeline.snapshot()).toMatchObject({ state: 'Idle', degraded: false, watermark: 'w-1' });
  });

  it('should retry a transient failure with backoff', async () => {
    const connector = new ScriptedConnector('drive', 'alice', [ConnectorError.transient('503 from provider'), batch(['a-1'], 'w-1')]);
    const pipeline = await coordinator.register(connector);

    await coordinator.trigger('drive', 'alice');
    expect(pipeline.snapshot()).toMatchObject({ state: 'Failed', attempts: 1, degraded: false });
    expect(notifier.syncFailed).toHaveBeenCalledWith(expect.anything(), '503 from provider', false);

    await waitForExpect(() => {
      expect(pipeline.snapshot()).toMatchObject({ state: 'Idle', attempts: 0, watermark: 'w-1' });
    });
  });

  it('should not advance the watermark when the commit fails', async () => {
    jest.spyOn(store, 'commitBatch').mockRejectedValue(new Error('disk full'));
    const strict = new SyncCoordinator(
      new BatchProcessor(store, { quarantine: new QuarantineLog(join(testDir, `quarantine-${run}.jsonl`)) }),
      cursors,
      notifier,
      { ...policy, maxRetries: 0 }
    );
    await strict.register(new ScriptedConnector('drive', 'alice', [batch(['a-1'], 'w-1')]));

    await strict.trigger('drive', 'alice');

    expect(await cursors.read('drive', 'alice')).toMatchObject({ state: 'Failed', watermark: null, failureReason: 'disk full' });
    await strict.stop();
  });

  it('should resume an interrupted run from the last committed watermark', async () => {
    await cursors.write({ ...emptyCursor('drive', 'alice'), state: 'InProgress', watermark: 'w-7' });
    const connector = new ScriptedConnector('drive', 'alice');

    const pipeline = await coordinator.register(connector);
    expect(pipeline.snapshot()).toMatchObject({ state: 'Idle', watermark: 'w-7' });

    await pipeline.trigger();
    expect(connector.watermarks).toEqual(['w-7']);
  });

  it('should refuse a second registration of the same account', async () => {
    await coordinator.register(new ScriptedConnector('drive', 'alice'));

    await expect(coordinator.register(new ScriptedConnector('drive', 'alice')))
      .rejects.toThrow('Connector already registered for drive/alice');
  });

  it('should forget a deregistered pipeline and its cursor', async () => {
    await coordinator.register(new ScriptedConnector('drive', 'alice'));

    await coordinator.deregister('drive', 'alice');

    expect(coordinator.get('drive', 'alice')).toBeUndefined();
    expect(await cursors.read('drive', 'alice')).toBeNull();
    await expect(coordinator.trigger('drive', 'alice')).rejects.toBeInstanceOf(UnknownPipelineError);
    await expect(coordinator.deregister('drive', 'alice')).rejects.toThrow('No connector registered for drive/alice');
  });

  it('should route broker triggers by provider and account', async () => {
    const work = new ScriptedConnector('drive', 'work');
    const home = new ScriptedConnector('drive', 'home');
    const mail = new ScriptedConnector('mail', 'home');
    await coordinator.register(work);
    await coordinator.register(home);
    await coordinator.register(mail);

    await coordinator.handleTrigger({ event_id: 'e-1', provider: 'drive' });
    expect([work, home, mail].map(c => c.watermarks.length)).toEqual([1, 1, 0]);

    await coordinator.handleTrigger({ event_id: 'e-2', provider: 'mail', account: 'home' });
    expect([work, home, mail].map(c => c.watermarks.length)).toEqual([1, 1, 1]);

    await coordinator.handleTrigger({ event_id: 'e-3' });
    expect([work, home, mail].map(c => c.watermarks.length)).toEqual([2, 2, 2]);

    expect(coordinator.list().map(cursor => `${cursor.provider}/${cursor.account}`)).toEqual(['drive/work', 'drive/home', 'mail/home']);
  });

  it('should list persisted cursors that have no registered connector', async () => {
    await cursors.write({ ...emptyCursor('drive', 'old@example.com'), watermark: 'w-9' });
    await coordinator.register(new ScriptedConnector('drive', 'alice'));

    expect(await coordinator.unregistered()).toEqual([{ ...emptyCursor('drive', 'old@example.com'), watermark: 'w-9' }]);
  });
});
