/**
 * Index Worker - main service entry point
 *
 * Wires storage, the sync coordinator, the semantic indexer and the query
 * engine together, registers the configured connectors, listens for sync
 * triggers on the broker and serves the HTTP surface.
 */
import { BrokerAdapter } from '../broker/adapter';
import { logger } from '../utils/logger';
import Config from '../config';
import { metrics } from '../metrics/metrics';
import { validateSyncTriggerMessage, SchemaValidationError } from '../utils/schema-validator';
import { startHealthServer, stopHealthServer } from '../health/server';
import { StorageGateway } from '../storage/gateway';
import { LocalGraphStore } from '../storage/local-graph-store';
import { RemoteGraphStore } from '../storage/remote-graph-store';
import { IdentityResolver } from '../identity/resolver';
import { RelationshipBuilder } from '../relationships/builder';
import { BatchProcessor } from '../sync/batch-processor';
import { CursorStore } from '../sync/cursor-store';
import { QuarantineLog } from '../sync/quarantine';
import { SyncCoordinator } from '../sync/coordinator';
import { BrokerSyncNotifier, LoggingSyncNotifier, SyncNotifier } from '../sync/notifier';
import { createEmbeddingService, EmbeddingService } from '../semantic/embedding';
import { SemanticIndexer } from '../semantic/indexer';
import { QueryEngine } from '../query/engine';
import { Connector } from '../types/provider';
import { SyncTrigger } from '../types/events';
import { loadConnectors } from '../connectors/registry';

export interface IndexServices {
  store: StorageGateway;
  /** Set when the store is the local JSONL-backed one */
  localStore: LocalGraphStore | null;
  processor: BatchProcessor;
  coordinator: SyncCoordinator;
  indexer: SemanticIndexer;
  engine: QueryEngine;
  quarantine: QuarantineLog;
}

export interface BuildOptions {
  store: StorageGateway;
  notifier: SyncNotifier;
  embedding: EmbeddingService;
  cursors: CursorStore;
  quarantine: QuarantineLog;
}

/**
 * Compose the index services. Committed entities flow to the semantic
 * indexer without blocking the write path.
 */
export async function buildIndex(options: Partial<BuildOptions> = {}): Promise<IndexServices> {
  const localStore = options.store ? null : Config.storage.mode === 'local' ? new LocalGraphStore() : null;
  const store = options.store ?? localStore ?? new RemoteGraphStore();
  await store.init();

  const indexer = new SemanticIndexer(store, options.embedding ?? createEmbeddingService());
  const quarantine = options.quarantine ?? new QuarantineLog();
  const processor = new BatchProcessor(store, {
    resolver: new IdentityResolver(),
    builder: new RelationshipBuilder(),
    quarantine,
    onCommitted: entities => {
      indexer.enqueueAll(entities);
    },
  });
  const coordinator = new SyncCoordinator(
    processor,
    options.cursors ?? new CursorStore(),
    options.notifier ?? new LoggingSyncNotifier()
  );
  const engine = new QueryEngine(store, indexer);

  return { store, localStore, processor, coordinator, indexer, engine, quarantine };
}

export async function registerConnectors(coordinator: SyncCoordinator, connectors: Connector[]): Promise<void> {
  for (const connector of connectors) {
    await coordinator.register(connector);
  }
}

// Define async main function
export async function main(): Promise<void> {
  logger.info('Starting index worker...');

  // Connect to the message broker
  let broker: BrokerAdapter | null = null;
  if (Config.broker.enabled) {
    broker = await BrokerAdapter.connect({ url: Config.broker.url });
    logger.info('Connected to broker');
  }

  const services = await buildIndex({
    notifier: broker ? new BrokerSyncNotifier(broker) : new LoggingSyncNotifier(),
  });
  const stats = await services.store.stats();
  metrics.graphNodesTotal.set(stats.entities);
  metrics.graphEdgesTotal.set(stats.edges);
  logger.info(stats, 'Initialized index store');

  await registerConnectors(services.coordinator, await loadConnectors());

  // Subscribe to sync triggers
  if (broker) {
    await broker.subscribe(Config.topics.in.syncTrigger, async (data, context) => {
      const trigger = parseTrigger(data);
      if (!trigger) return;

      if (context.isDuplicate) {
        logger.info({
          eventId: trigger.event_id,
          originalTimestamp: context.originalTimestamp
        }, 'Duplicate sync trigger ignored');
        return;
      }

      await services.coordinator.handleTrigger(trigger);
    });
  }

  startHealthServer({
    store: services.store,
    engine: services.engine,
    coordinator: services.coordinator,
    indexer: services.indexer,
    quarantine: services.quarantine,
    disk: services.localStore ?? undefined,
  });

  services.coordinator.start();
  services.coordinator.triggerAll(undefined, { skipDegraded: true })
    .catch(error => logger.error({ error }, 'Initial sync failed'));

  setupGracefulShutdown(services, broker);
  logger.info('Index worker started');
}

function parseTrigger(data: unknown): SyncTrigger | null {
  try {
    return validateSyncTriggerMessage(data);
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      logger.warn({ errors: error.errors }, 'Ignoring invalid sync trigger');
      return null;
    }
    throw error;
  }
}

/**
 * Set up graceful shutdown handlers
 */
function setupGracefulShutdown(services: IndexServices, broker: BrokerAdapter | null): void {
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await services.coordinator.stop();
      await services.indexer.stop();
      await stopHealthServer();

      if (services.localStore) {
        logger.info('Performing final graph compaction before shutdown');
        await services.localStore.maybeCompact(true);
      }
      await services.store.close();

      if (broker) {
        await broker.close();
        logger.info('Broker connection closed');
      }

      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  // Listen for termination signals
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // SIGHUP re-queues entities whose embedding gave up
  process.on('SIGHUP', () => {
    logger.info('Received SIGHUP signal, retrying unembeddable entities');
    services.indexer.retryUnembeddable()
      .catch(error => logger.error({ error }, 'Error retrying unembeddable entities on SIGHUP'));
  });

  // Handle uncaught exceptions and rejections
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    void shutdown('unhandledRejection');
  });
}
