/**
 * Metrics module for the index service using Prometheus client
 */
import client from 'prom-client';
import { logger } from '../utils/logger';

// Initialize Prometheus registry
const register = new client.Registry();

// Add default metrics (CPU, memory, event loop, etc.)
client.collectDefaultMetrics({ register });

// Application-specific metrics
export const metrics = {
  // --- Pipeline ---

  // Records by resolution outcome (created, updated, deleted, noop)
  recordsProcessed: new client.Counter({
    name: 'index_records_processed_total',
    help: 'Total number of provider records processed, by outcome',
    labelNames: ['provider', 'outcome'] as const,
    registers: [register],
  }),

  recordsQuarantined: new client.Counter({
    name: 'index_records_quarantined_total',
    help: 'Records rejected by the normalizer and quarantined',
    labelNames: ['provider'] as const,
    registers: [register],
  }),

  batchesCommitted: new client.Counter({
    name: 'index_batches_committed_total',
    help: 'Batches durably committed to storage',
    labelNames: ['provider'] as const,
    registers: [register],
  }),

  batchesFailed: new client.Counter({
    name: 'index_batches_failed_total',
    help: 'Batches discarded after an error',
    labelNames: ['provider', 'reason'] as const,
    registers: [register],
  }),

  batchDuration: new client.Histogram({
    name: 'index_batch_duration_seconds',
    help: 'Time taken to fetch, resolve and commit one batch',
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
    registers: [register],
  }),

  providersDegraded: new client.Gauge({
    name: 'index_providers_degraded',
    help: 'Provider accounts marked degraded after a permanent failure',
    registers: [register],
  }),

  // --- Identity ---

  versionConflicts: new client.Counter({
    name: 'index_version_conflicts_total',
    help: 'Optimistic concurrency conflicts during commit',
    registers: [register],
  }),

  mergeAmbiguities: new client.Counter({
    name: 'index_merge_ambiguities_total',
    help: 'Drafts created as new entities because identity was ambiguous',
    labelNames: ['kind'] as const,
    registers: [register],
  }),

  similarityMerges: new client.Counter({
    name: 'index_similarity_merges_total',
    help: 'Merges decided by the similarity pass rather than an exact fingerprint',
    labelNames: ['kind'] as const,
    registers: [register],
  }),

  // --- Graph ---

  graphNodesTotal: new client.Gauge({
    name: 'index_graph_nodes_total',
    help: 'Total number of entities in the index',
    registers: [register],
  }),

  graphEdgesTotal: new client.Gauge({
    name: 'index_graph_edges_total',
    help: 'Total number of relationship edges in the index',
    registers: [register],
  }),

  edgesUpserted: new client.Counter({
    name: 'index_edges_upserted_total',
    help: 'Relationship edges written, by relation kind',
    labelNames: ['relation'] as const,
    registers: [register],
  }),

  graphCompactionsTotal: new client.Counter({
    name: 'index_graph_compactions_total',
    help: 'Total number of graph log compactions performed',
    registers: [register],
  }),

  graphCompactionTimeSeconds: new client.Histogram({
    name: 'index_graph_compaction_time_seconds',
    help: 'Time taken to compact the graph log in seconds',
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
    registers: [register],
  }),

  graphLogBytes: new client.Gauge({
    name: 'index_graph_log_bytes',
    help: 'Size of the graph log on disk',
    registers: [register],
  }),

  // --- Semantic ---

  embeddingsCompleted: new client.Counter({
    name: 'index_embeddings_completed_total',
    help: 'Entities embedded successfully',
    registers: [register],
  }),

  embeddingFailures: new client.Counter({
    name: 'index_embedding_failures_total',
    help: 'Failed embedding attempts',
    labelNames: ['reason'] as const,
    registers: [register],
  }),

  entitiesUnembeddable: new client.Counter({
    name: 'index_entities_unembeddable_total',
    help: 'Entities marked unembeddable after exhausting retries',
    registers: [register],
  }),

  embeddingQueueDepth: new client.Gauge({
    name: 'index_embedding_queue_depth',
    help: 'Embedding tasks waiting or in flight',
    registers: [register],
  }),

  // --- Query ---

  queryDuration: new client.Histogram({
    name: 'index_query_duration_seconds',
    help: 'Composite query latency',
    labelNames: ['semantic'] as const,
    buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2],
    registers: [register],
  }),

  semanticCandidatesScored: new client.Histogram({
    name: 'index_semantic_candidates_scored',
    help: 'Candidates handed to semantic scoring per query',
    buckets: [1, 10, 50, 100, 500, 1000, 5000],
    registers: [register],
  }),

  // --- Broker ---

  duplicatesDetected: new client.Counter({
    name: 'index_duplicate_events_total',
    help: 'Total number of duplicate broker events detected',
    registers: [register],
  }),
};

/**
 * Get all metrics for Prometheus scraping
 * @returns Promise resolving to metrics string
 */
export async function getMetrics(): Promise<string> {
  try {
    return await register.metrics();
  } catch (err) {
    logger.error({ error: err }, 'Error collecting metrics');
    throw err;
  }
}

export default {
  metrics,
  getMetrics,
  register
};
