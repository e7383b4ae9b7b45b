/**
 * Configuration settings for the index service
 */
import { config } from 'dotenv';
import { join } from 'path';

// Load environment variables from .env file if present
config();

// Environment mapping for log levels
const LOG_LEVELS = {
  development: 'debug',
  test: 'silent',
  production: 'info',
} as const;

type NodeEnv = keyof typeof LOG_LEVELS;

function resolveNodeEnv(value: string | undefined): NodeEnv {
  return value === 'production' || value === 'test' ? value : 'development';
}

const nodeEnv = resolveNodeEnv(process.env.NODE_ENV);

const int = (name: string, fallback: number): number => {
  const parsed = parseInt(process.env[name] || `${fallback}`, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const float = (name: string, fallback: number): number => {
  const parsed = parseFloat(process.env[name] || `${fallback}`);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const dataDir = process.env.DATA_DIR || join(process.cwd(), 'data', 'index');

/**
 * Identity matching policy. Weights and thresholds are policy rather than
 * structure, so every value can be overridden from the environment.
 */
export interface IdentityPolicy {
  matchThreshold: number;
  ambiguityFloor: number;
  /** Candidates are drawn from entities whose time span lies within this window of the draft */
  candidateWindowMs: number;
  file: { name: number; size: number; modified: number; modifiedToleranceMs: number };
  event: { participants: number; time: number; title: number };
  message: { sender: number; sent: number; subject: number; sentToleranceMs: number };
  location: { distance: number; time: number; toleranceMeters: number; toleranceMs: number };
}

export interface RelationshipPolicy {
  windowSize: number;
  windowMinutes: number;
  windowMeters: number;
  timeHalfLifeMinutes: number;
  distanceHalfLifeMeters: number;
  minConfidence: number;
  sharedAuthorConfidence: number;
}

export interface SyncPolicy {
  intervalMs: number;
  fetchTimeoutMs: number;
  commitTimeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  maxConflictRetries: number;
}

export interface SemanticPolicy {
  concurrency: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  requestTimeoutMs: number;
}

/**
 * Configuration object for the index service
 */
export const Config = {
  // Service info
  service: {
    name: 'footprint-index',
    version: process.env.npm_package_version || '0.4.0',
  },

  // Logging configuration
  logging: {
    level: process.env.LOG_LEVEL || LOG_LEVELS[nodeEnv],
    prettyPrint: nodeEnv === 'development',
  },

  // NATS broker configuration
  broker: {
    enabled: process.env.BROKER_ENABLED !== 'false',
    url: process.env.BROKER_URL || 'nats://localhost:4222',
    timeout: int('BROKER_TIMEOUT', 5000),
    reconnectAttempts: int('BROKER_RECONNECT_ATTEMPTS', 10),
    reconnectTimeWait: int('BROKER_RECONNECT_TIME_WAIT', 1000), // ms
  },

  // Topic definitions
  topics: {
    in: {
      syncTrigger: process.env.TOPIC_IN_SYNC_TRIGGER || 'events.index.sync.trigger.v1',
    },
    out: {
      batchCommitted: process.env.TOPIC_OUT_BATCH_COMMITTED || 'events.index.batch.committed.v1',
      syncFailed: process.env.TOPIC_OUT_SYNC_FAILED || 'events.index.sync.failed.v1',
      providerDegraded: process.env.TOPIC_OUT_PROVIDER_DEGRADED || 'events.index.provider.degraded.v1',
    },
  },

  // HTTP server (health, metrics, query surface)
  http: {
    port: int('HTTP_PORT', 3000),
    host: process.env.HTTP_HOST || '0.0.0.0',
  },

  // Storage gateway
  storage: {
    mode: process.env.STORAGE_MODE === 'remote' ? 'remote' as const : 'local' as const,
    graphPath: process.env.GRAPH_LOG_PATH || join(dataDir, 'graph.jsonl'),
    fsync: process.env.FSYNC === 'true',
    compactThreshold: int('COMPACT_THRESHOLD', 500),
    compactMbLimit: int('COMPACT_MB_LIMIT', 20),
    maxGraphMb: int('MAX_GRAPH_MB', 100),
    remoteUrl: process.env.GRAPH_STORE_URL || 'http://localhost:8529/index',
    remoteTimeoutMs: int('GRAPH_STORE_TIMEOUT', 10000),
  },

  // Incremental sync
  sync: {
    cursorDir: process.env.CURSOR_DIR || join(dataDir, 'cursors'),
    quarantinePath: process.env.QUARANTINE_PATH || join(dataDir, 'quarantine.jsonl'),
    connectorsPath: process.env.CONNECTORS_PATH || join(process.cwd(), 'config', 'connectors.json'),
    intervalMs: int('SYNC_INTERVAL_MS', 15 * 60 * 1000),
    fetchTimeoutMs: int('SYNC_FETCH_TIMEOUT_MS', 30000),
    commitTimeoutMs: int('SYNC_COMMIT_TIMEOUT_MS', 30000),
    maxRetries: int('SYNC_MAX_RETRIES', 5),
    retryBaseMs: int('SYNC_RETRY_BASE_MS', 2000),
    retryMaxMs: int('SYNC_RETRY_MAX_MS', 5 * 60 * 1000),
    maxConflictRetries: int('SYNC_MAX_CONFLICT_RETRIES', 5),
  } satisfies SyncPolicy & Record<string, unknown>,

  identity: {
    matchThreshold: float('IDENTITY_MATCH_THRESHOLD', 0.8),
    ambiguityFloor: float('IDENTITY_AMBIGUITY_FLOOR', 0.5),
    candidateWindowMs: int('IDENTITY_CANDIDATE_WINDOW_MS', 7 * 24 * 60 * 60 * 1000),
    file: {
      name: float('IDENTITY_FILE_NAME_WEIGHT', 0.4),
      size: float('IDENTITY_FILE_SIZE_WEIGHT', 0.35),
      modified: float('IDENTITY_FILE_MODIFIED_WEIGHT', 0.25),
      modifiedToleranceMs: int('IDENTITY_FILE_MODIFIED_TOLERANCE_MS', 2000),
    },
    event: {
      participants: float('IDENTITY_EVENT_PARTICIPANTS_WEIGHT', 0.4),
      time: float('IDENTITY_EVENT_TIME_WEIGHT', 0.4),
      title: float('IDENTITY_EVENT_TITLE_WEIGHT', 0.2),
    },
    message: {
      sender: float('IDENTITY_MESSAGE_SENDER_WEIGHT', 0.3),
      sent: float('IDENTITY_MESSAGE_SENT_WEIGHT', 0.4),
      subject: float('IDENTITY_MESSAGE_SUBJECT_WEIGHT', 0.3),
      sentToleranceMs: int('IDENTITY_MESSAGE_SENT_TOLERANCE_MS', 5000),
    },
    location: {
      distance: float('IDENTITY_LOCATION_DISTANCE_WEIGHT', 0.5),
      time: float('IDENTITY_LOCATION_TIME_WEIGHT', 0.5),
      toleranceMeters: float('IDENTITY_LOCATION_TOLERANCE_METERS', 10),
      toleranceMs: int('IDENTITY_LOCATION_TOLERANCE_MS', 1000),
    },
  } satisfies IdentityPolicy,

  relationships: {
    windowSize: int('REL_WINDOW_SIZE', 256),
    windowMinutes: float('REL_WINDOW_MINUTES', 10),
    windowMeters: float('REL_WINDOW_METERS', 200),
    timeHalfLifeMinutes: float('REL_TIME_HALF_LIFE_MINUTES', 5),
    distanceHalfLifeMeters: float('REL_DISTANCE_HALF_LIFE_METERS', 100),
    minConfidence: float('REL_MIN_CONFIDENCE', 0.1),
    sharedAuthorConfidence: float('REL_SHARED_AUTHOR_CONFIDENCE', 0.6),
  } satisfies RelationshipPolicy,

  // Embedding service and the semantic worker pool
  semantic: {
    provider: process.env.EMBEDDING_PROVIDER === 'http' ? 'http' as const : 'hashing' as const,
    url: process.env.EMBEDDING_URL || 'http://localhost:11434/api/embed',
    model: process.env.EMBEDDING_MODEL || 'all-minilm',
    dimension: int('EMBEDDING_DIMENSION', 384),
    concurrency: int('EMBEDDING_CONCURRENCY', 2),
    maxAttempts: int('EMBEDDING_MAX_ATTEMPTS', 5),
    backoffBaseMs: int('EMBEDDING_BACKOFF_BASE_MS', 1000),
    backoffMaxMs: int('EMBEDDING_BACKOFF_MAX_MS', 60000),
    requestTimeoutMs: int('EMBEDDING_TIMEOUT_MS', 15000),
  } satisfies SemanticPolicy & Record<string, unknown>,
};

// Export configuration as default
export default Config;
