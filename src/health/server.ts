/**
 * Health check and query server
 *
 * Provides HTTP endpoints for monitoring the service, reading sync state
 * and running composite queries
 */
import express from 'express';
import { Server } from 'http';
import { logger } from '../utils/logger';
import Config from '../config';
import MetricsService, { getMetrics } from '../metrics/metrics';
import { SchemaValidationError } from '../utils/schema-validator';
import { DiskFootprint, StorageGateway } from '../storage/gateway';
import { createGraphStoreRouter } from '../storage/http-router';
import { QueryEngine } from '../query/engine';
import { SyncCoordinator, UnknownPipelineError } from '../sync/coordinator';
import { SemanticIndexer } from '../semantic/indexer';
import { QuarantineLog } from '../sync/quarantine';

export interface HealthServerDeps {
  store: StorageGateway;
  engine: QueryEngine;
  coordinator: SyncCoordinator;
  indexer?: SemanticIndexer;
  /** Serves GET /quarantine when set */
  quarantine?: QuarantineLog;
  /** On-disk log size for the /index status, when the store keeps one */
  disk?: DiskFootprint;
  /** Also serve the storage routes under /store */
  serveStore?: boolean;
  maxGraphMb?: number;
}

// Server instance
let server: Server | null = null;

/**
 * Build the express app. Separate from startHealthServer so tests can
 * drive it with supertest.
 */
export function createApp(deps: HealthServerDeps): express.Express {
  const app = express();
  const maxGraphMb = deps.maxGraphMb ?? Config.storage.maxGraphMb;

  // Log incoming requests
  app.use((req, res, next) => {
    logger.debug({
      method: req.method,
      url: req.url
    }, 'HTTP request received');
    next();
  });

  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/healthz', (req, res) => {
    const memoryUsage = process.memoryUsage();

    const health = {
      status: 'ok',
      service: Config.service.name,
      version: Config.service.version,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memory: {
        rss: Math.round(memoryUsage.rss / 1024 / 1024), // MB
        heapTotal: Math.round(memoryUsage.heapTotal / 1024 / 1024), // MB
        heapUsed: Math.round(memoryUsage.heapUsed / 1024 / 1024), // MB
      },
    };

    logger.debug({ health }, 'Health check');
    res.json(health);
  });

  // Index status endpoint
  app.get('/index', async (req, res) => {
    try {
      const stats = await deps.store.stats();
      const fileMB = deps.disk ? await deps.disk.getFileSizeMB() : null;

      let status = 'normal';
      let httpStatus = 200;
      if (fileMB !== null && fileMB > maxGraphMb) {
        status = 'critical';
        httpStatus = 503;
      } else if (fileMB !== null && fileMB > maxGraphMb * 0.8) {
        status = 'degraded';
      }

      const indexStatus = {
        ok: status !== 'critical',
        ...stats,
        fileMB: fileMB === null ? null : Math.round(fileMB * 10) / 10,
        lastCompaction: deps.disk ? deps.disk.getLastCompactionTimestamp() : null,
        semantic: deps.indexer ? deps.indexer.status() : null,
        status,
      };

      res.status(httpStatus).json(indexStatus);
      logger.debug({ indexStatus }, 'Index status endpoint called');
    } catch (error) {
      logger.error({ error }, 'Error serving index status');
      res.status(500).json({ error: 'Failed to get index status' });
    }
  });

  // Sync cursors
  app.get('/sync', async (req, res) => {
    try {
      const cursors = deps.coordinator.list();
      res.json({
        ok: cursors.every(cursor => !cursor.degraded),
        pipelines: cursors,
        unregistered: await deps.coordinator.unregistered(),
      });
    } catch (error) {
      logger.error({ error }, 'Error listing sync cursors');
      res.status(500).json({ status: 'error', message: 'Failed to list sync cursors' });
    }
  });

  app.post('/sync/:provider/:account/trigger', (req, res) => {
    const { provider, account } = req.params;
    const pipeline = deps.coordinator.get(provider, account);
    if (!pipeline) {
      res.status(404).json({ status: 'error', message: `No connector registered for ${provider}/${account}` });
      return;
    }

    deps.coordinator.trigger(provider, account).catch(error => {
      if (error instanceof UnknownPipelineError) {
        logger.warn({ provider, account }, 'Pipeline deregistered before trigger ran');
        return;
      }
      logger.error({ error, provider, account }, 'Triggered sync failed');
    });

    res.status(202).json({ status: 'accepted', coalesced: pipeline.isRunning });
  });

  // Composite query
  app.post('/search', async (req, res) => {
    try {
      const result = await deps.engine.search(req.body);
      res.json(result);
    } catch (error) {
      if (error instanceof SchemaValidationError) {
        res.status(400).json({ status: 'error', message: error.message, errors: error.errors });
        return;
      }
      logger.error({ error }, 'Error running search');
      res.status(500).json({ status: 'error', message: 'Search failed' });
    }
  });

  app.get('/entities/:id', async (req, res) => {
    try {
      const entity = await deps.store.getEntity(req.params.id);
      if (!entity) {
        res.status(404).json({ status: 'error', message: 'Entity not found' });
        return;
      }
      res.json(entity);
    } catch (error) {
      logger.error({ error, entityId: req.params.id }, 'Error reading entity');
      res.status(500).json({ status: 'error', message: 'Failed to read entity' });
    }
  });

  app.get('/entities/:id/related', async (req, res) => {
    try {
      res.json(await deps.engine.describeEdges(req.params.id));
    } catch (error) {
      logger.error({ error, entityId: req.params.id }, 'Error describing edges');
      res.status(500).json({ status: 'error', message: 'Failed to describe edges' });
    }
  });

  app.get('/entities/:id/merges', async (req, res) => {
    try {
      res.json(await deps.store.getMerges(req.params.id));
    } catch (error) {
      logger.error({ error, entityId: req.params.id }, 'Error reading merge journal');
      res.status(500).json({ status: 'error', message: 'Failed to read merge journal' });
    }
  });

  // Records the normalizer rejected, optionally for one provider
  app.get('/quarantine', async (req, res) => {
    if (!deps.quarantine) {
      res.status(404).json({ status: 'error', message: 'Quarantine log not available' });
      return;
    }
    try {
      const provider = req.query.provider;
      const records = await deps.quarantine.read();
      res.json(typeof provider === 'string' ? records.filter(record => record.provider === provider) : records);
    } catch (error) {
      logger.error({ error }, 'Error reading quarantine log');
      res.status(500).json({ status: 'error', message: 'Failed to read quarantine log' });
    }
  });

  if (deps.serveStore) {
    app.use('/store', createGraphStoreRouter(deps.store));
  }

  // Prometheus metrics endpoint
  app.get('/metrics', async (req, res) => {
    try {
      const metrics = await getMetrics();
      res.set('Content-Type', MetricsService.register.contentType);
      res.end(metrics);
      logger.debug('Metrics endpoint called');
    } catch (error) {
      logger.error({ error }, 'Error serving metrics');
      res.status(500).json({ error: 'Failed to collect metrics' });
    }
  });

  // Catch-all for 404s
  app.use((req, res) => {
    logger.info({
      method: req.method,
      url: req.url
    }, 'Unknown route');

    res.status(404).json({
      status: 'error',
      message: 'Not found'
    });
  });

  // Error handler
  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ status: 'error', message: 'Malformed JSON body' });
      return;
    }

    logger.error({
      error: err,
      method: req.method,
      url: req.url
    }, 'Server error');

    res.status(500).json({
      status: 'error',
      message: 'Internal server error'
    });
  });

  return app;
}

/**
 * Start the health check HTTP server
 */
export function startHealthServer(deps: HealthServerDeps): Server {
  const app = createApp(deps);
  const port = Config.http.port;
  const host = Config.http.host;

  server = app.listen(port, host, () => {
    logger.info({ port, host }, 'Health check server started');
  });

  server.on('error', (error: Error) => {
    logger.error({ error }, 'Health check server error');
  });

  return server;
}

/**
 * Stop the health check HTTP server
 */
export function stopHealthServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server) {
      return resolve();
    }

    logger.info('Stopping health check server');

    server.close((err: Error | undefined) => {
      if (err) {
        logger.error({ error: err }, 'Error closing health check server');
        return reject(err);
      }

      logger.info('Health check server stopped');
      server = null;
      resolve();
    });
  });
}

export default { createApp, startHealthServer, stopHealthServer };
