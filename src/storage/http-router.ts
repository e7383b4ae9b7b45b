/**
 * HTTP routes serving a StorageGateway, the server side of RemoteGraphStore
 */
import express, { NextFunction, Request, Response, Router } from 'express';
import { logger } from '../utils/logger';
import { ConflictError } from '../errors';
import { CanonicalEntity, PendingReference, RELATION_KINDS, RelationKind, RelationshipEdge } from '../types/canonical';
import { StructuralQuery, TraversalDirection } from '../types/query';
import { CommitUnit, StorageGateway } from './gateway';

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

type Handler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not catch rejected handlers on its own */
const route = (handler: Handler) => (req: Request, res: Response, next: NextFunction): void => {
  handler(req, res).catch(next);
};

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}

function isRelationKind(value: unknown): value is RelationKind {
  return RELATION_KINDS.some(kind => kind === value);
}

function isDirection(value: unknown): value is TraversalDirection {
  return value === 'out' || value === 'in' || value === 'both';
}

function isEntity(value: unknown): value is CanonicalEntity {
  return isObject(value) && typeof value.entityId === 'string' && typeof value.kind === 'string' &&
    typeof value.contentFingerprint === 'string' && Array.isArray(value.provenance) && isObject(value.attributes);
}

function isEdge(value: unknown): value is RelationshipEdge {
  return isObject(value) && typeof value.fromId === 'string' && typeof value.toId === 'string' &&
    isRelationKind(value.relationKind) && typeof value.confidence === 'number';
}

function isPendingReference(value: unknown): value is PendingReference {
  return isObject(value) && typeof value.targetKey === 'string' && typeof value.fromId === 'string' &&
    isRelationKind(value.relationKind) && typeof value.evidence === 'string';
}

function isCommitUnit(value: unknown): value is CommitUnit {
  return isObject(value) && typeof value.batchId === 'string' &&
    Array.isArray(value.entities) &&
    value.entities.every(item => isObject(item) && isEntity(item.entity) && typeof item.expectedVersion === 'number') &&
    Array.isArray(value.edges) && value.edges.every(isEdge) &&
    Array.isArray(value.merges) &&
    (value.resolvedReferences === undefined || isStringArray(value.resolvedReferences)) &&
    (value.deferred === undefined || (Array.isArray(value.deferred) && value.deferred.every(isPendingReference)));
}

function isStructuralQuery(value: unknown): value is StructuralQuery {
  return isObject(value) &&
    (value.ids === undefined || isStringArray(value.ids)) &&
    (value.kind === undefined || typeof value.kind === 'string') &&
    (value.includeDeleted === undefined || typeof value.includeDeleted === 'boolean') &&
    (value.timeRange === undefined ||
      (isObject(value.timeRange) && typeof value.timeRange.from === 'string' && typeof value.timeRange.to === 'string'));
}

function idsOf(body: unknown): string[] {
  if (!isObject(body) || !isStringArray(body.ids)) {
    throw new BadRequestError('Body must be {ids: string[]}');
  }
  return body.ids;
}

export function createGraphStoreRouter(store: StorageGateway): Router {
  const router = express.Router();
  router.use(express.json({ limit: '10mb' }));

  router.get('/stats', route(async (req, res) => {
    res.json(await store.stats());
  }));

  router.post('/entities/batch-get', route(async (req, res) => {
    res.json(await store.getEntities(idsOf(req.body)));
  }));

  router.get('/entities/:id', route(async (req, res) => {
    const entity = await store.getEntity(req.params.id);
    if (!entity) {
      res.status(404).json({ message: `Entity ${req.params.id} not found` });
      return;
    }
    res.json(entity);
  }));

  router.post('/entities/:id', route(async (req, res) => {
    const body: unknown = req.body;
    if (!isObject(body) || !isEntity(body.entity) || typeof body.expectedVersion !== 'number') {
      throw new BadRequestError('Body must be {entity, expectedVersion}');
    }
    if (body.entity.entityId !== req.params.id) {
      throw new BadRequestError('Entity id does not match the path');
    }
    res.json({ version: await store.upsertEntity(body.entity, body.expectedVersion) });
  }));

  router.get('/entities/:id/edges', route(async (req, res) => {
    const { relationKind, direction } = req.query;
    if (relationKind !== undefined && !isRelationKind(relationKind)) {
      throw new BadRequestError(`Unknown relation kind ${String(relationKind)}`);
    }
    if (direction !== undefined && !isDirection(direction)) {
      throw new BadRequestError(`Unknown direction ${String(direction)}`);
    }
    res.json(await store.getEdges(req.params.id, { relationKind, direction }));
  }));

  router.get('/entities/:id/merges', route(async (req, res) => {
    res.json(await store.getMerges(req.params.id));
  }));

  router.post('/entities/:id/unembeddable', route(async (req, res) => {
    const body: unknown = req.body;
    if (!isObject(body) || typeof body.reason !== 'string') {
      throw new BadRequestError('Body must be {reason}');
    }
    await store.markUnembeddable(req.params.id, body.reason);
    res.status(204).end();
  }));

  router.get('/fingerprints/:fingerprint', route(async (req, res) => {
    res.json(await store.findByFingerprint(req.params.fingerprint));
  }));

  router.get('/provenance', route(async (req, res) => {
    const key = req.query.key;
    if (typeof key !== 'string') {
      throw new BadRequestError('Query parameter key is required');
    }
    res.json(await store.findByProvenance(key));
  }));

  router.post('/query', route(async (req, res) => {
    const body: unknown = req.body;
    if (!isStructuralQuery(body)) {
      throw new BadRequestError('Invalid structural query');
    }
    res.json(await store.query(body));
  }));

  router.post('/edges', route(async (req, res) => {
    const body: unknown = req.body;
    if (!isEdge(body)) {
      throw new BadRequestError('Invalid edge');
    }
    res.json(await store.upsertEdge(body));
  }));

  router.post('/batches', route(async (req, res) => {
    const body: unknown = req.body;
    if (!isCommitUnit(body)) {
      throw new BadRequestError('Invalid commit unit');
    }
    res.json(await store.commitBatch(body));
  }));

  router.put('/vectors/:id', route(async (req, res) => {
    const body: unknown = req.body;
    if (!isObject(body) || !isNumberArray(body.embedding)) {
      throw new BadRequestError('Body must be {embedding: number[]}');
    }
    res.json({ ref: await store.putVector(req.params.id, body.embedding) });
  }));

  router.post('/vectors/get', route(async (req, res) => {
    res.json(await store.getVectors(idsOf(req.body)));
  }));

  router.post('/vectors/query', route(async (req, res) => {
    const body: unknown = req.body;
    if (!isObject(body) || !isNumberArray(body.embedding) || typeof body.k !== 'number') {
      throw new BadRequestError('Body must be {embedding: number[], k: number}');
    }
    res.json(await store.queryVectors(body.embedding, body.k));
  }));

  router.get('/unembeddable', route(async (req, res) => {
    res.json(await store.listUnembeddable());
  }));

  router.get('/references/pending', route(async (req, res) => {
    const targetKey = req.query.targetKey;
    if (typeof targetKey !== 'string') {
      throw new BadRequestError('Query parameter targetKey is required');
    }
    res.json(await store.getPendingReferences(targetKey));
  }));

  // Error mapping
  router.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof ConflictError) {
      res.status(409).json({ message: err.message, entityId: err.entityId });
      return;
    }
    if (err instanceof BadRequestError) {
      res.status(400).json({ message: err.message });
      return;
    }
    logger.error({ error: err, method: req.method, url: req.url }, 'Graph store request failed');
    next(err);
  });

  return router;
}
