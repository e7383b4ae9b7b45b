/**
 * Remote Graph Store - StorageGateway over HTTP/JSON
 *
 * Talks to a store service exposing the routes in http-router.ts.
 * Version conflicts come back as 409 and are raised as ConflictError.
 */
import axios, { AxiosInstance } from 'axios';
import Config from '../config';
import { logger } from '../utils/logger';
import { ConflictError } from '../errors';
import { CanonicalEntity, MergeRecord, PendingReference, RelationshipEdge } from '../types/canonical';
import { StructuralQuery, VectorHit } from '../types/query';
import { CommitResult, CommitUnit, EdgeFilter, StorageGateway, StoreStats } from './gateway';

export interface RemoteGraphStoreOptions {
  baseUrl: string;
  timeoutMs: number;
}

function conflictOf(error: unknown): ConflictError | null {
  if (!axios.isAxiosError(error) || error.response?.status !== 409) return null;
  const body: unknown = error.response.data;
  const entityId = body !== null && typeof body === 'object' && 'entityId' in body && typeof body.entityId === 'string'
    ? body.entityId
    : 'unknown';
  const message = body !== null && typeof body === 'object' && 'message' in body && typeof body.message === 'string'
    ? body.message
    : `Version conflict on ${entityId}`;
  return new ConflictError(message, entityId);
}

export class RemoteGraphStore implements StorageGateway {
  private readonly http: AxiosInstance;

  constructor(options: Partial<RemoteGraphStoreOptions> = {}, client?: AxiosInstance) {
    this.http = client ?? axios.create({
      baseURL: options.baseUrl ?? Config.storage.remoteUrl,
      timeout: options.timeoutMs ?? Config.storage.remoteTimeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async init(): Promise<void> {
    const stats = await this.stats();
    logger.info({ baseUrl: this.http.defaults.baseURL, ...stats }, 'Connected to remote graph store');
  }

  async close(): Promise<void> {
    logger.debug('Remote graph store closed');
  }

  async getEntity(entityId: string): Promise<CanonicalEntity | null> {
    try {
      const response = await this.http.get<CanonicalEntity>(`/entities/${encodeURIComponent(entityId)}`);
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) return null;
      throw error;
    }
  }

  async getEntities(entityIds: string[]): Promise<CanonicalEntity[]> {
    if (entityIds.length === 0) return [];
    const response = await this.http.post<CanonicalEntity[]>('/entities/batch-get', { ids: entityIds });
    return response.data;
  }

  async findByFingerprint(fingerprint: string): Promise<CanonicalEntity[]> {
    const response = await this.http.get<CanonicalEntity[]>(`/fingerprints/${encodeURIComponent(fingerprint)}`);
    return response.data;
  }

  async findByProvenance(key: string): Promise<CanonicalEntity[]> {
    const response = await this.http.get<CanonicalEntity[]>('/provenance', { params: { key } });
    return response.data;
  }

  async query(query: StructuralQuery): Promise<CanonicalEntity[]> {
    const response = await this.http.post<CanonicalEntity[]>('/query', query);
    return response.data;
  }

  async upsertEntity(entity: CanonicalEntity, expectedVersion: number): Promise<number> {
    try {
      const response = await this.http.post<{ version: number }>(
        `/entities/${encodeURIComponent(entity.entityId)}`,
        { entity, expectedVersion }
      );
      return response.data.version;
    } catch (error) {
      throw conflictOf(error) ?? error;
    }
  }

  async upsertEdge(edge: RelationshipEdge): Promise<RelationshipEdge> {
    const response = await this.http.post<RelationshipEdge>('/edges', edge);
    return response.data;
  }

  async getEdges(entityId: string, filter: EdgeFilter = {}): Promise<RelationshipEdge[]> {
    const response = await this.http.get<RelationshipEdge[]>(`/entities/${encodeURIComponent(entityId)}/edges`, {
      params: { relationKind: filter.relationKind, direction: filter.direction },
    });
    return response.data;
  }

  async commitBatch(unit: CommitUnit): Promise<CommitResult> {
    try {
      const response = await this.http.post<CommitResult>('/batches', unit);
      return response.data;
    } catch (error) {
      throw conflictOf(error) ?? error;
    }
  }

  async putVector(entityId: string, embedding: number[]): Promise<string> {
    const response = await this.http.put<{ ref: string }>(`/vectors/${encodeURIComponent(entityId)}`, { embedding });
    return response.data.ref;
  }

  async getVectors(entityIds: string[]): Promise<Record<string, number[]>> {
    if (entityIds.length === 0) return {};
    const response = await this.http.post<Record<string, number[]>>('/vectors/get', { ids: entityIds });
    return response.data;
  }

  async queryVectors(embedding: number[], k: number): Promise<VectorHit[]> {
    const response = await this.http.post<VectorHit[]>('/vectors/query', { embedding, k });
    return response.data;
  }

  async markUnembeddable(entityId: string, reason: string): Promise<void> {
    await this.http.post(`/entities/${encodeURIComponent(entityId)}/unembeddable`, { reason });
  }

  async listUnembeddable(): Promise<string[]> {
    const response = await this.http.get<string[]>('/unembeddable');
    return response.data;
  }

  async getMerges(entityId: string): Promise<MergeRecord[]> {
    const response = await this.http.get<MergeRecord[]>(`/entities/${encodeURIComponent(entityId)}/merges`);
    return response.data;
  }

  async getPendingReferences(targetKey: string): Promise<PendingReference[]> {
    const response = await this.http.get<PendingReference[]>('/references/pending', { params: { targetKey } });
    return response.data;
  }

  async stats(): Promise<StoreStats> {
    const response = await this.http.get<StoreStats>('/stats');
    return response.data;
  }
}
