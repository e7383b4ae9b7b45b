/**
 * Embedding services: an HTTP client for a model server and a
 * deterministic hashing embedder for local use and tests
 */
import axios, { AxiosInstance } from 'axios';
import { createHash } from 'crypto';
import Config from '../config';
import { EmbeddingError, errorMessage } from '../errors';
import { normalizeVector } from './vector-math';

export interface EmbeddingService {
  readonly model: string;
  readonly dimension: number;
  /** Throws EmbeddingError on failure */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface HttpEmbeddingOptions {
  url: string;
  model: string;
  dimension: number;
  timeoutMs: number;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number');
}

/** Accepts `{embedding: [...]}` and the batched `{embeddings: [[...]]}` form */
function extractEmbedding(body: unknown): number[] | null {
  if (body === null || typeof body !== 'object') return null;
  if ('embedding' in body && isNumberArray(body.embedding)) return body.embedding;
  if ('embeddings' in body && Array.isArray(body.embeddings)) {
    const first: unknown = body.embeddings[0];
    if (isNumberArray(first)) return first;
  }
  return null;
}

/**
 * Posts `{model, input}` to the embedding endpoint
 */
export class HttpEmbeddingService implements EmbeddingService {
  readonly model: string;
  readonly dimension: number;
  private readonly url: string;
  private readonly client: AxiosInstance;

  constructor(options: HttpEmbeddingOptions, client?: AxiosInstance) {
    this.url = options.url;
    this.model = options.model;
    this.dimension = options.dimension;
    this.client = client ?? axios.create({ timeout: options.timeoutMs });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    let body: unknown;
    try {
      const response = await this.client.post<unknown>(this.url, { model: this.model, input: text }, { signal });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new EmbeddingError(`Embedding request failed${status ? ` with status ${status}` : ''}: ${error.message}`);
      }
      throw new EmbeddingError(`Embedding request failed: ${errorMessage(error)}`);
    }

    const embedding = extractEmbedding(body);
    if (!embedding) {
      throw new EmbeddingError('Embedding response is missing the embedding');
    }
    if (embedding.length !== this.dimension) {
      throw new EmbeddingError(
        `Embedding has ${embedding.length} dimensions, expected ${this.dimension}`,
        'DIMENSION_MISMATCH'
      );
    }
    return normalizeVector(embedding);
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().normalize('NFC').split(/[^\p{L}\p{N}]+/u).filter(token => token !== '');
}

/**
 * Feature hashing over word tokens. Texts sharing words land close together,
 * which is enough for local search without a model server.
 */
export class HashingEmbeddingService implements EmbeddingService {
  readonly model = 'feature-hashing';

  constructor(readonly dimension: number = Config.semantic.dimension) {}

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      const digest = createHash('sha256').update(token).digest();
      const index = digest.readUInt32BE(0) % this.dimension;
      const sign = (digest[4] & 1) === 0 ? 1 : -1;
      vector[index] += sign;
    }
    return normalizeVector(vector);
  }
}

export function createEmbeddingService(config = Config.semantic): EmbeddingService {
  if (config.provider === 'http') {
    return new HttpEmbeddingService({
      url: config.url,
      model: config.model,
      dimension: config.dimension,
      timeoutMs: config.requestTimeoutMs,
    });
  }
  return new HashingEmbeddingService(config.dimension);
}
