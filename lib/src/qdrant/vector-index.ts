/**
 * QdrantVectorIndex
 *
 * `VectorIndex` backed by a Qdrant collection. Search only: ingestion and
 * collection management live with the indexing jobs.
 *
 * @example
 * ```typescript
 * const index = new QdrantVectorIndex(createQdrantClient(config), {
 *   collectionName: 'compliance_kb',
 * });
 * const hits = await index.search(queryVector, 3);
 * for (const hit of hits) {
 *   console.log(hit.payload['document_ID'], hit.score);
 * }
 * ```
 */

import { type QdrantSearchClient, checkClusterHealth } from './client.js';
import {
  type ClusterHealthResult,
  type VectorHit,
  type VectorIndex,
  type VectorIndexConfig,
  VectorIndexConfigSchema,
  VectorStoreError,
  VectorStoreErrorCode,
} from './types.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

export interface QdrantVectorIndexDependencies {
  logger?: Logger;
}

export class QdrantVectorIndex implements VectorIndex {
  private readonly client: QdrantSearchClient;
  private readonly config: VectorIndexConfig;
  private readonly logger: Logger;

  constructor(
    client: QdrantSearchClient,
    config?: Partial<VectorIndexConfig>,
    deps: QdrantVectorIndexDependencies = {}
  ) {
    this.client = client;
    this.config = VectorIndexConfigSchema.parse(config ?? {});
    this.logger = deps.logger ?? getGlobalLogger().child('QdrantVectorIndex');
  }

  /**
   * Top `limit` matches for `vector`, payloads included, vectors omitted.
   *
   * @throws {VectorStoreError}
   */
  async search(vector: number[], limit: number, collection?: string): Promise<VectorHit[]> {
    const collectionName = collection ?? this.config.collectionName;

    if (this.config.vectorDimensions > 0 && vector.length !== this.config.vectorDimensions) {
      throw new VectorStoreError(
        `Vector dimension mismatch: expected ${this.config.vectorDimensions}, got ${vector.length}`,
        VectorStoreErrorCode.DIMENSION_MISMATCH
      );
    }

    const startTime = performance.now();

    try {
      const points = await this.client.search(collectionName, {
        vector,
        limit,
        with_payload: true,
        with_vector: false,
        ...(this.config.scoreThreshold !== undefined && {
          score_threshold: this.config.scoreThreshold,
        }),
      });

      this.logger.debug('Search completed', {
        collection: collectionName,
        limit,
        hits: points.length,
        durationMs: Math.round(performance.now() - startTime),
      });

      return points.map((point) => ({
        id: point.id,
        score: point.score,
        payload: point.payload ?? {},
      }));
    } catch (error) {
      throw VectorStoreError.fromError(error, `Search in '${collectionName}' failed`);
    }
  }

  async collectionExists(collection?: string): Promise<boolean> {
    const collectionName = collection ?? this.config.collectionName;
    try {
      const response = await this.client.collectionExists(collectionName);
      return response.exists;
    } catch (error) {
      throw VectorStoreError.fromError(error, `Existence check for '${collectionName}' failed`);
    }
  }

  checkHealth(): Promise<ClusterHealthResult> {
    return checkClusterHealth(this.client);
  }
}
