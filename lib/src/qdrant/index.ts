/**
 * Qdrant Module
 */

export {
  QdrantConfigSchema,
  type QdrantConfig,
  DEFAULT_QDRANT_HOST,
  DEFAULT_QDRANT_PORT,
  resolveQdrantUrl,
} from './config.js';

export {
  type QdrantSearchClient,
  createQdrantClient,
  checkClusterHealth,
} from './client.js';

export {
  type VectorHit,
  type VectorIndex,
  VectorStoreErrorCode,
  VectorStoreError,
  isVectorStoreError,
  classifyVectorStoreError,
  VectorIndexConfigSchema,
  type VectorIndexConfig,
  type ClusterHealthResult,
} from './types.js';

export {
  QdrantVectorIndex,
  type QdrantVectorIndexDependencies,
} from './vector-index.js';
