/**
 * Embeddings Module
 */

export {
  type EmbeddingService,
  EmbeddingModel,
  MODEL_DIMENSIONS,
  DEFAULT_EMBEDDING_MODEL,
  BgeEmbedderConfigSchema,
  type BgeEmbedderConfig,
  EmbeddingErrorCode,
  EmbeddingError,
  isEmbeddingError,
  getModelDimensions,
  vectorMagnitude,
  normalizeVector,
  isNormalized,
} from './types.js';

export {
  VectorCache,
  VectorCacheConfigSchema,
  type VectorCacheConfig,
  type CacheStats,
  createVectorCache,
} from './cache.js';

export {
  BgeEmbedder,
  type BgeEmbedderDependencies,
  getGlobalEmbedder,
  resetGlobalEmbedder,
} from './bge-embedder.js';
