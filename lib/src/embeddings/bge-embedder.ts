/**
 * BgeEmbedder
 *
 * Query embedder running BGE-M3 locally through transformers.js. BGE models
 * take the [CLS] token as the sentence embedding and need no query prefix.
 *
 * @example
 * ```typescript
 * const embedder = new BgeEmbedder();
 * await embedder.initialize();
 * const vector = await embedder.embed('What are the record retention rules for brokers?');
 * vector.length; // 1024
 * ```
 */

import {
  type BgeEmbedderConfig,
  type EmbeddingService,
  BgeEmbedderConfigSchema,
  EmbeddingError,
  EmbeddingErrorCode,
  isNormalized,
  normalizeVector,
} from './types.js';
import { VectorCache, type CacheStats } from './cache.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

// =============================================================================
// Types for Transformers.js
// =============================================================================

interface PipelineOutput {
  data: ArrayLike<number>;
}

interface FeatureExtractionPipeline {
  (
    text: string,
    options?: { pooling?: 'none' | 'mean' | 'cls'; normalize?: boolean }
  ): Promise<PipelineOutput>;
}

export interface BgeEmbedderDependencies {
  logger?: Logger;
}

// =============================================================================
// BgeEmbedder Class
// =============================================================================

export class BgeEmbedder implements EmbeddingService {
  private readonly config: BgeEmbedderConfig;
  private readonly cache: VectorCache;
  private readonly logger: Logger;
  private pipeline: FeatureExtractionPipeline | null = null;
  private initializePromise: Promise<void> | null = null;

  constructor(config?: Partial<BgeEmbedderConfig>, deps: BgeEmbedderDependencies = {}) {
    this.config = BgeEmbedderConfigSchema.parse(config ?? {});
    this.cache = new VectorCache({
      maxSize: this.config.maxCacheSize,
      ttlMs: this.config.cacheTtlMs,
    });
    this.logger = deps.logger ?? getGlobalLogger().child('BgeEmbedder');
  }

  // ===========================================================================
  // Initialization
  // ===========================================================================

  /**
   * Load the model. Concurrent callers share one load; a failed load can be
   * retried by calling again.
   *
   * @throws {EmbeddingError} MODEL_LOAD_ERROR
   */
  async initialize(): Promise<void> {
    if (this.pipeline) {
      return;
    }

    if (!this.initializePromise) {
      this.initializePromise = this.loadModel();
    }

    try {
      await this.initializePromise;
    } catch (error) {
      this.initializePromise = null;
      throw error;
    }
  }

  private async loadModel(): Promise<void> {
    const startTime = Date.now();
    this.logger.info('Loading embedding model', {
      model: this.config.model,
      ...(this.config.localModelPath !== undefined && { localModelPath: this.config.localModelPath }),
      allowRemoteModels: this.config.allowRemoteModels,
    });

    try {
      // Dynamic import keeps the ONNX runtime out of processes that never embed
      const { pipeline, env } = await import('@huggingface/transformers');

      env.useBrowserCache = false;
      env.allowRemoteModels = this.config.allowRemoteModels;
      env.allowLocalModels = this.config.localModelPath !== undefined;
      if (this.config.localModelPath !== undefined) {
        env.localModelPath = this.config.localModelPath;
      }
      if (this.config.cacheDir !== undefined) {
        env.cacheDir = this.config.cacheDir;
      }

      this.pipeline = (await pipeline('feature-extraction', this.config.model, {
        dtype: this.config.quantized ? 'q8' : 'fp32',
      })) as unknown as FeatureExtractionPipeline;
    } catch (error) {
      throw EmbeddingError.fromError(error, EmbeddingErrorCode.MODEL_LOAD_ERROR, 'Failed to load embedding model');
    }

    this.logger.info('Embedding model loaded', {
      model: this.config.model,
      durationMs: Date.now() - startTime,
    });
  }

  isInitialized(): boolean {
    return this.pipeline !== null;
  }

  // ===========================================================================
  // Embedding
  // ===========================================================================

  /**
   * Embed one query.
   *
   * @throws {EmbeddingError} EMPTY_INPUT, MODEL_NOT_INITIALIZED (when
   * `autoInitialize` is off), COMPUTATION_ERROR or DIMENSION_MISMATCH
   */
  async embed(text: string): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new EmbeddingError('Input text cannot be empty', EmbeddingErrorCode.EMPTY_INPUT);
    }

    if (this.config.enableCache) {
      const cached = this.cache.get(text);
      if (cached) {
        return cached;
      }
    }

    if (!this.pipeline && this.config.autoInitialize) {
      await this.initialize();
    }

    const vector = await this.compute(text);

    if (this.config.enableCache) {
      this.cache.set(text, vector);
    }

    return vector;
  }

  private async compute(text: string): Promise<number[]> {
    if (!this.pipeline) {
      throw new EmbeddingError(
        'BgeEmbedder not initialized. Call initialize() first.',
        EmbeddingErrorCode.MODEL_NOT_INITIALIZED
      );
    }

    let vector: number[];
    try {
      const output = await this.pipeline(text, {
        pooling: 'cls',
        normalize: this.config.normalize,
      });
      vector = Array.from(output.data);
    } catch (error) {
      throw EmbeddingError.fromError(error, EmbeddingErrorCode.COMPUTATION_ERROR, 'Embedding computation failed');
    }

    if (vector.length !== this.config.dimensions) {
      throw new EmbeddingError(
        `Expected ${this.config.dimensions} dimensions from ${this.config.model}, got ${vector.length}`,
        EmbeddingErrorCode.DIMENSION_MISMATCH
      );
    }

    if (this.config.normalize && !isNormalized(vector)) {
      return normalizeVector(vector);
    }

    return vector;
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  getDimensions(): number {
    return this.config.dimensions;
  }

  getModel(): string {
    return this.config.model;
  }

  getConfig(): Readonly<BgeEmbedderConfig> {
    return { ...this.config };
  }

  getCacheStats(): CacheStats {
    return this.cache.getStats();
  }

  clearCache(): void {
    this.cache.clear();
  }
}

// =============================================================================
// Global Instance
// =============================================================================

let globalEmbedder: BgeEmbedder | null = null;

/**
 * Shared embedder for the process. The model is large, so handlers reuse one.
 */
export function getGlobalEmbedder(config?: Partial<BgeEmbedderConfig>): BgeEmbedder {
  if (!globalEmbedder) {
    globalEmbedder = new BgeEmbedder(config);
  }
  return globalEmbedder;
}

export function resetGlobalEmbedder(): void {
  globalEmbedder = null;
}
