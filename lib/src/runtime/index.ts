/**
 * Compliance Runtime
 *
 * Composition root: turns a `ComplianceConfig` into the shared clients and
 * the orchestrator. Built once per process and reused across requests.
 */

import { type ComplianceConfig, loadComplianceConfig, resolveLLMModel } from '../config/index.js';
import { type EmbeddingService } from '../embeddings/types.js';
import { BgeEmbedder } from '../embeddings/bge-embedder.js';
import { type LanguageModelService } from '../llm/types.js';
import { createLanguageModel } from '../llm/factory.js';
import { type QdrantSearchClient, checkClusterHealth, createQdrantClient } from '../qdrant/client.js';
import { QdrantVectorIndex } from '../qdrant/vector-index.js';
import { type ClusterHealthResult } from '../qdrant/types.js';
import { WorkflowOrchestrator } from '../pipeline/orchestrator.js';
import { Logger } from '../logging/index.js';

export interface ComplianceRuntime {
  readonly config: ComplianceConfig;
  readonly logger: Logger;
  readonly embedder: EmbeddingService;
  readonly vectorIndex: QdrantVectorIndex;
  readonly llm: LanguageModelService;
  readonly orchestrator: WorkflowOrchestrator;
  checkVectorIndex(): Promise<ClusterHealthResult>;
}

/**
 * Pre-built collaborators, mainly for tests
 */
export interface ComplianceRuntimeOverrides {
  logger?: Logger;
  embedder?: EmbeddingService;
  qdrantClient?: QdrantSearchClient;
  llm?: LanguageModelService;
}

export function createComplianceRuntime(
  config: ComplianceConfig,
  overrides: ComplianceRuntimeOverrides = {}
): ComplianceRuntime {
  const logger =
    overrides.logger ??
    new Logger({
      level: config.logging.level,
      format: config.logging.format,
      source: 'compliance',
    });

  const embedder =
    overrides.embedder ??
    new BgeEmbedder(
      {
        model: config.embedding.model,
        dimensions: config.embedding.dimensions,
        localModelPath: config.embedding.localModelPath,
        allowRemoteModels: config.embedding.allowRemoteModels,
        cacheDir: config.embedding.cacheDir,
      },
      { logger: logger.child('BgeEmbedder') }
    );

  const qdrantClient = overrides.qdrantClient ?? createQdrantClient(config.qdrant);
  const vectorIndex = new QdrantVectorIndex(
    qdrantClient,
    {
      collectionName: config.qdrant.collectionName,
      vectorDimensions: config.embedding.dimensions,
    },
    { logger: logger.child('QdrantVectorIndex') }
  );

  const llm =
    overrides.llm ??
    createLanguageModel(
      config.llm.provider === 'anthropic'
        ? {
            provider: 'anthropic',
            model: resolveLLMModel(config),
            apiKey: config.llm.anthropicApiKey,
            timeoutMs: config.llm.timeoutMs,
          }
        : {
            provider: 'llama-cpp',
            baseUrl: config.llm.url,
            model: resolveLLMModel(config),
            timeoutMs: config.llm.timeoutMs,
          },
      {
        logger,
        retry: { maxRetries: config.llm.maxRetries },
      }
    );

  const orchestrator = new WorkflowOrchestrator(
    { embedder, vectorIndex, llm, logger: logger.child('WorkflowOrchestrator') },
    { topK: config.pipeline.topK, timeoutMs: config.pipeline.timeoutMs }
  );

  return {
    config,
    logger,
    embedder,
    vectorIndex,
    llm,
    orchestrator,
    checkVectorIndex: () => checkClusterHealth(qdrantClient),
  };
}

// =============================================================================
// Global Instance
// =============================================================================

let globalRuntime: ComplianceRuntime | null = null;

/**
 * Runtime built from `process.env` on first use
 *
 * @throws {ConfigError} when the environment does not validate
 */
export function getGlobalRuntime(): ComplianceRuntime {
  if (!globalRuntime) {
    globalRuntime = createComplianceRuntime(loadComplianceConfig());
  }
  return globalRuntime;
}
