/**
 * Health and Service Info
 *
 * GET /health and GET / response bodies.
 */

import { type ComplianceRuntime } from '../runtime/index.js';
import { type ErrorResponse, type HttpResponse, SERVICE_NAME, SERVICE_VERSION, createErrorResponse } from './types.js';

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  service: string;
  version: string;
  llm_provider: string;
  llm_url: string;
  qdrant_url: string;
  vector_index_error?: string;
}

export interface ServiceInfoResponse {
  service: string;
  version: string;
  status: 'operational';
  endpoints: Record<string, string>;
}

/**
 * Reports configuration and whether the vector index answers. The language
 * model is not probed: a scale-to-zero server would be woken by every check.
 */
export async function handleHealth(
  getRuntime: () => ComplianceRuntime
): Promise<HttpResponse<HealthResponse | ErrorResponse>> {
  let runtime: ComplianceRuntime;
  try {
    runtime = getRuntime();
  } catch (error) {
    return createErrorResponse(
      500,
      `Service is not configured correctly: ${error instanceof Error ? error.message : String(error)}`,
      'CONFIGURATION_ERROR'
    );
  }

  const { config } = runtime;
  const vectorIndex = await runtime.checkVectorIndex();

  const body: HealthResponse = {
    status: vectorIndex.healthy ? 'healthy' : 'degraded',
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    llm_provider: config.llm.provider,
    llm_url: config.llm.provider === 'llama-cpp' ? config.llm.url : 'https://api.anthropic.com',
    qdrant_url: config.qdrant.url,
  };

  if (!vectorIndex.healthy) {
    body.vector_index_error = vectorIndex.error ?? 'Unknown error';
    runtime.logger.warn('Vector index health check failed', { error: body.vector_index_error });
  }

  return { status: 200, body };
}

export function getServiceInfo(): ServiceInfoResponse {
  return {
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: 'operational',
    endpoints: {
      health: '/health',
      compliance_query: '/compliance-query (POST)',
    },
  };
}
