/**
 * Compliance Query Endpoint Logic
 *
 * POST /compliance-query
 * Request: { user_query: string, user_id: string, trace_id?: string }
 * Response: { answer: string, citations: Record<string, WireCitation> | { error: string }, trace_id: string }
 */

import { z } from 'zod';

import { type ComplianceRuntime } from '../runtime/index.js';
import { isConfigError } from '../config/index.js';
import { getGlobalLogger } from '../logging/index.js';
import { generateTraceId } from '../pipeline/state.js';
import { type PipelineCitations, isErrorCitations } from '../pipeline/types.js';
import {
  type ErrorResponse,
  type HttpRequest,
  type HttpResponse,
  type ValidationError,
  createErrorResponse,
} from './types.js';

// =============================================================================
// Request Schema
// =============================================================================

export const MAX_QUERY_LENGTH = 4000;

export const ComplianceQueryRequestSchema = z.object({
  user_query: z
    .string({
      required_error: 'user_query is required',
      invalid_type_error: 'user_query must be a string',
    })
    .max(MAX_QUERY_LENGTH, `user_query cannot exceed ${MAX_QUERY_LENGTH} characters`)
    .refine((value) => value.trim().length > 0, 'user_query cannot be empty or whitespace only'),
  user_id: z
    .string({
      required_error: 'user_id is required',
      invalid_type_error: 'user_id must be a string',
    })
    .min(1, 'user_id cannot be empty'),
  trace_id: z.string().min(1).max(200).optional(),
});

export type ComplianceQueryRequest = z.infer<typeof ComplianceQueryRequestSchema>;

// =============================================================================
// Wire Format
// =============================================================================

export interface WireCitation {
  document_id: string;
  section_number: string;
  effective_date: string;
  jurisdiction: string;
  relevance_score: number;
  snippet: string;
}

export type WireCitations = Record<string, WireCitation> | { error: string };

export interface ComplianceQueryResponse {
  answer: string;
  citations: WireCitations;
  trace_id: string;
}

export function toWireCitations(citations: PipelineCitations): WireCitations {
  if (isErrorCitations(citations)) {
    return { error: citations.error };
  }

  const wire: Record<string, WireCitation> = {};
  for (const [key, citation] of Object.entries(citations)) {
    wire[key] = {
      document_id: citation.documentId,
      section_number: citation.sectionNumber,
      effective_date: citation.effectiveDate,
      jurisdiction: citation.jurisdiction,
      relevance_score: citation.relevanceScore,
      snippet: citation.snippet,
    };
  }
  return wire;
}

// =============================================================================
// Validation
// =============================================================================

export type RequestValidationResult =
  | { success: true; data: ComplianceQueryRequest }
  | { success: false; errors: ValidationError[] };

export function validateComplianceRequest(body: unknown): RequestValidationResult {
  if (body === undefined || body === null) {
    return {
      success: false,
      errors: [{ field: 'body', message: 'Request body is required', code: 'invalid_body' }],
    };
  }

  if (typeof body !== 'object' || Array.isArray(body)) {
    return {
      success: false,
      errors: [{ field: 'body', message: 'Request body must be a JSON object', code: 'invalid_body' }],
    };
  }

  const result = ComplianceQueryRequestSchema.safeParse(body);
  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((issue) => ({
      field: issue.path.join('.') || 'body',
      message: issue.message,
      code: `validation_${issue.code}`,
    })),
  };
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Validate, run the pipeline and format the response. Pipeline failures are
 * answered with 200 and error-shaped citations; only an unusable request or
 * an unbuildable runtime produce an error status.
 */
export async function handleComplianceQuery(
  request: HttpRequest,
  getRuntime: () => ComplianceRuntime
): Promise<HttpResponse<ComplianceQueryResponse | ErrorResponse>> {
  if (request.method !== 'POST') {
    return createErrorResponse(405, 'Method not allowed', 'METHOD_NOT_ALLOWED');
  }

  const validation = validateComplianceRequest(request.body);
  if (!validation.success) {
    const primary = validation.errors[0];
    return createErrorResponse(400, primary?.message ?? 'Invalid request', 'VALIDATION_ERROR', {
      validationErrors: validation.errors,
    });
  }

  const { user_query: query, user_id: userId } = validation.data;
  const traceId = validation.data.trace_id ?? generateTraceId();

  let runtime: ComplianceRuntime;
  try {
    runtime = getRuntime();
  } catch (error) {
    getGlobalLogger().error(
      'Runtime initialization failed',
      error instanceof Error ? error : new Error(String(error)),
      { traceId }
    );
    const code = isConfigError(error) ? 'CONFIGURATION_ERROR' : 'INTERNAL_ERROR';
    return createErrorResponse(500, 'Service is not configured correctly', code, { requestId: traceId });
  }

  const logger = runtime.logger.child('compliance-query').withContext({ traceId, userId });
  logger.info('Compliance query received', { queryLength: query.length });

  const result = await runtime.orchestrator.invoke(query, userId, traceId);

  return {
    status: 200,
    body: {
      answer: result.answer,
      citations: toWireCitations(result.citations),
      trace_id: traceId,
    },
  };
}
