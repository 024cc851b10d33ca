/**
 * HTTP Boundary Types
 *
 * Framework-neutral request and response shapes. The serverless handlers in
 * `api/` translate these to and from `VercelRequest`/`VercelResponse`.
 */

export const SERVICE_NAME = 'compliance-query-pipeline';
export const SERVICE_VERSION = '1.0.0';

export interface HttpRequest {
  method: string | undefined;
  body: unknown;
}

export interface HttpResponse<T = unknown> {
  status: number;
  body: T;
}

/**
 * Field-level validation failure
 */
export interface ValidationError {
  /** Dot path of the offending field, `body` for the whole payload */
  field: string;
  message: string;
  code: string;
}

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    requestId?: string;
    validationErrors?: ValidationError[];
  };
}

export function createErrorResponse(
  status: number,
  message: string,
  code: string,
  options?: { requestId?: string; validationErrors?: ValidationError[] }
): HttpResponse<ErrorResponse> {
  return {
    status,
    body: {
      error: {
        message,
        code,
        ...(options?.requestId !== undefined && { requestId: options.requestId }),
        ...(options?.validationErrors !== undefined && { validationErrors: options.validationErrors }),
      },
    },
  };
}

/**
 * CORS origin for a request. `ALLOWED_ORIGINS` is a comma-separated list;
 * `*` admits any origin. Unset admits none.
 */
export function getAllowedOrigin(
  origin: string | undefined,
  allowedOrigins: string | undefined
): string | null {
  if (!allowedOrigins) {
    return null;
  }

  const origins = allowedOrigins.split(',').map((o) => o.trim()).filter(Boolean);

  if (origins.includes('*')) {
    return '*';
  }

  if (origin && origins.includes(origin)) {
    return origin;
  }

  return null;
}

export function corsHeaders(
  origin: string | undefined,
  allowedOrigins: string | undefined,
  methods: string
): Record<string, string> {
  const allowedOrigin = getAllowedOrigin(origin, allowedOrigins);
  if (!allowedOrigin) {
    return {};
  }

  return {
    'Access-Control-Allow-Origin': allowedOrigin,
    'Access-Control-Allow-Methods': methods,
    'Access-Control-Allow-Headers': 'Content-Type',
    ...(allowedOrigin !== '*' && { Vary: 'Origin' }),
  };
}
