/**
 * Compliance Query API Endpoint
 *
 * POST /api/compliance-query
 * Request: { user_query: string, user_id: string, trace_id?: string }
 * Response: { answer: string, citations: object, trace_id: string }
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { corsHeaders, getGlobalRuntime, handleComplianceQuery } from '../lib/src/index.js';

export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  const headers = corsHeaders(req.headers.origin, process.env['ALLOWED_ORIGINS'], 'POST, OPTIONS');
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }

  // Preflight
  if (req.method === 'OPTIONS') {
    res.status(204).end();
    return;
  }

  const response = await handleComplianceQuery({ method: req.method, body: req.body }, getGlobalRuntime);
  res.status(response.status).json(response.body);
}
