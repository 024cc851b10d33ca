/**
 * Health Check API Endpoint
 *
 * GET /api/health
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { createErrorResponse, getGlobalRuntime, handleHealth } from '../lib/src/index.js';

export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  if (req.method !== 'GET') {
    const response = createErrorResponse(405, 'Method not allowed', 'METHOD_NOT_ALLOWED');
    res.status(response.status).json(response.body);
    return;
  }

  const response = await handleHealth(getGlobalRuntime);
  res.status(response.status).json(response.body);
}
