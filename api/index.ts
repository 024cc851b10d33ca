/**
 * Service Info API Endpoint
 *
 * GET /api
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { getServiceInfo } from '../lib/src/index.js';

export default function handler(_req: VercelRequest, res: VercelResponse): void {
  res.status(200).json(getServiceInfo());
}
