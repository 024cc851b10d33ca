/**
 * Qdrant Connection Configuration
 */

import { z } from 'zod';

export const QdrantConfigSchema = z.object({
  /** Cluster URL, e.g. `http://localhost:6333` or a Qdrant Cloud endpoint */
  url: z.string().url(),

  /** Required by Qdrant Cloud, unset for a local instance */
  apiKey: z.string().min(1).optional(),

  collectionName: z.string().min(1).default('compliance_kb'),

  /** Request timeout in milliseconds */
  timeout: z.number().int().positive().default(30000),
});

export type QdrantConfig = z.infer<typeof QdrantConfigSchema>;

export const DEFAULT_QDRANT_HOST = 'localhost';
export const DEFAULT_QDRANT_PORT = 6333;

/**
 * `QDRANT_URL` when set, otherwise `http://{QDRANT_HOST}:{QDRANT_PORT}`
 */
export function resolveQdrantUrl(env: NodeJS.ProcessEnv = process.env): string {
  const url = env['QDRANT_URL']?.trim();
  if (url) {
    return url;
  }

  const host = env['QDRANT_HOST']?.trim() || DEFAULT_QDRANT_HOST;
  const port = env['QDRANT_PORT']?.trim() || String(DEFAULT_QDRANT_PORT);
  return `http://${host}:${port}`;
}
