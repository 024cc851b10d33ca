/**
 * Qdrant Client
 *
 * Builds the REST client and checks cluster reachability.
 */

import { QdrantClient } from '@qdrant/js-client-rest';

import { type QdrantConfig } from './config.js';
import { type ClusterHealthResult } from './types.js';

/**
 * The client calls the vector index makes. Narrowed so tests can pass a fake.
 */
export type QdrantSearchClient = Pick<QdrantClient, 'search' | 'getCollections' | 'collectionExists'>;

export function createQdrantClient(config: QdrantConfig): QdrantClient {
  return new QdrantClient({
    url: config.url,
    apiKey: config.apiKey,
    timeout: config.timeout,
  });
}

export async function checkClusterHealth(
  client: Pick<QdrantClient, 'getCollections'>
): Promise<ClusterHealthResult> {
  try {
    const response = await client.getCollections();
    return {
      healthy: true,
      collectionsCount: response.collections.length,
    };
  } catch (error) {
    return {
      healthy: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
