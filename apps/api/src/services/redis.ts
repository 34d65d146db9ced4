import Redis from 'ioredis';

const connections = new Set<Redis>();

/**
 * Get Redis connection for BullMQ queues and workers.
 * BullMQ requires maxRetriesPerRequest: null for blocking operations.
 * Creates a NEW connection each time; `closeRedisConnections()` closes them all.
 */
export function getRedisConnection(): Redis {
  const url = process.env.REDIS_URL || 'redis://localhost:6379';

  const connection = new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
    retryStrategy(times) {
      // Exponential backoff with 30s cap - never stop retrying
      return Math.min(times * 1000, 30000);
    }
  });

  connection.on('error', (err: Error & { code?: string }) => {
    if (err.code === 'ECONNREFUSED') {
      console.error('[Redis] Connection refused, will keep retrying');
    } else {
      console.error('[Redis] Connection error:', err);
    }
  });

  connections.add(connection);
  return connection;
}

export async function closeRedisConnections(): Promise<void> {
  const open = [...connections];
  connections.clear();
  await Promise.all(open.map((connection) => connection.quit()));
}
