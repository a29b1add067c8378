/**
 * Connection Pooling Example
 *
 * Shares one ConnectionPool between several opens so that requests to the
 * same host reuse a keep-alive connection, and reports reuse from metrics.
 */

import { pathToFileURL } from 'url';
import { ConnectionPool, MetricsCollector, Resource } from '../src';

/**
 * Example 1: Several resources on one connection
 */
async function sharedPoolExample(): Promise<void> {
  console.log('=== Shared Pool Example ===\n');

  const connections = new ConnectionPool();
  const metrics = new MetricsCollector();
  connections.on('added', (key: string) => console.log(`  + ${key}`));
  connections.on('removed', (key: string) => console.log(`  - ${key}`));

  try {
    for (const page of ['/', '/about', '/contact']) {
      const resource = new Resource(`http://example.com${page}`);
      const length = await resource.open({ connections, metrics }, async (opened) => {
        return (await opened.read()).length;
      });
      console.log(`${page}: ${length} bytes`);
    }
  } finally {
    // Pooled connections stay open until the pool is closed.
    console.log(`Closed ${connections.closeAll()} connection(s)`);
  }

  const stats = metrics.getStats();
  console.log(`Reuse rate: ${(stats.reuseRate * 100).toFixed(1)}%`);
  console.log(`Average open: ${stats.avgOpenLatencyMs.toFixed(1)}ms`);
}

async function main(): Promise<void> {
  await sharedPoolExample();
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    console.error('Example failed:', error);
    process.exitCode = 1;
  });
}

export { sharedPoolExample };
