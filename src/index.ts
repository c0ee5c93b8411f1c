#!/usr/bin/env node
import { TaskTrackerApp } from './core/app.js';
import { loadConfig } from './core/config.js';

/**
 * API Server entry point
 */
async function main(): Promise<void> {
  const result = loadConfig(process.env);
  if (!result.success) {
    console.error(result.error);
    process.exit(1);
  }

  const { config } = result;
  console.log(`Stats cache TTL: ${config.statsCacheTtlSeconds}s, bulk limit: ${config.bulkCreateLimit}`);
  if (config.rateLimitMax > 0) {
    console.log(`Rate limit: ${config.rateLimitMax} requests per ${config.rateLimitWindowMs}ms`);
  }

  const app = new TaskTrackerApp(config);
  app.installShutdownHandlers();
  await app.start();
}

// Start the API server
main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
