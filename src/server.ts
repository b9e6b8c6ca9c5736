/**
 * Server Entry Point
 * Connects MongoDB and serves the crawl job API
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { connectDB, disconnectDB } from './lib/mongo';
import { crawlerService } from './modules/crawler/crawler.service';

const startServer = async (): Promise<void> => {
  await connectDB();

  const app = createApp();
  const httpServer = createServer(app);

  httpServer.listen(env.PORT, () => {
    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('🚀 Link Cluster Crawler is running');
    console.log(`🚀 Environment: ${env.NODE_ENV}`);
    console.log(`🚀 Port: ${env.PORT}`);
    console.log(`🚀 API: http://localhost:${env.PORT}/health`);
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('');
  });

  // Graceful shutdown: stop accepting requests, let running crawls finish
  const shutdown = (signal: string): void => {
    console.log(`${signal} signal received: closing HTTP server`);
    httpServer.close(() => {
      console.log('HTTP server closed');
      crawlerService
        .drain()
        .then(() => disconnectDB())
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
