import { CONFIG } from './config';
import { QueueListenerService } from './services/queue-listener.service';
import { RowStorageService } from './services/row-storage.service';

async function main() {
  console.log('Starting Listing Extraction Service...');
  console.log(`Environment: ${CONFIG.nodeEnv}`);
  console.log(`MongoDB: ${CONFIG.mongodb.database}`);
  console.log(`Redis: ${CONFIG.redis.host}:${CONFIG.redis.port}`);

  const rowStorage = new RowStorageService();
  const queueListener = new QueueListenerService(rowStorage);

  try {
    await rowStorage.connect();

    // Start listening to queue
    await queueListener.start();

    // Print queue stats every 30 seconds
    setInterval(() => {
      void printStats(rowStorage, queueListener);
    }, 30000);

    console.log('Listing Extraction Service is running');
    console.log('✓ Completed fetch jobs will be extracted into listing tables');
  } catch (error) {
    console.error('Fatal error:', error);
    await cleanup(rowStorage, queueListener);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    await cleanup(rowStorage, queueListener);
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
}

async function printStats(rowStorage: RowStorageService, queueListener: QueueListenerService): Promise<void> {
  try {
    await queueListener.getQueueStats();
    const tableStats = await rowStorage.getStats();
    console.log('MongoDB Stats (rows per table):', tableStats);
  } catch (error) {
    console.error('Failed to get stats:', error);
  }
}

async function cleanup(rowStorage: RowStorageService, queueListener: QueueListenerService): Promise<void> {
  try {
    await queueListener.close();
    await rowStorage.close();
    console.log('Cleanup completed');
  } catch (error) {
    console.error('Error during cleanup:', error);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
