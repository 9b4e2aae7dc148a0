import { Queue, QueueEvents } from 'bullmq';
import { z } from 'zod';
import { CONFIG } from '../config';
import type { FetchResult } from '../types';
import type { RowSet } from '../types/rows.types';
import { errorMessage } from '../utils/log';
import { ListingExtractorService } from './listing-extractor.service';
import type { WriteStats } from './row-storage.service';

const FetchResultSchema = z.object({
  jobId: z.string().optional(),
  url: z.string().min(1),
  html: z.string().default(''),
  markdown: z.string().optional(),
  statusCode: z.number().int().optional(),
  headers: z.record(z.string()).optional(),
  fetchedAt: z.union([z.string(), z.date()]).default(() => new Date()),
});

export interface RowSink {
  saveRowSet(rows: RowSet): Promise<WriteStats>;
}

/**
 * Validate a completed job's return value. BullMQ may hand it over as a
 * JSON string or as the parsed object.
 */
export function parseFetchResult(returnvalue: unknown, jobId: string): FetchResult | null {
  let value = returnvalue;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch (error) {
      console.warn(`⚠️  Job ${jobId} return value is not JSON: ${errorMessage(error)}`);
      return null;
    }
  }

  const parsed = FetchResultSchema.safeParse(value);
  if (!parsed.success) {
    console.warn(`⚠️  Job ${jobId} return value is not a fetch result: ${parsed.error.issues[0]?.message}`);
    return null;
  }
  return { ...parsed.data, jobId: parsed.data.jobId ?? jobId };
}

/**
 * Run one fetch result through the pipeline and persist the rows
 */
export async function processFetchResult(
  result: FetchResult,
  extractor: ListingExtractorService,
  sink: RowSink
): Promise<WriteStats> {
  const extraction = extractor.extract({
    sourceUrl: result.url,
    html: result.html,
    renderedText: result.markdown,
  });
  const { metadata, rows } = extraction;

  if (metadata.blocked) {
    console.warn(`⚠️  Job ${result.jobId} looks like a blocked page, storing source fields only`);
  } else {
    console.log(
      `✅ Extracted ${metadata.sourceId} listing from job ${result.jobId} using ${metadata.strategiesUsed.join(', ') || 'no'} strategies`
    );
  }
  if (metadata.errors) {
    console.error(`[queue] Extraction errors for job ${result.jobId}:`, metadata.errors);
  }

  const stats = await sink.saveRowSet(rows);
  console.log(
    `✅ Rows stored for job ${result.jobId}: ${stats.upserted} upserted, ${stats.modified} updated, ${stats.inserted} inserted, ${stats.deleted} replaced`
  );
  return stats;
}

export class QueueListenerService {
  private queue: Queue;
  private queueEvents: QueueEvents;
  private extractor: ListingExtractorService;

  constructor(
    private readonly storage: RowSink,
    extractor?: ListingExtractorService
  ) {
    this.extractor = extractor || new ListingExtractorService(CONFIG.extraction);

    const connection = { host: CONFIG.redis.host, port: CONFIG.redis.port };
    this.queue = new Queue(CONFIG.queue.name, { connection });
    this.queueEvents = new QueueEvents(CONFIG.queue.name, { connection });
  }

  async start(): Promise<void> {
    console.log(`Queue listener started for: ${CONFIG.queue.name}`);

    this.queueEvents.on('completed', ({ jobId, returnvalue }) => {
      void this.handleCompleted(jobId, returnvalue);
    });

    this.queueEvents.on('failed', ({ jobId, failedReason }) => {
      void this.handleFailed(jobId, failedReason);
    });

    this.queueEvents.on('error', (error) => {
      console.error('Queue events error:', error);
    });
  }

  private async handleCompleted(jobId: string, returnvalue: unknown): Promise<void> {
    try {
      console.log(`Job ${jobId} completed, extracting listing...`);

      const result = parseFetchResult(returnvalue, jobId);
      if (!result) return;

      if (!this.extractor.isSupportedSite(result.url)) {
        console.log(`[queue] No dedicated grammar for ${result.url}, using generic extraction`);
      }

      await processFetchResult(result, this.extractor, this.storage);

      // Clean up the job from Redis after successful processing
      await this.removeJob(jobId);
    } catch (error) {
      console.error(`❌ Failed to extract/store listing for job ${jobId}:`, error);
    }
  }

  private async handleFailed(jobId: string, failedReason: string): Promise<void> {
    try {
      console.log(`Job ${jobId} failed: ${failedReason}`);
      await this.removeJob(jobId);
    } catch (error) {
      console.error(`Failed to clean up failed job ${jobId}:`, error);
    }
  }

  private async removeJob(jobId: string): Promise<void> {
    const job = await this.queue.getJob(jobId);
    if (job) {
      await job.remove();
      console.log(`Job ${jobId} removed from queue`);
    }
  }

  async close(): Promise<void> {
    await this.queueEvents.close();
    await this.queue.close();
    console.log('Queue listener closed');
  }

  async getQueueStats(): Promise<void> {
    const [waiting, active, completed, failed] = await Promise.all([
      this.queue.getWaitingCount(),
      this.queue.getActiveCount(),
      this.queue.getCompletedCount(),
      this.queue.getFailedCount(),
    ]);

    console.log('Queue Stats:', { waiting, active, completed, failed });
  }
}
