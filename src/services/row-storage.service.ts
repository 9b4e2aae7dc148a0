import { MongoClient, type AnyBulkWriteOperation, type Db, type Document } from 'mongodb';
import { CONFIG } from '../config';
import { TABLE_NAMES, type RowSet, type TableName } from '../types/rows.types';

export interface TableWritePlan {
  table: TableName;
  operations: AnyBulkWriteOperation<Document>[];
}

export interface WriteStats {
  upserted: number;
  modified: number;
  inserted: number;
  deleted: number;
}

const CHILD_TABLES = [
  'media',
  'agents',
  'price_history',
  'engagement',
  'financials',
  'community_attributes',
  'similar_properties',
] as const satisfies readonly TableName[];

function upsertOperations<T extends Document>(
  rows: readonly T[],
  key: keyof T & string
): AnyBulkWriteOperation<Document>[] {
  return rows.map((row) => ({
    replaceOne: {
      filter: { [key]: row[key] },
      replacement: { ...row },
      upsert: true,
    },
  }));
}

/**
 * Parent tables are upserted on their identity key. Child tables are
 * replaced per listing_id, so reprocessing a document leaves no stale rows.
 */
export function planTableWrites(rows: RowSet): TableWritePlan[] {
  const listingIds = [...new Set(rows.listings.map((row) => row.listing_id))];

  const plans: TableWritePlan[] = [
    { table: 'listings', operations: upsertOperations(rows.listings, 'listing_id') },
    { table: 'properties', operations: upsertOperations(rows.properties, 'property_id') },
    { table: 'locations', operations: upsertOperations(rows.locations, 'location_id') },
  ];

  for (const table of CHILD_TABLES) {
    const operations: AnyBulkWriteOperation<Document>[] = listingIds.map((listingId) => ({
      deleteMany: { filter: { listing_id: listingId } },
    }));
    for (const row of rows[table]) {
      operations.push({ insertOne: { document: { ...row } } });
    }
    plans.push({ table, operations });
  }

  return plans.filter((plan) => plan.operations.length > 0);
}

/**
 * RowStorageService
 * Persists projected row sets, one MongoDB collection per table
 */
export class RowStorageService {
  private client: MongoClient;
  private db: Db | null = null;

  constructor() {
    this.client = new MongoClient(CONFIG.mongodb.uri);
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.db = this.client.db(CONFIG.mongodb.database);

      await this.createIndexes();

      console.log(`Connected to MongoDB database ${CONFIG.mongodb.database}`);
    } catch (error) {
      console.error('Failed to connect to MongoDB:', error);
      throw error;
    }
  }

  private async createIndexes(): Promise<void> {
    if (!this.db) return;
    const db = this.db;

    try {
      await db.collection('listings').createIndex({ listing_id: 1 }, { unique: true });
      await db.collection('listings').createIndex({ source_id: 1, external_id: 1 });
      await db.collection('listings').createIndex({ scraped_timestamp: -1 });
      await db.collection('properties').createIndex({ property_id: 1 }, { unique: true });
      await db.collection('properties').createIndex({ postal_code: 1 });
      await db.collection('locations').createIndex({ location_id: 1 }, { unique: true });

      for (const table of CHILD_TABLES) {
        await db.collection(table).createIndex({ listing_id: 1 });
      }

      console.log('MongoDB listing indexes created');
    } catch (error) {
      console.error('Failed to create listing indexes:', error);
    }
  }

  /**
   * Write every table of one row set
   */
  async saveRowSet(rows: RowSet): Promise<WriteStats> {
    if (!this.db) {
      throw new Error('MongoDB not connected. Call connect() first.');
    }

    const stats: WriteStats = { upserted: 0, modified: 0, inserted: 0, deleted: 0 };

    for (const plan of planTableWrites(rows)) {
      try {
        const result = await this.db.collection(plan.table).bulkWrite(plan.operations, { ordered: true });
        stats.upserted += result.upsertedCount;
        stats.modified += result.modifiedCount;
        stats.inserted += result.insertedCount;
        stats.deleted += result.deletedCount;
      } catch (error) {
        console.error(`Failed to write ${plan.table} rows:`, error);
        throw error;
      }
    }

    return stats;
  }

  /**
   * Document counts per table
   */
  async getStats(): Promise<Record<string, number> | null> {
    if (!this.db) {
      return null;
    }
    const db = this.db;

    const counts = await Promise.all(
      TABLE_NAMES.map(async (table) => [table, await db.collection(table).countDocuments()] as const)
    );
    return Object.fromEntries(counts);
  }

  async close(): Promise<void> {
    await this.client.close();
    console.log('Row storage connection closed');
  }
}
