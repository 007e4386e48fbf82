import { Connection, createConnection } from 'mongoose';
import {
  ArchiveAdapter,
  ArchiveRecord,
  archiveRecordKey,
} from '../../../core';
import {
  EVENT_ARCHIVE_COLLECTION,
  STATUS_HISTORY_COLLECTION,
  eventArchiveSchema,
  statusHistorySchema,
} from './archive.schemas';

/**
 * MongoDB archive: a write-only mirror of events and status history
 * Every write is an upsert on the record key, so retried flushes are safe
 */
export class MongooseArchiveAdapter implements ArchiveAdapter {
  private readonly eventArchive;
  private readonly statusHistory;

  constructor(private readonly connection: Connection) {
    this.eventArchive = connection.model(
      'TrackingEventArchive',
      eventArchiveSchema,
      EVENT_ARCHIVE_COLLECTION,
    );
    this.statusHistory = connection.model(
      'ShipmentStatusHistory',
      statusHistorySchema,
      STATUS_HISTORY_COLLECTION,
    );
  }

  /**
   * Open a dedicated connection and wrap it
   */
  static async connect(uri: string): Promise<MongooseArchiveAdapter> {
    const connection = await createConnection(uri).asPromise();
    return new MongooseArchiveAdapter(connection);
  }

  async upsert(record: ArchiveRecord): Promise<void> {
    const key = archiveRecordKey(record);

    switch (record.kind) {
      case 'event':
        await this.eventArchive.updateOne(
          { key },
          {
            $set: {
              key,
              shipmentId: record.shipmentId,
              eventId: record.eventId,
              source: record.source,
              occurrenceCode: record.occurrenceCode,
              canonicalStatus: record.canonicalStatus,
              occurredAt: record.occurredAt,
              receivedAt: record.receivedAt,
              raw: Buffer.isBuffer(record.rawPayload)
                ? record.rawPayload.toString('utf8')
                : record.rawPayload,
            },
          },
          { upsert: true },
        );
        return;
      case 'transition':
        await this.statusHistory.updateOne(
          { key },
          {
            $set: {
              key,
              shipmentId: record.shipmentId,
              eventId: record.eventId,
              fromStatus: record.fromStatus,
              toStatus: record.toStatus,
              statusVersion: record.statusVersion,
              transitionedAt: record.transitionedAt,
            },
          },
          { upsert: true },
        );
        return;
    }
  }

  async isHealthy(): Promise<boolean> {
    // 1 = connected
    return this.connection.readyState === 1;
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
