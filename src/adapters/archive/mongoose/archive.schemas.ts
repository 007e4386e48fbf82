import { Schema } from 'mongoose';
import { CanonicalStatus } from '../../../core';

const statusValues = Object.values(CanonicalStatus);

export const eventArchiveSchema = new Schema(
  {
    key: { type: String, required: true, unique: true },
    shipmentId: { type: String, required: true, index: true },
    eventId: { type: String, required: true },
    source: { type: String, required: true },
    occurrenceCode: { type: String, default: null },
    canonicalStatus: { type: String, enum: statusValues, required: true },
    occurredAt: { type: Date, required: true },
    receivedAt: { type: Date, required: true },
    raw: { type: Schema.Types.Mixed, default: null },
  },
  { timestamps: true },
);

eventArchiveSchema.index({ shipmentId: 1, occurredAt: 1 });

export const statusHistorySchema = new Schema(
  {
    key: { type: String, required: true, unique: true },
    shipmentId: { type: String, required: true, index: true },
    eventId: { type: String, default: null },
    fromStatus: { type: String, enum: statusValues, required: true },
    toStatus: { type: String, enum: statusValues, required: true },
    statusVersion: { type: Number, required: true },
    transitionedAt: { type: Date, required: true },
  },
  { timestamps: true },
);

statusHistorySchema.index({ shipmentId: 1, statusVersion: 1 });

export const EVENT_ARCHIVE_COLLECTION = 'tracking_events_archive';
export const STATUS_HISTORY_COLLECTION = 'shipment_status_history';
