import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Generated,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { CanonicalStatus, JsonObject } from '../../../../core';
import { ShipmentEntity } from './shipment.entity';

/**
 * TypeORM entity for TrackingEvent
 * The unique dedup_key index is what makes ingestion idempotent
 */
@Entity('tracking_events')
@Index(['dedupKey'], { unique: true })
@Index(['shipmentId', 'occurredAt'])
@Index(['needsReview'])
export class TrackingEventEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'shipment_id', type: 'uuid' })
  shipmentId!: string;

  @Column({ name: 'occurrence_code', type: 'varchar', nullable: true })
  occurrenceCode!: string | null;

  @Column({ name: 'canonical_status', type: 'enum', enum: CanonicalStatus })
  canonicalStatus!: CanonicalStatus;

  @Column({ type: 'varchar' })
  source!: string;

  @Column({ name: 'occurred_at', type: 'timestamptz' })
  occurredAt!: Date;

  @Column({ name: 'occurred_at_estimated', type: 'boolean', default: false })
  occurredAtEstimated!: boolean;

  @Column({ name: 'received_at', type: 'timestamptz' })
  receivedAt!: Date;

  @Column({ name: 'dedup_key', type: 'varchar', length: 64 })
  dedupKey!: string;

  @Column({ name: 'needs_review', type: 'boolean', default: false })
  needsReview!: boolean;

  @Column({ name: 'carrier_event_id', type: 'varchar', nullable: true })
  carrierEventId!: string | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', nullable: true })
  location!: string | null;

  @Column({ name: 'raw_payload', type: 'jsonb', default: {} })
  rawPayload!: JsonObject;

  @Column({ type: 'int' })
  @Generated('increment')
  sequence!: number;

  // Relations
  @ManyToOne(() => ShipmentEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'shipment_id' })
  shipment?: ShipmentEntity;
}
