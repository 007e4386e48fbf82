import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import {
  RejectionReason,
  ReplayStatus,
  ShipmentReference,
} from '../../../../core';

/**
 * TypeORM entity for UnresolvedEvent (replay queue)
 */
@Entity('unresolved_events')
@Index(['status', 'nextAttemptAt'])
export class UnresolvedEventEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  source!: string;

  @Column({ name: 'raw_payload', type: 'jsonb', nullable: true })
  rawPayload!: unknown;

  @Column({ name: 'shipment_ref', type: 'jsonb', nullable: true })
  shipmentRef!: ShipmentReference | null;

  @Column({ type: 'enum', enum: RejectionReason })
  reason!: RejectionReason;

  @Column({ name: 'received_at', type: 'timestamptz' })
  receivedAt!: Date;

  @Column({
    type: 'enum',
    enum: ReplayStatus,
    default: ReplayStatus.PENDING,
  })
  status!: ReplayStatus;

  @Column({ type: 'int', default: 0 })
  attempts!: number;

  @Column({ name: 'next_attempt_at', type: 'timestamptz', nullable: true })
  nextAttemptAt!: Date | null;

  @Column({ name: 'last_error', type: 'text', nullable: true })
  lastError!: string | null;

  @Column({ name: 'resolved_event_id', type: 'uuid', nullable: true })
  resolvedEventId!: string | null;

  @CreateDateColumn({ name: 'first_seen_at', type: 'timestamptz' })
  firstSeenAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
