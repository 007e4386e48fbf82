import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';
import {
  AnomalyKind,
  CanonicalStatus,
  StatusAuditKind,
} from '../../../../core';

/**
 * TypeORM entity for StatusAuditEntry (append-only)
 */
@Entity('shipment_status_audit')
@Index(['shipmentId', 'createdAt'])
export class StatusAuditEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'shipment_id', type: 'uuid' })
  shipmentId!: string;

  @Column({ type: 'enum', enum: StatusAuditKind })
  kind!: StatusAuditKind;

  @Column({ name: 'from_status', type: 'enum', enum: CanonicalStatus })
  fromStatus!: CanonicalStatus;

  @Column({ name: 'to_status', type: 'enum', enum: CanonicalStatus })
  toStatus!: CanonicalStatus;

  @Column({ name: 'status_version', type: 'int' })
  statusVersion!: number;

  @Column({ name: 'event_id', type: 'uuid', nullable: true })
  eventId!: string | null;

  @Column({ type: 'enum', enum: AnomalyKind, nullable: true })
  anomaly!: AnomalyKind | null;

  @Column({ type: 'text', nullable: true })
  reason!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
