import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  VersionColumn,
} from 'typeorm';
import { CanonicalStatus, ScalarValue } from '../../../../core';

/**
 * TypeORM entity for Shipment
 */
@Entity('shipments')
@Index(['trackingCode'], { unique: true })
@Index(['invoiceNumber', 'document'])
@Index(['currentStatus'])
export class ShipmentEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tracking_code', type: 'varchar' })
  trackingCode!: string;

  @Column({ type: 'varchar' })
  carrier!: string;

  @Column({
    name: 'current_status',
    type: 'enum',
    enum: CanonicalStatus,
    default: CanonicalStatus.CREATED,
  })
  currentStatus!: CanonicalStatus;

  /**
   * Bumped by every applied transition; compare-and-set target
   */
  @Column({ name: 'current_status_version', type: 'int', default: 0 })
  currentStatusVersion!: number;

  @Column({ name: 'last_event_id', type: 'uuid', nullable: true })
  lastEventId!: string | null;

  @Column({ name: 'invoice_number', type: 'varchar', nullable: true })
  invoiceNumber!: string | null;

  @Column({ type: 'varchar', nullable: true })
  document!: string | null;

  @Column({ type: 'jsonb', default: {} })
  attributes!: Record<string, ScalarValue>;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @VersionColumn({ name: 'version' })
  version!: number;
}
