import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { CanonicalStatus, InvocationStatus } from '../../../../core';

/**
 * TypeORM entity for AutomationInvocation
 * One row per (shipment, rule, status version); the unique index is the
 * exactly-once guard
 */
@Entity('automation_invocations')
@Index(['shipmentId', 'ruleId', 'statusVersion'], { unique: true })
@Index(['status', 'updatedAt'])
export class AutomationInvocationEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'shipment_id', type: 'uuid' })
  shipmentId!: string;

  @Column({ name: 'rule_id', type: 'uuid' })
  ruleId!: string;

  @Column({ name: 'status_version', type: 'int' })
  statusVersion!: number;

  @Column({ name: 'new_status', type: 'enum', enum: CanonicalStatus })
  newStatus!: CanonicalStatus;

  @Column({ name: 'previous_status', type: 'enum', enum: CanonicalStatus })
  previousStatus!: CanonicalStatus;

  @Column({ name: 'triggering_event_id', type: 'uuid', nullable: true })
  triggeringEventId!: string | null;

  @Column({
    type: 'enum',
    enum: InvocationStatus,
    default: InvocationStatus.CLAIMED,
  })
  status!: InvocationStatus;

  @Column({ type: 'int', default: 1 })
  attempts!: number;

  @Column({ name: 'completed_actions', type: 'jsonb', default: [] })
  completedActions!: number[];

  @Column({ name: 'last_error', type: 'text', nullable: true })
  lastError!: string | null;

  @CreateDateColumn({ name: 'dispatched_at', type: 'timestamptz' })
  dispatchedAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;
}
