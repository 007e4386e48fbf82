import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import {
  AutomationAction,
  CanonicalStatus,
  RuleCondition,
} from '../../../../core';

/**
 * TypeORM entity for AutomationRule
 */
@Entity('automation_rules')
@Index(['enabled'])
export class AutomationRuleEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  name!: string;

  @Column({
    name: 'trigger_statuses',
    type: 'enum',
    enum: CanonicalStatus,
    array: true,
  })
  triggerStatuses!: CanonicalStatus[];

  @Column({ type: 'jsonb', default: [] })
  conditions!: RuleCondition[];

  @Column({ type: 'jsonb', default: [] })
  actions!: AutomationAction[];

  @Column({ type: 'boolean', default: true })
  enabled!: boolean;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
