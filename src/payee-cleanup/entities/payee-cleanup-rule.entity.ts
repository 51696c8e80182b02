import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  OneToMany,
} from 'typeorm';
import { PayeeRuleApplication } from './payee-rule-application.entity';

export enum PatternType {
  EXACT = 'EXACT',
  CONTAINS = 'CONTAINS',
  STARTS_WITH = 'STARTS_WITH',
  REGEX = 'REGEX',
}

export enum RuleGenerator {
  LLM = 'LLM',
  HUMAN = 'HUMAN',
}

export enum RuleStatus {
  PENDING = 'PENDING',
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
}

@Entity('payee_cleanup_rules')
@Index('idx_payee_cleanup_rules_status', ['status'])
export class PayeeCleanupRule {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  pattern!: string;

  @Column({ type: 'varchar', length: 20 })
  pattern_type!: PatternType;

  @Column({ type: 'varchar', length: 255 })
  replacement!: string;

  @Column({ type: 'double' })
  confidence!: number;

  @Column({ type: 'varchar', length: 20 })
  generated_by!: RuleGenerator;

  @Column({ type: 'varchar', length: 20 })
  status!: RuleStatus;

  @Column({ type: 'int', default: 0 })
  usage_count!: number;

  @Column({ type: 'double', default: 1.0 })
  success_rate!: number;

  @OneToMany(() => PayeeRuleApplication, (application) => application.rule)
  applications?: PayeeRuleApplication[];

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;
}
