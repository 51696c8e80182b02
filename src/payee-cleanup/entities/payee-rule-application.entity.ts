import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
  Unique,
} from 'typeorm';
import { PayeeCleanupRule } from './payee-cleanup-rule.entity';

export enum FeedbackStatus {
  CORRECT = 'CORRECT',
  INCORRECT = 'INCORRECT',
}

/**
 * 정리 이력 (추가 전용)
 * 규칙 없이 LLM이 직접 정리한 경우 rule_id는 null
 */
@Entity('payee_rule_applications')
@Unique('unique_transaction_rule', ['transaction_id', 'rule_id'])
@Index('idx_payee_rule_applications_transaction', ['transaction_id'])
@Index('idx_payee_rule_applications_rule', ['rule_id'])
export class PayeeRuleApplication {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 36, nullable: true })
  rule_id!: string | null;

  @Column({ type: 'varchar', length: 255 })
  transaction_id!: string;

  @Column({ type: 'varchar', length: 255 })
  original_payee!: string;

  @Column({ type: 'varchar', length: 255 })
  cleaned_payee!: string;

  @Column({ type: 'datetime' })
  applied_at!: Date;

  @Column({ type: 'varchar', length: 20, nullable: true })
  feedback_status!: FeedbackStatus | null;

  @Column({ type: 'datetime', nullable: true })
  feedback_at!: Date | null;

  @ManyToOne(() => PayeeCleanupRule, (rule) => rule.applications, {
    nullable: true,
  })
  @JoinColumn({ name: 'rule_id' })
  rule?: PayeeCleanupRule | null;
}
