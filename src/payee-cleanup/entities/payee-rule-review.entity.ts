import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

export enum ReviewDecision {
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
}

@Entity('payee_rule_reviews')
@Index('idx_payee_rule_reviews_rule', ['rule_id'])
export class PayeeRuleReview {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 36 })
  rule_id!: string;

  @Column({ type: 'varchar', length: 20 })
  decision!: ReviewDecision;

  @Column({ type: 'varchar', length: 500, nullable: true })
  reason!: string | null;

  @CreateDateColumn()
  reviewed_at!: Date;
}
