import {
  PayeeCleanupRule,
  RuleStatus,
} from '../entities/payee-cleanup-rule.entity';
import {
  FeedbackStatus,
  PayeeRuleApplication,
} from '../entities/payee-rule-application.entity';
import { ReviewDecision } from '../entities/payee-rule-review.entity';

export interface NewRuleApplication {
  rule_id: string | null;
  transaction_id: string;
  original_payee: string;
  cleaned_payee: string;
  applied_at: Date;
}

export interface RecordedApplication {
  application: PayeeRuleApplication;
  /** false면 같은 거래·규칙 쌍의 기존 기록이다 */
  created: boolean;
}

export interface RuleReview {
  decision: ReviewDecision;
  changes?: Partial<
    Pick<PayeeCleanupRule, 'pattern' | 'pattern_type' | 'replacement'>
  >;
  reason?: string;
}

export interface RuleCounterUpdate {
  usageDelta: number;
  successRate: number;
  /** 피드백이 없는 가장 최근 적용 기록에 남길 결과 */
  feedback?: FeedbackStatus;
}

/**
 * 규칙 카탈로그 저장소
 * 모든 연산은 규칙 단위로 원자적이다 (검토는 PENDING 기준 CAS, 카운터는 잠금 하의 read-modify-write)
 */
export abstract class PayeeRuleStore {
  /** 새 규칙을 삽입합니다 (같은 id가 있으면 덮어쓰지 않고 실패) */
  abstract save(rule: PayeeCleanupRule): Promise<PayeeCleanupRule>;

  abstract findById(id: string): Promise<PayeeCleanupRule | null>;

  /** 상태별 규칙을 최신 생성순으로 조회합니다 */
  abstract findByStatus(status: RuleStatus): Promise<PayeeCleanupRule[]>;

  /**
   * PENDING 규칙을 APPROVED 또는 REJECTED로 전환하고 검토 기록을 남깁니다
   * @throws PayeeRuleNotFoundException 존재하지 않는 규칙
   * @throws PayeeRuleStateException 이미 검토된 규칙
   */
  abstract reviewPendingRule(
    id: string,
    review: RuleReview,
  ): Promise<PayeeCleanupRule>;

  /**
   * 규칙 적용 기록을 저장하고, 규칙이 있으면 같은 트랜잭션에서 usage_count를 1 올립니다
   * 같은 거래·규칙 쌍이 이미 있으면 기존 기록을 반환하고 카운터는 그대로 둡니다
   */
  abstract recordApplication(
    application: NewRuleApplication,
  ): Promise<RecordedApplication>;

  /**
   * 규칙을 배타적으로 잠근 상태에서 현재 카운터에 `update`를 적용합니다
   * @throws PayeeRuleNotFoundException 존재하지 않는 규칙
   */
  abstract updateRuleCounters(
    id: string,
    update: (rule: PayeeCleanupRule) => RuleCounterUpdate,
  ): Promise<PayeeCleanupRule>;
}
