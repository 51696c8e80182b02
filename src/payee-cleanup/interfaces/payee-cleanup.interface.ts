import {
  PatternType,
  PayeeCleanupRule,
} from '../entities/payee-cleanup-rule.entity';

// LLM에 전달되는 거래 부가 정보 (상대 계좌, 메시지, 금액 등)
export type PayeeCleanupContext = Record<string, string>;

export interface PayeeCleanupOptions {
  /** 적용 기록에 남길 거래 식별자 */
  transactionId?: string;
  signal?: AbortSignal;
}

export interface PayeeCleanupResult {
  original: string;
  cleaned: string;
  confidence: number;
  appliedRule?: PayeeCleanupRule;
  generatedRule?: PayeeCleanupRule;
}

/** LLM이 제안한, 아직 저장되지 않은 규칙 */
export interface RuleDraft {
  pattern: string;
  patternType: PatternType;
  replacement: string;
  confidence: number;
}

export interface RuleModifications {
  pattern?: string;
  patternType?: PatternType;
  replacement?: string;
}

export interface PayeeCleanupBatchItem {
  original: string;
  context?: PayeeCleanupContext;
  transactionId?: string;
}

export type PayeeCleanupBatchResult =
  | { transactionId?: string; ok: true; result: PayeeCleanupResult }
  | { transactionId?: string; ok: false; error: Error };
