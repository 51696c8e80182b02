import { Injectable, Logger } from '@nestjs/common';
import { ReviewDecision } from '../../payee-cleanup/entities/payee-rule-review.entity';
import { LlmClientError } from '../../llm/llm-client.error';

export interface RuleApplicationLogData {
  ruleId: string;
  patternType: string;
  original: string;
  cleaned: string;
  transactionId: string;
}

export interface LlmCleanupLogData {
  original: string;
  cleaned: string;
  suggestedRuleId?: string;
  transactionId: string;
}

export interface RuleReviewLogData {
  ruleId: string;
  decision: ReviewDecision;
  reason?: string;
}

export interface RuleFeedbackLogData {
  ruleId: string;
  wasSuccessful: boolean;
  usageCount: number;
  successRate: number;
}

export interface CleanupBatchLogData {
  total: number;
  ruleMatched: number;
  llmCleaned: number;
  failed: number;
  processingTimeMs: number;
}

// 성공률 경고 기준
const LOW_SUCCESS_RATE = 0.5;
const MIN_USAGE_FOR_WARNING = 5;

@Injectable()
export class AppLoggerService extends Logger {
  constructor() {
    super('AppLogger');
  }

  /**
   * 규칙 기반 정리 결과 로그 기록
   */
  logRuleApplied(data: RuleApplicationLogData): void {
    this.log(
      `Payee Cleanup - Rule: ${data.ruleId} (${data.patternType}), Original: "${data.original}", Cleaned: "${data.cleaned}", Transaction: ${data.transactionId}`,
    );
  }

  /**
   * LLM 대체 경로 정리 결과 로그 기록
   */
  logLlmCleanup(data: LlmCleanupLogData): void {
    this.log(
      `Payee Cleanup - LLM fallback, Original: "${data.original}", Cleaned: "${data.cleaned}", Suggested Rule: ${data.suggestedRuleId ?? 'none'}, Transaction: ${data.transactionId}`,
    );
  }

  /**
   * 규칙 승인/거절 감사 로그 기록
   */
  logRuleReview(data: RuleReviewLogData): void {
    const message = `Rule Review - ${data.decision} rule ${data.ruleId}`;
    this.log(data.reason ? `${message}, Reason: ${data.reason}` : message);
  }

  /**
   * 규칙 피드백 로그 기록
   */
  logRuleFeedback(data: RuleFeedbackLogData): void {
    const result = data.wasSuccessful ? 'CORRECT' : 'INCORRECT';
    this.log(
      `Rule Feedback - Rule: ${data.ruleId}, Result: ${result}, Usage: ${data.usageCount}, Success Rate: ${data.successRate.toFixed(4)}`,
    );

    // 충분히 사용된 규칙의 성공률이 낮으면 경고
    if (
      data.usageCount >= MIN_USAGE_FOR_WARNING &&
      data.successRate < LOW_SUCCESS_RATE
    ) {
      this.warn(
        `Low success rate: ${(data.successRate * 100).toFixed(2)}% for rule ${data.ruleId}`,
      );
    }
  }

  /**
   * LLM 호출 실패 로그 기록 (재시도 불가 오류는 ERROR 레벨)
   */
  logLlmFailure(original: string, error: LlmClientError): void {
    const message = `LLM Failure - Kind: ${error.kind}, Retryable: ${error.retryable}, Original: "${original}", Message: ${error.message}`;

    if (error.retryable) {
      this.warn(message);
    } else {
      this.error(message, error.stack);
    }
  }

  /**
   * 일괄 정리 결과 로그 기록
   */
  logBatchResult(data: CleanupBatchLogData): void {
    this.log(
      `Payee Cleanup Batch - Total: ${data.total}, Rule Matched: ${data.ruleMatched}, LLM Cleaned: ${data.llmCleaned}, Failed: ${data.failed}, Processing Time: ${data.processingTimeMs}ms`,
    );
  }
}
