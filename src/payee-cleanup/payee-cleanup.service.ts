import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import {
  PatternType,
  PayeeCleanupRule,
  RuleGenerator,
  RuleStatus,
} from './entities/payee-cleanup-rule.entity';
import { ReviewDecision } from './entities/payee-rule-review.entity';
import { CreatePayeeRuleDto } from './dto/create-payee-rule.dto';
import { ApprovePayeeRuleDto } from './dto/approve-payee-rule.dto';
import {
  PayeeCleanupBatchItem,
  PayeeCleanupBatchResult,
  PayeeCleanupContext,
  PayeeCleanupOptions,
  PayeeCleanupResult,
  RuleDraft,
  RuleModifications,
} from './interfaces/payee-cleanup.interface';
import {
  PayeeCleanupValidationException,
  PayeeRuleNotFoundException,
  PayeeRuleStateException,
} from './exceptions/payee-cleanup.exceptions';
import {
  assertPatternCompiles,
  MAX_PAYEE_LENGTH,
  validateRuleInput,
} from './payee-rule.validation';
import { PayeeRuleStore, RuleReview } from './store/payee-rule.store';
import { PayeeRuleMatcherService } from './payee-rule-matcher.service';
import { PayeeRuleFeedbackService } from './payee-rule-feedback.service';
import { PayeeCleanupLlmClient } from '../llm/payee-cleanup-llm.client';
import { AppLoggerService } from '../common/logger/app-logger.service';
import { readNumber } from '../common/config/config-values';

const BATCH_CONCURRENCY = 3;

interface RuleProposal {
  pattern: string;
  patternType: PatternType;
  replacement: string;
  confidence: number;
}

/**
 * 거래처명 정리 진입점
 * 승인된 규칙을 먼저 적용하고, 매칭이 없을 때만 LLM으로 정리한 뒤 제안 규칙을 PENDING으로 저장합니다
 */
@Injectable()
export class PayeeCleanupService {
  private readonly logger = new Logger(PayeeCleanupService.name);
  private readonly defaultConfidence: number;

  constructor(
    private readonly ruleStore: PayeeRuleStore,
    private readonly ruleMatcher: PayeeRuleMatcherService,
    private readonly feedbackService: PayeeRuleFeedbackService,
    private readonly llmClient: PayeeCleanupLlmClient,
    private readonly appLogger: AppLoggerService,
    configService: ConfigService,
  ) {
    this.defaultConfidence = clampConfidence(
      readNumber(configService, 'PAYEE_CLEANUP_DEFAULT_CONFIDENCE', 0.5),
      0.5,
    );
  }

  /**
   * 거래처명을 정리합니다
   */
  async cleanupPayee(
    original: string,
    context: PayeeCleanupContext = {},
    options: PayeeCleanupOptions = {},
  ): Promise<PayeeCleanupResult> {
    if (original.trim() === '') {
      throw new PayeeCleanupValidationException([
        'original payee cannot be empty',
      ]);
    }
    if (original.length > MAX_PAYEE_LENGTH) {
      throw new PayeeCleanupValidationException([
        `original payee must be at most ${MAX_PAYEE_LENGTH} characters`,
      ]);
    }

    const transactionId =
      options.transactionId ?? context.transactionId ?? randomUUID();

    const approvedRules = await this.ruleStore.findByStatus(
      RuleStatus.APPROVED,
    );
    const winningRule = this.ruleMatcher.selectWinningRule(
      original,
      approvedRules,
    );

    if (winningRule) {
      return this.applyMatchedRule(original, winningRule, transactionId);
    }

    return this.cleanupWithLlm(
      original,
      context,
      transactionId,
      options.signal,
    );
  }

  /**
   * 여러 거래처명을 일괄 정리합니다 (항목별 실패는 결과에 담아 반환)
   */
  async cleanupPayeesBatch(
    items: PayeeCleanupBatchItem[],
  ): Promise<PayeeCleanupBatchResult[]> {
    if (items.length === 0) {
      return [];
    }

    const startTime = Date.now();
    const results: PayeeCleanupBatchResult[] = [];

    for (let i = 0; i < items.length; i += BATCH_CONCURRENCY) {
      const chunk = items.slice(i, i + BATCH_CONCURRENCY);
      const chunkResults = await Promise.all(
        chunk.map((item) => this.cleanupBatchItem(item)),
      );
      results.push(...chunkResults);
    }

    const ruleMatched = results.filter(
      (r) => r.ok && r.result.appliedRule !== undefined,
    ).length;
    const failed = results.filter((r) => !r.ok).length;

    this.appLogger.logBatchResult({
      total: results.length,
      ruleMatched,
      llmCleaned: results.length - ruleMatched - failed,
      failed,
      processingTimeMs: Date.now() - startTime,
    });

    return results;
  }

  async getPendingRules(): Promise<PayeeCleanupRule[]> {
    return this.ruleStore.findByStatus(RuleStatus.PENDING);
  }

  async getApprovedRules(): Promise<PayeeCleanupRule[]> {
    return this.ruleStore.findByStatus(RuleStatus.APPROVED);
  }

  /**
   * 매칭되는 승인 규칙 전체를 우선순위 순으로 반환합니다 (첫 번째가 적용 대상)
   */
  async findMatchingRules(payeeName: string): Promise<PayeeCleanupRule[]> {
    const approvedRules = await this.ruleStore.findByStatus(
      RuleStatus.APPROVED,
    );
    return this.ruleMatcher.findMatchingRules(payeeName, approvedRules);
  }

  /**
   * 사람이 직접 만든 규칙을 생성합니다 (즉시 승인)
   */
  async createRule(
    pattern: string,
    patternType: PatternType,
    replacement: string,
  ): Promise<PayeeCleanupRule> {
    const dto = await validateRuleInput(CreatePayeeRuleDto, {
      pattern,
      patternType,
      replacement,
    });
    assertPatternCompiles(dto.pattern, dto.patternType);

    const rule = await this.ruleStore.save(
      this.buildRule(
        {
          pattern: dto.pattern,
          patternType: dto.patternType,
          replacement: dto.replacement,
          confidence: 1.0,
        },
        RuleGenerator.HUMAN,
        RuleStatus.APPROVED,
      ),
    );

    this.logger.log(
      `Created rule ${rule.id}: ${rule.pattern_type} "${rule.pattern}" -> "${rule.replacement}"`,
    );
    return rule;
  }

  /**
   * PENDING 규칙을 승인합니다 (검토자 수정 사항 반영)
   */
  async approveRule(
    ruleId: string,
    modifications?: RuleModifications,
  ): Promise<PayeeCleanupRule> {
    const current = await this.ruleStore.findById(ruleId);
    if (!current) {
      throw new PayeeRuleNotFoundException(ruleId);
    }
    if (current.status !== RuleStatus.PENDING) {
      throw new PayeeRuleStateException(ruleId, current.status);
    }

    const changes = await this.validateModifications(current, modifications);
    const rule = await this.ruleStore.reviewPendingRule(ruleId, {
      decision: ReviewDecision.APPROVED,
      changes,
    });

    this.appLogger.logRuleReview({
      ruleId,
      decision: ReviewDecision.APPROVED,
    });
    return rule;
  }

  /**
   * PENDING 규칙을 거절합니다 (사유는 감사용으로만 저장)
   */
  async rejectRule(ruleId: string, reason?: string): Promise<void> {
    const trimmedReason = reason?.trim() || undefined;

    await this.ruleStore.reviewPendingRule(ruleId, {
      decision: ReviewDecision.REJECTED,
      reason: trimmedReason,
    });

    this.appLogger.logRuleReview({
      ruleId,
      decision: ReviewDecision.REJECTED,
      reason: trimmedReason,
    });
  }

  async provideFeedback(
    ruleId: string,
    wasSuccessful: boolean,
  ): Promise<PayeeCleanupRule> {
    return this.feedbackService.provideFeedback(ruleId, wasSuccessful);
  }

  /**
   * LLM 연결 상태를 확인합니다
   */
  async checkLlmHealth(): Promise<void> {
    const outcome = await this.llmClient.healthCheck();
    if (!outcome.ok) {
      this.logger.warn(
        `LLM health check failed (${outcome.error.kind}): ${outcome.error.message}`,
      );
      throw outcome.error;
    }
  }

  private async applyMatchedRule(
    original: string,
    rule: PayeeCleanupRule,
    transactionId: string,
  ): Promise<PayeeCleanupResult> {
    const cleaned = this.ruleMatcher.applyRule(original, rule);

    const { created } = await this.ruleStore.recordApplication({
      rule_id: rule.id,
      transaction_id: transactionId,
      original_payee: original,
      cleaned_payee: cleaned,
      applied_at: new Date(),
    });
    // 재시도된 거래는 기존 기록을 돌려받고 사용 횟수를 다시 세지 않는다
    if (created) {
      rule.usage_count += 1;
    }

    this.appLogger.logRuleApplied({
      ruleId: rule.id,
      patternType: rule.pattern_type,
      original,
      cleaned,
      transactionId,
    });

    return {
      original,
      cleaned,
      confidence: rule.confidence,
      appliedRule: rule,
    };
  }

  private async cleanupWithLlm(
    original: string,
    context: PayeeCleanupContext,
    transactionId: string,
    signal?: AbortSignal,
  ): Promise<PayeeCleanupResult> {
    const outcome = await this.llmClient.cleanupPayee(
      original,
      context,
      signal,
    );

    if (!outcome.ok) {
      this.appLogger.logLlmFailure(original, outcome.error);
      throw outcome.error;
    }

    const { cleaned, candidateRule } = outcome.value;

    // 규칙 저장이 실패하면 적용 기록 없이 호출 전체가 실패한다
    const generatedRule = await this.ruleStore.save(
      this.buildRule(
        await this.proposeRule(original, cleaned, candidateRule),
        RuleGenerator.LLM,
        RuleStatus.PENDING,
      ),
    );

    await this.ruleStore.recordApplication({
      rule_id: null,
      transaction_id: transactionId,
      original_payee: original,
      cleaned_payee: cleaned,
      applied_at: new Date(),
    });

    this.appLogger.logLlmCleanup({
      original,
      cleaned,
      suggestedRuleId: generatedRule.id,
      transactionId,
    });

    return {
      original,
      cleaned,
      confidence: generatedRule.confidence,
      generatedRule,
    };
  }

  /**
   * 저장할 후보 규칙을 결정합니다
   * LLM 제안이 없거나 유효하지 않으면 원문 → 정리 결과의 EXACT 규칙을 제안합니다
   */
  private async proposeRule(
    original: string,
    cleaned: string,
    draft?: RuleDraft,
  ): Promise<RuleProposal> {
    if (draft) {
      try {
        const dto = await validateRuleInput(CreatePayeeRuleDto, {
          pattern: draft.pattern,
          patternType: draft.patternType,
          replacement: draft.replacement,
        });
        assertPatternCompiles(dto.pattern, dto.patternType);

        return {
          pattern: dto.pattern,
          patternType: dto.patternType,
          replacement: dto.replacement,
          confidence: clampConfidence(draft.confidence, this.defaultConfidence),
        };
      } catch (error) {
        if (!(error instanceof PayeeCleanupValidationException)) {
          throw error;
        }
        this.logger.warn(
          `Discarding invalid rule suggestion "${draft.pattern}": ${error.message}`,
        );
      }
    }

    return {
      pattern: original,
      patternType: PatternType.EXACT,
      replacement: cleaned,
      confidence: this.defaultConfidence,
    };
  }

  private async validateModifications(
    current: PayeeCleanupRule,
    modifications?: RuleModifications,
  ): Promise<RuleReview['changes']> {
    const dto = await validateRuleInput(
      ApprovePayeeRuleDto,
      modifications ?? {},
    );

    assertPatternCompiles(
      dto.pattern ?? current.pattern,
      dto.patternType ?? current.pattern_type,
    );

    const changes: RuleReview['changes'] = {};
    if (dto.pattern !== undefined) {
      changes.pattern = dto.pattern;
    }
    if (dto.patternType !== undefined) {
      changes.pattern_type = dto.patternType;
    }
    if (dto.replacement !== undefined) {
      changes.replacement = dto.replacement;
    }
    return changes;
  }

  private buildRule(
    proposal: RuleProposal,
    generatedBy: RuleGenerator,
    status: RuleStatus,
  ): PayeeCleanupRule {
    const now = new Date();
    const rule = new PayeeCleanupRule();
    rule.id = randomUUID();
    rule.pattern = proposal.pattern;
    rule.pattern_type = proposal.patternType;
    rule.replacement = proposal.replacement;
    rule.confidence = proposal.confidence;
    rule.generated_by = generatedBy;
    rule.status = status;
    rule.usage_count = 0;
    rule.success_rate = 1.0;
    rule.created_at = now;
    rule.updated_at = now;
    return rule;
  }

  private async cleanupBatchItem(
    item: PayeeCleanupBatchItem,
  ): Promise<PayeeCleanupBatchResult> {
    try {
      const result = await this.cleanupPayee(item.original, item.context, {
        transactionId: item.transactionId,
      });
      return { transactionId: item.transactionId, ok: true, result };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(
        `Batch cleanup failed for "${item.original}": ${failure.message}`,
      );
      return { transactionId: item.transactionId, ok: false, error: failure };
    }
  }
}

function clampConfidence(value: number, fallback: number): number {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(1, Math.max(0, value));
}
