import { Injectable } from '@nestjs/common';
import { PayeeCleanupRule } from './entities/payee-cleanup-rule.entity';
import { FeedbackStatus } from './entities/payee-rule-application.entity';
import { PayeeRuleStore } from './store/payee-rule.store';
import { AppLoggerService } from '../common/logger/app-logger.service';

/**
 * 누적 평균 방식으로 성공률을 갱신합니다
 * newRate = (rate * usage + (성공 ? 1 : 0)) / (usage + 1), 결과는 [0, 1]로 제한
 */
export function nextSuccessRate(
  successRate: number,
  usageCount: number,
  wasSuccessful: boolean,
): number {
  const usage = Math.max(0, usageCount);
  const rate = (successRate * usage + (wasSuccessful ? 1 : 0)) / (usage + 1);
  return Math.min(1, Math.max(0, rate));
}

@Injectable()
export class PayeeRuleFeedbackService {
  constructor(
    private readonly ruleStore: PayeeRuleStore,
    private readonly appLogger: AppLoggerService,
  ) {}

  /**
   * 정리 결과에 대한 사용자 피드백을 규칙 통계에 반영합니다
   */
  async provideFeedback(
    ruleId: string,
    wasSuccessful: boolean,
  ): Promise<PayeeCleanupRule> {
    const rule = await this.ruleStore.updateRuleCounters(ruleId, (current) => ({
      usageDelta: 1,
      successRate: nextSuccessRate(
        current.success_rate,
        current.usage_count,
        wasSuccessful,
      ),
      feedback: wasSuccessful
        ? FeedbackStatus.CORRECT
        : FeedbackStatus.INCORRECT,
    }));

    this.appLogger.logRuleFeedback({
      ruleId,
      wasSuccessful,
      usageCount: rule.usage_count,
      successRate: rule.success_rate,
    });

    return rule;
  }
}
