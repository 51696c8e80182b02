import { Test, TestingModule } from '@nestjs/testing';
import {
  nextSuccessRate,
  PayeeRuleFeedbackService,
} from './payee-rule-feedback.service';
import { PayeeRuleStore, RuleCounterUpdate } from './store/payee-rule.store';
import { FeedbackStatus } from './entities/payee-rule-application.entity';
import { PayeeRuleNotFoundException } from './exceptions/payee-cleanup.exceptions';
import { AppLoggerService } from '../common/logger/app-logger.service';
import { PayeeCleanupRule } from './entities/payee-cleanup-rule.entity';
import { buildRule } from '../../test/support/payee-rule.factory';

describe('PayeeRuleFeedbackService', () => {
  let service: PayeeRuleFeedbackService;
  let ruleStore: { updateRuleCounters: jest.Mock };
  let appLogger: { logRuleFeedback: jest.Mock };

  // 저장소가 잠금 하에서 하듯 현재 규칙에 update를 적용
  const applyTo = (rule: PayeeCleanupRule) =>
    jest.fn(
      async (
        _id: string,
        update: (current: PayeeCleanupRule) => RuleCounterUpdate,
      ) => {
        const change = update(rule);
        return buildRule({
          ...rule,
          usage_count: rule.usage_count + change.usageDelta,
          success_rate: change.successRate,
        });
      },
    );

  beforeEach(async () => {
    ruleStore = { updateRuleCounters: jest.fn() };
    appLogger = { logRuleFeedback: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PayeeRuleFeedbackService,
        { provide: PayeeRuleStore, useValue: ruleStore },
        { provide: AppLoggerService, useValue: appLogger },
      ],
    }).compile();

    service = module.get<PayeeRuleFeedbackService>(PayeeRuleFeedbackService);
  });

  describe('nextSuccessRate', () => {
    it('should compute a count-weighted running average', () => {
      expect(nextSuccessRate(1.0, 3, false)).toBe(0.75);
      expect(nextSuccessRate(0.5, 1, true)).toBe(0.75);
    });

    it('should give first feedback full weight', () => {
      expect(nextSuccessRate(1.0, 0, false)).toBe(0);
      expect(nextSuccessRate(1.0, 0, true)).toBe(1);
    });

    it('should stay within [0, 1] for out-of-range stored values', () => {
      expect(nextSuccessRate(1.5, 4, true)).toBe(1);
      expect(nextSuccessRate(-0.5, 4, false)).toBe(0);
    });

    it('should stay within [0, 1] over a long feedback sequence', () => {
      let rate = 1.0;
      for (let usage = 0; usage < 200; usage++) {
        rate = nextSuccessRate(rate, usage, usage % 3 === 0);
        expect(rate).toBeGreaterThanOrEqual(0);
        expect(rate).toBeLessThanOrEqual(1);
      }
    });
  });

  describe('provideFeedback', () => {
    it('should update counters and record CORRECT feedback', async () => {
      const rule = buildRule({ usage_count: 1, success_rate: 0.5 });
      ruleStore.updateRuleCounters.mockImplementation(applyTo(rule));

      const updated = await service.provideFeedback('rule-1', true);

      expect(updated.usage_count).toBe(2);
      expect(updated.success_rate).toBe(0.75);
      const update = ruleStore.updateRuleCounters.mock.calls[0][1];
      expect(update(rule)).toEqual({
        usageDelta: 1,
        successRate: 0.75,
        feedback: FeedbackStatus.CORRECT,
      });
    });

    it('should record INCORRECT feedback and log the new rate', async () => {
      const rule = buildRule({ usage_count: 3, success_rate: 1.0 });
      ruleStore.updateRuleCounters.mockImplementation(applyTo(rule));

      await service.provideFeedback('rule-1', false);

      const update = ruleStore.updateRuleCounters.mock.calls[0][1];
      expect(update(rule).feedback).toBe(FeedbackStatus.INCORRECT);
      expect(appLogger.logRuleFeedback).toHaveBeenCalledWith({
        ruleId: 'rule-1',
        wasSuccessful: false,
        usageCount: 4,
        successRate: 0.75,
      });
    });

    it('should propagate NotFound for an unknown rule', async () => {
      ruleStore.updateRuleCounters.mockRejectedValue(
        new PayeeRuleNotFoundException('missing'),
      );

      await expect(service.provideFeedback('missing', true)).rejects.toThrow(
        PayeeRuleNotFoundException,
      );
      expect(appLogger.logRuleFeedback).not.toHaveBeenCalled();
    });
  });
});
