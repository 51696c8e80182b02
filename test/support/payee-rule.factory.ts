import {
  PatternType,
  PayeeCleanupRule,
  RuleGenerator,
  RuleStatus,
} from '../../src/payee-cleanup/entities/payee-cleanup-rule.entity';

export function buildRule(
  overrides: Partial<PayeeCleanupRule> = {},
): PayeeCleanupRule {
  return Object.assign(new PayeeCleanupRule(), {
    id: 'rule-1',
    pattern: 'AMAZON',
    pattern_type: PatternType.CONTAINS,
    replacement: 'Amazon',
    confidence: 0.9,
    generated_by: RuleGenerator.HUMAN,
    status: RuleStatus.APPROVED,
    usage_count: 0,
    success_rate: 1.0,
    created_at: new Date('2024-01-01T00:00:00Z'),
    updated_at: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  });
}
