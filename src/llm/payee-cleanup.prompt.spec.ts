import {
  buildPayeeCleanupPrompt,
  payeeCleanupResponseSchema,
} from './payee-cleanup.prompt';
import { PatternType } from '../payee-cleanup/entities/payee-cleanup-rule.entity';

describe('buildPayeeCleanupPrompt', () => {
  it('should list non-blank context entries', () => {
    const prompt = buildPayeeCleanupPrompt('ACME STORE 19OCT', {
      amount: '-22.50',
      memo: ' ',
      account: 'Current',
    });

    expect(prompt).toBe(
      [
        'Clean up this raw payee name:',
        'Payee: "ACME STORE 19OCT"',
        '',
        'Transaction context:',
        '- amount: -22.50',
        '- account: Current',
      ].join('\n'),
    );
  });

  it('should say none when there is no context', () => {
    expect(buildPayeeCleanupPrompt('X', {})).toBe(
      'Clean up this raw payee name:\nPayee: "X"\n\nTransaction context:\n- none',
    );
  });
});

describe('payeeCleanupResponseSchema', () => {
  it('should accept a response with a rule suggestion', () => {
    const parsed = payeeCleanupResponseSchema.safeParse({
      cleanedPayee: 'Acme Store',
      confidence: 0.8,
      ruleSuggestion: {
        pattern: 'ACME STORE',
        patternType: 'CONTAINS',
        replacement: 'Acme Store',
      },
    });

    expect(parsed.success).toBe(true);
    expect(parsed.data?.ruleSuggestion?.patternType).toBe(PatternType.CONTAINS);
  });

  it('should reject an unknown pattern type or out-of-range confidence', () => {
    expect(
      payeeCleanupResponseSchema.safeParse({
        cleanedPayee: 'Acme',
        confidence: 0.8,
        ruleSuggestion: {
          pattern: 'ACME',
          patternType: 'FUZZY',
          replacement: 'Acme',
        },
      }).success,
    ).toBe(false);
    expect(
      payeeCleanupResponseSchema.safeParse({
        cleanedPayee: 'Acme',
        confidence: 1.5,
        ruleSuggestion: null,
      }).success,
    ).toBe(false);
  });
});
