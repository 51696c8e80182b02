import { z } from 'zod';
import { PatternType } from '../payee-cleanup/entities/payee-cleanup-rule.entity';
import { PayeeCleanupContext } from '../payee-cleanup/interfaces/payee-cleanup.interface';

export const payeeCleanupResponseSchema = z.object({
  cleanedPayee: z.string().describe('Clean, human-readable payee name'),
  confidence: z
    .number()
    .min(0)
    .max(1)
    .describe('How certain the cleanup is, between 0 and 1'),
  ruleSuggestion: z
    .object({
      pattern: z
        .string()
        .describe('Text that identifies this merchant in raw payee names'),
      patternType: z.nativeEnum(PatternType),
      replacement: z.string().describe('Payee name to use on match'),
      explanation: z.string().optional(),
    })
    .nullable()
    .describe('A reusable rule for this merchant, or null'),
});

export type PayeeCleanupResponse = z.infer<typeof payeeCleanupResponseSchema>;

export const PAYEE_CLEANUP_SYSTEM_PROMPT = `You normalize raw payee names taken from bank transactions into the name a person would write in their budget.

## Cleanup Rules
1. Drop reference numbers, card numbers, dates, times and amounts
2. Drop payment method noise such as "CARD PAYMENT", "DEBIT", "POS", "PMTS"
3. Drop store numbers and locations unless they are part of the brand
4. Use the merchant's own capitalization (Title Case when unsure, never ALL CAPS)
5. Keep one canonical spelling per merchant ("McDonald's", not "MCDONALDS")

## Rule Suggestions
Suggest a rule only when the raw name contains a stable merchant marker that
will appear on future transactions. Matching is case-sensitive against the raw
text, so copy the marker exactly as it appears.
- EXACT: the whole raw name never varies
- STARTS_WITH: the marker is a fixed prefix
- CONTAINS: the marker appears somewhere in the name
- REGEX: only when the simpler types cannot express it (JavaScript syntax)
Return null for ruleSuggestion when no reusable marker exists.

## Confidence
- 0.9+ = well-known merchant, unambiguous
- 0.7-0.9 = likely correct
- below 0.7 = educated guess`;

/**
 * 정리 요청 프롬프트를 생성합니다
 */
export function buildPayeeCleanupPrompt(
  original: string,
  context: PayeeCleanupContext,
): string {
  const contextLines = Object.entries(context)
    .filter(([, value]) => value.trim() !== '')
    .map(([key, value]) => `- ${key}: ${value}`);

  return `Clean up this raw payee name:
Payee: "${original}"

Transaction context:
${contextLines.length > 0 ? contextLines.join('\n') : '- none'}`;
}
