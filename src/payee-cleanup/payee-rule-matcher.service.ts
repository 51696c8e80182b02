import { Injectable, Logger } from '@nestjs/common';
import {
  PatternType,
  PayeeCleanupRule,
  RuleStatus,
} from './entities/payee-cleanup-rule.entity';
import { compileRegex } from './payee-rule.validation';

// 동점일 때 더 구체적인 패턴이 앞선다 (작을수록 구체적)
const PATTERN_SPECIFICITY: Record<PatternType, number> = {
  [PatternType.EXACT]: 0,
  [PatternType.STARTS_WITH]: 1,
  [PatternType.CONTAINS]: 2,
  [PatternType.REGEX]: 3,
};

/**
 * 규칙 정렬 기준
 * 1. confidence 내림차순 2. 패턴 구체성 3. 생성 시각 오름차순 4. id
 */
export function compareRules(a: PayeeCleanupRule, b: PayeeCleanupRule): number {
  return (
    b.confidence - a.confidence ||
    PATTERN_SPECIFICITY[a.pattern_type] - PATTERN_SPECIFICITY[b.pattern_type] ||
    a.created_at.getTime() - b.created_at.getTime() ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

interface CompiledPattern {
  pattern: string;
  regex: RegExp | null;
}

@Injectable()
export class PayeeRuleMatcherService {
  private readonly logger = new Logger(PayeeRuleMatcherService.name);
  // 규칙 id 기준, 매칭 대상 목록에 없는 규칙은 매 매칭마다 제거된다
  private readonly compiledPatterns = new Map<string, CompiledPattern>();

  /**
   * 승인된 규칙 중 매칭되는 규칙을 우선순위 순으로 반환합니다
   */
  findMatchingRules(
    payeeName: string,
    rules: PayeeCleanupRule[],
  ): PayeeCleanupRule[] {
    this.pruneCompiledPatterns(rules);

    const matchedRules = rules.filter(
      (rule) =>
        rule.status === RuleStatus.APPROVED && this.matches(payeeName, rule),
    );

    return this.rankRules(matchedRules);
  }

  /**
   * 우선순위가 가장 높은 매칭 규칙을 선택합니다
   */
  selectWinningRule(
    payeeName: string,
    rules: PayeeCleanupRule[],
  ): PayeeCleanupRule | undefined {
    return this.findMatchingRules(payeeName, rules)[0];
  }

  rankRules(rules: PayeeCleanupRule[]): PayeeCleanupRule[] {
    return rules.toSorted(compareRules);
  }

  /**
   * 개별 규칙을 평가합니다 (대소문자 구분)
   */
  matches(payeeName: string, rule: PayeeCleanupRule): boolean {
    switch (rule.pattern_type) {
      case PatternType.EXACT:
        return payeeName === rule.pattern;
      case PatternType.CONTAINS:
        return payeeName.includes(rule.pattern);
      case PatternType.STARTS_WITH:
        return payeeName.startsWith(rule.pattern);
      case PatternType.REGEX: {
        const regex = this.getCompiledPattern(rule);
        return regex !== null && regex.test(payeeName);
      }
      default: {
        const unknownType: never = rule.pattern_type;
        this.logger.warn(
          `Unknown pattern type ${String(unknownType)} on rule ${rule.id}`,
        );
        return false;
      }
    }
  }

  /**
   * 규칙을 적용한 정리 결과를 만듭니다
   * REGEX는 첫 번째 매칭 부분만 치환하고, 나머지 유형은 전체를 replacement로 바꿉니다
   */
  applyRule(original: string, rule: PayeeCleanupRule): string {
    if (rule.pattern_type !== PatternType.REGEX) {
      return rule.replacement;
    }

    const regex = this.getCompiledPattern(rule);
    if (regex === null) {
      return rule.replacement;
    }

    const replaced = original.replace(regex, rule.replacement).trim();
    return replaced || rule.replacement;
  }

  private getCompiledPattern(rule: PayeeCleanupRule): RegExp | null {
    const cached = this.compiledPatterns.get(rule.id);
    if (cached && cached.pattern === rule.pattern) {
      return cached.regex;
    }

    const regex = compileRegex(rule.pattern);
    if (regex === null) {
      this.logger.warn(
        `Invalid regex pattern on rule ${rule.id}, treated as non-matching: ${rule.pattern}`,
      );
    }

    this.compiledPatterns.set(rule.id, { pattern: rule.pattern, regex });
    return regex;
  }

  private pruneCompiledPatterns(rules: PayeeCleanupRule[]): void {
    const activeIds = new Set(rules.map((rule) => rule.id));
    for (const id of this.compiledPatterns.keys()) {
      if (!activeIds.has(id)) {
        this.compiledPatterns.delete(id);
      }
    }
  }
}
