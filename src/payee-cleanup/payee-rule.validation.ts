import { validate, ValidationError } from 'class-validator';
import { plainToInstance, ClassConstructor } from 'class-transformer';
import { PatternType } from './entities/payee-cleanup-rule.entity';
import { PayeeCleanupValidationException } from './exceptions/payee-cleanup.exceptions';

// payee_cleanup_rules / payee_rule_applications 컬럼 길이
export const MAX_PAYEE_LENGTH = 255;

/**
 * 규칙 입력을 변환하고 검증합니다
 * 위반된 제약 조건을 모두 담아 PayeeCleanupValidationException을 던집니다
 */
export async function validateRuleInput<T extends object>(
  dtoClass: ClassConstructor<T>,
  input: object,
): Promise<T> {
  const dto = plainToInstance(dtoClass, input);
  const errors = await validate(dto);

  if (errors.length > 0) {
    throw new PayeeCleanupValidationException(formatValidationErrors(errors));
  }

  return dto;
}

function formatValidationErrors(errors: ValidationError[]): string[] {
  const messages: string[] = [];

  for (const error of errors) {
    if (error.constraints) {
      messages.push(...Object.values(error.constraints));
    }

    if (error.children && error.children.length > 0) {
      messages.push(...formatValidationErrors(error.children));
    }
  }

  return messages;
}

/** 정규식을 컴파일합니다 (잘못된 패턴이면 null) */
export function compileRegex(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern);
  } catch {
    return null;
  }
}

export function assertPatternCompiles(
  pattern: string,
  patternType: PatternType,
): void {
  if (patternType === PatternType.REGEX && compileRegex(pattern) === null) {
    throw new PayeeCleanupValidationException([
      `pattern is not a valid regular expression: ${pattern}`,
    ]);
  }
}
