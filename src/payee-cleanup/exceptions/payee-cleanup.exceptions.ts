import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { RuleStatus } from '../entities/payee-cleanup-rule.entity';

export class PayeeCleanupValidationException extends BadRequestException {
  constructor(readonly violations: string[]) {
    super(`Validation failed: ${violations.join(', ')}`);
  }
}

export class PayeeRuleNotFoundException extends NotFoundException {
  constructor(readonly ruleId: string) {
    super(`Rule not found: ${ruleId}`);
  }
}

export class PayeeRuleStateException extends ConflictException {
  constructor(
    readonly ruleId: string,
    readonly currentStatus: RuleStatus,
  ) {
    super(
      `Rule ${ruleId} is ${currentStatus}, only PENDING rules can be reviewed`,
    );
  }
}

export class PayeeRuleStoreException extends InternalServerErrorException {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Rule store ${operation} failed: ${detail}`, { cause });
  }
}
