import {
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { PatternType } from '../entities/payee-cleanup-rule.entity';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

/** 승인 시 검토자가 덮어쓰는 필드 */
export class ApprovePayeeRuleDto {
  @IsOptional()
  @Transform(trim)
  @IsString({ message: 'pattern must be a string' })
  @IsNotEmpty({ message: 'pattern cannot be empty' })
  @MaxLength(255, { message: 'pattern must be at most 255 characters' })
  pattern?: string;

  @IsOptional()
  @IsEnum(PatternType, {
    message: 'patternType must be EXACT, CONTAINS, STARTS_WITH, or REGEX',
  })
  patternType?: PatternType;

  @IsOptional()
  @Transform(trim)
  @IsString({ message: 'replacement must be a string' })
  @IsNotEmpty({ message: 'replacement cannot be empty' })
  @MaxLength(255, { message: 'replacement must be at most 255 characters' })
  replacement?: string;
}
