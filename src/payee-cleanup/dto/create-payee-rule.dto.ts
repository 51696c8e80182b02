import { IsEnum, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';
import { PatternType } from '../entities/payee-cleanup-rule.entity';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

export class CreatePayeeRuleDto {
  @Transform(trim)
  @IsString({ message: 'pattern must be a string' })
  @IsNotEmpty({ message: 'pattern cannot be empty' })
  @MaxLength(255, { message: 'pattern must be at most 255 characters' })
  pattern!: string;

  @IsEnum(PatternType, {
    message: 'patternType must be EXACT, CONTAINS, STARTS_WITH, or REGEX',
  })
  patternType!: PatternType;

  @Transform(trim)
  @IsString({ message: 'replacement must be a string' })
  @IsNotEmpty({ message: 'replacement cannot be empty' })
  @MaxLength(255, { message: 'replacement must be at most 255 characters' })
  replacement!: string;
}
