import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PayeeCleanupRule } from './entities/payee-cleanup-rule.entity';
import { PayeeRuleApplication } from './entities/payee-rule-application.entity';
import { PayeeRuleReview } from './entities/payee-rule-review.entity';
import { PayeeRuleStore } from './store/payee-rule.store';
import { TypeOrmPayeeRuleStore } from './store/typeorm-payee-rule.store';
import { PayeeRuleMatcherService } from './payee-rule-matcher.service';
import { PayeeRuleFeedbackService } from './payee-rule-feedback.service';
import { PayeeCleanupService } from './payee-cleanup.service';
import { LlmModule } from '../llm/llm.module';
import { AppLoggerService } from '../common/logger/app-logger.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      PayeeCleanupRule,
      PayeeRuleApplication,
      PayeeRuleReview,
    ]),
    ConfigModule,
    LlmModule,
  ],
  providers: [
    {
      provide: PayeeRuleStore,
      useClass: TypeOrmPayeeRuleStore,
    },
    PayeeRuleMatcherService,
    PayeeRuleFeedbackService,
    PayeeCleanupService,
    AppLoggerService,
  ],
  exports: [PayeeCleanupService, PayeeRuleStore],
})
export class PayeeCleanupModule {}
