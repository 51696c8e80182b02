import 'reflect-metadata';

export { AppModule } from './app.module';
export { PayeeCleanupModule } from './payee-cleanup/payee-cleanup.module';
export { PayeeCleanupService } from './payee-cleanup/payee-cleanup.service';
export {
  PayeeRuleMatcherService,
  compareRules,
} from './payee-cleanup/payee-rule-matcher.service';
export {
  PayeeRuleFeedbackService,
  nextSuccessRate,
} from './payee-cleanup/payee-rule-feedback.service';
export {
  NewRuleApplication,
  PayeeRuleStore,
  RuleCounterUpdate,
  RuleReview,
} from './payee-cleanup/store/payee-rule.store';
export { TypeOrmPayeeRuleStore } from './payee-cleanup/store/typeorm-payee-rule.store';
export {
  PatternType,
  PayeeCleanupRule,
  RuleGenerator,
  RuleStatus,
} from './payee-cleanup/entities/payee-cleanup-rule.entity';
export {
  FeedbackStatus,
  PayeeRuleApplication,
} from './payee-cleanup/entities/payee-rule-application.entity';
export {
  PayeeRuleReview,
  ReviewDecision,
} from './payee-cleanup/entities/payee-rule-review.entity';
export * from './payee-cleanup/interfaces/payee-cleanup.interface';
export * from './payee-cleanup/exceptions/payee-cleanup.exceptions';
export { LlmModule } from './llm/llm.module';
export {
  LlmCleanupSuggestion,
  PayeeCleanupLlmClient,
} from './llm/payee-cleanup-llm.client';
export { OpenRouterPayeeCleanupClient } from './llm/openrouter-payee-cleanup.client';
export {
  LlmClientError,
  LlmErrorKind,
  LlmResult,
  toLlmClientError,
} from './llm/llm-client.error';
export { AppLoggerService } from './common/logger/app-logger.service';
