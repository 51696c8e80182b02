import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PayeeCleanupLlmClient } from './payee-cleanup-llm.client';
import { OpenRouterPayeeCleanupClient } from './openrouter-payee-cleanup.client';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: PayeeCleanupLlmClient,
      useClass: OpenRouterPayeeCleanupClient,
    },
  ],
  exports: [PayeeCleanupLlmClient],
})
export class LlmModule {}
