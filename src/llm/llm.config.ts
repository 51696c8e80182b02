import { ConfigService } from '@nestjs/config';
import { readInt, readNumber } from '../common/config/config-values';

export interface LlmConfig {
  apiKey: string;
  model: string;
  maxRetries: number;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  baseUrl?: string;
}

export function loadLlmConfig(configService: ConfigService): LlmConfig {
  return {
    apiKey: configService.get<string>('OPENROUTER_API_KEY', ''),
    model: configService.get<string>(
      'PAYEE_CLEANUP_MODEL',
      'openai/gpt-4o-mini',
    ),
    maxRetries: readInt(configService, 'PAYEE_CLEANUP_MAX_RETRIES', 2),
    timeoutMs: readInt(configService, 'PAYEE_CLEANUP_TIMEOUT_MS', 30000),
    temperature: readNumber(configService, 'PAYEE_CLEANUP_TEMPERATURE', 0.2),
    maxTokens: readInt(configService, 'PAYEE_CLEANUP_MAX_TOKENS', 400),
    baseUrl: configService.get<string>('PAYEE_CLEANUP_BASE_URL') || undefined,
  };
}
