import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { generateObject, generateText, LanguageModel } from 'ai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { PayeeCleanupContext } from '../payee-cleanup/interfaces/payee-cleanup.interface';
import { MAX_PAYEE_LENGTH } from '../payee-cleanup/payee-rule.validation';
import {
  LlmClientError,
  LlmResult,
  toLlmClientError,
} from './llm-client.error';
import { LlmConfig, loadLlmConfig } from './llm.config';
import {
  LlmCleanupSuggestion,
  PayeeCleanupLlmClient,
} from './payee-cleanup-llm.client';
import {
  buildPayeeCleanupPrompt,
  PAYEE_CLEANUP_SYSTEM_PROMPT,
  PayeeCleanupResponse,
  payeeCleanupResponseSchema,
} from './payee-cleanup.prompt';

@Injectable()
export class OpenRouterPayeeCleanupClient extends PayeeCleanupLlmClient {
  private readonly logger = new Logger(OpenRouterPayeeCleanupClient.name);
  private readonly config: LlmConfig;
  private readonly model: LanguageModel;

  constructor(configService: ConfigService) {
    super();
    this.config = loadLlmConfig(configService);
    if (!this.config.apiKey) {
      throw new Error('OPENROUTER_API_KEY must be set');
    }

    const openrouter = createOpenRouter({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
    });
    this.model = openrouter(this.config.model);
  }

  /**
   * LLM으로 거래처명을 정리하고 재사용 가능한 규칙을 제안받습니다
   */
  async cleanupPayee(
    original: string,
    context: PayeeCleanupContext,
    signal?: AbortSignal,
  ): Promise<LlmResult<LlmCleanupSuggestion>> {
    return this.execute('Payee cleanup', signal, async (abortSignal) => {
      this.logger.debug(
        `Requesting payee cleanup from ${this.config.model}: "${original}"`,
      );

      const { object } = await generateObject({
        model: this.model,
        schema: payeeCleanupResponseSchema,
        schemaName: 'PayeeCleanup',
        schemaDescription: 'Cleaned payee name with an optional reusable rule',
        system: PAYEE_CLEANUP_SYSTEM_PROMPT,
        prompt: buildPayeeCleanupPrompt(original, context),
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
        maxRetries: this.config.maxRetries,
        abortSignal,
      });

      return this.toSuggestion(object);
    });
  }

  async healthCheck(): Promise<LlmResult<void>> {
    return this.execute('Health check', undefined, async (abortSignal) => {
      const { text } = await generateText({
        model: this.model,
        prompt: "This is a health check. Reply with 'OK'.",
        maxTokens: 5,
        maxRetries: this.config.maxRetries,
        abortSignal,
      });

      if (!text.includes('OK')) {
        throw new LlmClientError(
          'UNEXPECTED',
          `Health check failed, unexpected response: ${text}`,
        );
      }
    });
  }

  private toSuggestion(response: PayeeCleanupResponse): LlmCleanupSuggestion {
    const cleaned = response.cleanedPayee.trim();
    if (!cleaned) {
      throw new LlmClientError('MODEL', 'Model returned an empty payee name');
    }
    if (cleaned.length > MAX_PAYEE_LENGTH) {
      throw new LlmClientError(
        'MODEL',
        `Model returned a payee name longer than ${MAX_PAYEE_LENGTH} characters`,
      );
    }

    const suggestion = response.ruleSuggestion;
    const pattern = suggestion?.pattern.trim() ?? '';
    if (!suggestion || !pattern) {
      return { cleaned };
    }

    return {
      cleaned,
      candidateRule: {
        pattern,
        patternType: suggestion.patternType,
        replacement: suggestion.replacement.trim() || cleaned,
        confidence: response.confidence,
      },
    };
  }

  /**
   * 타임아웃과 호출자 취소를 하나의 AbortSignal로 묶어 실행하고 결과로 변환합니다
   */
  private async execute<T>(
    operation: string,
    signal: AbortSignal | undefined,
    call: (abortSignal: AbortSignal) => Promise<T>,
  ): Promise<LlmResult<T>> {
    const controller = new AbortController();
    const abort = () => controller.abort();
    const timer = setTimeout(abort, this.config.timeoutMs);

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', abort, { once: true });
    }

    try {
      const value = await call(controller.signal);
      return { ok: true, value };
    } catch (error) {
      if (controller.signal.aborted) {
        const reason = signal?.aborted
          ? `${operation} cancelled`
          : `${operation} timed out after ${this.config.timeoutMs}ms`;
        return {
          ok: false,
          error: new LlmClientError('CONNECTION', reason, { cause: error }),
        };
      }
      return { ok: false, error: toLlmClientError(error) };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', abort);
    }
  }
}
