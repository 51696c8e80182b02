import {
  PayeeCleanupContext,
  RuleDraft,
} from '../payee-cleanup/interfaces/payee-cleanup.interface';
import { LlmResult } from './llm-client.error';

export interface LlmCleanupSuggestion {
  cleaned: string;
  candidateRule?: RuleDraft;
}

/**
 * 외부 LLM 서비스 경계
 * 실패를 던지지 않고 종류가 지정된 LlmClientError를 결과로 돌려준다
 */
export abstract class PayeeCleanupLlmClient {
  abstract cleanupPayee(
    original: string,
    context: PayeeCleanupContext,
    signal?: AbortSignal,
  ): Promise<LlmResult<LlmCleanupSuggestion>>;

  abstract healthCheck(): Promise<LlmResult<void>>;
}
