import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { WebSearchResult } from '../../search/interfaces/web-search.interface';

export const OPENAI_CLIENT = Symbol('OPENAI_CLIENT');

/**
 * LlmService 가 사용하는 OpenAI 클라이언트의 최소 인터페이스
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        params: ChatCompletionCreateParamsNonStreaming,
      ): Promise<ChatCompletion>;
    };
  };
}

export enum LlmErrorKind {
  NOT_CONFIGURED = 'NOT_CONFIGURED',
  EMPTY_RESPONSE = 'EMPTY_RESPONSE',
  REQUEST_FAILED = 'REQUEST_FAILED',
}

export interface LlmError {
  kind: LlmErrorKind;
  message: string;
}

export type LlmResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LlmError };

export interface ConsultingBriefInput {
  problem: string;
  domain: string;
  ruleBasedSummary: string;
}

export interface ResearchQuestionInput {
  question: string;
  sources: readonly WebSearchResult[];
}

export interface LlmSettings {
  model: string;
  temperature: number;
  maxTokens: number;
}
