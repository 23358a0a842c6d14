import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AiOperation,
  AppLoggerService,
} from '../common/logger/app-logger.service';
import {
  ChatCompletionClient,
  ConsultingBriefInput,
  LlmErrorKind,
  LlmResult,
  LlmSettings,
  OPENAI_CLIENT,
  ResearchQuestionInput,
} from './interfaces/llm.interface';
import {
  buildConsultingBriefPrompt,
  CONSULTING_BRIEF_SYSTEM_PROMPT,
} from './prompts/consulting-brief.prompt';
import {
  buildResearchPrompt,
  RESEARCH_SYSTEM_PROMPT,
} from './prompts/research-answer.prompt';

export const NOT_CONFIGURED_MESSAGE =
  'AI analysis is not configured yet. Please set OPENAI_API_KEY in the environment.';

const DEFAULT_MODEL = 'gpt-4.1-mini';
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_MAX_TOKENS = 1400;

@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);
  private readonly settings: LlmSettings;

  constructor(
    @Inject(OPENAI_CLIENT)
    private readonly client: ChatCompletionClient | null,
    private readonly configService: ConfigService,
    private readonly appLoggerService: AppLoggerService,
  ) {
    this.settings = {
      model: this.configService.get<string>('OPENAI_MODEL') || DEFAULT_MODEL,
      temperature: this.readNumber('OPENAI_TEMPERATURE', DEFAULT_TEMPERATURE),
      maxTokens: this.readNumber('OPENAI_MAX_TOKENS', DEFAULT_MAX_TOKENS),
    };
  }

  /**
   * OpenAI 클라이언트 설정 여부
   */
  isConfigured(): boolean {
    return this.client !== null;
  }

  getSettings(): LlmSettings {
    return this.settings;
  }

  /**
   * 컨설팅 브리프(마크다운)를 생성합니다
   */
  async generateConsultingBrief(
    input: ConsultingBriefInput,
  ): Promise<LlmResult<string>> {
    return this.complete(
      AiOperation.CONSULTING_BRIEF,
      CONSULTING_BRIEF_SYSTEM_PROMPT,
      buildConsultingBriefPrompt(input),
    );
  }

  /**
   * 웹 검색 결과를 근거로 질문에 답변합니다
   */
  async answerQuestion({
    question,
    sources,
  }: ResearchQuestionInput): Promise<LlmResult<string>> {
    return this.complete(
      AiOperation.RESEARCH_ANSWER,
      RESEARCH_SYSTEM_PROMPT,
      buildResearchPrompt(question, sources),
    );
  }

  private async complete(
    operation: AiOperation,
    systemPrompt: string,
    userPrompt: string,
  ): Promise<LlmResult<string>> {
    const { model, temperature, maxTokens } = this.settings;

    if (!this.client) {
      this.appLoggerService.logAiRequest({
        operation,
        model,
        status: 'NOT_CONFIGURED',
        durationMs: 0,
      });
      return {
        ok: false,
        error: {
          kind: LlmErrorKind.NOT_CONFIGURED,
          message: NOT_CONFIGURED_MESSAGE,
        },
      };
    }

    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model,
        temperature,
        max_tokens: maxTokens,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
      });

      const content = response.choices[0]?.message?.content?.trim();
      const durationMs = Date.now() - startTime;

      if (!content) {
        this.appLoggerService.logAiRequest({
          operation,
          model,
          status: 'FAILED',
          durationMs,
          errorMessage: 'Empty response',
        });
        return {
          ok: false,
          error: {
            kind: LlmErrorKind.EMPTY_RESPONSE,
            message: 'LLM returned an empty response.',
          },
        };
      }

      this.appLoggerService.logAiRequest({
        operation,
        model,
        status: 'SUCCESS',
        durationMs,
      });
      return { ok: true, value: content };
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.appLoggerService.logAiRequest({
        operation,
        model,
        status: 'FAILED',
        durationMs: Date.now() - startTime,
        errorMessage,
      });
      return {
        ok: false,
        error: {
          kind: LlmErrorKind.REQUEST_FAILED,
          message: `AI analysis failed: ${errorMessage}`,
        },
      };
    }
  }

  private readNumber(key: string, fallback: number): number {
    const raw = this.configService.get<number | string>(key);
    if (raw === undefined || raw === '') {
      return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.logger.warn(`Ignoring non-numeric ${key}, using ${fallback}`);
      return fallback;
    }
    return value;
  }
}
