import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { LlmService } from './llm.service';
import {
  ChatCompletionClient,
  OPENAI_CLIENT,
} from './interfaces/llm.interface';

@Module({
  providers: [
    {
      // 프로세스당 한 번 생성, 키가 없으면 null (LlmService 가 NOT_CONFIGURED 로 응답)
      provide: OPENAI_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ChatCompletionClient | null => {
        const apiKey = configService.get<string>('OPENAI_API_KEY');
        return apiKey ? new OpenAI({ apiKey }) : null;
      },
    },
    LlmService,
  ],
  exports: [LlmService],
})
export class LlmModule {}
