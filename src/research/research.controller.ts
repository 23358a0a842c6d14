import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import {
  ApiBadGatewayResponse,
  ApiBadRequestResponse,
  ApiOperation,
  ApiResponse,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import { AskQuestionDto } from './dto/ask-question.dto';
import { ResearchAnswer, ResearchService } from './research.service';

@ApiTags('research')
@Controller('api/v1/research')
export class ResearchController {
  constructor(private readonly researchService: ResearchService) {}

  @ApiOperation({
    summary: '웹 검색 기반 Q&A',
    description:
      '웹 검색 결과를 근거로 재무 전환 관련 질문에 답변합니다. 검색이 설정되지 않은 경우 소스 없이 답변합니다.',
  })
  @ApiResponse({ status: 200, description: '답변 생성 성공' })
  @ApiBadRequestResponse({ description: '잘못된 요청 - 질문 누락 등' })
  @ApiServiceUnavailableResponse({ description: 'AI 분석이 설정되지 않음' })
  @ApiBadGatewayResponse({ description: 'AI 서비스 호출 실패' })
  @Post('ask')
  @HttpCode(HttpStatus.OK)
  async ask(@Body() dto: AskQuestionDto): Promise<ResearchAnswer> {
    return this.researchService.ask(dto.question, dto.maxResults);
  }
}
