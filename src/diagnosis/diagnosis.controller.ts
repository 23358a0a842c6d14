import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  StreamableFile,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiOperation,
  ApiProduces,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import {
  BatchDiagnoseDto,
  DiagnoseProblemDto,
  GenerateReportDto,
} from './dto/diagnose-problem.dto';
import {
  BatchDiagnosisResult,
  DiagnosisResult,
  DiagnosisService,
  DomainInfo,
} from './diagnosis.service';

const REPORT_FILE_NAME = 'consulting-brief.pdf';

@ApiTags('diagnosis')
@Controller('api/v1/diagnosis')
export class DiagnosisController {
  private readonly logger = new Logger(DiagnosisController.name);

  constructor(private readonly diagnosisService: DiagnosisService) {}

  @ApiOperation({
    summary: '재무 전환 문제 진단',
    description:
      '문제 설명을 키워드 규칙으로 도메인 분류하고 근본 원인과 권장 조치를 반환합니다. includeAiBrief 가 true 이면 AI 컨설팅 브리프를 함께 생성합니다.',
  })
  @ApiResponse({
    status: 200,
    description: '진단 성공',
    schema: {
      type: 'object',
      properties: {
        domain: { type: 'string', description: '도메인 레이블' },
        domainDisplayName: { type: 'string', description: '도메인 표시 이름' },
        matchedKeyword: {
          type: 'string',
          nullable: true,
          description: '일치한 키워드 (기본 도메인이면 null)',
        },
        recommendation: { type: 'object', description: '권장 사항 블록' },
        summaryMarkdown: { type: 'string', description: '마크다운 요약' },
        ai: {
          type: 'object',
          properties: {
            status: {
              type: 'string',
              enum: ['SKIPPED', 'GENERATED', 'UNAVAILABLE', 'FAILED'],
            },
            brief: { type: 'string', nullable: true },
            message: { type: 'string', nullable: true },
          },
        },
      },
    },
  })
  @ApiBadRequestResponse({ description: '잘못된 요청 - 문제 설명 누락 등' })
  @Post()
  @HttpCode(HttpStatus.OK)
  async diagnose(@Body() dto: DiagnoseProblemDto): Promise<DiagnosisResult> {
    return this.diagnosisService.diagnose(
      dto.problem,
      dto.includeAiBrief ?? false,
    );
  }

  @ApiOperation({
    summary: '일괄 도메인 분류',
    description: '여러 문제 설명을 한 번에 분류하고 도메인별 통계를 반환합니다.',
  })
  @ApiResponse({ status: 200, description: '일괄 분류 성공' })
  @ApiBadRequestResponse({ description: '잘못된 요청 - 목록 누락, 건수 초과 등' })
  @Post('batch')
  @HttpCode(HttpStatus.OK)
  diagnoseBatch(@Body() dto: BatchDiagnoseDto): BatchDiagnosisResult {
    return this.diagnosisService.diagnoseBatch(dto.problems);
  }

  @ApiOperation({
    summary: 'PDF 컨설팅 브리프 생성',
    description:
      '진단 결과와 회사 프로필로 한 페이지 PDF 브리프를 생성합니다. aiBrief 를 전달하면 Outcome 영역에 포함됩니다.',
  })
  @ApiProduces('application/pdf')
  @ApiResponse({ status: 200, description: 'PDF 생성 성공' })
  @ApiBadRequestResponse({ description: '잘못된 요청 - 회사 정보 누락 등' })
  @Post('report')
  @HttpCode(HttpStatus.OK)
  async generateReport(@Body() dto: GenerateReportDto): Promise<StreamableFile> {
    const report = await this.diagnosisService.generateReport(dto);
    this.logger.log(
      `Report ready for ${dto.companyName} (${report.domain}, ${report.content.length} bytes)`,
    );
    // 헤더는 성공 응답에만 설정 (오류는 예외 필터가 JSON 으로 응답)
    return new StreamableFile(report.content, {
      type: 'application/pdf',
      disposition: `attachment; filename="${REPORT_FILE_NAME}"`,
      length: report.content.length,
    });
  }

  @ApiOperation({
    summary: '도메인 목록 조회',
    description: '분류 가능한 도메인과 키워드를 우선순위 순으로 반환합니다.',
  })
  @ApiResponse({ status: 200, description: '조회 성공' })
  @Get('domains')
  listDomains(): DomainInfo[] {
    return this.diagnosisService.listDomains();
  }
}
