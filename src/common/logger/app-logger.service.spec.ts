import { Test, TestingModule } from '@nestjs/testing';
import { AiOperation, AppLoggerService } from './app-logger.service';

describe('AppLoggerService', () => {
  let service: AppLoggerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [AppLoggerService],
    }).compile();

    service = module.get<AppLoggerService>(AppLoggerService);

    // 로그 출력을 모킹하여 테스트 중 콘솔 출력 방지
    jest.spyOn(service, 'log').mockImplementation();
    jest.spyOn(service, 'error').mockImplementation();
    jest.spyOn(service, 'warn').mockImplementation();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('진단 로그', () => {
    it('매칭된 키워드와 함께 진단 결과를 로그해야 함', () => {
      service.logDiagnosis({
        domain: 'P2P',
        matchedKeyword: 'procure',
        textLength: 30,
        aiStatus: 'SKIPPED',
      });

      expect(service.log).toHaveBeenCalledWith(
        'Diagnosis - Domain: P2P, Keyword: procure, Text Length: 30, AI: SKIPPED',
      );
    });

    it('매칭된 키워드가 없으면 none 으로 로그해야 함', () => {
      service.logDiagnosis({
        domain: 'GeneralFinance',
        matchedKeyword: null,
        textLength: 0,
        aiStatus: 'UNAVAILABLE',
      });

      expect(service.log).toHaveBeenCalledWith(
        'Diagnosis - Domain: GeneralFinance, Keyword: none, Text Length: 0, AI: UNAVAILABLE',
      );
    });
  });

  describe('일괄 분류 로그', () => {
    it('일괄 분류 결과를 로그해야 함', () => {
      service.logBatchClassification({
        totalProblems: 10,
        defaultedCount: 2,
        processingTimeMs: 4,
      });

      expect(service.log).toHaveBeenCalledWith(
        'Batch Classification - Total: 10, Defaulted: 2, Processing Time: 4ms',
      );
      expect(service.warn).not.toHaveBeenCalled();
    });

    it('기본 분류 비율이 높으면 경고를 로그해야 함', () => {
      service.logBatchClassification({
        totalProblems: 4,
        defaultedCount: 3,
        processingTimeMs: 1,
      });

      expect(service.warn).toHaveBeenCalledWith(
        'High default classification rate: 75.00%',
      );
    });

    it('빈 배치에는 경고하지 않아야 함', () => {
      service.logBatchClassification({
        totalProblems: 0,
        defaultedCount: 0,
        processingTimeMs: 0,
      });

      expect(service.warn).not.toHaveBeenCalled();
    });
  });

  describe('AI 요청 로그', () => {
    it('성공한 요청을 로그해야 함', () => {
      service.logAiRequest({
        operation: AiOperation.CONSULTING_BRIEF,
        model: 'test-model',
        status: 'SUCCESS',
        durationMs: 1200,
      });

      expect(service.log).toHaveBeenCalledWith(
        'AI Request - Operation: CONSULTING_BRIEF, Model: test-model, Status: SUCCESS, Duration: 1200ms',
      );
    });

    it('설정되지 않은 요청은 경고로 로그해야 함', () => {
      service.logAiRequest({
        operation: AiOperation.RESEARCH_ANSWER,
        model: 'test-model',
        status: 'NOT_CONFIGURED',
        durationMs: 0,
      });

      expect(service.warn).toHaveBeenCalledWith(
        'AI Request - Operation: RESEARCH_ANSWER, Model: test-model, Status: NOT_CONFIGURED, Duration: 0ms',
      );
    });

    it('실패한 요청은 오류로 로그해야 함', () => {
      service.logAiRequest({
        operation: AiOperation.CONSULTING_BRIEF,
        model: 'test-model',
        status: 'FAILED',
        durationMs: 30,
        errorMessage: 'timeout',
      });

      expect(service.error).toHaveBeenCalledWith(
        'AI Request - Operation: CONSULTING_BRIEF, Model: test-model, Status: FAILED, Duration: 30ms, Error: timeout',
      );
    });
  });

  describe('리포트 로그', () => {
    it('리포트 생성을 로그해야 함', () => {
      service.logReportGenerated({
        domain: 'R2R',
        layout: 'classic',
        sizeBytes: 2048,
        durationMs: 15,
      });

      expect(service.log).toHaveBeenCalledWith(
        'Report Generated - Domain: R2R, Layout: classic, Size: 2048 bytes, Duration: 15ms',
      );
    });
  });
});
