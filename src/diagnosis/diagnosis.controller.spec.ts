import { Test, TestingModule } from '@nestjs/testing';
import { Logger, StreamableFile } from '@nestjs/common';
import { DiagnosisController } from './diagnosis.controller';
import { AiBriefStatus, DiagnosisService } from './diagnosis.service';
import { DomainLabel } from './interfaces/diagnosis.interface';

describe('DiagnosisController', () => {
  let controller: DiagnosisController;

  const mockDiagnosisService = {
    diagnose: jest.fn(),
    diagnoseBatch: jest.fn(),
    generateReport: jest.fn(),
    listDomains: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [DiagnosisController],
      providers: [
        { provide: DiagnosisService, useValue: mockDiagnosisService },
      ],
    }).compile();

    controller = module.get<DiagnosisController>(DiagnosisController);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('includeAiBrief 가 없으면 false 로 진단을 요청해야 함', async () => {
    const diagnosis = {
      domain: DomainLabel.R2R,
      ai: { status: AiBriefStatus.SKIPPED, brief: null, message: null },
    };
    mockDiagnosisService.diagnose.mockResolvedValue(diagnosis);

    const result = await controller.diagnose({ problem: 'slow close' });

    expect(mockDiagnosisService.diagnose).toHaveBeenCalledWith(
      'slow close',
      false,
    );
    expect(result).toBe(diagnosis);
  });

  it('일괄 분류 요청을 서비스에 위임해야 함', () => {
    const batch = { results: [], stats: { totalCount: 0 } };
    mockDiagnosisService.diagnoseBatch.mockReturnValue(batch);

    const result = controller.diagnoseBatch({ problems: ['a', 'b'] });

    expect(mockDiagnosisService.diagnoseBatch).toHaveBeenCalledWith([
      'a',
      'b',
    ]);
    expect(result).toBe(batch);
  });

  it('리포트를 StreamableFile 로 반환해야 함', async () => {
    const content = Buffer.from('%PDF-1.3');
    mockDiagnosisService.generateReport.mockResolvedValue({
      domain: DomainLabel.P2P,
      content,
    });

    const result = await controller.generateReport({
      problem: 'procure delays',
      companyName: 'Example Holdings',
      industry: 'Retail',
    });

    expect(result).toBeInstanceOf(StreamableFile);
    expect(result.getHeaders()).toEqual({
      type: 'application/pdf',
      disposition: 'attachment; filename="consulting-brief.pdf"',
      length: 8,
    });
    expect(result.getStream().read()).toEqual(content);
  });

  it('리포트 생성 실패 시 예외를 그대로 전파해야 함', async () => {
    mockDiagnosisService.generateReport.mockRejectedValue(
      new Error('render failed'),
    );

    await expect(
      controller.generateReport({
        problem: 'procure delays',
        companyName: 'Example Holdings',
        industry: 'Retail',
      }),
    ).rejects.toThrow('render failed');
  });

  it('도메인 목록을 반환해야 함', () => {
    mockDiagnosisService.listDomains.mockReturnValue([
      { domain: DomainLabel.INTERCOMPANY },
    ]);

    expect(controller.listDomains()).toEqual([
      { domain: DomainLabel.INTERCOMPANY },
    ]);
  });
});
