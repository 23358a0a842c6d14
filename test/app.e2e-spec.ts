import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, Logger, ValidationPipe } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from './../src/app.module';
import { GlobalExceptionFilter } from '../src/common/filters/global-exception.filter';
import { OPENAI_CLIENT } from '../src/llm/interfaces/llm.interface';
import { NOT_CONFIGURED_MESSAGE } from '../src/llm/llm.service';
import { WebSearchService } from '../src/search/web-search.service';
import { SearchStatus } from '../src/search/interfaces/web-search.interface';

describe('Finance Copilot E2E Tests', () => {
  const mockWebSearchService = {
    search: jest.fn(),
  };

  async function createApp(openAiClient: unknown): Promise<INestApplication> {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(OPENAI_CLIENT)
      .useFactory({ factory: () => openAiClient })
      .overrideProvider(WebSearchService)
      .useValue(mockWebSearchService)
      .compile();

    const app = moduleFixture.createNestApplication();
    app.useGlobalFilters(new GlobalExceptionFilter());
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );
    await app.init();
    return app;
  }

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  describe('AI 키가 없는 환경', () => {
    let app: INestApplication;

    beforeAll(async () => {
      app = await createApp(null);
    });

    afterAll(async () => {
      await app.close();
    });

    describe('/api/v1/diagnosis (POST)', () => {
      it('문제 설명을 진단해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/diagnosis')
          .send({ problem: 'Intercompany balances never match' })
          .expect(200);

        expect(response.body.domain).toBe('Intercompany');
        expect(response.body.domainDisplayName).toBe('Intercompany');
        expect(response.body.matchedKeyword).toBe('intercompany');
        expect(response.body.recommendation.title).toBe(
          'Intercompany Root Cause Diagnosis',
        );
        expect(response.body.ai).toEqual({
          status: 'SKIPPED',
          brief: null,
          message: null,
        });
      });

      it('빈 문제 설명은 General Finance 로 진단해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/diagnosis')
          .send({ problem: '' })
          .expect(200);

        expect(response.body.domain).toBe('GeneralFinance');
        expect(response.body.matchedKeyword).toBeNull();
      });

      it('AI 브리프 요청 시 UNAVAILABLE 상태와 규칙 기반 결과를 반환해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/diagnosis')
          .send({ problem: 'Our month-end close is slow', includeAiBrief: true })
          .expect(200);

        expect(response.body.domain).toBe('R2R');
        expect(response.body.ai).toEqual({
          status: 'UNAVAILABLE',
          brief: null,
          message: NOT_CONFIGURED_MESSAGE,
        });
      });

      it('problem 이 없으면 400 을 반환해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/diagnosis')
          .send({})
          .expect(400);

        expect(response.body.statusCode).toBe(400);
        expect(response.body.error).toBe('Bad Request');
        expect(response.body.path).toBe('/api/v1/diagnosis');
      });

      it('최대 길이를 넘는 문제 설명은 400 을 반환해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/diagnosis')
          .send({ problem: 'a'.repeat(20001) })
          .expect(400);

        expect(response.body.message).toBe(
          'problem must be at most 20000 characters',
        );
      });
    });

    describe('/api/v1/diagnosis/batch (POST)', () => {
      it('일괄 분류 결과와 통계를 반환해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/diagnosis/batch')
          .send({ problems: ['procure delays', 'budget variance'] })
          .expect(200);

        expect(response.body.results).toEqual([
          { index: 0, domain: 'P2P', matchedKeyword: 'procure' },
          { index: 1, domain: 'GeneralFinance', matchedKeyword: null },
        ]);
        expect(response.body.stats.totalCount).toBe(2);
        expect(response.body.stats.defaultedCount).toBe(1);
      });

      it('빈 목록은 400 을 반환해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/diagnosis/batch')
          .send({ problems: [] })
          .expect(400);

        expect(response.body.message).toBe(
          'problems must have at least one item',
        );
      });
    });

    describe('/api/v1/diagnosis/report (POST)', () => {
      it('PDF 를 반환해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/diagnosis/report')
          .send({
            problem: 'Consolidation takes three weeks',
            companyName: 'Example Holdings',
            industry: 'Manufacturing',
          })
          .responseType('blob')
          .expect(200);

        expect(response.headers['content-type']).toContain('application/pdf');
        expect(response.headers['content-disposition']).toBe(
          'attachment; filename="consulting-brief.pdf"',
        );
        expect(Buffer.isBuffer(response.body)).toBe(true);
        expect(response.body.subarray(0, 5).toString('latin1')).toBe('%PDF-');
      });

      it('알 수 없는 레이아웃은 400 을 반환해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/diagnosis/report')
          .send({
            problem: 'x',
            companyName: 'Example Holdings',
            industry: 'Manufacturing',
            layout: 'poster',
          })
          .expect(400);

        expect(response.headers['content-type']).toMatch(/application\/json/);
        expect(response.headers['content-disposition']).toBeUndefined();
        expect(response.body.message).toBe(
          'layout must be one of: classic, compact',
        );
      });
    });

    describe('/api/v1/diagnosis/domains (GET)', () => {
      it('도메인 목록을 우선순위 순으로 반환해야 함', async () => {
        const response = await request(app.getHttpServer())
          .get('/api/v1/diagnosis/domains')
          .expect(200);

        expect(
          response.body.map((item: { domain: string }) => item.domain),
        ).toEqual([
          'Intercompany',
          'Consolidation',
          'P2P',
          'O2C',
          'R2R',
          'GeneralFinance',
        ]);
      });
    });

    describe('/api/v1/research/ask (POST)', () => {
      it('AI 가 설정되지 않았으면 503 을 반환해야 함', async () => {
        const response = await request(app.getHttpServer())
          .post('/api/v1/research/ask')
          .send({ question: 'What is DSO?' })
          .expect(503);

        expect(response.body.error).toBe('Service Unavailable');
        expect(mockWebSearchService.search).not.toHaveBeenCalled();
      });
    });
  });

  describe('AI 키가 있는 환경', () => {
    let app: INestApplication;
    const createCompletion = jest.fn();

    beforeAll(async () => {
      app = await createApp({ chat: { completions: { create: createCompletion } } });
    });

    afterAll(async () => {
      await app.close();
    });

    beforeEach(() => {
      createCompletion.mockReset();
      mockWebSearchService.search.mockReset();
    });

    it('AI 브리프를 포함한 진단을 반환해야 함', async () => {
      createCompletion.mockResolvedValue({
        choices: [{ message: { content: '# Consulting Brief: Faster O2C' } }],
      });

      const response = await request(app.getHttpServer())
        .post('/api/v1/diagnosis')
        .send({ problem: 'order to cash is slow', includeAiBrief: true })
        .expect(200);

      expect(response.body.domain).toBe('O2C');
      expect(response.body.ai).toEqual({
        status: 'GENERATED',
        brief: '# Consulting Brief: Faster O2C',
        message: null,
      });
    });

    it('검색 없이도 질문에 답변해야 함', async () => {
      mockWebSearchService.search.mockResolvedValue({
        status: SearchStatus.NOT_CONFIGURED,
      });
      createCompletion.mockResolvedValue({
        choices: [{ message: { content: 'DSO measures collection speed.' } }],
      });

      const response = await request(app.getHttpServer())
        .post('/api/v1/research/ask')
        .send({ question: '  What is DSO?  ' })
        .expect(200);

      expect(response.body).toEqual({
        question: 'What is DSO?',
        answer: 'DSO measures collection speed.',
        sources: [],
        searchStatus: 'NOT_CONFIGURED',
      });
    });
  });
});
