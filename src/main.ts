import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Request, Response } from 'express';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  // 글로벌 예외 필터 등록
  app.useGlobalFilters(new GlobalExceptionFilter());

  // 글로벌 유효성 검사 파이프 등록
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // CORS 설정
  app.enableCors({
    origin: configService.get<string>('NODE_ENV') !== 'production',
    credentials: true,
  });

  // Swagger 설정
  const config = new DocumentBuilder()
    .setTitle('재무 전환 진단 API')
    .setDescription(
      `재무 전환 문제를 도메인별로 분류하고 근본 원인과 권장 조치를 제시하는 API 문서\n\n
      ## 사용 방법\n
      1. \`/api/v1/diagnosis\` 로 문제 설명을 진단합니다.\n
      2. \`/api/v1/diagnosis/report\` 로 PDF 브리프를 생성합니다.\n
      3. AI 브리프와 Q&A 는 OPENAI_API_KEY 가 설정된 경우에만 사용할 수 있습니다.`,
    )
    .setVersion('1.0')
    .addTag('diagnosis', '🩺 문제 진단 관련 API')
    .addTag('research', '🔎 웹 검색 Q&A 관련 API')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  // 헬스 체크 엔드포인트
  app.getHttpAdapter().get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  await app.listen(configService.get<number>('PORT') ?? 3000);
  logger.log(`Application is running on: ${await app.getUrl()}`);
  logger.log(`Swagger documentation: ${await app.getUrl()}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.stack : String(error);
  new Logger('Bootstrap').error(`Application failed to start: ${message}`);
  process.exit(1);
});
