import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { ReportModule } from '../report/report.module';
import { DiagnosisController } from './diagnosis.controller';
import { DiagnosisService } from './diagnosis.service';
import { DomainClassifierService } from './domain-classifier.service';
import { RecommendationService } from './recommendation.service';

@Module({
  imports: [LlmModule, ReportModule],
  providers: [DiagnosisService, DomainClassifierService, RecommendationService],
  exports: [DomainClassifierService, RecommendationService],
  controllers: [DiagnosisController],
})
export class DiagnosisModule {}
