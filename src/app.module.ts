import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CommonModule } from './common/common.module';
import { validateEnvironment } from './config/env.validation';
import { DiagnosisModule } from './diagnosis/diagnosis.module';
import { ResearchModule } from './research/research.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    CommonModule,
    DiagnosisModule,
    ResearchModule,
  ],
})
export class AppModule {}
