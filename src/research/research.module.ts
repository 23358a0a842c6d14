import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { SearchModule } from '../search/search.module';
import { ResearchController } from './research.controller';
import { ResearchService } from './research.service';

@Module({
  imports: [LlmModule, SearchModule],
  providers: [ResearchService],
  controllers: [ResearchController],
})
export class ResearchModule {}
