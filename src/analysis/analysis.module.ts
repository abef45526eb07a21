import { Module } from '@nestjs/common';

import { AppConfigModule, GcpConfigModule } from '@libs/config';

import { MetricsModule } from '../metrics';
import { MODEL_CLIENT } from './analysis.constants';
import { AnalysisService } from './analysis.service';
import { GeminiClientService } from './gemini/gemini-client.service';
import { promptTemplateProvider } from './prompt/prompt-template.provider';

@Module({
  imports: [AppConfigModule, GcpConfigModule, MetricsModule],
  providers: [
    GeminiClientService,
    {
      provide: MODEL_CLIENT,
      useExisting: GeminiClientService,
    },
    promptTemplateProvider,
    AnalysisService,
  ],
  exports: [AnalysisService],
})
export class AnalysisModule {}
