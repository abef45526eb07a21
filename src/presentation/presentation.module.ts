import { Module } from '@nestjs/common';

import { MetricsModule } from '../metrics';
import { PresentationService } from './presentation.service';

@Module({
  imports: [MetricsModule],
  providers: [PresentationService],
  exports: [PresentationService],
})
export class PresentationModule {}
