import { Test } from '@nestjs/testing';

import { brandAnalysisFixture } from '../../test/fixtures/brand-analysis.fixture';
import { MetricsService } from '../metrics';
import { PresentationModule } from './presentation.module';
import { PresentationService } from './presentation.service';

describe('PresentationService', () => {
  let service: PresentationService;
  let metrics: MetricsService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [PresentationModule],
    }).compile();

    service = moduleRef.get(PresentationService);
    metrics = moduleRef.get(MetricsService);
  });

  it('builds the three charts for an analysis', () => {
    const charts = service.buildCharts(brandAnalysisFixture());

    expect(charts.themes.bars.map((bar) => bar.label)).toEqual([
      'comedy',
      'lifestyle',
    ]);
    expect(charts.audience.slices).toHaveLength(3);
  });

  it('renders the report and counts it', async () => {
    const createdAt = new Date('2024-06-01T12:00:00Z');

    const first = service.renderReport(brandAnalysisFixture(), createdAt);
    const second = service.renderReport(brandAnalysisFixture(), createdAt);

    expect(first.equals(second)).toBe(true);
    expect(await metrics.getMetrics()).toContain(
      'pdf_reports_generated_total 2',
    );
  });
});
