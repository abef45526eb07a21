import { BrandAnalysis } from '../../analysis';
import {
  AnalysisCharts,
  BarChartSpec,
  ChartPoint,
  PieChartSpec,
  RadarChartSpec,
  ThemeWeight,
} from '../interfaces';

// Illustrative values: the model returns engagement as free text only.
const ENGAGEMENT_PLACEHOLDER: readonly ChartPoint[] = [
  { label: 'Audience Reach', value: 0.8 },
  { label: 'Comments', value: 0.7 },
  { label: 'Shares', value: 0.6 },
  { label: 'Likes', value: 0.9 },
  { label: 'Saves', value: 0.5 },
];

export const THEME_BAR_COLOR = 'rgb(26, 118, 255)';

/** Label length stands in for relevance until the model scores themes. */
export const labelLengthWeight: ThemeWeight = (theme) => theme.length;

export function buildEngagementRadar(): RadarChartSpec {
  return {
    kind: 'radar',
    title: 'Engagement Metrics',
    range: [0, 1],
    axes: ENGAGEMENT_PLACEHOLDER.map((point) => ({ ...point })),
  };
}

export function buildThemesBar(
  analysis: Pick<BrandAnalysis, 'temas_abordados'>,
  weight: ThemeWeight = labelLengthWeight,
): BarChartSpec {
  return {
    kind: 'bar',
    title: 'Content Themes Distribution',
    xAxisTitle: 'Themes',
    yAxisTitle: 'Relevance',
    color: THEME_BAR_COLOR,
    bars: analysis.temas_abordados.map((theme, index) => ({
      label: theme,
      value: weight(theme, index),
    })),
  };
}

export function buildAudiencePie(
  analysis: Pick<BrandAnalysis, 'publico_alvo_estimado'>,
): PieChartSpec {
  const audience = analysis.publico_alvo_estimado;

  return {
    kind: 'pie',
    title: 'Audience Demographics',
    hole: 0.3,
    slices: [
      { label: 'Age', value: 1, detail: audience.faixa_etaria },
      { label: 'Gender', value: 1, detail: audience.genero },
      { label: 'Location', value: 1, detail: audience.localizacao_geografica },
    ],
  };
}

export function buildAnalysisCharts(
  analysis: BrandAnalysis,
  weight?: ThemeWeight,
): AnalysisCharts {
  return {
    engagement: buildEngagementRadar(),
    themes: buildThemesBar(analysis, weight),
    audience: buildAudiencePie(analysis),
  };
}
