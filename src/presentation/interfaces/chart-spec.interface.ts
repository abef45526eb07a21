export interface ChartPoint {
  label: string;
  value: number;
}

export interface RadarChartSpec {
  kind: 'radar';
  title: string;
  range: [number, number];
  axes: ChartPoint[];
}

export interface BarChartSpec {
  kind: 'bar';
  title: string;
  xAxisTitle: string;
  yAxisTitle: string;
  color: string;
  bars: ChartPoint[];
}

export interface PieSlice extends ChartPoint {
  detail: string;
}

export interface PieChartSpec {
  kind: 'pie';
  title: string;
  /** Inner radius as a fraction of the outer one. */
  hole: number;
  slices: PieSlice[];
}

/**
 * Library-agnostic chart descriptions the web client draws with recharts.
 */
export interface AnalysisCharts {
  engagement: RadarChartSpec;
  themes: BarChartSpec;
  audience: PieChartSpec;
}

export type ThemeWeight = (theme: string, index: number) => number;
