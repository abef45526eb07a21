import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  Legend,
  Pie,
  PieChart,
  PolarAngleAxis,
  PolarGrid,
  PolarRadiusAxis,
  Radar,
  RadarChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';

import type { AnalysisCharts } from '../types';

const PIE_COLORS = ['#636efa', '#ef553b', '#00cc96'];

type Props = {
  charts: AnalysisCharts;
};

export function ChartsTab({ charts }: Props) {
  const { engagement, themes, audience } = charts;

  return (
    <section>
      <h2>Data Visualization</h2>

      <h3>Engagement Analysis</h3>
      <figure className="chart">
        <figcaption>{engagement.title}</figcaption>
        <ResponsiveContainer width="100%" height="100%">
          <RadarChart data={engagement.axes}>
            <PolarGrid />
            <PolarAngleAxis dataKey="label" />
            <PolarRadiusAxis domain={engagement.range} tickCount={6} />
            <Radar
              dataKey="value"
              stroke="#636efa"
              fill="rgba(99, 110, 250, 0.3)"
              fillOpacity={1}
            />
          </RadarChart>
        </ResponsiveContainer>
      </figure>

      <h3>Content Themes Analysis</h3>
      <figure className="chart">
        <figcaption>{themes.title}</figcaption>
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={themes.bars} margin={{ bottom: 24, left: 8 }}>
            <CartesianGrid strokeDasharray="3 3" vertical={false} />
            <XAxis
              dataKey="label"
              label={{
                value: themes.xAxisTitle,
                position: 'insideBottom',
                offset: -16,
              }}
            />
            <YAxis
              label={{
                value: themes.yAxisTitle,
                angle: -90,
                position: 'insideLeft',
              }}
            />
            <Tooltip />
            <Bar dataKey="value" name={themes.yAxisTitle} fill={themes.color} />
          </BarChart>
        </ResponsiveContainer>
      </figure>

      <h3>Audience Demographics</h3>
      <figure className="chart">
        <figcaption>{audience.title}</figcaption>
        <ResponsiveContainer width="100%" height="100%">
          <PieChart>
            <Pie
              data={audience.slices}
              dataKey="value"
              nameKey="label"
              innerRadius={`${Math.round(audience.hole * 80)}%`}
              outerRadius="80%"
              label
            >
              {audience.slices.map((slice, index) => (
                <Cell
                  key={slice.label}
                  fill={PIE_COLORS[index % PIE_COLORS.length]}
                />
              ))}
            </Pie>
            <Legend />
          </PieChart>
        </ResponsiveContainer>
        <ul className="muted">
          {audience.slices.map((slice) => (
            <li key={slice.label}>
              <strong>{slice.label}:</strong> {slice.detail}
            </li>
          ))}
        </ul>
      </figure>
    </section>
  );
}
