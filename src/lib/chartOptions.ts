import type { EChartsOption } from 'echarts';
import { buildSensitivityKey, formatDecimal, formatRunTimestamp, toLocalTimestamp } from '../../shared/format';
import type { DaySeries, RunRecord, SensitivitySeries } from '../../shared/types';

export type ThemeMode = 'light' | 'dark';

interface PointDatum {
  name: string;
  value: [string, number];
}

const RUN_POINT_COLOR = '#2563eb';
const AVERAGE_LINE_COLOR = '#f97316';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function averageScore(runs: RunRecord[]): number {
  if (runs.length === 0) {
    return Number.NaN;
  }
  return runs.reduce((total, run) => total + run.score, 0) / runs.length;
}

export function accuracyPercent(run: RunRecord): number {
  return Math.round(run.accuracy * 100 * 100) / 100;
}

export function runTooltip(run: RunRecord, sensitivityKey: string): string {
  return [
    `<b>${escapeHtml(formatRunTimestamp(run.timestamp))}</b>`,
    `<b>Score</b>: ${formatDecimal(run.score)}`,
    `<b>Sensitivity</b>: ${escapeHtml(sensitivityKey)}`,
    `<b>Accuracy</b>: ${accuracyPercent(run)}%`
  ].join('<br/>');
}

function chartTitle(scenario: string, updatedAt: Date): string {
  return `${scenario} (updated: ${formatRunTimestamp(toLocalTimestamp(updatedAt))})`;
}

function baseOption(title: string, xAxisName: string, categories: string[], theme: ThemeMode): EChartsOption {
  const axisColor = theme === 'dark' ? '#cbd5e1' : '#334155';
  return {
    backgroundColor: 'transparent',
    title: { text: title, left: 'center', textStyle: { fontSize: 16 } },
    legend: { top: 32, data: ['Run Data Point', 'Average Score'] },
    grid: { left: 64, right: 32, top: 80, bottom: 64 },
    tooltip: { trigger: 'item' },
    xAxis: {
      type: 'category',
      name: xAxisName,
      nameLocation: 'middle',
      nameGap: 36,
      data: categories,
      axisLabel: { color: axisColor }
    },
    yAxis: {
      type: 'value',
      name: 'Score',
      scale: true,
      axisLabel: { color: axisColor }
    }
  };
}

function buildSeries(groups: Array<{ category: string; runs: RunRecord[] }>): EChartsOption['series'] {
  const points: PointDatum[] = [];
  for (const group of groups) {
    for (const run of group.runs) {
      const sensitivityKey = buildSensitivityKey(run.horizontalSensitivity, run.sensitivityScale);
      points.push({ name: runTooltip(run, sensitivityKey), value: [group.category, run.score] });
    }
  }

  const averages = groups.map((group) => [group.category, Math.round(averageScore(group.runs) * 100) / 100]);

  return [
    {
      type: 'scatter',
      name: 'Run Data Point',
      data: points,
      symbolSize: 10,
      itemStyle: { color: RUN_POINT_COLOR },
      tooltip: { formatter: '{b}' }
    },
    {
      type: 'line',
      name: 'Average Score',
      data: averages,
      itemStyle: { color: AVERAGE_LINE_COLOR },
      lineStyle: { color: AVERAGE_LINE_COLOR },
      tooltip: { formatter: '<b>Average Score</b>: {c}' }
    }
  ];
}

export function sensitivityChartOption(
  scenario: string,
  series: SensitivitySeries[],
  theme: ThemeMode,
  updatedAt: Date
): EChartsOption {
  const groups = series.map((item) => ({ category: item.sensitivityKey, runs: item.runs }));
  return {
    ...baseOption(
      chartTitle(scenario, updatedAt),
      'Sensitivity',
      groups.map((group) => group.category),
      theme
    ),
    series: buildSeries(groups)
  };
}

export function timeChartOption(scenario: string, series: DaySeries[], theme: ThemeMode, updatedAt: Date): EChartsOption {
  const groups = series.map((item) => ({ category: item.date, runs: item.runs }));
  return {
    ...baseOption(
      chartTitle(scenario, updatedAt),
      'Date',
      groups.map((group) => group.category),
      theme
    ),
    series: buildSeries(groups)
  };
}
