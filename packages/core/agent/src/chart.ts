/**
 * Chart specifications built from campaign rows. Rendering happens elsewhere;
 * these are plain data descriptions.
 */

import type { CellValue, ChartSpec, DataRow } from '@campaign-agent/shared';
import type { PredefinedChart } from './types.js';

const TOP_CONVERSION_COUNT = 10;

function numeric(value: CellValue | undefined): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function label(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return String(value);
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function humanize(field: string): string {
  return field
    .split('_')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Group rows by `key` and fold the numeric `field` of each group
 */
function groupBy(rows: DataRow[], key: string, field: string): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  for (const row of rows) {
    const name = label(row[key]);
    const value = numeric(row[field]);
    if (name === null || value === null) {
      continue;
    }
    const values = groups.get(name) ?? [];
    values.push(value);
    groups.set(name, values);
  }
  return groups;
}

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);
const mean = (values: number[]): number => (values.length === 0 ? 0 : sum(values) / values.length);

function audienceByTopic(rows: DataRow[]): ChartSpec | null {
  const totals = [...groupBy(rows, 'campaign_topic', 'audience_size')]
    .map(([topic, values]): [string, number] => [topic, sum(values)])
    .sort((a, b) => b[1] - a[1]);
  if (totals.length === 0) {
    return null;
  }

  return {
    chart_type: 'bar',
    title: 'Audience Size by Campaign Topic',
    x: { field: 'campaign_topic', labels: totals.map(([topic]) => topic) },
    y: { field: 'audience_size' },
    series: [{ name: 'audience_size', values: totals.map(([, total]) => total) }],
  };
}

function topConversionRates(rows: DataRow[]): ChartSpec | null {
  const ranked = rows
    .flatMap(row => {
      const id = label(row.campaign_id);
      const rate = numeric(row.conversion_rate);
      return id === null || rate === null ? [] : [{ id, rate }];
    })
    .sort((a, b) => b.rate - a.rate)
    .slice(0, TOP_CONVERSION_COUNT);
  if (ranked.length === 0) {
    return null;
  }

  return {
    chart_type: 'bar',
    title: 'Top Campaigns by Conversion Rate',
    x: { field: 'campaign_id', labels: ranked.map(entry => entry.id) },
    y: { field: 'conversion_rate' },
    series: [{ name: 'conversion_rate', values: ranked.map(entry => entry.rate) }],
  };
}

function segmentPerformance(rows: DataRow[]): ChartSpec | null {
  const averages = [...groupBy(rows, 'customer_segment', 'conversion_rate')]
    .map(([segment, values]): [string, number] => [segment, round(mean(values))])
    .sort((a, b) => b[1] - a[1]);
  if (averages.length === 0) {
    return null;
  }

  return {
    chart_type: 'bar',
    title: 'Average Conversion Rate by Customer Segment',
    x: { field: 'customer_segment', labels: averages.map(([segment]) => segment) },
    y: { field: 'conversion_rate' },
    series: [{ name: 'conversion_rate', values: averages.map(([, average]) => average) }],
  };
}

const TREND_METRICS = ['conversion_rate', 'open_rate', 'click_rate'] as const;

function trends(rows: DataRow[]): ChartSpec | null {
  const byMetric = TREND_METRICS.map(metric => groupBy(rows, 'campaign_date', metric));
  const dates = [...new Set(byMetric.flatMap(groups => [...groups.keys()]))].sort();
  if (dates.length === 0) {
    return null;
  }

  return {
    chart_type: 'line',
    title: 'Campaign Performance Over Time',
    x: { field: 'campaign_date', labels: dates },
    y: { field: 'rate' },
    series: TREND_METRICS.map((metric, index) => ({
      name: metric,
      values: dates.map(date => round(mean(byMetric[index]?.get(date) ?? []))),
    })),
  };
}

/**
 * Build one of the predefined charts. Returns null when the rows carry
 * none of the fields the chart needs.
 */
export function buildChartSpec(kind: PredefinedChart, rows: DataRow[]): ChartSpec | null {
  switch (kind) {
    case 'audience_by_topic':
      return audienceByTopic(rows);
    case 'conversion_rate':
      return topConversionRates(rows);
    case 'segment_performance':
      return segmentPerformance(rows);
    case 'trends':
      return trends(rows);
  }
}

const LABEL_FIELDS = ['campaign_id', 'campaign_topic', 'customer_segment'];

/**
 * Plain bar chart of one metric across the returned rows, in row order
 */
export function buildRowsChart(rows: DataRow[], metric: string): ChartSpec | null {
  const labelField = LABEL_FIELDS.find(field => rows.some(row => label(row[field]) !== null));
  if (!labelField) {
    return null;
  }

  const points = rows.flatMap(row => {
    const name = label(row[labelField]);
    const value = numeric(row[metric]);
    return name === null || value === null ? [] : [{ name, value }];
  });
  if (points.length === 0) {
    return null;
  }

  return {
    chart_type: 'bar',
    title: `${humanize(metric)} by ${humanize(labelField)}`,
    x: { field: labelField, labels: points.map(point => point.name) },
    y: { field: metric },
    series: [{ name: metric, values: points.map(point => point.value) }],
  };
}
