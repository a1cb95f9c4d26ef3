/**
 * Chart presets for the composite index and its components.
 */

import type { ComponentSeries, Series } from '../feargreed/contracts/feargreed.types.js';
import { INDEX_CHART_TITLE, INDEX_LINE_COLOR, SENTIMENT_ZONES } from '../feargreed/feargreed.config.js';
import type { ChartSpec } from './chart.svg.js';

export function indexChartSpec(series: Series): ChartSpec {
  return {
    title: INDEX_CHART_TITLE,
    overlays: [{ label: 'Fear & Greed Index', color: INDEX_LINE_COLOR, series, strokeWidth: 2 }],
    width: 1200,
    height: 600,
    yAxis: { min: 0, max: 100 },
    xLabel: 'Date',
    yLabel: 'Index Value',
    monthInterval: 1,
    bands: SENTIMENT_ZONES,
    guides: [25, 45, 55, 75],
    legend: true,
  };
}

export function componentChartSpec(component: ComponentSeries): ChartSpec {
  return {
    title: `${component.info.title} (Last 12 Months)`,
    overlays: [{ color: component.info.color, series: component.series, strokeWidth: 1.5 }],
    width: 1000,
    height: 500,
    yAxis: 'auto',
    xLabel: 'Date',
    yLabel: 'Value',
    monthInterval: 2,
  };
}
