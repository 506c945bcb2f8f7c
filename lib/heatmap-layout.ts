import { HOURS_PER_DAY } from "./heatmap";

export const DAY_LABELS = ["M", "T", "W", "T", "F", "S", "S"];
export const HOUR_LABELS = ["12a", "6a", "12p", "6p"];
export const HOURS_PER_LABEL = 6;

export interface HeatmapMetrics {
  cellWidth: number;
  cellHeight: number;
  cellGap: number;
  cellRadius: number;
  dayLabelWidth: number;
  dayLabelFontSize: number;
  gridSpacing: number;
}

export const FULL_HEATMAP_METRICS: HeatmapMetrics = {
  cellWidth: 10,
  cellHeight: 14,
  cellGap: 2,
  cellRadius: 2,
  dayLabelWidth: 14,
  dayLabelFontSize: 9,
  gridSpacing: 4,
};

export const COMPACT_HEATMAP_METRICS: HeatmapMetrics = {
  cellWidth: 6,
  cellHeight: 8,
  cellGap: 1,
  cellRadius: 1,
  dayLabelWidth: 10,
  dayLabelFontSize: 7,
  gridSpacing: 2,
};

export const FULL_HEATMAP_CHROME = {
  sectionSpacing: 8,
  hourLabelFontSize: 8,
  legendSwatchSize: 12,
  legendFontSize: 9,
  legendSpacing: 4,
};

export function heatmapGridWidth(metrics: HeatmapMetrics) {
  return HOURS_PER_DAY * metrics.cellWidth + (HOURS_PER_DAY - 1) * metrics.cellGap;
}

/** Width of one hour label, spanning the cells it covers. */
export function hourLabelWidth(metrics: HeatmapMetrics) {
  return metrics.cellWidth * HOURS_PER_LABEL + metrics.cellGap * HOURS_PER_LABEL;
}
