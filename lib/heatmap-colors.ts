import type { Theme } from "./theme";

export type HeatmapColorScheme = "positive" | "challenge" | "neutral";

/** Five legend swatches, from empty to busiest. */
export const LEGEND_LEVELS = [0, 0.25, 0.5, 0.75, 1];

const MIN_OPACITY = 0.2;
const OPACITY_RANGE = 0.8;

export function withOpacity(hex: string, alpha: number): string {
  let normalized = hex.replace("#", "");
  if (normalized.length === 3) {
    normalized = normalized
      .split("")
      .map((char) => char + char)
      .join("");
  }
  if (!/^[0-9a-fA-F]{6}$/.test(normalized)) return hex;

  const r = parseInt(normalized.slice(0, 2), 16);
  const g = parseInt(normalized.slice(2, 4), 16);
  const b = parseInt(normalized.slice(4, 6), 16);
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
}

export function schemeBaseColor(scheme: HeatmapColorScheme, theme: Theme) {
  switch (scheme) {
    case "positive":
      return theme.colors.positive;
    case "challenge":
      return theme.colors.challenge;
    case "neutral":
      return theme.colors.accent;
  }
}

export function cellOpacity(value: number) {
  const clamped = Math.min(1, Math.max(0, value));
  return Math.round((MIN_OPACITY + clamped * OPACITY_RANGE) * 1000) / 1000;
}

export function heatmapCellColor(value: number, scheme: HeatmapColorScheme, theme: Theme) {
  if (value <= 0) return theme.colors.emptyCell;
  return withOpacity(schemeBaseColor(scheme, theme), cellOpacity(value));
}
