import { memo } from "react";
import { Pressable, StyleSheet, Text, View } from "react-native";
import {
  DAYS_PER_WEEK,
  HOURS_PER_DAY,
  cellCount,
  formatHour,
  fullDayName,
  normalizedValue,
  type HeatmapCell,
  type HeatmapData,
} from "../../lib/heatmap";
import { heatmapCellColor, type HeatmapColorScheme } from "../../lib/heatmap-colors";
import {
  FULL_HEATMAP_CHROME,
  FULL_HEATMAP_METRICS,
  HOUR_LABELS,
  hourLabelWidth,
} from "../../lib/heatmap-layout";
import { useTheme } from "../../lib/theme";
import { useHeatmapSelection } from "../../hooks/use-heatmap-selection";
import { HeatmapDayLabels } from "./HeatmapDayLabels";
import { HeatmapLegend } from "./HeatmapLegend";

const metrics = FULL_HEATMAP_METRICS;
const DAYS = Array.from({ length: DAYS_PER_WEEK }, (_, index) => index);
const HOURS = Array.from({ length: HOURS_PER_DAY }, (_, index) => index);

export interface BehaviorHeatmapProps {
  data: HeatmapData;
  colorScheme: HeatmapColorScheme;
  onSelectCell?: (cell: HeatmapCell | null) => void;
  testID?: string;
}

export function cellAccessibilityLabel(day: number, hour: number, count: number) {
  return `${fullDayName(day)} ${formatHour(hour)}: ${count} ${count === 1 ? "event" : "events"}`;
}

interface HeatmapCellViewProps {
  day: number;
  hour: number;
  count: number;
  color: string;
  isSelected: boolean;
  selectedColor: string;
  onPress: (cell: HeatmapCell) => void;
}

const HeatmapCellView = memo(function HeatmapCellView({
  day,
  hour,
  count,
  color,
  isSelected,
  selectedColor,
  onPress,
}: HeatmapCellViewProps) {
  return (
    <Pressable
      testID={`heatmap-cell-${day}-${hour}`}
      role="button"
      aria-label={cellAccessibilityLabel(day, hour, count)}
      aria-selected={isSelected}
      onPress={() => onPress({ day, hour })}
      style={[
        styles.cell,
        {
          backgroundColor: color,
          borderColor: isSelected ? selectedColor : "transparent",
        },
      ]}
    />
  );
});

/** Day-by-hour grid of event counts with hour labels, day labels and a legend. */
export function BehaviorHeatmap({ data, colorScheme, onSelectCell, testID }: BehaviorHeatmapProps) {
  const theme = useTheme();
  const { selectCell, isSelected } = useHeatmapSelection(onSelectCell);

  return (
    <View style={styles.container} testID={testID}>
      <View style={styles.hourRow}>
        <View style={styles.hourLeadingSpace} />
        {HOUR_LABELS.map((label) => (
          <Text key={label} style={[styles.hourLabel, { color: theme.colors.secondaryText }]}>
            {label}
          </Text>
        ))}
      </View>

      <View style={styles.body}>
        <HeatmapDayLabels metrics={metrics} />

        <View style={styles.grid}>
          {DAYS.map((day) => (
            <View key={day} style={styles.gridRow}>
              {HOURS.map((hour) => (
                <HeatmapCellView
                  key={hour}
                  day={day}
                  hour={hour}
                  count={cellCount(data, day, hour)}
                  color={heatmapCellColor(normalizedValue(data, day, hour), colorScheme, theme)}
                  isSelected={isSelected(day, hour)}
                  selectedColor={theme.colors.primaryText}
                  onPress={selectCell}
                />
              ))}
            </View>
          ))}
        </View>
      </View>

      <HeatmapLegend colorScheme={colorScheme} />
    </View>
  );
}

const styles = StyleSheet.create({
  container: {
    gap: FULL_HEATMAP_CHROME.sectionSpacing,
  },
  hourRow: {
    flexDirection: "row",
  },
  hourLeadingSpace: {
    width: metrics.dayLabelWidth + metrics.gridSpacing,
  },
  hourLabel: {
    width: hourLabelWidth(metrics),
    fontSize: FULL_HEATMAP_CHROME.hourLabelFontSize,
  },
  body: {
    flexDirection: "row",
    gap: metrics.gridSpacing,
  },
  grid: {
    gap: metrics.cellGap,
  },
  gridRow: {
    flexDirection: "row",
    gap: metrics.cellGap,
  },
  cell: {
    width: metrics.cellWidth,
    height: metrics.cellHeight,
    borderRadius: metrics.cellRadius,
    borderWidth: 1,
  },
});
