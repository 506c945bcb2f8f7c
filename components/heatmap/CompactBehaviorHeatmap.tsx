import { StyleSheet, View } from "react-native";
import { DAYS_PER_WEEK, HOURS_PER_DAY, normalizedValue, type HeatmapData } from "../../lib/heatmap";
import { heatmapCellColor, type HeatmapColorScheme } from "../../lib/heatmap-colors";
import { COMPACT_HEATMAP_METRICS } from "../../lib/heatmap-layout";
import { useTheme } from "../../lib/theme";
import { HeatmapDayLabels } from "./HeatmapDayLabels";

const metrics = COMPACT_HEATMAP_METRICS;
const DAYS = Array.from({ length: DAYS_PER_WEEK }, (_, index) => index);
const HOURS = Array.from({ length: HOURS_PER_DAY }, (_, index) => index);

export interface CompactBehaviorHeatmapProps {
  data: HeatmapData;
  colorScheme: HeatmapColorScheme;
  testID?: string;
}

// Dashboard-sized, read-only: no hour labels, no legend, no selection.
export function CompactBehaviorHeatmap({ data, colorScheme, testID }: CompactBehaviorHeatmapProps) {
  const theme = useTheme();

  return (
    <View style={styles.container} testID={testID}>
      <HeatmapDayLabels metrics={metrics} />
      <View style={styles.grid}>
        {DAYS.map((day) => (
          <View key={day} style={styles.gridRow}>
            {HOURS.map((hour) => (
              <View
                key={hour}
                testID={`compact-heatmap-cell-${day}-${hour}`}
                style={[
                  styles.cell,
                  { backgroundColor: heatmapCellColor(normalizedValue(data, day, hour), colorScheme, theme) },
                ]}
              />
            ))}
          </View>
        ))}
      </View>
    </View>
  );
}

const styles = StyleSheet.create({
  container: {
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
  },
});
