import { StyleSheet, Text, View } from "react-native";
import { LEGEND_LEVELS, heatmapCellColor, type HeatmapColorScheme } from "../../lib/heatmap-colors";
import { FULL_HEATMAP_CHROME } from "../../lib/heatmap-layout";
import { useTheme } from "../../lib/theme";

export function HeatmapLegend({ colorScheme }: { colorScheme: HeatmapColorScheme }) {
  const theme = useTheme();
  const labelStyle = [styles.label, { color: theme.colors.secondaryText }];

  return (
    <View style={styles.row} testID="heatmap-legend">
      <Text style={labelStyle}>Less</Text>
      {LEGEND_LEVELS.map((level) => (
        <View
          key={level}
          testID={`heatmap-legend-swatch-${level}`}
          style={[styles.swatch, { backgroundColor: heatmapCellColor(level, colorScheme, theme) }]}
        />
      ))}
      <Text style={labelStyle}>More</Text>
    </View>
  );
}

const styles = StyleSheet.create({
  row: {
    flexDirection: "row",
    alignItems: "center",
    gap: FULL_HEATMAP_CHROME.legendSpacing,
  },
  label: {
    fontSize: FULL_HEATMAP_CHROME.legendFontSize,
  },
  swatch: {
    width: FULL_HEATMAP_CHROME.legendSwatchSize,
    height: FULL_HEATMAP_CHROME.legendSwatchSize,
    borderRadius: 2,
  },
});
