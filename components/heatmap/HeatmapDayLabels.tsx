import { StyleSheet, Text, View } from "react-native";
import { DAY_LABELS, type HeatmapMetrics } from "../../lib/heatmap-layout";
import { useTheme } from "../../lib/theme";

export function HeatmapDayLabels({ metrics }: { metrics: HeatmapMetrics }) {
  const theme = useTheme();

  return (
    <View style={{ gap: metrics.cellGap }}>
      {DAY_LABELS.map((label, day) => (
        <Text
          key={day}
          style={[
            styles.label,
            {
              width: metrics.dayLabelWidth,
              height: metrics.cellHeight,
              lineHeight: metrics.cellHeight,
              fontSize: metrics.dayLabelFontSize,
              color: theme.colors.secondaryText,
            },
          ]}
        >
          {label}
        </Text>
      ))}
    </View>
  );
}

const styles = StyleSheet.create({
  label: {
    fontWeight: "500",
    textAlign: "center",
  },
});
