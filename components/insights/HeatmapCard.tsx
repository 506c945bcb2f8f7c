import { useCallback, useState } from "react";
import { StyleSheet, Text, View } from "react-native";
import { BehaviorHeatmap } from "../heatmap/BehaviorHeatmap";
import { cellCount, formatHour, fullDayName, type HeatmapCell, type HeatmapData } from "../../lib/heatmap";
import type { HeatmapColorScheme } from "../../lib/heatmap-colors";
import { useTheme } from "../../lib/theme";

interface HeatmapCardProps {
  title: string;
  data: HeatmapData;
  colorScheme: HeatmapColorScheme;
  /** Singular label for one event, e.g. "win". */
  noun: string;
  testID?: string;
}

export function describeCell(heatmap: HeatmapData, { day, hour }: HeatmapCell, noun: string) {
  const count = cellCount(heatmap, day, hour);
  return `${fullDayName(day)} around ${formatHour(hour)}: ${count} ${noun}${count === 1 ? "" : "s"}`;
}

/** Titled full heatmap that captions its own selected cell. */
export function HeatmapCard({ title, data, colorScheme, noun, testID = "heatmap-card" }: HeatmapCardProps) {
  const theme = useTheme();
  const [selectedCell, setSelectedCell] = useState<HeatmapCell | null>(null);
  const onSelectCell = useCallback((cell: HeatmapCell | null) => setSelectedCell(cell), []);

  return (
    <View style={[styles.card, { backgroundColor: theme.colors.surface }]} testID={testID}>
      <Text style={[styles.title, { color: theme.colors.primaryText }]}>{title}</Text>
      {selectedCell ? (
        <Text style={[styles.caption, { color: theme.colors.primaryText }]} testID={`${testID}-caption`}>
          {describeCell(data, selectedCell, noun)}
        </Text>
      ) : null}
      <BehaviorHeatmap data={data} colorScheme={colorScheme} onSelectCell={onSelectCell} />
    </View>
  );
}

const styles = StyleSheet.create({
  card: {
    borderRadius: 12,
    padding: 14,
    gap: 10,
  },
  title: {
    fontSize: 15,
    fontWeight: "700",
  },
  caption: {
    fontSize: 14,
    fontWeight: "600",
  },
});
