import { StyleSheet, Text, View } from "react-native";
import { formatHour, type PeakTimeSlot } from "../../lib/heatmap";
import { useTheme } from "../../lib/theme";

interface PeakTimesListProps {
  peaks: PeakTimeSlot[];
  limit?: number;
}

export function PeakTimesList({ peaks, limit = 3 }: PeakTimesListProps) {
  const theme = useTheme();
  const visible = peaks.slice(0, limit);

  if (visible.length === 0) {
    return (
      <Text style={[styles.empty, { color: theme.colors.secondaryText }]}>
        No standout times yet. Keep logging moments to see patterns.
      </Text>
    );
  }

  return (
    <View style={styles.list}>
      {visible.map((peak) => (
        <View key={`${peak.dayIndex}-${peak.hour}`} style={styles.row}>
          <Text style={[styles.time, { color: theme.colors.primaryText }]}>
            {peak.dayName} {formatHour(peak.hour)}
          </Text>
          <Text style={[styles.count, { color: theme.colors.secondaryText }]}>
            {peak.eventCount} {peak.eventCount === 1 ? "moment" : "moments"}
          </Text>
        </View>
      ))}
    </View>
  );
}

const styles = StyleSheet.create({
  list: {
    gap: 6,
  },
  row: {
    flexDirection: "row",
    justifyContent: "space-between",
  },
  time: {
    fontSize: 14,
    fontWeight: "600",
  },
  count: {
    fontSize: 13,
  },
  empty: {
    fontSize: 13,
  },
});
