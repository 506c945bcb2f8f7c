import { useState } from "react";
import { Pressable, StyleSheet, Text, View } from "react-native";
import { Stack } from "expo-router";
import { BehaviorHeatmap } from "../components/heatmap/BehaviorHeatmap";
import { CompactBehaviorHeatmap } from "../components/heatmap/CompactBehaviorHeatmap";
import { ChipRow } from "../components/insights/ChipRow";
import { ScreenContainer } from "../components/layout/ScreenContainer";
import { createSampleHeatmapData } from "../lib/heatmap";
import type { HeatmapColorScheme } from "../lib/heatmap-colors";
import { useTheme } from "../lib/theme";

const SCHEMES: { value: HeatmapColorScheme; label: string }[] = [
  { value: "positive", label: "Positive" },
  { value: "challenge", label: "Challenge" },
  { value: "neutral", label: "Neutral" },
];

type ContainerMode = "scroll" | "static";

/** Development gallery for the heatmaps and both ScreenContainer modes, fed by sample data. */
export default function PreviewScreen() {
  const theme = useTheme();
  const [scheme, setScheme] = useState<HeatmapColorScheme>("positive");
  const [containerMode, setContainerMode] = useState<ContainerMode>("scroll");
  const [sample, setSample] = useState(() => createSampleHeatmapData());
  const textPrimary = { color: theme.colors.primaryText };

  const controls = (
    <View style={styles.section}>
      <ChipRow options={SCHEMES} selected={scheme} onSelect={setScheme} />
      <ChipRow
        options={[
          { value: "scroll", label: "With scroll view" },
          { value: "static", label: "Without scroll view" },
        ]}
        selected={containerMode}
        onSelect={setContainerMode}
      />
      <Pressable onPress={() => setSample(createSampleHeatmapData())}>
        <Text style={[styles.link, { color: theme.colors.accent }]}>Shuffle sample data</Text>
      </Pressable>
    </View>
  );

  const heatmaps = (
    <>
      <View style={styles.section}>
        <Text style={[styles.heading, textPrimary]}>Full heatmap</Text>
        <BehaviorHeatmap data={sample} colorScheme={scheme} />
      </View>
      <View style={styles.section}>
        <Text style={[styles.heading, textPrimary]}>Compact heatmap</Text>
        <CompactBehaviorHeatmap data={sample} colorScheme={scheme} />
      </View>
    </>
  );

  return (
    <>
      <Stack.Screen options={{ headerShown: true, title: "Component preview" }} />
      {containerMode === "scroll" ? (
        <ScreenContainer isTabBarScreen={false}>
          <View style={styles.stack}>
            {controls}
            {heatmaps}
            {Array.from({ length: 12 }, (_, index) => (
              <View key={index} style={[styles.filler, { backgroundColor: theme.colors.surface }]}>
                <Text style={textPrimary}>Item {index}</Text>
              </View>
            ))}
          </View>
        </ScreenContainer>
      ) : (
        <ScreenContainer isTabBarScreen={false} needsScrollView={false}>
          <View style={[styles.stack, styles.staticContent]}>
            {controls}
            {heatmaps}
            <View style={styles.spacer} />
            <Text style={[styles.heading, textPrimary]}>Pinned to the bottom</Text>
          </View>
        </ScreenContainer>
      )}
    </>
  );
}

const styles = StyleSheet.create({
  stack: {
    gap: 20,
  },
  staticContent: {
    flex: 1,
    padding: 16,
  },
  section: {
    gap: 8,
  },
  heading: {
    fontSize: 15,
    fontWeight: "700",
  },
  link: {
    fontSize: 14,
    fontWeight: "600",
  },
  filler: {
    padding: 16,
    borderRadius: 8,
  },
  spacer: {
    flex: 1,
  },
});
