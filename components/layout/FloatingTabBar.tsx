import type { ComponentType } from "react";
import { Pressable, StyleSheet, Text, View } from "react-native";
import type { BottomTabBarProps } from "@react-navigation/bottom-tabs";
import { useSafeAreaInsets } from "react-native-safe-area-context";
import Svg, { Circle, Path, Rect } from "react-native-svg";
import { FLOATING_TAB_BAR_METRICS } from "../../lib/tab-bar-inset";
import { useTheme } from "../../lib/theme";

function TodayTabIcon({ color }: { color: string }) {
  return (
    <Svg width={22} height={22} viewBox="0 0 24 24" fill="none">
      <Circle cx={12} cy={12} r={4} stroke={color} strokeWidth={2} />
      <Path
        d="M12 2.5V4.5M12 19.5V21.5M21.5 12H19.5M4.5 12H2.5M18.7 5.3L17.3 6.7M6.7 17.3L5.3 18.7M18.7 18.7L17.3 17.3M6.7 6.7L5.3 5.3"
        stroke={color}
        strokeWidth={2}
        strokeLinecap="round"
      />
    </Svg>
  );
}

function InsightsTabIcon({ color }: { color: string }) {
  return (
    <Svg width={22} height={22} viewBox="0 0 24 24" fill="none">
      <Rect x={3} y={3} width={7} height={7} rx={1.5} fill={color} />
      <Rect x={14} y={3} width={7} height={7} rx={1.5} stroke={color} strokeWidth={2} />
      <Rect x={3} y={14} width={7} height={7} rx={1.5} stroke={color} strokeWidth={2} />
      <Rect x={14} y={14} width={7} height={7} rx={1.5} fill={color} />
    </Svg>
  );
}

function SettingsTabIcon({ color }: { color: string }) {
  return (
    <Svg width={22} height={22} viewBox="0 0 24 24" fill="none">
      <Circle cx={12} cy={12} r={3.2} stroke={color} strokeWidth={2} />
      <Path
        d="M12 2.5V5M12 19V21.5M21.5 12H19M5 12H2.5M18.7 5.3L17 7M7 17L5.3 18.7M18.7 18.7L17 17M7 7L5.3 5.3"
        stroke={color}
        strokeWidth={2}
        strokeLinecap="round"
      />
    </Svg>
  );
}

interface TabItem {
  label: string;
  Icon: ComponentType<{ color: string }>;
}

// Routes missing from this map stay routable but get no tab button.
const TAB_ITEMS: Record<string, TabItem> = {
  today: { label: "Today", Icon: TodayTabIcon },
  insights: { label: "Insights", Icon: InsightsTabIcon },
  settings: { label: "Settings", Icon: SettingsTabIcon },
};

export function FloatingTabBar({ state, navigation }: BottomTabBarProps) {
  const theme = useTheme();
  const insets = useSafeAreaInsets();

  return (
    <View
      pointerEvents="box-none"
      style={[styles.wrapper, { bottom: FLOATING_TAB_BAR_METRICS.bottomPadding + insets.bottom }]}
    >
      <View
        style={[
          styles.bar,
          { backgroundColor: theme.colors.tabBar, borderColor: theme.colors.border },
        ]}
      >
        {state.routes.map((route, index) => {
          const item = TAB_ITEMS[route.name];
          if (!item) return null;

          const isFocused = state.index === index;
          const color = isFocused ? theme.colors.tabBarActive : theme.colors.tabBarInactive;

          const onPress = () => {
            const event = navigation.emit({
              type: "tabPress",
              target: route.key,
              canPreventDefault: true,
            });
            if (!isFocused && !event.defaultPrevented) {
              navigation.navigate(route.name, route.params);
            }
          };

          return (
            <Pressable
              key={route.key}
              role="tab"
              aria-selected={isFocused}
              aria-label={item.label}
              onPress={onPress}
              style={({ pressed }) => [styles.tab, pressed && styles.tabPressed]}
            >
              <item.Icon color={color} />
              <Text style={[styles.label, { color }]}>{item.label}</Text>
            </Pressable>
          );
        })}
      </View>
    </View>
  );
}

const styles = StyleSheet.create({
  wrapper: {
    position: "absolute",
    left: 16,
    right: 16,
  },
  bar: {
    height: FLOATING_TAB_BAR_METRICS.height,
    flexDirection: "row",
    alignItems: "center",
    paddingHorizontal: 10,
    borderRadius: FLOATING_TAB_BAR_METRICS.height / 2,
    borderWidth: 1,
    shadowColor: "#000000",
    shadowOpacity: 0.08,
    shadowRadius: 12,
    shadowOffset: { width: 0, height: 4 },
    elevation: 6,
  },
  tab: {
    flex: 1,
    alignItems: "center",
    justifyContent: "center",
    gap: 2,
  },
  tabPressed: {
    opacity: 0.7,
  },
  label: {
    fontSize: 10,
    fontWeight: "500",
  },
});
