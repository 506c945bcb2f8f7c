import type { ReactNode } from "react";
import {
  ScrollView,
  StyleSheet,
  View,
  type ScrollViewProps,
  type StyleProp,
  type ViewStyle,
} from "react-native";
import {
  TAB_BAR_SAFE_AREA_SPACING,
  screenContainerPadding,
  useTabBarInset,
} from "../../lib/tab-bar-inset";
import { useTheme } from "../../lib/theme";

export interface ScreenContainerProps {
  /** Screens shown in the tab bar reserve space for the floating bar. */
  isTabBarScreen?: boolean;
  /** When false the content handles its own scrolling. */
  needsScrollView?: boolean;
  /** Only used with the scroll view. */
  refreshControl?: ScrollViewProps["refreshControl"];
  style?: StyleProp<ViewStyle>;
  testID?: string;
  children: ReactNode;
}

export function ScreenContainer({
  isTabBarScreen = true,
  needsScrollView = true,
  refreshControl,
  style,
  testID = "screen-container",
  children,
}: ScreenContainerProps) {
  const theme = useTheme();
  const tabBarInset = useTabBarInset(isTabBarScreen);
  const padding = screenContainerPadding({ isTabBarScreen, needsScrollView, tabBarInset });
  const background = { backgroundColor: theme.colors.background };

  if (needsScrollView) {
    return (
      <ScrollView
        testID={testID}
        style={[styles.fill, background, style]}
        contentContainerStyle={padding}
        refreshControl={refreshControl}
        keyboardDismissMode="on-drag"
        keyboardShouldPersistTaps="handled"
      >
        {children}
      </ScrollView>
    );
  }

  return (
    <View testID={testID} style={[styles.fill, background, { paddingBottom: padding.paddingBottom }, style]}>
      {children}
    </View>
  );
}

/** Extra space at the end of scrolling content so it clears the floating tab bar. */
export function TabBarSafeArea({ height = TAB_BAR_SAFE_AREA_SPACING }: { height?: number }) {
  return <View testID="tab-bar-safe-area" style={{ height }} />;
}

const styles = StyleSheet.create({
  fill: {
    flex: 1,
  },
});
