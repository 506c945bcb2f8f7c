import { useMemo, type ReactNode } from "react";
import { useSafeAreaInsets } from "react-native-safe-area-context";
import { TabBarInsetContext, computeTabBarInset } from "../../lib/tab-bar-inset";

/** Provides the device-aware floating tab bar inset to every screen below it. */
export function TabBarInsetProvider({ children }: { children: ReactNode }) {
  const insets = useSafeAreaInsets();
  const value = useMemo(
    () => ({ inset: computeTabBarInset(insets.bottom), isFallback: false }),
    [insets.bottom]
  );

  return <TabBarInsetContext.Provider value={value}>{children}</TabBarInsetContext.Provider>;
}
