import { createContext, useContext, useEffect } from "react";

export const FLOATING_TAB_BAR_METRICS = {
  height: 64,
  bottomPadding: 12,
  contentClearance: 8,
  totalFixedHeight: 84,
} as const;

/** Spacing kept below scrolling content, on top of the safe area. */
export const TAB_BAR_SAFE_AREA_SPACING = 20;

export const SCREEN_CONTENT_PADDING = 16;

export function computeTabBarInset(safeAreaBottom: number) {
  return FLOATING_TAB_BAR_METRICS.totalFixedHeight + Math.max(0, safeAreaBottom);
}

interface TabBarInsetValue {
  inset: number;
  isFallback: boolean;
}

export const TabBarInsetContext = createContext<TabBarInsetValue>({
  inset: FLOATING_TAB_BAR_METRICS.totalFixedHeight,
  isFallback: true,
});

let warnedAboutFallback = false;

/** Pass `applied = false` when the caller reads the inset without laying anything out with it. */
export function useTabBarInset(applied = true) {
  const { inset, isFallback } = useContext(TabBarInsetContext);

  useEffect(() => {
    if (!__DEV__ || !applied || !isFallback || warnedAboutFallback) return;
    warnedAboutFallback = true;
    console.warn(
      `[TabBar] tabBarInset is using the fallback (${inset}pt). Render the screen inside TabBarInsetProvider.`
    );
  }, [applied, inset, isFallback]);

  return inset;
}

export interface ScreenContainerPaddingInput {
  isTabBarScreen: boolean;
  needsScrollView: boolean;
  tabBarInset: number;
}

export interface ScreenContainerPadding {
  padding: number;
  paddingBottom: number;
}

export function screenContainerPadding({
  isTabBarScreen,
  needsScrollView,
  tabBarInset,
}: ScreenContainerPaddingInput): ScreenContainerPadding {
  const padding = needsScrollView ? SCREEN_CONTENT_PADDING : 0;
  return {
    padding,
    paddingBottom: padding + (isTabBarScreen ? tabBarInset : 0),
  };
}
