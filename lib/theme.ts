import { createContext, useContext } from "react";

export type ThemeMode = "system" | "light" | "dark";

export interface ThemeColors {
  background: string;
  surface: string;
  border: string;
  primaryText: string;
  secondaryText: string;
  tertiaryText: string;
  positive: string;
  challenge: string;
  accent: string;
  emptyCell: string;
  tabBar: string;
  tabBarActive: string;
  tabBarInactive: string;
  error: string;
  success: string;
}

export interface Theme {
  isDark: boolean;
  colors: ThemeColors;
}

export const lightTheme: Theme = {
  isDark: false,
  colors: {
    background: "#FFFFFF",
    surface: "#F9FAFB",
    border: "#E5E7EB",
    primaryText: "#111827",
    secondaryText: "#6B7280",
    tertiaryText: "#9CA3AF",
    positive: "#34C759",
    challenge: "#FF9500",
    accent: "#6699E6",
    emptyCell: "#F2F2F7",
    tabBar: "#FFFFFF",
    tabBarActive: "#1A1A1A",
    tabBarInactive: "#8E8E93",
    error: "#B91C1C",
    success: "#047857",
  },
};

export const darkTheme: Theme = {
  isDark: true,
  colors: {
    background: "#000000",
    surface: "#1C1C1E",
    border: "#2C2C2E",
    primaryText: "#F9FAFB",
    secondaryText: "#A1A1AA",
    tertiaryText: "#71717A",
    positive: "#30D158",
    challenge: "#FF9F0A",
    accent: "#73A6F2",
    emptyCell: "#1C1C1E",
    tabBar: "#1C1C1E",
    tabBarActive: "#FFFFFF",
    tabBarInactive: "#8E8E93",
    error: "#F87171",
    success: "#34D399",
  },
};

export function resolveTheme(mode: ThemeMode, systemScheme: string | null | undefined): Theme {
  if (mode === "light") return lightTheme;
  if (mode === "dark") return darkTheme;
  return systemScheme === "dark" ? darkTheme : lightTheme;
}

export function isThemeMode(value: unknown): value is ThemeMode {
  return value === "system" || value === "light" || value === "dark";
}

export interface ThemeContextValue {
  theme: Theme;
  mode: ThemeMode;
  setMode: (mode: ThemeMode) => void;
}

export const ThemeContext = createContext<ThemeContextValue>({
  theme: lightTheme,
  mode: "system",
  setMode: () => {},
});

export function useTheme() {
  return useContext(ThemeContext).theme;
}

export function useThemeMode() {
  const { mode, setMode } = useContext(ThemeContext);
  return { mode, setMode };
}
