import { useCallback, useEffect, useMemo, useState, type ReactNode } from "react";
import { useColorScheme } from "react-native";
import * as SecureStore from "expo-secure-store";
import { ThemeContext, isThemeMode, resolveTheme, type ThemeMode } from "../lib/theme";

const THEME_MODE_KEY = "theme-mode";

async function loadThemeMode(): Promise<ThemeMode> {
  try {
    const stored = await SecureStore.getItemAsync(THEME_MODE_KEY);
    return isThemeMode(stored) ? stored : "system";
  } catch {
    return "system";
  }
}

export function ThemeProvider({ children }: { children: ReactNode }) {
  const systemScheme = useColorScheme();
  const [mode, setModeState] = useState<ThemeMode>("system");

  useEffect(() => {
    let cancelled = false;
    void loadThemeMode().then((stored) => {
      if (!cancelled) setModeState(stored);
    });
    return () => {
      cancelled = true;
    };
  }, []);

  const setMode = useCallback((next: ThemeMode) => {
    setModeState(next);
    SecureStore.setItemAsync(THEME_MODE_KEY, next).catch(() => {
      // The in-memory mode still applies for this session.
    });
  }, []);

  const value = useMemo(
    () => ({ theme: resolveTheme(mode, systemScheme), mode, setMode }),
    [mode, systemScheme, setMode]
  );

  return <ThemeContext.Provider value={value}>{children}</ThemeContext.Provider>;
}
