import { ActivityIndicator, StyleSheet, View } from "react-native";
import { useTheme } from "../lib/theme";

export function LoadingScreen({ testID = "loading-screen" }: { testID?: string }) {
  const theme = useTheme();

  return (
    <View style={[styles.container, { backgroundColor: theme.colors.background }]} testID={testID}>
      <ActivityIndicator color={theme.colors.secondaryText} />
    </View>
  );
}

const styles = StyleSheet.create({
  container: {
    flex: 1,
    alignItems: "center",
    justifyContent: "center",
  },
});
