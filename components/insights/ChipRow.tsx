import { Pressable, ScrollView, StyleSheet, Text } from "react-native";
import { useTheme } from "../../lib/theme";

export interface ChipOption<T extends string> {
  value: T;
  label: string;
}

interface ChipRowProps<T extends string> {
  options: ChipOption<T>[];
  selected: T | null;
  onSelect: (value: T) => void;
  testID?: string;
}

export function ChipRow<T extends string>({ options, selected, onSelect, testID }: ChipRowProps<T>) {
  const theme = useTheme();

  return (
    <ScrollView horizontal showsHorizontalScrollIndicator={false} contentContainerStyle={styles.row} testID={testID}>
      {options.map((option) => {
        const isActive = option.value === selected;
        return (
          <Pressable
            key={option.value}
            role="button"
            aria-selected={isActive}
            onPress={() => onSelect(option.value)}
            style={[
              styles.chip,
              {
                backgroundColor: isActive ? theme.colors.primaryText : theme.colors.surface,
                borderColor: theme.colors.border,
              },
            ]}
          >
            <Text
              style={[styles.chipText, { color: isActive ? theme.colors.background : theme.colors.primaryText }]}
            >
              {option.label}
            </Text>
          </Pressable>
        );
      })}
    </ScrollView>
  );
}

const styles = StyleSheet.create({
  row: {
    gap: 8,
  },
  chip: {
    paddingHorizontal: 12,
    paddingVertical: 6,
    borderRadius: 999,
    borderWidth: 1,
  },
  chipText: {
    fontSize: 13,
    fontWeight: "600",
  },
});
