import { useCallback, useEffect, useRef, useState } from "react";
import type { HeatmapCell } from "../lib/heatmap";

export function isSameCell(a: HeatmapCell | null, b: HeatmapCell | null) {
  return a !== null && b !== null && a.day === b.day && a.hour === b.hour;
}

/** Tapping the selected cell clears it; tapping any other cell selects that one. */
export function toggleCell(current: HeatmapCell | null, tapped: HeatmapCell): HeatmapCell | null {
  return isSameCell(current, tapped) ? null : tapped;
}

/** `selectCell` and `clearSelection` keep their identity so memoized cells skip re-rendering. */
export function useHeatmapSelection(onChange?: (cell: HeatmapCell | null) => void) {
  const [selectedCell, setSelectedCell] = useState<HeatmapCell | null>(null);
  const selectedRef = useRef<HeatmapCell | null>(null);
  const onChangeRef = useRef(onChange);

  useEffect(() => {
    onChangeRef.current = onChange;
  }, [onChange]);

  const selectCell = useCallback((cell: HeatmapCell) => {
    const next = toggleCell(selectedRef.current, cell);
    selectedRef.current = next;
    setSelectedCell(next);
    onChangeRef.current?.(next);
  }, []);

  const clearSelection = useCallback(() => {
    selectedRef.current = null;
    setSelectedCell(null);
    onChangeRef.current?.(null);
  }, []);

  const isSelected = useCallback(
    (day: number, hour: number) => isSameCell(selectedCell, { day, hour }),
    [selectedCell]
  );

  return { selectedCell, selectCell, clearSelection, isSelected };
}
