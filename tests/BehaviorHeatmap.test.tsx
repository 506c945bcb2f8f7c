import { describe, it, expect, vi } from "vitest";
import { fireEvent, render, screen } from "@testing-library/react";
import { BehaviorHeatmap, cellAccessibilityLabel } from "../components/heatmap/BehaviorHeatmap";
import { CompactBehaviorHeatmap } from "../components/heatmap/CompactBehaviorHeatmap";
import { createEmptyGrid, type HeatmapData } from "../lib/heatmap";

function fixture(): HeatmapData {
  const data = createEmptyGrid();
  data[0][8] = 3;
  data[1][19] = 1;
  return { data, maxValue: 3, period: "thisWeek" };
}

describe("cellAccessibilityLabel", () => {
  it("names the day, hour and count", () => {
    expect(cellAccessibilityLabel(0, 8, 3)).toBe("Monday 8am: 3 events");
    expect(cellAccessibilityLabel(6, 0, 1)).toBe("Sunday 12am: 1 event");
  });
});

describe("BehaviorHeatmap", () => {
  it("renders a cell for every hour of the week", () => {
    render(<BehaviorHeatmap data={fixture()} colorScheme="positive" />);
    expect(screen.getAllByTestId(/^heatmap-cell-/)).toHaveLength(168);
  });

  it("labels days, hours and the legend", () => {
    render(<BehaviorHeatmap data={fixture()} colorScheme="challenge" />);

    expect(screen.getByText("M")).toBeTruthy();
    expect(screen.getAllByText("T")).toHaveLength(2);
    expect(screen.getAllByText("S")).toHaveLength(2);
    for (const label of ["12a", "6a", "12p", "6p", "Less", "More"]) {
      expect(screen.getByText(label)).toBeTruthy();
    }
    expect(screen.getAllByTestId(/^heatmap-legend-swatch-/)).toHaveLength(5);
  });

  it("describes each cell for assistive technology", () => {
    render(<BehaviorHeatmap data={fixture()} colorScheme="positive" />);

    expect(screen.getByLabelText("Monday 8am: 3 events")).toBe(screen.getByTestId("heatmap-cell-0-8"));
    expect(screen.getByLabelText("Tuesday 7pm: 1 event")).toBe(screen.getByTestId("heatmap-cell-1-19"));
  });

  it("toggles the selection when a cell is tapped twice", () => {
    const onSelectCell = vi.fn();
    render(<BehaviorHeatmap data={fixture()} colorScheme="positive" onSelectCell={onSelectCell} />);
    const cell = screen.getByTestId("heatmap-cell-0-8");

    fireEvent.click(cell);
    expect(cell.getAttribute("aria-selected")).toBe("true");
    expect(onSelectCell).toHaveBeenLastCalledWith({ day: 0, hour: 8 });

    fireEvent.click(cell);
    expect(cell.getAttribute("aria-selected")).toBe("false");
    expect(onSelectCell).toHaveBeenLastCalledWith(null);
  });

  it("moves the selection to the newly tapped cell", () => {
    render(<BehaviorHeatmap data={fixture()} colorScheme="neutral" />);
    const first = screen.getByTestId("heatmap-cell-0-8");
    const second = screen.getByTestId("heatmap-cell-1-19");

    fireEvent.click(first);
    fireEvent.click(second);

    expect(first.getAttribute("aria-selected")).toBe("false");
    expect(second.getAttribute("aria-selected")).toBe("true");
  });
});

describe("CompactBehaviorHeatmap", () => {
  it("renders the grid without a legend or tappable cells", () => {
    render(<CompactBehaviorHeatmap data={fixture()} colorScheme="challenge" />);

    expect(screen.getAllByTestId(/^compact-heatmap-cell-/)).toHaveLength(168);
    expect(screen.getAllByText("T")).toHaveLength(2);
    expect(screen.queryByText("Less")).toBeNull();
    expect(screen.queryByText("12a")).toBeNull();
    expect(screen.queryAllByRole("button")).toHaveLength(0);
  });
});
