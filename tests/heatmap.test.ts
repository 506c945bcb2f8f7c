import { describe, it, expect } from "vitest";
import {
  createEmptyGrid,
  createSampleHeatmapData,
  findPeakTimes,
  formatHour,
  generateHeatmapData,
  normalizedValue,
  totalEvents,
  weekdayIndex,
  type HeatmapData,
} from "../lib/heatmap";
import type { BehaviorEvent } from "../types/api";

function event(id: string, at: Date, pointsApplied: number): BehaviorEvent {
  return {
    id,
    childId: "child-1",
    behaviorTypeId: "type-1",
    timestamp: at.toISOString(),
    pointsApplied,
  };
}

function heatmapWith(cells: [number, number, number][], maxValue: number): HeatmapData {
  const data = createEmptyGrid();
  for (const [day, hour, count] of cells) {
    data[day][hour] = count;
  }
  return { data, maxValue, period: "thisMonth" };
}

// Thursday 15 October 2026, noon local time.
const now = new Date(2026, 9, 15, 12, 0);

describe("createEmptyGrid", () => {
  it("builds seven rows of twenty-four zeros", () => {
    const grid = createEmptyGrid();
    expect(grid).toHaveLength(7);
    for (const row of grid) {
      expect(row).toEqual(new Array(24).fill(0));
    }
  });

  it("returns independent rows", () => {
    const grid = createEmptyGrid();
    grid[0][0] = 3;
    expect(grid[1][0]).toBe(0);
  });
});

describe("normalizedValue", () => {
  it("divides the cell count by the max value", () => {
    const heatmap = heatmapWith([[0, 8, 4]], 5);
    expect(normalizedValue(heatmap, 0, 8)).toBe(0.8);
    expect(normalizedValue(heatmap, 0, 9)).toBe(0);
  });

  it("returns 0 when the max value is 0", () => {
    expect(normalizedValue(heatmapWith([], 0), 2, 3)).toBe(0);
  });

  it("returns 0 outside the grid", () => {
    expect(normalizedValue(heatmapWith([[0, 0, 1]], 1), 9, 0)).toBe(0);
  });
});

describe("weekdayIndex", () => {
  it("starts the week on Monday", () => {
    expect(weekdayIndex(new Date(2026, 9, 12))).toBe(0);
    expect(weekdayIndex(new Date(2026, 9, 18))).toBe(6);
  });
});

describe("generateHeatmapData", () => {
  const events = [
    event("a", new Date(2026, 9, 12, 8, 30), 2),
    event("b", new Date(2026, 9, 12, 8, 45), 1),
    event("c", new Date(2026, 9, 13, 19, 10), -1),
    event("d", new Date(2026, 8, 30, 10, 0), 1),
    event("e", new Date(2026, 9, 15, 13, 0), 1),
  ];

  it("buckets in-range events by weekday and hour", () => {
    const heatmap = generateHeatmapData(events, { period: "thisMonth", now });
    expect(heatmap.data[0][8]).toBe(2);
    expect(heatmap.data[1][19]).toBe(1);
    expect(heatmap.data[2][10]).toBe(0);
    expect(heatmap.maxValue).toBe(2);
    expect(heatmap.period).toBe("thisMonth");
    expect(totalEvents(heatmap)).toBe(3);
  });

  it("keeps only positive points for the positive category", () => {
    const heatmap = generateHeatmapData(events, { period: "thisMonth", category: "positive", now });
    expect(heatmap.data[0][8]).toBe(2);
    expect(heatmap.data[1][19]).toBe(0);
    expect(heatmap.maxValue).toBe(2);
  });

  it("keeps only negative points for the negative category", () => {
    const heatmap = generateHeatmapData(events, { period: "thisMonth", category: "negative", now });
    expect(heatmap.data[0][8]).toBe(0);
    expect(heatmap.data[1][19]).toBe(1);
    expect(heatmap.maxValue).toBe(1);
  });

  it("treats routine wins like positive ones", () => {
    const heatmap = generateHeatmapData(events, { period: "thisMonth", category: "routinePositive", now });
    expect(totalEvents(heatmap)).toBe(2);
  });

  it("places Sunday events in the last row", () => {
    const sunday = event("f", new Date(2026, 9, 11, 21, 0), 1);
    const heatmap = generateHeatmapData([sunday], { period: "lastWeek", now });
    expect(heatmap.data[6][21]).toBe(1);
    expect(heatmap.maxValue).toBe(1);
  });

  it("skips unparseable timestamps", () => {
    const broken = { ...event("g", now, 1), timestamp: "not-a-date" };
    const heatmap = generateHeatmapData([broken], { period: "allTime", now });
    expect(totalEvents(heatmap)).toBe(0);
  });

  it("reports a zero max value when nothing matches", () => {
    const heatmap = generateHeatmapData([], { period: "thisWeek", now });
    expect(heatmap.maxValue).toBe(0);
    expect(totalEvents(heatmap)).toBe(0);
  });
});

describe("findPeakTimes", () => {
  it("returns cells in the top half, busiest first", () => {
    const heatmap = heatmapWith(
      [
        [0, 8, 4],
        [2, 18, 2],
        [4, 7, 1],
        [5, 9, 4],
      ],
      4
    );

    expect(findPeakTimes(heatmap)).toEqual([
      { dayIndex: 0, dayName: "Mon", hour: 8, eventCount: 4, intensity: 1 },
      { dayIndex: 5, dayName: "Sat", hour: 9, eventCount: 4, intensity: 1 },
      { dayIndex: 2, dayName: "Wed", hour: 18, eventCount: 2, intensity: 0.5 },
    ]);
  });

  it("rounds half of an odd maximum down", () => {
    const heatmap = heatmapWith(
      [
        [0, 8, 3],
        [1, 9, 1],
      ],
      3
    );

    expect(findPeakTimes(heatmap)).toEqual([
      { dayIndex: 0, dayName: "Mon", hour: 8, eventCount: 3, intensity: 1 },
      { dayIndex: 1, dayName: "Tue", hour: 9, eventCount: 1, intensity: 1 / 3 },
    ]);
  });

  it("returns nothing for an empty heatmap", () => {
    expect(findPeakTimes(heatmapWith([], 0))).toEqual([]);
  });
});

describe("formatHour", () => {
  it("formats hours on a twelve-hour clock", () => {
    expect(formatHour(0)).toBe("12am");
    expect(formatHour(7)).toBe("7am");
    expect(formatHour(12)).toBe("12pm");
    expect(formatHour(18)).toBe("6pm");
    expect(formatHour(23)).toBe("11pm");
  });
});

describe("createSampleHeatmapData", () => {
  it("fills busy and light hours from the random source", () => {
    const sample = createSampleHeatmapData(() => 0.99);

    expect(sample.maxValue).toBe(5);
    expect(sample.period).toBe("thisMonth");
    for (const row of sample.data) {
      expect(row[6]).toBe(0);
      expect(row[7]).toBe(5);
      expect(row[9]).toBe(5);
      expect(row[10]).toBe(2);
      expect(row[16]).toBe(2);
      expect(row[17]).toBe(5);
      expect(row[20]).toBe(5);
      expect(row[21]).toBe(0);
    }
  });

  it("keeps the max value fixed when every draw is zero", () => {
    const sample = createSampleHeatmapData(() => 0);
    expect(totalEvents(sample)).toBe(0);
    expect(sample.maxValue).toBe(5);
  });
});
