import type { BehaviorCategory, BehaviorEvent } from "../types/api";
import { dateRange, type TimePeriod } from "./time-period";

export const DAYS_PER_WEEK = 7;
export const HOURS_PER_DAY = 24;

const DAY_NAMES = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];
const FULL_DAY_NAMES = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"];

/** Event counts by weekday (row 0 = Monday) and hour of day. */
export interface HeatmapData {
  data: number[][];
  maxValue: number;
  period: TimePeriod;
}

export interface HeatmapCell {
  day: number;
  hour: number;
}

export interface PeakTimeSlot {
  dayIndex: number;
  dayName: string;
  hour: number;
  eventCount: number;
  intensity: number;
}

export interface GenerateHeatmapOptions {
  period?: TimePeriod;
  category?: BehaviorCategory | null;
  now?: Date;
}

export function createEmptyGrid(): number[][] {
  return Array.from({ length: DAYS_PER_WEEK }, () => new Array<number>(HOURS_PER_DAY).fill(0));
}

export function cellCount(heatmap: HeatmapData, day: number, hour: number) {
  return heatmap.data[day]?.[hour] ?? 0;
}

export function normalizedValue(heatmap: HeatmapData, day: number, hour: number) {
  if (heatmap.maxValue <= 0) return 0;
  return cellCount(heatmap, day, hour) / heatmap.maxValue;
}

export function dayName(day: number) {
  return DAY_NAMES[day] ?? "";
}

export function fullDayName(day: number) {
  return FULL_DAY_NAMES[day] ?? "";
}

/** Monday-based index for a local date. */
export function weekdayIndex(value: Date) {
  return (value.getDay() + 6) % 7;
}

export function formatHour(hour: number) {
  const suffix = hour < 12 ? "am" : "pm";
  const display = hour % 12 === 0 ? 12 : hour % 12;
  return `${display}${suffix}`;
}

function matchesCategory(event: BehaviorEvent, category: BehaviorCategory) {
  switch (category) {
    case "positive":
    case "routinePositive":
      return event.pointsApplied > 0;
    case "negative":
      return event.pointsApplied < 0;
  }
}

export function generateHeatmapData(
  events: BehaviorEvent[],
  { period = "thisMonth", category = null, now = new Date() }: GenerateHeatmapOptions = {}
): HeatmapData {
  const range = dateRange(period, now);
  const data = createEmptyGrid();

  for (const event of events) {
    const timestamp = new Date(event.timestamp);
    if (Number.isNaN(timestamp.getTime())) continue;
    if (timestamp < range.start || timestamp > range.end) continue;
    if (category && !matchesCategory(event, category)) continue;

    data[weekdayIndex(timestamp)][timestamp.getHours()] += 1;
  }

  const maxValue = Math.max(0, ...data.flat());
  return { data, maxValue, period };
}

export function totalEvents(heatmap: HeatmapData) {
  return heatmap.data.flat().reduce((sum, count) => sum + count, 0);
}

/** Cells at or above half the max (rounded down), busiest first. */
export function findPeakTimes(heatmap: HeatmapData): PeakTimeSlot[] {
  const peaks: PeakTimeSlot[] = [];
  const divisor = Math.max(heatmap.maxValue, 1);
  const threshold = Math.floor(heatmap.maxValue / 2);

  heatmap.data.forEach((row, dayIndex) => {
    row.forEach((count, hour) => {
      if (count > 0 && count >= threshold) {
        peaks.push({
          dayIndex,
          dayName: dayName(dayIndex),
          hour,
          eventCount: count,
          intensity: count / divisor,
        });
      }
    });
  });

  return peaks.sort((a, b) => b.eventCount - a.eventCount);
}

function randomInt(random: () => number, max: number) {
  return Math.floor(random() * (max + 1));
}

/**
 * Preview data: busy mornings (7-9) and evenings (17-20), light daytime activity
 * (10-16), quiet otherwise.
 */
export function createSampleHeatmapData(random: () => number = Math.random): HeatmapData {
  const data = createEmptyGrid();

  for (let day = 0; day < DAYS_PER_WEEK; day++) {
    for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
      if ((hour >= 7 && hour <= 9) || (hour >= 17 && hour <= 20)) {
        data[day][hour] = randomInt(random, 5);
      } else if (hour >= 10 && hour <= 16) {
        data[day][hour] = randomInt(random, 2);
      }
    }
  }

  return { data, maxValue: 5, period: "thisMonth" };
}
