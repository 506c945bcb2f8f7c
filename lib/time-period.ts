export type TimePeriod =
  | "today"
  | "yesterday"
  | "thisWeek"
  | "lastWeek"
  | "thisMonth"
  | "lastMonth"
  | "last3Months"
  | "last6Months"
  | "lastYear"
  | "allTime";

export interface DateRange {
  start: Date;
  end: Date;
}

export const TIME_PERIODS: TimePeriod[] = [
  "today",
  "yesterday",
  "thisWeek",
  "lastWeek",
  "thisMonth",
  "lastMonth",
  "last3Months",
  "last6Months",
  "lastYear",
  "allTime",
];

const DISPLAY_NAMES: Record<TimePeriod, string> = {
  today: "Today",
  yesterday: "Yesterday",
  thisWeek: "This Week",
  lastWeek: "Last Week",
  thisMonth: "This Month",
  lastMonth: "Last Month",
  last3Months: "Last 3 Months",
  last6Months: "Last 6 Months",
  lastYear: "Past 12 Months",
  allTime: "All Time",
};

const SHORT_DISPLAY_NAMES: Record<TimePeriod, string> = {
  today: "Today",
  yesterday: "Yesterday",
  thisWeek: "Week",
  lastWeek: "Last Week",
  thisMonth: "Month",
  lastMonth: "Last Month",
  last3Months: "3 Months",
  last6Months: "6 Months",
  lastYear: "Year",
  allTime: "All",
};

export function displayName(period: TimePeriod) {
  return DISPLAY_NAMES[period];
}

export function shortDisplayName(period: TimePeriod) {
  return SHORT_DISPLAY_NAMES[period];
}

export function startOfDay(value: Date) {
  return new Date(value.getFullYear(), value.getMonth(), value.getDate());
}

/** Weeks start on Monday, matching the heatmap's row order. */
export function startOfWeek(value: Date) {
  const day = startOfDay(value);
  const offset = (day.getDay() + 6) % 7;
  day.setDate(day.getDate() - offset);
  return day;
}

function addDays(value: Date, days: number) {
  const next = new Date(value);
  next.setDate(next.getDate() + days);
  return next;
}

/** Clamps to the last day of the target month, so 31 May minus 3 months is 28 February. */
function addMonths(value: Date, months: number) {
  const next = new Date(value);
  const day = next.getDate();
  next.setDate(1);
  next.setMonth(next.getMonth() + months);
  const daysInMonth = new Date(next.getFullYear(), next.getMonth() + 1, 0).getDate();
  next.setDate(Math.min(day, daysInMonth));
  return next;
}

export function dateRange(period: TimePeriod, now: Date = new Date()): DateRange {
  const today = startOfDay(now);

  switch (period) {
    case "today":
      return { start: today, end: now };
    case "yesterday":
      return { start: addDays(today, -1), end: today };
    case "thisWeek":
      return { start: startOfWeek(now), end: now };
    case "lastWeek": {
      const thisWeek = startOfWeek(now);
      return { start: addDays(thisWeek, -7), end: thisWeek };
    }
    case "thisMonth":
      return { start: new Date(now.getFullYear(), now.getMonth(), 1), end: now };
    case "lastMonth": {
      const thisMonth = new Date(now.getFullYear(), now.getMonth(), 1);
      return { start: addMonths(thisMonth, -1), end: thisMonth };
    }
    case "last3Months":
      return { start: addMonths(now, -3), end: now };
    case "last6Months":
      return { start: addMonths(now, -6), end: now };
    case "lastYear":
      return { start: addMonths(now, -12), end: now };
    case "allTime":
      return { start: addMonths(now, -1200), end: now };
  }
}

export function isTimePeriod(value: string): value is TimePeriod {
  return TIME_PERIODS.some((period) => period === value);
}
