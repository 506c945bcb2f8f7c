export type ApiResponse<T> =
  | { success: true; data: T; error?: undefined }
  | { success: false; data?: undefined; error?: string };

export type BehaviorCategory = "positive" | "negative" | "routinePositive";

export interface BehaviorEvent {
  id: string;
  childId: string;
  behaviorTypeId: string;
  /** ISO-8601 timestamp. */
  timestamp: string;
  pointsApplied: number;
}

export interface ChildSummary {
  id: string;
  name: string;
}

export interface ChildrenResponse {
  children: ChildSummary[];
}

export interface BehaviorEventsResponse {
  events: BehaviorEvent[];
}
