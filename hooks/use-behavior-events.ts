import { useAuth } from "@clerk/clerk-expo";
import { useQuery } from "@tanstack/react-query";
import { apiRequest } from "../lib/api-client";
import { dateRange, type TimePeriod } from "../lib/time-period";
import type { BehaviorEventsResponse } from "../types/api";

export function useBehaviorEvents(childId: string | null, period: TimePeriod) {
  const { getToken } = useAuth();

  return useQuery<BehaviorEventsResponse>({
    queryKey: ["behavior-events", childId, period],
    enabled: childId !== null,
    queryFn: async () => {
      const token = await getToken();
      if (!token) throw new Error("Not signed in");
      if (!childId) return { events: [] };

      const range = dateRange(period);
      return apiRequest<BehaviorEventsResponse>("/api/behavior-events", {
        token,
        query: {
          childId,
          from: range.start.toISOString(),
          to: range.end.toISOString(),
        },
      });
    },
  });
}
