import { useAuth } from "@clerk/clerk-expo";
import { useQuery } from "@tanstack/react-query";
import { apiRequest } from "../lib/api-client";
import type { ChildrenResponse } from "../types/api";

export function useChildren() {
  const { getToken } = useAuth();

  return useQuery<ChildrenResponse>({
    queryKey: ["children"],
    queryFn: async () => {
      const token = await getToken();
      if (!token) throw new Error("Not signed in");
      return apiRequest<ChildrenResponse>("/api/children", { token });
    },
  });
}
