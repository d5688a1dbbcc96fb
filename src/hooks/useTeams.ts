import { useMutation, useQuery, useQueryClient } from "@tanstack/react-query";
import { apiFetch, ApiError, queryKeys } from "@/lib/queries";
import type { CourtLevel } from "@/lib/court/config";
import type { TeamResponse, TeamsResponse } from "@/types";

export function useTeams() {
  return useQuery<TeamsResponse, ApiError>({
    queryKey: queryKeys.teams,
    queryFn: () => apiFetch<TeamsResponse>("/api/teams"),
    staleTime: 60 * 1000, // 1 minute
  });
}

export interface CreateTeamInput {
  name: string;
  courtLevel?: CourtLevel | null;
}

export function useCreateTeam() {
  const queryClient = useQueryClient();
  return useMutation<TeamResponse, ApiError, CreateTeamInput>({
    mutationFn: (input) => apiFetch<TeamResponse>("/api/teams", "POST", input),
    onSuccess: () => queryClient.invalidateQueries({ queryKey: queryKeys.teams }),
  });
}
