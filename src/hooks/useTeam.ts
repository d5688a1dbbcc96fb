import { useMutation, useQuery, useQueryClient } from "@tanstack/react-query";
import { apiFetch, ApiError, queryKeys } from "@/lib/queries";
import type { CourtLevel } from "@/lib/court/config";
import type {
  CourtThemeDto,
  PlayerResponse,
  TeamDetailResponse,
  TeamResponse,
} from "@/types";

export function useTeam(id: string) {
  return useQuery<TeamDetailResponse, ApiError>({
    queryKey: queryKeys.team(id),
    queryFn: () => apiFetch<TeamDetailResponse>(`/api/teams/${id}`),
    enabled: !!id,
    staleTime: 60 * 1000, // 1 minute
  });
}

export interface UpdateTeamInput {
  name?: string;
  courtLevel?: CourtLevel | null;
  useCustomCourtTheme?: boolean;
  courtTheme?: Partial<CourtThemeDto>;
}

export function useUpdateTeam(id: string) {
  const queryClient = useQueryClient();
  return useMutation<TeamResponse, ApiError, UpdateTeamInput>({
    mutationFn: (input) => apiFetch<TeamResponse>(`/api/teams/${id}`, "PATCH", input),
    onSuccess: () => {
      void queryClient.invalidateQueries({ queryKey: queryKeys.teams });
      // Games render with the team's court level and theme
      void queryClient.invalidateQueries({ queryKey: ["games"] });
    },
  });
}

export function useArchiveTeam(id: string) {
  const queryClient = useQueryClient();
  return useMutation<TeamResponse, ApiError, void>({
    mutationFn: () => apiFetch<TeamResponse>(`/api/teams/${id}`, "DELETE"),
    onSuccess: () => queryClient.invalidateQueries({ queryKey: queryKeys.teams }),
  });
}

export interface AddPlayerInput {
  number: number;
  name?: string;
}

export function useAddPlayer(teamId: string) {
  const queryClient = useQueryClient();
  return useMutation<PlayerResponse, ApiError, AddPlayerInput>({
    mutationFn: (input) =>
      apiFetch<PlayerResponse>(`/api/teams/${teamId}/players`, "POST", input),
    onSuccess: () => queryClient.invalidateQueries({ queryKey: queryKeys.team(teamId) }),
  });
}
