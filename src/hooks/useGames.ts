import { useMutation, useQuery, useQueryClient } from "@tanstack/react-query";
import { apiFetch, ApiError, queryKeys } from "@/lib/queries";
import type { GameResponse, GamesResponse } from "@/types";

export function useGames(teamId?: string | null) {
  const params = teamId ? `?team_id=${encodeURIComponent(teamId)}` : "";
  return useQuery<GamesResponse, ApiError>({
    queryKey: queryKeys.games(teamId),
    queryFn: () => apiFetch<GamesResponse>(`/api/games${params}`),
    staleTime: 60 * 1000, // 1 minute
  });
}

export interface CreateGameInput {
  teamId: string | null;
  name?: string;
  /** ISO date; defaults to now */
  date?: string;
  onCourt?: number[];
}

export function useCreateGame() {
  const queryClient = useQueryClient();
  return useMutation<GameResponse, ApiError, CreateGameInput>({
    mutationFn: (input) => apiFetch<GameResponse>("/api/games", "POST", input),
    onSuccess: () => queryClient.invalidateQueries({ queryKey: ["games"] }),
  });
}
