import { useMutation, useQuery, useQueryClient } from "@tanstack/react-query";
import { apiFetch, ApiError, queryKeys } from "@/lib/queries";
import type {
  GameDetailResponse,
  GameResponse,
  GameStatsResponse,
  ShotResponse,
  SubstitutionResponse,
} from "@/types";

export function useGame(id: string) {
  return useQuery<GameDetailResponse, ApiError>({
    queryKey: queryKeys.game(id),
    queryFn: () => apiFetch<GameDetailResponse>(`/api/games/${id}`),
    enabled: !!id,
  });
}

/** `query` is the history/quarter/hide search string, without the "?". */
export function useGameStats(id: string, query: string) {
  return useQuery<GameStatsResponse, ApiError>({
    queryKey: [...queryKeys.gameStats(id), query],
    queryFn: () =>
      apiFetch<GameStatsResponse>(`/api/games/${id}/stats${query ? `?${query}` : ""}`),
    enabled: !!id,
  });
}

export interface RecordShotInput {
  x: number;
  y: number;
  made: boolean;
  quarter: number;
  playerNumber?: number;
}

export interface UpdateShotInput {
  shotId: string;
  x?: number;
  y?: number;
  made?: boolean;
  isLayup?: boolean;
  quarter?: number;
  playerNumber?: number;
}

export interface SubstitutionInput {
  playerOut: number;
  playerIn: number;
  quarter: number;
}

/**
 * Everything that changes a game while it is being tracked. Each mutation
 * refetches the game and its stats.
 */
export function useGameMutations(gameId: string) {
  const queryClient = useQueryClient();
  const refresh = () => queryClient.invalidateQueries({ queryKey: queryKeys.game(gameId) });

  const recordShot = useMutation<ShotResponse, ApiError, RecordShotInput>({
    mutationFn: (input) =>
      apiFetch<ShotResponse>(`/api/games/${gameId}/shots`, "POST", input),
    onSuccess: refresh,
  });

  const updateShot = useMutation<ShotResponse, ApiError, UpdateShotInput>({
    mutationFn: ({ shotId, ...changes }) =>
      apiFetch<ShotResponse>(`/api/shots/${shotId}`, "PATCH", changes),
    onSuccess: refresh,
  });

  const deleteShot = useMutation<{ id: string }, ApiError, string>({
    mutationFn: (shotId) => apiFetch<{ id: string }>(`/api/shots/${shotId}`, "DELETE"),
    onSuccess: refresh,
  });

  const substitute = useMutation<SubstitutionResponse, ApiError, SubstitutionInput>({
    mutationFn: (input) =>
      apiFetch<SubstitutionResponse>(`/api/games/${gameId}/substitutions`, "POST", input),
    onSuccess: refresh,
  });

  const setOnCourt = useMutation<GameResponse, ApiError, number[]>({
    mutationFn: (onCourt) =>
      apiFetch<GameResponse>(`/api/games/${gameId}`, "PATCH", { onCourt }),
    onSuccess: refresh,
  });

  return { recordShot, updateShot, deleteShot, substitute, setOnCourt };
}
