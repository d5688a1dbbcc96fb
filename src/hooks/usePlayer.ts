import { useMutation, useQueryClient } from "@tanstack/react-query";
import { apiFetch, ApiError, queryKeys } from "@/lib/queries";
import type { PlayerResponse } from "@/types";

export interface UpdatePlayerInput {
  number?: number;
  name?: string;
  /** null releases the player from the team */
  teamId?: string | null;
}

/** Edits and archiving for one player; refreshes the team page they were on. */
export function usePlayerMutations(playerId: string, teamId: string) {
  const queryClient = useQueryClient();
  const refresh = () => queryClient.invalidateQueries({ queryKey: queryKeys.team(teamId) });

  const update = useMutation<PlayerResponse, ApiError, UpdatePlayerInput>({
    mutationFn: (input) =>
      apiFetch<PlayerResponse>(`/api/players/${playerId}`, "PATCH", input),
    onSuccess: refresh,
  });

  const archive = useMutation<PlayerResponse, ApiError, void>({
    mutationFn: () => apiFetch<PlayerResponse>(`/api/players/${playerId}`, "DELETE"),
    onSuccess: refresh,
  });

  return { update, archive };
}
