import type { GameState } from "@lexicube/types";
import { turnBasedMatchIdOf } from "@/lib/game/gameState";

/** The single screen currently presented by the app */
export type AppDestination = { type: "idle" } | { type: "game"; game: GameState };

export interface AppState {
  destination: AppDestination;
}

export const idleDestination: AppDestination = { type: "idle" };

export const initialAppState: AppState = { destination: idleDestination };

export function gameDestination(destination: AppDestination): GameState | null {
  return destination.type === "game" ? destination.game : null;
}

/** Where the displayed match stands: nothing shown, being played, or showing its game-over summary */
export type ScreenPhase =
  | { type: "idle" }
  | { type: "viewing"; matchId: string | null }
  | { type: "finished"; matchId: string | null };

export function screenPhase(destination: AppDestination): ScreenPhase {
  const game = gameDestination(destination);
  if (!game) return { type: "idle" };
  const matchId = turnBasedMatchIdOf(game);
  return game.destination?.type === "gameOver"
    ? { type: "finished", matchId }
    : { type: "viewing", matchId };
}
