import type { CompletedGame, InProgressGame } from "@lexicube/types";
import type { GameDatabase } from "../gameCenter/types";

/** Process-local game archive. Nothing survives a restart. */
export interface InMemoryGameDatabase extends GameDatabase {
  readonly completedGames: readonly CompletedGame[];
  saveUnlimitedDailyChallenge(game: InProgressGame | null): void;
  loadSavedUnlimitedGame(): Promise<InProgressGame | null>;
}

export function createInMemoryGameDatabase(): InMemoryGameDatabase {
  const completedGames: CompletedGame[] = [];
  let unlimitedDaily: InProgressGame | null = null;

  return {
    completedGames,
    async saveGame(game) {
      completedGames.push(game);
    },
    saveUnlimitedDailyChallenge(game) {
      unlimitedDaily = game;
    },
    async loadSavedUnlimitedGame() {
      return unlimitedDaily;
    },
  };
}
