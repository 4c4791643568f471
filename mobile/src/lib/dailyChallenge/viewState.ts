import type { FetchTodaysDailyChallengeResponse, GameMode, InProgressGame } from "@lexicube/types";
import { isAuthorizationDetermined } from "../userNotifications/client";
import { timeDescriptionUntilTomorrow } from "./alerts";
import type { DailyChallengeState } from "./types";

export type DailyChallengeButtonState =
  | { type: "played"; rank: number; outOf: number }
  | { type: "playable" }
  | { type: "resume"; currentScore: number }
  | { type: "unplayable" };

export interface DailyChallengeViewState {
  gameModeIsLoading: GameMode | null;
  isNotificationStatusDetermined: boolean;
  numberOfPlayers: number;
  timeLeft: string;
  timedState: DailyChallengeButtonState;
  unlimitedState: DailyChallengeButtonState;
}

export function currentScore(game: InProgressGame): number {
  return game.moves.reduce((total, move) => total + move.score, 0);
}

/** Largest field across today's challenges; a player who tried both modes counts once. */
export function numberOfPlayers(challenges: readonly FetchTodaysDailyChallengeResponse[]): number {
  return challenges.reduce((most, challenge) => Math.max(most, challenge.yourResult.outOf), 0);
}

export function buttonState(
  response: FetchTodaysDailyChallengeResponse | undefined,
  inProgressGame: InProgressGame | null
): DailyChallengeButtonState {
  const rank = response?.yourResult.rank ?? null;
  if (response && rank !== null) {
    return { type: "played", rank, outOf: response.yourResult.outOf };
  }
  if (inProgressGame) return { type: "resume", currentScore: currentScore(inProgressGame) };
  if (response?.yourResult.started) return { type: "unplayable" };
  return { type: "playable" };
}

/** Label under an inactive game button, if any */
export function inactiveText(state: DailyChallengeButtonState): string | null {
  switch (state.type) {
    case "played":
      return `Played\n#${state.rank} of ${state.outOf}`;
    case "unplayable":
      return "Played";
    default:
      return null;
  }
}

export function resumeText(state: DailyChallengeButtonState): string | null {
  return state.type === "resume" && state.currentScore > 0 ? `${state.currentScore} pts` : null;
}

export function dailyChallengeViewState(state: DailyChallengeState, now: Date): DailyChallengeViewState {
  const forMode = (gameMode: GameMode) =>
    state.dailyChallenges.find((response) => response.dailyChallenge.gameMode === gameMode);

  return {
    gameModeIsLoading: state.gameModeIsLoading,
    isNotificationStatusDetermined: isAuthorizationDetermined(state.userNotificationSettings),
    numberOfPlayers: numberOfPlayers(state.dailyChallenges),
    timeLeft: timeDescriptionUntilTomorrow(now),
    timedState: buttonState(forMode("timed"), null),
    unlimitedState: buttonState(forMode("unlimited"), state.inProgressDailyChallengeUnlimited),
  };
}
