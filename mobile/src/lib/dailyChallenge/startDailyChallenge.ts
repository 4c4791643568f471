import type {
  FetchTodaysDailyChallengeResponse,
  InProgressGame,
  StartDailyChallengeResponse,
} from "@lexicube/types";
import type { ApiClient } from "../api/apiClient";
import { ApiRequestError, LexicubeError } from "../errors";
import { puzzleFromArchive } from "../game/puzzle";

export type DailyChallengeErrorCode = "ALREADY_PLAYED" | "COULD_NOT_FETCH";

export class DailyChallengeError extends LexicubeError {
  declare readonly code: DailyChallengeErrorCode;
  readonly nextStartsAt: Date;

  constructor(code: DailyChallengeErrorCode, nextStartsAt: Date) {
    super(
      code,
      code === "ALREADY_PLAYED" ? "Daily challenge already played" : "Could not fetch daily challenge",
      { nextStartsAt: nextStartsAt.toISOString() }
    );
    this.nextStartsAt = nextStartsAt;
  }
}

/** Server rejection for a player who already started today's challenge */
export const ALREADY_STARTED_API_CODE = "DAILY_CHALLENGE_ALREADY_STARTED";

export function inProgressGameFromResponse(response: StartDailyChallengeResponse, now: Date): InProgressGame {
  const { dailyChallenge } = response;
  return {
    cubes: puzzleFromArchive(dailyChallenge.puzzle),
    gameContext: { type: "dailyChallenge", dailyChallengeId: dailyChallenge.id },
    gameMode: dailyChallenge.gameMode,
    gameStartTime: now,
    language: dailyChallenge.language,
    moves: [],
    secondsPlayed: 0,
  };
}

export interface StartDailyChallengeDeps {
  apiClient: ApiClient;
  now(): Date;
  loadSavedUnlimitedGame(): Promise<InProgressGame | null>;
}

/**
 * Resume a saved unlimited daily, or ask the API to start a fresh one.
 * Failures surface as DailyChallengeError.
 */
export async function startDailyChallenge(
  challenge: FetchTodaysDailyChallengeResponse,
  { apiClient, now, loadSavedUnlimitedGame }: StartDailyChallengeDeps
): Promise<InProgressGame> {
  const { endsAt, gameMode, language } = challenge.dailyChallenge;

  if (gameMode === "unlimited") {
    const saved = await loadSavedUnlimitedGame().catch(() => null);
    if (saved) return saved;
  }

  if (challenge.yourResult.started) {
    throw new DailyChallengeError("ALREADY_PLAYED", endsAt);
  }

  try {
    return inProgressGameFromResponse(await apiClient.startDailyChallenge(gameMode, language), now());
  } catch (error) {
    if (error instanceof ApiRequestError && error.code === ALREADY_STARTED_API_CODE) {
      throw new DailyChallengeError("ALREADY_PLAYED", endsAt);
    }
    throw new DailyChallengeError("COULD_NOT_FETCH", endsAt);
  }
}
