import type { ArchivablePuzzle, GameMode, Language } from "./game";

export interface DailyChallengeSummary {
  id: string;
  endsAt: Date;
  gameMode: GameMode;
  language: Language;
}

/** The caller's standing in a daily challenge. `rank` and `score` are null until they finish. */
export interface DailyChallengeResult {
  outOf: number;
  rank: number | null;
  score: number | null;
  started: boolean;
}

export interface FetchTodaysDailyChallengeResponse {
  dailyChallenge: DailyChallengeSummary;
  yourResult: DailyChallengeResult;
}

export interface StartDailyChallengeResponse {
  dailyChallenge: DailyChallengeSummary & {
    gameNumber: number;
    puzzle: ArchivablePuzzle;
  };
  dailyChallengePlayId: string;
}
