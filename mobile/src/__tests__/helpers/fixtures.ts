import { vi } from "vitest";
import type {
  DailyChallengeResult,
  FetchTodaysDailyChallengeResponse,
  GameMode,
  InProgressGame,
  LocalPlayer,
  Player,
  TurnBasedMatch,
  TurnBasedMatchData,
  TurnBasedParticipant,
} from "@lexicube/types";
import type { GameCenterDeps } from "@/lib/gameCenter/types";
import type { Logger } from "@/lib/logger";
import { archivePuzzle, randomCubes } from "@/lib/game/puzzle";

export const NOW = new Date("2026-03-14T12:00:00.000Z");
export const CREATED_AT = new Date("2026-03-14T09:00:00.000Z");

export const localPlayer: LocalPlayer = {
  gamePlayerId: "player-local",
  displayName: "Blob",
  isAuthenticated: true,
};

export const remotePlayer: Player = {
  gamePlayerId: "player-remote",
  displayName: "Blob Jr",
};

export function secondsBefore(date: Date, seconds: number): Date {
  return new Date(date.getTime() - seconds * 1000);
}

export function participant(
  player: Player | null,
  overrides: Partial<TurnBasedParticipant> = {}
): TurnBasedParticipant {
  return { player, status: "active", matchOutcome: "none", lastTurnDate: null, ...overrides };
}

/**
 * Two-player open match where it's the local player's turn.
 * `current` picks which participant slot holds the turn.
 */
export function makeMatch(
  overrides: Partial<TurnBasedMatch> & { current?: "local" | "remote" } = {}
): TurnBasedMatch {
  const { current = "local", ...rest } = overrides;
  const participants = rest.participants ?? [participant(localPlayer), participant(remotePlayer)];
  return {
    matchId: "match-1",
    participants,
    currentParticipant: current === "local" ? participants[0] : participants[1],
    matchData: null,
    creationDate: CREATED_AT,
    status: "open",
    message: null,
    ...rest,
  };
}

/** Every face shows "A" */
export const allAs = (language: "en") => randomCubes(language, () => 0);

export function makeMatchData(overrides: Partial<TurnBasedMatchData> = {}): TurnBasedMatchData {
  return {
    cubes: archivePuzzle(allAs("en")),
    gameMode: "unlimited",
    language: "en",
    metadata: { lastOpenedAt: null, playerIndexToId: {} },
    moves: [],
    ...overrides,
  };
}

export function makeDeps(overrides: Partial<GameCenterDeps> = {}): GameCenterDeps {
  return {
    now: () => NOW,
    randomCubes: allAs,
    language: "en",
    localPlayer: () => localPlayer,
    currentPlayerId: () => "backend-local",
    ...overrides,
  };
}

export type MockLogger = Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  fatal: ReturnType<typeof vi.fn>;
};

/** Logger whose calls can be asserted. Children share the parent's mocks. */
export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
  };
  return logger;
}

export const DAILY_ENDS_AT = new Date("2026-03-14T15:00:00.000Z");

export function makeDailyChallenge(
  gameMode: GameMode,
  yourResult: Partial<DailyChallengeResult> = {}
): FetchTodaysDailyChallengeResponse {
  return {
    dailyChallenge: { id: `daily-${gameMode}`, endsAt: DAILY_ENDS_AT, gameMode, language: "en" },
    yourResult: { outOf: 0, rank: null, score: null, started: false, ...yourResult },
  };
}

export function makeInProgressGame(overrides: Partial<InProgressGame> = {}): InProgressGame {
  return {
    cubes: allAs("en"),
    gameContext: { type: "dailyChallenge", dailyChallengeId: "daily-unlimited" },
    gameMode: "unlimited",
    gameStartTime: CREATED_AT,
    language: "en",
    moves: [],
    secondsPlayed: 0,
    ...overrides,
  };
}
