/**
 * Game screen state: constructors and derived values.
 */

import type {
  ActiveGamesState,
  CompletedGame,
  GameContext,
  GameMode,
  GameState,
  Language,
  LocalPlayer,
  Move,
  Puzzle,
  TurnBasedContext,
  TurnBasedMatch,
  TurnBasedMatchData,
} from "@lexicube/types";
import {
  createTurnBasedContext,
  currentParticipantIsLocalPlayer,
  localPlayerIndex,
} from "../gameCenter/turnBasedContext";
import { applyMoves, archivePuzzle, puzzleFromArchive } from "./puzzle";

export function emptyActiveGames(): ActiveGamesState {
  return { savedGames: [], turnBasedMatches: [] };
}

export interface NewGameInput {
  cubes: Puzzle;
  gameContext: GameContext;
  gameCurrentTime: Date;
  gameMode: GameMode;
  gameStartTime: Date;
  language?: Language;
  moves?: Move[];
  secondsPlayed?: number;
  isDemo?: boolean;
}

export function createGame(input: NewGameInput): GameState {
  return {
    activeGames: emptyActiveGames(),
    cubes: input.cubes,
    destination: null,
    gameContext: input.gameContext,
    gameCurrentTime: input.gameCurrentTime,
    gameMode: input.gameMode,
    gameStartTime: input.gameStartTime,
    isDemo: input.isDemo ?? false,
    isGameLoaded: false,
    language: input.language ?? "en",
    moves: input.moves ?? [],
    secondsPlayed: input.secondsPlayed ?? 0,
  };
}

/**
 * Materialize a game from a match snapshot and its decoded payload.
 * The board is rebuilt by replaying the payload's moves.
 */
export function gameFromTurnBasedMatch(input: {
  gameCurrentTime: Date;
  localPlayer: LocalPlayer;
  match: TurnBasedMatch;
  matchData: TurnBasedMatchData;
}): GameState {
  const { gameCurrentTime, localPlayer, match, matchData } = input;
  return createGame({
    cubes: applyMoves(puzzleFromArchive(matchData.cubes), matchData.moves),
    gameContext: {
      type: "turnBased",
      context: createTurnBasedContext(localPlayer, match, matchData.metadata),
    },
    gameCurrentTime,
    gameMode: matchData.gameMode,
    gameStartTime: match.creationDate,
    language: matchData.language,
    moves: matchData.moves,
  });
}

export function turnBasedContextOf(game: GameState): TurnBasedContext | null {
  return game.gameContext.type === "turnBased" ? game.gameContext.context : null;
}

export function turnBasedMatchIdOf(game: GameState): string | null {
  return turnBasedContextOf(game)?.match.matchId ?? null;
}

/** Solo games are always the player's turn; turn-based ones only while the match is open. */
export function isYourTurn(game: GameState): boolean {
  const context = turnBasedContextOf(game);
  if (!context) return true;
  if (game.destination?.type === "gameOver") return false;
  return context.match.status === "open" && currentParticipantIsLocalPlayer(context);
}

export function completedGame(game: GameState): CompletedGame {
  const context = turnBasedContextOf(game);
  return {
    cubes: archivePuzzle(game.cubes),
    gameContext: game.gameContext,
    gameMode: game.gameMode,
    gameStartTime: game.gameStartTime,
    language: game.language,
    localPlayerIndex: context ? localPlayerIndex(context) : null,
    moves: game.moves,
    secondsPlayed: game.secondsPlayed,
  };
}

/** Nest the game-over summary inside the game. */
export function withGameOver(game: GameState): GameState {
  return {
    ...game,
    destination: {
      type: "gameOver",
      state: {
        completedGame: completedGame(game),
        isDemo: game.isDemo,
        turnBasedContext: turnBasedContextOf(game),
      },
    },
  };
}
