// =============================================================================
// Lexicube game types (canonical source)
// =============================================================================

import type { TurnBasedContext } from "./match";

/** Edge length of the cube of cubes: 3 × 3 × 3 */
export const PUZZLE_SIZE = 3;

/** Each letter face may be used this many times before it is spent */
export const MAX_FACE_USES = 3;

export const LANGUAGES = ["en"] as const;
export type Language = (typeof LANGUAGES)[number];

export const GAME_MODES = ["timed", "unlimited"] as const;
export type GameMode = (typeof GAME_MODES)[number];

export const CUBE_FACE_SIDES = ["top", "left", "right"] as const;
export type CubeFaceSide = (typeof CUBE_FACE_SIDES)[number];

export interface CubeFace {
  letter: string;
  side: CubeFaceSide;
  useCount: number;
}

export interface Cube {
  top: CubeFace;
  left: CubeFace;
  right: CubeFace;
  wasRemoved: boolean;
}

/** Cubes addressed as puzzle[x][y][z] */
export type Puzzle = Cube[][][];

/** Letters only: what gets stored in a turn payload. Use counts are rebuilt from the moves. */
export interface ArchivableCube {
  top: string;
  left: string;
  right: string;
}

export type ArchivablePuzzle = ArchivableCube[][][];

export interface LatticePoint {
  x: number;
  y: number;
  z: number;
}

export interface IndexedCubeFace {
  index: LatticePoint;
  side: CubeFaceSide;
}

export type MoveType =
  | { type: "playedWord"; cubeFaces: IndexedCubeFace[] }
  | { type: "removedCube"; index: LatticePoint };

export interface Move {
  playedAt: Date;
  /** Participant index for turn-based games, null otherwise */
  playerIndex: number | null;
  score: number;
  move: MoveType;
}

export type GameContext =
  | { type: "solo" }
  | { type: "dailyChallenge"; dailyChallengeId: string }
  | { type: "shared"; code: string }
  | { type: "turnBased"; context: TurnBasedContext };

/** Snapshot of a finished game, handed to the game-over screen and persisted. */
export interface CompletedGame {
  cubes: ArchivablePuzzle;
  gameContext: GameContext;
  gameMode: GameMode;
  gameStartTime: Date;
  language: Language;
  localPlayerIndex: number | null;
  moves: Move[];
  secondsPlayed: number;
}

/** A game that can be resumed from disk or started from a daily challenge. */
export interface InProgressGame {
  cubes: Puzzle;
  gameContext: GameContext;
  gameMode: GameMode;
  gameStartTime: Date;
  language: Language;
  moves: Move[];
  secondsPlayed: number;
}

export interface ActiveTurnBasedMatch {
  matchId: string;
  isYourTurn: boolean;
  lastPlayedAt: Date;
  playerDisplayName: string | null;
}

/** Games listed on the home screen, carried over when a match is reopened */
export interface ActiveGamesState {
  savedGames: InProgressGame[];
  turnBasedMatches: ActiveTurnBasedMatch[];
}

export interface GameOverState {
  completedGame: CompletedGame;
  isDemo: boolean;
  turnBasedContext: TurnBasedContext | null;
}

export type GameDestination = { type: "gameOver"; state: GameOverState };

export interface GameState {
  activeGames: ActiveGamesState;
  cubes: Puzzle;
  destination: GameDestination | null;
  gameContext: GameContext;
  gameCurrentTime: Date;
  gameMode: GameMode;
  gameStartTime: Date;
  isDemo: boolean;
  isGameLoaded: boolean;
  language: Language;
  moves: Move[];
  secondsPlayed: number;
}
