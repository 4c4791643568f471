// =============================================================================
// Turn-based match types (snapshots owned by the external match service)
// =============================================================================

import type { ArchivablePuzzle, GameMode, Language, Move } from "./game";

/** Outcome recorded for a participant. `"none"` means the match is still undecided for them. */
export const MATCH_OUTCOMES = [
  "none",
  "quit",
  "won",
  "lost",
  "tied",
  "timeExpired",
  "first",
  "second",
  "third",
  "fourth",
] as const;

export type MatchOutcome = (typeof MATCH_OUTCOMES)[number];

export type MatchStatus = "unknown" | "open" | "ended" | "matching";

export type ParticipantStatus = "unknown" | "invited" | "declined" | "matching" | "active" | "done";

export interface Player {
  gamePlayerId: string;
  displayName: string;
}

export interface LocalPlayer extends Player {
  isAuthenticated: boolean;
}

export interface TurnBasedParticipant {
  player: Player | null;
  status: ParticipantStatus;
  matchOutcome: MatchOutcome;
  lastTurnDate: Date | null;
}

export interface TurnBasedMatch {
  matchId: string;
  participants: TurnBasedParticipant[];
  currentParticipant: TurnBasedParticipant | null;
  /** Opaque payload stored by the match service; empty or null until the first turn is saved. */
  matchData: Uint8Array | null;
  creationDate: Date;
  status: MatchStatus;
  message: string | null;
}

/** Events delivered by the match service's listener stream. */
export type TurnBasedListenerEvent =
  | { type: "matchEnded"; match: TurnBasedMatch }
  | { type: "receivedTurnEventForMatch"; match: TurnBasedMatch; didBecomeActive: boolean }
  | { type: "wantsToQuitMatch"; match: TurnBasedMatch };

export interface EndMatchInTurnRequest {
  matchId: string;
  matchData: Uint8Array;
  localPlayerId: string;
  localPlayerMatchOutcome: MatchOutcome;
  message: string;
}

export interface NotificationBannerRequest {
  title: string | null;
  message: string | null;
}

/** Local bookkeeping layered on top of a match snapshot and stored inside its payload. */
export interface TurnBasedMetadata {
  lastOpenedAt: Date | null;
  playerIndexToId: Record<number, string>;
}

export interface TurnBasedContext {
  localPlayer: LocalPlayer;
  match: TurnBasedMatch;
  metadata: TurnBasedMetadata;
}

/** Application-defined payload stored in {@link TurnBasedMatch.matchData}. */
export interface TurnBasedMatchData {
  cubes: ArchivablePuzzle;
  gameMode: GameMode;
  language: Language;
  metadata: TurnBasedMetadata;
  moves: Move[];
}
