/**
 * Game Center: ports, actions and commands
 */

import type {
  CompletedGame,
  EndMatchInTurnRequest,
  Language,
  LocalPlayer,
  NotificationBannerRequest,
  TurnBasedListenerEvent,
  TurnBasedMatch,
} from "@lexicube/types";
import type { RandomCubes } from "../game/puzzle";
import type { CommandFailedError, TurnDataError } from "../errors";
import type { TaskResult } from "@/store/createStore";

/** Client for the external turn-based match service */
export interface GameCenterClient {
  localPlayer: {
    authenticate(): Promise<void>;
    /** Live event stream. Ends when the service stops delivering or the iterator is returned. */
    listener(): AsyncIterable<TurnBasedListenerEvent>;
    localPlayer(): LocalPlayer;
  };
  turnBasedMatch: {
    rematch(matchId: string): Promise<TurnBasedMatch>;
    endMatchInTurn(request: EndMatchInTurnRequest): Promise<void>;
    saveCurrentTurn(matchId: string, matchData: Uint8Array): Promise<void>;
  };
  turnBasedMatchmakerViewController: {
    dismiss(): Promise<void>;
  };
  showNotificationBanner(request: NotificationBannerRequest): Promise<void>;
}

export interface GameDatabase {
  saveGame(game: CompletedGame): Promise<void>;
}

export type GameCenterAction =
  | { type: "appDelegate/didFinishLaunching" }
  | { type: "gameCenter/listener"; event: TurnBasedListenerEvent }
  | { type: "gameCenter/rematchResponse"; result: TaskResult<TurnBasedMatch> }
  | { type: "game/gameOver/rematchButtonTapped" }
  | { type: "home/activeGames/rematchTapped"; matchId: string }
  | { type: "home/pastGames/openMatch"; match: TurnBasedMatch };

export type GameCenterCommand =
  | { type: "authenticateAndListen" }
  | { type: "dismissMatchmaker" }
  | { type: "saveCurrentTurn"; matchId: string; matchData: Uint8Array }
  | { type: "showNotificationBanner"; title: string | null; message: string | null }
  | ({ type: "endMatchInTurn" } & EndMatchInTurnRequest)
  | { type: "rematch"; matchId: string }
  | { type: "saveGame"; game: CompletedGame }
  | { type: "reportError"; matchId: string | null; error: TurnDataError | CommandFailedError };

/** Everything the reconciliation reads besides its inputs */
export interface GameCenterDeps {
  now(): Date;
  randomCubes: RandomCubes;
  /** Dictionary for fresh boards */
  language: Language;
  localPlayer(): LocalPlayer;
  /** Id of the signed-in player on the game's own backend, if any */
  currentPlayerId(): string | null;
}
