/**
 * Game Center: turn reconciliation
 *
 * Maps match-service events and the related taps onto the app destination
 * and the commands to issue back to the service. Terminal matches always
 * win over an in-progress board.
 */

import type { TurnBasedListenerEvent, TurnBasedMatch } from "@lexicube/types";
import { noCommands, type ReduceResult } from "@/store/createStore";
import { gameDestination, idleDestination, screenPhase, type AppState } from "@/store/appState";
import { assertNever, CommandFailedError, NoTurnDataYetError, type TurnDataError } from "../errors";
import { TURN_NOTIFICATION_WINDOW_MS } from "../game/constants";
import {
  completedGame,
  createGame,
  emptyActiveGames,
  gameFromTurnBasedMatch,
  isYourTurn,
  turnBasedMatchIdOf,
  withGameOver,
} from "../game/gameState";
import { decodeMatchData, encodeMatchData, encodeTurn } from "./matchData";
import {
  allOutcomesUnset,
  createTurnBasedContext,
  currentParticipantIsLocalPlayer,
  isMatchOver,
  lastTurnDate,
} from "./turnBasedContext";
import type { GameCenterAction, GameCenterCommand, GameCenterDeps } from "./types";

type Result = ReduceResult<AppState, GameCenterCommand>;

function decodeFailure(state: AppState, match: TurnBasedMatch, error: TurnDataError): Result {
  if (error instanceof NoTurnDataYetError) return noCommands(state);
  return { state, commands: [{ type: "reportError", matchId: match.matchId, error }] };
}

/** A match with no turns yet: roll a board and save it as the first turn. */
function startFreshMatch(state: AppState, match: TurnBasedMatch, deps: GameCenterDeps): Result {
  const now = deps.now();
  const context = createTurnBasedContext(deps.localPlayer(), match, {
    lastOpenedAt: now,
    playerIndexToId: {},
  });
  const game = createGame({
    cubes: deps.randomCubes(deps.language),
    gameContext: { type: "turnBased", context },
    gameCurrentTime: now,
    gameMode: "unlimited",
    gameStartTime: match.creationDate,
    language: deps.language,
  });

  return {
    state: { ...state, destination: { type: "game", game } },
    commands: [
      { type: "dismissMatchmaker" },
      {
        type: "saveCurrentTurn",
        matchId: match.matchId,
        matchData: encodeTurn({ context, game, playerId: deps.currentPlayerId() }),
      },
    ],
  };
}

export function handleTurnBasedMatch(
  state: AppState,
  match: TurnBasedMatch,
  didBecomeActive: boolean,
  deps: GameCenterDeps
): Result {
  if (!match.matchData || match.matchData.byteLength === 0) {
    return startFreshMatch(state, match, deps);
  }

  const decoded = decodeMatchData(match.matchData);
  if (!decoded.ok) return decodeFailure(state, match, decoded.error);
  const matchData = decoded.data;
  const now = deps.now();
  const localPlayer = deps.localPlayer();
  const displayed = gameDestination(state.destination);

  if (didBecomeActive) {
    let game = {
      ...gameFromTurnBasedMatch({ gameCurrentTime: now, localPlayer, match, matchData }),
      activeGames: displayed?.activeGames ?? emptyActiveGames(),
      isGameLoaded: displayed !== null,
    };
    if (isMatchOver(match)) {
      game = withGameOver(game);
    }

    const commands: GameCenterCommand[] = [{ type: "dismissMatchmaker" }];
    if (isYourTurn(game)) {
      commands.push({
        type: "saveCurrentTurn",
        matchId: match.matchId,
        matchData: encodeMatchData({
          ...matchData,
          metadata: { ...matchData.metadata, lastOpenedAt: now },
        }),
      });
    }
    return { state: { ...state, destination: { type: "game", game } }, commands };
  }

  // Background update for a match that isn't on screen: nudge the player if
  // an opponent just moved and the match is now waiting on them.
  const context = createTurnBasedContext(localPlayer, match, matchData.metadata);
  const latestTurn = lastTurnDate(match);
  if (
    (displayed && turnBasedMatchIdOf(displayed) === match.matchId) ||
    !currentParticipantIsLocalPlayer(context) ||
    !allOutcomesUnset(match) ||
    !latestTurn ||
    latestTurn.getTime() <= now.getTime() - TURN_NOTIFICATION_WINDOW_MS
  ) {
    return noCommands(state);
  }

  return {
    state,
    commands: [{ type: "showNotificationBanner", title: match.message, message: null }],
  };
}

function reduceListenerEvent(
  state: AppState,
  event: TurnBasedListenerEvent,
  deps: GameCenterDeps
): Result {
  switch (event.type) {
    case "matchEnded": {
      const { match } = event;
      const displayed = gameDestination(state.destination);
      if (!displayed || turnBasedMatchIdOf(displayed) !== match.matchId) {
        return noCommands(state);
      }
      const decoded = decodeMatchData(match.matchData);
      if (!decoded.ok) return decodeFailure(state, match, decoded.error);

      const game = withGameOver({
        ...gameFromTurnBasedMatch({
          gameCurrentTime: deps.now(),
          localPlayer: deps.localPlayer(),
          match,
          matchData: decoded.data,
        }),
        activeGames: displayed.activeGames,
        isGameLoaded: true,
      });
      return {
        state: { ...state, destination: { type: "game", game } },
        commands: [{ type: "saveGame", game: completedGame(game) }],
      };
    }

    case "receivedTurnEventForMatch":
      return handleTurnBasedMatch(state, event.match, event.didBecomeActive, deps);

    case "wantsToQuitMatch": {
      const localPlayer = deps.localPlayer();
      return {
        state,
        commands: [
          {
            type: "endMatchInTurn",
            matchId: event.match.matchId,
            matchData: event.match.matchData ?? new Uint8Array(),
            localPlayerId: localPlayer.gamePlayerId,
            localPlayerMatchOutcome: "quit",
            message: `${localPlayer.displayName} forfeited the match.`,
          },
        ],
      };
    }

    default:
      return assertNever(event);
  }
}

export function reduceGameCenter(
  state: AppState,
  action: GameCenterAction,
  deps: GameCenterDeps
): Result {
  switch (action.type) {
    case "appDelegate/didFinishLaunching":
      return { state, commands: [{ type: "authenticateAndListen" }] };

    case "gameCenter/listener":
      return reduceListenerEvent(state, action.event, deps);

    case "gameCenter/rematchResponse":
      if (!action.result.ok) {
        return {
          state,
          commands: [
            {
              type: "reportError",
              matchId: null,
              error: new CommandFailedError("rematch", action.result.error),
            },
          ],
        };
      }
      return handleTurnBasedMatch(state, action.result.value, true, deps);

    case "game/gameOver/rematchButtonTapped": {
      const phase = screenPhase(state.destination);
      if (phase.type !== "finished" || phase.matchId === null) return noCommands(state);
      return {
        state: { ...state, destination: idleDestination },
        commands: [{ type: "rematch", matchId: phase.matchId }],
      };
    }

    case "home/activeGames/rematchTapped":
      return { state, commands: [{ type: "rematch", matchId: action.matchId }] };

    case "home/pastGames/openMatch":
      return handleTurnBasedMatch(state, action.match, true, deps);

    default:
      return assertNever(action);
  }
}
