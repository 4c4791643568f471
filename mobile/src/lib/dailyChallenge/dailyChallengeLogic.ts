/**
 * Daily challenge screen reducer.
 */

import type { FetchTodaysDailyChallengeResponse } from "@lexicube/types";
import { noCommands, type ReduceResult } from "@/store/createStore";
import { assertNever } from "../errors";
import { alreadyPlayedAlert, couldNotFetchDailyAlert } from "./alerts";
import { DailyChallengeError } from "./startDailyChallenge";
import type {
  DailyChallengeAction,
  DailyChallengeCommand,
  DailyChallengeDeps,
  DailyChallengeState,
} from "./types";

type Result = ReduceResult<DailyChallengeState, DailyChallengeCommand>;

function isPlayable(state: DailyChallengeState, challenge: FetchTodaysDailyChallengeResponse): boolean {
  switch (challenge.dailyChallenge.gameMode) {
    case "timed":
      return !challenge.yourResult.started;
    case "unlimited":
      return !challenge.yourResult.started || state.inProgressDailyChallengeUnlimited !== null;
    default:
      return assertNever(challenge.dailyChallenge.gameMode);
  }
}

export function reduceDailyChallenge(
  state: DailyChallengeState,
  action: DailyChallengeAction,
  deps: DailyChallengeDeps
): Result {
  switch (action.type) {
    case "task":
      return {
        state,
        commands: [
          { type: "loadNotificationSettings" },
          { type: "loadSavedUnlimitedGame" },
          { type: "fetchTodaysDailyChallenges", language: deps.language },
        ],
      };

    case "fetchTodaysDailyChallengeResponse":
      if (!action.result.ok) return noCommands(state);
      return noCommands({ ...state, dailyChallenges: action.result.value });

    case "userNotificationSettingsResponse":
      return noCommands({ ...state, userNotificationSettings: action.settings });

    case "savedUnlimitedGameResponse":
      return noCommands({ ...state, inProgressDailyChallengeUnlimited: action.game });

    case "gameButtonTapped": {
      const challenge = state.dailyChallenges.find(
        (response) => response.dailyChallenge.gameMode === action.gameMode
      );
      if (!challenge) return noCommands(state);

      if (!isPlayable(state, challenge)) {
        return noCommands({
          ...state,
          destination: { type: "alert", alert: alreadyPlayedAlert(challenge.dailyChallenge.endsAt, deps.now()) },
        });
      }
      return {
        state: { ...state, gameModeIsLoading: challenge.dailyChallenge.gameMode },
        commands: [{ type: "startDailyChallenge", challenge }],
      };
    }

    case "startDailyChallengeResponse": {
      const { result } = action;
      if (result.ok) {
        return {
          state: { ...state, gameModeIsLoading: null },
          commands: [{ type: "startGame", game: result.value }],
        };
      }
      if (!(result.error instanceof DailyChallengeError)) return noCommands(state);

      const alert =
        result.error.code === "ALREADY_PLAYED"
          ? alreadyPlayedAlert(result.error.nextStartsAt, deps.now())
          : couldNotFetchDailyAlert(result.error.nextStartsAt, deps.now());
      return noCommands({ ...state, destination: { type: "alert", alert }, gameModeIsLoading: null });
    }

    case "notificationButtonTapped":
      return noCommands({ ...state, destination: { type: "notificationsAuthAlert" } });

    case "notificationsAuthAlert/turnOnNotificationsButtonTapped":
      return { state, commands: [{ type: "requestNotificationAuthorization" }] };

    case "notificationsAuthAlert/didChooseNotificationSettings":
      return noCommands({ ...state, destination: null, userNotificationSettings: action.settings });

    case "resultsButtonTapped":
      return noCommands({ ...state, destination: { type: "results" } });

    case "destinationDismissed":
      return noCommands({ ...state, destination: null });

    default:
      return assertNever(action);
  }
}
