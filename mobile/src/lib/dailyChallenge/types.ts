import type {
  FetchTodaysDailyChallengeResponse,
  GameMode,
  InProgressGame,
  Language,
} from "@lexicube/types";
import type { TaskResult } from "@/store/createStore";
import type { NotificationSettings } from "../userNotifications/client";

export interface AlertState {
  title: string;
  message: string;
  dismissButton: string;
}

export type DailyChallengeDestination =
  | { type: "alert"; alert: AlertState }
  | { type: "notificationsAuthAlert" }
  | { type: "results" };

export interface DailyChallengeState {
  dailyChallenges: FetchTodaysDailyChallengeResponse[];
  destination: DailyChallengeDestination | null;
  gameModeIsLoading: GameMode | null;
  inProgressDailyChallengeUnlimited: InProgressGame | null;
  userNotificationSettings: NotificationSettings | null;
}

export function initialDailyChallengeState(
  overrides: Partial<DailyChallengeState> = {}
): DailyChallengeState {
  return {
    dailyChallenges: [],
    destination: null,
    gameModeIsLoading: null,
    inProgressDailyChallengeUnlimited: null,
    userNotificationSettings: null,
    ...overrides,
  };
}

export type DailyChallengeAction =
  | { type: "task" }
  | { type: "fetchTodaysDailyChallengeResponse"; result: TaskResult<FetchTodaysDailyChallengeResponse[]> }
  | { type: "userNotificationSettingsResponse"; settings: NotificationSettings }
  | { type: "savedUnlimitedGameResponse"; game: InProgressGame | null }
  | { type: "gameButtonTapped"; gameMode: GameMode }
  | { type: "startDailyChallengeResponse"; result: TaskResult<InProgressGame> }
  | { type: "notificationButtonTapped" }
  | { type: "notificationsAuthAlert/turnOnNotificationsButtonTapped" }
  | { type: "notificationsAuthAlert/didChooseNotificationSettings"; settings: NotificationSettings }
  | { type: "resultsButtonTapped" }
  | { type: "destinationDismissed" };

export type DailyChallengeCommand =
  | { type: "fetchTodaysDailyChallenges"; language: Language }
  | { type: "loadNotificationSettings" }
  | { type: "loadSavedUnlimitedGame" }
  | { type: "startDailyChallenge"; challenge: FetchTodaysDailyChallengeResponse }
  | { type: "requestNotificationAuthorization" }
  | { type: "startGame"; game: InProgressGame };

export interface DailyChallengeDeps {
  now(): Date;
  language: Language;
}
