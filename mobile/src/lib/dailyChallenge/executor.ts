import type { InProgressGame } from "@lexicube/types";
import type { CommandContext } from "@/store/createStore";
import type { ApiClient } from "../api/apiClient";
import { assertNever, CommandFailedError, toError } from "../errors";
import type { Logger } from "../logger";
import type { UserNotificationClient } from "../userNotifications/client";
import { startDailyChallenge } from "./startDailyChallenge";
import type { DailyChallengeAction, DailyChallengeCommand } from "./types";

export interface DailyChallengeExecutorDeps {
  apiClient: ApiClient;
  userNotifications: UserNotificationClient;
  now(): Date;
  loadSavedUnlimitedGame(): Promise<InProgressGame | null>;
  /** Hand a ready game to whoever presents it */
  onStartGame(game: InProgressGame): void;
  logger: Logger;
}

export function createDailyChallengeExecutor(deps: DailyChallengeExecutorDeps) {
  const { apiClient, userNotifications, logger } = deps;

  return async function execute(
    command: DailyChallengeCommand,
    { send }: CommandContext<DailyChallengeAction>
  ): Promise<void> {
    switch (command.type) {
      case "fetchTodaysDailyChallenges":
        try {
          const value = await apiClient.fetchTodaysDailyChallenges(command.language);
          send({ type: "fetchTodaysDailyChallengeResponse", result: { ok: true, value } });
        } catch (error) {
          logger.warn("[DailyChallenge] Failed to fetch today's challenges", { error });
          send({ type: "fetchTodaysDailyChallengeResponse", result: { ok: false, error: toError(error) } });
        }
        return;

      case "loadNotificationSettings": {
        const settings = await userNotifications.getNotificationSettings();
        send({ type: "userNotificationSettingsResponse", settings });
        return;
      }

      case "loadSavedUnlimitedGame": {
        const game = await deps.loadSavedUnlimitedGame().catch((error: unknown) => {
          logger.warn("[DailyChallenge] Failed to load saved unlimited game", { error });
          return null;
        });
        send({ type: "savedUnlimitedGameResponse", game });
        return;
      }

      case "startDailyChallenge":
        try {
          const game = await startDailyChallenge(command.challenge, deps);
          send({ type: "startDailyChallengeResponse", result: { ok: true, value: game } });
        } catch (error) {
          send({ type: "startDailyChallengeResponse", result: { ok: false, error: toError(error) } });
        }
        return;

      case "requestNotificationAuthorization": {
        try {
          const granted = await userNotifications.requestAuthorization(["alert", "sound"]);
          logger.info("[DailyChallenge] Notification authorization answered", { granted });
        } catch (error) {
          throw new CommandFailedError(command.type, error);
        }
        const settings = await userNotifications.getNotificationSettings();
        send({ type: "notificationsAuthAlert/didChooseNotificationSettings", settings });
        return;
      }

      case "startGame":
        deps.onStartGame(command.game);
        return;

      default:
        return assertNever(command);
    }
  };
}
