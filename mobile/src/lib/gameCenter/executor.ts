/**
 * Game Center: command executor
 *
 * Performs the I/O behind each reconciliation command. Service failures are
 * raised as CommandFailedError for the store to log; nothing is retried.
 */

import { consumeUntilAborted } from "../asyncQueue";
import type { Logger } from "../logger";
import { assertNever, CommandFailedError, NoTurnDataYetError, toError } from "../errors";
import type { CommandContext } from "@/store/createStore";
import type { GameCenterAction, GameCenterClient, GameCenterCommand, GameDatabase } from "./types";

export interface GameCenterExecutorDeps {
  gameCenter: GameCenterClient;
  database: GameDatabase;
  logger: Logger;
}

async function attempt<T>(command: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new CommandFailedError(command, error);
  }
}

/**
 * Read the listener stream one event at a time until it ends or the store is torn down.
 */
async function listen(
  gameCenter: GameCenterClient,
  { send, signal }: CommandContext<GameCenterAction>,
  logger: Logger
): Promise<void> {
  await attempt("authenticate", () => gameCenter.localPlayer.authenticate());
  logger.info("[GameCenter] Local player authenticated");

  await consumeUntilAborted(
    gameCenter.localPlayer.listener(),
    signal,
    (event) => {
      logger.debug("[GameCenter] Listener event", { type: event.type, matchId: event.match.matchId });
      send({ type: "gameCenter/listener", event });
    },
    (error) => logger.warn("[GameCenter] Failed to close listener", { error })
  );
  logger.info("[GameCenter] Listener stopped", { aborted: signal.aborted });
}

export function describeGameCenterCommand(command: GameCenterCommand): string {
  return "matchId" in command && command.matchId ? `${command.type}:${command.matchId}` : command.type;
}

export function createGameCenterExecutor({ gameCenter, database, logger }: GameCenterExecutorDeps) {
  return async function execute(
    command: GameCenterCommand,
    context: CommandContext<GameCenterAction>
  ): Promise<void> {
    switch (command.type) {
      case "authenticateAndListen":
        return listen(gameCenter, context, logger);

      case "dismissMatchmaker":
        return attempt(command.type, () => gameCenter.turnBasedMatchmakerViewController.dismiss());

      case "saveCurrentTurn":
        await attempt(command.type, () =>
          gameCenter.turnBasedMatch.saveCurrentTurn(command.matchId, command.matchData)
        );
        logger.debug("[GameCenter] Turn saved", { matchId: command.matchId });
        return;

      case "showNotificationBanner":
        return attempt(command.type, () =>
          gameCenter.showNotificationBanner({ title: command.title, message: command.message })
        );

      case "endMatchInTurn": {
        const { type, ...request } = command;
        await attempt(type, () => gameCenter.turnBasedMatch.endMatchInTurn(request));
        logger.info("[GameCenter] Match ended in turn", {
          matchId: request.matchId,
          outcome: request.localPlayerMatchOutcome,
        });
        return;
      }

      case "rematch":
        try {
          const match = await gameCenter.turnBasedMatch.rematch(command.matchId);
          context.send({ type: "gameCenter/rematchResponse", result: { ok: true, value: match } });
        } catch (error) {
          context.send({
            type: "gameCenter/rematchResponse",
            result: { ok: false, error: toError(error) },
          });
        }
        return;

      case "saveGame":
        return attempt(command.type, () => database.saveGame(command.game));

      case "reportError":
        if (command.error instanceof NoTurnDataYetError) return;
        logger.warn("[GameCenter] " + command.error.message, {
          matchId: command.matchId,
          code: command.error.code,
          details: command.error.details,
        });
        return;

      default:
        return assertNever(command);
    }
  };
}
