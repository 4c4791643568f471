import { createGameCenterExecutor, describeGameCenterCommand } from "@/lib/gameCenter/executor";
import { reduceGameCenter } from "@/lib/gameCenter/gameCenterLogic";
import type {
  GameCenterAction,
  GameCenterClient,
  GameCenterDeps,
  GameDatabase,
} from "@/lib/gameCenter/types";
import type { Logger } from "@/lib/logger";
import { initialAppState, type AppState } from "./appState";
import { createStore, type Store } from "./createStore";

export interface AppStoreOptions {
  gameCenter: GameCenterClient;
  database: GameDatabase;
  deps: GameCenterDeps;
  logger: Logger;
  initialState?: AppState;
}

/** App-level store: the presented screen plus turn-based match reconciliation */
export function createAppStore({
  gameCenter,
  database,
  deps,
  logger,
  initialState = initialAppState,
}: AppStoreOptions): Store<AppState, GameCenterAction> {
  return createStore({
    name: "GameCenter",
    initialState,
    reducer: reduceGameCenter,
    deps,
    execute: createGameCenterExecutor({ gameCenter, database, logger }),
    logger,
    describeCommand: describeGameCenterCommand,
  });
}
