/**
 * Composition root: config, logging, clients and feature stores.
 */

import type { InProgressGame, ServerConfig } from "@lexicube/types";
import { env as defaultEnv, type Env } from "@/config/env";
import { createApiClient } from "@/lib/api/apiClient";
import { FULL_GAME_PRODUCT_ID } from "@/lib/game/constants";
import { createInMemoryGameDatabase, type InMemoryGameDatabase } from "@/lib/game/inMemoryGameDatabase";
import { liveRandomCubes } from "@/lib/game/puzzle";
import type { GameCenterClient } from "@/lib/gameCenter/types";
import defaultLogger, { type Logger } from "@/lib/logger";
import type { StoreKitClient } from "@/lib/upgradeInterstitial/types";
import { bannerFromUserNotifications, type UserNotificationClient } from "@/lib/userNotifications/client";
import { createInMemoryUserNotificationClient } from "@/lib/userNotifications/inMemoryClient";
import { createAppStore } from "@/store/appStore";
import { createDailyChallengeStore } from "@/store/dailyChallengeStore";
import { createUpgradeInterstitialStore } from "@/store/upgradeInterstitialStore";

export interface AppOptions {
  gameCenter: GameCenterClient;
  storeKit: StoreKitClient;
  userNotifications?: UserNotificationClient;
  database?: InMemoryGameDatabase;
  /** Route match banners through the local notification center instead of the match service */
  presentBannersLocally?: boolean;
  env?: Env;
  logger?: Logger;
  fetch?: typeof fetch;
  now?: () => Date;
  currentPlayerId?: () => string | null;
  onStartGame?: (game: InProgressGame) => void;
  onFullGamePurchased?: () => void;
}

export function serverConfigFromEnv(env: Env): ServerConfig {
  return {
    productIdentifiers: { fullGame: FULL_GAME_PRODUCT_ID },
    upgradeInterstitial: {
      duration: env.UPGRADE_INTERSTITIAL_DURATION,
      nagBannerAfterPlayingNGames: 10,
    },
  };
}

export function createApp(options: AppOptions) {
  const env = options.env ?? defaultEnv;
  const logger = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());
  const userNotifications = options.userNotifications ?? createInMemoryUserNotificationClient();
  const database = options.database ?? createInMemoryGameDatabase();
  const serverConfig = serverConfigFromEnv(env);
  const apiClient = createApiClient({ baseUrl: env.API_BASE_URL, fetch: options.fetch });

  const gameCenter: GameCenterClient = options.presentBannersLocally
    ? { ...options.gameCenter, showNotificationBanner: bannerFromUserNotifications(userNotifications) }
    : options.gameCenter;

  const appStore = createAppStore({
    gameCenter,
    database,
    logger: logger.child({ store: "gameCenter" }),
    deps: {
      now,
      randomCubes: liveRandomCubes,
      language: env.DICTIONARY_LANGUAGE,
      localPlayer: () => gameCenter.localPlayer.localPlayer(),
      currentPlayerId: options.currentPlayerId ?? (() => null),
    },
  });

  const dailyChallengeStore = createDailyChallengeStore({
    apiClient,
    userNotifications,
    now,
    language: env.DICTIONARY_LANGUAGE,
    loadSavedUnlimitedGame: () => database.loadSavedUnlimitedGame(),
    onStartGame: options.onStartGame ?? ((game) => logger.info("[App] Daily challenge ready", { gameMode: game.gameMode })),
    logger: logger.child({ store: "dailyChallenge" }),
  });

  const openUpgradeInterstitial = (isDismissable = false) => {
    const store = createUpgradeInterstitialStore({
      storeKit: options.storeKit,
      serverConfig: () => serverConfig,
      isDismissable,
      dismiss: () => store.teardown(),
      onFullGamePurchased: options.onFullGamePurchased ?? (() => undefined),
      logger: logger.child({ store: "upgradeInterstitial" }),
    });
    store.send({ type: "task" });
    return store;
  };

  return {
    appStore,
    dailyChallengeStore,
    openUpgradeInterstitial,
    start() {
      logger.info("[App] Starting", { env: env.NODE_ENV, language: env.DICTIONARY_LANGUAGE });
      appStore.send({ type: "appDelegate/didFinishLaunching" });
    },
    teardown() {
      appStore.teardown();
      dailyChallengeStore.teardown();
    },
  };
}

export type App = ReturnType<typeof createApp>;
