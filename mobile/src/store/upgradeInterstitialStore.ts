import {
  createUpgradeInterstitialExecutor,
  type UpgradeInterstitialExecutorDeps,
} from "@/lib/upgradeInterstitial/executor";
import {
  initialUpgradeInterstitialState,
  type UpgradeInterstitialAction,
  type UpgradeInterstitialDeps,
  type UpgradeInterstitialState,
} from "@/lib/upgradeInterstitial/types";
import { reduceUpgradeInterstitial } from "@/lib/upgradeInterstitial/upgradeInterstitialLogic";
import { createStore, type Store } from "./createStore";

export interface UpgradeInterstitialStoreOptions extends UpgradeInterstitialExecutorDeps {
  serverConfig: UpgradeInterstitialDeps["serverConfig"];
  isDismissable?: boolean;
}

export function createUpgradeInterstitialStore(
  options: UpgradeInterstitialStoreOptions
): Store<UpgradeInterstitialState, UpgradeInterstitialAction> {
  return createStore({
    name: "UpgradeInterstitial",
    initialState: initialUpgradeInterstitialState({ isDismissable: options.isDismissable ?? false }),
    reducer: reduceUpgradeInterstitial,
    deps: { serverConfig: options.serverConfig },
    execute: createUpgradeInterstitialExecutor(options),
    logger: options.logger,
    describeCommand: (command) => command.type,
  });
}
