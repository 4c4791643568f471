/**
 * Upgrade interstitial: a paywall that can only be waved away once its
 * countdown finishes, unless it was opened as dismissable.
 */

import { noCommands, type ReduceResult } from "@/store/createStore";
import { assertNever } from "../errors";
import type {
  UpgradeInterstitialAction,
  UpgradeInterstitialCommand,
  UpgradeInterstitialDeps,
  UpgradeInterstitialState,
} from "./types";

type Result = ReduceResult<UpgradeInterstitialState, UpgradeInterstitialCommand>;

export function canDismiss(state: UpgradeInterstitialState): boolean {
  return state.isDismissable || state.secondsPassedCount >= state.upgradeInterstitialDuration;
}

export function reduceUpgradeInterstitial(
  state: UpgradeInterstitialState,
  action: UpgradeInterstitialAction,
  deps: UpgradeInterstitialDeps
): Result {
  switch (action.type) {
    case "task": {
      const config = deps.serverConfig();
      const commands: UpgradeInterstitialCommand[] = [
        { type: "observeTransactions" },
        { type: "fetchFullGameProduct", productIdentifier: config.productIdentifiers.fullGame },
      ];
      if (!state.isDismissable) commands.push({ type: "startTimer" });
      return {
        state: { ...state, upgradeInterstitialDuration: config.upgradeInterstitial.duration },
        commands,
      };
    }

    case "fullGameProductResponse":
      return noCommands({ ...state, fullGameProduct: action.product });

    case "timerTick": {
      const next = { ...state, secondsPassedCount: state.secondsPassedCount + 1 };
      return next.secondsPassedCount >= next.upgradeInterstitialDuration
        ? { state: next, commands: [{ type: "stopTimer" }] }
        : noCommands(next);
    }

    case "upgradeButtonTapped":
      return {
        state: { ...state, isPurchasing: true },
        commands: [
          {
            type: "addPayment",
            payment: {
              productIdentifier: deps.serverConfig().productIdentifiers.fullGame,
              quantity: 1,
              applicationUsername: null,
            },
          },
        ],
      };

    case "maybeLaterButtonTapped":
      if (!canDismiss(state)) return noCommands(state);
      return { state, commands: [{ type: "stopTimer" }, { type: "dismiss" }] };

    case "paymentTransaction": {
      if (action.event.type !== "updatedTransactions") return noCommands(state);
      const { transactions } = action.event;
      const fullGame = deps.serverConfig().productIdentifiers.fullGame;

      const next = transactions.some((transaction) => transaction.error !== null)
        ? { ...state, isPurchasing: false }
        : state;
      const unlocked = transactions.some(
        (transaction) =>
          transaction.payment.productIdentifier === fullGame &&
          (transaction.transactionState === "purchased" || transaction.transactionState === "restored")
      );
      if (!unlocked) return noCommands(next);
      return {
        state: next,
        commands: [{ type: "fullGamePurchased" }, { type: "stopTimer" }, { type: "dismiss" }],
      };
    }

    default:
      return assertNever(action);
  }
}
