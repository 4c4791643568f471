import { describe, it, expect } from "vitest";
import type { PaymentTransaction, ServerConfig } from "@lexicube/types";
import { NOW } from "@/__tests__/helpers/fixtures";
import { FULL_GAME_PRODUCT_ID } from "../game/constants";
import { initialUpgradeInterstitialState, type UpgradeInterstitialDeps } from "./types";
import { canDismiss, reduceUpgradeInterstitial } from "./upgradeInterstitialLogic";

const config: ServerConfig = {
  productIdentifiers: { fullGame: FULL_GAME_PRODUCT_ID },
  upgradeInterstitial: { duration: 3, nagBannerAfterPlayingNGames: 10 },
};
const deps: UpgradeInterstitialDeps = { serverConfig: () => config };

function transaction(overrides: Partial<PaymentTransaction> = {}): PaymentTransaction {
  return {
    error: null,
    payment: { productIdentifier: FULL_GAME_PRODUCT_ID, quantity: 1, applicationUsername: null },
    transactionDate: NOW,
    transactionIdentifier: "txn-1",
    transactionState: "purchased",
    ...overrides,
  };
}

describe("reduceUpgradeInterstitial", () => {
  it("reads the countdown from server config and starts the timer", () => {
    const result = reduceUpgradeInterstitial(initialUpgradeInterstitialState(), { type: "task" }, deps);
    expect(result.state.upgradeInterstitialDuration).toBe(3);
    expect(result.commands).toEqual([
      { type: "observeTransactions" },
      { type: "fetchFullGameProduct", productIdentifier: FULL_GAME_PRODUCT_ID },
      { type: "startTimer" },
    ]);
  });

  it("skips the timer when dismissable", () => {
    const result = reduceUpgradeInterstitial(
      initialUpgradeInterstitialState({ isDismissable: true }),
      { type: "task" },
      deps
    );
    expect(result.commands.map((command) => command.type)).toEqual(["observeTransactions", "fetchFullGameProduct"]);
  });

  it("stops the timer when the countdown completes", () => {
    let state = initialUpgradeInterstitialState({ upgradeInterstitialDuration: 3 });
    const stops: number[] = [];
    for (let tick = 1; tick <= 3; tick++) {
      const result = reduceUpgradeInterstitial(state, { type: "timerTick" }, deps);
      state = result.state;
      if (result.commands.some((command) => command.type === "stopTimer")) stops.push(tick);
    }
    expect(state.secondsPassedCount).toBe(3);
    expect(stops).toEqual([3]);
  });

  it("only lets maybe later through once allowed", () => {
    const waiting = initialUpgradeInterstitialState({ upgradeInterstitialDuration: 3, secondsPassedCount: 2 });
    expect(canDismiss(waiting)).toBe(false);
    expect(reduceUpgradeInterstitial(waiting, { type: "maybeLaterButtonTapped" }, deps).commands).toEqual([]);

    const done = { ...waiting, secondsPassedCount: 3 };
    expect(reduceUpgradeInterstitial(done, { type: "maybeLaterButtonTapped" }, deps).commands).toEqual([
      { type: "stopTimer" },
      { type: "dismiss" },
    ]);

    const dismissable = initialUpgradeInterstitialState({ isDismissable: true });
    expect(canDismiss(dismissable)).toBe(true);
  });

  it("adds a payment for the full game", () => {
    const result = reduceUpgradeInterstitial(
      initialUpgradeInterstitialState(),
      { type: "upgradeButtonTapped" },
      deps
    );
    expect(result.state.isPurchasing).toBe(true);
    expect(result.commands).toEqual([
      {
        type: "addPayment",
        payment: { productIdentifier: FULL_GAME_PRODUCT_ID, quantity: 1, applicationUsername: null },
      },
    ]);
  });

  it("unlocks and dismisses after a purchase or restore", () => {
    const purchasing = initialUpgradeInterstitialState({ isPurchasing: true });
    for (const transactionState of ["purchased", "restored"] as const) {
      const result = reduceUpgradeInterstitial(
        purchasing,
        {
          type: "paymentTransaction",
          event: { type: "updatedTransactions", transactions: [transaction({ transactionState })] },
        },
        deps
      );
      expect(result.commands).toEqual([{ type: "fullGamePurchased" }, { type: "stopTimer" }, { type: "dismiss" }]);
    }
  });

  it("clears purchasing when a transaction fails", () => {
    const result = reduceUpgradeInterstitial(
      initialUpgradeInterstitialState({ isPurchasing: true }),
      {
        type: "paymentTransaction",
        event: {
          type: "updatedTransactions",
          transactions: [
            transaction({ transactionState: "failed", error: { code: "paymentCancelled", message: "Cancelled" } }),
          ],
        },
      },
      deps
    );
    expect(result.state.isPurchasing).toBe(false);
    expect(result.commands).toEqual([]);
  });

  it("ignores purchases of other products and other observer events", () => {
    const state = initialUpgradeInterstitialState({ isPurchasing: true });
    const other = transaction({
      payment: { productIdentifier: "app.lexicube.tip_jar", quantity: 1, applicationUsername: null },
    });
    const result = reduceUpgradeInterstitial(
      state,
      { type: "paymentTransaction", event: { type: "updatedTransactions", transactions: [other] } },
      deps
    );
    expect(result.state).toBe(state);
    expect(result.commands).toEqual([]);

    const removed = reduceUpgradeInterstitial(
      state,
      { type: "paymentTransaction", event: { type: "removedTransactions", transactions: [transaction()] } },
      deps
    );
    expect(removed.commands).toEqual([]);
  });
});
