import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { PaymentTransaction, ServerConfig } from "@lexicube/types";
import { createFakeStoreKit, fullGameProduct } from "@/__tests__/helpers/fakes";
import { createMockLogger, NOW } from "@/__tests__/helpers/fixtures";
import { createUpgradeInterstitialStore } from "@/store/upgradeInterstitialStore";
import { FULL_GAME_PRODUCT_ID } from "../game/constants";

const config: ServerConfig = {
  productIdentifiers: { fullGame: FULL_GAME_PRODUCT_ID },
  upgradeInterstitial: { duration: 10, nagBannerAfterPlayingNGames: 10 },
};

const purchased: PaymentTransaction = {
  error: null,
  payment: { productIdentifier: FULL_GAME_PRODUCT_ID, quantity: 1, applicationUsername: null },
  transactionDate: NOW,
  transactionIdentifier: "txn-1",
  transactionState: "purchased",
};

async function flush() {
  for (let i = 0; i < 20; i++) await Promise.resolve();
}

function setup(isDismissable = false, products = [fullGameProduct]) {
  const storeKit = createFakeStoreKit(products);
  const dismiss = vi.fn();
  const onFullGamePurchased = vi.fn();
  const logger = createMockLogger();
  const store = createUpgradeInterstitialStore({
    storeKit: storeKit.client,
    serverConfig: () => config,
    isDismissable,
    dismiss,
    onFullGamePurchased,
    logger,
  });
  return { store, storeKit, dismiss, onFullGamePurchased, logger };
}

describe("upgrade interstitial store", () => {
  let t: ReturnType<typeof setup>;

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    t.store.teardown();
    vi.useRealTimers();
  });

  it("loads the product and completes a purchase", async () => {
    t = setup();
    t.store.send({ type: "task" });
    await flush();

    expect(t.storeKit.fetchProducts).toHaveBeenCalledWith([FULL_GAME_PRODUCT_ID]);
    expect(t.store.getState().fullGameProduct).toEqual(fullGameProduct);

    vi.advanceTimersByTime(1000);
    expect(t.store.getState().secondsPassedCount).toBe(1);

    t.store.send({ type: "upgradeButtonTapped" });
    expect(t.store.getState().isPurchasing).toBe(true);
    await flush();
    expect(t.storeKit.addPayment).toHaveBeenCalledWith({
      productIdentifier: FULL_GAME_PRODUCT_ID,
      quantity: 1,
      applicationUsername: null,
    });

    t.storeKit.transactions.push({ type: "updatedTransactions", transactions: [purchased] });
    await flush();

    expect(t.onFullGamePurchased).toHaveBeenCalledTimes(1);
    expect(t.dismiss).toHaveBeenCalledTimes(1);
  });

  it("counts down once a second and allows maybe later at the end", async () => {
    t = setup();
    t.store.send({ type: "task" });
    await flush();

    vi.advanceTimersByTime(1000);
    expect(t.store.getState().secondsPassedCount).toBe(1);
    t.store.send({ type: "maybeLaterButtonTapped" });
    expect(t.dismiss).not.toHaveBeenCalled();

    vi.advanceTimersByTime(15000);
    expect(t.store.getState().secondsPassedCount).toBe(10);

    t.store.send({ type: "maybeLaterButtonTapped" });
    expect(t.dismiss).toHaveBeenCalledTimes(1);
  });

  it("dismisses right away when opened as dismissable", async () => {
    t = setup(true);
    t.store.send({ type: "task" });
    await flush();

    vi.advanceTimersByTime(5000);
    expect(t.store.getState().secondsPassedCount).toBe(0);

    t.store.send({ type: "maybeLaterButtonTapped" });
    expect(t.dismiss).toHaveBeenCalledTimes(1);
  });

  it("warns when the product is missing from the store", async () => {
    t = setup(true, []);
    t.store.send({ type: "task" });
    await flush();

    expect(t.store.getState().fullGameProduct).toBeNull();
    expect(t.logger.warn).toHaveBeenCalledWith("[UpgradeInterstitial] Full game product unavailable", {
      productIdentifier: FULL_GAME_PRODUCT_ID,
    });
  });

  it("stops ticking after teardown", async () => {
    t = setup();
    t.store.send({ type: "task" });
    await flush();

    t.store.teardown();
    vi.advanceTimersByTime(3000);
    expect(t.store.getState().secondsPassedCount).toBe(0);
  });
});
