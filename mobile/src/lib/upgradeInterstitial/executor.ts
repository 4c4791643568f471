import type { CommandContext } from "@/store/createStore";
import { consumeUntilAborted } from "../asyncQueue";
import { assertNever, CommandFailedError } from "../errors";
import type { Logger } from "../logger";
import type { StoreKitClient, UpgradeInterstitialAction, UpgradeInterstitialCommand } from "./types";

export interface UpgradeInterstitialExecutorDeps {
  storeKit: StoreKitClient;
  dismiss(): void;
  onFullGamePurchased(): void;
  logger: Logger;
  /** Countdown step in milliseconds */
  tickInterval?: number;
}

export function createUpgradeInterstitialExecutor(deps: UpgradeInterstitialExecutorDeps) {
  const { storeKit, logger, tickInterval = 1000 } = deps;
  let timer: ReturnType<typeof setInterval> | null = null;

  const stopTimer = () => {
    if (timer !== null) clearInterval(timer);
    timer = null;
  };

  return async function execute(
    command: UpgradeInterstitialCommand,
    { send, signal }: CommandContext<UpgradeInterstitialAction>
  ): Promise<void> {
    switch (command.type) {
      case "observeTransactions":
        await consumeUntilAborted(
          storeKit.observer(),
          signal,
          (event) => send({ type: "paymentTransaction", event }),
          (error) => logger.warn("[UpgradeInterstitial] Failed to close transaction observer", { error })
        );
        return;

      case "fetchFullGameProduct": {
        const response = await storeKit
          .fetchProducts([command.productIdentifier])
          .catch((error: unknown) => {
            throw new CommandFailedError(command.type, error);
          });
        const product = response.products.find((p) => p.productIdentifier === command.productIdentifier);
        if (!product) {
          logger.warn("[UpgradeInterstitial] Full game product unavailable", {
            productIdentifier: command.productIdentifier,
          });
          return;
        }
        send({ type: "fullGameProductResponse", product });
        return;
      }

      case "startTimer":
        stopTimer();
        if (signal.aborted) return;
        timer = setInterval(() => send({ type: "timerTick" }), tickInterval);
        signal.addEventListener("abort", stopTimer, { once: true });
        return;

      case "stopTimer":
        stopTimer();
        return;

      case "addPayment":
        try {
          await storeKit.addPayment(command.payment);
        } catch (error) {
          throw new CommandFailedError(command.type, error);
        }
        return;

      case "dismiss":
        deps.dismiss();
        return;

      case "fullGamePurchased":
        logger.info("[UpgradeInterstitial] Full game purchased");
        deps.onFullGamePurchased();
        return;

      default:
        return assertNever(command);
    }
  };
}
