import type {
  Payment,
  PaymentTransactionObserverEvent,
  Product,
  ProductsResponse,
  ServerConfig,
} from "@lexicube/types";

/** In-app purchase port */
export interface StoreKitClient {
  addPayment(payment: Payment): Promise<void>;
  fetchProducts(productIdentifiers: string[]): Promise<ProductsResponse>;
  observer(): AsyncIterable<PaymentTransactionObserverEvent>;
}

export interface UpgradeInterstitialState {
  fullGameProduct: Product | null;
  isDismissable: boolean;
  isPurchasing: boolean;
  secondsPassedCount: number;
  upgradeInterstitialDuration: number;
}

export function initialUpgradeInterstitialState(
  overrides: Partial<UpgradeInterstitialState> = {}
): UpgradeInterstitialState {
  return {
    fullGameProduct: null,
    isDismissable: false,
    isPurchasing: false,
    secondsPassedCount: 0,
    upgradeInterstitialDuration: 10,
    ...overrides,
  };
}

export type UpgradeInterstitialAction =
  | { type: "task" }
  | { type: "fullGameProductResponse"; product: Product }
  | { type: "timerTick" }
  | { type: "upgradeButtonTapped" }
  | { type: "maybeLaterButtonTapped" }
  | { type: "paymentTransaction"; event: PaymentTransactionObserverEvent };

export type UpgradeInterstitialCommand =
  | { type: "observeTransactions" }
  | { type: "fetchFullGameProduct"; productIdentifier: string }
  | { type: "startTimer" }
  | { type: "stopTimer" }
  | { type: "addPayment"; payment: Payment }
  | { type: "dismiss" }
  | { type: "fullGamePurchased" };

export interface UpgradeInterstitialDeps {
  serverConfig(): ServerConfig;
}
