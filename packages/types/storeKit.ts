export interface Product {
  productIdentifier: string;
  localizedTitle: string;
  localizedDescription: string;
  price: number;
  priceLocale: string;
}

export interface ProductsResponse {
  invalidProductIdentifiers: string[];
  products: Product[];
}

export interface Payment {
  productIdentifier: string;
  quantity: number;
  applicationUsername: string | null;
}

export type PaymentTransactionState = "purchasing" | "purchased" | "failed" | "restored" | "deferred";

export interface PaymentTransaction {
  error: { code: string; message: string } | null;
  payment: Payment;
  transactionDate: Date | null;
  transactionIdentifier: string | null;
  transactionState: PaymentTransactionState;
}

export type PaymentTransactionObserverEvent =
  | { type: "updatedTransactions"; transactions: PaymentTransaction[] }
  | { type: "removedTransactions"; transactions: PaymentTransaction[] }
  | { type: "restoreCompletedTransactionsFinished"; transactions: PaymentTransaction[] }
  | { type: "restoreCompletedTransactionsFailed"; error: { code: string; message: string } };

export interface ServerConfig {
  productIdentifiers: { fullGame: string };
  upgradeInterstitial: {
    duration: number;
    nagBannerAfterPlayingNGames: number;
  };
}
