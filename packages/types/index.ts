export * from "./match";
export * from "./game";
export * from "./dailyChallenge";
export * from "./storeKit";
