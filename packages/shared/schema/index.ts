export * from "./turnBasedMatchData";
export * from "./dailyChallenge";
