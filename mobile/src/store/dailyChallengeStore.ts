import { reduceDailyChallenge } from "@/lib/dailyChallenge/dailyChallengeLogic";
import { createDailyChallengeExecutor, type DailyChallengeExecutorDeps } from "@/lib/dailyChallenge/executor";
import {
  initialDailyChallengeState,
  type DailyChallengeAction,
  type DailyChallengeDeps,
  type DailyChallengeState,
} from "@/lib/dailyChallenge/types";
import { createStore, type Store } from "./createStore";

export interface DailyChallengeStoreOptions extends DailyChallengeExecutorDeps {
  language: DailyChallengeDeps["language"];
  initialState?: DailyChallengeState;
}

export function createDailyChallengeStore(
  options: DailyChallengeStoreOptions
): Store<DailyChallengeState, DailyChallengeAction> {
  return createStore({
    name: "DailyChallenge",
    initialState: options.initialState ?? initialDailyChallengeState(),
    reducer: reduceDailyChallenge,
    deps: { now: options.now, language: options.language },
    execute: createDailyChallengeExecutor(options),
    logger: options.logger,
    describeCommand: (command) => command.type,
  });
}
