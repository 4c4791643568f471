import { describe, it, expect } from "vitest";
import { makeDeps, makeMatch, makeMatchData } from "@/__tests__/helpers/fixtures";
import { handleTurnBasedMatch, reduceGameCenter } from "@/lib/gameCenter/gameCenterLogic";
import { encodeMatchData } from "@/lib/gameCenter/matchData";
import { initialAppState, screenPhase } from "./appState";

const deps = makeDeps();
const matchData = () => encodeMatchData(makeMatchData());

describe("screenPhase", () => {
  it("is idle before any match is shown", () => {
    expect(screenPhase(initialAppState.destination)).toEqual({ type: "idle" });
  });

  it("is viewing once an open match is shown", () => {
    const { state } = handleTurnBasedMatch(initialAppState, makeMatch({ matchData: matchData() }), true, deps);
    expect(screenPhase(state.destination)).toEqual({ type: "viewing", matchId: "match-1" });
  });

  it("is finished when the game over summary is nested in the game", () => {
    const { state } = handleTurnBasedMatch(
      initialAppState,
      makeMatch({ matchData: matchData(), status: "ended" }),
      true,
      deps
    );
    expect(screenPhase(state.destination)).toEqual({ type: "finished", matchId: "match-1" });
  });

  it("goes back to idle after asking for a rematch", () => {
    const finished = handleTurnBasedMatch(
      initialAppState,
      makeMatch({ matchData: matchData(), status: "ended" }),
      true,
      deps
    ).state;
    const { state } = reduceGameCenter(finished, { type: "game/gameOver/rematchButtonTapped" }, deps);
    expect(screenPhase(state.destination)).toEqual({ type: "idle" });
  });
});
