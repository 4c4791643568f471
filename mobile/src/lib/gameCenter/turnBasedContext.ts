import type {
  LocalPlayer,
  Player,
  TurnBasedContext,
  TurnBasedMatch,
  TurnBasedMetadata,
  TurnBasedParticipant,
} from "@lexicube/types";

export function createTurnBasedContext(
  localPlayer: LocalPlayer,
  match: TurnBasedMatch,
  metadata: TurnBasedMetadata
): TurnBasedContext {
  return { localPlayer, match, metadata };
}

function isLocal(participant: TurnBasedParticipant | null, localPlayer: LocalPlayer): boolean {
  return participant?.player?.gamePlayerId === localPlayer.gamePlayerId;
}

/** Participant slot of the local player, or null when they are not in the match */
export function localPlayerIndex(context: TurnBasedContext): number | null {
  const index = context.match.participants.findIndex((p) => isLocal(p, context.localPlayer));
  return index === -1 ? null : index;
}

export function currentParticipantIsLocalPlayer(context: TurnBasedContext): boolean {
  return isLocal(context.match.currentParticipant, context.localPlayer);
}

export function otherPlayer(context: TurnBasedContext): Player | null {
  const other = context.match.participants.find(
    (p) => p.player !== null && !isLocal(p, context.localPlayer)
  );
  return other?.player ?? null;
}

/** True once the match has ended or anyone has a recorded outcome */
export function isMatchOver(match: TurnBasedMatch): boolean {
  return match.status === "ended" || match.participants.some((p) => p.matchOutcome !== "none");
}

export function allOutcomesUnset(match: TurnBasedMatch): boolean {
  return match.participants.every((p) => p.matchOutcome === "none");
}

/** Most recent turn across participants */
export function lastTurnDate(match: TurnBasedMatch): Date | null {
  let latest: Date | null = null;
  for (const { lastTurnDate: date } of match.participants) {
    if (date && (!latest || date.getTime() > latest.getTime())) latest = date;
  }
  return latest;
}
