/**
 * Match Data Codec
 *
 * Converts between a match's opaque data blob and the turn payload.
 * Bytes are UTF-8 JSON with keys sorted at every level, so the same payload
 * always encodes to the same bytes.
 */

import type { GameState, TurnBasedContext, TurnBasedMatchData } from "@lexicube/types";
import { turnBasedMatchDataSchema } from "@shared/schema";
import { MalformedTurnDataError, NoTurnDataYetError, type TurnDataError } from "../errors";
import { archivePuzzle } from "../game/puzzle";
import { localPlayerIndex } from "./turnBasedContext";

export type DecodeResult =
  | { ok: true; data: TurnBasedMatchData }
  | { ok: false; error: TurnDataError };

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

function toWire(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toWire);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      if (entry !== undefined) out[key] = toWire(entry);
    }
    return out;
  }
  return value;
}

export function encodeMatchData(data: TurnBasedMatchData): Uint8Array {
  return encoder.encode(JSON.stringify(toWire(data)));
}

/**
 * Never throws. Empty or missing bytes mean nobody has taken a turn yet;
 * anything else that fails to parse is reported as malformed.
 */
export function decodeMatchData(bytes: Uint8Array | null): DecodeResult {
  if (!bytes || bytes.byteLength === 0) {
    return { ok: false, error: new NoTurnDataYetError() };
  }

  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(bytes));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new MalformedTurnDataError(`payload is not UTF-8 JSON (${reason})`) };
  }

  const parsed = turnBasedMatchDataSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      error: new MalformedTurnDataError(
        "payload does not match the turn schema",
        parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`)
      ),
    };
  }
  return { ok: true, data: parsed.data };
}

/**
 * Build the payload for a turn. When a player id is given it is recorded
 * under the local player's participant index.
 */
export function makeTurnBasedMatchData(input: {
  context: TurnBasedContext;
  game: GameState;
  playerId: string | null;
}): TurnBasedMatchData {
  const { context, game, playerId } = input;
  const playerIndexToId = { ...context.metadata.playerIndexToId };
  const index = localPlayerIndex(context);
  if (playerId !== null && index !== null) {
    playerIndexToId[index] = playerId;
  }
  return {
    cubes: archivePuzzle(game.cubes),
    gameMode: game.gameMode,
    language: game.language,
    metadata: { lastOpenedAt: context.metadata.lastOpenedAt, playerIndexToId },
    moves: game.moves,
  };
}

export function encodeTurn(input: {
  context: TurnBasedContext;
  game: GameState;
  playerId: string | null;
}): Uint8Array {
  return encodeMatchData(makeTurnBasedMatchData(input));
}
