import { z } from "zod";
import type { TurnBasedMatchData } from "@lexicube/types";
import { CUBE_FACE_SIDES, GAME_MODES, LANGUAGES, PUZZLE_SIZE } from "@lexicube/types";

/**
 * Wire shape of the turn payload stored in a match's opaque data blob.
 * Dates travel as ISO-8601 strings and participant indices as object keys.
 */

const isoDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const letterSchema = z.string().min(1, "Letter is required").max(2, "Letter too long");

export const archivableCubeSchema = z
  .object({
    top: letterSchema,
    left: letterSchema,
    right: letterSchema,
  })
  .strict();

const coordinateSchema = z
  .number()
  .int()
  .min(0)
  .max(PUZZLE_SIZE - 1);

export const latticePointSchema = z
  .object({ x: coordinateSchema, y: coordinateSchema, z: coordinateSchema })
  .strict();

export const archivablePuzzleSchema = z
  .array(z.array(z.array(archivableCubeSchema).length(PUZZLE_SIZE)).length(PUZZLE_SIZE))
  .length(PUZZLE_SIZE);

export const moveTypeSchema = z.discriminatedUnion("type", [
  z
    .object({
      type: z.literal("playedWord"),
      cubeFaces: z
        .array(z.object({ index: latticePointSchema, side: z.enum(CUBE_FACE_SIDES) }).strict())
        .min(1, "A played word needs at least one face"),
    })
    .strict(),
  z.object({ type: z.literal("removedCube"), index: latticePointSchema }).strict(),
]);

export const moveSchema = z
  .object({
    playedAt: isoDateSchema,
    playerIndex: z.number().int().min(0).nullable(),
    score: z.number().int().min(0),
    move: moveTypeSchema,
  })
  .strict();

export const turnBasedMetadataSchema = z
  .object({
    lastOpenedAt: isoDateSchema.nullable(),
    playerIndexToId: z
      .record(z.string().regex(/^\d+$/, "Player index must be a non-negative integer"), z.string().min(1))
      .transform((entries) => {
        const playerIndexToId: Record<number, string> = {};
        for (const [index, playerId] of Object.entries(entries)) {
          playerIndexToId[Number(index)] = playerId;
        }
        return playerIndexToId;
      }),
  })
  .strict();

export const turnBasedMatchDataSchema: z.ZodType<TurnBasedMatchData, z.ZodTypeDef, unknown> = z
  .object({
    cubes: archivablePuzzleSchema,
    gameMode: z.enum(GAME_MODES),
    language: z.enum(LANGUAGES),
    metadata: turnBasedMetadataSchema,
    moves: z.array(moveSchema),
  })
  .strict();
