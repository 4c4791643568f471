import { z } from "zod";
import type { FetchTodaysDailyChallengeResponse, StartDailyChallengeResponse } from "@lexicube/types";
import { GAME_MODES, LANGUAGES } from "@lexicube/types";
import { archivablePuzzleSchema } from "./turnBasedMatchData";

const isoDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const dailyChallengeSummarySchema = z.object({
  id: z.string().min(1),
  endsAt: isoDateSchema,
  gameMode: z.enum(GAME_MODES),
  language: z.enum(LANGUAGES),
});

export const fetchTodaysDailyChallengeResponseSchema: z.ZodType<
  FetchTodaysDailyChallengeResponse,
  z.ZodTypeDef,
  unknown
> = z.object({
  dailyChallenge: dailyChallengeSummarySchema,
  yourResult: z.object({
    outOf: z.number().int().min(0),
    rank: z.number().int().min(1).nullable(),
    score: z.number().int().min(0).nullable(),
    started: z.boolean(),
  }),
});

export const fetchTodaysDailyChallengesResponseSchema = z.array(fetchTodaysDailyChallengeResponseSchema);

export const startDailyChallengeResponseSchema: z.ZodType<
  StartDailyChallengeResponse,
  z.ZodTypeDef,
  unknown
> = z.object({
  dailyChallenge: dailyChallengeSummarySchema.extend({
    gameNumber: z.number().int().min(1),
    puzzle: archivablePuzzleSchema,
  }),
  dailyChallengePlayId: z.string().min(1),
});

/** Error body returned by the API, same envelope the server uses everywhere */
export const apiErrorBodySchema = z.object({
  error: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
});

export type ApiErrorBody = z.infer<typeof apiErrorBodySchema>;
