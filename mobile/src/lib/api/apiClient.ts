import type { z } from "zod";
import type {
  FetchTodaysDailyChallengeResponse,
  GameMode,
  Language,
  StartDailyChallengeResponse,
} from "@lexicube/types";
import {
  apiErrorBodySchema,
  fetchTodaysDailyChallengesResponseSchema,
  startDailyChallengeResponseSchema,
} from "@shared/schema";
import { ApiRequestError } from "../errors";

export interface ApiClient {
  fetchTodaysDailyChallenges(language: Language): Promise<FetchTodaysDailyChallengeResponse[]>;
  startDailyChallenge(gameMode: GameMode, language: Language): Promise<StartDailyChallengeResponse>;
}

export interface ApiClientOptions {
  baseUrl: string;
  fetch?: typeof fetch;
}

export function createApiClient({ baseUrl, fetch: fetchImpl = fetch }: ApiClientOptions): ApiClient {
  async function apiRequest<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestInit = {}
  ): Promise<T> {
    const response = await fetchImpl(`${baseUrl}${endpoint}`, {
      ...options,
      headers: { "Content-Type": "application/json", ...options.headers },
    });

    const body: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const parsed = apiErrorBodySchema.safeParse(body);
      if (parsed.success) {
        throw new ApiRequestError(response.status, parsed.data.error, parsed.data.message, parsed.data.details);
      }
      throw new ApiRequestError(response.status, "REQUEST_FAILED", `HTTP ${response.status}`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ApiRequestError(response.status, "INVALID_RESPONSE", "Response did not match the expected shape", {
        issues: parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`),
      });
    }
    return parsed.data;
  }

  return {
    fetchTodaysDailyChallenges: (language) =>
      apiRequest(
        `/api/daily-challenges/today?language=${encodeURIComponent(language)}`,
        fetchTodaysDailyChallengesResponseSchema
      ),

    startDailyChallenge: (gameMode, language) =>
      apiRequest("/api/daily-challenges/start", startDailyChallengeResponseSchema, {
        method: "POST",
        body: JSON.stringify({ gameMode, language }),
      }),
  };
}
