import { z } from "zod";
import { LANGUAGES } from "@lexicube/types";

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Logging
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug"]).default("info"),

  // Daily challenge API
  API_BASE_URL: z
    .string()
    .url("API_BASE_URL must be an absolute URL")
    .default("http://localhost:9876")
    .transform((url) => url.replace(/\/+$/, "")),

  // Dictionary used for fresh boards
  DICTIONARY_LANGUAGE: z.enum(LANGUAGES).default("en"),

  // Seconds the upgrade interstitial holds before "maybe later" is allowed,
  // used until the server config says otherwise
  UPGRADE_INTERSTITIAL_DURATION: z.coerce.number().int().positive().max(60).default(10),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment record. Throws one error listing every invalid key.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }
  return result.data;
}

export const env = parseEnv(process.env);
