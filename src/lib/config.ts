import { z } from "zod";
import { getDefaultCachePath } from "./app-dir.ts";
import { ConfigurationError } from "./errors.ts";

const FlagSchema = z
  .string()
  .trim()
  .optional()
  .transform((v) => v === "1" || v?.toLowerCase() === "true");

const EnvSchema = z.object({
  SLACK_TOKEN: z.string().trim().min(1),
  SLACK_SHARE_CACHE_FILE: z.string().trim().min(1).optional(),
  SLACK_API_URL: z.string().trim().url("SLACK_API_URL must be a URL").optional(),
  SLACK_SHARE_NO_CACHE: FlagSchema,
  SLACK_SHARE_DEBUG: FlagSchema,
});

export type ShareConfig = {
  token: string;
  cachePath: string;
  apiUrl?: string;
  noCache: boolean;
  debug: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ShareConfig {
  const parsed = EnvSchema.safeParse({
    SLACK_TOKEN: env.SLACK_TOKEN,
    SLACK_SHARE_CACHE_FILE: env.SLACK_SHARE_CACHE_FILE || undefined,
    SLACK_API_URL: env.SLACK_API_URL || undefined,
    SLACK_SHARE_NO_CACHE: env.SLACK_SHARE_NO_CACHE,
    SLACK_SHARE_DEBUG: env.SLACK_SHARE_DEBUG,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (!issue || issue.path[0] === "SLACK_TOKEN") {
      throw new ConfigurationError(
        "Error: SLACK_TOKEN is missing. Please set it as an environment variable.",
      );
    }
    throw new ConfigurationError(`Error: ${issue.message}.`);
  }

  const data = parsed.data;
  return {
    token: data.SLACK_TOKEN,
    cachePath: data.SLACK_SHARE_CACHE_FILE ?? getDefaultCachePath(env),
    apiUrl: data.SLACK_API_URL,
    noCache: data.SLACK_SHARE_NO_CACHE,
    debug: data.SLACK_SHARE_DEBUG,
  };
}
