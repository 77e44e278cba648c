import { resolve } from "path";
import { z } from "zod";

import { TagpressError } from "./errors.js";
import { SiteConfig } from "./typings.js";

const logLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const envSchema = z.object({
  BASE_URL: z.string().default(""),
  SITE_TITLE: z.string().min(1).default("Blog"),
  LOG_LEVEL: logLevel.default("info"),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, errors]) => `${key} (${(errors ?? []).join(", ")})`)
      .join("; ");
    throw new TagpressError(`Invalid environment configuration: ${fields}`, { cause: parsed.error });
  }
  return parsed.data;
}

/** `LOG_LEVEL`, falling back to `info` so that a bad value can still be logged. */
export function logLevelFrom(env: NodeJS.ProcessEnv = process.env): z.infer<typeof logLevel> {
  return logLevel.catch("info").parse(env.LOG_LEVEL ?? "info");
}

export interface ConfigOverrides {
  baseUrl?: string;
  title?: string;
}

/** Site layout under `root`: content/posts, templates and output. */
export function resolveConfig(
  root: string,
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): SiteConfig {
  const { BASE_URL, SITE_TITLE } = parseEnv(env);
  const cwd = resolve(root);
  return {
    baseUrl: overrides.baseUrl ?? BASE_URL,
    title: overrides.title ?? SITE_TITLE,
    contentDir: resolve(cwd, "content/posts"),
    templatesDir: resolve(cwd, "templates"),
    outDir: resolve(cwd, "output"),
  };
}
