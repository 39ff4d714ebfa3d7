import type { Env } from "../config/pipeline_config";

export type ModelProviderName = "fake" | "openai";

export type ModelSelection = {
  provider: ModelProviderName;
  model: string;
  source: "default" | "env";
  apiKey?: string;
  baseUrl: string;
};

const DEFAULTS_BY_ENV: Record<string, string> = {
  local: "gpt-5-nano",
  staging: "gpt-5-mini",
  prod: "gpt-5-mini",
};

function resolveAppEnv(env: Env): string {
  if (env.APP_ENV) return env.APP_ENV;
  if (env.NODE_ENV === "production") return "prod";
  return "local";
}

export function resolveModelProvider(env: Env = process.env): ModelSelection {
  const provider: ModelProviderName =
    (env.LLM_PROVIDER ?? "fake").toLowerCase() === "openai" ? "openai" : "fake";
  const appEnv = resolveAppEnv(env);
  const laneDefault = DEFAULTS_BY_ENV[appEnv] ?? DEFAULTS_BY_ENV.local;
  const envModel = env.OPENAI_MODEL?.trim();

  return {
    provider,
    model: envModel || laneDefault,
    source: envModel ? "env" : "default",
    apiKey: env.OPENAI_API_KEY || undefined,
    baseUrl: env.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
  };
}
