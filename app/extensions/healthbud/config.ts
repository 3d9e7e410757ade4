import type { ZodIssue } from "zod";
import { UnsupportedProviderError } from "./services/provider-errors.js";
import {
  type TriageProviderKind,
  type TriageRuntimeConfig,
  TriageRuntimeConfigSchema,
} from "./types/runtime-config.js";

type EnvSource = Record<string, string | undefined>;

const DISABLED_PROVIDER_ALIASES = new Set(["none", "disabled"]);

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

function toTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function parseTriageRuntimeConfig(value: unknown): TriageRuntimeConfig {
  const result = TriageRuntimeConfigSchema.safeParse(value ?? {});
  if (result.success) {
    return result.data;
  }
  throw new Error(`Invalid HealthBud triage config: ${formatIssues(result.error.issues)}`);
}

export function resolveProviderKind(value: string | undefined): TriageProviderKind {
  const normalized = toTrimmedString(value).toLowerCase();
  if (!normalized) {
    return "gemini";
  }
  if (DISABLED_PROVIDER_ALIASES.has(normalized)) {
    return "disabled";
  }
  if (normalized === "openrouter" || normalized === "gemini") {
    return normalized;
  }
  throw new UnsupportedProviderError(normalized);
}

function readInteger(env: EnvSource, name: string): number | undefined {
  const raw = toTrimmedString(env[name]);
  return raw ? Number(raw) : undefined;
}

function readBoolean(env: EnvSource, name: string): boolean | undefined {
  const raw = toTrimmedString(env[name]).toLowerCase();
  if (!raw) {
    return undefined;
  }
  return ["1", "true", "yes", "on"].includes(raw);
}

function readList(env: EnvSource, name: string): string[] | undefined {
  const raw = toTrimmedString(env[name]);
  if (!raw) {
    return undefined;
  }
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function readString(env: EnvSource, name: string): string | undefined {
  return toTrimmedString(env[name]) || undefined;
}

/** Maps process environment variables onto the runtime config shape, then validates it. */
export function loadTriageRuntimeConfigFromEnv(env: EnvSource = process.env): TriageRuntimeConfig {
  const kind = resolveProviderKind(env.LLM_PROVIDER);
  const usesOpenRouter = kind === "openrouter";

  return parseTriageRuntimeConfig({
    provider: {
      kind,
      apiKey: readString(env, usesOpenRouter ? "OPENROUTER_API_KEY" : "GEMINI_API_KEY") ?? null,
      model: readString(env, usesOpenRouter ? "OPENROUTER_MODEL" : "GEMINI_MODEL"),
      appName: readString(env, "OPENROUTER_APP_NAME"),
      siteUrl: readString(env, "OPENROUTER_SITE_URL"),
    },
    historyWindow: readInteger(env, "CHAT_HISTORY_WINDOW"),
    rateLimits: {
      assessPerMinute: readInteger(env, "CHAT_ASSESS_RATE_LIMIT_PER_MIN"),
      analyzePerMinute: readInteger(env, "CHAT_ANALYZE_RATE_LIMIT_PER_MIN"),
    },
    evidence: {
      enabled: readBoolean(env, "ENABLE_WEB_SEARCH"),
      maxResults: readInteger(env, "WEB_SEARCH_MAX_RESULTS"),
      trustedDomains: readList(env, "TRUSTED_MEDICAL_DOMAINS"),
    },
    logLevel: readString(env, "LOG_LEVEL"),
  });
}

export const triageConfigSchema = {
  parse: parseTriageRuntimeConfig,
};

export type { TriageRuntimeConfig };
