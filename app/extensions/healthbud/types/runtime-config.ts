import { z } from "zod";

export const TRIAGE_PROVIDER_KINDS = ["disabled", "openrouter", "gemini"] as const;

export const DEFAULT_OPENROUTER_MODEL = "openai/gpt-4.1-mini";
export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";

export const DEFAULT_TRUSTED_MEDICAL_DOMAINS = [
  "mayoclinic.org",
  "medlineplus.gov",
  "nhs.uk",
  "who.int",
  "cdc.gov",
  "clevelandclinic.org",
  "webmd.com",
] as const;

export const DEFAULT_RATE_LIMITS = {
  assessPerMinute: 20,
  analyzePerMinute: 10,
} as const;

const TriageProviderSchema = z.strictObject({
  kind: z.enum(TRIAGE_PROVIDER_KINDS).default("gemini"),
  apiKey: z.string().nullable().default(null),
  model: z.string().min(1).optional(),
  appName: z.string().min(1).default("HealthBud"),
  siteUrl: z.string().min(1).default("http://localhost:3000"),
});

const TriageRateLimitsSchema = z.strictObject({
  assessPerMinute: z.number().int().min(0).default(DEFAULT_RATE_LIMITS.assessPerMinute),
  analyzePerMinute: z.number().int().min(0).default(DEFAULT_RATE_LIMITS.analyzePerMinute),
});

const TriageEvidenceSchema = z.strictObject({
  enabled: z.boolean().default(true),
  maxResults: z.number().int().min(1).max(25).default(8),
  trustedDomains: z
    .array(z.string().min(1))
    .default([...DEFAULT_TRUSTED_MEDICAL_DOMAINS]),
});

export const TriageRuntimeConfigSchema = z.strictObject({
  provider: TriageProviderSchema.default({
    kind: "gemini",
    apiKey: null,
    appName: "HealthBud",
    siteUrl: "http://localhost:3000",
  }),
  historyWindow: z.number().int().min(0).max(50).default(10),
  rateLimits: TriageRateLimitsSchema.default(DEFAULT_RATE_LIMITS),
  evidence: TriageEvidenceSchema.default({
    enabled: true,
    maxResults: 8,
    trustedDomains: [...DEFAULT_TRUSTED_MEDICAL_DOMAINS],
  }),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type TriageProviderKind = (typeof TRIAGE_PROVIDER_KINDS)[number];
export type TriageRuntimeConfig = z.infer<typeof TriageRuntimeConfigSchema>;
export type TriageProviderConfig = TriageRuntimeConfig["provider"];
