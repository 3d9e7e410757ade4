import { loadTriageRuntimeConfigFromEnv, parseTriageRuntimeConfig, triageConfigSchema } from "./config.js";
import { createChatAnalysisService, type ChatAnalysisService } from "./services/chat-analysis.js";
import { createDuckDuckGoSearchBackend } from "./services/duckduckgo-search.js";
import {
  createEvidenceSearchService,
  type EvidenceSearchBackend,
  type EvidenceSearchService,
} from "./services/evidence-search.js";
import { createTriageLogger, type TriageLogger } from "./services/logger.js";
import { createProviderClient, type ProviderClient } from "./services/provider-client.js";
import { createRateLimiter, type RateLimiter } from "./services/rate-limiter.js";
import { createTriageOrchestrator, type TriageOrchestrator } from "./services/triage-orchestrator.js";
import { createChatAnalyzeTool } from "./tools/chat-analyze.js";
import { createTriageAssessTool } from "./tools/triage-assess.js";
import type { TriageRuntimeConfig } from "./types/runtime-config.js";

export type HealthBudRuntimeOptions = {
  /** Raw config object; when omitted the config is read from the environment. */
  config?: unknown;
  env?: Record<string, string | undefined>;
  logger?: TriageLogger;
  fetchImpl?: typeof fetch;
  /** Defaults to DuckDuckGo when evidence search is enabled; `null` runs without a backend. */
  evidenceBackend?: EvidenceSearchBackend | null;
  rateLimiter?: RateLimiter;
  now?: () => Date;
};

export type HealthBudRuntime = {
  config: TriageRuntimeConfig;
  logger: TriageLogger;
  client: ProviderClient;
  rateLimiter: RateLimiter;
  orchestrator: TriageOrchestrator;
  evidenceSearch: EvidenceSearchService;
  chatAnalysis: ChatAnalysisService;
  tools: {
    triageAssess: ReturnType<typeof createTriageAssessTool>;
    chatAnalyze: ReturnType<typeof createChatAnalyzeTool>;
  };
};

/**
 * Builds the assessment layer once per process. The rate limiter created here
 * is the only limiter the tools use; hosts hold on to the returned runtime.
 */
export function createHealthBudRuntime(options: HealthBudRuntimeOptions = {}): HealthBudRuntime {
  const config =
    options.config === undefined
      ? loadTriageRuntimeConfigFromEnv(options.env ?? process.env)
      : parseTriageRuntimeConfig(options.config);
  const logger = options.logger ?? createTriageLogger({ level: config.logLevel });

  const client = createProviderClient(config.provider, { fetchImpl: options.fetchImpl });
  const rateLimiter = options.rateLimiter ?? createRateLimiter();
  const orchestrator = createTriageOrchestrator({
    client,
    logger,
    historyWindow: config.historyWindow,
  });
  const evidenceBackend =
    options.evidenceBackend === undefined
      ? config.evidence.enabled
        ? createDuckDuckGoSearchBackend()
        : null
      : options.evidenceBackend;
  if (config.evidence.enabled && !evidenceBackend) {
    logger.warn(
      "[healthbud] web evidence search is enabled but no search backend is configured; stored-chat analysis runs without evidence",
    );
  }
  const evidenceSearch = createEvidenceSearchService({
    enabled: config.evidence.enabled,
    maxResults: config.evidence.maxResults,
    trustedDomains: config.evidence.trustedDomains,
    search: evidenceBackend,
    logger,
  });
  const chatAnalysis = createChatAnalysisService({
    client,
    evidenceSearch,
    logger,
    now: options.now,
  });

  if (client.enabled) {
    logger.info(`[healthbud] triage runtime ready (provider=${client.provider}, model=${client.model})`);
  } else {
    logger.warn(
      `[healthbud] LLM provider ${client.provider} has no usable API key; rule-based fallback only`,
    );
  }

  return {
    config,
    logger,
    client,
    rateLimiter,
    orchestrator,
    evidenceSearch,
    chatAnalysis,
    tools: {
      triageAssess: createTriageAssessTool({
        orchestrator,
        rateLimiter,
        maxRequestsPerMinute: config.rateLimits.assessPerMinute,
      }),
      chatAnalyze: createChatAnalyzeTool({
        chatAnalysis,
        rateLimiter,
        maxRequestsPerMinute: config.rateLimits.analyzePerMinute,
      }),
    },
  };
}

const healthBudTriagePlugin = {
  id: "healthbud-triage",
  name: "HealthBud Triage",
  description: "Rate-limited LLM symptom triage with a deterministic rule-based fallback.",
  configSchema: triageConfigSchema,
  createRuntime: createHealthBudRuntime,
};

export default healthBudTriagePlugin;

export { assessFallbackTriage, assessStoredChatFallback, buildGeneralReply } from "./services/fallback-triage.js";
export { deriveClientKey, RATE_LIMIT_BUCKETS } from "./services/rate-limiter.js";
export { isHealthRelated } from "./services/health-relevance.js";
export {
  normalizeAssessmentPayload,
  parseModelResponse,
} from "./services/response-normalizer.js";
export * from "./services/provider-errors.js";
export { createTriageRequest, TriageAssessmentSchema } from "./types/triage.js";
export type * from "./types/triage.js";
export type { TriageRuntimeConfig } from "./types/runtime-config.js";
