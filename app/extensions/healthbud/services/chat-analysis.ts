import type {
  ConditionAnalysis,
  EvidenceSource,
  StoredChatAnalysis,
  StoredChatRecord,
} from "../types/triage.js";
import type { EvidenceSearchService } from "./evidence-search.js";
import { buildEvidenceQuery } from "./evidence-search.js";
import {
  STORED_CHAT_DISCLAIMER,
  STORED_CHAT_RED_FLAGS,
  assessStoredChatFallback,
} from "./fallback-triage.js";
import type { TriageLogger } from "./logger.js";
import { STORED_CHAT_ANALYSIS_PROMPT } from "./prompts.js";
import type { ProviderClient } from "./provider-client.js";
import { describeError, isConfigurationError, toFallbackTrigger } from "./provider-errors.js";
import { normalizeUrgency, parseModelResponse, toStringList } from "./response-normalizer.js";

export const ANALYSIS_TEMPERATURE = 0.1;
const DEFAULT_CONDITION_CONFIDENCE = 0.2;

export type ChatAnalysisService = {
  analyzeStoredChat: (
    record: StoredChatRecord,
    options?: { signal?: AbortSignal },
  ) => Promise<StoredChatAnalysis>;
};

export type ChatAnalysisParams = {
  client: ProviderClient;
  evidenceSearch: EvidenceSearchService;
  logger: TriageLogger;
  now?: () => Date;
};

function toTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return null;
}

export function parseConfidence(value: unknown): number {
  const score =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim()
        ? Number(value)
        : Number.NaN;
  if (!Number.isFinite(score)) {
    return DEFAULT_CONDITION_CONFIDENCE;
  }
  return Math.max(0, Math.min(1, score));
}

function buildAnalysisPayload(
  record: StoredChatRecord,
  evidence: readonly EvidenceSource[],
): Record<string, unknown> {
  return {
    chat_number: record.chat_number,
    message: record.message,
    patient: {
      age: record.age ?? null,
      biological_sex: record.biological_sex ?? null,
      chronic_conditions: record.chronic_conditions ?? [],
      current_medications: record.current_medications ?? [],
      allergies: record.allergies ?? [],
    },
    symptoms: record.symptoms.map((symptom) => ({
      name: symptom.name,
      severity: symptom.severity,
      body_location: symptom.body_location ?? null,
      character: symptom.character ?? null,
      aggravating_factors: symptom.aggravating_factors ?? [],
      radiation: symptom.radiation ?? null,
      duration_pattern: symptom.duration_pattern ?? null,
      timing_pattern: symptom.timing_pattern ?? null,
      associated_symptoms: symptom.associated_symptoms ?? [],
      progression: symptom.progression ?? null,
      is_constant: symptom.is_constant ?? null,
    })),
    evidence: evidence.map((item, index) => ({
      id: index + 1,
      title: item.title,
      url: item.url,
      snippet: item.snippet,
    })),
  };
}

/** Maps 1-based evidence ids back to sources; conditions citing nothing valid are dropped. */
export function mapGroundedConditions(
  rawConditions: unknown,
  evidence: readonly EvidenceSource[],
): ConditionAnalysis[] {
  if (!Array.isArray(rawConditions)) {
    return [];
  }

  const conditions: ConditionAnalysis[] = [];
  for (const entry of rawConditions) {
    const item = asRecord(entry);
    if (!item) {
      continue;
    }
    const evidenceIds: unknown[] = Array.isArray(item.evidence_ids) ? item.evidence_ids : [];
    const mapped = evidenceIds
      .filter(
        (id): id is number =>
          typeof id === "number" && Number.isInteger(id) && id >= 1 && id <= evidence.length,
      )
      .map((id) => ({ ...evidence[id - 1] }));
    if (mapped.length === 0) {
      continue;
    }

    conditions.push({
      condition: toTrimmedString(item.condition) || "Unknown condition",
      confidence: parseConfidence(item.confidence ?? DEFAULT_CONDITION_CONFIDENCE),
      rationale: toTrimmedString(item.rationale) || "Evidence suggests this may be related.",
      related_symptoms: toStringList(item.related_symptoms),
      recommended_remedies: toStringList(item.recommended_remedies),
      doctor_specialties: toStringList(item.doctor_specialties),
      evidence: mapped,
    });
  }
  return conditions;
}

export function createChatAnalysisService(params: ChatAnalysisParams): ChatAnalysisService {
  const { client, evidenceSearch, logger } = params;
  const now = params.now ?? (() => new Date());

  const groundedAnalysis = async (
    record: StoredChatRecord,
    evidence: readonly EvidenceSource[],
    signal: AbortSignal | undefined,
  ): Promise<StoredChatAnalysis> => {
    const rawText = await client.generate({
      systemPrompt: STORED_CHAT_ANALYSIS_PROMPT,
      userPayload: buildAnalysisPayload(record, evidence),
      temperature: ANALYSIS_TEMPERATURE,
      signal,
    });
    const parsed = parseModelResponse(rawText);
    const redFlags = toStringList(parsed.red_flags);

    return {
      chat_number: record.chat_number,
      session_id: record.chat_id,
      analyzed_at: now().toISOString(),
      urgency_level: normalizeUrgency(parsed.urgency_level),
      urgency_reason:
        toTrimmedString(parsed.urgency_reason) || "Urgency estimated from symptom pattern and severity.",
      seek_care_within:
        toTrimmedString(parsed.seek_care_within) || "Within 24 hours if symptoms persist or worsen.",
      conditions: mapGroundedConditions(parsed.conditions, evidence),
      recommended_remedies: toStringList(parsed.recommended_remedies),
      red_flags: redFlags.length > 0 ? redFlags : [...STORED_CHAT_RED_FLAGS],
      disclaimer: toTrimmedString(parsed.disclaimer) || STORED_CHAT_DISCLAIMER,
    };
  };

  return {
    async analyzeStoredChat(record, options = {}) {
      const query = buildEvidenceQuery(record.symptoms.map((symptom) => symptom.name));
      const evidence = query ? await evidenceSearch.searchMedicalEvidence(query) : [];

      if (client.enabled && evidence.length > 0) {
        try {
          return await groundedAnalysis(record, evidence, options.signal);
        } catch (error) {
          if (isConfigurationError(error)) {
            throw error;
          }
          logger.warn(
            `[healthbud] grounded analysis failed (${client.provider}) for chat ${record.chat_number}; using fallback: ${describeError(toFallbackTrigger(error))}`,
          );
        }
      }

      return assessStoredChatFallback(record, evidence, now());
    },
  };
}
