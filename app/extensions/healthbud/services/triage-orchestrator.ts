import type { ConversationTurn, TriageAssessment, TriageRequest } from "../types/triage.js";
import { TriageAssessmentSchema } from "../types/triage.js";
import { assessFallbackTriage, buildGeneralReply } from "./fallback-triage.js";
import { isHealthRelated } from "./health-relevance.js";
import type { TriageLogger } from "./logger.js";
import { TRIAGE_SYSTEM_PROMPT } from "./prompts.js";
import type { ProviderClient } from "./provider-client.js";
import {
  SchemaValidationError,
  describeError,
  isConfigurationError,
  toFallbackTrigger,
} from "./provider-errors.js";
import { normalizeAssessmentPayload, parseModelResponse } from "./response-normalizer.js";

export const TRIAGE_TEMPERATURE = 0.2;
export const DEFAULT_HISTORY_WINDOW = 10;

export const DEFAULT_FOLLOW_UP_QUESTIONS = [
  "When did this start, and has it been getting better, worse, or staying the same?",
  "How severe is it right now on a scale of 0 to 10?",
  "Do you have any other symptoms like fever, shortness of breath, vomiting, or dizziness?",
  "What makes it better or worse, and have you tried any treatment so far?",
] as const;

export type AssessOptions = {
  signal?: AbortSignal;
};

export type TriageOrchestrator = {
  assess: (
    request: TriageRequest,
    history?: readonly ConversationTurn[],
    options?: AssessOptions,
  ) => Promise<TriageAssessment>;
};

export type TriageOrchestratorParams = {
  client: ProviderClient;
  logger: TriageLogger;
  historyWindow?: number;
};

function boundHistory(history: readonly ConversationTurn[], window: number): ConversationTurn[] {
  if (window <= 0) {
    return [];
  }
  return history.slice(-window).map((turn) => ({ ...turn }));
}

export function buildTriagePayload(
  request: TriageRequest,
  history: readonly ConversationTurn[],
): Record<string, unknown> {
  return {
    message: request.message,
    symptoms: request.symptoms.map((symptom) => ({ ...symptom })),
    patient_context: request.patient_context ? { ...request.patient_context } : {},
    locale: request.locale,
    conversation_history: history,
  };
}

export function validateAssessment(candidate: TriageAssessment): TriageAssessment {
  const result = TriageAssessmentSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
      .join("; ");
    throw new SchemaValidationError(issues);
  }
  return result.data;
}

export function withDefaultFollowUps(
  assessment: TriageAssessment,
  healthRelated: boolean,
): TriageAssessment {
  if (!healthRelated || !assessment.show_structured_output) {
    return assessment;
  }
  if (assessment.follow_up_questions.length > 0) {
    return assessment;
  }
  return { ...assessment, follow_up_questions: [...DEFAULT_FOLLOW_UP_QUESTIONS] };
}

export function createTriageOrchestrator(params: TriageOrchestratorParams): TriageOrchestrator {
  const { client, logger } = params;
  const historyWindow = params.historyWindow ?? DEFAULT_HISTORY_WINDOW;

  const fallback = (request: TriageRequest, healthRelated: boolean): TriageAssessment =>
    withDefaultFollowUps(
      healthRelated ? assessFallbackTriage(request) : buildGeneralReply(request),
      healthRelated,
    );

  return {
    async assess(request, history = [], options = {}) {
      const boundedHistory = boundHistory(history, historyWindow);
      const healthRelated = isHealthRelated(request, boundedHistory);

      if (!client.enabled) {
        return fallback(request, healthRelated);
      }

      try {
        const rawText = await client.generate({
          systemPrompt: TRIAGE_SYSTEM_PROMPT,
          userPayload: buildTriagePayload(request, boundedHistory),
          temperature: TRIAGE_TEMPERATURE,
          signal: options.signal,
        });
        const normalized = normalizeAssessmentPayload(parseModelResponse(rawText), {
          healthRelated,
        });
        return withDefaultFollowUps(validateAssessment(normalized), healthRelated);
      } catch (error) {
        if (isConfigurationError(error)) {
          throw error;
        }
        logger.warn(
          `[healthbud] LLM request failed (${client.provider}); using fallback assessment: ${describeError(toFallbackTrigger(error))}`,
        );
        return fallback(request, healthRelated);
      }
    },
  };
}
