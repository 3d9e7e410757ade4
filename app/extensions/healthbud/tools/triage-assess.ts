import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { TriageOrchestrator } from "../services/triage-orchestrator.js";
import { RATE_LIMIT_BUCKETS, deriveClientKey, type RateLimiter } from "../services/rate-limiter.js";
import {
  ConversationTurnSchema,
  TriageRequestSchema,
  createTriageRequest,
  type TriageAssessment,
} from "../types/triage.js";
import {
  describeSchemaErrors,
  errorResult,
  okResult,
  type ToolCallContext,
  type ToolResult,
} from "./tool-result.js";

const RATE_LIMIT_WINDOW_SECONDS = 60;

export const TriageAssessParameters = Type.Object({
  ...TriageRequestSchema.properties,
  conversation_history: Type.Optional(Type.Array(ConversationTurnSchema)),
});

export type TriageAssessToolDeps = {
  orchestrator: TriageOrchestrator;
  rateLimiter: RateLimiter;
  maxRequestsPerMinute: number;
};

export function createTriageAssessTool(deps: TriageAssessToolDeps) {
  return {
    name: "triage_assess",
    description:
      "Assess a health message and symptoms, returning a structured triage assessment with urgency.",
    parameters: TriageAssessParameters,
    async execute(
      _toolCallId: string,
      rawParams: unknown,
      context: ToolCallContext = {},
    ): Promise<ToolResult<TriageAssessment>> {
      if (!Value.Check(TriageAssessParameters, rawParams)) {
        return errorResult<TriageAssessment>(
          "invalid_input",
          describeSchemaErrors(TriageAssessParameters, rawParams) || "Invalid triage request.",
        );
      }
      if (!rawParams.message.trim()) {
        return errorResult<TriageAssessment>("invalid_input", "message is required.");
      }

      const clientKey = deriveClientKey(context);
      const admitted = deps.rateLimiter.isAdmitted(
        RATE_LIMIT_BUCKETS.assess,
        clientKey,
        deps.maxRequestsPerMinute,
        RATE_LIMIT_WINDOW_SECONDS,
      );
      if (!admitted) {
        return errorResult<TriageAssessment>("rate_limited", "Too many requests. Please wait and try again.");
      }

      const request = createTriageRequest(rawParams);
      const assessment = await deps.orchestrator.assess(
        request,
        rawParams.conversation_history ?? [],
        { signal: context.signal },
      );
      return okResult(assessment);
    },
  };
}
