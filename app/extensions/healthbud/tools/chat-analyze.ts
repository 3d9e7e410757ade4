import { Value } from "@sinclair/typebox/value";
import type { ChatAnalysisService } from "../services/chat-analysis.js";
import { RATE_LIMIT_BUCKETS, deriveClientKey, type RateLimiter } from "../services/rate-limiter.js";
import { StoredChatRecordSchema, type StoredChatAnalysis } from "../types/triage.js";
import {
  describeSchemaErrors,
  errorResult,
  okResult,
  type ToolCallContext,
  type ToolResult,
} from "./tool-result.js";

const RATE_LIMIT_WINDOW_SECONDS = 60;

export type ChatAnalyzeToolDeps = {
  chatAnalysis: ChatAnalysisService;
  rateLimiter: RateLimiter;
  maxRequestsPerMinute: number;
};

export function createChatAnalyzeTool(deps: ChatAnalyzeToolDeps) {
  return {
    name: "chat_analyze",
    description: "Re-analyze a stored chat against retrieved medical evidence.",
    parameters: StoredChatRecordSchema,
    async execute(
      _toolCallId: string,
      rawParams: unknown,
      context: ToolCallContext = {},
    ): Promise<ToolResult<StoredChatAnalysis>> {
      if (!Value.Check(StoredChatRecordSchema, rawParams)) {
        return errorResult<StoredChatAnalysis>(
          "invalid_input",
          describeSchemaErrors(StoredChatRecordSchema, rawParams) || "Invalid stored chat record.",
        );
      }

      const admitted = deps.rateLimiter.isAdmitted(
        RATE_LIMIT_BUCKETS.analyze,
        deriveClientKey(context),
        deps.maxRequestsPerMinute,
        RATE_LIMIT_WINDOW_SECONDS,
      );
      if (!admitted) {
        return errorResult<StoredChatAnalysis>("rate_limited", "Too many requests. Please wait and try again.");
      }

      const analysis = await deps.chatAnalysis.analyzeStoredChat(rawParams, { signal: context.signal });
      return okResult(analysis);
    },
  };
}
