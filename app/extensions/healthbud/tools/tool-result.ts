import type { TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { RequestHeaders } from "../services/rate-limiter.js";

export type ToolErrorCode = "invalid_input" | "rate_limited";

export type ToolError = {
  code: ToolErrorCode;
  message: string;
};

export type ToolPayload<T> =
  | { status: "ok"; data: T; errors: [] }
  | { status: "error"; data: null; errors: ToolError[] };

export type ToolResult<T> = {
  content: Array<{ type: "text"; text: string }>;
  details: ToolPayload<T>;
};

/** Per-call context the host passes through from the inbound request. */
export type ToolCallContext = {
  headers?: RequestHeaders | null;
  remoteAddress?: string | null;
  signal?: AbortSignal;
};

export function jsonResult<T>(payload: ToolPayload<T>): ToolResult<T> {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    details: payload,
  };
}

export function okResult<T>(data: T): ToolResult<T> {
  return jsonResult<T>({ status: "ok", data, errors: [] });
}

export function errorResult<T>(code: ToolErrorCode, message: string): ToolResult<T> {
  return jsonResult<T>({ status: "error", data: null, errors: [{ code, message }] });
}

export function describeSchemaErrors(schema: TSchema, value: unknown, limit: number = 5): string {
  const messages: string[] = [];
  for (const error of Value.Errors(schema, value)) {
    messages.push(`${error.path || "<root>"}: ${error.message}`);
    if (messages.length >= limit) {
      break;
    }
  }
  return messages.join("; ");
}
