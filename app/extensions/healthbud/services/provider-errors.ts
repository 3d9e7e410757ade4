import type { TriageProviderKind } from "../types/runtime-config.js";

export type TriageFallbackCode =
  | "provider_disabled"
  | "provider_network_error"
  | "provider_http_error"
  | "malformed_response"
  | "schema_validation_failed";

/**
 * Base for every failure the assessment layer recovers from by falling back to
 * the rule-based engine.
 */
export abstract class TriageFallbackTrigger extends Error {
  abstract readonly code: TriageFallbackCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProviderDisabledError extends TriageFallbackTrigger {
  readonly code = "provider_disabled";

  constructor(message = "LLM provider is not configured.") {
    super(message);
  }
}

export class ProviderNetworkError extends TriageFallbackTrigger {
  readonly code = "provider_network_error";

  constructor(
    readonly provider: TriageProviderKind,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${provider} network error: ${reason}`, options);
  }
}

export class ProviderHTTPError extends TriageFallbackTrigger {
  readonly code = "provider_http_error";

  constructor(
    readonly provider: TriageProviderKind,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${provider} HTTP error: ${status} ${body}`.trim());
  }
}

export class MalformedResponseError extends TriageFallbackTrigger {
  readonly code = "malformed_response";
}

export class SchemaValidationError extends TriageFallbackTrigger {
  readonly code = "schema_validation_failed";

  constructor(readonly issues: string) {
    super(`Assessment failed output validation: ${issues}`);
  }
}

export class UnsupportedProviderError extends Error {
  constructor(readonly provider: string) {
    super(`Unsupported LLM provider: ${provider}`);
    this.name = "UnsupportedProviderError";
  }
}

export function isFallbackTrigger(error: unknown): error is TriageFallbackTrigger {
  return error instanceof TriageFallbackTrigger;
}

/** Configuration misuse is the one failure the assessment layer does not mask. */
export function isConfigurationError(error: unknown): error is UnsupportedProviderError {
  return error instanceof UnsupportedProviderError;
}

/**
 * Reclassifies an unexpected failure from the provider round trip (for example
 * a stack overflow while coercing a deeply nested reply) as a malformed reply.
 */
export function toFallbackTrigger(error: unknown): TriageFallbackTrigger {
  if (isFallbackTrigger(error)) {
    return error;
  }
  return new MalformedResponseError(`Model response could not be processed: ${describeError(error)}`, {
    cause: error,
  });
}

export function describeError(error: unknown, maxChars: number = 300): string {
  const raw = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  const normalized = raw.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, maxChars - 3)}...`;
}
