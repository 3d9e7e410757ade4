import type { TriageProviderConfig, TriageProviderKind } from "../types/runtime-config.js";
import { DEFAULT_GEMINI_MODEL, DEFAULT_OPENROUTER_MODEL } from "../types/runtime-config.js";
import {
  MalformedResponseError,
  ProviderDisabledError,
  ProviderHTTPError,
  ProviderNetworkError,
  UnsupportedProviderError,
} from "./provider-errors.js";

export const OPENROUTER_API_URL = "https://openrouter.ai/api/v1/chat/completions";
export const GEMINI_API_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/models";

// openrouter completions are larger and take longer to come back
export const OPENROUTER_TIMEOUT_MS = 45_000;
export const GEMINI_TIMEOUT_MS = 25_000;

const PLACEHOLDER_KEY_PREFIX = "your_";
const MAX_ERROR_BODY_CHARS = 500;

export type GenerateParams = {
  systemPrompt: string;
  userPayload: Record<string, unknown>;
  temperature?: number;
  signal?: AbortSignal;
};

type GenerateFn = (params: GenerateParams) => Promise<string>;

export type DisabledProviderClient = {
  kind: "disabled";
  /** Identity that was configured; a placeholder key still disables it. */
  provider: TriageProviderKind;
  enabled: false;
  model: null;
  generate: GenerateFn;
};

export type EnabledProviderClient = {
  kind: "openrouter" | "gemini";
  provider: "openrouter" | "gemini";
  enabled: true;
  model: string;
  generate: GenerateFn;
};

export type ProviderClient = DisabledProviderClient | EnabledProviderClient;

export type ProviderClientOptions = {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

type HttpRequest = {
  provider: "openrouter" | "gemini";
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl: typeof fetch;
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

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : undefined;
}

function truncate(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars - 3)}...`;
}

export function isUsableApiKey(apiKey: string | null | undefined): apiKey is string {
  const trimmed = toTrimmedString(apiKey);
  if (!trimmed) {
    return false;
  }
  return !trimmed.toLowerCase().startsWith(PLACEHOLDER_KEY_PREFIX);
}

function describeTransportFailure(error: unknown): string {
  if (error instanceof Error) {
    const cause = asRecord(error.cause);
    const code = toTrimmedString(cause?.code);
    return code ? `${error.message} (${code})` : error.message;
  }
  return String(error);
}

async function postJson(request: HttpRequest): Promise<unknown> {
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, request.timeoutMs);
  const abortFromCaller = () => controller.abort();
  if (request.signal?.aborted) {
    controller.abort();
  } else {
    request.signal?.addEventListener("abort", abortFromCaller, { once: true });
  }

  try {
    let response: Response;
    try {
      response = await request.fetchImpl(request.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...request.headers },
        body: JSON.stringify(request.body),
        signal: controller.signal,
      });
    } catch (error) {
      const reason = timedOut
        ? `request timed out after ${request.timeoutMs}ms`
        : controller.signal.aborted
          ? "request aborted"
          : describeTransportFailure(error);
      throw new ProviderNetworkError(request.provider, reason, { cause: error });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new ProviderHTTPError(
        request.provider,
        response.status,
        truncate(detail || response.statusText, MAX_ERROR_BODY_CHARS),
      );
    }

    let bodyText: string;
    try {
      bodyText = await response.text();
    } catch (error) {
      throw new ProviderNetworkError(request.provider, describeTransportFailure(error), {
        cause: error,
      });
    }

    try {
      return JSON.parse(bodyText) as unknown;
    } catch (error) {
      throw new MalformedResponseError(`${request.provider} returned an undecodable envelope.`, {
        cause: error,
      });
    }
  } finally {
    clearTimeout(timeout);
    request.signal?.removeEventListener("abort", abortFromCaller);
  }
}

function joinTextParts(parts: unknown): string {
  if (!Array.isArray(parts)) {
    return "";
  }
  return parts
    .map((part) => (typeof part === "string" ? part : toTextField(asRecord(part)?.text)))
    .join("");
}

function toTextField(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * Tries each reply shape in order: a plain string, a list of content parts,
 * then the argument string of the first tool call.
 */
export function extractOpenRouterText(payload: unknown): string {
  const choice = asRecord(firstOf(asRecord(payload)?.choices));
  const message = asRecord(choice?.message);
  const content = message?.content;

  if (typeof content === "string" && content.trim()) {
    return content;
  }

  const joined = joinTextParts(content);
  if (joined.trim()) {
    return joined;
  }

  const toolCall = asRecord(firstOf(message?.tool_calls));
  const toolArguments = asRecord(toolCall?.function)?.arguments;
  if (typeof toolArguments === "string" && toolArguments.trim()) {
    return toolArguments;
  }

  return "";
}

export function extractGeminiText(payload: unknown): string {
  const candidate = asRecord(firstOf(asRecord(payload)?.candidates));
  return joinTextParts(asRecord(candidate?.content)?.parts);
}

function requireText(provider: "openrouter" | "gemini", text: string): string {
  if (!text.trim()) {
    throw new MalformedResponseError(`${provider} returned no text content.`);
  }
  return text;
}

export function buildOpenRouterBody(model: string, params: GenerateParams): Record<string, unknown> {
  return {
    model,
    temperature: params.temperature ?? 0.2,
    messages: [
      { role: "system", content: params.systemPrompt },
      { role: "user", content: JSON.stringify(params.userPayload) },
    ],
    response_format: { type: "json_object" },
  };
}

export function buildGeminiBody(params: GenerateParams): Record<string, unknown> {
  return {
    systemInstruction: {
      parts: [{ text: params.systemPrompt }],
    },
    contents: [
      {
        role: "user",
        parts: [{ text: JSON.stringify(params.userPayload) }],
      },
    ],
    generationConfig: {
      temperature: params.temperature ?? 0.2,
      responseMimeType: "application/json",
    },
  };
}

function createDisabledClient(provider: TriageProviderKind): DisabledProviderClient {
  return {
    kind: "disabled",
    provider,
    enabled: false,
    model: null,
    async generate() {
      throw new ProviderDisabledError(`${provider} is disabled: no usable API key configured.`);
    },
  };
}

function createOpenRouterClient(
  config: TriageProviderConfig,
  apiKey: string,
  options: ProviderClientOptions,
): EnabledProviderClient {
  const model = toTrimmedString(config.model) || DEFAULT_OPENROUTER_MODEL;
  const fetchImpl = options.fetchImpl ?? fetch;
  return {
    kind: "openrouter",
    provider: "openrouter",
    enabled: true,
    model,
    async generate(params) {
      const payload = await postJson({
        provider: "openrouter",
        url: OPENROUTER_API_URL,
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "HTTP-Referer": config.siteUrl,
          "X-Title": config.appName,
        },
        body: buildOpenRouterBody(model, params),
        timeoutMs: options.timeoutMs ?? OPENROUTER_TIMEOUT_MS,
        signal: params.signal,
        fetchImpl,
      });
      return requireText("openrouter", extractOpenRouterText(payload));
    },
  };
}

function createGeminiClient(
  config: TriageProviderConfig,
  apiKey: string,
  options: ProviderClientOptions,
): EnabledProviderClient {
  const model = toTrimmedString(config.model) || DEFAULT_GEMINI_MODEL;
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `${GEMINI_API_BASE_URL}/${encodeURIComponent(model)}:generateContent?key=${encodeURIComponent(apiKey)}`;
  return {
    kind: "gemini",
    provider: "gemini",
    enabled: true,
    model,
    async generate(params) {
      const payload = await postJson({
        provider: "gemini",
        url,
        headers: {},
        body: buildGeminiBody(params),
        timeoutMs: options.timeoutMs ?? GEMINI_TIMEOUT_MS,
        signal: params.signal,
        fetchImpl,
      });
      return requireText("gemini", extractGeminiText(payload));
    },
  };
}

/** Picks the provider variant once; calls never re-dispatch on the identity string. */
export function createProviderClient(
  config: TriageProviderConfig,
  options: ProviderClientOptions = {},
): ProviderClient {
  const kind: TriageProviderKind = config.kind;
  switch (kind) {
    case "disabled":
      return createDisabledClient("disabled");
    case "openrouter":
      return isUsableApiKey(config.apiKey)
        ? createOpenRouterClient(config, config.apiKey.trim(), options)
        : createDisabledClient("openrouter");
    case "gemini":
      return isUsableApiKey(config.apiKey)
        ? createGeminiClient(config, config.apiKey.trim(), options)
        : createDisabledClient("gemini");
    default: {
      const unsupported: never = kind;
      throw new UnsupportedProviderError(String(unsupported));
    }
  }
}
