import { describe, expect, it, vi } from "vitest";
import { assessFallbackTriage, buildGeneralReply } from "../services/fallback-triage.js";
import { isHealthRelated } from "../services/health-relevance.js";
import {
  createProviderClient,
  type EnabledProviderClient,
  type GenerateParams,
} from "../services/provider-client.js";
import {
  MalformedResponseError,
  ProviderHTTPError,
  SchemaValidationError,
  UnsupportedProviderError,
} from "../services/provider-errors.js";
import {
  DEFAULT_FOLLOW_UP_QUESTIONS,
  createTriageOrchestrator,
  validateAssessment,
} from "../services/triage-orchestrator.js";
import { createTriageRequest, type ConversationTurn } from "../types/triage.js";

function createLoggerSpy() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function enabledClient(generate: EnabledProviderClient["generate"]): EnabledProviderClient {
  return { kind: "openrouter", provider: "openrouter", enabled: true, model: "test-model", generate };
}

function replyWith(text: string) {
  return vi.fn(async (_params: GenerateParams) => text);
}

const MODEL_ASSESSMENT = {
  assistant_message: "I'm sorry you're dealing with that.",
  summary: "The patient has a throbbing headache.",
  follow_up_questions: ["Does light bother you?"],
  possible_conditions: ["Migraine"],
  possible_remedies: ["Rest in a dark room"],
  urgency_level: "medium",
  urgency_reason: "No warning signs reported.",
  seek_care_within: "Within 24-48 hours if it persists.",
  red_flags: ["Sudden worst headache of your life"],
  specialist_types: ["Neurology"],
  safety_disclaimer: "This is not a diagnosis.",
};

describe("healthbud triage orchestrator", () => {
  it("returns the normalized model assessment", async () => {
    const generate = replyWith(JSON.stringify(MODEL_ASSESSMENT));
    const orchestrator = createTriageOrchestrator({ client: enabledClient(generate), logger: createLoggerSpy() });

    const result = await orchestrator.assess(createTriageRequest({ message: "I have a throbbing headache" }));

    expect(result).toEqual({
      ...MODEL_ASSESSMENT,
      show_structured_output: true,
      summary: "You have a throbbing headache.",
    });
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0][0].temperature).toBe(0.2);
    expect(generate.mock.calls[0][0].userPayload).toMatchObject({
      message: "I have a throbbing headache",
      symptoms: [],
      patient_context: {},
      locale: "en-NG",
      conversation_history: [],
    });
  });

  it("skips the provider entirely when it is disabled", async () => {
    const fetchImpl = vi.fn(async () => new Response("{}"));
    const client = createProviderClient(
      { kind: "openrouter", apiKey: null, appName: "HealthBud", siteUrl: "http://localhost:3000" },
      { fetchImpl },
    );
    const logger = createLoggerSpy();
    const orchestrator = createTriageOrchestrator({ client, logger });

    const result = await orchestrator.assess(createTriageRequest({ message: "I have chest pain and can't breathe" }));

    expect(result.urgency_level).toBe("emergency");
    expect(result.seek_care_within).toBe("Immediately (call emergency services now).");
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("returns the same fallback on timeout as with the provider disabled", async () => {
    const request = createTriageRequest({ message: "I have chest pain and can't breathe" });
    const hangingFetch = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const logger = createLoggerSpy();
    const timedOut = createTriageOrchestrator({
      client: createProviderClient(
        { kind: "openrouter", apiKey: "test-key", appName: "HealthBud", siteUrl: "http://localhost:3000" },
        { fetchImpl: hangingFetch, timeoutMs: 5 },
      ),
      logger,
    });
    const disabled = createTriageOrchestrator({
      client: createProviderClient({
        kind: "disabled",
        apiKey: null,
        appName: "HealthBud",
        siteUrl: "http://localhost:3000",
      }),
      logger: createLoggerSpy(),
    });

    const fromTimeout = await timedOut.assess(request);
    const fromDisabled = await disabled.assess(request);

    expect(fromTimeout).toEqual(fromDisabled);
    expect(fromTimeout.urgency_level).toBe("emergency");
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toBe(
      "[healthbud] LLM request failed (openrouter); using fallback assessment: " +
        "ProviderNetworkError: openrouter network error: request timed out after 5ms",
    );
  });

  it("falls back on provider errors and unreadable replies", async () => {
    const request = createTriageRequest({ message: "I have had a high fever since yesterday" });
    const expected = assessFallbackTriage(request);

    const httpFailure = createTriageOrchestrator({
      client: enabledClient(async () => {
        throw new ProviderHTTPError("openrouter", 503, "upstream unavailable");
      }),
      logger: createLoggerSpy(),
    });
    const emptyReply = createTriageOrchestrator({
      client: enabledClient(async () => {
        throw new MalformedResponseError("openrouter returned no text content.");
      }),
      logger: createLoggerSpy(),
    });

    await expect(httpFailure.assess(request)).resolves.toEqual(expected);
    await expect(emptyReply.assess(request)).resolves.toEqual(expected);
  });

  it("answers non-health chat conversationally even when the model over-triages", async () => {
    const generate = replyWith(
      JSON.stringify({
        ...MODEL_ASSESSMENT,
        assistant_message: "Looks sunny today. How are you feeling?",
        urgency_level: "high",
      }),
    );
    const orchestrator = createTriageOrchestrator({ client: enabledClient(generate), logger: createLoggerSpy() });

    const result = await orchestrator.assess(createTriageRequest({ message: "what's the weather" }));

    expect(result.show_structured_output).toBe(false);
    expect(result.urgency_level).toBe("low");
    expect(result.assistant_message).toBe("Looks sunny today. How are you feeling?");
    expect(result.follow_up_questions).toEqual([]);
    expect(result.possible_conditions).toEqual([]);
    expect(result.possible_remedies).toEqual([]);
    expect(result.red_flags).toEqual([]);
    expect(result.specialist_types).toEqual([]);
  });

  it("uses the general reply for non-health chat without a provider", async () => {
    const orchestrator = createTriageOrchestrator({
      client: createProviderClient({
        kind: "gemini",
        apiKey: "your_gemini_key",
        appName: "HealthBud",
        siteUrl: "http://localhost:3000",
      }),
      logger: createLoggerSpy(),
    });
    const request = createTriageRequest({ message: "what's the weather" });

    await expect(orchestrator.assess(request)).resolves.toEqual(buildGeneralReply(request));
  });

  it("fills default follow-up questions for health turns", async () => {
    const generate = replyWith('{"summary":"Headache noted","urgency_level":"medium"}');
    const orchestrator = createTriageOrchestrator({ client: enabledClient(generate), logger: createLoggerSpy() });

    const result = await orchestrator.assess(createTriageRequest({ message: "I have a headache" }));

    expect(result.follow_up_questions).toEqual([...DEFAULT_FOLLOW_UP_QUESTIONS]);
    expect(result.assistant_message).toBe("Headache noted");
  });

  it("sends only the most recent turns and classifies against them", async () => {
    const generate = replyWith('{"assistant_message":"Hello again!"}');
    const orchestrator = createTriageOrchestrator({
      client: enabledClient(generate),
      logger: createLoggerSpy(),
      historyWindow: 2,
    });
    const history: ConversationTurn[] = [
      { user_message: "I had a fever last week", assistant_message: "Noted." },
      { user_message: "hello", assistant_message: "Hi!" },
      { user_message: "how are you", assistant_message: "Good, thanks." },
    ];

    const result = await orchestrator.assess(createTriageRequest({ message: "hello there" }), history);

    expect(generate.mock.calls[0][0].userPayload.conversation_history).toEqual(history.slice(1));
    expect(result.show_structured_output).toBe(false);
  });

  it("treats a turn as health-related when recent history mentions symptoms", async () => {
    const generate = replyWith('{"summary":"Cough follow-up","follow_up_questions":["Is it dry?"]}');
    const orchestrator = createTriageOrchestrator({ client: enabledClient(generate), logger: createLoggerSpy() });

    const result = await orchestrator.assess(createTriageRequest({ message: "what should I do now?" }), [
      { user_message: "I have a bad cough" },
    ]);

    expect(result.show_structured_output).toBe(true);
    expect(result.follow_up_questions).toEqual(["Is it dry?"]);
  });

  it("falls back when a deeply nested reply cannot be normalized", async () => {
    const depth = 200_000;
    const reply = `{"summary":"ok","red_flags":[${"[".repeat(depth)}${"]".repeat(depth)}]}`;
    const logger = createLoggerSpy();
    const orchestrator = createTriageOrchestrator({ client: enabledClient(replyWith(reply)), logger });
    const request = createTriageRequest({ message: "I have a headache" });

    await expect(orchestrator.assess(request)).resolves.toEqual(assessFallbackTriage(request));
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toContain("MalformedResponseError: List item could not be serialized.");
  });

  it("falls back on unexpected failures from the provider round trip", async () => {
    const orchestrator = createTriageOrchestrator({
      client: enabledClient(async () => {
        throw new TypeError("Cannot read properties of undefined");
      }),
      logger: createLoggerSpy(),
    });
    const request = createTriageRequest({ message: "I have a headache" });

    await expect(orchestrator.assess(request)).resolves.toEqual(assessFallbackTriage(request));
  });

  it("lets configuration misuse propagate", async () => {
    const orchestrator = createTriageOrchestrator({
      client: enabledClient(async () => {
        throw new UnsupportedProviderError("claude");
      }),
      logger: createLoggerSpy(),
    });

    await expect(orchestrator.assess(createTriageRequest({ message: "I have a headache" }))).rejects.toBeInstanceOf(
      UnsupportedProviderError,
    );
  });

  it("rejects assessments that break the output contract", () => {
    const invalid = { ...assessFallbackTriage(createTriageRequest({ message: "headache" })), summary: "" };
    expect(() => validateAssessment(invalid)).toThrow(SchemaValidationError);
  });
});

describe("healthbud health relevance", () => {
  it("counts attached symptoms as health-related", () => {
    expect(
      isHealthRelated(createTriageRequest({ message: "hello", symptoms: [{ name: "rash", severity: 2 }] })),
    ).toBe(true);
  });

  it("matches keywords in the message", () => {
    expect(isHealthRelated(createTriageRequest({ message: "My CHEST feels tight" }))).toBe(true);
    expect(isHealthRelated(createTriageRequest({ message: "what's the weather" }))).toBe(false);
  });
});
