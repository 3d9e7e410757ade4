import type { TriageAssessment, UrgencyLevel } from "../types/triage.js";
import { URGENCY_LEVELS } from "../types/triage.js";
import { MalformedResponseError } from "./provider-errors.js";

export type ParsedModelObject = Record<string, unknown>;

export type ParseStepResult =
  | { ok: true; value: ParsedModelObject; step: "strict" | "brace_span" | "synthesized" }
  | { ok: false; reason: "not_json" | "not_object" | "no_brace_span" | "empty" };

export type NormalizeOptions = {
  healthRelated: boolean;
};

export const DEFAULT_ASSISTANT_MESSAGE = "I am here to help. Tell me what you are feeling today.";
export const DEFAULT_SUMMARY = "AI triage assessment generated.";
export const DEFAULT_URGENCY_REASON = "Estimated from symptoms and available context.";
export const DEFAULT_SEEK_CARE_WITHIN = "Within 24-48 hours if symptoms persist or worsen.";
export const DEFAULT_SAFETY_DISCLAIMER =
  "This is not a medical diagnosis. Seek urgent care for severe or worsening symptoms.";

export const NON_HEALTH_URGENCY_REASON = "No health symptoms were provided in this message.";
export const NON_HEALTH_SEEK_CARE_WITHIN = "Not applicable unless you develop symptoms.";

const TEXT_FIELDS = [
  "assistant_message",
  "summary",
  "urgency_reason",
  "seek_care_within",
  "safety_disclaimer",
] as const;

const LIST_FIELDS = [
  "follow_up_questions",
  "possible_conditions",
  "possible_remedies",
  "red_flags",
  "specialist_types",
] as const;

type ListField = (typeof LIST_FIELDS)[number];

const FENCE_OPEN_PATTERN = /^```[A-Za-z0-9_+-]*[ \t]*\r?\n?/;
const FENCE_CLOSE_PATTERN = /\r?\n?```\s*$/;

// Ordered: phrases that carry a verb are rewritten before the bare noun phrase.
const SECOND_PERSON_REWRITES: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /\b(?:the|this) (?:user|patient)'s\b/gi, replacement: "your" },
  { pattern: /\b(?:the |this )?(?:user|patient) is\b/gi, replacement: "you are" },
  { pattern: /\b(?:the |this )?(?:user|patient) has\b/gi, replacement: "you have" },
  { pattern: /\b(?:the |this )?(?:user|patient) reports\b/gi, replacement: "you report" },
  { pattern: /\b(?:the|this) (?:user|patient)\b/gi, replacement: "you" },
];

function isPlainObject(value: unknown): value is ParsedModelObject {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function stripCodeFence(rawText: string): string {
  const trimmed = rawText.trim();
  if (!trimmed.startsWith("```")) {
    return trimmed;
  }
  return trimmed.replace(FENCE_OPEN_PATTERN, "").replace(FENCE_CLOSE_PATTERN, "").trim();
}

export function parseStrictJson(text: string): ParseStepResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, reason: "not_json" };
  }
  if (!isPlainObject(parsed)) {
    return { ok: false, reason: "not_object" };
  }
  return { ok: true, value: parsed, step: "strict" };
}

export function parseBraceSpan(text: string): ParseStepResult {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return { ok: false, reason: "no_brace_span" };
  }
  const result = parseStrictJson(text.slice(start, end + 1));
  return result.ok ? { ...result, step: "brace_span" } : result;
}

export function synthesizeMinimal(text: string): ParseStepResult {
  if (!text) {
    return { ok: false, reason: "empty" };
  }
  return {
    ok: true,
    value: { assistant_message: text, summary: text },
    step: "synthesized",
  };
}

/**
 * Turns raw model output into an object. A non-empty reply always yields
 * something: prose that is not JSON becomes the assistant message.
 */
export function parseModelResponse(rawText: string): ParsedModelObject {
  const cleaned = stripCodeFence(rawText);
  const steps = [parseStrictJson, parseBraceSpan, synthesizeMinimal];
  for (const step of steps) {
    const result = step(cleaned);
    if (result.ok) {
      return result.value;
    }
  }
  throw new MalformedResponseError("Model response was empty after cleanup.");
}

export function normalizeUrgency(value: unknown): UrgencyLevel {
  if (typeof value === "string") {
    const candidate = value.trim().toLowerCase();
    const known = URGENCY_LEVELS.find((level) => level === candidate);
    if (known) {
      return known;
    }
    if (candidate && Number.isFinite(Number(candidate))) {
      return urgencyFromScore(Number(candidate));
    }
    return "medium";
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return urgencyFromScore(value);
  }
  return "medium";
}

function urgencyFromScore(score: number): UrgencyLevel {
  if (score >= 8) {
    return "emergency";
  }
  if (score >= 6) {
    return "high";
  }
  if (score >= 3) {
    return "medium";
  }
  return "low";
}

// Values are kept verbatim; a blank string counts as missing.
function toText(value: unknown): string {
  if (typeof value === "string") {
    return value.trim() ? value : "";
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
}

export function toStringList(value: unknown): string[] {
  const items: unknown[] = Array.isArray(value) ? value : value === undefined || value === null ? [] : [value];
  const result: string[] = [];
  for (const item of items) {
    if (item === undefined || item === null) {
      continue;
    }
    result.push(typeof item === "string" ? item : typeof item === "object" ? stringifyItem(item) : String(item));
  }
  return result;
}

function stringifyItem(item: object): string {
  try {
    return JSON.stringify(item);
  } catch (error) {
    throw new MalformedResponseError("List item could not be serialized.", { cause: error });
  }
}

function matchCase(source: string, replacement: string): string {
  const first = source.charAt(0);
  if (first && first === first.toUpperCase() && first !== first.toLowerCase()) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

export function rewriteToSecondPerson(text: string): string {
  let rewritten = text;
  for (const rule of SECOND_PERSON_REWRITES) {
    rewritten = rewritten.replace(rule.pattern, (match) => matchCase(match, rule.replacement));
  }
  return rewritten;
}

export function enforceSecondPersonVoice(assessment: TriageAssessment): TriageAssessment {
  const next: TriageAssessment = { ...assessment };
  for (const field of TEXT_FIELDS) {
    next[field] = rewriteToSecondPerson(assessment[field]);
  }
  for (const field of LIST_FIELDS) {
    next[field] = assessment[field].map(rewriteToSecondPerson);
  }
  return next;
}

function readList(parsed: ParsedModelObject, field: ListField): string[] {
  return toStringList(parsed[field]);
}

export function normalizeAssessmentPayload(
  parsed: ParsedModelObject,
  options: NormalizeOptions,
): TriageAssessment {
  const summaryText = toText(parsed.summary);
  const normalized: TriageAssessment = {
    assistant_message: toText(parsed.assistant_message) || summaryText || DEFAULT_ASSISTANT_MESSAGE,
    show_structured_output: true,
    summary: summaryText || DEFAULT_SUMMARY,
    follow_up_questions: readList(parsed, "follow_up_questions"),
    possible_conditions: readList(parsed, "possible_conditions"),
    possible_remedies: readList(parsed, "possible_remedies"),
    urgency_level: normalizeUrgency(parsed.urgency_level),
    urgency_reason: toText(parsed.urgency_reason) || DEFAULT_URGENCY_REASON,
    seek_care_within: toText(parsed.seek_care_within) || DEFAULT_SEEK_CARE_WITHIN,
    red_flags: readList(parsed, "red_flags"),
    specialist_types: readList(parsed, "specialist_types"),
    safety_disclaimer: toText(parsed.safety_disclaimer) || DEFAULT_SAFETY_DISCLAIMER,
  };

  if (!options.healthRelated) {
    normalized.show_structured_output = false;
    normalized.urgency_level = "low";
    normalized.urgency_reason = NON_HEALTH_URGENCY_REASON;
    normalized.seek_care_within = NON_HEALTH_SEEK_CARE_WITHIN;
    for (const field of LIST_FIELDS) {
      normalized[field] = [];
    }
  }

  return enforceSecondPersonVoice(normalized);
}
