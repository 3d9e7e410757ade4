import { Type, type Static } from "@sinclair/typebox";
import { z } from "zod";

export const URGENCY_LEVELS = ["low", "medium", "high", "emergency"] as const;

export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];

const OptionalText = (maxLength: number) =>
  Type.Optional(Type.Union([Type.String({ maxLength }), Type.Null()]));

export const SymptomEntrySchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 80 }),
  severity: Type.Integer({ minimum: 0, maximum: 10 }),
  symptom_started_at: OptionalText(64),
  body_location: OptionalText(120),
  character: OptionalText(120),
  aggravating_factors: Type.Optional(Type.Array(Type.String())),
  radiation: OptionalText(200),
  duration_pattern: OptionalText(120),
  timing_pattern: OptionalText(120),
  relieving_factors: Type.Optional(Type.Array(Type.String())),
  associated_symptoms: Type.Optional(Type.Array(Type.String())),
  progression: OptionalText(120),
  is_constant: Type.Optional(Type.Union([Type.Boolean(), Type.Null()])),
  duration_hours: Type.Optional(Type.Union([Type.Integer({ minimum: 0 }), Type.Null()])),
  notes: OptionalText(500),
});

export const PatientContextSchema = Type.Object({
  age: Type.Optional(Type.Union([Type.Integer({ minimum: 0, maximum: 130 }), Type.Null()])),
  biological_sex: OptionalText(20),
  chronic_conditions: Type.Optional(Type.Array(Type.String())),
  current_medications: Type.Optional(Type.Array(Type.String())),
  allergies: Type.Optional(Type.Array(Type.String())),
});

export const ConversationTurnSchema = Type.Object({
  user_message: Type.String(),
  assistant_message: Type.Optional(Type.String()),
});

export const TriageRequestSchema = Type.Object({
  message: Type.String({ minLength: 1, maxLength: 3000 }),
  symptoms: Type.Optional(Type.Array(SymptomEntrySchema)),
  patient_context: Type.Optional(Type.Union([PatientContextSchema, Type.Null()])),
  locale: Type.Optional(Type.String({ maxLength: 15 })),
  session_id: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export type SymptomEntry = Static<typeof SymptomEntrySchema>;
export type PatientContext = Static<typeof PatientContextSchema>;
export type ConversationTurn = Static<typeof ConversationTurnSchema>;

export type TriageRequest = {
  readonly message: string;
  readonly symptoms: readonly SymptomEntry[];
  readonly patient_context: PatientContext | null;
  readonly locale: string;
  readonly session_id: string | null;
};

export const DEFAULT_LOCALE = "en-NG";

export function createTriageRequest(input: Static<typeof TriageRequestSchema>): TriageRequest {
  return Object.freeze({
    message: input.message,
    symptoms: Object.freeze([...(input.symptoms ?? [])]),
    patient_context: input.patient_context ?? null,
    locale: input.locale?.trim() || DEFAULT_LOCALE,
    session_id: input.session_id ?? null,
  });
}

/** The one output contract shared by the model path and every fallback path. */
export const TriageAssessmentSchema = z.strictObject({
  assistant_message: z.string().min(1),
  show_structured_output: z.boolean(),
  summary: z.string().min(1),
  follow_up_questions: z.array(z.string()),
  possible_conditions: z.array(z.string()),
  possible_remedies: z.array(z.string()),
  urgency_level: z.enum(URGENCY_LEVELS),
  urgency_reason: z.string().min(1),
  seek_care_within: z.string().min(1),
  red_flags: z.array(z.string()),
  specialist_types: z.array(z.string()),
  safety_disclaimer: z.string().min(1),
});

export type TriageAssessment = z.infer<typeof TriageAssessmentSchema>;

export type EvidenceSource = {
  title: string;
  url: string;
  snippet: string;
};

export type ConditionAnalysis = {
  condition: string;
  confidence: number;
  rationale: string;
  related_symptoms: string[];
  recommended_remedies: string[];
  doctor_specialties: string[];
  evidence: EvidenceSource[];
};

export const StoredChatRecordSchema = Type.Object({
  chat_number: Type.Integer({ minimum: 0 }),
  chat_id: Type.String({ minLength: 1 }),
  message: Type.String(),
  age: Type.Optional(Type.Union([Type.Integer({ minimum: 0, maximum: 130 }), Type.Null()])),
  biological_sex: OptionalText(20),
  chronic_conditions: Type.Optional(Type.Array(Type.String())),
  current_medications: Type.Optional(Type.Array(Type.String())),
  allergies: Type.Optional(Type.Array(Type.String())),
  symptoms: Type.Array(SymptomEntrySchema),
});

export type StoredChatRecord = Static<typeof StoredChatRecordSchema>;

export type StoredChatAnalysis = {
  chat_number: number;
  session_id: string;
  analyzed_at: string;
  urgency_level: UrgencyLevel;
  urgency_reason: string;
  seek_care_within: string;
  conditions: ConditionAnalysis[];
  recommended_remedies: string[];
  red_flags: string[];
  disclaimer: string;
};
