import type {
  ConditionAnalysis,
  EvidenceSource,
  StoredChatAnalysis,
  StoredChatRecord,
  TriageAssessment,
  TriageRequest,
  UrgencyLevel,
} from "../types/triage.js";

type TierBundle = {
  urgency_level: UrgencyLevel;
  seek_care_within: string;
  urgency_reason: string;
  possible_conditions: string[];
  specialist_types: string[];
};

const EMERGENCY_TERMS = [
  "chest pain",
  "difficulty breathing",
  "can't breathe",
  "stroke",
  "seizure",
  "fainted",
  "passed out",
  "bleeding heavily",
  "heavy bleeding",
];

const HIGH_RISK_TERMS = ["high fever", "persistent vomiting", "severe headache", "blood pressure"];

const EMERGENCY_TIER: TierBundle = {
  urgency_level: "emergency",
  seek_care_within: "Immediately (call emergency services now).",
  urgency_reason: "Possible emergency warning signs were detected in your symptoms.",
  possible_conditions: ["Cardiovascular emergency", "Respiratory emergency", "Neurological emergency"],
  specialist_types: ["Emergency Medicine", "Cardiology", "Neurology"],
};

const HIGH_TIER: TierBundle = {
  urgency_level: "high",
  seek_care_within: "Within 4-12 hours, preferably urgent care or ER if worsening.",
  urgency_reason: "Potentially serious symptoms may need rapid in-person evaluation.",
  possible_conditions: ["Acute infection", "Migraine or neurological issue", "Metabolic issue"],
  specialist_types: ["Internal Medicine", "Emergency Medicine", "Neurology"],
};

const DEFAULT_TIER: TierBundle = {
  urgency_level: "medium",
  seek_care_within: "Within 24-48 hours if symptoms persist or worsen.",
  urgency_reason: "Symptoms appear non-emergency but should still be reviewed clinically.",
  possible_conditions: ["Viral illness", "Mild gastrointestinal issue", "Stress-related symptoms"],
  specialist_types: ["General Practitioner", "Internal Medicine"],
};

const FALLBACK_FOLLOW_UP_QUESTIONS = [
  "When did each symptom start, and has it changed over time?",
  "Do you have fever, chest pain, shortness of breath, or fainting?",
  "What medications have you taken for this and did they help?",
];

const FALLBACK_REMEDIES = [
  "Rest, hydration, and symptom monitoring.",
  "Use only previously prescribed or pharmacist-recommended over-the-counter medicine.",
  "Avoid strenuous activity until assessed if symptoms are worsening.",
];

const FALLBACK_RED_FLAGS = [
  "Severe chest pain",
  "Difficulty breathing",
  "Confusion, fainting, or seizures",
  "Uncontrolled bleeding",
];

export const FALLBACK_SAFETY_DISCLAIMER =
  "This is decision support, not a medical diagnosis. If symptoms are severe, worsening, or you feel unsafe, seek urgent in-person medical care immediately.";

const GENERAL_REPLY_EXCERPT_CHARS = 180;

function foldText(text: string): string {
  return text.toLowerCase().replace(/[‘’ʼ]/g, "'");
}

function selectTier(haystack: string): TierBundle {
  if (EMERGENCY_TERMS.some((term) => haystack.includes(term))) {
    return EMERGENCY_TIER;
  }
  if (HIGH_RISK_TERMS.some((term) => haystack.includes(term))) {
    return HIGH_TIER;
  }
  return DEFAULT_TIER;
}

/** Keyword-tier triage; a pure function of the request. */
export function assessFallbackTriage(request: Pick<TriageRequest, "message" | "symptoms">): TriageAssessment {
  const haystack = foldText([request.message, ...request.symptoms.map((symptom) => symptom.name)].join(" "));
  const tier = selectTier(haystack);

  return {
    assistant_message:
      "Thanks for sharing that. From what you described, here is what I am thinking right now. " +
      "I will keep it simple, and if your symptoms get worse I will tell you when to escalate care.",
    show_structured_output: true,
    summary: "Preliminary triage generated from your message and symptom details.",
    follow_up_questions: [...FALLBACK_FOLLOW_UP_QUESTIONS],
    possible_conditions: [...tier.possible_conditions],
    possible_remedies: [...FALLBACK_REMEDIES],
    urgency_level: tier.urgency_level,
    urgency_reason: tier.urgency_reason,
    seek_care_within: tier.seek_care_within,
    red_flags: [...FALLBACK_RED_FLAGS],
    specialist_types: [...tier.specialist_types],
    safety_disclaimer: FALLBACK_SAFETY_DISCLAIMER,
  };
}

export function buildGeneralReply(request: Pick<TriageRequest, "message">): TriageAssessment {
  const excerpt = request.message.trim().slice(0, GENERAL_REPLY_EXCERPT_CHARS);
  return {
    assistant_message:
      `I hear you. You said: '${excerpt}'. I can chat about that. ` +
      "Whenever you want, share how your body feels today and I can help with a health check-in.",
    show_structured_output: false,
    summary: `General conversational message received: '${excerpt}'.`,
    follow_up_questions: [],
    possible_conditions: [],
    possible_remedies: [],
    urgency_level: "low",
    urgency_reason: "No clear health-risk indicators were detected from this non-health message.",
    seek_care_within: "Not applicable unless you have symptoms.",
    red_flags: [],
    specialist_types: [],
    safety_disclaimer: "For urgent or severe symptoms, seek immediate in-person medical care.",
  };
}

const STORED_EMERGENCY_SYMPTOMS = new Set([
  "chest pain",
  "shortness of breath",
  "difficulty breathing",
  "seizure",
  "stroke",
]);

const STORED_HIGH_RISK_SYMPTOMS = new Set([
  "high fever",
  "persistent vomiting",
  "blood in stool",
  "severe headache",
]);

const STORED_EVIDENCE_LIMIT = 3;

export const STORED_CHAT_DISCLAIMER =
  "This output is decision support, not a diagnosis. It may be incomplete without clinical examination.";

export const STORED_CHAT_RED_FLAGS = [
  "Severe chest pain",
  "Difficulty breathing",
  "Fainting or confusion",
  "Uncontrolled bleeding",
];

type StoredUrgency = Pick<StoredChatAnalysis, "urgency_level" | "urgency_reason" | "seek_care_within">;

function classifyStoredChat(names: Set<string>, maxSeverity: number): StoredUrgency {
  const hasAny = (keywords: Set<string>) => [...names].some((name) => keywords.has(name));

  if (hasAny(STORED_EMERGENCY_SYMPTOMS) || maxSeverity >= 9) {
    return {
      urgency_level: "emergency",
      urgency_reason: "Emergency-pattern symptoms or very high severity are present.",
      seek_care_within: "Immediately. Seek emergency care now.",
    };
  }
  if (hasAny(STORED_HIGH_RISK_SYMPTOMS) || maxSeverity >= 7) {
    return {
      urgency_level: "high",
      urgency_reason: "High-risk symptom pattern or high severity suggests urgent in-person care.",
      seek_care_within: "Within 4-12 hours.",
    };
  }
  if (maxSeverity >= 4) {
    return {
      urgency_level: "medium",
      urgency_reason: "Symptoms appear moderate and should be reviewed soon.",
      seek_care_within: "Within 24-48 hours if not improving.",
    };
  }
  return {
    urgency_level: "low",
    urgency_reason: "Symptoms currently appear mild.",
    seek_care_within: "Routine care if persistent or worsening.",
  };
}

/**
 * Severity-threshold triage for a stored chat. Conditions are only listed when
 * evidence was retrieved; with no evidence the list stays empty.
 */
export function assessStoredChatFallback(
  record: StoredChatRecord,
  evidence: readonly EvidenceSource[],
  now: Date = new Date(),
): StoredChatAnalysis {
  const names = new Set(record.symptoms.map((symptom) => foldText(symptom.name).trim()));
  const maxSeverity = record.symptoms.reduce((max, symptom) => Math.max(max, symptom.severity), 0);
  const topEvidence = evidence.slice(0, STORED_EVIDENCE_LIMIT);

  const conditions: ConditionAnalysis[] =
    topEvidence.length > 0
      ? [
          {
            condition: "Possible symptom-related condition",
            confidence: 0.3,
            rationale: "Based on stored symptom profile; evidence is limited.",
            related_symptoms: record.symptoms.slice(0, 5).map((symptom) => symptom.name),
            recommended_remedies: [
              "Rest and hydration.",
              "Monitor symptom progression and severity.",
              "Use only clinician- or pharmacist-approved medication.",
            ],
            doctor_specialties: ["General Practice", "Internal Medicine"],
            evidence: topEvidence.map((item) => ({ ...item })),
          },
        ]
      : [];

  return {
    chat_number: record.chat_number,
    session_id: record.chat_id,
    analyzed_at: now.toISOString(),
    ...classifyStoredChat(names, maxSeverity),
    conditions,
    recommended_remedies: [
      "Rest, fluids, and avoid known triggers.",
      "Track symptoms over time for clinician review.",
      "Seek urgent care if red flags appear.",
    ],
    red_flags: [...STORED_CHAT_RED_FLAGS],
    disclaimer: STORED_CHAT_DISCLAIMER,
  };
}
