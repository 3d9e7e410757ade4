import type { ConversationTurn, TriageRequest } from "../types/triage.js";

const HEALTH_TERMS = [
  "pain",
  "fever",
  "cough",
  "vomit",
  "nausea",
  "headache",
  "dizzy",
  "breath",
  "chest",
  "doctor",
  "symptom",
  "sick",
  "ill",
] as const;

// Plain substring match, so "ill" also fires inside "still" or "will".
export function isHealthRelated(
  request: Pick<TriageRequest, "message" | "symptoms">,
  history: readonly ConversationTurn[] = [],
): boolean {
  if (request.symptoms.length > 0) {
    return true;
  }
  const historyText = history.map((turn) => turn.user_message.toLowerCase()).join(" ");
  const combined = `${request.message.toLowerCase()} ${historyText}`.trim();
  return HEALTH_TERMS.some((term) => combined.includes(term));
}
