import type { EvidenceSource } from "../types/triage.js";
import type { TriageLogger } from "./logger.js";
import { describeError } from "./provider-errors.js";

export type RawSearchHit = {
  title?: string | null;
  href?: string | null;
  body?: string | null;
};

/** Search backend adapter, e.g. a web-search API client owned by the host. */
export type EvidenceSearchBackend = (query: string, maxResults: number) => Promise<RawSearchHit[]>;

export type EvidenceSearchService = {
  searchMedicalEvidence: (query: string) => Promise<EvidenceSource[]>;
};

export type EvidenceSearchParams = {
  enabled: boolean;
  maxResults: number;
  trustedDomains: readonly string[];
  search?: EvidenceSearchBackend | null;
  logger: TriageLogger;
};

function toTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return null;
  }
}

export function isTrustedMedicalUrl(url: string, trustedDomains: readonly string[]): boolean {
  const host = hostOf(url);
  if (!host) {
    return false;
  }
  return trustedDomains.some((domain) => {
    const normalized = domain.trim().toLowerCase();
    return Boolean(normalized) && (host === normalized || host.endsWith(`.${normalized}`));
  });
}

export function buildEvidenceQuery(symptomNames: readonly string[]): string | null {
  const names = symptomNames.map((name) => name.trim()).filter(Boolean);
  if (names.length === 0) {
    return null;
  }
  return `${names.slice(0, 4).join(" ")} possible causes triage severity`;
}

export function createEvidenceSearchService(params: EvidenceSearchParams): EvidenceSearchService {
  const { search, logger } = params;
  return {
    async searchMedicalEvidence(query) {
      if (!params.enabled || !search || !query.trim()) {
        return [];
      }

      let hits: RawSearchHit[];
      try {
        hits = await search(query, params.maxResults);
      } catch (error) {
        logger.warn(`[healthbud] evidence search failed; continuing without evidence: ${describeError(error)}`);
        return [];
      }

      const evidence: EvidenceSource[] = [];
      for (const hit of hits) {
        const url = toTrimmedString(hit.href);
        if (!url || !isTrustedMedicalUrl(url, params.trustedDomains)) {
          continue;
        }
        const title = toTrimmedString(hit.title);
        if (!title) {
          continue;
        }
        evidence.push({ title, url, snippet: toTrimmedString(hit.body) });
        if (evidence.length >= params.maxResults) {
          break;
        }
      }
      return evidence;
    },
  };
}
