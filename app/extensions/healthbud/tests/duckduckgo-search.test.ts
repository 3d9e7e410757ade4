import { beforeEach, describe, expect, it, vi } from "vitest";

const { searchMock } = vi.hoisted(() => ({ searchMock: vi.fn() }));

vi.mock("duck-duck-scrape", () => ({
  default: {
    search: searchMock,
    SafeSearchType: { STRICT: 0, MODERATE: -1, OFF: -2 },
  },
}));

import { createHealthBudRuntime } from "../index.js";
import { createDuckDuckGoSearchBackend } from "../services/duckduckgo-search.js";

function createLoggerSpy() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const RESULTS = [
  {
    title: "Headaches",
    url: "https://www.nhs.uk/conditions/headaches/",
    description: "Most <b>headaches</b> go away on their own.",
    rawDescription: "Most <b>headaches</b> go away on their own.",
    hostname: "www.nhs.uk",
    icon: "",
  },
  {
    title: "Headache remedies",
    url: "https://health-tips.example.com/headache",
    description: "Try these tips.",
    rawDescription: "Try these tips.",
    hostname: "health-tips.example.com",
    icon: "",
  },
  {
    title: "Tension headache",
    url: "https://medlineplus.gov/tensionheadache.html",
    description: "A common type of headache.",
    rawDescription: "A common type of headache.",
    hostname: "medlineplus.gov",
    icon: "",
  },
];

const NO_BACKEND_WARNING =
  "[healthbud] web evidence search is enabled but no search backend is configured; stored-chat analysis runs without evidence";

beforeEach(() => {
  searchMock.mockReset();
});

describe("healthbud duckduckgo search backend", () => {
  it("searches with moderate safe search and maps results to hits", async () => {
    searchMock.mockResolvedValue({ noResults: false, vqd: "test-vqd", results: RESULTS });
    const backend = createDuckDuckGoSearchBackend();

    const hits = await backend("headache possible causes", 2);

    expect(searchMock).toHaveBeenCalledWith("headache possible causes", { safeSearch: -1 });
    expect(hits).toEqual([
      {
        title: "Headaches",
        href: "https://www.nhs.uk/conditions/headaches/",
        body: "Most headaches go away on their own.",
      },
      {
        title: "Headache remedies",
        href: "https://health-tips.example.com/headache",
        body: "Try these tips.",
      },
    ]);
  });

  it("returns no hits when the search finds nothing", async () => {
    searchMock.mockResolvedValue({ noResults: true, vqd: "test-vqd", results: [] });
    await expect(createDuckDuckGoSearchBackend()("rare symptom", 8)).resolves.toEqual([]);
  });
});

describe("healthbud runtime evidence backend", () => {
  it("searches the web by default when evidence search is enabled", async () => {
    searchMock.mockResolvedValue({ noResults: false, vqd: "test-vqd", results: RESULTS });
    const logger = createLoggerSpy();
    const runtime = createHealthBudRuntime({ config: { provider: { kind: "disabled" } }, logger });

    const evidence = await runtime.evidenceSearch.searchMedicalEvidence("headache possible causes");

    expect(searchMock).toHaveBeenCalledTimes(1);
    expect(evidence).toEqual([
      {
        title: "Headaches",
        url: "https://www.nhs.uk/conditions/headaches/",
        snippet: "Most headaches go away on their own.",
      },
      {
        title: "Tension headache",
        url: "https://medlineplus.gov/tensionheadache.html",
        snippet: "A common type of headache.",
      },
    ]);
    expect(logger.warn).not.toHaveBeenCalledWith(NO_BACKEND_WARNING);
  });

  it("attaches web evidence to a stored-chat analysis", async () => {
    searchMock.mockResolvedValue({ noResults: false, vqd: "test-vqd", results: RESULTS });
    const runtime = createHealthBudRuntime({
      config: { provider: { kind: "disabled" } },
      logger: createLoggerSpy(),
      now: () => new Date("2026-05-10T12:00:00.000Z"),
    });

    const result = await runtime.chatAnalysis.analyzeStoredChat({
      chat_number: 4,
      chat_id: "chat-4",
      message: "Headache since this morning.",
      age: 29,
      symptoms: [{ name: "headache", severity: 5 }],
    });

    expect(searchMock.mock.calls[0][0]).toBe("headache possible causes triage severity");
    expect(result.conditions).toHaveLength(1);
    expect(result.conditions[0].evidence.map((source) => source.url)).toEqual([
      "https://www.nhs.uk/conditions/headaches/",
      "https://medlineplus.gov/tensionheadache.html",
    ]);
  });

  it("warns when evidence search is enabled without a backend", () => {
    const logger = createLoggerSpy();
    createHealthBudRuntime({ config: { provider: { kind: "disabled" } }, logger, evidenceBackend: null });
    expect(logger.warn).toHaveBeenCalledWith(NO_BACKEND_WARNING);
  });

  it("builds no backend when evidence search is disabled", async () => {
    const logger = createLoggerSpy();
    const runtime = createHealthBudRuntime({
      config: { provider: { kind: "disabled" }, evidence: { enabled: false } },
      logger,
    });

    await expect(runtime.evidenceSearch.searchMedicalEvidence("headache")).resolves.toEqual([]);
    expect(searchMock).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalledWith(NO_BACKEND_WARNING);
  });
});
