import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  AnalysisEngine,
  errorAnalysisResult,
  isDuplicateFinding,
  parseAnalysisResponse,
} from "./analysis-engine.js";
import type { CompletionClient, CompletionRequest } from "./completion-client.js";
import { TranscriptLedger } from "./transcript-ledger.js";
import type { AnalysisConfig } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const SUMMARY_TEXT = "Team discussed the rollout plan.";

const VALID_ANALYSIS = JSON.stringify({
  technical_analysis: "Discussing the payment service rollout",
  potential_issues: ["No rollback plan"],
  recommendations: ["Add a canary stage"],
  clarifying_questions: ["Who owns the migration?"],
  action_items: ["Dana drafts the runbook by Friday"],
});

type Handler = (request: CompletionRequest) => string | Promise<string>;

function defaultHandler(request: CompletionRequest): string {
  return request.responseShape === "free_text" ? SUMMARY_TEXT : VALID_ANALYSIS;
}

/** Fake completion client; the handler can be swapped mid-test. */
function createFakeCompletion(initial: Handler = defaultHandler) {
  const requests: CompletionRequest[] = [];
  let handler = initial;
  const client: CompletionClient = {
    complete: vi.fn(async (request: CompletionRequest) => {
      requests.push(request);
      return handler(request);
    }),
  };
  return {
    client,
    requests,
    setHandler(next: Handler) {
      handler = next;
    },
  };
}

/** `count` distinct words sharing a prefix, e.g. "a0 a1 a2". */
function makeText(count: number, prefix: string): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(" ");
}

interface Harness {
  engine: AnalysisEngine;
  ledger: TranscriptLedger;
  fake: ReturnType<typeof createFakeCompletion>;
  logger: ReturnType<typeof createSilentLogger>;
  feed(text: string): ReturnType<AnalysisEngine["ingest"]>;
  setNow(ms: number): void;
}

function createHarness(config: Partial<AnalysisConfig> = {}, handler?: Handler): Harness {
  const ledger = new TranscriptLedger();
  const fake = createFakeCompletion(handler);
  const logger = createSilentLogger();
  let now = 0;
  const engine = new AnalysisEngine(fake.client, ledger, config, { logger, clock: () => now });
  let sequence = 0;
  return {
    engine,
    ledger,
    fake,
    logger,
    feed(text: string) {
      const segment = ledger.append(sequence++, text);
      return engine.ingest(segment);
    },
    setNow(ms: number) {
      now = ms;
    },
  };
}

// ─── Thresholds ─────────────────────────────────────────────────────────────────

describe("AnalysisEngine thresholds", () => {
  it("runs no analysis pass while the transcript stays below the threshold", async () => {
    const h = createHarness();
    const wordCounts = [5, 5, 5, 5, 5, 5, 5, 5, 5, 4];

    for (const [i, count] of wordCounts.entries()) {
      expect(await h.feed(makeText(count, `s${i}w`))).toBeNull();
    }

    expect(h.ledger.segmentCount).toBe(10);
    expect(h.engine.wordCount).toBe(49);
    expect(h.engine.analysisCount).toBe(0);
    expect(h.fake.client.complete).not.toHaveBeenCalled();
  });

  it("triggers analysis on the segment that reaches the threshold", async () => {
    const h = createHarness();
    const wordCounts = [8, 8, 8, 8, 8, 5, 5];
    const results = [];
    for (const [i, count] of wordCounts.entries()) {
      results.push(await h.feed(makeText(count, `s${i}w`)));
    }

    expect(results.slice(0, 6).every((r) => r === null)).toBe(true);
    expect(results[6]).not.toBeNull();
    expect(results[6]!.error).toBeNull();
    expect(h.engine.lastAnalysisWordCount).toBe(50);
    expect(h.fake.requests).toHaveLength(1);
    expect(h.fake.requests[0].responseShape).toBe("json_object");
    expect(h.fake.requests[0].maxOutputTokens).toBe(1500);
    expect(h.fake.requests[0].temperature).toBe(0.3);
  });

  it("measures the next analysis from the last one", async () => {
    const h = createHarness({ wordsPerAnalysis: 10 });
    expect(await h.feed(makeText(12, "a"))).not.toBeNull();
    expect(await h.feed(makeText(9, "b"))).toBeNull();
    expect(await h.feed(makeText(1, "c"))).not.toBeNull();
    expect(h.engine.lastAnalysisWordCount).toBe(22);
  });

  it("rejects non-positive thresholds", () => {
    const ledger = new TranscriptLedger();
    const { client } = createFakeCompletion();
    expect(() => new AnalysisEngine(client, ledger, { wordsPerAnalysis: 0 })).toThrow(/thresholds must be positive/);
  });
});

// ─── Analysis results ───────────────────────────────────────────────────────────

describe("AnalysisEngine analysis pass", () => {
  it("maps the JSON reply onto the fixed result shape", async () => {
    const h = createHarness({ wordsPerAnalysis: 5 });
    const result = await h.feed(makeText(5, "a"));

    expect(result).toEqual({
      summary: "Discussing the payment service rollout",
      issues: ["No rollback plan"],
      recommendations: ["Add a canary stage"],
      openQuestions: ["Who owns the migration?"],
      actionItems: ["Dana drafts the runbook by Friday"],
      error: null,
    });
    expect(h.engine.currentAnalysis).toEqual(result);
    expect(h.engine.state).toBe("active");
  });

  it("returns the error-shaped result for a malformed reply and recovers on the next pass", async () => {
    const h = createHarness({}, (req) => (req.responseShape === "json_object" ? "this is not json" : SUMMARY_TEXT));
    const wordCounts = [8, 8, 8, 8, 8, 5, 5];
    let result = null;
    for (const [i, count] of wordCounts.entries()) {
      result = await h.feed(makeText(count, `s${i}w`));
    }

    expect(result).toEqual({
      summary: "Error: Failed to parse LLM response as JSON: this is not json",
      issues: [],
      recommendations: [],
      openQuestions: [],
      actionItems: [],
      error: "Failed to parse LLM response as JSON: this is not json",
    });
    expect(h.engine.currentAnalysis).toBeNull();
    expect(h.engine.lastError).toBe("Failed to parse LLM response as JSON: this is not json");
    expect(h.engine.wordCount).toBe(50);
    expect(h.ledger.wordCount).toBe(50);
    expect(h.ledger.segmentCount).toBe(7);

    h.fake.setHandler(defaultHandler);
    const next = await h.feed(makeText(50, "n"));

    expect(next!.error).toBeNull();
    expect(h.engine.currentAnalysis).toEqual(next);
    expect(h.engine.lastError).toBeNull();
    expect(h.engine.wordCount).toBe(100);
  });

  it("keeps the previous current analysis when a later pass fails", async () => {
    const h = createHarness({ wordsPerAnalysis: 5 });
    const first = await h.feed(makeText(5, "a"));

    h.fake.setHandler(() => {
      throw new Error("503 upstream unavailable");
    });
    const failed = await h.feed(makeText(5, "b"));

    expect(failed!.summary).toBe("Error: 503 upstream unavailable");
    expect(h.engine.currentAnalysis).toEqual(first);
    expect(h.engine.analysisCount).toBe(1);
  });

  it("suppresses findings already reported", async () => {
    const h = createHarness({ wordsPerAnalysis: 5 });
    await h.feed(makeText(5, "a"));

    h.fake.setHandler(() =>
      JSON.stringify({
        technical_analysis: "Still on the rollout",
        potential_issues: ["NO ROLLBACK PLAN", "No rollback plan for payments", "Certificates expire next week"],
        recommendations: ["Add a canary stage"],
      }),
    );
    const second = await h.feed(makeText(5, "b"));

    expect(second!.issues).toEqual(["Certificates expire next week"]);
    expect(second!.recommendations).toEqual([]);
    expect(h.engine.previousIssues).toEqual(["No rollback plan", "Certificates expire next week"]);
    expect(h.engine.previousRecommendations).toEqual(["Add a canary stage"]);
  });
});

// ─── Context building ───────────────────────────────────────────────────────────

describe("AnalysisEngine context", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  it("sends metadata and the most recent segments", async () => {
    await h.feed(makeText(20, "a"));
    await h.feed(makeText(20, "b"));
    h.setNow(3 * 60_000);
    await h.feed(makeText(10, "c"));

    expect(h.fake.requests[0].userContent).toBe(
      "MEETING METADATA:\n- Duration: 3 minutes\n- Total words: 50\n- Type: General Meeting\n" +
        "\n--- CURRENT DISCUSSION ---\n" +
        `${makeText(20, "a")} ${makeText(20, "b")} ${makeText(10, "c")}`,
    );
  });

  it("lists prior findings and limits raw text to the last three segments", async () => {
    await h.feed(makeText(20, "a"));
    await h.feed(makeText(20, "b"));
    await h.feed(makeText(10, "c"));
    await h.feed(makeText(50, "d"));

    const context = h.fake.requests[1].userContent;
    expect(context).toContain("--- PREVIOUSLY IDENTIFIED ISSUES (DON'T REPEAT) ---\n- No rollback plan");
    expect(context).toContain("--- PREVIOUS RECOMMENDATIONS (DON'T REPEAT) ---\n- Add a canary stage");
    expect(context.endsWith(`${makeText(20, "b")} ${makeText(10, "c")} ${makeText(50, "d")}`)).toBe(true);
    expect(context).not.toContain("a0 a1");
  });

  it("uses the technical profile label and persona", async () => {
    const tech = createHarness({ profile: "technical", wordsPerAnalysis: 5 });
    await tech.feed(makeText(5, "a"));

    expect(tech.fake.requests[0].userContent).toContain("- Type: IT Technical Discussion");
    expect(tech.fake.requests[0].systemInstruction).toContain("IT consultant");
  });
});

// ─── Compression ────────────────────────────────────────────────────────────────

describe("AnalysisEngine compression", () => {
  it("summarizes recent segments and evicts the oldest summaries past the ceiling", async () => {
    let n = 0;
    const h = createHarness(
      { wordsPerRollingSummary: 20, wordsPerAnalysis: 1000, maxPriorSummaryWords: 12 },
      () => `summary ${++n} alpha beta gamma`,
    );

    await h.feed(makeText(20, "a"));
    await h.feed(makeText(20, "b"));
    await h.feed(makeText(20, "c"));

    expect(h.engine.rollingSummaries).toEqual([
      { text: "summary 2 alpha beta gamma", wordCount: 5 },
      { text: "summary 3 alpha beta gamma", wordCount: 5 },
    ]);
    expect(h.engine.lastSummaryWordCount).toBe(60);

    const first = h.fake.requests[0];
    expect(first.responseShape).toBe("free_text");
    expect(first.maxOutputTokens).toBe(200);
    expect(first.temperature).toBe(0.3);
    expect(first.userContent).toBe(makeText(20, "a"));
    expect(h.fake.requests[2].userContent).toBe(`${makeText(20, "a")} ${makeText(20, "b")} ${makeText(20, "c")}`);
  });

  it("compresses at most the five most recent segments", async () => {
    const h = createHarness({ wordsPerRollingSummary: 12, wordsPerAnalysis: 1000 });
    for (const prefix of ["a", "b", "c", "d", "e", "f"]) {
      await h.feed(makeText(2, prefix));
    }

    expect(h.fake.requests).toHaveLength(1);
    expect(h.fake.requests[0].userContent).toBe("b0 b1 c0 c1 d0 d1 e0 e1 f0 f1");
  });

  it("runs compression before the analysis that reads it", async () => {
    const h = createHarness({ wordsPerRollingSummary: 50, wordsPerAnalysis: 50 });
    await h.feed(makeText(50, "a"));

    expect(h.fake.requests.map((r) => r.responseShape)).toEqual(["free_text", "json_object"]);
    expect(h.fake.requests[1].userContent).toContain(
      `--- PREVIOUS DISCUSSION (SUMMARIES) ---\n\nPhase 1:\n${SUMMARY_TEXT}`,
    );
  });

  it("advances the summary mark even when compression fails", async () => {
    const h = createHarness({ wordsPerRollingSummary: 10, wordsPerAnalysis: 10 }, (req) => {
      if (req.responseShape === "free_text") throw new Error("timeout");
      return VALID_ANALYSIS;
    });

    const result = await h.feed(makeText(10, "a"));

    expect(h.engine.rollingSummaries).toEqual([]);
    expect(h.engine.lastSummaryWordCount).toBe(10);
    expect(result!.error).toBeNull();
    expect(h.logger.warn).toHaveBeenCalledWith("Rolling summary failed: timeout");
  });
});

// ─── Finalize ───────────────────────────────────────────────────────────────────

describe("AnalysisEngine finalize", () => {
  it("sends the full transcript with the final instruction", async () => {
    const h = createHarness();
    await h.feed(makeText(4, "a"));
    await h.feed(makeText(6, "b"));

    const report = await h.engine.finalize();

    const request = h.fake.requests[0];
    expect(request.systemInstruction).toContain("## This Is The Final Report");
    expect(request.responseShape).toBe("json_object");
    expect(request.maxOutputTokens).toBe(2500);
    expect(request.userContent).toBe(
      "MEETING COMPLETED - FINAL ANALYSIS\nDuration: 0 minutes\nTotal words: 10\n" +
        "\n--- FULL TRANSCRIPT ---\n" +
        `${makeText(4, "a")} ${makeText(6, "b")}`,
    );
    expect(report.error).toBeNull();
    expect(h.engine.finalReport).toBe(report);
    expect(h.engine.state).toBe("idle");
  });

  it("caps the raw transcript to the most recent words", async () => {
    const h = createHarness({ finalTranscriptWordCap: 5, wordsPerAnalysis: 1000 });
    await h.feed(makeText(10, "f"));
    await h.engine.finalize();

    expect(h.fake.requests[0].userContent.endsWith("--- RECENT TRANSCRIPT (LAST 5 WORDS) ---\nf5 f6 f7 f8 f9")).toBe(true);
  });

  it("includes every retained summary as a meeting phase", async () => {
    const h = createHarness({ wordsPerRollingSummary: 10, wordsPerAnalysis: 1000 });
    await h.feed(makeText(10, "a"));
    await h.engine.finalize();

    const finalRequest = h.fake.requests[1];
    expect(finalRequest.userContent).toContain(`--- MEETING PROGRESSION ---\n\nPhase 1:\n${SUMMARY_TEXT}`);
  });

  it("is idempotent", async () => {
    const h = createHarness();
    await h.feed(makeText(3, "a"));
    const first = await h.engine.finalize();
    const second = await h.engine.finalize();

    expect(second).toBe(first);
    expect(h.fake.client.complete).toHaveBeenCalledTimes(1);
  });

  it("falls back to the error-shaped report when the call fails", async () => {
    const h = createHarness({}, () => {
      throw new Error("timeout");
    });
    await h.feed(makeText(3, "a"));

    expect(await h.engine.finalize()).toEqual(errorAnalysisResult("timeout"));
    expect(h.engine.finalReport).toEqual(errorAnalysisResult("timeout"));
  });

  it("ignores segments ingested after finalization", async () => {
    const h = createHarness({ wordsPerAnalysis: 1 });
    await h.engine.finalize();
    const callsBefore = h.fake.requests.length;

    expect(await h.feed("late words")).toBeNull();
    expect(h.engine.wordCount).toBe(0);
    expect(h.fake.requests).toHaveLength(callsBefore);
    expect(h.logger.warn).toHaveBeenCalledWith("Ignoring segment 0: session already finalized");
  });
});

// ─── Single-flight ──────────────────────────────────────────────────────────────

describe("AnalysisEngine single-flight", () => {
  it("never has two completion calls in flight", async () => {
    let active = 0;
    let maxActive = 0;
    const gates: Array<() => void> = [];
    const h = createHarness({ wordsPerAnalysis: 5 }, () => {
      active++;
      maxActive = Math.max(maxActive, active);
      return new Promise<string>((resolve) => {
        gates.push(() => {
          active--;
          resolve(VALID_ANALYSIS);
        });
      });
    });

    const first = h.feed(makeText(5, "a"));
    const second = h.feed(makeText(5, "b"));

    await vi.waitFor(() => expect(gates).toHaveLength(1));
    gates[0]();
    await first;
    await vi.waitFor(() => expect(gates).toHaveLength(2));
    gates[1]();
    await second;

    expect(maxActive).toBe(1);
    expect(h.engine.analysisCount).toBe(2);
  });
});

// ─── Stats ──────────────────────────────────────────────────────────────────────

describe("AnalysisEngine stats", () => {
  it("reports session counters", async () => {
    const h = createHarness();
    for (const [i, count] of [8, 8, 8, 8, 8, 5, 5].entries()) {
      await h.feed(makeText(count, `s${i}w`));
    }
    h.setNow(2 * 60_000 + 30_000);

    expect(h.engine.stats()).toEqual({
      durationMinutes: 2,
      wordCount: 50,
      segmentCount: 7,
      summaryCount: 0,
      analysisCount: 1,
      issuesIdentified: 1,
      recommendationsGiven: 1,
    });
  });
});

// ─── Parsing and dedup helpers ──────────────────────────────────────────────────

describe("parseAnalysisResponse", () => {
  it("default-fills omitted keys", () => {
    expect(parseAnalysisResponse('{"potential_issues":["Disk is almost full"]}')).toEqual({
      summary: "No discussion analyzed yet",
      issues: ["Disk is almost full"],
      recommendations: [],
      openQuestions: [],
      actionItems: [],
      error: null,
    });
  });

  it("uses the supplied default summary for a blank one", () => {
    expect(parseAnalysisResponse('{"technical_analysis":"   "}', "No analysis available").summary).toBe(
      "No analysis available",
    );
  });

  it("drops blank and non-string list entries", () => {
    const result = parseAnalysisResponse('{"action_items":["  ", 3, " Ship it ", null]}');
    expect(result.actionItems).toEqual(["Ship it"]);
  });

  it("rejects a reply that is not an object", () => {
    expect(() => parseAnalysisResponse('["a"]')).toThrow("LLM response is not a JSON object");
  });

  it("rejects an object without any analysis field", () => {
    expect(() => parseAnalysisResponse('{"answer":"hi"}')).toThrow("LLM response is missing every analysis field");
  });

  it("rejects fields of the wrong type", () => {
    expect(() => parseAnalysisResponse('{"potential_issues":"one"}')).toThrow(
      "LLM response field 'potential_issues' is not an array",
    );
    expect(() => parseAnalysisResponse('{"technical_analysis":5}')).toThrow(
      "LLM response field 'technical_analysis' is not a string",
    );
  });
});

describe("isDuplicateFinding", () => {
  it("matches case-insensitive substrings in both directions", () => {
    expect(isDuplicateFinding("No Rollback Plan", ["no rollback plan"])).toBe(true);
    expect(isDuplicateFinding("rollback", ["No rollback plan"])).toBe(true);
    expect(isDuplicateFinding("Missing rollback plan for payments", ["rollback plan"])).toBe(true);
    expect(isDuplicateFinding("Add monitoring", ["No rollback plan"])).toBe(false);
  });

  it("only looks at the last ten entries", () => {
    const history = ["alpha", ...Array.from({ length: 10 }, (_, i) => `entry ${i}`)];
    expect(isDuplicateFinding("alpha", history)).toBe(false);
    expect(isDuplicateFinding("alpha", history.slice(1).concat("alpha"))).toBe(true);
  });
});
