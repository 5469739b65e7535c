// Progressive Summarization Engine: turns a growing transcript into a
// continuously refined structured analysis without letting prompt size grow
// with meeting length.
//
// Per ingested segment:
//   1. Compression: every `wordsPerRollingSummary` words, the most recent raw
//      segments are condensed into a RollingSummary. Summaries are evicted
//      oldest-first so their total stays within `maxPriorSummaryWords`.
//   2. Analysis: every `wordsPerAnalysis` words, metadata + rolling summaries +
//      the latest raw segments + prior findings are sent with the analysis
//      instruction; the JSON reply is parsed into a fixed-shape AnalysisResult
//      and findings already reported recently are filtered out.
// Compression always runs before the analysis that would read its output.
//
// finalize() runs once at session end with the full (or tail-capped)
// transcript and every retained summary. Completion failures never escape:
// they become the error-shaped result.

import type {
  AnalysisConfig,
  AnalysisResult,
  EngineState,
  EngineStats,
  RollingSummary,
  TranscriptSegment,
} from "./types.js";
import type { CompletionClient } from "./completion-client.js";
import type { TranscriptLedger } from "./transcript-ledger.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import {
  ANALYSIS_KEYS,
  buildAnalysisInstruction,
  buildFinalInstruction,
  buildSummarizationInstruction,
  profileLabel,
} from "./analysis-prompts.js";
import { countWords, errorMessage } from "./utils.js";

// ─── Context bounds ─────────────────────────────────────────────────────────────

const COMPRESSION_SOURCE_SEGMENTS = 5;
const ANALYSIS_RECENT_SEGMENTS = 3;
const PRIOR_FINDINGS_IN_CONTEXT = 5;
const DEDUP_LOOKBACK = 10;

// ─── Completion budgets ─────────────────────────────────────────────────────────

const TEMPERATURE = 0.3;
const SUMMARY_MAX_TOKENS = 200;
const ANALYSIS_MAX_TOKENS = 1500;
const FINAL_MAX_TOKENS = 2500;

const DEFAULT_ANALYSIS_SUMMARY = "No discussion analyzed yet";
const DEFAULT_FINAL_SUMMARY = "No analysis available";

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  wordsPerAnalysis: 50,
  wordsPerRollingSummary: 300,
  maxPriorSummaryWords: 1000,
  finalTranscriptWordCap: 1000,
  profile: "general",
};

export interface AnalysisEngineDeps {
  logger?: Logger;
  /** Milliseconds since epoch. Defaults to Date.now. */
  clock?: () => number;
}

// ─── Result helpers ─────────────────────────────────────────────────────────────

export function errorAnalysisResult(description: string): AnalysisResult {
  return {
    summary: `Error: ${description}`,
    issues: [],
    recommendations: [],
    openQuestions: [],
    actionItems: [],
    error: description,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readList(obj: Record<string, unknown>, key: string): string[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`LLM response field '${key}' is not an array`);
  }
  return value
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Parse the raw completion into an AnalysisResult.
 *
 * Omitted fields are default-filled; a reply that is not a JSON object, that
 * carries none of the expected keys, or whose fields have the wrong type is
 * rejected with an Error.
 */
export function parseAnalysisResponse(raw: string, defaultSummary: string = DEFAULT_ANALYSIS_SUMMARY): AnalysisResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Failed to parse LLM response as JSON: ${raw.slice(0, 200)}`);
  }

  if (!isRecord(parsed)) {
    throw new Error("LLM response is not a JSON object");
  }

  const obj = parsed;
  const knownKeys: string[] = Object.values(ANALYSIS_KEYS);
  if (!knownKeys.some((key) => key in obj)) {
    throw new Error("LLM response is missing every analysis field");
  }

  const rawSummary = obj[ANALYSIS_KEYS.summary];
  let summary = defaultSummary;
  if (typeof rawSummary === "string") {
    summary = rawSummary.trim() || defaultSummary;
  } else if (rawSummary !== undefined && rawSummary !== null) {
    throw new Error(`LLM response field '${ANALYSIS_KEYS.summary}' is not a string`);
  }

  return {
    summary,
    issues: readList(obj, ANALYSIS_KEYS.issues),
    recommendations: readList(obj, ANALYSIS_KEYS.recommendations),
    openQuestions: readList(obj, ANALYSIS_KEYS.openQuestions),
    actionItems: readList(obj, ANALYSIS_KEYS.actionItems),
    error: null,
  };
}

/**
 * Case-insensitive mutual-substring check against the most recent `lookback`
 * history entries. Near-duplicates with different wording are not caught.
 */
export function isDuplicateFinding(item: string, history: readonly string[], lookback: number = DEDUP_LOOKBACK): boolean {
  const lower = item.toLowerCase();
  for (const prev of history.slice(-lookback)) {
    const prevLower = prev.toLowerCase();
    if (lower.includes(prevLower) || prevLower.includes(lower)) {
      return true;
    }
  }
  return false;
}

// ─── AnalysisEngine ─────────────────────────────────────────────────────────────

export class AnalysisEngine {
  private readonly completion: CompletionClient;
  private readonly ledger: TranscriptLedger;
  private readonly config: AnalysisConfig;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly startedAt: number;

  private engineState: EngineState = "idle";
  private totalWords = 0;
  private segmentsIngested = 0;
  private lastAnalysisWords = 0;
  private lastSummaryWords = 0;
  private summaries: RollingSummary[] = [];
  private issueHistory: string[] = [];
  private recommendationHistory: string[] = [];
  private current: AnalysisResult | null = null;
  private report: AnalysisResult | null = null;
  private lastErrorMessage: string | null = null;
  private passes = 0;

  /** Serializes completion calls: at most one pass in flight per engine. */
  private chain: Promise<void> = Promise.resolve();

  /**
   * @param ledger - Read for context building. Segments must be appended to it
   *   before they are passed to ingest().
   */
  constructor(
    completion: CompletionClient,
    ledger: TranscriptLedger,
    config: Partial<AnalysisConfig> = {},
    deps: AnalysisEngineDeps = {},
  ) {
    this.completion = completion;
    this.ledger = ledger;
    this.config = { ...DEFAULT_ANALYSIS_CONFIG, ...config };
    this.logger = deps.logger ?? createConsoleLogger("AnalysisEngine");
    this.clock = deps.clock ?? Date.now;
    this.startedAt = this.clock();

    if (this.config.wordsPerAnalysis <= 0 || this.config.wordsPerRollingSummary <= 0) {
      throw new Error("Analysis and rolling-summary word thresholds must be positive");
    }
    if (this.config.maxPriorSummaryWords <= 0 || this.config.finalTranscriptWordCap <= 0) {
      throw new Error("Summary ceiling and final transcript cap must be positive");
    }
  }

  // ── Public API ──────────────────────────────────────────────────────────────

  /**
   * Account for a new segment and run whichever passes are due.
   *
   * @returns The analysis produced by this call (error-shaped on failure), or
   *   null when no analysis pass was due or the engine is already finalized.
   */
  ingest(segment: TranscriptSegment): Promise<AnalysisResult | null> {
    return this.serialize(() => this.runIngest(segment));
  }

  /**
   * Produce the permanent final report. Waits for any pass in flight; later
   * calls return the same report.
   */
  finalize(): Promise<AnalysisResult> {
    return this.serialize(() => this.runFinalize());
  }

  get state(): EngineState {
    return this.engineState;
  }

  get currentAnalysis(): AnalysisResult | null {
    return this.current;
  }

  get finalReport(): AnalysisResult | null {
    return this.report;
  }

  /** Description of the most recent failed analysis pass, if any. */
  get lastError(): string | null {
    return this.lastErrorMessage;
  }

  get wordCount(): number {
    return this.totalWords;
  }

  get lastAnalysisWordCount(): number {
    return this.lastAnalysisWords;
  }

  get lastSummaryWordCount(): number {
    return this.lastSummaryWords;
  }

  get analysisCount(): number {
    return this.passes;
  }

  get rollingSummaries(): RollingSummary[] {
    return this.summaries.map((s) => ({ ...s }));
  }

  get previousIssues(): readonly string[] {
    return this.issueHistory.slice();
  }

  get previousRecommendations(): readonly string[] {
    return this.recommendationHistory.slice();
  }

  stats(): EngineStats {
    return {
      durationMinutes: this.elapsedMinutes(),
      wordCount: this.totalWords,
      segmentCount: this.segmentsIngested,
      summaryCount: this.summaries.length,
      analysisCount: this.passes,
      issuesIdentified: this.issueHistory.length,
      recommendationsGiven: this.recommendationHistory.length,
    };
  }

  // ── Passes ──────────────────────────────────────────────────────────────────

  private async runIngest(segment: TranscriptSegment): Promise<AnalysisResult | null> {
    if (this.report !== null) {
      this.logger.warn(`Ignoring segment ${segment.sequenceIndex}: session already finalized`);
      return null;
    }
    this.engineState = "active";

    this.totalWords += segment.wordCount;
    this.segmentsIngested++;

    if (this.totalWords - this.lastSummaryWords >= this.config.wordsPerRollingSummary) {
      await this.compress();
      this.lastSummaryWords = this.totalWords;
    }

    if (this.totalWords - this.lastAnalysisWords >= this.config.wordsPerAnalysis) {
      this.logger.info(`Analyzing discussion (${this.totalWords} total words)`);
      const result = await this.analyze();
      this.lastAnalysisWords = this.totalWords;
      return result;
    }

    return null;
  }

  private async compress(): Promise<void> {
    const recentText = this.ledger
      .recent(COMPRESSION_SOURCE_SEGMENTS)
      .map((s) => s.text)
      .join(" ");

    try {
      const raw = await this.completion.complete({
        systemInstruction: buildSummarizationInstruction(this.config.profile),
        userContent: recentText,
        responseShape: "free_text",
        maxOutputTokens: SUMMARY_MAX_TOKENS,
        temperature: TEMPERATURE,
      });
      const text = raw.trim();
      if (!text) {
        throw new Error("empty summary");
      }

      this.summaries.push({ text, wordCount: countWords(text) });
      this.evictSummaries();
      this.logger.info(`Rolling summary created (${this.summaries.length} retained)`);
    } catch (err) {
      this.logger.warn(`Rolling summary failed: ${errorMessage(err)}`);
    }
  }

  /** Drop whole summaries, oldest first, until the total fits the ceiling. */
  private evictSummaries(): void {
    let total = this.summaries.reduce((sum, s) => sum + s.wordCount, 0);
    while (total > this.config.maxPriorSummaryWords && this.summaries.length > 0) {
      const removed = this.summaries.shift();
      total -= removed?.wordCount ?? 0;
      this.logger.debug("Trimmed oldest rolling summary");
    }
  }

  private async analyze(): Promise<AnalysisResult> {
    let parsed: AnalysisResult;
    try {
      const raw = await this.completion.complete({
        systemInstruction: buildAnalysisInstruction(this.config.profile),
        userContent: this.buildAnalysisContext(),
        responseShape: "json_object",
        maxOutputTokens: ANALYSIS_MAX_TOKENS,
        temperature: TEMPERATURE,
      });
      parsed = parseAnalysisResponse(raw, DEFAULT_ANALYSIS_SUMMARY);
    } catch (err) {
      const msg = errorMessage(err);
      this.logger.error(`Analysis pass failed: ${msg}`);
      this.lastErrorMessage = msg;
      return errorAnalysisResult(msg);
    }

    const result: AnalysisResult = {
      ...parsed,
      issues: parsed.issues.filter((item) => !isDuplicateFinding(item, this.issueHistory)),
      recommendations: parsed.recommendations.filter(
        (item) => !isDuplicateFinding(item, this.recommendationHistory),
      ),
    };

    this.issueHistory.push(...result.issues);
    this.recommendationHistory.push(...result.recommendations);
    this.current = result;
    this.lastErrorMessage = null;
    this.passes++;
    return result;
  }

  private async runFinalize(): Promise<AnalysisResult> {
    if (this.report !== null) {
      return this.report;
    }

    this.engineState = "finalizing";
    this.logger.info(`Generating final report (${this.totalWords} words, ${this.summaries.length} summaries)`);

    let report: AnalysisResult;
    try {
      const raw = await this.completion.complete({
        systemInstruction: buildFinalInstruction(this.config.profile),
        userContent: this.buildFinalContext(),
        responseShape: "json_object",
        maxOutputTokens: FINAL_MAX_TOKENS,
        temperature: TEMPERATURE,
      });
      report = parseAnalysisResponse(raw, DEFAULT_FINAL_SUMMARY);
    } catch (err) {
      const msg = errorMessage(err);
      this.logger.error(`Final report failed: ${msg}`);
      report = errorAnalysisResult(msg);
    }

    this.report = report;
    this.engineState = "idle";
    return report;
  }

  // ── Context building ────────────────────────────────────────────────────────

  /** User content for an incremental analysis pass. */
  buildAnalysisContext(): string {
    const parts: string[] = [
      "MEETING METADATA:\n" +
        `- Duration: ${this.elapsedMinutes()} minutes\n` +
        `- Total words: ${this.totalWords}\n` +
        `- Type: ${profileLabel(this.config.profile)}`,
    ];

    if (this.issueHistory.length > 0) {
      parts.push(
        "\n--- PREVIOUSLY IDENTIFIED ISSUES (DON'T REPEAT) ---\n" +
          this.issueHistory.slice(-PRIOR_FINDINGS_IN_CONTEXT).map((i) => `- ${i}`).join("\n"),
      );
    }

    if (this.recommendationHistory.length > 0) {
      parts.push(
        "\n--- PREVIOUS RECOMMENDATIONS (DON'T REPEAT) ---\n" +
          this.recommendationHistory.slice(-PRIOR_FINDINGS_IN_CONTEXT).map((r) => `- ${r}`).join("\n"),
      );
    }

    if (this.summaries.length > 0) {
      parts.push("\n--- PREVIOUS DISCUSSION (SUMMARIES) ---");
      this.summaries.forEach((summary, i) => {
        parts.push(`\nPhase ${i + 1}:\n${summary.text}`);
      });
    }

    const recent = this.ledger.recent(ANALYSIS_RECENT_SEGMENTS);
    if (recent.length > 0) {
      parts.push("\n--- CURRENT DISCUSSION ---");
      parts.push(recent.map((s) => s.text).join(" "));
    }

    return parts.join("\n");
  }

  /** User content for the final report. */
  buildFinalContext(): string {
    const parts: string[] = [
      "MEETING COMPLETED - FINAL ANALYSIS\n" +
        `Duration: ${this.elapsedMinutes()} minutes\n` +
        `Total words: ${this.totalWords}`,
    ];

    if (this.summaries.length > 0) {
      parts.push("\n--- MEETING PROGRESSION ---");
      this.summaries.forEach((summary, i) => {
        parts.push(`\nPhase ${i + 1}:\n${summary.text}`);
      });
    }

    const cap = this.config.finalTranscriptWordCap;
    if (this.ledger.wordCount > cap) {
      parts.push(`\n--- RECENT TRANSCRIPT (LAST ${cap} WORDS) ---`);
      parts.push(this.ledger.lastWords(cap));
    } else {
      parts.push("\n--- FULL TRANSCRIPT ---");
      parts.push(this.ledger.fullText());
    }

    return parts.join("\n");
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private elapsedMinutes(): number {
    return Math.floor(Math.max(0, this.clock() - this.startedAt) / 60000);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    this.chain = run.then(
      () => undefined,
      (err: unknown) => {
        this.logger.error(`Summarization task failed: ${errorMessage(err)}`);
      },
    );
    return run;
  }
}
