import { describe, it, expect } from "vitest";
import { buildReportExport, renderReportMarkdown, type ReportExport, type ReportSource } from "./report-export.js";
import { SessionState, type AnalysisResult, type SessionSnapshot } from "./types.js";

function makeSnapshot(overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    sessionId: "session-1",
    state: SessionState.IDLE,
    wordCount: 250,
    segmentCount: 12,
    durationSeconds: 125,
    wordsPerMinute: 120,
    analysisCount: 3,
    summaryCount: 0,
    hasFinalReport: true,
    endReason: "completed",
    ...overrides,
  };
}

function makeReport(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    summary: "Release planning for the next sprint",
    issues: ["No rollback plan"],
    recommendations: [],
    openQuestions: ["Who owns QA?"],
    actionItems: ["Ship on Friday"],
    error: null,
    ...overrides,
  };
}

function makeSource(report: AnalysisResult | null, snapshot = makeSnapshot()): ReportSource {
  return {
    sessionState: () => snapshot,
    sessionStartedAt: () => 0,
    finalReport: () => report,
    engineStats: () => ({
      durationMinutes: 2,
      wordCount: 250,
      segmentCount: 12,
      summaryCount: 0,
      analysisCount: 3,
      issuesIdentified: 1,
      recommendationsGiven: 0,
    }),
    transcriptText: () => "we plan the release",
  };
}

describe("buildReportExport", () => {
  it("returns null before a final report exists", () => {
    expect(buildReportExport(makeSource(null))).toBeNull();
  });

  it("returns null once the session has been cleared", () => {
    expect(buildReportExport(makeSource(makeReport(), makeSnapshot({ sessionId: null })))).toBeNull();
  });

  it("collects snapshot, stats, report and transcript", () => {
    const doc = buildReportExport(makeSource(makeReport()), new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));

    expect(doc).toEqual({
      sessionId: "session-1",
      exportedAt: "2024-01-02T03:04:05.000Z",
      startedAt: "1970-01-01T00:00:00.000Z",
      durationSeconds: 125,
      wordCount: 250,
      segmentCount: 12,
      wordsPerMinute: 120,
      stats: {
        durationMinutes: 2,
        wordCount: 250,
        segmentCount: 12,
        summaryCount: 0,
        analysisCount: 3,
        issuesIdentified: 1,
        recommendationsGiven: 0,
      },
      report: makeReport(),
      transcript: "we plan the release",
    });
  });
});

describe("renderReportMarkdown", () => {
  function makeDoc(overrides: Partial<ReportExport> = {}): ReportExport {
    const doc = buildReportExport(makeSource(makeReport()));
    if (!doc) throw new Error("expected a report");
    return { ...doc, ...overrides };
  }

  it("renders metadata and every section", () => {
    expect(renderReportMarkdown(makeDoc())).toBe(
      [
        "# Meeting Analysis Report",
        "",
        "- Session: session-1",
        "- Started: 1970-01-01T00:00:00.000Z",
        "- Duration: 2m 5s",
        "- Words: 250 (120 wpm)",
        "- Analysis passes: 3",
        "",
        "## Summary",
        "",
        "Release planning for the next sprint",
        "",
        "## Issues",
        "",
        "- No rollback plan",
        "",
        "## Recommendations",
        "",
        "_None_",
        "",
        "## Open Questions",
        "",
        "- Who owns QA?",
        "",
        "## Action Items",
        "",
        "- Ship on Friday",
        "",
      ].join("\n"),
    );
  });

  it("flags a failed final analysis and omits missing stats", () => {
    const markdown = renderReportMarkdown(
      makeDoc({
        stats: null,
        startedAt: null,
        durationSeconds: 42,
        report: makeReport({ summary: "Error: timeout", error: "timeout" }),
      }),
    );
    const lines = markdown.split("\n");

    expect(lines.slice(2, 9)).toEqual([
      "- Session: session-1",
      "- Started: unknown",
      "- Duration: 42s",
      "- Words: 250 (120 wpm)",
      "",
      "> Final analysis failed: timeout",
      "",
    ]);
  });
});
