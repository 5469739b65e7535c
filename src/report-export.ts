// Final report export: a JSON document for download and a Markdown rendering
// of the same data.

import type { AnalysisResult, EngineStats, SessionSnapshot } from "./types.js";

/** Read side of a session the export is built from. SessionManager satisfies it. */
export interface ReportSource {
  sessionState(): SessionSnapshot;
  sessionStartedAt(): number | null;
  finalReport(): AnalysisResult | null;
  engineStats(): EngineStats | null;
  transcriptText(): string;
}

export interface ReportExport {
  sessionId: string;
  exportedAt: string;
  startedAt: string | null;
  durationSeconds: number;
  wordCount: number;
  segmentCount: number;
  wordsPerMinute: number;
  stats: EngineStats | null;
  report: AnalysisResult;
  transcript: string;
}

/** Returns null until the session has a final report. */
export function buildReportExport(source: ReportSource, now: Date = new Date()): ReportExport | null {
  const snapshot = source.sessionState();
  const report = source.finalReport();
  if (!report || !snapshot.sessionId) {
    return null;
  }

  const startedAt = source.sessionStartedAt();
  return {
    sessionId: snapshot.sessionId,
    exportedAt: now.toISOString(),
    startedAt: startedAt === null ? null : new Date(startedAt).toISOString(),
    durationSeconds: snapshot.durationSeconds,
    wordCount: snapshot.wordCount,
    segmentCount: snapshot.segmentCount,
    wordsPerMinute: snapshot.wordsPerMinute,
    stats: source.engineStats(),
    report,
    transcript: source.transcriptText(),
  };
}

function formatDuration(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds % 60);
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

function renderList(heading: string, items: readonly string[]): string[] {
  const lines = [`## ${heading}`, ""];
  if (items.length === 0) {
    lines.push("_None_");
  } else {
    lines.push(...items.map((item) => `- ${item}`));
  }
  lines.push("");
  return lines;
}

export function renderReportMarkdown(doc: ReportExport): string {
  const { report } = doc;
  const lines: string[] = [
    "# Meeting Analysis Report",
    "",
    `- Session: ${doc.sessionId}`,
    `- Started: ${doc.startedAt ?? "unknown"}`,
    `- Duration: ${formatDuration(doc.durationSeconds)}`,
    `- Words: ${doc.wordCount} (${doc.wordsPerMinute} wpm)`,
  ];
  if (doc.stats) {
    lines.push(`- Analysis passes: ${doc.stats.analysisCount}`);
  }
  lines.push("");

  if (report.error !== null) {
    lines.push(`> Final analysis failed: ${report.error}`, "");
  }

  lines.push("## Summary", "", report.summary, "");
  lines.push(...renderList("Issues", report.issues));
  lines.push(...renderList("Recommendations", report.recommendations));
  lines.push(...renderList("Open Questions", report.openQuestions));
  lines.push(...renderList("Action Items", report.actionItems));

  return lines.join("\n");
}
