import { existsSync, mkdirSync, renameSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { CrawlReport, ReportSummary, ShopRecord } from "../types.js";

export function summarize(records: ShopRecord[], durationMs: number): ReportSummary {
  const summary: ReportSummary = {
    total: records.length,
    online: 0,
    offline: 0,
    unknown: 0,
    failed: 0,
    notAttempted: 0,
    durationMs,
  };
  for (const record of records) {
    summary[record.status] += 1;
    const kind = record.error?.kind;
    if (kind === "NotAttempted") {
      summary.notAttempted += 1;
    } else if (kind !== undefined && kind !== "ExtractionTimeout") {
      summary.failed += 1;
    }
  }
  return summary;
}

export function buildReport(records: ShopRecord[], startedAt: number, finishedAt: number = Date.now()): CrawlReport {
  return {
    generatedAt: new Date(finishedAt).toISOString(),
    summary: summarize(records, finishedAt - startedAt),
    shops: records,
  };
}

export function serializeReport(report: CrawlReport): string {
  return JSON.stringify(report, null, 2) + "\n";
}

/** Write via a temp file and rename so readers never see a half-written report. */
export function writeReport(path: string, report: CrawlReport): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  writeFileSync(tmp, serializeReport(report), "utf-8");
  renameSync(tmp, path);
}
