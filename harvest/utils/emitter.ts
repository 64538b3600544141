import { writeFileSync, mkdirSync, readdirSync, readFileSync } from "fs";
import { join } from "path";
import type { PageRecord, RunSummary } from "../page.types.js";
import { PageRecordSchema } from "../page.schema.js";
import { sanitizeFilename } from "./text.js";

export const METADATA_FILE = "metadata.json";
export const SUMMARY_CSV = "summary.csv";
export const FAILURES_FILE = "failures";

const CSV_HEADER = [
  "file_number", "url", "page_title", "has_h1", "page_type", "body_word_count",
  "faculty_link_count", "has_appointment", "has_click_button", "has_apps", "subsection_count",
];

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

export function emitNDJSON(outdir: string, name: string, rows: unknown[]) {
  ensureDir(outdir);
  writeFileSync(join(outdir, name + ".ndjson"), rows.map(r => JSON.stringify(r)).join("\n"));
}

export function emitJSON(outdir: string, file: string, data: unknown) {
  ensureDir(outdir);
  writeFileSync(join(outdir, file), JSON.stringify(data, null, 2));
}

const pad = (n: number) => String(n).padStart(2, "0");

export function runFolderName(now: Date): string {
  const d = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const t = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `output_${d}_${t}`;
}

export function recordFileName(index: number, record: PageRecord): string {
  return `${index}_${sanitizeFilename(record.pageTitle)}.json`;
}

const quote = (s: string) => `"${s.replace(/"/g, '""')}"`;

export function summaryCsv(records: readonly PageRecord[]): string {
  const rows = records.map((r, i) => {
    const appt = r.appointmentSection;
    return [
      i + 1,
      quote(r.url),
      quote(r.pageTitle),
      r.hasH1Title,
      r.pageTypeClassification,
      r.bodyContent.wordCount,
      r.facultyLinks.count,
      appt.present,
      appt.present && appt.components.clickHereLink.present,
      appt.present && appt.components.familyHifazat.mainLinkPresent,
      r.subsectionLinks.count,
    ].join(",");
  });
  return [CSV_HEADER.join(","), ...rows].join("\n") + "\n";
}

export type RunOutput = {
  records: readonly PageRecord[];
  summary: RunSummary;
  failures: unknown[];
};

/** Writes one timestamped output folder and returns its path. */
export function writeRunOutput(root: string, run: RunOutput, now = new Date()): string {
  const outdir = join(root, runFolderName(now));
  ensureDir(outdir);

  run.records.forEach((record, i) => emitJSON(outdir, recordFileName(i + 1, record), record));

  emitJSON(outdir, METADATA_FILE, {
    scrapeMetadata: {
      date: now.toISOString(),
      ...run.summary,
      outputFolder: outdir,
    },
    summary: {
      totalFiles: run.records.length,
      filePattern: "{number}_{title}.json",
    },
  });
  writeFileSync(join(outdir, SUMMARY_CSV), summaryCsv(run.records));
  emitNDJSON(outdir, FAILURES_FILE, run.failures);
  return outdir;
}

export type LoadFailure = { file: string; reason: string };

/** Reads the page records of an output folder back, validating each file. */
export function readRunOutput(folder: string): { records: PageRecord[]; failures: LoadFailure[] } {
  const records: PageRecord[] = [];
  const failures: LoadFailure[] = [];
  const files = readdirSync(folder)
    .filter(f => f.endsWith(".json") && f !== METADATA_FILE)
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));

  for (const file of files) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(join(folder, file), "utf8"));
    } catch (e) {
      failures.push({ file, reason: (e as Error).message });
      continue;
    }
    const parsed = PageRecordSchema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      const issue = parsed.error.issues[0];
      failures.push({ file, reason: issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid record" });
    }
  }
  return { records, failures };
}
