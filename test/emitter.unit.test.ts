import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it } from "vitest";
import { extractPage } from "../harvest/extract/page.js";
import type { PageRecord } from "../harvest/page.types.js";
import { buildReport } from "../harvest/report.js";
import { readRunOutput, recordFileName, runFolderName, summaryCsv, writeRunOutput } from "../harvest/utils/emitter.js";
import { fixture } from "./helpers.js";

function record(url: string, file: string): PageRecord {
  const outcome = extractPage(url, fixture(file));
  if (!outcome.ok) throw outcome.error;
  return outcome.record;
}

const cardiology = record("https://hospitals.aku.edu/karachi/cardiology", "standard.html");
const overview = record("https://hospitals.aku.edu/karachi/health-services", "parent-overview.html");
const transplant = record("https://hospitals.aku.edu/karachi/kidney-transplant", "service-complex.html");

const CSV_HEADER =
  "file_number,url,page_title,has_h1,page_type,body_word_count,faculty_link_count,has_appointment,has_click_button,has_apps,subsection_count";

describe("file naming", () => {
  it("stamps the run folder with local date and time", () => {
    expect(runFolderName(new Date(2026, 9, 19, 13, 5, 9))).toBe("output_2026-10-19_130509");
  });

  it("numbers record files and sanitizes the title", () => {
    expect(recordFileName(3, { ...cardiology, pageTitle: "Heart: Adult/Child" })).toBe("3_Heart_AdultChild.json");
  });
});

describe("summaryCsv", () => {
  it("writes one row per record", () => {
    expect(summaryCsv([cardiology, overview]).split("\n")).toEqual([
      CSV_HEADER,
      `1,"https://hospitals.aku.edu/karachi/cardiology","Cardiology",true,standard,59,1,true,true,true,0`,
      `2,"https://hospitals.aku.edu/karachi/health-services","Health Services",true,parent_overview,10,0,false,false,false,3`,
      "",
    ]);
  });

  it("doubles embedded quotes", () => {
    const row = summaryCsv([{ ...cardiology, pageTitle: 'Say "hi"' }]).split("\n")[1];
    expect(row).toBe(`1,"https://hospitals.aku.edu/karachi/cardiology","Say ""hi""",true,standard,59,1,true,true,true,0`);
  });
});

describe("run output folder", () => {
  let root = "";

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
  });

  it("writes records, metadata, csv and failures, then reads the records back", () => {
    root = mkdtempSync(join(tmpdir(), "harvest-"));
    const now = new Date(2026, 9, 19, 13, 5, 9);
    const failure = { url: "https://hospitals.aku.edu/karachi/gone", kind: "FetchError", reason: "GET -> 404", stage: "pending" };

    const outdir = writeRunOutput(root, {
      records: [cardiology, overview],
      summary: { totalPages: 3, pagesScraped: 2, pagesFailed: 1, failedUrls: [failure.url] },
      failures: [failure],
    }, now);

    expect(outdir).toBe(join(root, "output_2026-10-19_130509"));
    expect(readdirSync(outdir).sort()).toEqual([
      "1_Cardiology.json",
      "2_Health_Services.json",
      "failures.ndjson",
      "metadata.json",
      "summary.csv",
    ]);

    const metadata = JSON.parse(readFileSync(join(outdir, "metadata.json"), "utf8"));
    expect(metadata).toEqual({
      scrapeMetadata: {
        date: now.toISOString(),
        totalPages: 3,
        pagesScraped: 2,
        pagesFailed: 1,
        failedUrls: [failure.url],
        outputFolder: outdir,
      },
      summary: { totalFiles: 2, filePattern: "{number}_{title}.json" },
    });
    expect(readFileSync(join(outdir, "failures.ndjson"), "utf8")).toBe(JSON.stringify(failure));

    const loaded = readRunOutput(outdir);
    expect(loaded.failures).toEqual([]);
    expect(loaded.records).toEqual([cardiology, overview]);
  });

  it("reports files that are not valid page records", () => {
    root = mkdtempSync(join(tmpdir(), "harvest-"));
    writeFileSync(join(root, "1_Cardiology.json"), JSON.stringify(cardiology));
    writeFileSync(join(root, "2_Broken.json"), "{ not json");
    writeFileSync(join(root, "10_Empty.json"), JSON.stringify({ ...cardiology, pageTypeClassification: "landing" }));

    const loaded = readRunOutput(root);
    expect(loaded.records).toHaveLength(1);
    expect(loaded.failures.map(f => f.file)).toEqual(["2_Broken.json", "10_Empty.json"]);
    expect(loaded.failures[1]?.reason).toMatch(/^pageTypeClassification: /);
  });
});

describe("buildReport", () => {
  it("summarizes page types, coverage and length", () => {
    expect(buildReport([cardiology, overview, transplant], 2)).toEqual({
      recordCount: 3,
      invalidFiles: 2,
      pageTypes: {
        standard: 1,
        simple: 0,
        parent_overview: 1,
        multi_specialty: 0,
        structured: 0,
        service_complex: 1,
      },
      pctWithAppointment: 33.3,
      pctWithH1: 66.7,
      avgWordCount: 26,
    });
  });

  it("handles an empty folder", () => {
    expect(buildReport([])).toMatchObject({ recordCount: 0, pctWithAppointment: 0, avgWordCount: 0 });
  });
});
