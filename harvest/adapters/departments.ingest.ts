import { FetchError, pageErrorKind, type PageErrorKind } from "../errors.js";
import { extractPage, type ExtractionOptions, type PageOutcome, type PageStage } from "../extract/page.js";
import type { PageRecord, RunSummary } from "../page.types.js";
import type { PageFetcher } from "../utils/httpHtml.js";

export type PageFailure = {
  url: string;
  kind: PageErrorKind;
  reason: string;
  stage: PageStage;           // last stage the page reached before failing
};

export type BatchResult = {
  records: PageRecord[];
  failures: PageFailure[];
  summary: RunSummary;
  reviewUrls: string[];       // classified by fallback, worth a manual look
  cancelled: boolean;
};

export type IngestOptions = {
  fetchPage: PageFetcher;
  extraction?: ExtractionOptions;
  signal?: AbortSignal;
};

/**
 * Scrapes the given URLs one at a time. A failing page is recorded and skipped;
 * it never stops the batch, whatever it throws. Aborting the signal stops before the next URL.
 */
export async function ingestDepartments(urls: readonly string[], opts: IngestOptions): Promise<BatchResult> {
  const records: PageRecord[] = [];
  const failures: PageFailure[] = [];
  const reviewUrls: string[] = [];
  let cancelled = false;

  for (const [idx, url] of urls.entries()) {
    if (opts.signal?.aborted) {
      cancelled = true;
      console.warn(`WARN batch cancelled with ${urls.length - idx} page(s) left`);
      break;
    }
    console.log(`[${idx + 1}/${urls.length}] ${url}`);

    let html: string;
    try {
      html = await opts.fetchPage(url);
    } catch (e) {
      const err = e instanceof FetchError ? e : new FetchError(url, (e as Error).message);
      failures.push({ url, kind: "FetchError", reason: err.message, stage: "pending" });
      console.warn(`WARN fetch failed for ${url}: ${err.message}`);
      continue;
    }

    let outcome: PageOutcome;
    try {
      outcome = extractPage(url, html, opts.extraction);
    } catch (e) {
      const reason = `unexpected extraction error: ${e instanceof Error ? e.message : String(e)}`;
      failures.push({ url, kind: "ParseError", reason, stage: "fetched" });
      console.warn(`WARN ParseError for ${url}: ${reason}`);
      continue;
    }
    if (!outcome.ok) {
      failures.push({ url, kind: pageErrorKind(outcome.error), reason: outcome.error.message, stage: outcome.stage });
      console.warn(`WARN ${pageErrorKind(outcome.error)} for ${url}: ${outcome.error.message}`);
      continue;
    }

    const { record } = outcome;
    records.push(record);
    if (outcome.needsReview) {
      reviewUrls.push(url);
      console.warn(`WARN no page type rule matched ${url}; classified as standard, flagged for review`);
    }
    console.log(
      `  type=${record.pageTypeClassification} faculty=${record.facultyLinks.count} appointment=${record.appointmentSection.present}`,
    );
  }

  return {
    records,
    failures,
    summary: {
      totalPages: urls.length,
      pagesScraped: records.length,
      pagesFailed: failures.length,
      failedUrls: failures.map(f => f.url),
    },
    reviewUrls,
    cancelled,
  };
}
