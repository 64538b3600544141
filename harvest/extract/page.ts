import { load, type CheerioAPI } from "cheerio";
import { EmptyContentError, ParseError } from "../errors.js";
import type { PageRecord } from "../page.types.js";
import { assemblePage } from "./assemble.js";
import { classifyPage } from "./classify.js";
import {
  extractAppointment,
  extractBody,
  extractExternalLinks,
  extractFacultyLinks,
  extractSubsectionLinks,
} from "./fields.js";
import { locateSections } from "./locators.js";

export type PageStage = "pending" | "fetched" | "parsed" | "classified" | "assembled" | "succeeded" | "failed";

export type ExtractionOptions = {
  /** Registrable domain treated as internal for link tagging; defaults to the page host without www. */
  siteDomain?: string;
};

export type PageOutcome =
  | { ok: true; record: PageRecord; needsReview: boolean }
  | { ok: false; error: ParseError | EmptyContentError; stage: PageStage };

export function parseMarkup(url: string, html: string): CheerioAPI {
  if (!html.trim()) throw new ParseError(url, "empty markup");
  let $: CheerioAPI;
  try {
    $ = load(html);
  } catch (e) {
    throw new ParseError(url, `unparseable markup: ${(e as Error).message}`);
  }
  if ($("head *, body *").length === 0) throw new ParseError(url, "markup contains no elements");
  return $;
}

/** Parse, locate, extract, classify and assemble one already-fetched page. */
export function extractPage(url: string, html: string, opts: ExtractionOptions = {}): PageOutcome {
  let $: CheerioAPI;
  try {
    $ = parseMarkup(url, html);
  } catch (e) {
    if (e instanceof ParseError) return { ok: false, error: e, stage: "fetched" };
    throw e;
  }

  const located = locateSections($);
  const fields = {
    bodyContent: extractBody(located),
    subsectionLinks: extractSubsectionLinks($, located.subsectionAnchors, url),
    facultyLinks: extractFacultyLinks($, located.facultyAnchors, url),
    appointmentSection: extractAppointment($, located.appointment, url),
    externalLinks: extractExternalLinks($, located.externalAnchors, url, opts.siteDomain),
  };

  const classification = classifyPage({
    hasH1Title: located.title.hasH1,
    bodyNonEmpty: fields.bodyContent.wordCount > 0,
    facultyCount: fields.facultyLinks.count,
    subsectionCount: fields.subsectionLinks.count,
    appointmentPresent: fields.appointmentSection.present,
    hasSubheadings: fields.bodyContent.hasSubheadings,
    hasCollapsibleSections: fields.bodyContent.hasCollapsibleSections,
  });

  const assembled = assemblePage(url, located, fields, classification);
  if (!assembled.ok) return { ok: false, error: assembled.error, stage: "classified" };
  return { ok: true, record: assembled.record, needsReview: classification.needsReview };
}
