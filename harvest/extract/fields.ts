import type { CheerioAPI } from "cheerio";
import { isTag, type Element } from "domhandler";
import type {
  AppointmentSection,
  BodyContent,
  ExternalLink,
  FacultyLink,
  FacultyLinkGroup,
  FacultyPattern,
  Link,
  LinkGroup,
  LinkType,
  SubheadingTag,
} from "../page.types.js";
import { countWords, normalizeText } from "../utils/text.js";
import {
  absolutize,
  hasDocumentExtension,
  hostOf,
  isSameSite,
  normalizeUrl,
  queryParam,
  siteDomainOf,
  uniqueBy,
} from "../utils/url.js";
import { hrefOf, isNavigableHref, textOf } from "./dom.js";
import { APPOINTMENT_PHRASES, type AppointmentRegion } from "./locators.js";

export type BodySignals = {
  paragraphs: readonly string[];
  subheadingTags: readonly SubheadingTag[];
  hasBulletLists: boolean;
  hasCollapsibleSections: boolean;
};

export function extractBody(s: BodySignals): BodyContent {
  const mainParagraphs = s.paragraphs.map(p => normalizeText(p)).filter(Boolean).join("\n\n");
  return {
    mainParagraphs,
    wordCount: countWords(mainParagraphs),
    hasSubheadings: s.subheadingTags.length > 0,
    subheadingTags: [...s.subheadingTags],
    hasBulletLists: s.hasBulletLists,
    hasCollapsibleSections: s.hasCollapsibleSections,
  };
}

export function dedupeLinks<T extends Link>(links: readonly T[]): T[] {
  return uniqueBy(links, l => normalizeUrl(l.url));
}

function toLink($: CheerioAPI, a: Element, pageUrl: string): Link {
  return { text: textOf(a), url: absolutize(hrefOf($, a), pageUrl) };
}

export function extractSubsectionLinks($: CheerioAPI, anchors: readonly Element[], pageUrl: string): LinkGroup {
  const links = dedupeLinks(anchors.map(a => toLink($, a, pageUrl)));
  return { present: links.length > 0, count: links.length, links };
}

export function facultyPattern(count: number): FacultyPattern {
  if (count <= 0) return "none";
  return count === 1 ? "single" : "multiple";
}

const SPECIALTY_PARAM = /^spec(ialty|iality)?$/i;
const MEET_OUR = /\bmeet our\s+(.+?)\s+(faculty|doctors?|specialists?|consultants?|physicians?|surgeons?|team)\b/i;
const HEADING_TAGS = new Set(["h2", "h3", "h4", "h5", "h6"]);
const EMPHASIS_TAGS = new Set(["strong", "b"]);

function previousHeading(el: Element): Element | undefined {
  let sib = el.prev;
  while (sib) {
    if (isTag(sib)) return HEADING_TAGS.has(sib.name) ? sib : undefined;
    sib = sib.prev;
  }
  return undefined;
}

/**
 * Best-effort specialty for a faculty link: the `Spec` query parameter,
 * then "Meet our <specialty> faculty" wording, then the surrounding heading.
 */
export function inferSpecialty(a: Element, url: string): string {
  const fromUrl = queryParam(url, SPECIALTY_PARAM);
  if (fromUrl) return normalizeText(fromUrl);

  const text = textOf(a);
  const meet = text.match(MEET_OUR);
  if (meet?.[1]) return normalizeText(meet[1]);

  const parent = a.parent;
  if (parent && isTag(parent)) {
    if (HEADING_TAGS.has(parent.name)) {
      const rest = normalizeText(textOf(parent).replace(text, "")).replace(/^[-–:|,\s]+|[-–:|,\s]+$/g, "");
      if (rest) return rest;
    }
    const heading = previousHeading(parent);
    if (heading) return textOf(heading);
  }
  return "";
}

export function extractFacultyLinks($: CheerioAPI, anchors: readonly Element[], pageUrl: string): FacultyLinkGroup {
  const all: FacultyLink[] = anchors.map(a => {
    const link = toLink($, a, pageUrl);
    return { ...link, specialty: inferSpecialty(a, link.url) };
  });
  const links = dedupeLinks(all);
  return { count: links.length, pattern: facultyPattern(links.length), links };
}

// Digit blocks joined by exactly one separator, so " - 10 am" style tails are never absorbed.
const PHONE = /(?:\+\d{1,3}[\s.-]?)?(?:\(\d{2,5}\)[\s.-]?)?\d+(?:[\s.-]\d+)*(?:\s*(?:ext\.?|x)\s*\d{1,5})?/gi;
const EXTENSION = /\s*(ext\.?|x)\s*\d+$/i;
const MIN_PHONE_DIGITS = 7;
const MAX_PHONE_DIGITS = 15;

/**
 * Dialable shapes only: a leading +, ( or trunk 0, three or more digit blocks,
 * or one unbroken run. Two bare blocks such as 2023-2024 are rejected.
 */
function hasPhoneShape(number: string): boolean {
  if (/^[+(0]/.test(number)) return true;
  const blocks = number.split(/[\s.-]/).filter(Boolean);
  return blocks.length >= 3 || blocks.length === 1;
}

export function findPhoneNumber(text: string): string | undefined {
  for (const m of text.matchAll(PHONE)) {
    const candidate = m[0].trim();
    const number = candidate.replace(EXTENSION, "");
    const digits = number.replace(/\D/g, "").length;
    if (digits < MIN_PHONE_DIGITS || digits > MAX_PHONE_DIGITS) continue;
    if (hasPhoneShape(number)) return candidate;
  }
  return undefined;
}

const CLICK_HERE = /click\s+here/i;
const FAMILY_HIFAZAT = /family\s*hifazat/i;
const GOOGLE_PLAY_HREF = /play\.google\.com/i;
const GOOGLE_PLAY_IMG = /google[\s_-]?play|play[\s_-]?store/i;
const APP_STORE_HREF = /(apps|itunes)\.apple\.com/i;
const APP_STORE_IMG = /app[\s_-]?store/i;

function isAppLink($: CheerioAPI, a: Element): boolean {
  const href = hrefOf($, a);
  return GOOGLE_PLAY_HREF.test(href) || APP_STORE_HREF.test(href) || /familyhifazat/i.test(href);
}

function headingOf($: CheerioAPI, anchor: Element): string | undefined {
  const marked = [anchor, ...$(anchor).find("strong, b, h2, h3, h4, h5, h6").toArray()]
    .filter(el => el !== anchor || HEADING_TAGS.has(el.name) || EMPHASIS_TAGS.has(el.name))
    .map(el => textOf(el))
    .find(t => APPOINTMENT_PHRASES.some(p => t.toLowerCase().includes(p)));
  return marked ? marked.replace(/\s*:\s*$/, "") : undefined;
}

export function extractAppointment($: CheerioAPI, region: AppointmentRegion | null, pageUrl: string): AppointmentSection {
  if (!region) return { present: false };

  const text = region.elements.map(el => textOf(el)).join(" ");
  const everyLink = region.elements.flatMap(el => [
    ...(el.name === "a" ? [el] : []),
    ...$(el).find("a[href]").toArray(),
  ]);
  const images = region.elements.flatMap(el => [
    ...(el.name === "img" ? [el] : []),
    ...$(el).find("img").toArray(),
  ]);
  const imageText = images.map(img => `${$(img).attr("src") ?? ""} ${$(img).attr("alt") ?? ""}`);

  const click = region.links.find(a => CLICK_HERE.test(textOf(a)))
    ?? region.links.find(a => !isAppLink($, a) && isNavigableHref(hrefOf($, a)));

  const phoneFromTel = everyLink.map(a => hrefOf($, a)).find(h => /^tel:/i.test(h))?.replace(/^tel:/i, "");

  return {
    present: true,
    components: {
      heading: headingOf($, region.anchor),
      clickHereLink: click
        ? { present: true, text: textOf(click), url: absolutize(hrefOf($, click), pageUrl) }
        : { present: false, text: "", url: "" },
      phoneNumber: findPhoneNumber(text) ?? (phoneFromTel ? normalizeText(phoneFromTel) : undefined),
      familyHifazat: {
        mainLinkPresent: FAMILY_HIFAZAT.test(text)
          || everyLink.some(a => /familyhifazat/i.test(hrefOf($, a))),
        googlePlayButton: everyLink.some(a => GOOGLE_PLAY_HREF.test(hrefOf($, a)))
          || imageText.some(t => GOOGLE_PLAY_IMG.test(t)),
        appStoreButton: everyLink.some(a => APP_STORE_HREF.test(hrefOf($, a)))
          || imageText.some(t => APP_STORE_IMG.test(t)),
      },
    },
  };
}

export function classifyLink(url: string, pageUrl: string, siteDomain = siteDomainOf(pageUrl)): LinkType {
  if (hasDocumentExtension(url)) return "document";
  return isSameSite(hostOf(url), hostOf(pageUrl), siteDomain) ? "internal" : "external";
}

export function extractExternalLinks(
  $: CheerioAPI,
  anchors: readonly Element[],
  pageUrl: string,
  siteDomain?: string,
): ExternalLink[] {
  return anchors.map(a => {
    const link = toLink($, a, pageUrl);
    return { ...link, type: classifyLink(link.url, pageUrl, siteDomain) };
  });
}
