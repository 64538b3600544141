import type { Cheerio, CheerioAPI } from "cheerio";
import { isTag, type Element } from "domhandler";
import type { SubheadingTag } from "../page.types.js";
import { HEADINGS, hrefOf, inChrome, isNavigableHref, textOf } from "./dom.js";

const BODY_SELECTORS = ["div.ContentMain", "div.MainContentZone", "div[role='main']", "article", "main"];
const BODY_CLASS_HINTS = ["content", "main", "body", "article"];

// Site-wide boilerplate that leaks into the content container.
export const EXCLUDED_SECTIONS = [
  "Resources and Information",
  "Quick Links",
  "Website Policies",
  "© The Aga Khan University Hospital",
];
const MIN_PARAGRAPH_CHARS = 10;

const SUBHEADING_TAGS: SubheadingTag[] = ["h2", "h3", "h4", "h5", "h6"];

const COLLAPSIBLE_SELECTORS = [
  "[data-toggle='collapse']",
  "[data-bs-toggle='collapse']",
  ".accordion",
  ".panel-collapse",
  "details > summary",
];

const FACULTY_HREF = /\/(findadoctor\.aspx|find-a-doctor|doctor-profile|faculty-profile)\b/i;
const FACULTY_TEXT = /\b(meet our\b.*\b(faculty|doctors?|specialists?|consultants?|physicians?|surgeons?|team)|find a doctor)\b/i;

export const APPOINTMENT_PHRASES = [
  "request an appointment",
  "request appointment",
  "اپائنٹمنٹ کی درخواست",
  "اپوائنٹمنٹ کی درخواست",
];
const APPOINTMENT_SIBLING_LIMIT = 3;

export type TitleRegion = {
  hasH1: boolean;
  title: string;
  /** Heading the title was read from, when there is one. */
  element?: Element;
};

export type AppointmentRegion = {
  /** Element whose text carries the call-to-action phrase. */
  anchor: Element;
  /** The anchor plus the siblings that follow it up to the next heading. */
  elements: Element[];
  /** Links inside the region not already claimed by an earlier locator. */
  links: Element[];
};

export type LocatedPage = {
  title: TitleRegion;
  breadcrumb?: string;
  paragraphs: string[];
  subheadingTags: SubheadingTag[];
  hasBulletLists: boolean;
  hasCollapsibleSections: boolean;
  subsectionAnchors: Element[];
  facultyAnchors: Element[];
  appointment: AppointmentRegion | null;
  externalAnchors: Element[];
};

export function locateTitle($: CheerioAPI): TitleRegion {
  for (const h1 of $("h1").toArray()) {
    const text = textOf(h1);
    if (text) return { hasH1: true, title: text, element: h1 };
  }
  for (const h2 of $("h2").toArray()) {
    if (inChrome(h2)) continue;
    const text = textOf(h2);
    if (text) return { hasH1: false, title: text, element: h2 };
  }
  return { hasH1: false, title: "" };
}

export function locateBreadcrumb($: CheerioAPI): string | undefined {
  const trail = $("div, nav, ol, ul")
    .filter((_i, el) => (el.attribs["class"] ?? "").toLowerCase().includes("breadcrumb"))
    .first();
  if (!trail.length) return undefined;
  const parts = trail.find("a").toArray().map(a => textOf(a)).filter(Boolean);
  return parts.length ? parts.join(" > ") : undefined;
}

export function locateBody($: CheerioAPI): Cheerio<Element> {
  for (const sel of BODY_SELECTORS) {
    const found = $<Element, string>(sel).first();
    if (found.length) return found;
  }
  const hinted = $("div").filter((_i, el) => {
    const cls = (el.attribs["class"] ?? "").toLowerCase();
    if (!cls || !BODY_CLASS_HINTS.some(h => cls.includes(h))) return false;
    return $(el).find("p, h1, h2").length > 0;
  }).first();
  if (hinted.length) return hinted;
  const body = $("body").first();
  return body.length ? body : $("html").first();
}

/** Elements under `root` matching `selector`, minus anything inside page chrome. */
function within(root: Cheerio<Element>, selector: string): Element[] {
  const boundary = root.get(0);
  return root.find(selector).toArray().filter(el => !inChrome(el, boundary));
}

export function locateParagraphs(root: Cheerio<Element>): string[] {
  return within(root, "p")
    .map(p => textOf(p))
    .filter(t => t.length > MIN_PARAGRAPH_CHARS && !EXCLUDED_SECTIONS.some(x => t.includes(x)));
}

/** Heading levels used inside the body, not counting the heading that supplied the title. */
export function locateSubheadings(root: Cheerio<Element>, title?: Element): SubheadingTag[] {
  return SUBHEADING_TAGS.filter(tag => within(root, tag).some(h => h !== title));
}

export function hasBulletLists(root: Cheerio<Element>): boolean {
  return within(root, "ul, ol").length > 0;
}

export function hasCollapsibleSections(root: Cheerio<Element>): boolean {
  const collapseHeading = within(root, "h2, h3, h4, h5, h6")
    .some(h => (h.attribs["id"] ?? "").toLowerCase().includes("collapse"));
  return collapseHeading || within(root, COLLAPSIBLE_SELECTORS.join(", ")).length > 0;
}

export function isFacultyLink($: CheerioAPI, a: Element): boolean {
  const href = hrefOf($, a);
  if (!isNavigableHref(href)) return false;
  return FACULTY_HREF.test(href) || FACULTY_TEXT.test(textOf(a));
}

/**
 * Child-department links: the first link of each direct <li> of a content list.
 * Faculty profile links are left for the faculty locator.
 */
export function locateSubsectionLinks($: CheerioAPI, root: Cheerio<Element>, claimed: ReadonlySet<Element>): Element[] {
  const out: Element[] = [];
  for (const ul of within(root, "ul")) {
    for (const li of $(ul).children("li").toArray()) {
      const a = $(li).find("a[href]").first().get(0);
      if (!a || claimed.has(a) || out.includes(a) || isFacultyLink($, a)) continue;
      const text = textOf(a);
      if (text.length > 2 && !text.startsWith("#") && isNavigableHref(hrefOf($, a))) out.push(a);
    }
  }
  return out;
}

export function locateFacultyLinks($: CheerioAPI, root: Cheerio<Element>, claimed: ReadonlySet<Element>): Element[] {
  return within(root, "a[href]").filter(a => !claimed.has(a) && isFacultyLink($, a));
}

function hasAppointmentPhrase(text: string): boolean {
  const t = text.toLowerCase();
  return APPOINTMENT_PHRASES.some(p => t.includes(p));
}

/** The body container and everything above it; an appointment region may not be one of these. */
function enclosing(body: Element | undefined): Set<Element> {
  const out = new Set<Element>();
  let node = body?.parent ?? null;
  if (body) out.add(body);
  while (node && isTag(node)) {
    out.add(node);
    node = node.parent;
  }
  return out;
}

/** Nearest <p> or <div> around the marker that lies strictly inside the body, else the marker. */
function markerContainer(marker: Element, outer: ReadonlySet<Element>): Element {
  let node = marker.parent;
  while (node && isTag(node) && !outer.has(node)) {
    if (node.name === "p" || node.name === "div") return node;
    node = node.parent;
  }
  return marker;
}

function findAppointmentAnchor($: CheerioAPI, outer: ReadonlySet<Element>): Element | undefined {
  const page = $("body").get(0) ?? $("html").get(0);
  if (!page || !hasAppointmentPhrase(textOf(page))) return undefined;

  const direct = $("h2, h3, h4, h5, h6, p, li").toArray()
    .find(el => !outer.has(el) && !inChrome(el) && hasAppointmentPhrase(textOf(el)));
  if (direct) return direct;
  const marker = $("strong, b, span").toArray()
    .find(el => !outer.has(el) && !inChrome(el) && hasAppointmentPhrase(textOf(el)));
  return marker ? markerContainer(marker, outer) : undefined;
}

export function locateAppointment(
  $: CheerioAPI,
  body: Cheerio<Element>,
  claimed: ReadonlySet<Element>,
): AppointmentRegion | null {
  const outer = enclosing(body.get(0));
  const anchor = findAppointmentAnchor($, outer);
  if (!anchor) return null;
  const followers = $(anchor).nextUntil(HEADINGS).toArray()
    .filter(el => !outer.has(el))
    .slice(0, APPOINTMENT_SIBLING_LIMIT);
  const elements = [anchor, ...followers];
  const links: Element[] = [];
  for (const el of elements) {
    const own = el.name === "a" && el.attribs["href"] !== undefined ? [el] : [];
    for (const a of [...own, ...$(el).find("a[href]").toArray()]) {
      if (!claimed.has(a)) links.push(a);
    }
  }
  return { anchor, elements, links };
}

export function locateExternalLinks($: CheerioAPI, root: Cheerio<Element>, claimed: ReadonlySet<Element>): Element[] {
  return within(root, "a[href]").filter(a => {
    if (claimed.has(a)) return false;
    return isNavigableHref(hrefOf($, a)) && textOf(a) !== "";
  });
}

/**
 * Runs every locator over one parsed page. Links are claimed in priority order
 * (subsection, faculty, appointment) and whatever is left falls through to the
 * external-link collection.
 */
export function locateSections($: CheerioAPI): LocatedPage {
  const body = locateBody($);
  const claimed = new Set<Element>();
  const claim = (els: Element[]) => {
    for (const el of els) claimed.add(el);
    return els;
  };

  const subsectionAnchors = claim(locateSubsectionLinks($, body, claimed));
  const facultyAnchors = claim(locateFacultyLinks($, body, claimed));
  const appointment = locateAppointment($, body, claimed);
  if (appointment) claim(appointment.links);
  const externalAnchors = locateExternalLinks($, body, claimed);

  const title = locateTitle($);

  return {
    title,
    breadcrumb: locateBreadcrumb($),
    paragraphs: locateParagraphs(body),
    subheadingTags: locateSubheadings(body, title.element),
    hasBulletLists: hasBulletLists(body),
    hasCollapsibleSections: hasCollapsibleSections(body),
    subsectionAnchors,
    facultyAnchors,
    appointment,
    externalAnchors,
  };
}
