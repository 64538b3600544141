import type { CheerioAPI } from "cheerio";
import { isTag, isText, type AnyNode, type Element } from "domhandler";
import { normalizeText } from "../utils/text.js";

const BLOCK_TAGS = new Set([
  "address", "article", "aside", "blockquote", "div", "dd", "dl", "dt", "figcaption", "figure",
  "footer", "form", "h1", "h2", "h3", "h4", "h5", "h6", "header", "hr", "li", "main", "nav",
  "ol", "p", "pre", "section", "table", "td", "th", "tr", "ul",
]);
const SKIP_TAGS = new Set(["script", "style", "noscript", "template"]);

// Page chrome: tags and class fragments that mark navigation, sidebars and footers.
export const CHROME_TAGS = new Set(["nav", "header", "footer", "aside"]);
export const CHROME_CLASS_MARKERS = ["nav", "menu", "sidebar", "header", "footer", "breadcrumb"];

export const HEADINGS = "h1, h2, h3, h4, h5, h6";

const BREAK = " ";

/**
 * Normalized text of a node, with a space wherever a block element or <br> breaks the flow.
 * Walks with an explicit stack; arbitrarily deep markup must not exhaust the call stack.
 */
export function textOf(node: AnyNode): string {
  const out: string[] = [];
  const stack: Array<AnyNode | typeof BREAK> = [node];

  while (stack.length) {
    const item = stack.pop();
    if (item === undefined) break;
    if (item === BREAK) {
      out.push(BREAK);
      continue;
    }
    if (isText(item)) {
      out.push(item.data);
      continue;
    }
    if (!isTag(item) || SKIP_TAGS.has(item.name)) continue;
    if (item.name === "br") {
      out.push(BREAK);
      continue;
    }
    if (BLOCK_TAGS.has(item.name)) {
      out.push(BREAK);
      stack.push(BREAK);
    }
    for (let i = item.children.length - 1; i >= 0; i--) {
      const child = item.children[i];
      if (child) stack.push(child);
    }
  }
  return normalizeText(out.join(""));
}

export function isChromeElement(el: Element): boolean {
  if (CHROME_TAGS.has(el.name)) return true;
  const cls = (el.attribs["class"] ?? "").toLowerCase();
  return cls.length > 0 && CHROME_CLASS_MARKERS.some(m => cls.includes(m));
}

/** True when `el` or one of its ancestors (below `boundary`, when given) is page chrome. */
export function inChrome(el: Element, boundary?: Element): boolean {
  let node: AnyNode | null = el;
  while (node && node !== boundary) {
    if (isTag(node) && isChromeElement(node)) return true;
    node = node.parent;
  }
  return false;
}

export function hrefOf($: CheerioAPI, el: Element): string {
  return ($(el).attr("href") ?? "").trim();
}

/** Links that point at another page rather than a fragment, script or dialer. */
export function isNavigableHref(href: string): boolean {
  if (!href || href.startsWith("#")) return false;
  return !/^(javascript|mailto|tel|sms|data):/i.test(href);
}
