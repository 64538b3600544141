export const DOCUMENT_EXTENSIONS = [".pdf", ".doc", ".docx", ".xls", ".xlsx", ".ppt", ".pptx", ".csv", ".rtf", ".zip"];

function tryParse(href: string, base?: string): URL | null {
  try { return new URL(href, base); } catch { return null; }
}

export function absolutize(href: string, base: string): string {
  return tryParse(href, base)?.toString() ?? href;
}

/** Dedup key: fragment dropped, host lowercased, trailing slash removed. */
export function normalizeUrl(url: string): string {
  const u = tryParse(url);
  if (!u) return url.trim().toLowerCase();
  const path = u.pathname.length > 1 ? u.pathname.replace(/\/+$/, "") : u.pathname;
  return `${u.protocol}//${u.host.toLowerCase()}${path}${u.search}`;
}

export function hostOf(url: string): string {
  return tryParse(url)?.hostname.toLowerCase() ?? "";
}

export function siteDomainOf(pageUrl: string): string {
  return hostOf(pageUrl).replace(/^www\./, "");
}

export function isSameSite(host: string, pageHost: string, siteDomain: string): boolean {
  if (!host || host === pageHost) return true;
  return host === siteDomain || host.endsWith("." + siteDomain);
}

export function hasDocumentExtension(url: string): boolean {
  const u = tryParse(url);
  const path = (u ? u.pathname : url.split(/[?#]/)[0] ?? "").toLowerCase();
  return DOCUMENT_EXTENSIONS.some(ext => path.endsWith(ext));
}

export function queryParam(url: string, pattern: RegExp): string | undefined {
  const u = tryParse(url);
  if (!u) return undefined;
  for (const [key, value] of u.searchParams) {
    if (pattern.test(key) && value.trim()) return value;
  }
  return undefined;
}

export function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter(item => {
    const k = key(item);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}
