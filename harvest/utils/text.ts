const INVISIBLE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\u00AD\u200B-\u200F\u2060-\u2064\uFEFF]/g;
const TAG_REMNANT = /<\/?[a-z][^<>]*>/gi;
const NBSP = /\u00A0|&nbsp;/gi;

export function normalizeText(raw: string | null | undefined): string {
  if (!raw) return "";
  return raw
    .replace(TAG_REMNANT, " ")
    .replace(NBSP, " ")
    .replace(INVISIBLE, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function countWords(text: string): number {
  const t = text.trim();
  return t ? t.split(/\s+/).length : 0;
}

export function sanitizeFilename(title: string): string {
  const s = title
    .replace(/[<>:"/\\|?*]/g, "")
    .replace(/ /g, "_")
    .replace(/^[.\s]+|[.\s]+$/g, "");
  return s ? s.slice(0, 100) : "page";
}

export function slugify(s: string, maxLen = 90, now = Date.now()): string {
  let slug = (s ?? "").trim().toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
  if (!slug) slug = `service-${Math.floor(now / 1000)}`;
  return slug.slice(0, maxLen).replace(/-+$/, "");
}
