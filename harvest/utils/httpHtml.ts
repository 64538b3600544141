import fetch from "node-fetch";
import { mkdirSync, readFileSync, writeFileSync, statSync } from "fs";
import { join } from "path";
import crypto from "crypto";
import type { FetchConfig } from "../config.js";
import { FetchError } from "../errors.js";

export type PageFetcher = (url: string) => Promise<string>;

const sleep = (ms:number)=>new Promise(r=>setTimeout(r,ms));

function defaultHeaders(cfg: FetchConfig) {
  return {
    "Accept": "text/html,application/xhtml+xml",
    "Accept-Language": "en-US,en;q=0.9",
    "User-Agent": cfg.userAgent,
  };
}

function cachePath(dir: string, url: string) {
  const hash = crypto.createHash("sha1").update(url).digest("hex");
  return join(dir, `${hash}.html`);
}

function fresh(p: string, ttlHours: number): boolean {
  try {
    const st = statSync(p);
    const ageH = (Date.now() - st.mtimeMs) / 3.6e6;
    return ageH < ttlHours && st.size > 0;
  } catch { return false; }
}

/**
 * HTML fetcher with an optional disk cache. Network requests are spaced by the
 * configured rate limit; 429/5xx/403 are retried with backoff, anything else
 * non-2xx fails at once. Every failure surfaces as a FetchError.
 */
export function createHtmlFetcher(cfg: FetchConfig): PageFetcher {
  let lastRequestAt = 0;

  async function waitTurn() {
    const jitter = cfg.jitterMs > 0 ? Math.floor(Math.random()*cfg.jitterMs) : 0;
    const wait = lastRequestAt + cfg.rateLimitMs + jitter - Date.now();
    if (lastRequestAt > 0 && wait > 0) await sleep(wait);
    lastRequestAt = Date.now();
  }

  async function request(url: string) {
    await waitTurn();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), cfg.timeoutMs);
    try {
      return await fetch(url, { headers: defaultHeaders(cfg), signal: controller.signal, redirect: "follow" });
    } catch (e) {
      const reason = controller.signal.aborted ? `timed out after ${cfg.timeoutMs}ms` : (e as Error).message;
      throw new FetchError(url, `GET ${url} -> ${reason}`);
    } finally {
      clearTimeout(timer);
    }
  }

  return async function getText(url: string): Promise<string> {
    const cp = cfg.cacheDir ? cachePath(cfg.cacheDir, url) : null;
    if (cp && fresh(cp, cfg.cacheTtlHours)) return readFileSync(cp, "utf8");

    for (let i=0;i<=cfg.retries;i++) {
      const res = await request(url);

      if (res.ok) {
        const text = await res.text();
        if (cp && cfg.cacheDir) {
          mkdirSync(cfg.cacheDir, { recursive: true });
          writeFileSync(cp, text);
        }
        return text;
      }

      // Handle 429/5xx and be gentler on 403
      if (res.status === 429 || res.status >= 500 || res.status === 403) {
        if (i === cfg.retries) throw new FetchError(url, `GET ${url} -> ${res.status} (exhausted)`, res.status);
        const retryAfter = Number(res.headers.get("retry-after")) || 0;
        const backoff = retryAfter>0 ? retryAfter*1000 : Math.min(2000*(i+1), 10000);
        await sleep(backoff);
        continue;
      }

      throw new FetchError(url, `GET ${url} -> ${res.status}`, res.status);
    }

    throw new FetchError(url, `GET ${url} -> no attempts made`);
  };
}

export function readLinksFile(path: string): string[] {
  return readFileSync(path, "utf8")
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(l => l && !l.startsWith("#"));
}
