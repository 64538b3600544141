import { z } from "zod";
import { ConfigError } from "./errors.js";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

// Unset and blank variables both fall back to the default.
const blankAsUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const int = (def: number) => z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().default(def));
const str = (def: string) => z.preprocess(blankAsUndefined, z.string().default(def));
const bool = (def: boolean) =>
  z.preprocess(blankAsUndefined, z.enum(["true", "false", "1", "0"]).default(def ? "true" : "false"))
    .transform(v => v === "true" || v === "1");

const EnvSchema = z.object({
  RATE_MS: int(2000),
  JITTER_MS: int(0),
  REQUEST_TIMEOUT_MS: int(10000),
  HTTP_RETRIES: int(2),
  HTTP_USER_AGENT: str(DEFAULT_USER_AGENT),
  CACHE_HTML_DIR: z.string().default("./cache/html"),   // "" disables the cache
  CACHE_TTL_HOURS: int(24),
  SITE_DOMAIN: z.preprocess(blankAsUndefined, z.string().optional()),
  LINKS_FILE: str("links.txt"),
  OUTPUT_ROOT: str("."),
  STORYBLOK_TOKEN: z.preprocess(blankAsUndefined, z.string().optional()),
  STORYBLOK_SPACE_ID: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
  STORYBLOK_CONTENT_TYPE: str("health_and_service"),
  STORYBLOK_FOLDER_PATH: str("Automation/health-services"),
  STORYBLOK_PUBLISH: bool(false),
});

export type FetchConfig = {
  readonly rateLimitMs: number;
  readonly jitterMs: number;
  readonly timeoutMs: number;
  readonly retries: number;
  readonly userAgent: string;
  readonly cacheDir: string | null;
  readonly cacheTtlHours: number;
};

export type CmsConfig = {
  readonly token?: string;
  readonly spaceId?: number;
  readonly contentType: string;
  readonly folderPath: readonly string[];
  readonly publish: boolean;
};

export type HarvestConfig = {
  readonly fetch: FetchConfig;
  readonly siteDomain?: string;
  readonly linksFile: string;
  readonly outputRoot: string;
  readonly cms: CmsConfig;
};

export type CmsCredentials = { token: string; spaceId: number };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvestConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue ? issue.path.join(".") : "environment";
    throw new ConfigError(`Invalid ${name}: ${issue?.message ?? "unknown error"}`);
  }
  const e = parsed.data;

  return Object.freeze({
    fetch: Object.freeze({
      rateLimitMs: e.RATE_MS,
      jitterMs: e.JITTER_MS,
      timeoutMs: e.REQUEST_TIMEOUT_MS,
      retries: e.HTTP_RETRIES,
      userAgent: e.HTTP_USER_AGENT,
      cacheDir: e.CACHE_HTML_DIR.trim() ? e.CACHE_HTML_DIR : null,
      cacheTtlHours: e.CACHE_TTL_HOURS,
    }),
    siteDomain: e.SITE_DOMAIN,
    linksFile: e.LINKS_FILE,
    outputRoot: e.OUTPUT_ROOT,
    cms: Object.freeze({
      token: e.STORYBLOK_TOKEN,
      spaceId: e.STORYBLOK_SPACE_ID,
      contentType: e.STORYBLOK_CONTENT_TYPE,
      folderPath: Object.freeze(e.STORYBLOK_FOLDER_PATH.split("/").map(s => s.trim()).filter(Boolean)),
      publish: e.STORYBLOK_PUBLISH,
    }),
  });
}

export function requireCmsCredentials(config: HarvestConfig): CmsCredentials {
  const { token, spaceId } = config.cms;
  if (!token || spaceId === undefined) {
    throw new ConfigError("Set STORYBLOK_TOKEN and STORYBLOK_SPACE_ID to upload");
  }
  return { token, spaceId };
}
