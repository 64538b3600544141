import fetch from "node-fetch";
import { z } from "zod";
import { CmsRequestError } from "../errors.js";
import type { CmsCredentials } from "../config.js";
import { slugify } from "../utils/text.js";
import type { CmsClient, CmsStory, NewStory } from "./cms.types.js";

const BASE = "https://mapi.storyblok.com/v1";
const PER_PAGE = 100;
const RETRIES = 4;

const sleep = (ms: number) => new Promise(r => setTimeout(r, ms));

const StorySchema = z.object({
  id: z.number(),
  name: z.string(),
  slug: z.string(),
  is_folder: z.boolean().optional(),
  parent_id: z.number().nullable().optional(),
});
const StoryResp = z.object({ story: StorySchema });
const StoriesResp = z.object({ stories: z.array(StorySchema), total: z.number().optional() });

type StoryRow = z.infer<typeof StorySchema>;

type RequestOpts = {
  params?: Record<string, string | number>;
  body?: unknown;
};

export class StoryblokClient implements CmsClient {
  constructor(private readonly creds: CmsCredentials) {}

  private async req(method: "GET" | "POST", path: string, opts: RequestOpts = {}) {
    const qs = opts.params
      ? "?" + new URLSearchParams(Object.entries(opts.params).map(([k, v]): [string, string] => [k, String(v)])).toString()
      : "";
    const url = `${BASE}/spaces/${this.creds.spaceId}${path}${qs}`;

    for (let attempt = 1; attempt <= RETRIES; attempt++) {
      const res = await fetch(url, {
        method,
        headers: {
          "Authorization": this.creds.token,
          "Content-Type": "application/json",
          "Accept": "application/json",
        },
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
      }).catch((e: unknown) => (e instanceof Error ? e : new Error(String(e))));

      if (res instanceof Error) {
        if (attempt === RETRIES) throw res;
        await sleep(1200 * attempt);
        continue;
      }

      if (res.ok) {
        return { data: await res.json(), total: Number(res.headers.get("total")) || undefined };
      }
      const text = (await res.text()).slice(0, 2000);
      const retryable = res.status === 429 || res.status >= 500;
      if (!retryable || attempt === RETRIES) {
        throw new CmsRequestError(`${method} ${path} -> ${res.status}`, res.status, text);
      }
      await sleep(1200 * attempt);
    }
    throw new Error(`${method} ${path} -> no attempts made`);
  }

  async listFolders(): Promise<StoryRow[]> {
    const out: StoryRow[] = [];
    for (let page = 1; ; page++) {
      const { data, total } = await this.req("GET", "/stories", {
        params: { folder_only: 1, per_page: PER_PAGE, page },
      });
      const parsed = StoriesResp.parse(data);
      out.push(...parsed.stories);
      const all = total ?? parsed.total ?? 0;
      if (!parsed.stories.length || page * PER_PAGE >= all) break;
    }
    return out;
  }

  async ensureFolderPath(parts: readonly string[]): Promise<number> {
    if (!parts.length) return 0;
    const folders = await this.listFolders();
    let parentId = 0;

    for (const name of parts) {
      const found = folders.find(f => f.is_folder && f.name === name && (f.parent_id ?? 0) === parentId);
      if (found) {
        parentId = found.id;
        continue;
      }
      const { data } = await this.req("POST", "/stories", {
        body: {
          story: { name, slug: slugify(name), is_folder: true, parent_id: parentId, content: { component: "folder" } },
        },
      });
      const created = StoryResp.parse(data).story;
      folders.push({ ...created, is_folder: true, parent_id: parentId });
      parentId = created.id;
    }
    return parentId;
  }

  async createStory(input: NewStory): Promise<CmsStory> {
    const { data } = await this.req("POST", "/stories", {
      params: input.publish ? { publish: 1 } : undefined,
      body: {
        story: { name: input.name, slug: input.slug, parent_id: input.parentId, content: input.content },
      },
    });
    const { id, name, slug } = StoryResp.parse(data).story;
    return { id, name, slug };
  }
}
