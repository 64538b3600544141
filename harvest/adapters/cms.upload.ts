import { v4 as uuidv4 } from "uuid";
import { CmsRequestError } from "../errors.js";
import type { AppointmentSection, PageRecord } from "../page.types.js";
import { slugify } from "../utils/text.js";
import type { AppStoreBlock, Block, CmsClient, CmsStory, RichTextNode, StoryContent } from "./cms.types.js";

export const APP_LINKS: Record<AppStoreBlock["type"], string> = {
  custom: "https://familyhifazat.aku.edu/User/Login",
  google: "https://play.google.com/store/apps/details?id=edu.aku.family_hifazat",
  apple: "https://apps.apple.com/pk/app/family-hifazat/id1373736569",
};

export const DEFAULT_APPOINTMENT_HEADING = "Request an Appointment";
export const DEFAULT_APPOINTMENT_TEXT =
  "Click here to request an appointment online, call to book an appointment: (021)111911911 or use our Family Hifazat APP to self-book.";

const text = (t: string): RichTextNode => ({ type: "text", text: t });
const link = (t: string, href: string): RichTextNode => ({
  type: "text",
  text: t,
  marks: [{ type: "link", attrs: { href, linktype: "url" } }],
});

export function appointmentInline(section: AppointmentSection): RichTextNode[] {
  if (!section.present) return [text(DEFAULT_APPOINTMENT_TEXT)];
  const c = section.components;
  const nodes: RichTextNode[] = [];

  if (c.clickHereLink.present) {
    nodes.push(link(c.clickHereLink.text || "Click here", c.clickHereLink.url));
    if (!/appointment/i.test(c.clickHereLink.text)) nodes.push(text(" to request an appointment online"));
  }
  if (c.phoneNumber) {
    nodes.push(text(`${nodes.length ? ", call" : "Call"} to book an appointment: ${c.phoneNumber}`));
  }
  if (c.familyHifazat.mainLinkPresent) {
    nodes.push(text(`${nodes.length ? " or use" : "Use"} our Family Hifazat APP to self-book`));
  }
  if (!nodes.length) return [text(DEFAULT_APPOINTMENT_TEXT)];
  nodes.push(text("."));
  return nodes;
}

/**
 * Story body: a two-column grid with the page text on the left and the
 * appointment paragraph plus the three app-store buttons stacked on the right.
 */
export function buildStoryContent(record: PageRecord, contentType: string, uid: () => string = uuidv4): StoryContent {
  const appt = record.appointmentSection;
  const heading = (appt.present && appt.components.heading) || DEFAULT_APPOINTMENT_HEADING;

  const appStore = (type: AppStoreBlock["type"]): Block => ({
    component: "app_store",
    _uid: uid(),
    type,
    link: APP_LINKS[type],
  });

  const blocks: Block[] = [
    {
      component: "grid_layout",
      _uid: uid(),
      layout_type: "grid",
      columns: 2,
      gap: 15,
      children: [
        {
          component: "paragraph",
          _uid: uid(),
          text: {
            type: "doc",
            content: [{ type: "paragraph", content: [text(record.bodyContent.mainParagraphs)] }],
          },
        },
        {
          component: "grid_layout",
          _uid: uid(),
          layout_type: "stack",
          children: [
            {
              component: "paragraph",
              _uid: uid(),
              text: {
                type: "doc",
                content: [
                  { type: "heading", attrs: { level: 6 }, content: [text(`${heading}:`)] },
                  { type: "paragraph", content: appointmentInline(appt) },
                ],
              },
            },
            appStore("custom"),
            appStore("google"),
            appStore("apple"),
          ],
        },
      ],
    },
  ];

  return { component: contentType, title: record.pageTitle, blocks };
}

export type UploadOptions = {
  contentType: string;
  folderPath: readonly string[];
  publish: boolean;
  uid?: () => string;
  now?: () => number;
  random?: () => number;
};

export type UploadSummary = {
  uploaded: number;
  failed: number;
  stories: CmsStory[];
};

function isSlugTaken(e: unknown): boolean {
  return e instanceof CmsRequestError && e.status === 422 && /already taken|slug/i.test(e.body);
}

export function slugCandidates(title: string, now: number, random: () => number): string[] {
  const base = slugify(title, 90, now);
  return [base, `${base}-${1000 + Math.floor(random() * 9000)}`, `${base}-${Math.floor(now / 1000)}`];
}

/** Why a record cannot be uploaded, or null when it can. */
export function uploadRejection(record: PageRecord): string | null {
  if (!record.pageTitle.trim()) return "page title is empty";
  if (!record.bodyContent.mainParagraphs.trim()) return "main paragraphs are empty";
  return null;
}

export async function uploadRecords(
  records: readonly PageRecord[],
  client: CmsClient,
  opts: UploadOptions,
): Promise<UploadSummary> {
  const now = opts.now ?? Date.now;
  const random = opts.random ?? Math.random;
  const summary: UploadSummary = { uploaded: 0, failed: 0, stories: [] };

  const parentId = await client.ensureFolderPath(opts.folderPath);
  console.log(`Content folder ${opts.folderPath.join(" > ") || "(root)"} -> id ${parentId}`);

  for (const record of records) {
    const rejection = uploadRejection(record);
    if (rejection) {
      console.error(`Skip ${record.url}: ${rejection}`);
      summary.failed++;
      continue;
    }

    const title = record.pageTitle.trim();
    const content = buildStoryContent(record, opts.contentType, opts.uid);
    let story: CmsStory | null = null;

    for (const slug of slugCandidates(title, now(), random)) {
      try {
        story = await client.createStory({ name: title, slug, parentId, content, publish: opts.publish });
        break;
      } catch (e) {
        if (isSlugTaken(e)) continue;
        console.error(`Story creation failed for ${record.url}: ${(e as Error).message}`);
        break;
      }
    }

    if (story) {
      console.log(`  created story ${story.id} / ${story.slug}`);
      summary.uploaded++;
      summary.stories.push(story);
    } else {
      console.error(`  failed to create story for ${record.url}`);
      summary.failed++;
    }
  }

  console.log(`Upload complete: ${summary.uploaded} uploaded, ${summary.failed} failed`);
  return summary;
}
